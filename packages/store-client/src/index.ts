/**
 * @nostrmart/store-client: event store abstraction.
 *
 * The relay talks only to the EventStore interface.
 * Swap RestEventStore for MemoryEventStore in tests.
 */

export type {
  EventStore,
  InsertResult,
  PageKey,
  StoreFilter,
  RestEventStoreOptions,
} from "./types.js";

export { StorageUnavailableError, StorageRequestError } from "./errors.js";
export { RestEventStore } from "./rest-client.js";
export { MemoryEventStore, compareEvents } from "./memory-client.js";
