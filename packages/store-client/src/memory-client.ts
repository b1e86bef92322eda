/**
 * In-memory event store for testing.
 *
 * Same contract as RestEventStore: atomic insert-if-absent on id,
 * (created_at DESC, id ASC) ordering, exclusive page keys.
 * Use setUnavailable() to simulate a datastore outage.
 */

import type { StoredEvent } from "@nostrmart/protocol";
import { StorageUnavailableError } from "./errors.js";
import type { EventStore, InsertResult, PageKey, StoreFilter } from "./types.js";

/** (created_at DESC, id ASC). */
export function compareEvents(a: PageKey, b: PageKey): number {
  if (a.created_at !== b.created_at) return b.created_at - a.created_at;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

function matches(event: StoredEvent, filter: StoreFilter): boolean {
  if (filter.pubkey !== undefined && event.pubkey !== filter.pubkey) return false;
  if (filter.kind !== undefined && event.kind !== filter.kind) return false;
  if (filter.since !== undefined && event.created_at < filter.since) return false;
  if (filter.until !== undefined && event.created_at > filter.until) return false;
  return event.received_at <= filter.receivedUntil;
}

export class MemoryEventStore implements EventStore {
  private readonly rows = new Map<string, StoredEvent>();
  private unavailable = false;

  private ensureAvailable(op: string): void {
    if (this.unavailable) {
      throw new StorageUnavailableError(`MemoryEventStore: ${op} while unavailable`);
    }
  }

  async insertIfAbsent(event: StoredEvent): Promise<InsertResult> {
    this.ensureAvailable("insert");
    // Check-and-set runs without an await in between: atomic on one event loop.
    if (this.rows.has(event.id)) return { inserted: false };
    this.rows.set(event.id, structuredClone(event));
    return { inserted: true };
  }

  async selectPage(
    filter: StoreFilter,
    after: PageKey | null,
    limit: number,
  ): Promise<StoredEvent[]> {
    this.ensureAvailable("select");
    return [...this.rows.values()]
      .filter((event) => matches(event, filter))
      .filter((event) => after === null || compareEvents(event, after) > 0)
      .sort(compareEvents)
      .slice(0, limit)
      .map((event) => structuredClone(event));
  }

  async getById(id: string): Promise<StoredEvent | null> {
    this.ensureAvailable("get");
    const event = this.rows.get(id);
    return event ? structuredClone(event) : null;
  }

  async count(): Promise<number> {
    this.ensureAvailable("count");
    return this.rows.size;
  }

  /** Test helper: number of stored rows (ignores availability). */
  get size(): number {
    return this.rows.size;
  }

  /** Test helper: make every subsequent call fail with StorageUnavailableError. */
  setUnavailable(unavailable: boolean): void {
    this.unavailable = unavailable;
  }
}
