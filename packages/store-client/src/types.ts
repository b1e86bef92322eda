/**
 * Event store interface: abstraction over the REST datastore for testability.
 *
 * Contract every implementation must honor:
 *   - insertIfAbsent is atomic on `id`: of N concurrent inserts of one id,
 *     exactly one reports inserted=true and no duplicate row ever exists.
 *   - selectPage orders rows by (created_at DESC, id ASC), a total order.
 *   - transient failures (timeout, network, 5xx) surface as
 *     StorageUnavailableError; writes are never retried internally.
 */

import type { StoredEvent } from "@nostrmart/protocol";

/** Sort key of the last row of a page. Exclusive lower bound for the next page. */
export interface PageKey {
  created_at: number;
  id: string;
}

export interface StoreFilter {
  pubkey?: string;
  kind?: number;
  /** created_at ≥ since (Unix seconds). */
  since?: number;
  /** created_at ≤ until (Unix seconds). */
  until?: number;
  /** received_at ≤ receivedUntil (Unix ms). Pins a pagination snapshot. */
  receivedUntil: number;
}

export interface InsertResult {
  inserted: boolean;
}

export interface EventStore {
  insertIfAbsent(event: StoredEvent): Promise<InsertResult>;
  selectPage(filter: StoreFilter, after: PageKey | null, limit: number): Promise<StoredEvent[]>;
  getById(id: string): Promise<StoredEvent | null>;
  /** Total number of stored events. */
  count(): Promise<number>;
}

export interface RestEventStoreOptions {
  /** Base URL of the Supabase/PostgREST project (e.g. "http://localhost:54321"). */
  url: string;
  /** Anon key. Sent as apikey + bearer token unless a service-role key is set. */
  anonKey: string;
  /** Service-role key. Preferred over the anon key when non-empty. */
  serviceRoleKey?: string;
  /** Table name. Default: "nostr_events". */
  table?: string;
  /** Per-request timeout (ms). Default: 3000. */
  timeoutMs?: number;
  /** Extra attempts for idempotent reads. Default: 2. */
  retryMax?: number;
  /** Injected fetch (tests). Default: global fetch. */
  fetch?: typeof fetch;
  /** Injected backoff sleep (tests). */
  sleep?: (ms: number) => Promise<void>;
}
