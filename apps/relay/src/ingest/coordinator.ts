/**
 * Ingest coordinator: the single entry point for submitting and reading events.
 *
 * submit() runs the admission policy, then stamps received_at and inserts
 * atomically on id. A replay of a stored id is a successful "duplicate"
 * outcome, decided by the store's insert result (never by a prior read,
 * which would race with concurrent submissions).
 *
 * query() pages through (created_at DESC, id ASC) with an opaque cursor
 * that also pins a received_at snapshot.
 */

import {
  IdMismatchError,
  InvalidQueryError,
  KIND_MAX,
  type NostrEvent,
  type StoredEvent,
} from "@nostrmart/protocol";
import { StorageUnavailableError, type EventStore } from "@nostrmart/store-client";
import type { Logger } from "pino";
import type { AdmissionPolicy } from "../admission/policy.js";
import { decodeCursor, encodeCursor } from "./cursor.js";

export type SubmitResult =
  | { status: "admitted"; event: StoredEvent }
  | { status: "duplicate"; event: NostrEvent };

export interface EventQuery {
  pubkey?: string;
  kind?: number;
  since?: number;
  until?: number;
  limit?: number;
  cursor?: string;
}

export interface EventPage {
  events: StoredEvent[];
  next_cursor: string | null;
}

export interface QueryLimits {
  defaultQueryLimit: number;
  maxQueryLimit: number;
}

export interface IngestDeps {
  store: EventStore;
  policy: AdmissionPolicy;
  limits: QueryLimits;
  log: Logger;
  /** Clock in Unix ms. Default: Date.now. */
  now?: () => number;
}

const HEX32_RE = /^[0-9a-f]{64}$/;

function checkInt(name: string, value: number | undefined, min: number, max: number): void {
  if (value === undefined) return;
  if (!Number.isSafeInteger(value) || value < min || value > max) {
    throw new InvalidQueryError(`Invalid ${name}: expected an integer in [${min}, ${max}]`, {
      param: name,
    });
  }
}

export class IngestCoordinator {
  private readonly store: EventStore;
  private readonly policy: AdmissionPolicy;
  private readonly limits: QueryLimits;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(deps: IngestDeps) {
    this.store = deps.store;
    this.policy = deps.policy;
    this.limits = deps.limits;
    this.log = deps.log;
    this.now = deps.now ?? Date.now;
  }

  async submit(raw: unknown): Promise<SubmitResult> {
    const decision = this.policy.evaluate(raw, this.now());

    if (decision.verdict === "reject") {
      const { error } = decision;
      if (error instanceof IdMismatchError) {
        this.log.warn({ code: error.code, ...error.details }, "event id mismatch");
      } else {
        this.log.info({ code: error.code, ...error.details }, "event rejected");
      }
      throw error;
    }

    const { event } = decision;
    // Stamped after admission, immediately before the insert.
    const stored: StoredEvent = { ...event, received_at: this.now() };
    let inserted: boolean;
    try {
      ({ inserted } = await this.store.insertIfAbsent(stored));
    } catch (err) {
      if (err instanceof StorageUnavailableError) {
        this.log.error({ err, event_id: event.id }, "storage unavailable during insert");
      }
      throw err;
    }

    const result: SubmitResult = inserted
      ? { status: "admitted", event: stored }
      : { status: "duplicate", event };
    this.log.info(
      { event_id: event.id, kind: event.kind, pubkey: event.pubkey, status: result.status },
      "event accepted",
    );
    return result;
  }

  async query(q: EventQuery): Promise<EventPage> {
    if (q.pubkey !== undefined && !HEX32_RE.test(q.pubkey)) {
      throw new InvalidQueryError("Invalid pubkey: expected 64 lowercase hex chars", {
        param: "pubkey",
      });
    }
    checkInt("kind", q.kind, 0, KIND_MAX);
    checkInt("since", q.since, 0, Number.MAX_SAFE_INTEGER);
    checkInt("until", q.until, 0, Number.MAX_SAFE_INTEGER);
    checkInt("limit", q.limit, 1, Number.MAX_SAFE_INTEGER);
    if (q.since !== undefined && q.until !== undefined && q.since > q.until) {
      throw new InvalidQueryError("since must not be after until", { param: "since" });
    }

    const limit = Math.min(q.limit ?? this.limits.defaultQueryLimit, this.limits.maxQueryLimit);
    const cursor = q.cursor !== undefined ? decodeCursor(q.cursor) : null;
    const snapshot = cursor ? cursor.snapshot : this.now();

    const rows = await this.store.selectPage(
      {
        pubkey: q.pubkey,
        kind: q.kind,
        since: q.since,
        until: q.until,
        receivedUntil: snapshot,
      },
      cursor ? { created_at: cursor.created_at, id: cursor.id } : null,
      limit + 1,
    );

    const events = rows.slice(0, limit);
    const last = events[events.length - 1];
    const next_cursor =
      rows.length > limit && last
        ? encodeCursor({ created_at: last.created_at, id: last.id, snapshot })
        : null;
    return { events, next_cursor };
  }

  async getEvent(id: string): Promise<StoredEvent | null> {
    if (!HEX32_RE.test(id)) {
      throw new InvalidQueryError("Invalid event id: expected 64 lowercase hex chars", {
        param: "id",
      });
    }
    return this.store.getById(id);
  }

  /** Stored event count (health reporting). */
  async count(): Promise<number> {
    return this.store.count();
  }
}
