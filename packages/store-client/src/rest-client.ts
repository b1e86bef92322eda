/**
 * PostgREST (Supabase REST) event store.
 *
 * Wraps the hosted Postgres REST API (`/rest/v1/<table>`).
 * The table's primary key on `id` is the only de-duplication authority:
 *   insert → POST ?on_conflict=id, Prefer resolution=ignore-duplicates
 *            returned row = inserted; empty array or 409 = duplicate
 *   read   → GET with eq./gte./lte./or= operators, bounded retry + backoff
 *
 * Writes are sent exactly once. A timed-out write may still have landed;
 * the caller reconciles by resubmitting (id-keyed idempotency).
 */

import { TypeCompiler } from "@sinclair/typebox/compiler";
import { StoredEvent } from "@nostrmart/protocol";
import { StorageRequestError, StorageUnavailableError } from "./errors.js";
import type {
  EventStore,
  InsertResult,
  PageKey,
  RestEventStoreOptions,
  StoreFilter,
} from "./types.js";

const DEFAULT_TABLE = "nostr_events";
const DEFAULT_TIMEOUT_MS = 3_000;
const DEFAULT_RETRY_MAX = 2;
const RETRY_BASE_MS = 100;

const COLUMNS = "id,pubkey,created_at,kind,tags,content,sig,received_at";

const StoredEventCheck = TypeCompiler.Compile(StoredEvent);

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === "TimeoutError" ? "timeout" : err.message;
  }
  return String(err);
}

export class RestEventStore implements EventStore {
  private readonly endpoint: string;
  private readonly table: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly retryMax: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(opts: RestEventStoreOptions) {
    this.table = opts.table ?? DEFAULT_TABLE;
    this.endpoint = `${opts.url.replace(/\/+$/, "")}/rest/v1/${this.table}`;
    const key = opts.serviceRoleKey ? opts.serviceRoleKey : opts.anonKey;
    this.headers = {
      apikey: key,
      Authorization: `Bearer ${key}`,
    };
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryMax = opts.retryMax ?? DEFAULT_RETRY_MAX;
    this.fetchImpl = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  // ── Transport ──────────────────────────────────────────────────

  /** One HTTP round trip. Network failure, timeout and 5xx → StorageUnavailableError. */
  private async send(
    method: "GET" | "POST",
    query: URLSearchParams,
    opts: { prefer?: string; body?: unknown } = {},
  ): Promise<Response> {
    const url = `${this.endpoint}?${query.toString()}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method,
        headers: {
          ...this.headers,
          ...(opts.prefer ? { Prefer: opts.prefer } : {}),
          ...(opts.body !== undefined ? { "Content-Type": "application/json" } : {}),
        },
        body: opts.body !== undefined ? JSON.stringify(opts.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new StorageUnavailableError(`${method} ${this.table}: ${describeError(err)}`, {
        method,
      });
    }

    if (res.status >= 500) {
      const text = await res.text().catch(() => "");
      throw new StorageUnavailableError(`${method} ${this.table}: ${res.status} ${text}`, {
        method,
        status: res.status,
      });
    }
    return res;
  }

  private async readJson(method: string, res: Response): Promise<unknown> {
    try {
      return await res.json();
    } catch (err) {
      throw new StorageUnavailableError(
        `${method} ${this.table}: unreadable response (${describeError(err)})`,
        { method, status: res.status },
      );
    }
  }

  private async rejectResponse(method: string, res: Response): Promise<never> {
    const text = await res.text().catch(() => "");
    throw new StorageRequestError(`${method} ${this.table}: ${res.status} ${text}`, {
      method,
      status: res.status,
    });
  }

  /** Run an idempotent read, retrying only transient failures. */
  private async withRetry<T>(op: () => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await op();
      } catch (err) {
        if (!(err instanceof StorageUnavailableError) || attempt >= this.retryMax) {
          throw err;
        }
        await this.sleep(RETRY_BASE_MS * 2 ** attempt);
      }
    }
  }

  private async getRows(query: URLSearchParams): Promise<StoredEvent[]> {
    return this.withRetry(async () => {
      const res = await this.send("GET", query);
      if (!res.ok) return this.rejectResponse("GET", res);
      const body = await this.readJson("GET", res);
      return this.toRows(body);
    });
  }

  private toRows(body: unknown): StoredEvent[] {
    if (!Array.isArray(body)) {
      throw new StorageRequestError(`GET ${this.table}: expected an array of rows`);
    }
    const rows: StoredEvent[] = [];
    for (const row of body) {
      if (!StoredEventCheck.Check(row)) {
        throw new StorageRequestError(`GET ${this.table}: unexpected row shape`);
      }
      rows.push({
        id: row.id,
        pubkey: row.pubkey,
        created_at: row.created_at,
        kind: row.kind,
        tags: row.tags,
        content: row.content,
        sig: row.sig,
        received_at: row.received_at,
      });
    }
    return rows;
  }

  // ── EventStore ─────────────────────────────────────────────────

  async insertIfAbsent(event: StoredEvent): Promise<InsertResult> {
    const query = new URLSearchParams({ on_conflict: "id" });
    const res = await this.send("POST", query, {
      prefer: "return=representation,resolution=ignore-duplicates",
      body: event,
    });

    if (res.status === 409) return { inserted: false };
    if (!res.ok) return this.rejectResponse("POST", res);

    const body = await this.readJson("POST", res);
    if (!Array.isArray(body)) {
      throw new StorageRequestError(`POST ${this.table}: expected an array of rows`);
    }
    return { inserted: body.length > 0 };
  }

  async selectPage(
    filter: StoreFilter,
    after: PageKey | null,
    limit: number,
  ): Promise<StoredEvent[]> {
    const query = new URLSearchParams({ select: COLUMNS });
    if (filter.pubkey !== undefined) query.append("pubkey", `eq.${filter.pubkey}`);
    if (filter.kind !== undefined) query.append("kind", `eq.${filter.kind}`);
    if (filter.since !== undefined) query.append("created_at", `gte.${filter.since}`);
    if (filter.until !== undefined) query.append("created_at", `lte.${filter.until}`);
    query.append("received_at", `lte.${filter.receivedUntil}`);
    if (after) {
      query.append(
        "or",
        `(created_at.lt.${after.created_at},and(created_at.eq.${after.created_at},id.gt.${after.id}))`,
      );
    }
    query.append("order", "created_at.desc,id.asc");
    query.append("limit", String(limit));

    return this.getRows(query);
  }

  async getById(id: string): Promise<StoredEvent | null> {
    const query = new URLSearchParams({ select: COLUMNS, id: `eq.${id}`, limit: "1" });
    const rows = await this.getRows(query);
    return rows[0] ?? null;
  }

  async count(): Promise<number> {
    const query = new URLSearchParams({ select: "id", limit: "1" });
    return this.withRetry(async () => {
      const res = await this.send("GET", query, { prefer: "count=exact" });
      if (!res.ok) return this.rejectResponse("GET", res);
      // Content-Range: "0-0/42" or "*/0"
      const range = res.headers.get("content-range") ?? "";
      const total = Number.parseInt(range.split("/")[1] ?? "", 10);
      if (!Number.isSafeInteger(total)) {
        throw new StorageRequestError(`GET ${this.table}: missing row count`, { range });
      }
      return total;
    });
  }
}
