/**
 * Ingest coordinator over the in-memory store: admission, idempotent
 * replay, concurrent submission, snapshot-stable pagination and
 * storage failures.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  IdMismatchError,
  InvalidQueryError,
  InvalidSignatureError,
  MalformedEventError,
  PayloadTooLargeError,
  type NostrEvent,
} from "@nostrmart/protocol";
import { MemoryEventStore, StorageUnavailableError } from "@nostrmart/store-client";
import { AdmissionPolicy } from "../src/admission/policy.js";
import { KindRuleRegistry } from "../src/admission/kind-rules.js";
import { IngestCoordinator } from "../src/ingest/coordinator.js";
import {
  ALICE_PK,
  BOB_SK,
  NOW_MS,
  NOW_S,
  captureLogger,
  makeClock,
  makeEvent,
  type LogLine,
} from "./helpers.js";

let store: MemoryEventStore;
let clock: ReturnType<typeof makeClock>;
let lines: LogLine[];
let ingest: IngestCoordinator;
let policy: AdmissionPolicy;

function build(limits = { defaultQueryLimit: 3, maxQueryLimit: 5 }) {
  const captured = captureLogger();
  lines = captured.lines;
  policy = new AdmissionPolicy(
    { maxEventBytes: 1_000, clockSkewToleranceS: 900 },
    new KindRuleRegistry(),
  );
  ingest = new IngestCoordinator({
    store,
    policy,
    limits,
    log: captured.log,
    now: clock.now,
  });
}

beforeEach(() => {
  store = new MemoryEventStore();
  clock = makeClock();
  build();
});

/** N events, created one second apart, newest first in expected order. */
function series(n: number, base = NOW_S - 100): NostrEvent[] {
  return Array.from({ length: n }, (_, i) =>
    makeEvent({ created_at: base + i, content: `event ${i}` }),
  ).reverse();
}

async function submitAll(events: NostrEvent[]): Promise<void> {
  for (const event of events) await ingest.submit(event);
}

describe("submit", () => {
  it("admits a valid event and stamps received_at", async () => {
    const event = makeEvent();
    const result = await ingest.submit(event);
    expect(result).toEqual({ status: "admitted", event: { ...event, received_at: NOW_MS } });
    expect(await ingest.getEvent(event.id)).toEqual({ ...event, received_at: NOW_MS });
  });

  it("stamps received_at after admission checks finish", async () => {
    const evaluate = policy.evaluate.bind(policy);
    vi.spyOn(policy, "evaluate").mockImplementation((raw, nowMs) => {
      const decision = evaluate(raw, nowMs);
      clock.set(NOW_MS + 500);
      return decision;
    });

    const event = makeEvent();
    await ingest.submit(event);
    expect((await ingest.getEvent(event.id))?.received_at).toBe(NOW_MS + 500);
  });

  it.each<[string, (event: NostrEvent) => NostrEvent]>([
    ["content", (e) => ({ ...e, content: "Hello, NostrMart?" })],
    ["tags", (e) => ({ ...e, tags: [["t", "bikes"]] })],
    ["kind", (e) => ({ ...e, kind: 2 })],
    ["created_at", (e) => ({ ...e, created_at: e.created_at - 1 })],
    ["pubkey", (e) => ({ ...e, pubkey: makeEvent({}, BOB_SK).pubkey })],
  ])("rejects tampered %s and stores nothing", async (_field, tamper) => {
    const event = makeEvent({ tags: [["t", "books"]] });
    await expect(ingest.submit(tamper(event))).rejects.toBeInstanceOf(IdMismatchError);
    expect(store.size).toBe(0);
  });

  it("rejects content the store cannot hold without calling it", async () => {
    const insert = vi.spyOn(store, "insertIfAbsent");
    await expect(ingest.submit(makeEvent({ content: "a\u0000b" }))).rejects.toBeInstanceOf(
      MalformedEventError,
    );
    expect(insert).not.toHaveBeenCalled();
    expect(store.size).toBe(0);
  });

  it("logs an unsafe created_at as a rejection", async () => {
    await expect(ingest.submit({ ...makeEvent(), created_at: 1e20 })).rejects.toBeInstanceOf(
      MalformedEventError,
    );
    expect(lines.map((l) => [l.level, l.msg, l.code, l.field])).toEqual([
      [30, "event rejected", "malformed_event", "created_at"],
    ]);
  });

  it("treats a replay as a duplicate and keeps the original row", async () => {
    const event = makeEvent();
    await ingest.submit(event);
    clock.set(NOW_MS + 5_000);

    expect(await ingest.submit(event)).toEqual({ status: "duplicate", event });
    expect(store.size).toBe(1);
    expect((await ingest.getEvent(event.id))?.received_at).toBe(NOW_MS);
  });

  it("admits exactly one of many concurrent submissions of one event", async () => {
    const event = makeEvent();
    const results = await Promise.all(Array.from({ length: 10 }, () => ingest.submit(event)));
    expect(results.filter((r) => r.status === "admitted")).toHaveLength(1);
    expect(results.filter((r) => r.status === "duplicate")).toHaveLength(9);
    expect(store.size).toBe(1);
  });

  it("throws the admission error and stores nothing", async () => {
    const event = makeEvent();
    await expect(ingest.submit({ ...event, sig: "0".repeat(128) })).rejects.toBeInstanceOf(
      InvalidSignatureError,
    );
    await expect(ingest.submit(makeEvent({ content: "x".repeat(1_000) }))).rejects.toBeInstanceOf(
      PayloadTooLargeError,
    );
    expect(store.size).toBe(0);
  });

  it("logs an id mismatch at warn and other rejections at info", async () => {
    const event = makeEvent();
    await expect(ingest.submit({ ...event, content: "tampered" })).rejects.toThrow();
    await expect(ingest.submit({ ...event, sig: "0".repeat(128) })).rejects.toThrow();

    expect(lines.map((l) => [l.level, l.msg, l.code])).toEqual([
      [40, "event id mismatch", "id_mismatch"],
      [30, "event rejected", "invalid_signature"],
    ]);
  });

  it("surfaces storage outages and validates before touching storage", async () => {
    store.setUnavailable(true);
    await expect(ingest.submit(makeEvent())).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(
      ingest.submit({ ...makeEvent(), sig: "0".repeat(128) }),
    ).rejects.toBeInstanceOf(InvalidSignatureError);
  });

  it("lets a client retry after an outage", async () => {
    const event = makeEvent();
    store.setUnavailable(true);
    await expect(ingest.submit(event)).rejects.toBeInstanceOf(StorageUnavailableError);
    store.setUnavailable(false);
    expect((await ingest.submit(event)).status).toBe("admitted");
  });
});

describe("query", () => {
  it("pages through every event once, in order, then ends", async () => {
    const events = series(7);
    await submitAll(events);

    const seen: string[] = [];
    let cursor: string | undefined;
    let pages = 0;
    do {
      const page = await ingest.query({ limit: 3, cursor });
      seen.push(...page.events.map((e) => e.id));
      cursor = page.next_cursor ?? undefined;
      pages++;
    } while (cursor !== undefined);

    expect(pages).toBe(3);
    expect(seen).toEqual(events.map((e) => e.id));
  });

  it("returns no cursor when the last page is exactly full", async () => {
    await submitAll(series(3));
    const page = await ingest.query({ limit: 3 });
    expect(page.events).toHaveLength(3);
    expect(page.next_cursor).toBeNull();
  });

  it("breaks created_at ties by ascending id", async () => {
    const tied = [makeEvent({ content: "a" }), makeEvent({ content: "b" }), makeEvent({ content: "c" })];
    await submitAll(tied);
    const ids = (await ingest.query({})).events.map((e) => e.id);
    expect(ids).toEqual(tied.map((e) => e.id).sort());
  });

  it("keeps later pages stable while new events arrive", async () => {
    const events = series(4);
    await submitAll(events);
    const first = await ingest.query({ limit: 2 });

    // Arrives mid-pagination: newer than everything, and between pages.
    clock.set(NOW_MS + 1_000);
    await ingest.submit(makeEvent({ created_at: NOW_S, content: "newest" }));
    await ingest.submit(makeEvent({ created_at: NOW_S - 98, content: "in between" }));

    const second = await ingest.query({ limit: 2, cursor: first.next_cursor ?? undefined });
    expect([...first.events, ...second.events].map((e) => e.id)).toEqual(events.map((e) => e.id));
    expect(second.next_cursor).toBeNull();

    // A fresh query sees them.
    expect((await ingest.query({ limit: 5 })).events[0]?.content).toBe("newest");
  });

  it("filters by pubkey, kind and created_at range", async () => {
    const mine = makeEvent({ created_at: NOW_S - 10 });
    const theirs = makeEvent({ created_at: NOW_S - 20 }, BOB_SK);
    const reaction = makeEvent({ created_at: NOW_S - 30, kind: 7 });
    await submitAll([mine, theirs, reaction]);

    const ids = async (q: Parameters<IngestCoordinator["query"]>[0]) =>
      (await ingest.query(q)).events.map((e) => e.id);

    expect(await ids({ pubkey: ALICE_PK })).toEqual([mine.id, reaction.id]);
    expect(await ids({ kind: 7 })).toEqual([reaction.id]);
    expect(await ids({ since: NOW_S - 20, until: NOW_S - 10 })).toEqual([mine.id, theirs.id]);
  });

  it("applies the default limit and clamps to the maximum", async () => {
    await submitAll(series(7));
    expect((await ingest.query({})).events).toHaveLength(3);
    expect((await ingest.query({ limit: 100 })).events).toHaveLength(5);
  });

  it.each([
    ["uppercase pubkey", { pubkey: "AB".repeat(32) }],
    ["kind above range", { kind: 65_536 }],
    ["negative since", { since: -1 }],
    ["zero limit", { limit: 0 }],
    ["fractional limit", { limit: 1.5 }],
    ["since after until", { since: 10, until: 5 }],
    ["garbage cursor", { cursor: "###" }],
  ])("rejects %s", async (_label, q) => {
    await expect(ingest.query(q)).rejects.toBeInstanceOf(InvalidQueryError);
  });

  it("surfaces storage outages", async () => {
    store.setUnavailable(true);
    await expect(ingest.query({})).rejects.toBeInstanceOf(StorageUnavailableError);
  });
});

describe("getEvent", () => {
  it("returns null for an unknown id", async () => {
    expect(await ingest.getEvent("00".repeat(32))).toBeNull();
  });

  it("rejects a malformed id", async () => {
    await expect(ingest.getEvent("not-an-id")).rejects.toBeInstanceOf(InvalidQueryError);
  });
});
