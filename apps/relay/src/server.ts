/**
 * Relay server: HTTP surface over the ingest coordinator.
 *
 * Routes:
 *   POST /event        submit a signed event (admitted or duplicate)
 *   GET  /events       page through events (pubkey, kind, since, until, limit, cursor)
 *   GET  /events/:id   fetch one stored event
 *   GET  /health       storage connectivity + event count
 *
 * Every NostrMartError maps to a status by its code and is answered as
 * { error: code, detail: message, ...details }.
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { InvalidQueryError, NostrMartError } from "@nostrmart/protocol";
import { RestEventStore, type EventStore } from "@nostrmart/store-client";
import { config } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { loadKindRules, type KindRuleRegistry } from "./admission/kind-rules.js";
import { AdmissionPolicy } from "./admission/policy.js";
import { IngestCoordinator, type EventQuery } from "./ingest/coordinator.js";
import { RateLimiter } from "./ingest/rate-limiter.js";

export interface RelaySettings {
  maxEventBytes: number;
  clockSkewToleranceS: number;
  defaultQueryLimit: number;
  maxQueryLimit: number;
  rateLimitMax: number;
  rateLimitWindowMs: number;
}

export interface RelayDeps {
  store?: EventStore;
  kindRules?: KindRuleRegistry;
  settings?: Partial<RelaySettings>;
  logger?: Logger;
  /** Clock in Unix ms. */
  now?: () => number;
}

export const STATUS_BY_CODE: Readonly<Record<string, number>> = {
  malformed_event: 422,
  id_mismatch: 422,
  timestamp_out_of_range: 422,
  kind_validation: 422,
  invalid_query: 422,
  invalid_signature: 401,
  payload_too_large: 413,
  rate_limited: 429,
  storage_unavailable: 503,
  storage_request_failed: 502,
};

function createStore(): EventStore {
  return new RestEventStore({
    url: config.supabaseUrl,
    anonKey: config.supabaseAnonKey,
    serviceRoleKey: config.supabaseServiceRoleKey,
    table: config.eventsTable,
    timeoutMs: config.httpTimeoutMs,
    retryMax: config.httpRetryMax,
  });
}

type QueryValue = string | string[] | undefined;

/** One scalar query parameter, or undefined when absent. */
function single(name: string, value: QueryValue): string | undefined {
  if (Array.isArray(value)) {
    throw new InvalidQueryError(`Parameter ${name} given more than once`, { param: name });
  }
  return value === "" ? undefined : value;
}

function intParam(name: string, value: QueryValue): number | undefined {
  const raw = single(name, value);
  if (raw === undefined) return undefined;
  if (!/^(0|[1-9][0-9]*)$/.test(raw)) {
    throw new InvalidQueryError(`Invalid ${name}: expected a non-negative integer`, {
      param: name,
    });
  }
  return Number(raw);
}

export async function buildApp(deps?: RelayDeps) {
  const settings: RelaySettings = {
    maxEventBytes: config.maxEventBytes,
    clockSkewToleranceS: config.clockSkewToleranceS,
    defaultQueryLimit: config.defaultQueryLimit,
    maxQueryLimit: config.maxQueryLimit,
    rateLimitMax: config.rateLimitMax,
    rateLimitWindowMs: config.rateLimitWindowMs,
    ...deps?.settings,
  };
  const log = deps?.logger ?? createLogger();
  const now = deps?.now ?? Date.now;
  const store = deps?.store ?? createStore();
  const kindRules = deps?.kindRules ?? (await loadKindRules(config.kindRulesPath));

  const ingest = new IngestCoordinator({
    store,
    policy: new AdmissionPolicy(settings, kindRules),
    limits: settings,
    log,
    now,
  });
  const limiter = new RateLimiter(settings.rateLimitMax, settings.rateLimitWindowMs, now);

  const app = Fastify({
    loggerInstance: log,
    // Escaped JSON can be several times the counted size; the size check is ours.
    bodyLimit: Math.max(1_048_576, settings.maxEventBytes * 8),
  });

  if (limiter.enabled) {
    const limiterCleanup = setInterval(() => limiter.cleanup(), settings.rateLimitWindowMs);
    limiterCleanup.unref();
    app.addHook("onClose", async () => {
      clearInterval(limiterCleanup);
    });
  }

  app.log.info({ kinds: kindRules.kinds() }, "kind rules loaded");

  app.setErrorHandler((err: Error, _req, reply) => {
    if (err instanceof NostrMartError) {
      const status = STATUS_BY_CODE[err.code] ?? 500;
      if (err.retryable) reply.header("retry-after", "1");
      return reply.status(status).send({ error: err.code, detail: err.message, ...err.details });
    }
    return reply.send(err);
  });

  // ── Ingest ─────────────────────────────────────────────────────
  app.post("/event", async (req, reply) => {
    limiter.hit(req.ip);
    const result = await ingest.submit(req.body);
    return reply.send({ ok: true, status: result.status, event_id: result.event.id });
  });

  // ── Reads ──────────────────────────────────────────────────────
  app.get<{ Querystring: Record<string, QueryValue> }>("/events", async (req, reply) => {
    const q = req.query;
    const query: EventQuery = {
      pubkey: single("pubkey", q.pubkey),
      kind: intParam("kind", q.kind),
      since: intParam("since", q.since),
      until: intParam("until", q.until),
      limit: intParam("limit", q.limit),
      cursor: single("cursor", q.cursor),
    };
    const page = await ingest.query(query);
    return reply.send({ ok: true, events: page.events, next_cursor: page.next_cursor });
  });

  app.get<{ Params: { id: string } }>("/events/:id", async (req, reply) => {
    const event = await ingest.getEvent(req.params.id);
    if (!event) {
      return reply.status(404).send({ error: "not_found", detail: `No event ${req.params.id}` });
    }
    return reply.send({ ok: true, event });
  });

  // ── Health ─────────────────────────────────────────────────────
  app.get("/health", async (_req, reply) => {
    try {
      const events = await ingest.count();
      return reply.send({ status: "ok", events, timestamp: now() });
    } catch (err) {
      app.log.warn({ err }, "health check failed");
      return reply.status(503).send({ status: "degraded", timestamp: now() });
    }
  });

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── relay config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  supabase_url:      ${config.supabaseUrl}`);
  console.log(`  events_table:      ${config.eventsTable}`);
  console.log(`  auth:              ${config.supabaseServiceRoleKey ? "service role" : "anon"}`);
  console.log(`  max_event_bytes:   ${config.maxEventBytes}`);
  console.log(`  clock_skew:        ${config.clockSkewToleranceS}s`);
  console.log(`  kind_rules:        ${config.kindRulesPath}`);
  console.log(`  rate_limit:        ${config.rateLimitMax > 0 ? `${config.rateLimitMax}/${config.rateLimitWindowMs}ms` : "disabled"}`);
  console.log("────────────────────");

  const app = await buildApp();

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
