/**
 * Relay configuration.
 * All env access centralized here. Read once at startup, never mutated.
 */

import { fileURLToPath } from "node:url";
import {
  DEFAULT_CLOCK_SKEW_TOLERANCE_S,
  DEFAULT_MAX_EVENT_BYTES,
  DEFAULT_MAX_QUERY_LIMIT,
  DEFAULT_QUERY_LIMIT,
} from "@nostrmart/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

function envInt(key: string, fallback: number, min = 0): number {
  const raw = env(key, String(fallback));
  const val = parseInt(raw, 10);
  if (!Number.isSafeInteger(val) || val < min) {
    throw new Error(`Invalid env: ${key}=${raw} (expected an integer >= ${min})`);
  }
  return val;
}

const BUNDLED_KIND_RULES = fileURLToPath(new URL("../config/kind-rules.json", import.meta.url));

export const config = {
  port: envInt("RELAY_PORT", 3200),
  host: env("RELAY_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info").toLowerCase(),

  /** Supabase / PostgREST project URL. */
  supabaseUrl: env("SUPABASE_URL", "http://localhost:54321"),
  supabaseAnonKey: env("SUPABASE_ANON_KEY", ""),
  /** Preferred over the anon key when set. */
  supabaseServiceRoleKey: env("SUPABASE_SERVICE_ROLE_KEY", ""),
  eventsTable: env("EVENTS_TABLE", "nostr_events"),
  /** Per storage call timeout (ms). */
  httpTimeoutMs: envInt("HTTP_TIMEOUT_MS", 3_000),
  /** Extra attempts for idempotent reads. Writes are never retried. */
  httpRetryMax: envInt("HTTP_RETRY_MAX", 2),

  /** Bound on UTF-8 bytes of content + tags JSON. */
  maxEventBytes: envInt("MAX_EVENT_BYTES", DEFAULT_MAX_EVENT_BYTES),
  /** How far created_at may run ahead of server time (seconds). */
  clockSkewToleranceS: envInt("CLOCK_SKEW_TOLERANCE_SECONDS", DEFAULT_CLOCK_SKEW_TOLERANCE_S),
  defaultQueryLimit: envInt("DEFAULT_QUERY_LIMIT", DEFAULT_QUERY_LIMIT, 1),
  maxQueryLimit: envInt("MAX_QUERY_LIMIT", DEFAULT_MAX_QUERY_LIMIT, 1),
  /** JSON file of per-kind rules. */
  kindRulesPath: env("KIND_RULES_PATH", BUNDLED_KIND_RULES),

  /** Submissions per window per client IP. 0 = disabled. */
  rateLimitMax: envInt("RATE_LIMIT_MAX", 0),
  rateLimitWindowMs: envInt("RATE_LIMIT_WINDOW_MS", 60_000, 1),
} as const;
