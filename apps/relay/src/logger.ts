/**
 * Process logger. The same pino instance backs Fastify's request logging
 * (via loggerInstance) and the ingest pipeline.
 */

import { pino, type Logger } from "pino";
import { config } from "./config.js";

export type { Logger };

export function createLogger(level: string = config.logLevel): Logger {
  return pino({ level, base: { service: "relay" } });
}

/** Discards everything. Default for tests. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
