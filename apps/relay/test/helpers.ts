/**
 * Shared fixtures for relay tests: deterministic keys, a fixed clock,
 * signed events and a log capture.
 */

import { fileURLToPath } from "node:url";
import { pino, type Logger } from "pino";
import { signEvent, getPublicKey, type EventTemplate, type NostrEvent } from "@nostrmart/protocol";
import { loadKindRules, type KindRuleRegistry } from "../src/admission/kind-rules.js";

/** Placeholder secret keys (valid scalars, not secret). */
export const ALICE_SK = new Uint8Array(32).fill(1);
export const BOB_SK = new Uint8Array(32).fill(2);
export const ALICE_PK = getPublicKey(ALICE_SK);

export const NOW_MS = 1_700_000_000_000;
export const NOW_S = NOW_MS / 1000;

export const BUNDLED_RULES_PATH = fileURLToPath(
  new URL("../config/kind-rules.json", import.meta.url),
);

export function bundledRules(): Promise<KindRuleRegistry> {
  return loadKindRules(BUNDLED_RULES_PATH);
}

export function makeEvent(
  overrides: Partial<EventTemplate> = {},
  secretKey: Uint8Array = ALICE_SK,
): NostrEvent {
  return signEvent(secretKey, {
    created_at: NOW_S,
    kind: 1,
    tags: [],
    content: "Hello, NostrMart!",
    ...overrides,
  });
}

/** A settable clock in Unix ms. */
export function makeClock(start = NOW_MS) {
  let current = start;
  return {
    now: () => current,
    set: (ms: number) => {
      current = ms;
    },
  };
}

export interface LogLine {
  level: number;
  msg: string;
  [key: string]: unknown;
}

/** pino logger that records parsed JSON lines. */
export function captureLogger(): { log: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const log = pino(
    { level: "debug" },
    {
      write(chunk: string) {
        lines.push(JSON.parse(chunk));
      },
    },
  );
  return { log, lines };
}
