/**
 * Admission policy: decides whether an untrusted submission may be stored.
 *
 * Checks run in a fixed order and stop at the first failure:
 *   1. shape        parseEvent (MalformedEventError)
 *   2. id           recomputed canonical id equals the claimed id
 *   3. signature    BIP-340 over the id
 *   4. size         content + tags bytes ≤ maxEventBytes
 *   5. timestamp    created_at ≤ now + clockSkewToleranceS
 *   6. kind rules   per-kind registry
 *
 * Pure apart from the supplied clock value; never touches storage.
 */

import {
  IdMismatchError,
  InvalidSignatureError,
  MalformedEventError,
  PayloadTooLargeError,
  TimestampOutOfRangeError,
  computeEventId,
  eventSize,
  parseEvent,
  verifySignature,
  type NostrEvent,
  type NostrMartError,
} from "@nostrmart/protocol";
import type { KindRuleRegistry } from "./kind-rules.js";

export interface AdmissionLimits {
  maxEventBytes: number;
  clockSkewToleranceS: number;
}

export type AdmissionDecision =
  | { verdict: "admit"; event: NostrEvent }
  | { verdict: "reject"; error: NostrMartError };

/** One post-parse check. Returns null when the event passes. */
export type AdmissionCheck = (event: NostrEvent, nowS: number) => NostrMartError | null;

export class AdmissionPolicy {
  private readonly checks: ReadonlyArray<readonly [string, AdmissionCheck]>;

  constructor(
    private readonly limits: AdmissionLimits,
    private readonly kindRules: KindRuleRegistry,
  ) {
    this.checks = [
      ["id", (event) => {
        const computed = computeEventId(event);
        return computed === event.id ? null : new IdMismatchError(event.id, computed);
      }],
      ["signature", (event) =>
        verifySignature(event.id, event.pubkey, event.sig)
          ? null
          : new InvalidSignatureError(event.id, event.pubkey)],
      ["size", (event) => {
        const size = eventSize(event);
        return size > this.limits.maxEventBytes
          ? new PayloadTooLargeError(size, this.limits.maxEventBytes)
          : null;
      }],
      ["timestamp", (event, nowS) =>
        event.created_at > nowS + this.limits.clockSkewToleranceS
          ? new TimestampOutOfRangeError(event.created_at, nowS, this.limits.clockSkewToleranceS)
          : null],
      ["kind", (event) => this.kindRules.validate(event)],
    ];
  }

  /** Names of the post-parse checks, in evaluation order. */
  get order(): string[] {
    return ["shape", ...this.checks.map(([name]) => name)];
  }

  evaluate(raw: unknown, nowMs: number): AdmissionDecision {
    let event: NostrEvent;
    try {
      event = parseEvent(raw);
    } catch (err) {
      if (err instanceof MalformedEventError) return { verdict: "reject", error: err };
      throw err;
    }

    const nowS = Math.floor(nowMs / 1000);
    for (const [, check] of this.checks) {
      const error = check(event, nowS);
      if (error) return { verdict: "reject", error };
    }
    return { verdict: "admit", event };
  }
}
