/**
 * Error taxonomy for event ingest.
 *
 * Every rejection is its own class with a stable snake_case `code`, so the
 * HTTP layer (or any other caller) can branch on `instanceof` or `code`
 * without parsing messages. `details` carries the offending field or rule.
 *
 * A duplicate submission is NOT an error; it is a successful outcome.
 */

export type ErrorDetails = Record<string, unknown>;

/** Base class for all NostrMart errors. */
export class NostrMartError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;
  /** Resending the identical request may succeed; answered with Retry-After. */
  readonly retryable: boolean = false;

  constructor(message: string, code: string, details: ErrorDetails = {}) {
    super(message);
    this.name = "NostrMartError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or mistyped field. */
export class MalformedEventError extends NostrMartError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "malformed_event", details);
    this.name = "MalformedEventError";
  }
}

/** Claimed id differs from the recomputed canonical id. */
export class IdMismatchError extends NostrMartError {
  constructor(claimed: string, computed: string) {
    super(`Event id mismatch: claimed ${claimed}, computed ${computed}`, "id_mismatch", {
      claimed,
      computed,
    });
    this.name = "IdMismatchError";
  }
}

/** Signature does not verify against id + pubkey (or is not decodable). */
export class InvalidSignatureError extends NostrMartError {
  constructor(id: string, pubkey: string) {
    super("Schnorr signature verification failed", "invalid_signature", { id, pubkey });
    this.name = "InvalidSignatureError";
  }
}

/** Serialized size exceeds the configured bound. */
export class PayloadTooLargeError extends NostrMartError {
  constructor(size: number, limit: number) {
    super(`Event too large: ${size} bytes (max ${limit})`, "payload_too_large", {
      size,
      limit,
    });
    this.name = "PayloadTooLargeError";
  }
}

/** created_at lies further in the future than the clock-skew tolerance allows. */
export class TimestampOutOfRangeError extends NostrMartError {
  constructor(createdAt: number, now: number, tolerance: number) {
    super(
      `created_at ${createdAt} is more than ${tolerance}s ahead of server time ${now}`,
      "timestamp_out_of_range",
      { created_at: createdAt, now, tolerance },
    );
    this.name = "TimestampOutOfRangeError";
  }
}

/** A kind-specific rule was violated. */
export class KindValidationError extends NostrMartError {
  constructor(kind: number, rule: string, message: string, tag?: string) {
    super(message, "kind_validation", {
      kind,
      rule,
      ...(tag !== undefined ? { tag } : {}),
    });
    this.name = "KindValidationError";
  }
}

/** Query filter or cursor cannot be interpreted. */
export class InvalidQueryError extends NostrMartError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "invalid_query", details);
    this.name = "InvalidQueryError";
  }
}
