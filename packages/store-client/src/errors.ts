import { NostrMartError, type ErrorDetails } from "@nostrmart/protocol";

/**
 * Datastore unreachable, timed out, or failing with 5xx.
 * Safe for a caller to retry the whole operation: submission is idempotent by id.
 */
export class StorageUnavailableError extends NostrMartError {
  readonly retryable = true;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "storage_unavailable", details);
    this.name = "StorageUnavailableError";
  }
}

/** Datastore rejected the request (4xx) or answered with an unexpected shape. */
export class StorageRequestError extends NostrMartError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, "storage_request_failed", details);
    this.name = "StorageRequestError";
  }
}
