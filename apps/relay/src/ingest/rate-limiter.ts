/**
 * Fixed-window submission limiter, keyed by client address.
 * In-memory, single process. Expired windows are dropped by cleanup().
 */

import { NostrMartError } from "@nostrmart/protocol";

export class RateLimitedError extends NostrMartError {
  constructor(limit: number, windowMs: number, retryAfterMs: number) {
    super(`Rate limit exceeded: ${limit} submissions per ${windowMs}ms`, "rate_limited", {
      limit,
      window_ms: windowMs,
      retry_after_ms: retryAfterMs,
    });
    this.name = "RateLimitedError";
  }
}

interface Window {
  count: number;
  resetAt: number;
}

export class RateLimiter {
  private readonly windows = new Map<string, Window>();

  constructor(
    readonly max: number,
    readonly windowMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.max > 0;
  }

  /** Count one hit for `key`; throws RateLimitedError once the window is full. */
  hit(key: string): void {
    if (!this.enabled) return;
    const now = this.now();
    const current = this.windows.get(key);
    if (!current || current.resetAt <= now) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return;
    }
    if (current.count >= this.max) {
      throw new RateLimitedError(this.max, this.windowMs, current.resetAt - now);
    }
    current.count++;
  }

  /** Drop expired windows. Returns how many were removed. */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.windows.size;
  }
}
