/**
 * Environment parsing: defaults, overrides and lower bounds.
 * config.ts reads the environment at import, so each case re-imports it.
 */

import { describe, it, expect, afterEach, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  return (await import("../src/config.js")).config;
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("config", () => {
  it("reads integer overrides", async () => {
    vi.stubEnv("MAX_QUERY_LIMIT", "50");
    vi.stubEnv("RATE_LIMIT_WINDOW_MS", "1000");
    const config = await loadConfig();
    expect(config.maxQueryLimit).toBe(50);
    expect(config.rateLimitWindowMs).toBe(1_000);
  });

  it("accepts zero where zero means disabled", async () => {
    vi.stubEnv("RATE_LIMIT_MAX", "0");
    vi.stubEnv("CLOCK_SKEW_TOLERANCE_SECONDS", "0");
    const config = await loadConfig();
    expect(config.rateLimitMax).toBe(0);
    expect(config.clockSkewToleranceS).toBe(0);
  });

  it.each(["DEFAULT_QUERY_LIMIT", "MAX_QUERY_LIMIT", "RATE_LIMIT_WINDOW_MS"])(
    "refuses %s=0",
    async (key) => {
      vi.stubEnv(key, "0");
      await expect(loadConfig()).rejects.toThrow(`Invalid env: ${key}=0 (expected an integer >= 1)`);
    },
  );

  it("refuses a negative value", async () => {
    vi.stubEnv("HTTP_RETRY_MAX", "-1");
    await expect(loadConfig()).rejects.toThrow("Invalid env: HTTP_RETRY_MAX=-1 (expected an integer >= 0)");
  });
});
