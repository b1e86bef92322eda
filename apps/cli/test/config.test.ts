import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, saveConfig } from "../src/lib/config.js";

const ENV_KEYS = ["NOSTRMART_RELAY", "NOSTRMART_KEY_PATH"] as const;

let tmpDir: string;
let saved: Partial<Record<(typeof ENV_KEYS)[number], string>>;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), "nostrmart-config-"));
  saved = {};
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(async () => {
  for (const key of ENV_KEYS) {
    const value = saved[key];
    if (value === undefined) delete process.env[key];
    else process.env[key] = value;
  }
  await rm(tmpDir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("falls back to defaults without a config file", async () => {
    const config = await loadConfig(join(tmpDir, "config.json"));
    expect(config.relay).toBe("http://localhost:3200");
    expect(config.keyPath.endsWith(join(".nostrmart", "key.json"))).toBe(true);
  });

  it("reads the file and lets env override it", async () => {
    const path = join(tmpDir, "config.json");
    await saveConfig({ relay: "http://relay.test/", keyPath: "/keys/a.json" }, path);
    expect(await loadConfig(path)).toEqual({ relay: "http://relay.test", keyPath: "/keys/a.json" });

    process.env["NOSTRMART_RELAY"] = "http://other.test";
    expect((await loadConfig(path)).relay).toBe("http://other.test");
  });

  it("rejects a config file of the wrong shape", async () => {
    const path = join(tmpDir, "config.json");
    await writeFile(path, JSON.stringify({ relay: 42 }));
    await expect(loadConfig(path)).rejects.toThrow(/^Invalid config at/);
  });
});
