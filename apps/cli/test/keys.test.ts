import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile, readFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getPublicKey } from "@nostrmart/protocol";
import { generateAndSaveKeys, loadKeys } from "../src/lib/keys.js";

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(join(tmpdir(), "nostrmart-keys-"));
});

afterEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
});

describe("keys", () => {
  it("saves a key that loads back with a matching pubkey", async () => {
    const keyPath = join(tmpDir, "nested", "key.json");
    const saved = await generateAndSaveKeys(keyPath);

    const onDisk: unknown = JSON.parse(await readFile(keyPath, "utf-8"));
    expect(onDisk).toEqual(saved);

    const loaded = await loadKeys(keyPath);
    expect(loaded.publicKeyHex).toBe(saved.publicKey);
    expect(getPublicKey(loaded.secretKey)).toBe(saved.publicKey);
  });

  it("explains how to create a missing key", async () => {
    await expect(loadKeys(join(tmpDir, "absent.json"))).rejects.toThrow(/nostrmart keygen/);
  });

  it("rejects a key file whose pubkey does not match", async () => {
    const keyPath = join(tmpDir, "key.json");
    await writeFile(
      keyPath,
      JSON.stringify({ publicKey: "00".repeat(32), secretKey: "01".repeat(32) }),
    );
    await expect(loadKeys(keyPath)).rejects.toThrow(/does not match/);
  });

  it("rejects a key file without a secret key", async () => {
    const keyPath = join(tmpDir, "key.json");
    await writeFile(keyPath, JSON.stringify({ publicKey: "00".repeat(32) }));
    await expect(loadKeys(keyPath)).rejects.toThrow(/missing publicKey or secretKey/);
  });
});
