/**
 * Key management: load/save a secp256k1 key from ~/.nostrmart/key.json.
 *
 * Key file format:
 * {
 *   "publicKey": "hex64",   x-only public key
 *   "secretKey": "hex64"
 * }
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { generateSecretKey, getPublicKey } from "@nostrmart/protocol";

export interface KeyFile {
  publicKey: string;
  secretKey: string;
}

export interface Keys {
  secretKey: Uint8Array;
  publicKeyHex: string;
}

const HEX32 = /^[0-9a-f]{64}$/;

function isKeyFile(value: unknown): value is KeyFile {
  return (
    typeof value === "object" &&
    value !== null &&
    "publicKey" in value &&
    "secretKey" in value &&
    typeof value.publicKey === "string" &&
    typeof value.secretKey === "string"
  );
}

/** Load a key from disk. Throws if missing or inconsistent. */
export async function loadKeys(keyPath: string): Promise<Keys> {
  let raw: string;
  try {
    raw = await readFile(keyPath, "utf-8");
  } catch {
    throw new Error(`No key file at ${keyPath}\nRun 'nostrmart keygen' to generate one.`);
  }

  const data: unknown = JSON.parse(raw);
  if (!isKeyFile(data)) {
    throw new Error(`Invalid key file at ${keyPath}: missing publicKey or secretKey`);
  }
  if (!HEX32.test(data.publicKey) || !HEX32.test(data.secretKey)) {
    throw new Error(`Invalid key file at ${keyPath}: keys must be 64-char lowercase hex`);
  }

  const secretKey = hexToBytes(data.secretKey);
  if (getPublicKey(secretKey) !== data.publicKey) {
    throw new Error(`Invalid key file at ${keyPath}: publicKey does not match secretKey`);
  }
  return { secretKey, publicKeyHex: data.publicKey };
}

/** Generate and save a new key. Returns hex strings. */
export async function generateAndSaveKeys(keyPath: string): Promise<KeyFile> {
  await mkdir(dirname(keyPath), { recursive: true });

  const secretKey = generateSecretKey();
  const keyFile: KeyFile = {
    publicKey: getPublicKey(secretKey),
    secretKey: bytesToHex(secretKey),
  };

  await writeFile(keyPath, JSON.stringify(keyFile, null, 2) + "\n", { encoding: "utf-8", mode: 0o600 });
  return keyFile;
}
