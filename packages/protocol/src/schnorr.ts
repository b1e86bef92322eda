/**
 * BIP-340 Schnorr signatures over secp256k1.
 *
 * Fixed scheme:
 *   pubkey = 32-byte x-only public key (64 hex chars)
 *   sig    = 64-byte Schnorr signature (128 hex chars)
 *   msg    = the 32 bytes of the event id (the SHA256 digest itself)
 *
 * Verification holds no secret material. Key generation and signing are
 * client-side helpers (CLI, tests).
 */

import { schnorr } from "@noble/curves/secp256k1";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { InvalidSignatureError } from "./errors.js";

const HEX32 = /^[0-9a-f]{64}$/;
const HEX64 = /^[0-9a-f]{128}$/;

// ── Key Generation (client helper) ─────────────────────────────────

/** Random 32-byte secp256k1 secret key. */
export function generateSecretKey(): Uint8Array {
  return schnorr.utils.randomPrivateKey();
}

/** x-only public key (hex) for a secret key. */
export function getPublicKey(secretKey: Uint8Array): string {
  return bytesToHex(schnorr.getPublicKey(secretKey));
}

// ── Signing (client helper) ────────────────────────────────────────

/** Sign a 64-hex event id. Returns the 128-hex signature. */
export function signId(secretKey: Uint8Array, id: string): string {
  return bytesToHex(schnorr.sign(hexToBytes(id), secretKey));
}

// ── Verification ───────────────────────────────────────────────────

/**
 * Verify `sig` over the id digest under `pubkey`.
 * Never throws: malformed hex, off-curve keys and bad signatures all
 * return false.
 */
export function verifySignature(id: string, pubkey: string, sig: string): boolean {
  if (!HEX32.test(id) || !HEX32.test(pubkey) || !HEX64.test(sig)) {
    return false;
  }
  try {
    return schnorr.verify(hexToBytes(sig), hexToBytes(id), hexToBytes(pubkey));
  } catch {
    return false;
  }
}

/** Throwing variant of verifySignature. */
export function assertSignature(id: string, pubkey: string, sig: string): void {
  if (!verifySignature(id, pubkey, sig)) {
    throw new InvalidSignatureError(id, pubkey);
  }
}
