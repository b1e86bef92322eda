/**
 * NostrEvent: the signed event envelope.
 *
 * id  = SHA256(canonical([0, pubkey, created_at, kind, tags, content]))
 * sig = BIP-340 Schnorr(secret_key, id)
 */

import { Type, type Static } from "@sinclair/typebox";
import { KIND_MAX } from "../constants.js";

export const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });
export const Hex64 = Type.String({ pattern: "^[0-9a-f]{128}$" });

/** One tag-entry: name first, then positional values. */
export const Tag = Type.Array(Type.String(), { minItems: 1 });

export const NostrEvent = Type.Object(
  {
    /** Content-addressed id (lowercase hex). Never trusted as supplied. */
    id: Hex32,
    /** Author's x-only secp256k1 public key (lowercase hex). */
    pubkey: Hex32,
    /** Author-supplied Unix seconds. */
    created_at: Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER }),
    kind: Type.Integer({ minimum: 0, maximum: KIND_MAX }),
    tags: Type.Array(Tag),
    content: Type.String(),
    /** Schnorr signature over the 32 id bytes. */
    sig: Hex64,
  },
  { additionalProperties: false },
);

export type NostrEvent = Static<typeof NostrEvent>;

/** Event fields a client fills in before signing. */
export type EventTemplate = Pick<NostrEvent, "created_at" | "kind" | "tags" | "content">;

/** An admitted event: the signed fields plus the server-assigned receipt time. */
export const StoredEvent = Type.Composite([
  NostrEvent,
  Type.Object({
    /** Unix milliseconds, stamped at admission. */
    received_at: Type.Integer({ minimum: 0, maximum: Number.MAX_SAFE_INTEGER }),
  }),
]);

export type StoredEvent = Static<typeof StoredEvent>;
