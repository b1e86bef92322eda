/**
 * Canonical serialization: the byte-exact input to event id derivation.
 *
 * Rules (frozen; a change here changes every event id):
 *   1. Fixed positional array: [0, pubkey, created_at, kind, tags, content]
 *   2. Compact JSON, no whitespace between tokens
 *   3. Integers in base-10 ASCII
 *   4. Strings JSON-escaped: `"` `\` and U+0000–U+001F; \b \f \n \r \t in
 *      short form, other control characters as \u00XX; everything else verbatim
 *   5. Tags kept as nested string arrays in original order
 *
 * JSON.stringify over an array produces exactly this; object key order
 * never enters the encoding.
 */

import { utf8ToBytes } from "@noble/hashes/utils";

export interface SignedFields {
  pubkey: string;
  created_at: number;
  kind: number;
  tags: string[][];
  content: string;
}

/** Canonical serialization string for id derivation. */
export function serializeForId(fields: SignedFields): string {
  return JSON.stringify([
    0,
    fields.pubkey,
    fields.created_at,
    fields.kind,
    fields.tags,
    fields.content,
  ]);
}

/** UTF-8 bytes of the canonical serialization. */
export function canonicalBytes(fields: SignedFields): Uint8Array {
  return utf8ToBytes(serializeForId(fields));
}

/** UTF-8 byte length of a string. */
export function utf8Length(value: string): number {
  return utf8ToBytes(value).length;
}
