/**
 * Event operations: parse, derive id, measure, sign.
 *
 *   parseEvent()  untrusted value → typed NostrEvent (or MalformedEventError)
 *   deriveId()    SHA256(canonical signed fields) → 64-char hex
 *   eventSize()   bytes counted against the size bound
 *   signEvent()   template + secret key → complete NostrEvent (client helper)
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { canonicalBytes, utf8Length, type SignedFields } from "./canonical.js";
import { MalformedEventError } from "./errors.js";
import { getPublicKey, signId } from "./schnorr.js";
import { NostrEvent, type EventTemplate } from "./schemas/event.js";

const NostrEventCheck = TypeCompiler.Compile(NostrEvent);

/** U+0000 or an unpaired UTF-16 surrogate: not storable as Postgres text. */
const UNSTORABLE_RE = /\u0000|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Path of the first string that cannot be stored, or null. */
function unstorableField(event: NostrEvent): string | null {
  if (UNSTORABLE_RE.test(event.content)) return "content";
  for (const [i, tag] of event.tags.entries()) {
    const j = tag.findIndex((item) => UNSTORABLE_RE.test(item));
    if (j !== -1) return `tags/${i}/${j}`;
  }
  return null;
}

// ── Parse ──────────────────────────────────────────────────────────

/**
 * Validate an untrusted value into a NostrEvent.
 * The first schema violation is reported with its field path. Strings
 * holding U+0000 or a lone surrogate are rejected as well.
 */
export function parseEvent(raw: unknown): NostrEvent {
  if (NostrEventCheck.Check(raw)) {
    const field = unstorableField(raw);
    if (field === null) return raw;
    throw new MalformedEventError(
      `Malformed event: ${field} (contains U+0000 or an unpaired surrogate)`,
      { field },
    );
  }

  const first = NostrEventCheck.Errors(raw).First();
  const field = first ? first.path.replace(/^\//, "") || "(root)" : "(root)";
  throw new MalformedEventError(
    `Malformed event: ${field}${first ? ` (${first.message})` : ""}`,
    { field },
  );
}

// ── Event ID ───────────────────────────────────────────────────────

function isSignedFields(fields: SignedFields): boolean {
  return (
    typeof fields.pubkey === "string" &&
    Number.isSafeInteger(fields.created_at) &&
    Number.isSafeInteger(fields.kind) &&
    Array.isArray(fields.tags) &&
    fields.tags.every(
      (tag) => Array.isArray(tag) && tag.every((item) => typeof item === "string"),
    ) &&
    typeof fields.content === "string"
  );
}

/**
 * Compute the content-addressed id of the five signed fields.
 * Pure: identical logical input always yields the identical id.
 */
export function deriveId(
  pubkey: string,
  created_at: number,
  kind: number,
  tags: string[][],
  content: string,
): string {
  const fields: SignedFields = { pubkey, created_at, kind, tags, content };
  if (!isSignedFields(fields)) {
    throw new MalformedEventError("Cannot derive id from mistyped fields");
  }
  return bytesToHex(sha256(canonicalBytes(fields)));
}

/** deriveId over an event-shaped object. */
export function computeEventId(event: SignedFields): string {
  return deriveId(event.pubkey, event.created_at, event.kind, event.tags, event.content);
}

// ── Size ───────────────────────────────────────────────────────────

/** UTF-8 bytes of content plus UTF-8 bytes of the compact JSON tags array. */
export function eventSize(event: Pick<NostrEvent, "content" | "tags">): number {
  return utf8Length(event.content) + utf8Length(JSON.stringify(event.tags));
}

// ── Sign ───────────────────────────────────────────────────────────

/**
 * Sign a template, producing a complete NostrEvent.
 *
 * @param secretKey - 32-byte secp256k1 secret key
 */
export function signEvent(secretKey: Uint8Array, template: EventTemplate): NostrEvent {
  const pubkey = getPublicKey(secretKey);
  const id = deriveId(pubkey, template.created_at, template.kind, template.tags, template.content);
  return {
    id,
    pubkey,
    created_at: template.created_at,
    kind: template.kind,
    tags: template.tags,
    content: template.content,
    sig: signId(secretKey, id),
  };
}
