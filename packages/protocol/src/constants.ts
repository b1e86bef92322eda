/**
 * Protocol constants.
 *
 * FROZEN values are part of the wire format; changing one breaks
 * interoperability with every client that signs events.
 * DEFAULTS are policy values; the relay reads its live limits from config.
 */

// ── Frozen (wire format) ───────────────────────────────────────────
export const EVENT_ID_HEX_LENGTH = 64;
export const PUBKEY_HEX_LENGTH = 64;
export const SIG_HEX_LENGTH = 128;
export const KIND_MAX = 65_535;

// ── Defaults (tunable per deployment) ──────────────────────────────
export const DEFAULT_MAX_EVENT_BYTES = 65_536; // 64 KiB of content + tags
export const DEFAULT_CLOCK_SKEW_TOLERANCE_S = 900; // 15 minutes
export const DEFAULT_QUERY_LIMIT = 50;
export const DEFAULT_MAX_QUERY_LIMIT = 200;

// ── Event kinds (marketplace conventions) ──────────────────────────
export const EVENT_KIND_METADATA = 0; // profile metadata (JSON content)
export const EVENT_KIND_TEXT_NOTE = 1;
export const EVENT_KIND_REACTION = 7;
export const EVENT_KIND_LISTING = 30_402; // classified listing
export const EVENT_KIND_REVIEW = 31_555; // review of a listing
