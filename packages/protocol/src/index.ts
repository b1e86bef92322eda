/**
 * @nostrmart/protocol: event model and signature primitives.
 *
 * Pure: no I/O, no state. The relay, store client and CLI import from
 * here, never the reverse.
 */

// Canonical serialization (frozen)
export {
  serializeForId,
  canonicalBytes,
  utf8Length,
  type SignedFields,
} from "./canonical.js";

// Event operations
export {
  parseEvent,
  deriveId,
  computeEventId,
  eventSize,
  signEvent,
} from "./event.js";

// BIP-340 Schnorr (verify; keygen + sign for clients)
export {
  generateSecretKey,
  getPublicKey,
  signId,
  verifySignature,
  assertSignature,
} from "./schnorr.js";

// Error taxonomy
export * from "./errors.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
