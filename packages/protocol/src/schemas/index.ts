/**
 * Schema barrel export.
 */

export {
  Hex32,
  Hex64,
  Tag,
  NostrEvent,
  StoredEvent,
  type EventTemplate,
} from "./event.js";
