/**
 * Opaque pagination cursor.
 *
 * base64url(JSON [created_at, id, snapshot]) where (created_at, id) is the
 * sort key of the last event served and snapshot is the received_at
 * high-water mark (Unix ms) fixed when the first page was read. Later
 * pages only see rows received at or before the snapshot, so events
 * admitted mid-pagination never shift or duplicate results.
 *
 * received_at is stamped by the relay just before the insert request, not
 * by the database at commit. An insert stamped at or before the snapshot
 * whose commit lands after the first page was served (at most one storage
 * timeout later) can still appear on a later page of that walk.
 */

import { InvalidQueryError } from "@nostrmart/protocol";

export interface CursorState {
  created_at: number;
  id: string;
  snapshot: number;
}

const HEX32_RE = /^[0-9a-f]{64}$/;

function isNonNegativeInt(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function encodeCursor(state: CursorState): string {
  return Buffer.from(JSON.stringify([state.created_at, state.id, state.snapshot]), "utf8").toString(
    "base64url",
  );
}

export function decodeCursor(token: string): CursorState {
  const invalid = () => new InvalidQueryError("Invalid cursor", { param: "cursor" });
  if (!/^[A-Za-z0-9_-]+$/.test(token)) throw invalid();

  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(token, "base64url").toString("utf8"));
  } catch {
    throw invalid();
  }
  if (!Array.isArray(decoded) || decoded.length !== 3) throw invalid();

  const [createdAt, id, snapshot]: unknown[] = decoded;
  if (!isNonNegativeInt(createdAt) || !isNonNegativeInt(snapshot)) throw invalid();
  if (typeof id !== "string" || !HEX32_RE.test(id)) throw invalid();
  return { created_at: createdAt, id, snapshot };
}
