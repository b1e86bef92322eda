/**
 * Relay response shapes, checked before a command prints anything.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { StoredEvent } from "@nostrmart/protocol";

export const SubmitResponse = Type.Object({
  ok: Type.Literal(true),
  status: Type.Union([Type.Literal("admitted"), Type.Literal("duplicate")]),
  event_id: Type.String(),
});
export type SubmitResponse = Static<typeof SubmitResponse>;

export const EventsResponse = Type.Object({
  ok: Type.Literal(true),
  events: Type.Array(StoredEvent),
  next_cursor: Type.Union([Type.String(), Type.Null()]),
});
export type EventsResponse = Static<typeof EventsResponse>;

export const EventResponse = Type.Object({
  ok: Type.Literal(true),
  event: StoredEvent,
});
export type EventResponse = Static<typeof EventResponse>;

/** Validate `body` against `schema`, or throw naming the first mismatch. */
export function expectShape<T extends TSchema>(schema: T, body: unknown, what: string): Static<T> {
  const check = TypeCompiler.Compile(schema);
  if (check.Check(body)) return body;
  const first = check.Errors(body).First();
  throw new Error(`Unexpected ${what} response: ${first?.path ?? ""} ${first?.message ?? ""}`.trim());
}
