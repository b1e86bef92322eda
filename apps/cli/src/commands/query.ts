/**
 * nostrmart query [--pubkey] [--kind] [--since] [--until] [--limit] [--cursor] [--all]
 * nostrmart get <event_id>
 */

import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";
import { EventResponse, EventsResponse, expectShape } from "../lib/responses.js";

export interface QueryOptions {
  pubkey?: string;
  kind?: string;
  since?: string;
  until?: string;
  limit?: string;
  cursor?: string;
  /** Follow next_cursor until exhausted. */
  all?: boolean;
}

export function eventsPath(opts: QueryOptions, cursor?: string): string {
  const params = new URLSearchParams();
  for (const key of ["pubkey", "kind", "since", "until", "limit"] as const) {
    const value = opts[key];
    if (value !== undefined) params.set(key, value);
  }
  if (cursor !== undefined) params.set("cursor", cursor);
  const qs = params.toString();
  return qs ? `/events?${qs}` : "/events";
}

export async function queryCommand(config: CliConfig, opts: QueryOptions): Promise<void> {
  let cursor = opts.cursor;
  let total = 0;
  for (;;) {
    const body = await httpGet(`${config.relay}${eventsPath(opts, cursor)}`);
    const page = expectShape(EventsResponse, body, "query");
    for (const event of page.events) console.log(JSON.stringify(event));
    total += page.events.length;

    if (page.next_cursor === null) break;
    if (!opts.all) {
      console.error(`next cursor: ${page.next_cursor}`);
      break;
    }
    cursor = page.next_cursor;
  }
  console.error(`${total} event(s)`);
}

export async function getCommand(eventId: string, config: CliConfig): Promise<void> {
  const body = await httpGet(`${config.relay}/events/${encodeURIComponent(eventId)}`);
  const { event } = expectShape(EventResponse, body, "get");
  console.log(JSON.stringify(event, null, 2));
}
