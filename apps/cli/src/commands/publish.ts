/**
 * nostrmart publish | listing | review
 *
 * Build a template → sign with the local key → POST /event → print the
 * event id and whether the relay admitted it or already had it.
 */

import { signEvent, type EventTemplate, type NostrEvent } from "@nostrmart/protocol";
import type { CliConfig } from "../lib/config.js";
import { loadKeys } from "../lib/keys.js";
import { httpPost } from "../lib/http.js";
import { SubmitResponse, expectShape } from "../lib/responses.js";
import {
  listingTemplate,
  nowSeconds,
  parseTagArgs,
  reviewTemplate,
} from "../lib/templates.js";

export async function signAndSubmit(
  template: EventTemplate,
  config: CliConfig,
): Promise<{ event: NostrEvent; response: SubmitResponse }> {
  const keys = await loadKeys(config.keyPath);
  const event = signEvent(keys.secretKey, template);
  const body = await httpPost(`${config.relay}/event`, event);
  return { event, response: expectShape(SubmitResponse, body, "submit") };
}

async function publishTemplate(template: EventTemplate, config: CliConfig): Promise<void> {
  console.log(`Publishing kind ${template.kind} → ${config.relay}`);
  const { response } = await signAndSubmit(template, config);
  console.log(`  event_id: ${response.event_id}`);
  console.log(`  status:   ${response.status}`);
}

export interface PublishOptions {
  kind: string;
  tag?: string[];
  createdAt?: string;
}

function parseInteger(name: string, raw: string): number {
  if (!/^-?(0|[1-9][0-9]*)$/.test(raw)) throw new Error(`Invalid ${name}: ${raw}`);
  return Number(raw);
}

export async function publishCommand(
  content: string,
  config: CliConfig,
  opts: PublishOptions,
): Promise<void> {
  await publishTemplate(
    {
      kind: parseInteger("kind", opts.kind),
      created_at: opts.createdAt !== undefined ? parseInteger("created-at", opts.createdAt) : nowSeconds(),
      tags: parseTagArgs(opts.tag ?? []),
      content,
    },
    config,
  );
}

export interface ListingOptions {
  price: string;
  currency?: string;
  category?: string;
  summary?: string;
  description?: string;
}

export async function listingCommand(
  title: string,
  config: CliConfig,
  opts: ListingOptions,
): Promise<void> {
  await publishTemplate(
    listingTemplate({
      title,
      price: parseInteger("price", opts.price),
      currency: opts.currency,
      category: opts.category,
      summary: opts.summary,
      description: opts.description,
      created_at: nowSeconds(),
    }),
    config,
  );
}

export async function reviewCommand(
  listingId: string,
  rating: string,
  config: CliConfig,
  opts: { text?: string },
): Promise<void> {
  await publishTemplate(
    reviewTemplate({
      listingId,
      rating: parseInteger("rating", rating),
      text: opts.text,
      created_at: nowSeconds(),
    }),
    config,
  );
}
