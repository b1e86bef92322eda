/**
 * Event templates for marketplace kinds. Pure: no I/O, no clock; the
 * caller supplies created_at.
 */

import {
  EVENT_KIND_LISTING,
  EVENT_KIND_REVIEW,
  type EventTemplate,
} from "@nostrmart/protocol";

const HEX32 = /^[0-9a-f]{64}$/;

/**
 * Parse repeated --tag arguments: "name=v1,v2" → ["name", "v1", "v2"].
 * A bare "name" yields a one-element tag.
 */
export function parseTagArgs(args: string[]): string[][] {
  return args.map((arg) => {
    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    if (!name) throw new Error(`Invalid tag "${arg}": expected name=value[,value...]`);
    return eq === -1 ? [name] : [name, ...arg.slice(eq + 1).split(",")];
  });
}

export interface ListingInput {
  title: string;
  /** Integer price in the smallest unit of `currency`. */
  price: number;
  currency?: string;
  category?: string;
  summary?: string;
  description?: string;
  created_at: number;
}

export function listingTemplate(input: ListingInput): EventTemplate {
  if (!input.title) throw new Error("Listing title cannot be empty");
  if (!Number.isSafeInteger(input.price) || input.price < 0) {
    throw new Error(`Invalid price: ${input.price} (expected a non-negative integer)`);
  }
  const tags: string[][] = [
    ["title", input.title],
    input.currency ? ["price", String(input.price), input.currency] : ["price", String(input.price)],
  ];
  if (input.category) tags.push(["t", input.category]);
  if (input.summary) tags.push(["summary", input.summary]);
  return {
    kind: EVENT_KIND_LISTING,
    created_at: input.created_at,
    tags,
    content: input.description ?? "",
  };
}

export interface ReviewInput {
  listingId: string;
  rating: number;
  text?: string;
  created_at: number;
}

export function reviewTemplate(input: ReviewInput): EventTemplate {
  if (!HEX32.test(input.listingId)) {
    throw new Error(`Invalid listing id: must be 64-char lowercase hex. Got: ${input.listingId}`);
  }
  if (!Number.isInteger(input.rating) || input.rating < 1 || input.rating > 5) {
    throw new Error(`Invalid rating: ${input.rating} (expected 1-5)`);
  }
  return {
    kind: EVENT_KIND_REVIEW,
    created_at: input.created_at,
    tags: [
      ["e", input.listingId],
      ["rating", String(input.rating)],
    ],
    content: input.text ?? "",
  };
}

/** Current Unix time in seconds. */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
