#!/usr/bin/env node
/**
 * nostrmart CLI: sign and publish marketplace events, read them back.
 *
 * Commands:
 *   keygen                        Generate a secp256k1 key
 *   publish <content>             Sign any kind (--kind, --tag name=v1,v2) → POST /event
 *   listing <title>               Publish a listing (kind 30402)
 *   review <listing_id> <rating>  Publish a review (kind 31555)
 *   query                         Page through events (filters, --all)
 *   get <event_id>                Fetch one event
 *   config                        Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { keygenCommand } from "./commands/keygen.js";
import { listingCommand, publishCommand, reviewCommand } from "./commands/publish.js";
import { getCommand, queryCommand } from "./commands/query.js";
import { configCommand } from "./commands/config-cmd.js";

const program = new Command();

program
  .name("nostrmart")
  .description("Signed marketplace events for a NostrMart relay")
  .version("0.1.0");

async function configWith(opts: { relay?: string }): Promise<CliConfig> {
  const config = await loadConfig();
  if (opts.relay) config.relay = opts.relay.replace(/\/+$/, "");
  return config;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

// ── keygen ──────────────────────────────────────────────────────────

program
  .command("keygen")
  .description("Generate a secp256k1 key")
  .option("-f, --force", "Overwrite existing key")
  .action(async (opts: { force?: boolean }) => {
    const config = await loadConfig();
    await keygenCommand(config, opts);
  });

// ── publish ─────────────────────────────────────────────────────────

program
  .command("publish")
  .description("Sign an event of any kind and submit it")
  .argument("<content>", "Event content")
  .option("-k, --kind <kind>", "Event kind (0-65535)", "1")
  .option("-t, --tag <tag>", "Tag as name=value[,value...] (repeatable)", collect, [])
  .option("--created-at <seconds>", "Override created_at (Unix seconds)")
  .option("-r, --relay <url>", "Relay URL override")
  .action(async (content: string, opts: { kind: string; tag: string[]; createdAt?: string; relay?: string }) => {
    await publishCommand(content, await configWith(opts), opts);
  });

// ── listing ─────────────────────────────────────────────────────────

program
  .command("listing")
  .description("Publish a marketplace listing")
  .argument("<title>", "Listing title")
  .requiredOption("-p, --price <amount>", "Integer price (smallest currency unit)")
  .option("--currency <code>", "Currency code, e.g. USD or SAT")
  .option("--category <name>", "Category tag")
  .option("--summary <text>", "One-line summary")
  .option("-d, --description <text>", "Listing body")
  .option("-r, --relay <url>", "Relay URL override")
  .action(async (title: string, opts: { price: string; currency?: string; category?: string; summary?: string; description?: string; relay?: string }) => {
    await listingCommand(title, await configWith(opts), opts);
  });

// ── review ──────────────────────────────────────────────────────────

program
  .command("review")
  .description("Review a listing")
  .argument("<listing_id>", "Listing event id (64-char hex)")
  .argument("<rating>", "Rating 1-5")
  .option("--text <text>", "Review text")
  .option("-r, --relay <url>", "Relay URL override")
  .action(async (listingId: string, rating: string, opts: { text?: string; relay?: string }) => {
    await reviewCommand(listingId, rating, await configWith(opts), opts);
  });

// ── query ───────────────────────────────────────────────────────────

program
  .command("query")
  .description("List events, newest first (one JSON event per line)")
  .option("--pubkey <hex>", "Author pubkey")
  .option("-k, --kind <kind>", "Event kind")
  .option("--since <seconds>", "created_at lower bound")
  .option("--until <seconds>", "created_at upper bound")
  .option("-l, --limit <n>", "Page size")
  .option("--cursor <cursor>", "Resume from a cursor")
  .option("-a, --all", "Follow cursors until exhausted")
  .option("-r, --relay <url>", "Relay URL override")
  .action(async (opts: { pubkey?: string; kind?: string; since?: string; until?: string; limit?: string; cursor?: string; all?: boolean; relay?: string }) => {
    await queryCommand(await configWith(opts), opts);
  });

// ── get ─────────────────────────────────────────────────────────────

program
  .command("get")
  .description("Fetch one event by id")
  .argument("<event_id>", "Event id (64-char hex)")
  .option("-r, --relay <url>", "Relay URL override")
  .action(async (eventId: string, opts: { relay?: string }) => {
    await getCommand(eventId, await configWith(opts));
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("-r, --relay <url>", "Set relay URL")
  .option("--key-path <path>", "Set key file path")
  .action(async (opts: { relay?: string; keyPath?: string }) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
