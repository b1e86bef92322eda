/**
 * nostrmart keygen
 *
 * Generate a secp256k1 key → write to ~/.nostrmart/key.json.
 */

import { existsSync } from "node:fs";
import type { CliConfig } from "../lib/config.js";
import { generateAndSaveKeys } from "../lib/keys.js";

interface KeygenOptions {
  force?: boolean;
}

export async function keygenCommand(config: CliConfig, opts: KeygenOptions): Promise<void> {
  const keyPath = config.keyPath;

  if (existsSync(keyPath) && !opts.force) {
    throw new Error(`Key file already exists at ${keyPath}\nUse --force to overwrite.`);
  }

  console.log(`Generating secp256k1 key...`);
  const keyFile = await generateAndSaveKeys(keyPath);

  console.log(`  pubkey: ${keyFile.publicKey}`);
  console.log(`  saved:  ${keyPath}`);
}
