/**
 * nostrmart config [--relay url] [--key-path path]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath } from "../lib/config.js";

interface ConfigOptions {
  relay?: string;
  keyPath?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  const config = await loadConfig();
  let changed = false;

  if (opts.relay) {
    config.relay = opts.relay.replace(/\/+$/, "");
    changed = true;
  }
  if (opts.keyPath) {
    config.keyPath = opts.keyPath;
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  relay:    ${config.relay}`);
  console.log(`  keyPath:  ${config.keyPath}`);
}
