/**
 * CLI configuration: loads from ~/.nostrmart/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";

export interface CliConfig {
  /** Relay base URL. */
  relay: string;
  keyPath: string;
}

const ConfigFile = Type.Partial(
  Type.Object({
    relay: Type.String({ minLength: 1 }),
    keyPath: Type.String({ minLength: 1 }),
  }),
);
type ConfigFile = Static<typeof ConfigFile>;

const ConfigFileCheck = TypeCompiler.Compile(ConfigFile);

const CONFIG_DIR = join(homedir(), ".nostrmart");
const CONFIG_FILE = join(CONFIG_DIR, "config.json");
const DEFAULT_KEY_PATH = join(CONFIG_DIR, "key.json");
const DEFAULT_RELAY = "http://localhost:3200";

export function getConfigPath(): string {
  return process.env["NOSTRMART_CONFIG"] ?? CONFIG_FILE;
}

async function readConfigFile(path: string): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!ConfigFileCheck.Check(parsed)) {
    const first = ConfigFileCheck.Errors(parsed).First();
    throw new Error(`Invalid config at ${path}: ${first?.path ?? ""} ${first?.message ?? ""}`.trim());
  }
  return parsed;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(path: string = getConfigPath()): Promise<CliConfig> {
  const fileConfig = await readConfigFile(path);
  return {
    relay: (process.env["NOSTRMART_RELAY"] ?? fileConfig.relay ?? DEFAULT_RELAY).replace(/\/+$/, ""),
    keyPath: process.env["NOSTRMART_KEY_PATH"] ?? fileConfig.keyPath ?? DEFAULT_KEY_PATH,
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig, path: string = getConfigPath()): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const toSave: ConfigFile = { relay: config.relay, keyPath: config.keyPath };
  await writeFile(path, JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}
