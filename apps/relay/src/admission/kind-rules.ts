/**
 * Per-kind content rules.
 *
 * Declarative rules come from a JSON file keyed by kind number
 * (config/kind-rules.json by default). Code may add further rules with
 * register(). Kinds without rules pass.
 */

import { readFile } from "node:fs/promises";
import { Type, type Static } from "@sinclair/typebox";
import { TypeCompiler } from "@sinclair/typebox/compiler";
import { KIND_MAX, KindValidationError, type NostrEvent } from "@nostrmart/protocol";

// ── Rule file schema ───────────────────────────────────────────────

export const IntegerBounds = Type.Object(
  {
    min: Type.Optional(Type.Integer()),
    max: Type.Optional(Type.Integer()),
  },
  { additionalProperties: false },
);

export const KindRuleSpec = Type.Object(
  {
    name: Type.String({ minLength: 1 }),
    requiredTags: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    integerTags: Type.Optional(Type.Record(Type.String(), IntegerBounds)),
    hexTags: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    contentJson: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);
export type KindRuleSpec = Static<typeof KindRuleSpec>;

export const KindRulesFile = Type.Record(Type.String(), KindRuleSpec);
export type KindRulesFile = Static<typeof KindRulesFile>;

const KindRulesFileCheck = TypeCompiler.Compile(KindRulesFile);

/** A rule returns null when the event passes. */
export type KindRule = (event: NostrEvent) => KindValidationError | null;

const INTEGER_RE = /^-?(0|[1-9][0-9]*)$/;
const HEX32_RE = /^[0-9a-f]{64}$/;

/** Value of the first tag named `name`, if any. */
export function tagValue(event: NostrEvent, name: string): string | undefined {
  return event.tags.find((t) => t[0] === name)?.[1];
}

/** Expand one declarative entry into ordered rule functions. */
export function compileRuleSpec(kind: number, entry: KindRuleSpec): KindRule[] {
  const label = `${entry.name} (kind ${kind})`;
  const rules: KindRule[] = [];

  for (const name of entry.requiredTags ?? []) {
    rules.push((event) => {
      const value = tagValue(event, name);
      if (value === undefined || value === "") {
        return new KindValidationError(kind, "required_tag", `${label} requires a "${name}" tag`, name);
      }
      return null;
    });
  }

  for (const [name, bounds] of Object.entries(entry.integerTags ?? {})) {
    rules.push((event) => {
      const value = tagValue(event, name);
      if (value === undefined) return null;
      const n = Number(value);
      if (!INTEGER_RE.test(value) || !Number.isSafeInteger(n)) {
        return new KindValidationError(
          kind,
          "integer_tag",
          `${label}: "${name}" must be an integer, got "${value}"`,
          name,
        );
      }
      if (bounds.min !== undefined && n < bounds.min) {
        return new KindValidationError(kind, "integer_tag", `${label}: "${name}" must be >= ${bounds.min}`, name);
      }
      if (bounds.max !== undefined && n > bounds.max) {
        return new KindValidationError(kind, "integer_tag", `${label}: "${name}" must be <= ${bounds.max}`, name);
      }
      return null;
    });
  }

  for (const name of entry.hexTags ?? []) {
    rules.push((event) => {
      for (const tag of event.tags) {
        if (tag[0] !== name) continue;
        const value = tag[1];
        if (value === undefined || !HEX32_RE.test(value)) {
          return new KindValidationError(
            kind,
            "hex_tag",
            `${label}: "${name}" must reference a 64-char lowercase hex id`,
            name,
          );
        }
      }
      return null;
    });
  }

  if (entry.contentJson) {
    rules.push((event) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(event.content);
      } catch {
        parsed = undefined;
      }
      if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
        return new KindValidationError(kind, "content_json", `${label}: content must be a JSON object`);
      }
      return null;
    });
  }

  return rules;
}

function parseKindKey(key: string): number {
  const kind = Number(key);
  if (!/^(0|[1-9][0-9]*)$/.test(key) || kind > KIND_MAX) {
    throw new Error(`Invalid kind in rule file: "${key}"`);
  }
  return kind;
}

export class KindRuleRegistry {
  private readonly rules = new Map<number, KindRule[]>();

  /** Build from an already-validated rule file. */
  static fromSpec(file: KindRulesFile): KindRuleRegistry {
    const registry = new KindRuleRegistry();
    for (const [key, entry] of Object.entries(file)) {
      const kind = parseKindKey(key);
      for (const rule of compileRuleSpec(kind, entry)) registry.register(kind, rule);
    }
    return registry;
  }

  /** Append a rule; rules for a kind run in registration order. */
  register(kind: number, rule: KindRule): this {
    const list = this.rules.get(kind);
    if (list) list.push(rule);
    else this.rules.set(kind, [rule]);
    return this;
  }

  has(kind: number): boolean {
    return this.rules.has(kind);
  }

  kinds(): number[] {
    return [...this.rules.keys()].sort((a, b) => a - b);
  }

  /** First failing rule's error, or null. */
  validate(event: NostrEvent): KindValidationError | null {
    for (const rule of this.rules.get(event.kind) ?? []) {
      const err = rule(event);
      if (err) return err;
    }
    return null;
  }
}

/** Parse and validate a rule file's JSON text. */
export function parseKindRules(text: string, source = "kind rules"): KindRuleRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`${source}: invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }
  if (!KindRulesFileCheck.Check(raw)) {
    const first = KindRulesFileCheck.Errors(raw).First();
    throw new Error(`${source}: ${first?.path ?? "(root)"} ${first?.message ?? "is invalid"}`);
  }
  return KindRuleRegistry.fromSpec(raw);
}

export async function loadKindRules(path: string): Promise<KindRuleRegistry> {
  return parseKindRules(await readFile(path, "utf8"), path);
}
