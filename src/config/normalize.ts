/**
 * @file Config normalization + validation (raw -> AppConfig)
 */
import type { AppConfig, FormatConfig, ParseConfig, RawAppConfig, RawEnumDefinition } from "./types";
import type { EnumType, FlagBase } from "../enum/types";
import { buildEnum } from "../enum/define";
import { isEnumType, isObject } from "../enum/guards";

const FLAG_BASES: readonly FlagBase[] = [2, 8, 10, 16];
const KINDS = ["int", "uint", "string"] as const;

/** Authoring helper to get type inference in user configs. */
export function defineConfig(x: RawAppConfig): RawAppConfig {
  return x;
}

function optionalOfType(x: unknown, type: "string" | "boolean"): boolean {
  return x === undefined || typeof x === type;
}

function isRawEnumDefinition(x: unknown): x is RawEnumDefinition {
  if (!isObject(x)) {
    return false;
  }
  return (
    KINDS.some((k) => k === x.kind) &&
    isObject(x.symbols) &&
    optionalOfType(x.name, "string") &&
    optionalOfType(x.flags, "boolean")
  );
}

function checkDefinitionFields(entry: Record<string, unknown>, at: string): void {
  if (!optionalOfType(entry.name, "string")) {
    throw new Error(`${at}.name must be a string`);
  }
  if (!optionalOfType(entry.flags, "boolean")) {
    throw new Error(`${at}.flags must be a boolean`);
  }
}

function toDescriptor(entry: unknown, key: string | undefined, at: string): EnumType {
  if (isEnumType(entry)) {
    return entry;
  }
  if (isObject(entry)) {
    checkDefinitionFields(entry, at);
  }
  if (!isRawEnumDefinition(entry)) {
    throw new Error(`${at} must be an enum descriptor or { kind, symbols } definition`);
  }
  const name = entry.name ?? key;
  if (!name) {
    throw new Error(`${at}.name is required`);
  }
  try {
    return buildEnum(name, entry, entry.symbols);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`${at}: ${msg}`);
  }
}

function collectEnums(raw: unknown): Map<string, EnumType> {
  const list: Array<{ entry: unknown; key?: string; at: string }> = [];
  if (Array.isArray(raw)) {
    raw.forEach((entry: unknown, i) => list.push({ entry, at: `enums[${i}]` }));
  } else if (isObject(raw)) {
    for (const [key, entry] of Object.entries(raw)) {
      list.push({ entry, key, at: `enums.${key}` });
    }
  } else {
    throw new Error("config.enums is required (array or record of enums)");
  }
  const out = new Map<string, EnumType>();
  for (const { entry, key, at } of list) {
    const type = toDescriptor(entry, key, at);
    if (out.has(type.name)) {
      throw new Error(`duplicate enum name ${type.name} at ${at}`);
    }
    out.set(type.name, type);
  }
  return out;
}

function normalizeFormat(raw: unknown): Required<FormatConfig> {
  if (raw === undefined) {
    return { base: 16 };
  }
  if (!isObject(raw)) {
    throw new Error("config.format must be an object");
  }
  if (raw.base === undefined) {
    return { base: 16 };
  }
  const base = FLAG_BASES.find((b) => b === raw.base);
  if (base === undefined) {
    throw new Error(`config.format.base must be one of ${FLAG_BASES.join(", ")}`);
  }
  return { base };
}

function flag(raw: Record<string, unknown>, key: keyof ParseConfig): boolean {
  const v = raw[key];
  if (v === undefined) {
    return false;
  }
  if (typeof v !== "boolean") {
    throw new Error(`config.parse.${key} must be a boolean`);
  }
  return v;
}

function normalizeParse(raw: unknown): Required<ParseConfig> {
  if (raw === undefined) {
    return { caseInsensitive: false, strict: false };
  }
  if (!isObject(raw)) {
    throw new Error("config.parse must be an object");
  }
  return { caseInsensitive: flag(raw, "caseInsensitive"), strict: flag(raw, "strict") };
}

/** Validate a raw config and turn it into runtime AppConfig. Throws with a descriptive message on invalid. */
export function normalizeConfig(raw: unknown): AppConfig {
  if (!isObject(raw)) {
    throw new Error("config must be an object (JS/TS module export)");
  }
  return {
    enums: collectEnums(raw.enums),
    format: normalizeFormat(raw.format),
    parse: normalizeParse(raw.parse),
  } satisfies AppConfig;
}
