/**
 * @file CLI command execution against a normalized config
 */
import type { AppConfig } from "../config/types";
import type { EnumType, EnumValue, FlagBase, IntegerEnumType, UintEnumType } from "../enum/types";
import { reprLabel } from "../enum/types";
import { symbolsOf } from "../enum/symbols";
import { formatFlags, formatScalar } from "../enum/format";
import { parseFlags, parseScalar } from "../enum/parse";
import { parseIntegerLiteral } from "../enum/literal";
import type { CliArgs } from "./args";

export type SymbolRow = { name: string; value: string };

export type CommandOutput =
  | { kind: "help" }
  | { kind: "enums"; rows: Array<{ name: string; repr: string; flags: boolean; count: number }> }
  | { kind: "list"; enumName: string; repr: string; flags: boolean; rows: SymbolRow[] }
  | { kind: "text"; text: string };

function isFlagType(type: EnumType): type is UintEnumType {
  return type.kind === "uint" && type.flags;
}

function lookupEnum(config: AppConfig, name: string): EnumType {
  const type = config.enums.get(name);
  if (!type) {
    const known = [...config.enums.keys()].join(", ") || "(none)";
    throw new Error(`Unknown enum ${JSON.stringify(name)}. Configured: ${known}`);
  }
  return type;
}

/** Render a symbol value for display: decimal for integers, quoted for strings. */
export function displayValue(value: EnumValue, type: EnumType): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (isFlagType(type)) {
    return `${value} (0x${value.toString(16)})`;
  }
  return value.toString();
}

function integerInput(type: IntegerEnumType, raw: string): bigint {
  const lit = parseIntegerLiteral(raw, { signed: type.kind === "int", bits: type.bits });
  if (!lit.ok) {
    throw new Error(`${JSON.stringify(raw)} is not a valid ${reprLabel(type)} literal (${lit.reason})`);
  }
  return lit.value;
}

function runFormat(type: EnumType, raw: string, base: FlagBase): string {
  if (type.kind === "string") {
    return formatScalar(raw, type);
  }
  const value = integerInput(type, raw);
  return isFlagType(type) ? formatFlags(value, type, base) : formatScalar(value, type);
}

function runParse(type: EnumType, text: string, caseInsensitive: boolean, strict: boolean): string {
  if (type.kind === "string") {
    return displayValue(parseScalar(type, text, { caseInsensitive, strict }), type);
  }
  if (isFlagType(type)) {
    return displayValue(parseFlags(type, text, { caseInsensitive }), type);
  }
  return displayValue(parseScalar(type, text, { caseInsensitive, strict }), type);
}

/**
 * Execute a parsed command. CLI flags win over config defaults.
 * Parse failures propagate as the engine's EnumParseError subclasses.
 */
export function runCommand(config: AppConfig, args: CliArgs): CommandOutput {
  const { command } = args;
  switch (command.name) {
    case "help":
      return { kind: "help" };
    case "enums":
      return {
        kind: "enums",
        rows: [...config.enums.values()].map((t) => ({
          name: t.name,
          repr: reprLabel(t),
          flags: t.flags,
          count: t.symbols.length,
        })),
      };
    case "list": {
      const type = lookupEnum(config, command.enumName);
      const rows = symbolsOf<EnumValue>(type).map((s) => ({ name: s.name, value: displayValue(s.value, type) }));
      return { kind: "list", enumName: type.name, repr: reprLabel(type), flags: type.flags, rows };
    }
    case "format": {
      const type = lookupEnum(config, command.enumName);
      return { kind: "text", text: runFormat(type, command.value, args.base ?? config.format.base) };
    }
    case "parse": {
      const type = lookupEnum(config, command.enumName);
      const caseInsensitive = args.ignoreCase || config.parse.caseInsensitive;
      const strict = args.strict || config.parse.strict;
      return { kind: "text", text: runParse(type, command.text, caseInsensitive, strict) };
    }
  }
}
