/**
 * @file Text -> value parsing
 *
 * Resolution is two-tier: a symbol name first, then (unless strict) an integer
 * literal of the type's width and signedness. Flag sets OR together every
 * comma-separated piece and fail as a whole if any piece is unresolvable.
 */
import { enumerateSymbols } from "./symbols";
import { parseIntegerLiteral } from "./literal";
import { EnumParseError, FlagComponentError, NoMatchingSymbolError, NumericFallbackError } from "./errors";
import { reprLabel } from "./types";
import type {
  EnumSymbol,
  EnumType,
  EnumValue,
  IntegerEnumType,
  ParseFlagsOptions,
  ParseScalarOptions,
  StringEnumType,
  UintEnumType,
} from "./types";

export type ParseResult<V> = { ok: true; value: V } | { ok: false; error: EnumParseError };

function matchName<V extends EnumValue>(
  symbols: (visit: (name: string, value: V) => boolean) => void,
  text: string,
  caseInsensitive: boolean,
): EnumSymbol<V> | undefined {
  const wanted = caseInsensitive ? text.toLowerCase() : text;
  let hit: EnumSymbol<V> | undefined;
  symbols((name, value) => {
    const candidate = caseInsensitive ? name.toLowerCase() : name;
    if (candidate !== wanted) {
      return false;
    }
    hit = { name, value };
    return true;
  });
  return hit;
}

/**
 * Find the symbol named `text`. With `caseInsensitive`, names are compared
 * lower-cased and the first match in enumeration order wins.
 */
export function findSymbol(type: IntegerEnumType, text: string, caseInsensitive?: boolean): EnumSymbol<bigint> | undefined;
export function findSymbol(type: StringEnumType, text: string, caseInsensitive?: boolean): EnumSymbol<string> | undefined;
export function findSymbol(type: EnumType, text: string, caseInsensitive = false): EnumSymbol | undefined {
  if (type.kind === "string") {
    const strings: StringEnumType = type;
    return matchName<string>((visit) => enumerateSymbols(strings, visit), text, caseInsensitive);
  }
  const ints: IntegerEnumType = type;
  return matchName<bigint>((visit) => enumerateSymbols(ints, visit), text, caseInsensitive);
}

function parseIntegerScalar(type: IntegerEnumType, text: string, options: ParseScalarOptions): bigint {
  const sym = findSymbol(type, text, options.caseInsensitive);
  if (sym) {
    return sym.value;
  }
  if (options.strict) {
    throw new NoMatchingSymbolError(text, type.name);
  }
  const lit = parseIntegerLiteral(text, { signed: type.kind === "int", bits: type.bits });
  if (!lit.ok) {
    throw new NumericFallbackError(text, type.name, reprLabel(type), lit.reason);
  }
  return lit.value;
}

function parseStringScalar(type: StringEnumType, text: string, options: ParseScalarOptions): string {
  const sym = findSymbol(type, text, options.caseInsensitive);
  if (!sym) {
    throw new NoMatchingSymbolError(text, type.name);
  }
  return sym.value;
}

/**
 * Convert `text` to a value of `type`.
 *
 * Lenient integer parsing (the default) accepts any literal that fits the
 * representation, with or without a symbol, so formatted values round-trip.
 * String enums have no literal fallback.
 *
 * @throws NoMatchingSymbolError when no symbol matches and no fallback applies
 * @throws NumericFallbackError when the literal fallback fails
 */
export function parseScalar(type: IntegerEnumType, text: string, options?: ParseScalarOptions): bigint;
export function parseScalar(type: StringEnumType, text: string, options?: ParseScalarOptions): string;
export function parseScalar(type: EnumType, text: string, options: ParseScalarOptions = {}): EnumValue {
  if (type.kind === "string") {
    return parseStringScalar(type, text, options);
  }
  return parseIntegerScalar(type, text, options);
}

/**
 * Convert a comma-separated flag list to its OR-ed value. Each piece is a
 * symbol name or an unsigned literal (decimal, 0x, 0o, 0b).
 *
 * @throws FlagComponentError naming the first unresolvable piece
 */
export function parseFlags(type: UintEnumType, text: string, options: ParseFlagsOptions = {}): bigint {
  let acc = 0n;
  for (const raw of text.split(",")) {
    const piece = raw.trim();
    const sym = findSymbol(type, piece, options.caseInsensitive);
    if (sym) {
      acc |= sym.value;
      continue;
    }
    const lit = parseIntegerLiteral(piece, { signed: false, bits: type.bits });
    if (!lit.ok) {
      throw new FlagComponentError(piece, text, type.name);
    }
    acc |= lit.value;
  }
  return acc;
}

function attempt<V>(fn: () => V): ParseResult<V> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof EnumParseError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/** `parseScalar` returning the failure as a value instead of throwing. */
export function tryParseScalar(type: IntegerEnumType, text: string, options?: ParseScalarOptions): ParseResult<bigint>;
export function tryParseScalar(type: StringEnumType, text: string, options?: ParseScalarOptions): ParseResult<string>;
export function tryParseScalar(type: EnumType, text: string, options: ParseScalarOptions = {}): ParseResult<EnumValue> {
  if (type.kind === "string") {
    const strings: StringEnumType = type;
    return attempt(() => parseStringScalar(strings, text, options));
  }
  const ints: IntegerEnumType = type;
  return attempt(() => parseIntegerScalar(ints, text, options));
}

/** `parseFlags` returning the failure as a value instead of throwing. */
export function tryParseFlags(type: UintEnumType, text: string, options: ParseFlagsOptions = {}): ParseResult<bigint> {
  return attempt(() => parseFlags(type, text, options));
}
