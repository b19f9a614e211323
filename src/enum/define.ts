/**
 * @file Enum descriptor construction
 *
 * Each enum-like type registers its symbols once, here, as a static table.
 * The resulting descriptor is frozen; the symbol set never changes afterwards,
 * which is what lets consumers cache derived tables without invalidation.
 */
import { integerRange } from "./literal";
import { BIT_WIDTHS } from "./types";
import type {
  BitWidth,
  EnumKind,
  EnumSymbol,
  EnumType,
  EnumValue,
  IntegerEnumType,
  IntegerKind,
  StringEnumType,
  SymbolOrder,
  UintEnumType,
} from "./types";

export type IntegerEnumOptions = {
  kind: IntegerKind;
  bits?: BitWidth;
  order?: SymbolOrder;
};

export type StringEnumOptions = {
  kind: "string";
  order?: SymbolOrder;
};

export type FlagsOptions = {
  bits?: BitWidth;
  order?: SymbolOrder;
};

/** Descriptor plus a typed name -> value record for call sites. */
export type DefinedEnum<T extends EnumType, N extends string, V extends EnumValue> = T & {
  readonly values: { readonly [P in N]: V };
};

const DEFAULT_BITS: BitWidth = 32;

function toInteger(typeName: string, symbol: string, raw: number | bigint): bigint {
  if (typeof raw === "bigint") {
    return raw;
  }
  if (!Number.isSafeInteger(raw)) {
    throw new RangeError(`${typeName}.${symbol}: ${raw} is not a safe integer`);
  }
  return BigInt(raw);
}

/** Validate a bit width coming from user input. */
export function checkWidth(bits: unknown): BitWidth {
  const found = BIT_WIDTHS.find((w) => w === bits);
  if (found === undefined) {
    throw new RangeError(`unsupported bit width ${String(bits)}; expected one of ${BIT_WIDTHS.join(", ")}`);
  }
  return found;
}

function integerSymbols(
  typeName: string,
  kind: IntegerKind,
  bits: BitWidth,
  entries: ReadonlyArray<readonly [string, number | bigint]>,
): readonly EnumSymbol<bigint>[] {
  const { min, max } = integerRange({ signed: kind === "int", bits });
  const list = entries.map(([name, raw]) => {
    const value = toInteger(typeName, name, raw);
    if (value < min || value > max) {
      throw new RangeError(`${typeName}.${name}: ${value} does not fit ${kind}${bits}`);
    }
    return Object.freeze({ name, value });
  });
  return Object.freeze(list);
}

function integerEntries(typeName: string, symbols: Record<string, unknown>): Array<[string, number | bigint]> {
  return Object.entries(symbols).map(([name, raw]): [string, number | bigint] => {
    if (typeof raw !== "number" && typeof raw !== "bigint") {
      throw new TypeError(`${typeName}.${name}: integer enums take number or bigint values`);
    }
    return [name, raw];
  });
}

function valuesRecord<V extends EnumValue>(symbols: readonly EnumSymbol<V>[]): Readonly<Record<string, V>> {
  const out: Record<string, V> = {};
  for (const s of symbols) {
    Object.defineProperty(out, s.name, { value: s.value, enumerable: true });
  }
  return Object.freeze(out);
}

export type EnumDefinitionOptions = {
  kind: EnumKind;
  bits?: BitWidth;
  order?: SymbolOrder;
  flags?: boolean;
};

/**
 * Build a frozen descriptor from loosely typed input (config files, tooling).
 * The typed entry points below delegate here.
 */
export function buildEnum(
  name: string,
  options: EnumDefinitionOptions,
  symbols: Record<string, unknown>,
): EnumType & { readonly values: Readonly<Record<string, EnumValue>> } {
  const order = options.order ?? "name";
  if (order !== "name" && order !== "declaration") {
    throw new RangeError(`${name}: unknown symbol order ${String(order)}`);
  }
  const flags = options.flags ?? false;
  if (flags && options.kind !== "uint") {
    throw new TypeError(`${name}: flag enums must be unsigned, got ${options.kind}`);
  }
  if (options.kind === "string") {
    const list = Object.entries(symbols).map(([sym, raw]) => {
      if (typeof raw !== "string") {
        throw new TypeError(`${name}.${sym}: string enums take string values`);
      }
      return Object.freeze({ name: sym, value: raw });
    });
    const frozen = Object.freeze(list);
    return Object.freeze({
      name,
      kind: "string" as const,
      order,
      flags: false,
      symbols: frozen,
      values: valuesRecord(frozen),
    });
  }
  const bits = checkWidth(options.bits ?? DEFAULT_BITS);
  const frozen = integerSymbols(name, options.kind, bits, integerEntries(name, symbols));
  return Object.freeze({
    name,
    kind: options.kind,
    bits,
    order,
    flags,
    symbols: frozen,
    values: valuesRecord(frozen),
  });
}

/**
 * Define an integer enum.
 *
 * @example
 * const Color = defineEnum("Color", { kind: "int", bits: 16 }, { None: 0, Red: 1, Green: 2, Blue: 3 });
 * Color.values.Red; // 1n
 */
export function defineEnum<const S extends Record<string, number | bigint>>(
  name: string,
  options: IntegerEnumOptions,
  symbols: S,
): DefinedEnum<IntegerEnumType, Extract<keyof S, string>, bigint>;
/** Define a string enum. */
export function defineEnum<const S extends Record<string, string>>(
  name: string,
  options: StringEnumOptions,
  symbols: S,
): DefinedEnum<StringEnumType, Extract<keyof S, string>, string>;
export function defineEnum(
  name: string,
  options: IntegerEnumOptions | StringEnumOptions,
  symbols: Record<string, unknown>,
): EnumType & { readonly values: Readonly<Record<string, EnumValue>> } {
  return buildEnum(name, options, symbols);
}

/**
 * Define an unsigned bit-flag enum. Symbols are single bits or bit groups;
 * a zero-valued symbol acts as the "none" name.
 */
export function defineFlags<const S extends Record<string, number | bigint>>(
  name: string,
  options: FlagsOptions,
  symbols: S,
): DefinedEnum<UintEnumType, Extract<keyof S, string>, bigint>;
export function defineFlags(
  name: string,
  options: FlagsOptions,
  symbols: Record<string, number | bigint>,
): EnumType & { readonly values: Readonly<Record<string, EnumValue>> } {
  return buildEnum(name, { ...options, kind: "uint", flags: true }, symbols);
}

export type NativeEnumOptions = {
  kind?: IntegerKind;
  bits?: BitWidth;
  order?: SymbolOrder;
  flags?: boolean;
};

function isReverseMapping(native: Record<string, string | number>, key: string, value: string | number): boolean {
  if (typeof value !== "string") {
    return false;
  }
  const forward = native[value];
  return typeof forward === "number" && String(forward) === key;
}

/**
 * Adopt a TypeScript `enum` (or an object of the same shape).
 * Reverse-mapping entries of numeric enums are skipped. All-string members give
 * a string enum; otherwise every member must be a number. For unsigned kinds,
 * negative numbers (e.g. `1 << 31`) are taken modulo 2^bits.
 */
export function enumFromNative(
  name: string,
  native: Record<string, string | number>,
  options: NativeEnumOptions = {},
): EnumType {
  const members = Object.entries(native).filter(([key, value]) => !isReverseMapping(native, key, value));
  const order = options.order ?? "name";
  const strings = members.flatMap(([sym, v]) => (typeof v === "string" ? [Object.freeze({ name: sym, value: v })] : []));
  if (strings.length === members.length && !options.flags && options.kind === undefined) {
    return Object.freeze({ name, kind: "string" as const, order, flags: false, symbols: Object.freeze(strings) });
  }
  const kind = options.kind ?? (options.flags ? "uint" : "int");
  const bits = checkWidth(options.bits ?? DEFAULT_BITS);
  const ints = members.map(([sym, v]): [string, bigint] => {
    if (typeof v !== "number") {
      throw new TypeError(`${name}.${sym}: string member in an integer enum`);
    }
    const n = toInteger(name, sym, v);
    return [sym, kind === "uint" ? BigInt.asUintN(bits, n) : n];
  });
  return Object.freeze({
    name,
    kind,
    bits,
    order,
    flags: options.flags ?? false,
    symbols: integerSymbols(name, kind, bits, ints),
  });
}
