/**
 * @file Precomputed symbol tables
 *
 * An optional lookup layer built on `enumerateSymbols`. Tables are computed
 * once per descriptor and memoized in a WeakMap; descriptors are immutable so
 * nothing is ever invalidated. Lookups agree with the uncached formatter and
 * parser: the first symbol in enumeration order wins every tie.
 */
import { enumerateSymbols } from "./symbols";
import type { EnumSymbol, EnumType, EnumTypeBase, EnumValue, IntegerEnumType, StringEnumType } from "./types";

export type SymbolTable<V extends EnumValue> = {
  entries: readonly EnumSymbol<V>[];
  names: readonly string[];
  lookupName: (value: V) => string | undefined;
  lookupValue: (name: string, caseInsensitive?: boolean) => V | undefined;
  encode: (name: string) => V;
  decode: (value: V) => string;
};

/**
 * Build a table for `type`.
 */
export function createSymbolTable<V extends EnumValue>(type: EnumTypeBase<V>): SymbolTable<V> {
  const entries: EnumSymbol<V>[] = [];
  const byName = new Map<string, V>();
  const byLower = new Map<string, V>();
  const byValue = new Map<V, string>();
  enumerateSymbols(type, (name, value) => {
    entries.push(Object.freeze({ name, value }));
    byName.set(name, value);
    const lower = name.toLowerCase();
    if (!byLower.has(lower)) {
      byLower.set(lower, value);
    }
    if (!byValue.has(value)) {
      byValue.set(value, name);
    }
    return false;
  });
  const lookupValue = (name: string, caseInsensitive = false): V | undefined =>
    caseInsensitive ? byLower.get(name.toLowerCase()) : byName.get(name);
  return {
    entries: Object.freeze(entries),
    names: Object.freeze(entries.map((e) => e.name)),
    lookupName: (value) => byValue.get(value),
    lookupValue,
    encode: (name) => {
      const v = byName.get(name);
      if (v === undefined) {
        throw new Error(`unknown symbol ${name} for ${type.name}`);
      }
      return v;
    },
    decode: (value) => {
      const name = byValue.get(value);
      if (name === undefined) {
        throw new Error(`unsupported value ${String(value)} for ${type.name}`);
      }
      return name;
    },
  };
}

const integerTables = new WeakMap<IntegerEnumType, SymbolTable<bigint>>();
const stringTables = new WeakMap<StringEnumType, SymbolTable<string>>();

function memo<T extends EnumTypeBase<V>, V extends EnumValue>(cache: WeakMap<T, SymbolTable<V>>, type: T): SymbolTable<V> {
  const hit = cache.get(type);
  if (hit) {
    return hit;
  }
  const table = createSymbolTable(type);
  cache.set(type, table);
  return table;
}

/** Memoized `createSymbolTable`, keyed by descriptor identity. */
export function symbolTableOf(type: IntegerEnumType): SymbolTable<bigint>;
export function symbolTableOf(type: StringEnumType): SymbolTable<string>;
export function symbolTableOf(type: EnumType): SymbolTable<bigint> | SymbolTable<string> {
  if (type.kind === "string") {
    return memo(stringTables, type);
  }
  return memo(integerTables, type);
}
