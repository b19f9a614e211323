/**
 * @file Symbol enumeration
 *
 * The single point where the formatter and parser read a type's symbols.
 * Nothing is cached: every call walks the descriptor's static table.
 */
import type { EnumSymbol, EnumTypeBase, EnumValue, SymbolVisitor } from "./types";

function byName<V extends EnumValue>(a: EnumSymbol<V>, b: EnumSymbol<V>): number {
  if (a.name < b.name) {
    return -1;
  }
  return a.name > b.name ? 1 : 0;
}

function ordered<V extends EnumValue>(type: EnumTypeBase<V>): readonly EnumSymbol<V>[] {
  if (type.order === "declaration") {
    return type.symbols;
  }
  return [...type.symbols].sort(byName);
}

/**
 * Invoke `visit(name, value)` once per symbol of `type`, in enumeration order.
 * Enumeration halts as soon as `visit` returns true. A type without symbols
 * never invokes `visit`.
 */
export function enumerateSymbols<V extends EnumValue>(type: EnumTypeBase<V>, visit: SymbolVisitor<V>): void {
  for (const s of ordered(type)) {
    if (visit(s.name, s.value)) {
      return;
    }
  }
}

/** All symbols of `type` in enumeration order. */
export function symbolsOf<V extends EnumValue>(type: EnumTypeBase<V>): EnumSymbol<V>[] {
  const out: EnumSymbol<V>[] = [];
  enumerateSymbols(type, (name, value) => {
    out.push({ name, value });
    return false;
  });
  return out;
}

/** True when some symbol of `type` has exactly `value`. */
export function isSymbolValue<V extends EnumValue>(type: EnumTypeBase<V>, value: V): boolean {
  let found = false;
  enumerateSymbols(type, (_, v) => {
    found = v === value;
    return found;
  });
  return found;
}
