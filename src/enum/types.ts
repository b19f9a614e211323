/**
 * @file Enum descriptor types
 *
 * An enum-like type is described by a frozen descriptor holding its ordered
 * (name, value) symbol table. Descriptors are built once by the helpers in
 * `define.ts` and are the only thing the enumerator, formatter and parser read.
 */

export type IntegerKind = "int" | "uint";
export type EnumKind = IntegerKind | "string";
export type BitWidth = 8 | 16 | 32 | 64;
export const BIT_WIDTHS: readonly BitWidth[] = [8, 16, 32, 64];

/** Underlying representation of a symbol's value. */
export type EnumValue = bigint | string;

/**
 * Enumeration order.
 * - "name": code-unit order of symbol names (what runtime method discovery yields)
 * - "declaration": the order the symbols were declared in
 */
export type SymbolOrder = "name" | "declaration";

export type EnumSymbol<V extends EnumValue = EnumValue> = {
  readonly name: string;
  readonly value: V;
};

export type EnumTypeBase<V extends EnumValue> = {
  readonly name: string;
  readonly order: SymbolOrder;
  /** True for bit-flag types; informs callers that dispatch on the descriptor. */
  readonly flags: boolean;
  /** Symbols in declaration order. */
  readonly symbols: readonly EnumSymbol<V>[];
};

export type IntegerEnumType = EnumTypeBase<bigint> & {
  readonly kind: IntegerKind;
  readonly bits: BitWidth;
};

/** Unsigned integer enum; bit-flag operations require this representation. */
export type UintEnumType = IntegerEnumType & { readonly kind: "uint" };

export type StringEnumType = EnumTypeBase<string> & {
  readonly kind: "string";
};

export type EnumType = IntegerEnumType | StringEnumType;

/** Callback invoked once per symbol; return true to stop the enumeration. */
export type SymbolVisitor<V extends EnumValue = EnumValue> = (name: string, value: V) => boolean;

/** Base used for the trailing literal of unmatched flag bits. */
export type FlagBase = 2 | 8 | 10 | 16;

export type ParseScalarOptions = {
  /** Match symbol names ignoring case (first match in enumeration order wins). */
  caseInsensitive?: boolean;
  /** Reject text that is not a symbol name instead of trying a numeric literal. */
  strict?: boolean;
};

export type ParseFlagsOptions = {
  caseInsensitive?: boolean;
};

/** Label of the underlying representation, e.g. "uint8" or "string". */
export function reprLabel(type: EnumType): string {
  if (type.kind === "string") {
    return "string";
  }
  return `${type.kind}${type.bits}`;
}
