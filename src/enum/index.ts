/**
 * @file Enum engine surface: definition, enumeration, formatting, parsing
 */
export type {
  BitWidth,
  EnumKind,
  EnumSymbol,
  EnumType,
  EnumTypeBase,
  EnumValue,
  FlagBase,
  IntegerEnumType,
  IntegerKind,
  ParseFlagsOptions,
  ParseScalarOptions,
  StringEnumType,
  SymbolOrder,
  SymbolVisitor,
  UintEnumType,
} from "./types";
export { BIT_WIDTHS, reprLabel } from "./types";
export { defineEnum, defineFlags, enumFromNative, checkWidth } from "./define";
export type { DefinedEnum, FlagsOptions, IntegerEnumOptions, NativeEnumOptions, StringEnumOptions } from "./define";
export { isEnumType, isObject } from "./guards";
export { enumerateSymbols, symbolsOf, isSymbolValue } from "./symbols";
export { formatScalar, formatFlags, symbolName } from "./format";
export { findSymbol, parseScalar, parseFlags, tryParseScalar, tryParseFlags } from "./parse";
export type { ParseResult } from "./parse";
export { parseIntegerLiteral, formatIntegerLiteral, integerRange } from "./literal";
export type { LiteralResult, LiteralTarget } from "./literal";
export { EnumParseError, NoMatchingSymbolError, NumericFallbackError, FlagComponentError } from "./errors";
export type { LiteralFailure } from "./errors";
export { createSymbolTable, symbolTableOf } from "./table";
export type { SymbolTable } from "./table";
