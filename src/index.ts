/**
 * @file Public entrypoint (single canonical import)
 * @remarks
 * Enum descriptors, the symbol enumerator, the formatter and the parser live
 * under src/enum/*; the config helpers under src/config/* are re-exported for
 * authoring `enumkit.config.*` files.
 */

/**
 * Definition helpers and descriptor types
 * - defineEnum / defineFlags: declare a type's symbols once as a static table
 * - enumFromNative: adopt an existing TypeScript `enum`
 * @public
 */
export { defineEnum, defineFlags, enumFromNative, isEnumType } from "./enum/index";
export type {
  BitWidth,
  DefinedEnum,
  EnumKind,
  EnumSymbol,
  EnumType,
  EnumValue,
  FlagBase,
  IntegerEnumType,
  StringEnumType,
  SymbolOrder,
  UintEnumType,
} from "./enum/index";

/**
 * Conversion engine
 * @public
 */
export {
  enumerateSymbols,
  symbolsOf,
  isSymbolValue,
  formatScalar,
  formatFlags,
  symbolName,
  findSymbol,
  parseScalar,
  parseFlags,
  tryParseScalar,
  tryParseFlags,
  parseIntegerLiteral,
} from "./enum/index";
export type { ParseResult, ParseScalarOptions, ParseFlagsOptions, SymbolVisitor } from "./enum/index";
export { EnumParseError, NoMatchingSymbolError, NumericFallbackError, FlagComponentError } from "./enum/index";

/**
 * Consumer-side lookup cache
 * @public
 */
export { createSymbolTable, symbolTableOf } from "./enum/index";
export type { SymbolTable } from "./enum/index";

// Config authoring
export { defineConfig } from "./config/index";
export type { AppConfig, RawAppConfig, RawEnumDefinition } from "./config/index";
