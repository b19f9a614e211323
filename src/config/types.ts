/**
 * @file Config types: raw authoring shape and normalized AppConfig
 */
import type { BitWidth, EnumKind, EnumType, FlagBase, SymbolOrder } from "../enum/types";

/** An enum written inline in a config module instead of via defineEnum/defineFlags. */
export type RawEnumDefinition = {
  /** Optional when the definition is keyed by name in a record. */
  name?: string;
  kind: EnumKind;
  bits?: BitWidth;
  order?: SymbolOrder;
  flags?: boolean;
  symbols: Record<string, number | bigint | string>;
};

export type RawEnumEntry = EnumType | RawEnumDefinition;

export type FormatConfig = {
  /** Base of the trailing literal for unmatched flag bits. */
  base?: FlagBase;
};

export type ParseConfig = {
  caseInsensitive?: boolean;
  strict?: boolean;
};

export type RawAppConfig = {
  enums: RawEnumEntry[] | Record<string, RawEnumEntry>;
  format?: FormatConfig;
  parse?: ParseConfig;
};

export type AppConfig = {
  /** Descriptors keyed by enum name, in config order. */
  enums: ReadonlyMap<string, EnumType>;
  format: Required<FormatConfig>;
  parse: Required<ParseConfig>;
};
