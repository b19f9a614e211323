/**
 * @file Config API surface for the CLI and config authors.
 */
import path from "node:path";
import { loadConfig } from "./loader";
import type { AppConfig } from "./types";

export { resolveConfigPath, configPatternsLabel, CONFIG_EXTS, DEFAULT_CONFIG_STEM } from "./resolve";
export { importConfigModule, loadConfig } from "./loader";
export type { LoadedConfig } from "./loader";
export { normalizeConfig, defineConfig } from "./normalize";
export type { AppConfig, RawAppConfig, RawEnumDefinition, RawEnumEntry, FormatConfig, ParseConfig } from "./types";

/** Load + normalize a config from a path (file, stem or directory). */
export async function openConfig(pathToConfig?: string): Promise<AppConfig> {
  const { config } = await loadConfig(pathToConfig ? path.resolve(pathToConfig) : undefined);
  return config;
}
