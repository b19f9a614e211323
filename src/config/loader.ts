/**
 * @file Config loading: resolve, import (CJS/ESM/TS) and normalize an enumkit config
 */
import path from "node:path";
import { pathToFileURL } from "node:url";
import { createRequire } from "node:module";
import { resolveConfigPath, configPatternsLabel } from "./resolve";
import { normalizeConfig } from "./normalize";
import type { AppConfig } from "./types";
import { isObject } from "../enum/guards";

export type LoadedConfig = {
  /** Absolute path of the module the config came from. */
  path: string;
  config: AppConfig;
};

function defaultExport(mod: unknown): unknown {
  return isObject(mod) && "default" in mod ? mod.default : mod;
}

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Import a resolved config file and return its default export (or the module itself). */
export async function importConfigModule(file: string): Promise<unknown> {
  const ext = path.extname(file).toLowerCase();
  if (ext === ".cjs") {
    return defaultExport(createRequire(import.meta.url)(file));
  }
  try {
    // eslint-disable-next-line no-restricted-syntax -- dynamic import is required to load user config modules
    const mod: unknown = await import(pathToFileURL(file).href);
    return defaultExport(mod);
  } catch (e) {
    if (ext === ".ts" || ext === ".mts") {
      throw new Error(`${path.basename(file)}: TypeScript configs need a TS loader such as tsx (${messageOf(e)})`);
    }
    throw e;
  }
}

/**
 * Find, import and validate a config. Validation errors are prefixed with the
 * config's file name so the offending module is obvious from the CLI.
 */
export async function loadConfig(configPath?: string): Promise<LoadedConfig> {
  const resolved = await resolveConfigPath(configPath);
  if (!resolved) {
    throw new Error(`Config not found. Looked for ${configPath ?? configPatternsLabel()}`);
  }
  const raw = await importConfigModule(resolved);
  try {
    return { path: resolved, config: normalizeConfig(raw) };
  } catch (e) {
    throw new Error(`${path.basename(resolved)}: ${messageOf(e)}`);
  }
}
