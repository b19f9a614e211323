/**
 * @file Config path resolution
 */
import path from "node:path";
import { access } from "node:fs/promises";
import { constants as fsConstants } from "node:fs";

/** Supported executable config extensions (resolution order). */
export const CONFIG_EXTS = [".mjs", ".mts", ".ts", ".cjs", ".js"] as const;
/** Default, extensionless config file stem. */
export const DEFAULT_CONFIG_STEM = "enumkit.config" as const;

async function exists(p: string): Promise<boolean> {
  try {
    await access(p, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function firstExisting(candidates: readonly string[]): Promise<string | null> {
  for (const cand of candidates) {
    if (await exists(cand)) {
      return cand;
    }
  }
  return null;
}

/**
 * Resolve a config path: an explicit file, a stem (extensions tried in
 * CONFIG_EXTS order), or a directory holding `enumkit.config.*`.
 */
export async function resolveConfigPath(input?: string): Promise<string | null> {
  const base = input ? path.resolve(input) : path.resolve(DEFAULT_CONFIG_STEM);
  if (path.extname(base) && CONFIG_EXTS.some((e) => base.endsWith(e))) {
    return (await exists(base)) ? base : null;
  }
  const asStem = await firstExisting(CONFIG_EXTS.map((e) => `${base}${e}`));
  if (asStem) {
    return asStem;
  }
  return firstExisting(CONFIG_EXTS.map((e) => path.join(base, `${DEFAULT_CONFIG_STEM}${e}`)));
}

/** A short label like `enumkit.config.[mjs/mts/ts/cjs/js]` for messages. */
export function configPatternsLabel(): string {
  return `${DEFAULT_CONFIG_STEM}.[${CONFIG_EXTS.map((e) => e.slice(1)).join("/")}]`;
}
