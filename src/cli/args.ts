/**
 * @file CLI argument parsing (pure; no process access)
 */
import type { FlagBase } from "../enum/types";

export type CliCommand =
  | { name: "help" }
  | { name: "enums" }
  | { name: "list"; enumName: string }
  | { name: "format"; enumName: string; value: string }
  | { name: "parse"; enumName: string; text: string };

export type CliArgs = {
  command: CliCommand;
  configPath?: string;
  ignoreCase: boolean;
  strict: boolean;
  base?: FlagBase;
};

const BASES: readonly FlagBase[] = [2, 8, 10, 16];

const VALUE_OPTIONS = new Set(["--config", "-c", "--base", "-b"]);

function usageError(message: string): Error {
  return new Error(`${message}\nRun with --help for usage.`);
}

function parseBase(raw: string): FlagBase {
  const n = Number(raw);
  const base = BASES.find((b) => b === n);
  if (base === undefined) {
    throw usageError(`Invalid --base ${JSON.stringify(raw)}; expected one of ${BASES.join(", ")}`);
  }
  return base;
}

function requirePositional(positionals: string[], index: number, label: string, command: string): string {
  const v = positionals[index];
  if (v === undefined) {
    throw usageError(`Missing ${label} for ${command}`);
  }
  return v;
}

function toCommand(positionals: string[]): CliCommand {
  const [head] = positionals;
  switch (head) {
    case undefined:
    case "help":
      return { name: "help" };
    case "enums":
      return { name: "enums" };
    case "list":
      return { name: "list", enumName: requirePositional(positionals, 1, "<enum>", head) };
    case "format":
      return {
        name: "format",
        enumName: requirePositional(positionals, 1, "<enum>", head),
        value: requirePositional(positionals, 2, "<value>", head),
      };
    case "parse":
      return {
        name: "parse",
        enumName: requirePositional(positionals, 1, "<enum>", head),
        text: requirePositional(positionals, 2, "<text>", head),
      };
    default:
      throw usageError(`Unknown command ${JSON.stringify(head)}`);
  }
}

/**
 * Parse argv (without the node/script prefix).
 * Throws an Error with a usage hint on malformed input.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const positionals: string[] = [];
  const out: Omit<CliArgs, "command"> = { ignoreCase: false, strict: false };
  let wantsHelp = false;
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (VALUE_OPTIONS.has(a)) {
      const v = argv[i + 1];
      if (v === undefined) {
        throw usageError(`Missing value for ${a}`);
      }
      i++;
      if (a === "--config" || a === "-c") {
        out.configPath = v;
      } else {
        out.base = parseBase(v);
      }
      continue;
    }
    if (a === "--ignore-case" || a === "-i") {
      out.ignoreCase = true;
    } else if (a === "--strict" || a === "-s") {
      out.strict = true;
    } else if (a === "--help" || a === "-h") {
      wantsHelp = true;
    } else if (a.startsWith("-") && a.length > 1 && !/^-\d/.test(a)) {
      throw usageError(`Unknown option ${a}`);
    } else {
      positionals.push(a);
    }
  }
  const command = wantsHelp ? { name: "help" as const } : toCommand(positionals);
  return { ...out, command };
}

export const USAGE = `
Usage: enumkit [command] [options]

Commands:
  enums                     List configured enum names
  list <enum>               Show an enum's symbols and values
  format <enum> <value>     Render a value as symbol name(s)
  parse <enum> <text>       Convert symbol name(s) or a literal to a value

Options:
  --config, -c <path>       Path to executable config (enumkit.config.*)
  --ignore-case, -i         Match symbol names case-insensitively
  --strict, -s              Reject text that is not a symbol name
  --base, -b <2|8|10|16>    Base for unmatched flag bits (default 16)
  --help, -h                Show this help

Examples:
  enumkit list Color
  enumkit format Access 0x106
  enumkit parse Access "read, execute" -i
`;
