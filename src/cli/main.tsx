/**
 * @file enumkit CLI entry (Ink + React)
 */
import React from "react";
import { render } from "ink";
import { App } from "./ui/App";
import { USAGE, parseArgs } from "./args";
import { runCommand } from "./commands";
import { loadConfig } from "../config";
import type { CliArgs } from "./args";

function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

async function main(argv: readonly string[]) {
  const args: CliArgs = (() => {
    try {
      return parseArgs(argv);
    } catch (e) {
      console.error(messageOf(e));
      process.exit(1);
    }
  })();
  if (args.command.name === "help") {
    console.log(USAGE);
    return;
  }
  const { config } = await loadConfig(args.configPath);
  const output = runCommand(config, args);
  // static output: render once, then release the terminal
  const { unmount } = render(<App output={output} />);
  unmount();
}

main(process.argv.slice(2)).catch((e: unknown) => {
  console.error(messageOf(e));
  process.exit(1);
});
