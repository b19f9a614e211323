/**
 * @file Root CLI view: renders one command's output
 */
import React from "react";
import { Box, Text } from "ink";
import type { CommandOutput } from "../commands";
import { USAGE } from "../args";
import { Hint, SymbolTable, Title } from "./components/ui";

/**
 * Static (non-interactive) rendering of a command result.
 */
export function App({ output }: { output: CommandOutput }) {
  switch (output.kind) {
    case "help":
      return <Text>{USAGE}</Text>;
    case "text":
      return <Text>{output.text}</Text>;
    case "enums":
      if (output.rows.length === 0) {
        return <Hint>No enums configured</Hint>;
      }
      return (
        <Box flexDirection="column">
          {output.rows.map((r) => (
            <Text key={r.name}>
              <Text color="cyan">{r.name}</Text>
              <Text color="gray">
                {" "}
                {r.repr}
                {r.flags ? " flags" : ""} · {r.count} symbols
              </Text>
            </Text>
          ))}
        </Box>
      );
    case "list":
      return (
        <Box flexDirection="column">
          <Title label={output.enumName} subtitle={`${output.repr}${output.flags ? " (flags)" : ""}`} />
          <SymbolTable rows={output.rows} />
        </Box>
      );
  }
}
