/**
 * @file Minimal UI primitives for consistent CLI styling
 */
import React from "react";
import { Box, Text } from "ink";
import type { SymbolRow } from "../../commands";

/** Render a cyan title with optional gray subtitles. */
export function Title({ label, subtitle }: { label: string; subtitle?: string | string[] }) {
  const subs = Array.isArray(subtitle) ? subtitle : subtitle ? [subtitle] : [];
  return (
    <Box flexDirection="column">
      <Text color="cyan">{label}</Text>
      {subs.map((s, i) => (
        <Text key={i} color="gray">
          {s}
        </Text>
      ))}
    </Box>
  );
}

/** Render a gray hint line. */
export function Hint({ children }: { children: string }) {
  return <Text color="gray">{children}</Text>;
}

/** Pad cells so the value column lines up. */
export function columnWidth(rows: readonly SymbolRow[], header: string): number {
  return rows.reduce((w, r) => Math.max(w, r.name.length), header.length);
}

/** Two-column name/value table. */
export function SymbolTable({ rows }: { rows: SymbolRow[] }) {
  const width = columnWidth(rows, "Symbol");
  if (rows.length === 0) {
    return <Hint>(no symbols)</Hint>;
  }
  return (
    <Box flexDirection="column">
      <Text bold>
        {"Symbol".padEnd(width)}  Value
      </Text>
      {rows.map((r) => (
        <Text key={r.name}>
          <Text color="yellow">{r.name.padEnd(width)}</Text>  {r.value}
        </Text>
      ))}
    </Box>
  );
}
