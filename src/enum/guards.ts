/**
 * @file Runtime guards for enum descriptors
 */
import { BIT_WIDTHS } from "./types";
import type { EnumType } from "./types";

/** Narrow unknown to a non-null object record. */
export function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isSymbolOf(kind: "bigint" | "string"): (s: unknown) => boolean {
  return (s) => isObject(s) && typeof s.name === "string" && typeof s.value === kind;
}

/** Runtime guard for enum descriptors (e.g. values exported by config modules). */
export function isEnumType(x: unknown): x is EnumType {
  if (!isObject(x)) {
    return false;
  }
  if (typeof x.name !== "string" || typeof x.flags !== "boolean" || !Array.isArray(x.symbols)) {
    return false;
  }
  if (x.order !== "name" && x.order !== "declaration") {
    return false;
  }
  if (x.kind === "string") {
    return x.symbols.every(isSymbolOf("string"));
  }
  if (x.kind !== "int" && x.kind !== "uint") {
    return false;
  }
  if (!BIT_WIDTHS.some((w) => w === x.bits)) {
    return false;
  }
  return x.symbols.every(isSymbolOf("bigint"));
}
