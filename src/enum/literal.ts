/**
 * @file Integer literal parsing with base prefixes and bit-width checks
 *
 * Accepted syntax: optional sign (signed targets only), then a decimal number,
 * a `0x`/`0o`/`0b` prefixed number, or a legacy octal number with a leading `0`.
 * Underscores may separate digits or follow a base prefix.
 */
import type { BitWidth, FlagBase } from "./types";
import type { LiteralFailure } from "./errors";

export type LiteralResult = { ok: true; value: bigint } | { ok: false; reason: LiteralFailure };

export type LiteralTarget = {
  signed: boolean;
  bits: BitWidth;
};

const PREFIXES: ReadonlyArray<readonly [string, number]> = [
  ["0x", 16],
  ["0o", 8],
  ["0b", 2],
];

function digitValue(ch: string): number {
  const c = ch.toLowerCase().charCodeAt(0);
  if (c >= 48 && c <= 57) {
    return c - 48;
  }
  if (c >= 97 && c <= 122) {
    return c - 97 + 10;
  }
  return Number.POSITIVE_INFINITY;
}

function isDigitOf(ch: string | undefined, radix: number): boolean {
  if (ch === undefined) {
    return false;
  }
  return digitValue(ch) < radix;
}

/** Underscores must sit between two digits, or right after a base prefix. */
function underscoresValid(digits: string, radix: number, prefixed: boolean): boolean {
  for (let i = 0; i < digits.length; i++) {
    if (digits[i] !== "_") {
      continue;
    }
    const before = i === 0 ? prefixed : isDigitOf(digits[i - 1], radix);
    if (!before || !isDigitOf(digits[i + 1], radix)) {
      return false;
    }
  }
  return true;
}

function splitRadix(body: string): { radix: number; digits: string; prefixed: boolean } {
  const head = body.slice(0, 2).toLowerCase();
  for (const [prefix, radix] of PREFIXES) {
    if (head === prefix) {
      return { radix, digits: body.slice(2), prefixed: true };
    }
  }
  if (body.length > 1 && body[0] === "0") {
    return { radix: 8, digits: body.slice(1), prefixed: true };
  }
  return { radix: 10, digits: body, prefixed: false };
}

function parseMagnitude(body: string): bigint | undefined {
  const { radix, digits, prefixed } = splitRadix(body);
  if (!underscoresValid(digits, radix, prefixed)) {
    return undefined;
  }
  const clean = digits.replace(/_/g, "");
  if (clean.length === 0) {
    return undefined;
  }
  const big = BigInt(radix);
  let acc = 0n;
  for (const ch of clean) {
    const d = digitValue(ch);
    if (d >= radix) {
      return undefined;
    }
    acc = acc * big + BigInt(d);
  }
  return acc;
}

/** Inclusive value range of an integer representation. */
export function integerRange(target: LiteralTarget): { min: bigint; max: bigint } {
  const width = BigInt(target.bits);
  if (target.signed) {
    return { min: -(1n << (width - 1n)), max: (1n << (width - 1n)) - 1n };
  }
  return { min: 0n, max: (1n << width) - 1n };
}

/**
 * Parse `text` as an integer literal of the given width and signedness.
 */
export function parseIntegerLiteral(text: string, target: LiteralTarget): LiteralResult {
  const sign = text[0];
  const hasSign = sign === "+" || sign === "-";
  if (hasSign && !target.signed) {
    return { ok: false, reason: "syntax" };
  }
  const magnitude = parseMagnitude(hasSign ? text.slice(1) : text);
  if (magnitude === undefined) {
    return { ok: false, reason: "syntax" };
  }
  const value = sign === "-" ? -magnitude : magnitude;
  const { min, max } = integerRange(target);
  if (value < min || value > max) {
    return { ok: false, reason: "range" };
  }
  return { ok: true, value };
}

const BASE_PREFIX: Record<FlagBase, string> = { 2: "0b", 8: "0o", 10: "", 16: "0x" };

/** Render a non-negative integer in `base` with the prefix the parser understands. */
export function formatIntegerLiteral(value: bigint, base: FlagBase): string {
  return `${BASE_PREFIX[base]}${value.toString(base)}`;
}
