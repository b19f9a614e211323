/**
 * @file Value -> text formatting
 *
 * Formatting is total: a value without a symbol degrades to a literal, so
 * parsing the output always reconstructs the original value.
 */
import { enumerateSymbols } from "./symbols";
import { formatIntegerLiteral } from "./literal";
import type { EnumType, EnumValue, FlagBase, IntegerEnumType, StringEnumType, UintEnumType } from "./types";

/** Bring an input to the type's representation; integers wrap to its width. */
function normalize(value: number | bigint | string, type: EnumType): EnumValue {
  if (type.kind === "string" || typeof value === "string") {
    return String(value);
  }
  const n = BigInt(value);
  return type.kind === "uint" ? BigInt.asUintN(type.bits, n) : BigInt.asIntN(type.bits, n);
}

function nameOf(wanted: EnumValue, type: EnumType): string | undefined {
  let found: string | undefined;
  const visit = (name: string, v: EnumValue): boolean => {
    if (v !== wanted) {
      return false;
    }
    found = name;
    return true;
  };
  enumerateSymbols<EnumValue>(type, visit);
  return found;
}

/** Name of the first symbol (enumeration order) whose value is `value`, if any. */
export function symbolName(value: bigint | number, type: IntegerEnumType): string | undefined;
export function symbolName(value: string, type: StringEnumType): string | undefined;
export function symbolName(value: number | bigint | string, type: EnumType): string | undefined {
  return nameOf(normalize(value, type), type);
}

/**
 * Render `value` as its symbol name. Integers are first wrapped to the
 * type's width; without a symbol they render in decimal. Strings without a
 * symbol render as "".
 */
export function formatScalar(value: bigint | number, type: IntegerEnumType): string;
export function formatScalar(value: string, type: StringEnumType): string;
export function formatScalar(value: number | bigint | string, type: EnumType): string {
  const wanted = normalize(value, type);
  const name = nameOf(wanted, type);
  if (name !== undefined) {
    return name;
  }
  if (type.kind === "string") {
    return "";
  }
  return wanted.toString();
}

/**
 * Render `value` as the comma-separated names of every flag it contains.
 * Bits no symbol accounts for are appended as a literal in `base`.
 * Zero renders as the zero-valued symbol, or as a zero literal if there is none.
 */
export function formatFlags(value: bigint | number, type: UintEnumType, base: FlagBase = 16): string {
  const bits = BigInt.asUintN(type.bits, BigInt(value));
  if (bits === 0n) {
    let zero: string | undefined;
    enumerateSymbols(type, (name, v) => {
      if (v !== 0n) {
        return false;
      }
      zero = name;
      return true;
    });
    return zero ?? formatIntegerLiteral(0n, base);
  }
  const names: string[] = [];
  let matched = 0n;
  enumerateSymbols(type, (name, v) => {
    if (v !== 0n && (bits & v) === v) {
      matched |= v;
      names.push(name);
    }
    return false;
  });
  if (matched !== bits) {
    names.push(formatIntegerLiteral(bits ^ matched, base));
  }
  return names.join(", ");
}
