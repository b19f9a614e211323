/**
 * @file Parse error types for enum conversions
 * Rationale: Error classes are idiomatic and improve instanceof checks and
 * stack traces. Suppress the linter rule discouraging classes in this file.
 */
/* eslint-disable no-restricted-syntax -- Error classes are idiomatic for exceptions and enable instanceof checks */

export type LiteralFailure = "syntax" | "range";

/** Common base: text that could not be converted into a value of an enum type. */
export class EnumParseError extends Error {
  readonly input: string;
  readonly typeName: string;
  constructor(message: string, input: string, typeName: string) {
    super(message);
    this.name = "EnumParseError";
    this.input = input;
    this.typeName = typeName;
  }
}

/** Thrown when text names no symbol and no numeric fallback applies. */
export class NoMatchingSymbolError extends EnumParseError {
  constructor(input: string, typeName: string) {
    super(`no symbol of ${typeName} matches ${JSON.stringify(input)}`, input, typeName);
    this.name = "NoMatchingSymbolError";
  }
}

/** Thrown in lenient parsing when text is neither a symbol nor a valid literal. */
export class NumericFallbackError extends EnumParseError {
  readonly reason: LiteralFailure;
  constructor(input: string, typeName: string, repr: string, reason: LiteralFailure) {
    const detail = reason === "range" ? "out of range" : "invalid syntax";
    super(
      `${JSON.stringify(input)} is neither a symbol of ${typeName} nor a valid ${repr} literal (${detail})`,
      input,
      typeName,
    );
    this.name = "NumericFallbackError";
    this.reason = reason;
  }
}

/** Thrown when one comma-separated piece of a flag set cannot be resolved. */
export class FlagComponentError extends EnumParseError {
  readonly component: string;
  constructor(component: string, input: string, typeName: string) {
    super(
      `flag component ${JSON.stringify(component)} is neither a symbol of ${typeName} nor an unsigned literal`,
      input,
      typeName,
    );
    this.name = "FlagComponentError";
    this.component = component;
  }
}
