/**
 * @file Tests for integer literal parsing/formatting
 */
import { formatIntegerLiteral, integerRange, parseIntegerLiteral } from "./literal";

const i32 = { signed: true, bits: 32 } as const;
const u8 = { signed: false, bits: 8 } as const;
const i8 = { signed: true, bits: 8 } as const;

describe("enum/literal", () => {
  it("parses decimal and prefixed literals", () => {
    expect(parseIntegerLiteral("123", i32)).toEqual({ ok: true, value: 123n });
    expect(parseIntegerLiteral("0x1F", i32)).toEqual({ ok: true, value: 31n });
    expect(parseIntegerLiteral("0X1f", i32)).toEqual({ ok: true, value: 31n });
    expect(parseIntegerLiteral("0o17", i32)).toEqual({ ok: true, value: 15n });
    expect(parseIntegerLiteral("0b101", i32)).toEqual({ ok: true, value: 5n });
    expect(parseIntegerLiteral("017", i32)).toEqual({ ok: true, value: 15n });
    expect(parseIntegerLiteral("0", i32)).toEqual({ ok: true, value: 0n });
  });

  it("accepts underscores between digits or after a prefix only", () => {
    expect(parseIntegerLiteral("1_000", i32)).toEqual({ ok: true, value: 1000n });
    expect(parseIntegerLiteral("0x_ff", i32)).toEqual({ ok: true, value: 255n });
    for (const bad of ["_1", "1_", "1__0", "0_"]) {
      expect(parseIntegerLiteral(bad, i32)).toEqual({ ok: false, reason: "syntax" });
    }
  });

  it("handles signs according to signedness", () => {
    expect(parseIntegerLiteral("-0x10", i32)).toEqual({ ok: true, value: -16n });
    expect(parseIntegerLiteral("+5", i32)).toEqual({ ok: true, value: 5n });
    expect(parseIntegerLiteral("-1", u8)).toEqual({ ok: false, reason: "syntax" });
    expect(parseIntegerLiteral("+1", u8)).toEqual({ ok: false, reason: "syntax" });
  });

  it("rejects malformed text as syntax errors", () => {
    for (const bad of ["", "-", "0x", "08", "12a", " 1", "1 ", "1e3", "0b102"]) {
      expect(parseIntegerLiteral(bad, i32)).toEqual({ ok: false, reason: "syntax" });
    }
  });

  it("enforces width and signedness ranges", () => {
    expect(parseIntegerLiteral("-128", i8)).toEqual({ ok: true, value: -128n });
    expect(parseIntegerLiteral("127", i8)).toEqual({ ok: true, value: 127n });
    expect(parseIntegerLiteral("-129", i8)).toEqual({ ok: false, reason: "range" });
    expect(parseIntegerLiteral("128", i8)).toEqual({ ok: false, reason: "range" });
    expect(parseIntegerLiteral("255", u8)).toEqual({ ok: true, value: 255n });
    expect(parseIntegerLiteral("0x100", u8)).toEqual({ ok: false, reason: "range" });
    expect(parseIntegerLiteral("0xffffffffffffffff", { signed: false, bits: 64 })).toEqual({
      ok: true,
      value: 18446744073709551615n,
    });
  });

  it("computes representation ranges", () => {
    expect(integerRange({ signed: true, bits: 16 })).toEqual({ min: -32768n, max: 32767n });
    expect(integerRange({ signed: false, bits: 16 })).toEqual({ min: 0n, max: 65535n });
  });

  it("formats literals with the prefix of their base", () => {
    expect(formatIntegerLiteral(256n, 16)).toBe("0x100");
    expect(formatIntegerLiteral(5n, 2)).toBe("0b101");
    expect(formatIntegerLiteral(8n, 8)).toBe("0o10");
    expect(formatIntegerLiteral(42n, 10)).toBe("42");
    expect(formatIntegerLiteral(255n, 16)).toBe("0xff");
  });
});
