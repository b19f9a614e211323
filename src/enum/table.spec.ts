/**
 * @file Tests for memoized symbol tables
 */
import { defineEnum } from "./define";
import { formatScalar } from "./format";
import { parseScalar } from "./parse";
import { createSymbolTable, symbolTableOf } from "./table";
import { Color, Protocol } from "./fixtures";

describe("enum/table", () => {
  it("lists names in enumeration order", () => {
    const table = symbolTableOf(Color);
    expect(table.names).toEqual(["Blue", "Green", "None", "Red"]);
    expect(table.entries[0]).toEqual({ name: "Blue", value: 3n });
    expect(Object.isFrozen(table.entries)).toBe(true);
  });

  it("looks up values and names", () => {
    const table = symbolTableOf(Color);
    expect(table.lookupName(2n)).toBe("Green");
    expect(table.lookupName(9n)).toBeUndefined();
    expect(table.lookupValue("Green")).toBe(2n);
    expect(table.lookupValue("green")).toBeUndefined();
    expect(table.lookupValue("green", true)).toBe(2n);
  });

  it("encodes and decodes strictly", () => {
    const table = symbolTableOf(Color);
    expect(table.encode("Blue")).toBe(3n);
    expect(table.decode(0n)).toBe("None");
    expect(() => table.encode("Purple")).toThrow("unknown symbol Purple for Color");
    expect(() => table.decode(9n)).toThrow("unsupported value 9 for Color");
  });

  it("works for string enums", () => {
    const table = symbolTableOf(Protocol);
    expect(table.lookupName("https")).toBe("Https");
    expect(table.encode("HttpsAndHttp")).toBe("https,http");
    expect(() => table.decode("ftp")).toThrow("unsupported value ftp for Protocol");
  });

  it("memoizes per descriptor", () => {
    expect(symbolTableOf(Color)).toBe(symbolTableOf(Color));
    expect(createSymbolTable(Color)).not.toBe(symbolTableOf(Color));
  });

  it("breaks ties the same way as the formatter and parser", () => {
    const Dup = defineEnum("Dup", { kind: "int" }, { Zed: 1, Alpha: 1 });
    expect(symbolTableOf(Dup).lookupName(1n)).toBe(formatScalar(1n, Dup));
    const Tie = defineEnum("Tie", { kind: "int" }, { ok: 1, OK: 2 });
    expect(symbolTableOf(Tie).lookupValue("Ok", true)).toBe(parseScalar(Tie, "Ok", { caseInsensitive: true }));
    expect(symbolTableOf(Tie).lookupValue("Ok", true)).toBe(2n);
  });
});
