/**
 * @file Specs: CLI command execution
 */
import { normalizeConfig } from "../config/normalize";
import { NoMatchingSymbolError } from "../enum/errors";
import { Access, Color, Protocol } from "../enum/fixtures";
import { parseArgs } from "./args";
import { displayValue, runCommand } from "./commands";

const config = normalizeConfig({ enums: [Color, Access, Protocol] });

function run(...argv: string[]) {
  return runCommand(config, parseArgs(argv));
}

describe("cli/commands", () => {
  it("summarizes configured enums", () => {
    expect(run("enums")).toEqual({
      kind: "enums",
      rows: [
        { name: "Color", repr: "int16", flags: false, count: 4 },
        { name: "Access", repr: "uint32", flags: true, count: 4 },
        { name: "Protocol", repr: "string", flags: false, count: 3 },
      ],
    });
  });

  it("lists symbols in enumeration order", () => {
    expect(run("list", "Color")).toEqual({
      kind: "list",
      enumName: "Color",
      repr: "int16",
      flags: false,
      rows: [
        { name: "Blue", value: "3" },
        { name: "Green", value: "2" },
        { name: "None", value: "0" },
        { name: "Red", value: "1" },
      ],
    });
    const access = run("list", "Access");
    expect(access.kind === "list" && access.rows.map((r) => r.value)).toEqual(["4 (0x4)", "0 (0x0)", "1 (0x1)", "2 (0x2)"]);
  });

  it("formats values", () => {
    expect(run("format", "Color", "2")).toEqual({ kind: "text", text: "Green" });
    expect(run("format", "Access", "0x106")).toEqual({ kind: "text", text: "Execute, Write, 0x100" });
    expect(run("format", "Access", "0x106", "-b", "10")).toEqual({ kind: "text", text: "Execute, Write, 256" });
    expect(run("format", "Protocol", "https")).toEqual({ kind: "text", text: "Https" });
    expect(() => run("format", "Color", "abc")).toThrow('"abc" is not a valid int16 literal (syntax)');
  });

  it("parses text", () => {
    expect(run("parse", "Access", "read, execute", "-i")).toEqual({ kind: "text", text: "5 (0x5)" });
    expect(run("parse", "Color", "123")).toEqual({ kind: "text", text: "123" });
    expect(run("parse", "Protocol", "Https")).toEqual({ kind: "text", text: '"https"' });
    expect(() => run("parse", "Color", "123", "-s")).toThrow(NoMatchingSymbolError);
  });

  it("applies config defaults", () => {
    const strictHex = normalizeConfig({ enums: [Color, Access], format: { base: 2 }, parse: { strict: true } });
    expect(runCommand(strictHex, parseArgs(["format", "Access", "24"]))).toEqual({ kind: "text", text: "0b11000" });
    expect(runCommand(strictHex, parseArgs(["format", "Access", "24", "-b", "16"]))).toEqual({ kind: "text", text: "0x18" });
    expect(() => runCommand(strictHex, parseArgs(["parse", "Color", "7"]))).toThrow(NoMatchingSymbolError);
  });

  it("names configured enums when one is unknown", () => {
    expect(() => run("list", "Nope")).toThrow('Unknown enum "Nope". Configured: Color, Access, Protocol');
  });

  it("displays values by representation", () => {
    expect(displayValue(-3n, Color)).toBe("-3");
    expect(displayValue(255n, Access)).toBe("255 (0xff)");
    expect(displayValue("", Protocol)).toBe('""');
  });
});
