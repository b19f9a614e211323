/**
 * @file Specs: CLI argument parsing
 */
import { parseArgs, USAGE } from "./args";

describe("cli/args", () => {
  it("defaults to help", () => {
    expect(parseArgs([]).command).toEqual({ name: "help" });
    expect(parseArgs(["list", "Color", "--help"]).command).toEqual({ name: "help" });
  });

  it("parses commands with their positionals", () => {
    expect(parseArgs(["enums"]).command).toEqual({ name: "enums" });
    expect(parseArgs(["list", "Color"]).command).toEqual({ name: "list", enumName: "Color" });
    expect(parseArgs(["format", "Access", "0x106"]).command).toEqual({
      name: "format",
      enumName: "Access",
      value: "0x106",
    });
    expect(parseArgs(["parse", "Access", "read, execute"]).command).toEqual({
      name: "parse",
      enumName: "Access",
      text: "read, execute",
    });
  });

  it("reads options anywhere on the line", () => {
    const args = parseArgs(["-c", "conf/enums.mjs", "parse", "-i", "Color", "red", "--strict", "-b", "10"]);
    expect(args).toEqual({
      command: { name: "parse", enumName: "Color", text: "red" },
      configPath: "conf/enums.mjs",
      ignoreCase: true,
      strict: true,
      base: 10,
    });
  });

  it("keeps negative numbers as positionals", () => {
    expect(parseArgs(["parse", "Color", "-5"]).command).toEqual({ name: "parse", enumName: "Color", text: "-5" });
  });

  it("rejects malformed input with a usage hint", () => {
    expect(() => parseArgs(["list"])).toThrow("Missing <enum> for list\nRun with --help for usage.");
    expect(() => parseArgs(["format", "Color"])).toThrow("Missing <value> for format");
    expect(() => parseArgs(["frob"])).toThrow('Unknown command "frob"');
    expect(() => parseArgs(["enums", "-x"])).toThrow("Unknown option -x");
    expect(() => parseArgs(["enums", "-c"])).toThrow("Missing value for -c");
    expect(() => parseArgs(["enums", "-b", "3"])).toThrow('Invalid --base "3"; expected one of 2, 8, 10, 16');
  });

  it("documents every command", () => {
    for (const word of ["enums", "list <enum>", "format <enum> <value>", "parse <enum> <text>"]) {
      expect(USAGE).toContain(word);
    }
  });
});
