/**
 * @file Shared enum fixtures for specs
 */
import { defineEnum, defineFlags } from "./define";

export const Color = defineEnum("Color", { kind: "int", bits: 16 }, { None: 0, Red: 1, Green: 2, Blue: 3 });

export const Access = defineFlags("Access", { bits: 32 }, { None: 0, Read: 0x1, Write: 0x2, Execute: 0x4 });

export const Protocol = defineEnum(
  "Protocol",
  { kind: "string" },
  { None: "", Https: "https", HttpsAndHttp: "https,http" },
);
