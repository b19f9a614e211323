/**
 * @file Executable config example (TS)
 * Mix typed descriptors with inline definitions; run with `npm run cli -- -c ./enumkit.config.example.ts list Access`.
 */
import { defineConfig } from "./src/config";
import { defineEnum, defineFlags } from "./src/enum";

const Color = defineEnum("Color", { kind: "int", bits: 16 }, { None: 0, Red: 1, Green: 2, Blue: 3 });
const Access = defineFlags("Access", { bits: 32 }, { None: 0, Read: 0x1, Write: 0x2, Execute: 0x4 });

export default defineConfig({
  enums: [
    Color,
    Access,
    {
      name: "Protocol",
      kind: "string",
      symbols: { None: "", Https: "https", HttpsAndHttp: "https,http" },
    },
  ],
  format: { base: 16 },
  parse: { caseInsensitive: true },
});
