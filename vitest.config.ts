/**
 * @file Vitest testing framework configuration
 *
 * Globals (describe/it/expect) are enabled and tests run in the Node.js
 * environment; specs live beside their sources as *.spec.ts(x).
 */

import { defineConfig } from "vitest/config";
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.spec.{ts,tsx}"],
  },
});
