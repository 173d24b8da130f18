import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform: "neutral" — the library touches only DataView, typed arrays and
  // BigInt, which behave the same in browsers and Node.js.
  platform: "neutral",
  target:   "es2020",
});
