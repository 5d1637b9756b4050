import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // platform "neutral": @bitform/core only touches Uint8Array, DataView,
  // BigInt and TextEncoder/TextDecoder, which behave the same in browsers
  // and Node.js.
  platform: "neutral",
});
