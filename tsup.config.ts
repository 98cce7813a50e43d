import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // The root logger reads process.env; pino is a Node.js logger and stays
  // external, resolved from the consumer's node_modules.
  platform: "node",
  target:   "node20",
});
