import { defineConfig } from "tsup";

export default defineConfig({
  entry: { cli: "src/cli/index.ts", index: "src/index.ts" },
  dts: { entry: { index: "src/index.ts" } },
  format: ["esm"],
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  target: "node20",
});
