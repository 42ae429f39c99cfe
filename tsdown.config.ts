import { defineConfig } from "tsdown";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    cli: "src/cli.ts",
  },
  format: ["esm"],
  target: "node20",
  sourcemap: true,
  dts: true,
  treeshake: true,
  unbundle: true,
});
