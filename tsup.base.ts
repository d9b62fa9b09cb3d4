import type { Options } from "tsup";

/** Shared build settings for every package under packages/. */
const base: Options = {
  format: ["esm", "cjs"],
  dts: true,
  sourcemap: true,
  clean: true,
  treeshake: true,
  splitting: false,
  outDir: "dist",
  target: "node20",
};

export default base;
