import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "index.ts",
    "bin/install-requirements": "bin/install-requirements.ts",
    "bin/install-conda": "bin/install-conda.ts",
    "bin/setup-conda": "bin/setup-conda.ts",
    "bin/conda-bootstrap": "bin/conda-bootstrap.ts",
  },
  format: ["esm"],
  outDir: "dist",
  outExtension() {
    return { js: ".mjs", dts: ".d.mts" };
  },
  dts: {
    entry: { index: "index.ts" },
  },
  splitting: false,
  clean: true,
  sourcemap: true,
  treeshake: true,
  target: "node20",
  platform: "node",
  external: ["node:*"],
});
