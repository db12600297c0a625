/**
 * @summary Build configuration for the varscope CLI bundle using tsup.
 *
 * The workspace packages are inlined so the bundle runs with only its npm
 * dependencies installed.
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  banner: {
    js: "#!/usr/bin/env node",
  },
  noExternal: [/^@varscope\//],
  external: ["commander", "chalk", "fflate"],
});
