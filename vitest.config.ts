import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@varscope/core": source("./packages/core/src/index.ts"),
      "@varscope/runner-vw": source("./packages/runner-vw/src/index.ts"),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    testTimeout: 30_000,
  },
});
