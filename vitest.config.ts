import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@wrinkle-list\/core$/, replacement: source("core") },
      { find: /^@wrinkle-list\/testkit$/, replacement: source("testkit") },
    ],
  },
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
      "packages/*/benchmarks/**/*.bench.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
