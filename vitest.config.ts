import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: [
      { find: /^@textscope\/sdk\/testing$/, replacement: source("./packages/sdk/src/testing/index.ts") },
      { find: /^@textscope\/sdk$/, replacement: source("./packages/sdk/src/index.ts") },
      { find: /^@textscope\/shared$/, replacement: source("./packages/shared/src/index.ts") },
      { find: /^@textscope\/core$/, replacement: source("./packages/core/src/index.ts") },
      { find: /^@textscope\/commands$/, replacement: source("./packages/commands/src/index.ts") },
    ],
  },
});
