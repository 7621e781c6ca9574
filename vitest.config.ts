import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const fromRoot = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/__tests__/**/*.test.ts",
      "apps/*/__tests__/**/*.test.ts",
    ],
    environment: "node",
    globals: false,
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      "@shapeargs/sdk/testing": fromRoot("./packages/sdk/src/testing/index.ts"),
      "@shapeargs/sdk": fromRoot("./packages/sdk/src/index.ts"),
      "@shapeargs/shared": fromRoot("./packages/shared/src/index.ts"),
      "@shapeargs/core": fromRoot("./packages/core/src/index.ts"),
    },
  },
});
