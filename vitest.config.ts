import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/tests/**/*.test.ts"],
    exclude: ["node_modules", "dist", "packages/*/tests/fixtures/**"],
    testTimeout: 15_000,
    env: {
      E2E_LOG_LEVEL: "silent",
    },
  },
});
