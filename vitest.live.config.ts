import { defineConfig } from "vitest/config";

// Runs against a deployment named by the usual environment (BACKEND_URL, FRONTEND_URL, ...).
export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/live/**/*.live.test.ts"],
    testTimeout: 120_000,
    hookTimeout: 120_000,
    fileParallelism: false,
  },
});
