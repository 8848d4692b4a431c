import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
    // lowdb's JSONFilePreset swaps in an in-memory adapter when NODE_ENV is
    // "test"; the store tests need the real file adapter.
    env: { NODE_ENV: "development" },
  },
});
