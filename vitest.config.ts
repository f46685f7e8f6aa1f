import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      TOOLDECK_LOG_LEVEL: "silent",
    },
    testTimeout: 10_000,
  },
});
