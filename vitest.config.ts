import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts", "src/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
    env: {
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
  },
});
