import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["cli/*/src/**/*.test.ts"],
    environment: "node",
    restoreMocks: true,
    env: { TEMPLOG_LOG_LEVEL: "error" },
  },
});
