import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["server/**/*.test.ts"],
    env: {
      DATABASE_URL: ":memory:",
      LOG_LEVEL: "error",
    },
  },
});
