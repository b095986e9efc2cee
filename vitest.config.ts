import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.{test,spec}.ts"],
    env: {
      LOG_LEVEL: "error",
      LOG_TO_DB: "0",
    },
  },
});
