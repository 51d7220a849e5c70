import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*_test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
