import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["api/src/**/*.test.ts", "packages/shared/src/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      STORE_DRIVER: "memory",
    },
  },
});
