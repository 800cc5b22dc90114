import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.test.ts"],
    setupFiles: ["./vitest.setup.ts"],
    // Isolated hooks spin up worker threads; allow slow CI machines some slack
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      HELMSMAN_LOG_LEVEL: "fatal",
    },
  },
});
