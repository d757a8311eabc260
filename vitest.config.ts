import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["server/__tests__/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 15_000,
    hookTimeout: 10_000,
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "error",
    },
    pool: "forks",
  },
  resolve: {
    alias: {
      "@shared": fileURLToPath(new URL("./shared", import.meta.url)),
    },
  },
});
