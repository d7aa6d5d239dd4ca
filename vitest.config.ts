import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    watch: false,
    globals: false,
    environment: "node",
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 30000,
    hookTimeout: 30000,
    pool: "forks",
  },
});
