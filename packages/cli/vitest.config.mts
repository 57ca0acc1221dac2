import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    // fake git runner and resolver doubles keep everything in-process
    testTimeout: 10000,
  },
});
