import { defineConfig } from "vitest/config";

// Timing assertions over large generated dumps; kept out of `npm test`
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/*/benchmarks/**/*.bench.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    testTimeout: 60000,
  },
});
