import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    conditions: ["source"],
  },
  test: {
    name: "@docpath/sdk",
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts", "benchmarks/**/*.bench.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
