import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Environment settings
    environment: "node",

    // Test file patterns
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],

    // Coverage settings
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/**/__tests__/**", "src/index.ts"],
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
    },

    // Timeout settings
    testTimeout: 10000,
    hookTimeout: 10000,

    pool: "threads",

    globals: false,
    watch: false,
  },
});
