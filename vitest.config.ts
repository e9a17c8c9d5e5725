import { defineConfig } from "vitest/config";

const isCI = !!process.env.CI;

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    // CI: retry flaky tests up to 2 times, increase timeout for slow runners
    ...(isCI && { retry: 2, testTimeout: 30_000 }),
    // Setup file pins the environment the logger and config read at import
    setupFiles: ["./tests/vitest.setup.ts"],
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "dist/",
        "**/*.test.ts",
        "vitest.config.ts",
        // Process entry points
        "src/index.ts",
        "src/bin/**",
        // Type-only files (no executable code to test)
        "src/git/types.ts",
        "src/report/types.ts",
        // Test utilities (not production code)
        "tests/mocks/**",
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 80,
        statements: 90,
      },
    },
  },
});
