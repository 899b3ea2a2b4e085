import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/**/index.ts", "src/cli/main.ts"],
      thresholds: {
        branches: 65,
        functions: 80,
        lines: 75,
        statements: 75,
      },
      reporter: ["text", "html"],
    },

    // Stages shell out and write temp directories; keep files isolated
    pool: "forks",
    testTimeout: 30000,
  },
});
