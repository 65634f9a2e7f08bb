import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/index.ts", // re-export barrel
        "src/cli/main.ts",
      ],
      thresholds: {
        branches: 65,
        functions: 80,
        lines: 80,
        statements: 80,
      },
      reporter: ["text", "html", "json"],
    },

    // Filesystem tests work in their own temp directories
    pool: "forks",

    testTimeout: 30000,
  },
});
