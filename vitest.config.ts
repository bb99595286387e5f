import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    mockReset: true,
    // Test timeouts to prevent hanging
    testTimeout: 30000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    // Progress notifier threads are spawned from inside tests
    pool: "forks",
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    fileParallelism: false,
    coverage: {
      enabled: false,
      include: ["src/**/*.ts"],
      provider: "v8",
      reporter: ["text", "lcov"],
    },
  },
});
