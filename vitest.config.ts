import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    exclude: ["test/fixtures/**"],
    // tree-sitter is a native addon; keep each test file in its own process
    pool: "forks",
    testTimeout: 20_000,
  },
});
