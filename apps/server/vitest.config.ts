import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Runs before test collection so the logger sees the test environment
    setupFiles: ["./test/setup-env.ts"],
    // Only run unit tests (fast, no external dependencies)
    include: ["src/__tests__/unit/**/*.test.ts"],
  },
});
