import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Silences logging before any module under test loads
    setupFiles: ["./src/test-preload.ts"],
    testTimeout: 10000,
    restoreMocks: true,
  },
});
