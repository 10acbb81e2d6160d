import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.test.ts"],
    setupFiles: ["src/tests/propertyTestConfig.ts"],
    environment: "node",
    testTimeout: 10000,
  },
});
