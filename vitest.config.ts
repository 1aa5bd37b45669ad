import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    testTimeout: 15000, // 15 second global timeout (filesystem suites create temp trees)
  },
});
