import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["apps/api/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
    fileParallelism: false
  }
});
