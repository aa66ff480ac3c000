import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // The catalog is a process-wide singleton
    fileParallelism: false,
    testTimeout: 20000,
  },
});
