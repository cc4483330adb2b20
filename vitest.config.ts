import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // sharp work on multi-megapixel images and the spawned CLI need headroom
    testTimeout: 30000,
    fileParallelism: false,
  },
});
