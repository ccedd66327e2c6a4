import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // Tests share process-wide stubs of fetch and process signal handlers.
    fileParallelism: false,
  },
});
