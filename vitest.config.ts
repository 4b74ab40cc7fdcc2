import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 20_000,
    pool: "forks",
    fileParallelism: false, // Tests share tmp/ under the project root
    env: {
      PHONE_SWEEP_HOME: "tmp/home",
    },
  },
});
