/**
 * Vitest Configuration for CLI Package
 *
 * Runs the CLI tests on their own: `vitest run --config packages/cli/vitest.config.ts`.
 */
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 10000,
    sequence: {
      shuffle: false,
    },
  },
});
