/**
 * Vitest Configuration — @warden/domain
 *
 * Checks that the bundled service agent table loads and validates.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
