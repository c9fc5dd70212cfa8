/**
 * Vitest Configuration — @warden/platform
 *
 * Unit and property tests for the reconciliation engine.
 * File adapter tests use a temporary directory; nothing else leaves the process.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
