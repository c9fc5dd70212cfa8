/**
 * Vitest Configuration — @warden/contracts
 *
 * Pure TypeScript tests. No DOM, no filesystem, no network.
 * These tests validate Zod schemas and the shortcode helpers.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
