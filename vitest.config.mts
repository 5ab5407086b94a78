// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `vitest.config`
 * Purpose: Vitest test runner configuration for launcher unit tests.
 * Scope: Node environment, tests/** only. No infrastructure required.
 * Invariants: Coverage disabled by default; v8 provider; no network beyond loopback.
 * Side-effects: file system (coverage reports written to ./coverage/ when enabled)
 * Links: tests/setup.ts
 * @public
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/setup.ts"],
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    coverage: {
      enabled: false,
      provider: "v8",
      reporter: ["lcov", "json-summary", "text"],
      reportsDirectory: "coverage",
      exclude: ["node_modules/", "tests/", "dist/", "**/*.config.*"],
    },
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
