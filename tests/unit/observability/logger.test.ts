// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/observability/logger.test`
 * Purpose: Unit tests for logger option resolution from raw env.
 * Scope: Level aliases, test-tooling silence, file sink toggle. Does NOT open destinations.
 * Side-effects: none
 * Links: src/observability/logger.ts
 * @internal
 */

import { resolve } from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  makeLogger,
  makeNoopLogger,
  resolveLoggerOptions,
} from "../../../src/observability/logger.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("resolveLoggerOptions", () => {
  it("defaults to info on stdout only", () => {
    expect(resolveLoggerOptions({})).toEqual({
      level: "info",
      enabled: true,
      serviceName: "launcher",
      filePath: undefined,
      syncStdout: true,
    });
  });

  it("is disabled under vitest and NODE_ENV=test", () => {
    expect(resolveLoggerOptions({ VITEST: "true" }).enabled).toBe(false);
    expect(resolveLoggerOptions({ NODE_ENV: "test" }).enabled).toBe(false);
  });

  it("uses async stdout and aliased levels in production", () => {
    const options = resolveLoggerOptions({
      NODE_ENV: "production",
      LOG_LEVEL: "WARNING",
      SERVICE_NAME: "tunedrop-api",
    });

    expect(options.level).toBe("warn");
    expect(options.syncStdout).toBe(false);
    expect(options.serviceName).toBe("tunedrop-api");
  });

  it("resolves LOG_FILE to an absolute path", () => {
    expect(resolveLoggerOptions({ LOG_FILE: "logs/app.log" }).filePath).toBe(
      resolve("logs/app.log")
    );
  });

  it("drops the file sink when ENABLE_LOGGING is off", () => {
    expect(
      resolveLoggerOptions({
        LOG_FILE: "/var/log/app/logs.log",
        ENABLE_LOGGING: "false",
      }).filePath
    ).toBeUndefined();
  });
});

describe("boot logger", () => {
  it("ignores LOG_FILE when the file sink is off", () => {
    expect(
      resolveLoggerOptions(
        { LOG_FILE: "/nonexistent-dir/logs.log" },
        { fileSink: false }
      ).filePath
    ).toBeUndefined();
  });

  it("builds without opening an unusable LOG_FILE", () => {
    vi.stubEnv("VITEST", "");
    vi.stubEnv("NODE_ENV", "development");
    vi.stubEnv("LOG_FILE", "/nonexistent-dir/logs.log");

    expect(() =>
      makeLogger({ phase: "boot" }, { fileSink: false })
    ).not.toThrow();
  });
});

describe("makeNoopLogger", () => {
  it("creates children without writing", () => {
    const logger = makeNoopLogger().child({ component: "test" });
    expect(() => logger.info({ password: "test-secret" }, "noop")).not.toThrow();
  });
});
