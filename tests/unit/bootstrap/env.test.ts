// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/bootstrap/env.test`
 * Purpose: Unit tests for environment validation and env file loading.
 * Scope: parseEnv defaults, coercion, EnvValidationError meta; loadEnvFiles ordering against temp files.
 * Invariants:
 *   - PORT unset or empty -> 4000; "8080" -> 8080
 *   - Env files never override values already present
 * Side-effects: IO (temp directory)
 * Links: src/bootstrap/env.ts
 * @internal
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterAll, beforeAll, describe, expect, it } from "vitest";

import {
  EnvValidationError,
  isEnvValidationError,
  loadEnvFiles,
  parseEnv,
} from "../../../src/bootstrap/env.js";

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), "launcher-env-"));
  mkdirSync(join(dir, "logs"));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function invalidKeys(raw: NodeJS.ProcessEnv): string[] {
  try {
    parseEnv(raw);
  } catch (error) {
    if (isEnvValidationError(error)) return error.meta.invalid;
    throw error;
  }
  throw new Error("expected EnvValidationError");
}

describe("parseEnv", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: "development",
      LOCAL_DEV: undefined,
      PORT: 4000,
      NETWORK_INTERFACE: "eth0",
      ADDRESS_SOURCE: "os",
      ADDRESS_QUERY_TIMEOUT_MS: 5000,
      APP_ENTRY: undefined,
      RELOAD_WATCH_PATH: undefined,
      RELOAD_DEBOUNCE_MS: 300,
      SHUTDOWN_GRACE_MS: 10000,
      LOG_LEVEL: "info",
      LOG_FILE: undefined,
      ENABLE_LOGGING: true,
      SERVICE_NAME: "launcher",
    });
  });

  it("coerces PORT", () => {
    expect(parseEnv({ PORT: "8080" }).PORT).toBe(8080);
  });

  it("treats an empty PORT as unset", () => {
    expect(parseEnv({ PORT: "" }).PORT).toBe(4000);
    expect(parseEnv({ PORT: "  " }).PORT).toBe(4000);
  });

  it("keeps LOCAL_DEV raw, including empty", () => {
    expect(parseEnv({ LOCAL_DEV: "" }).LOCAL_DEV).toBe("");
    expect(parseEnv({ LOCAL_DEV: "0" }).LOCAL_DEV).toBe("0");
  });

  it("reports invalid keys in meta", () => {
    expect.assertions(4);
    try {
      parseEnv({ PORT: "abc", ADDRESS_SOURCE: "netlink" });
    } catch (error) {
      expect(error).toBeInstanceOf(EnvValidationError);
      if (!isEnvValidationError(error)) return;
      expect(error.meta.code).toBe("INVALID_ENV");
      expect(error.meta.invalid).toEqual(["PORT", "ADDRESS_SOURCE"]);
      expect(error.meta.missing).toEqual([]);
    }
  });

  it.each([
    "0",
    "70000",
    "4000.5",
    "0x1F90",
    "1e3",
    "8080.0",
    "+8080",
    " 8080",
  ])(
    "rejects PORT=%j",
    (port) => {
      expect(invalidKeys({ PORT: port })).toEqual(["PORT"]);
    }
  );

  it("explains a non-decimal PORT", () => {
    expect(() => parseEnv({ PORT: "0x1F90" })).toThrow(
      "Invalid environment configuration:\n  PORT: must be a decimal integer"
    );
  });

  it("applies the same digit rule to durations", () => {
    expect(invalidKeys({ SHUTDOWN_GRACE_MS: "1e4" })).toEqual([
      "SHUTDOWN_GRACE_MS",
    ]);
    expect(parseEnv({ SHUTDOWN_GRACE_MS: "2500" }).SHUTDOWN_GRACE_MS).toBe(2500);
  });

  it.each([
    ["WARNING", "warn"],
    ["critical", "fatal"],
    [" Debug ", "debug"],
    ["error", "error"],
  ])("normalizes LOG_LEVEL=%j to %s", (raw, level) => {
    expect(parseEnv({ LOG_LEVEL: raw }).LOG_LEVEL).toBe(level);
  });

  it("rejects unknown log levels", () => {
    expect(invalidKeys({ LOG_LEVEL: "verbose" })).toEqual(["LOG_LEVEL"]);
  });

  it.each<[string, boolean]>([
    ["0", false],
    ["FALSE", false],
    ["off", false],
    ["1", true],
    ["", true],
  ])("parses ENABLE_LOGGING=%j as %s", (raw, expected) => {
    expect(parseEnv({ ENABLE_LOGGING: raw }).ENABLE_LOGGING).toBe(expected);
  });

  it("accepts a LOG_FILE in an existing directory", () => {
    const logFile = join(dir, "logs", "launcher.log");
    expect(parseEnv({ LOG_FILE: logFile }).LOG_FILE).toBe(logFile);
  });

  it("rejects a LOG_FILE that is a directory", () => {
    expect(() => parseEnv({ LOG_FILE: join(dir, "logs") })).toThrow(
      `LOG_FILE must not be a directory: ${join(dir, "logs")}`
    );
  });

  it("reports an unusable LOG_FILE as EnvValidationError", () => {
    expect(() => parseEnv({ LOG_FILE: "/nonexistent-dir/logs.log" })).toThrow(
      new EnvValidationError(
        { code: "INVALID_ENV", missing: [], invalid: ["LOG_FILE"] },
        "  LOG_FILE: LOG_FILE must be in an existing directory: /nonexistent-dir/logs.log"
      )
    );
  });

  it("rejects a LOG_FILE whose directory does not exist", () => {
    expect(invalidKeys({ LOG_FILE: join(dir, "missing", "app.log") })).toEqual([
      "LOG_FILE",
    ]);
  });
});

describe("loadEnvFiles", () => {
  it("loads .env before the secrets file without overriding", () => {
    const dotenvPath = join(dir, ".env");
    const secretsPath = join(dir, "app_secrets");
    writeFileSync(dotenvPath, "PORT=5001\nLOCAL_DEV=1\n");
    writeFileSync(secretsPath, "PORT=6000\nNETWORK_INTERFACE=ens5\n");
    const target: Record<string, string> = { LOG_LEVEL: "debug" };

    const loaded = loadEnvFiles({ dotenvPath, secretsPath, target });

    expect(loaded).toEqual([dotenvPath, secretsPath]);
    expect(target).toEqual({
      LOG_LEVEL: "debug",
      PORT: "5001",
      LOCAL_DEV: "1",
      NETWORK_INTERFACE: "ens5",
    });
  });

  it("skips files that do not exist", () => {
    const dotenvPath = join(dir, "only.env");
    writeFileSync(dotenvPath, "PORT=5002\n");
    const target: Record<string, string> = {};

    const loaded = loadEnvFiles({
      dotenvPath,
      secretsPath: join(dir, "no-such-secrets"),
      target,
    });

    expect(loaded).toEqual([dotenvPath]);
    expect(target).toEqual({ PORT: "5002" });
  });

  it("never overrides values already set", () => {
    const dotenvPath = join(dir, "override.env");
    writeFileSync(dotenvPath, "PORT=5003\n");
    const target: Record<string, string> = { PORT: "7000" };

    loadEnvFiles({ dotenvPath, secretsPath: join(dir, "none"), target });

    expect(target.PORT).toBe("7000");
  });
});
