// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/core/launch/config.test`
 * Purpose: Unit tests for launch config resolution.
 * Scope: Reload flag, port defaulting and bind address validation.
 * Invariants:
 *   - Any non-empty local-dev value enables reload, including "0"
 *   - Port defaults to 4000
 *   - Empty or malformed bind addresses are rejected
 * Side-effects: none
 * Links: src/core/launch/config.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  DEFAULT_PORT,
  InvalidLaunchConfigError,
  isInvalidLaunchConfigError,
  isReloadEnabled,
  resolveLaunchConfig,
} from "../../../../src/core/launch/public.js";

describe("isReloadEnabled", () => {
  it.each<[string | undefined, boolean]>([
    [undefined, false],
    ["", false],
    ["1", true],
    ["0", true],
    ["false", true],
    ["yes", true],
  ])("LOCAL_DEV=%j -> %s", (localDev, expected) => {
    expect(isReloadEnabled(localDev)).toBe(expected);
  });
});

describe("resolveLaunchConfig", () => {
  it("defaults the port to 4000 without reload", () => {
    expect(resolveLaunchConfig({ bindAddress: "10.0.0.7" })).toEqual({
      reloadEnabled: false,
      port: DEFAULT_PORT,
      bindAddress: "10.0.0.7",
    });
    expect(DEFAULT_PORT).toBe(4000);
  });

  it("keeps an explicit port and enables reload", () => {
    expect(
      resolveLaunchConfig({
        localDev: "1",
        port: 8080,
        bindAddress: "192.168.1.42",
      })
    ).toEqual({ reloadEnabled: true, port: 8080, bindAddress: "192.168.1.42" });
  });

  it("returns a frozen config", () => {
    expect(Object.isFrozen(resolveLaunchConfig({ bindAddress: "10.0.0.7" }))).toBe(
      true
    );
  });

  it("rejects an empty bind address", () => {
    expect.assertions(3);
    try {
      resolveLaunchConfig({ bindAddress: "" });
    } catch (error) {
      expect(isInvalidLaunchConfigError(error)).toBe(true);
      if (!isInvalidLaunchConfigError(error)) return;
      expect(error.field).toBe("bindAddress");
      expect(error.message).toBe("Bind address is empty");
    }
  });

  it("rejects a bind address that is not IPv4", () => {
    expect(() => resolveLaunchConfig({ bindAddress: "eth0" })).toThrow(
      "Bind address is not an IPv4 address: eth0"
    );
    expect(() => resolveLaunchConfig({ bindAddress: "fe80::1" })).toThrow(
      InvalidLaunchConfigError
    );
  });

  it.each([0, 70000, 80.5])("rejects port %s", (port) => {
    expect(() => resolveLaunchConfig({ port, bindAddress: "10.0.0.7" })).toThrow(
      `Port must be an integer between 1 and 65535, got ${port}`
    );
  });
});
