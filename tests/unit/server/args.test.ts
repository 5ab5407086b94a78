// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/server/args.test`
 * Purpose: Unit tests for app server argv parsing.
 * Scope: Accepts what buildServerArgs produces; rejects empty hosts, bad ports and unknown options.
 * Side-effects: none
 * Links: src/server/args.ts, src/core/launch/invocation.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { buildServerArgs } from "../../../src/core/launch/public.js";
import {
  isServerArgsError,
  parseServerArgs,
  ServerArgsError,
} from "../../../src/server/args.js";

describe("parseServerArgs", () => {
  it("parses host and port", () => {
    expect(parseServerArgs(["--host", "10.0.0.7", "--port", "4000"])).toEqual({
      host: "10.0.0.7",
      port: 4000,
      reload: false,
    });
  });

  it("accepts the launcher's argument list", () => {
    const config = { reloadEnabled: true, port: 8080, bindAddress: "10.0.0.7" };
    const [, ...argv] = buildServerArgs("main.js", config);

    expect(parseServerArgs(argv)).toEqual({
      host: "10.0.0.7",
      port: 8080,
      reload: true,
    });
  });

  it("rejects an empty host", () => {
    expect(() => parseServerArgs(["--host", "", "--port", "4000"])).toThrow(
      "Invalid app server arguments: host: host is required"
    );
  });

  it("rejects a non-numeric port", () => {
    expect(() =>
      parseServerArgs(["--host", "10.0.0.7", "--port", "http"])
    ).toThrow("port: port must be a decimal integer");
  });

  it.each(["0x1F90", "1e3", "8080.0"])(
    "rejects the non-decimal port %s",
    (port) => {
      expect(() => parseServerArgs(["--host", "10.0.0.7", "--port", port])).toThrow(
        "Invalid app server arguments: port: port must be a decimal integer"
      );
    }
  );

  it("rejects a missing port", () => {
    expect(() => parseServerArgs(["--host", "10.0.0.7"])).toThrow(
      ServerArgsError
    );
  });

  it("rejects unknown options", () => {
    let caught: unknown;
    try {
      parseServerArgs(["--host", "10.0.0.7", "--port", "4000", "--workers", "2"]);
    } catch (error) {
      caught = error;
    }

    expect(isServerArgsError(caught)).toBe(true);
    expect(caught).toMatchObject({ code: "INVALID_SERVER_ARGS" });
  });
});
