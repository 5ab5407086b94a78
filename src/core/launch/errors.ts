// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/errors`
 * Purpose: Launch domain errors with stable codes.
 * Scope: Error definitions and type guards. Does not log or map to exit codes.
 * Invariants: Every error carries a readonly `code`; guards match on `name` so they survive module duplication.
 * Side-effects: none (error definitions only)
 * Links: Thrown by address.ts, config.ts, lifecycle.ts; handled by launcher/launch.ts
 * @public
 */

import type { LauncherState } from "./model.js";

export type BindAddressFailure = "INTERFACE_MISSING" | "NO_IPV4";

/**
 * No usable IPv4 address on the configured interface.
 * The launcher never falls back to loopback or a wildcard address.
 */
export class BindAddressNotFoundError extends Error {
  public readonly code = "BIND_ADDRESS_NOT_FOUND" as const;

  constructor(
    public readonly interfaceName: string,
    public readonly reason: BindAddressFailure,
    /** Interface names the host did report */
    public readonly available: readonly string[]
  ) {
    super(
      reason === "INTERFACE_MISSING"
        ? `Network interface "${interfaceName}" not found (available: ${available.join(", ") || "none"})`
        : `Network interface "${interfaceName}" has no IPv4 address`
    );
    this.name = "BindAddressNotFoundError";
  }
}

export class InvalidLaunchConfigError extends Error {
  public readonly code = "INVALID_LAUNCH_CONFIG" as const;

  constructor(
    public readonly field: "bindAddress" | "port",
    message: string
  ) {
    super(message);
    this.name = "InvalidLaunchConfigError";
  }
}

export class AddressQueryError extends Error {
  public readonly code = "ADDRESS_QUERY_FAILED" as const;

  constructor(
    public readonly source: string,
    public override readonly cause?: Error
  ) {
    super(
      `Interface address query via ${source} failed${cause ? `: ${cause.message}` : ""}`
    );
    this.name = "AddressQueryError";
  }
}

export class IllegalStateTransitionError extends Error {
  public readonly code = "ILLEGAL_STATE_TRANSITION" as const;

  constructor(
    public readonly from: LauncherState,
    public readonly to: LauncherState
  ) {
    super(`Illegal launcher state transition: ${from} -> ${to}`);
    this.name = "IllegalStateTransitionError";
  }
}

export function isBindAddressNotFoundError(
  error: unknown
): error is BindAddressNotFoundError {
  return error instanceof Error && error.name === "BindAddressNotFoundError";
}

export function isInvalidLaunchConfigError(
  error: unknown
): error is InvalidLaunchConfigError {
  return error instanceof Error && error.name === "InvalidLaunchConfigError";
}

export function isAddressQueryError(
  error: unknown
): error is AddressQueryError {
  return error instanceof Error && error.name === "AddressQueryError";
}

export function isIllegalStateTransitionError(
  error: unknown
): error is IllegalStateTransitionError {
  return (
    error instanceof Error && error.name === "IllegalStateTransitionError"
  );
}
