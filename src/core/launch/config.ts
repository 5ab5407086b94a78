// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/config`
 * Purpose: Resolve the explicit launch configuration (reload mode, port, bind address).
 * Scope: Validation and defaulting of already-read values. Does not read process.env or query interfaces.
 * Invariants:
 *   - reloadEnabled iff the local-dev flag is present and non-empty
 *   - port defaults to DEFAULT_PORT when absent
 *   - bindAddress must be a dotted IPv4 address; empty is rejected, never interpolated
 * Side-effects: none
 * @public
 */

import { isIPv4 } from "node:net";

import { InvalidLaunchConfigError } from "./errors.js";
import type { LaunchConfig } from "./model.js";

export const DEFAULT_PORT = 4000;

export interface LaunchConfigInput {
  /** Raw local-dev flag; any non-empty value enables reload */
  localDev?: string | undefined;
  port?: number | undefined;
  bindAddress: string;
}

export function isReloadEnabled(localDev: string | undefined): boolean {
  return localDev !== undefined && localDev !== "";
}

export function resolveLaunchConfig(input: LaunchConfigInput): LaunchConfig {
  const port = input.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidLaunchConfigError(
      "port",
      `Port must be an integer between 1 and 65535, got ${port}`
    );
  }

  if (!isIPv4(input.bindAddress)) {
    throw new InvalidLaunchConfigError(
      "bindAddress",
      input.bindAddress === ""
        ? "Bind address is empty"
        : `Bind address is not an IPv4 address: ${input.bindAddress}`
    );
  }

  return Object.freeze({
    reloadEnabled: isReloadEnabled(input.localDev),
    port,
    bindAddress: input.bindAddress,
  });
}
