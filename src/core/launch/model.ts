// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/model`
 * Purpose: Launch domain types: resolved endpoint, interface table, server invocation, lifecycle states.
 * Scope: Types only. Does not contain logic.
 * Invariants: LaunchConfig and ServerInvocation are immutable once built.
 * Side-effects: none
 * @public
 */

export type AddressFamily = "IPv4" | "IPv6";

export interface InterfaceAddress {
  readonly address: string;
  readonly family: AddressFamily;
  /** Loopback or host-scoped address */
  readonly internal: boolean;
  /** CIDR notation when the source reports a prefix length */
  readonly cidr: string | null;
}

/** Interface name → addresses in the order the host reports them */
export type InterfaceTable = Readonly<
  Record<string, readonly InterfaceAddress[]>
>;

export interface LaunchConfig {
  readonly reloadEnabled: boolean;
  readonly port: number;
  readonly bindAddress: string;
}

/** Executable plus flags that precede the launch target (e.g. a TS loader) */
export interface RuntimeCommand {
  readonly command: string;
  readonly runtimeArgs: readonly string[];
}

export interface ServerInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

export interface LaunchPlan {
  readonly config: LaunchConfig;
  readonly interfaceName: string;
  readonly appEntry: string;
  readonly invocation: ServerInvocation;
}

export type LauncherState =
  | "NOT_STARTED"
  | "LAUNCHING"
  | "RUNNING"
  | "FAILED"
  | "EXITED";

export interface ChildExit {
  readonly code: number | null;
  readonly signal: NodeJS.Signals | null;
}
