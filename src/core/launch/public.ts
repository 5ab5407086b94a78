// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch`
 * Purpose: Public surface of the launch domain.
 * Scope: Re-exports only. Named exports, no export *.
 * Side-effects: none
 * @public
 */

export {
  extractFirstIpv4,
  extractIpv4Addresses,
  parseIpAddrOutput,
  selectBindAddress,
} from "./address.js";
export {
  DEFAULT_PORT,
  isReloadEnabled,
  type LaunchConfigInput,
  resolveLaunchConfig,
} from "./config.js";
export {
  AddressQueryError,
  type BindAddressFailure,
  BindAddressNotFoundError,
  IllegalStateTransitionError,
  InvalidLaunchConfigError,
  isAddressQueryError,
  isBindAddressNotFoundError,
  isIllegalStateTransitionError,
  isInvalidLaunchConfigError,
} from "./errors.js";
export {
  buildServerArgs,
  buildServerInvocation,
  exitCodeFor,
  RELOAD_FLAG,
} from "./invocation.js";
export {
  canTransition,
  LaunchLifecycle,
  type TransitionListener,
} from "./lifecycle.js";
export type {
  AddressFamily,
  ChildExit,
  InterfaceAddress,
  InterfaceTable,
  LaunchConfig,
  LaunchPlan,
  LauncherState,
  RuntimeCommand,
  ServerInvocation,
} from "./model.js";
