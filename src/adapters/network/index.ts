// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/network`
 * Purpose: Network interface adapters barrel.
 * Side-effects: none
 * @internal
 */

export {
  type ExecFileFn,
  type IpCommandAdapterConfig,
  IpCommandNetworkInterfacesAdapter,
} from "./ip-command.js";
export {
  type InterfaceReader,
  OsNetworkInterfacesAdapter,
} from "./os-interfaces.js";
