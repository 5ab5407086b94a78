// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/network/os-interfaces`
 * Purpose: NetworkInterfacesPort backed by node:os networkInterfaces().
 * Scope: Maps Node's interface info onto InterfaceTable. Does not select a bind address.
 * Invariants: Interfaces without addresses are reported with an empty list.
 * Side-effects: IO (reads host interface configuration)
 * Links: ports/network-interfaces.port.ts
 * @internal
 */

import { type NetworkInterfaceInfo, networkInterfaces } from "node:os";

import {
  AddressQueryError,
  type InterfaceAddress,
  type InterfaceTable,
} from "../../core/launch/public.js";
import type { NetworkInterfacesPort } from "../../ports/index.js";

export type InterfaceReader = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

export class OsNetworkInterfacesAdapter implements NetworkInterfacesPort {
  readonly source = "os";

  constructor(private readonly read: InterfaceReader = networkInterfaces) {}

  async listInterfaces(): Promise<InterfaceTable> {
    let raw: NodeJS.Dict<NetworkInterfaceInfo[]>;
    try {
      raw = this.read();
    } catch (err) {
      throw new AddressQueryError(
        "os.networkInterfaces",
        err instanceof Error ? err : undefined
      );
    }

    const table: Record<string, InterfaceAddress[]> = {};
    for (const [name, infos] of Object.entries(raw)) {
      table[name] = (infos ?? []).map(toInterfaceAddress);
    }
    return table;
  }
}

function toInterfaceAddress(info: NetworkInterfaceInfo): InterfaceAddress {
  return {
    address: info.address,
    family: info.family,
    internal: info.internal,
    cidr: info.cidr,
  };
}
