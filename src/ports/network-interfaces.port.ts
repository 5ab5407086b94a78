// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/ports/network-interfaces`
 * Purpose: Host interface enumeration as typed results.
 * Scope: Contract only. Does not select a bind address.
 * Invariants: Implementations report every interface they see, including ones without IPv4 addresses; failures raise AddressQueryError.
 * Side-effects: none (interface definition only)
 * Links: adapters/network/*, core/launch/address.ts
 * @public
 */

import type { InterfaceTable } from "../core/launch/public.js";

export interface NetworkInterfacesPort {
  /** Human-readable source name for logs ("os", "ip") */
  readonly source: string;
  listInterfaces(): Promise<InterfaceTable>;
}
