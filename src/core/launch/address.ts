// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/address`
 * Purpose: Bind address discovery - text extraction over `ip addr` output and selection from a structured interface table.
 * Scope: Pure functions. Does not query the host (see adapters/network).
 * Invariants:
 *   - Only the first IPv4 address of the configured interface is ever bound
 *   - `inet6` tokens never match the IPv4 extractor
 *   - Selection never falls back to loopback or wildcard addresses
 * Side-effects: none
 * Links: adapters/network/ip-command.ts, adapters/network/os-interfaces.ts
 * @public
 */

import { isIPv4 } from "node:net";

import { BindAddressNotFoundError } from "./errors.js";
import type { InterfaceAddress, InterfaceTable } from "./model.js";

const INET_IPV4 = /\binet\s+(\d{1,3}(?:\.\d{1,3}){3})/g;
const IP_ADDR_LINE = /^\d+:\s+(\S+?)(?:@\S+)?\s+(inet6?)\s+(\S+)/;
const SCOPE = /\bscope\s+(\S+)/;

/** Every IPv4 address that follows an `inet` token, in order of appearance. */
export function extractIpv4Addresses(output: string): string[] {
  return Array.from(output.matchAll(INET_IPV4), (match) => match[1] ?? "").filter(
    (address) => isIPv4(address)
  );
}

/**
 * First IPv4 address after an `inet` token, or "" when there is none.
 * `inet 192.168.1.42/24 brd ...` yields `192.168.1.42`.
 */
export function extractFirstIpv4(output: string): string {
  return extractIpv4Addresses(output)[0] ?? "";
}

/**
 * Parse `ip -o addr show` (one address per line) into an interface table.
 * Lines that are not address records are skipped.
 */
export function parseIpAddrOutput(output: string): InterfaceTable {
  const table: Record<string, InterfaceAddress[]> = {};

  for (const line of output.split("\n")) {
    const match = IP_ADDR_LINE.exec(line.trim());
    if (!match) continue;

    const [, name = "", token = "", value = ""] = match;
    const address =
      token === "inet" ? extractFirstIpv4(line) : (value.split("/")[0] ?? "");
    if (!name || !address) continue;

    const scope = SCOPE.exec(line)?.[1];
    const entry: InterfaceAddress = {
      address,
      family: token === "inet" ? "IPv4" : "IPv6",
      internal: scope === "host",
      cidr: value.includes("/") ? value : null,
    };

    const addresses = table[name] ?? [];
    addresses.push(entry);
    table[name] = addresses;
  }

  return table;
}

/**
 * First IPv4 address of `interfaceName`.
 * @throws BindAddressNotFoundError when the interface is absent or carries no IPv4 address
 */
export function selectBindAddress(
  table: InterfaceTable,
  interfaceName: string
): string {
  const available = Object.keys(table);
  if (!Object.hasOwn(table, interfaceName)) {
    throw new BindAddressNotFoundError(
      interfaceName,
      "INTERFACE_MISSING",
      available
    );
  }

  const ipv4 = table[interfaceName]?.find((entry) => entry.family === "IPv4");
  if (!ipv4) {
    throw new BindAddressNotFoundError(interfaceName, "NO_IPV4", available);
  }
  return ipv4.address;
}
