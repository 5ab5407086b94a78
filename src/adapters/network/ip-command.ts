// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/network/ip-command`
 * Purpose: NetworkInterfacesPort backed by the iproute2 `ip` binary.
 * Scope: Spawns `ip -o addr show` (no shell) with a timeout and parses its output. Does not select a bind address.
 * Invariants:
 *   - Always bounded by timeoutMs
 *   - Any failed query, timeout included, surfaces as AddressQueryError
 * Side-effects: IO (subprocess execution)
 * Notes: For hosts where node:os hides interfaces (some container runtimes). Selected with ADDRESS_SOURCE=ip.
 * Links: core/launch/address.ts (parseIpAddrOutput)
 * @internal
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

import {
  AddressQueryError,
  type InterfaceTable,
  parseIpAddrOutput,
} from "../../core/launch/public.js";
import type { NetworkInterfacesPort } from "../../ports/index.js";

const execFileAsync = promisify(execFile);

export type ExecFileFn = (
  file: string,
  args: readonly string[],
  options: { timeout: number }
) => Promise<{ stdout: string }>;

export interface IpCommandAdapterConfig {
  /** Query timeout in milliseconds (default: 5000) */
  timeoutMs?: number;
  /** Path or name of the ip binary (default: "ip") */
  binary?: string;
  exec?: ExecFileFn;
}

const IP_ARGS = ["-o", "addr", "show"] as const;

export class IpCommandNetworkInterfacesAdapter
  implements NetworkInterfacesPort
{
  readonly source = "ip";
  private readonly timeoutMs: number;
  private readonly binary: string;
  private readonly exec: ExecFileFn;

  constructor(config: IpCommandAdapterConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.binary = config.binary ?? "ip";
    this.exec =
      config.exec ??
      ((file, args, options) =>
        execFileAsync(file, [...args], { ...options, encoding: "utf8" }));
  }

  async listInterfaces(): Promise<InterfaceTable> {
    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.binary, IP_ARGS, {
        timeout: this.timeoutMs,
      }));
    } catch (err) {
      throw new AddressQueryError(
        `${this.binary} ${IP_ARGS.join(" ")}`,
        err instanceof Error ? err : undefined
      );
    }
    return parseIpAddrOutput(stdout);
  }
}
