// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/invocation`
 * Purpose: Build the server command line from a resolved launch config.
 * Scope: Argument formatting only. Does not validate the config (see config.ts) or spawn anything.
 * Invariants: Server args are exactly target, --host, --port, then zero-or-one --reload, in that order.
 * Side-effects: none
 * @public
 */

import type {
  ChildExit,
  LaunchConfig,
  RuntimeCommand,
  ServerInvocation,
} from "./model.js";

export const RELOAD_FLAG = "--reload";

export function buildServerArgs(
  appEntry: string,
  config: LaunchConfig
): string[] {
  const args = [
    appEntry,
    "--host",
    config.bindAddress,
    "--port",
    String(config.port),
  ];
  if (config.reloadEnabled) {
    args.push(RELOAD_FLAG);
  }
  return args;
}

export function buildServerInvocation(params: {
  runtime: RuntimeCommand;
  appEntry: string;
  config: LaunchConfig;
}): ServerInvocation {
  const { runtime, appEntry, config } = params;
  return Object.freeze({
    command: runtime.command,
    args: Object.freeze([
      ...runtime.runtimeArgs,
      ...buildServerArgs(appEntry, config),
    ]),
  });
}

/** Shell convention: a child killed by signal N exits with 128 + N. */
export function exitCodeFor(
  exit: ChildExit,
  signalNumbers: Readonly<Partial<Record<NodeJS.Signals, number>>>
): number {
  if (exit.code !== null) return exit.code;
  const signo = exit.signal ? signalNumbers[exit.signal] : undefined;
  return signo === undefined ? 1 : 128 + signo;
}
