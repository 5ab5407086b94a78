// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/launcher/launch`
 * Purpose: Bootstrap sequence - resolve the launch plan, then hand off to the process supervisor.
 * Scope: Drives the launcher state machine. Does not read process.env (settings arrive via LauncherDeps) or call process.exit.
 * Invariants:
 *   - NOT_STARTED -> FAILED when the plan cannot be resolved; the error is logged and rethrown
 *   - LAUNCHING -> RUNNING on the first successful spawn; RUNNING -> EXITED when supervision ends
 *   - `done` resolves with the exit code the launcher should exit with
 * Side-effects: IO (interface query, process spawn via ports)
 * Links: core/launch/*, launcher/supervisor.ts, bootstrap/container.ts
 * @public
 */

import {
  buildServerInvocation,
  LaunchLifecycle,
  type LaunchPlan,
  resolveLaunchConfig,
  type RuntimeCommand,
  selectBindAddress,
} from "../core/launch/public.js";
import type { Logger } from "../observability/logger.js";
import type {
  FileWatcherPort,
  NetworkInterfacesPort,
  ProcessRunnerPort,
} from "../ports/index.js";
import { ProcessSupervisor, type SupervisionOutcome } from "./supervisor.js";

export interface LauncherSettings {
  /** Raw LOCAL_DEV value */
  localDev: string | undefined;
  port: number;
  interfaceName: string;
  reloadDebounceMs: number;
  shutdownGraceMs: number;
}

export interface LauncherDeps {
  network: NetworkInterfacesPort;
  runner: ProcessRunnerPort;
  watcher: FileWatcherPort;
  logger: Logger;
  runtime: RuntimeCommand;
  appEntry: string;
  watchPath: string;
  settings: LauncherSettings;
}

export interface LauncherHandle {
  plan: LaunchPlan;
  lifecycle: LaunchLifecycle;
  supervisor: ProcessSupervisor;
  /** Exit code of the launcher: the server's, or 1 if it never started */
  done: Promise<number>;
}

export async function resolveLaunchPlan(
  deps: Pick<
    LauncherDeps,
    "network" | "runtime" | "appEntry" | "settings" | "logger"
  >
): Promise<LaunchPlan> {
  const { network, runtime, appEntry, settings, logger } = deps;

  const table = await network.listInterfaces();
  logger.debug(
    { source: network.source, interfaces: Object.keys(table) },
    "Enumerated network interfaces"
  );

  const bindAddress = selectBindAddress(table, settings.interfaceName);
  const config = resolveLaunchConfig({
    localDev: settings.localDev,
    port: settings.port,
    bindAddress,
  });

  return {
    config,
    interfaceName: settings.interfaceName,
    appEntry,
    invocation: buildServerInvocation({ runtime, appEntry, config }),
  };
}

export async function startLauncher(
  deps: LauncherDeps
): Promise<LauncherHandle> {
  const { logger, settings } = deps;
  const lifecycle = new LaunchLifecycle((from, to) =>
    logger.debug({ from, to }, "Launcher state changed")
  );

  let plan: LaunchPlan;
  try {
    plan = await resolveLaunchPlan(deps);
  } catch (err) {
    lifecycle.to("FAILED");
    logger.error(
      { err, interface: settings.interfaceName },
      "Could not resolve launch configuration"
    );
    throw err;
  }

  lifecycle.to("LAUNCHING");
  logger.info(
    {
      host: plan.config.bindAddress,
      port: plan.config.port,
      reload: plan.config.reloadEnabled,
      interface: plan.interfaceName,
      entry: plan.appEntry,
    },
    "Launching app server"
  );

  const supervisor = new ProcessSupervisor(
    { runner: deps.runner, watcher: deps.watcher, logger },
    {
      invocation: plan.invocation,
      reload: {
        enabled: plan.config.reloadEnabled,
        watchPath: deps.watchPath,
        debounceMs: settings.reloadDebounceMs,
      },
      shutdownGraceMs: settings.shutdownGraceMs,
      onFirstSpawn: () => lifecycle.to("RUNNING"),
    }
  );

  const done = supervisor.done.then((outcome) =>
    settle(lifecycle, outcome, logger)
  );

  try {
    supervisor.start();
  } catch (err) {
    lifecycle.to("FAILED");
    logger.error({ err }, "Could not start app server supervision");
    throw err;
  }

  return { plan, lifecycle, supervisor, done };
}

function settle(
  lifecycle: LaunchLifecycle,
  outcome: SupervisionOutcome,
  logger: Logger
): number {
  // A restart that fails to spawn ends a RUNNING launcher as EXITED
  lifecycle.to(lifecycle.current === "RUNNING" ? "EXITED" : "FAILED");

  if (outcome.kind === "failed") {
    logger.error({ err: outcome.error }, "App server failed to start");
  } else {
    logger.info(
      { exitCode: outcome.exitCode, restarts: outcome.restarts },
      "Supervision ended"
    );
  }
  return outcome.exitCode;
}
