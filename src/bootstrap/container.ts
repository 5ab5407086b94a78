// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/bootstrap/container`
 * Purpose: Composition root - wires concrete adapters to port interfaces for the launcher.
 * Scope: All adapter construction lives here. Returns LauncherDeps typed against ports.
 * Invariants:
 *   - Only file that imports concrete adapters
 *   - The server runs on the launcher's own runtime (process.execPath + execArgv minus inspector flags)
 *   - Default launch target sits beside this module's build output (server/main.js, or .ts under tsx)
 * Side-effects: none
 * Links: launcher/launch.ts, ports/index.ts
 * @internal
 */

import { extname, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import {
  IpCommandNetworkInterfacesAdapter,
  OsNetworkInterfacesAdapter,
} from "../adapters/network/index.js";
import { ChildProcessRunner, FsFileWatcher } from "../adapters/process/index.js";
import type { RuntimeCommand } from "../core/launch/public.js";
import type { LauncherDeps } from "../launcher/launch.js";
import type { Logger } from "../observability/logger.js";
import type { NetworkInterfacesPort } from "../ports/index.js";
import type { Env } from "./env.js";

/** Source (or dist) root: the default tree watched in reload mode */
export const SOURCE_ROOT = fileURLToPath(new URL("..", import.meta.url));

export function defaultAppEntry(): string {
  const extension = extname(fileURLToPath(import.meta.url));
  return fileURLToPath(new URL(`../server/main${extension}`, import.meta.url));
}

export function currentRuntime(): RuntimeCommand {
  return {
    command: process.execPath,
    // Inspector flags would make the child fight the launcher for the debug port
    runtimeArgs: process.execArgv.filter((arg) => !arg.startsWith("--inspect")),
  };
}

function createNetworkAdapter(config: Env): NetworkInterfacesPort {
  if (config.ADDRESS_SOURCE === "ip") {
    return new IpCommandNetworkInterfacesAdapter({
      timeoutMs: config.ADDRESS_QUERY_TIMEOUT_MS,
    });
  }
  return new OsNetworkInterfacesAdapter();
}

/**
 * Build the launcher deps from validated env and logger.
 * This is the only place that instantiates concrete adapters.
 */
export function createLauncherContainer(
  config: Env,
  logger: Logger
): LauncherDeps {
  return {
    network: createNetworkAdapter(config),
    runner: new ChildProcessRunner(),
    watcher: new FsFileWatcher(logger.child({ component: "fs-watcher" })),
    logger,
    runtime: currentRuntime(),
    appEntry: config.APP_ENTRY ? resolve(config.APP_ENTRY) : defaultAppEntry(),
    watchPath: config.RELOAD_WATCH_PATH
      ? resolve(config.RELOAD_WATCH_PATH)
      : SOURCE_ROOT,
    settings: {
      localDev: config.LOCAL_DEV,
      port: config.PORT,
      interfaceName: config.NETWORK_INTERFACE,
      reloadDebounceMs: config.RELOAD_DEBOUNCE_MS,
      shutdownGraceMs: config.SHUTDOWN_GRACE_MS,
    },
  };
}
