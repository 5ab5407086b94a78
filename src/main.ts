#!/usr/bin/env node
// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/main`
 * Purpose: Launcher entry point - resolve bind address, port and reload mode, then supervise the app server.
 * Scope: Loads env files, builds the container, forwards signals, exits with the server's code. Does not contain launch logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - SIGTERM/SIGINT are forwarded to the server, never handled as a launcher-only shutdown
 *   - Exit code is the server's; 1 when configuration or spawn fails
 * Side-effects: IO (env files, interface query, child process, process signals)
 * Links: launcher/launch.ts, bootstrap/container.ts, Dockerfile
 * @public
 */

import { createLauncherContainer } from "./bootstrap/container.js";
import { env, loadEnvFiles } from "./bootstrap/env.js";
import { startLauncher } from "./launcher/launch.js";
import { flushLogger, makeLogger } from "./observability/logger.js";

async function main(): Promise<void> {
  const envFiles = loadEnvFiles();
  const config = env();

  // Composition root owns logger creation (after env files, so LOG_FILE applies)
  const logger = makeLogger({ component: "launcher" });
  logger.info(
    {
      envFiles,
      logLevel: config.LOG_LEVEL,
      logFile: config.ENABLE_LOGGING ? config.LOG_FILE : undefined,
      addressSource: config.ADDRESS_SOURCE,
    },
    "Starting launcher"
  );

  const launch = await startLauncher(createLauncherContainer(config, logger));

  const forward = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Received signal, stopping app server");
    launch.supervisor.stop(signal);
  };
  process.on("SIGTERM", forward);
  process.on("SIGINT", forward);

  const exitCode = await launch.done;
  flushLogger();
  process.exit(exitCode);
}

// stdout only: LOG_FILE is not validated yet when this logger is built
const bootLogger = makeLogger({ phase: "boot" }, { fileSink: false });

main().catch((err) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
