// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/server/main`
 * Purpose: App server entry point started by the launcher: `main --host <ip> --port <n> [--reload]`.
 * Scope: Parses argv, binds, handles graceful shutdown. Does not resolve addresses (the launcher does).
 * Invariants:
 *   - ready=true only after the socket is bound; ready=false as soon as shutdown starts
 *   - Bad arguments or bind failures exit 1; SIGTERM/SIGINT close the server and exit 0
 * Side-effects: IO (network listen, process signals)
 * @public
 */

import { flushLogger, makeLogger } from "../observability/logger.js";
import {
  type AppServerState,
  close,
  createAppServer,
  listen,
} from "./app-server.js";
import { parseServerArgs } from "./args.js";

async function main(): Promise<void> {
  const args = parseServerArgs(process.argv.slice(2));
  const logger = makeLogger({ component: "app-server" });

  const state: AppServerState = { ready: false };
  const server = createAppServer({ state, logger, reload: args.reload });

  const address = await listen(server, args.host, args.port);
  state.ready = true;
  logger.info(
    { host: address.address, port: address.port, reload: args.reload },
    "App server listening"
  );

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    state.ready = false;
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await close(server);
      logger.info({}, "App server stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

// stdout only: LOG_FILE is not validated yet when this logger is built
const bootLogger = makeLogger(
  { component: "app-server", phase: "boot" },
  { fileSink: false }
);

main().catch((err) => {
  bootLogger.fatal({ err }, "App server failed to start");
  flushLogger();
  process.exit(1);
});
