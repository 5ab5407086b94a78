// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/server/app-server`
 * Purpose: HTTP host the launcher starts; binds the resolved endpoint and answers orchestrator health checks.
 * Scope: /livez (liveness), /readyz (readiness), /version, /ping. Does not serve media routes.
 * Invariants:
 *   - /livez always returns 200 (process alive)
 *   - /readyz returns 200 only when ready=true, 503 otherwise
 *   - /ping returns the JSON string "pong!"
 *   - Every request is logged once on completion with status and duration
 * Side-effects: Binds an HTTP server (listen)
 * Links: server/main.ts
 * @internal
 */

import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";

import type { Logger } from "../observability/logger.js";

export interface AppServerState {
  ready: boolean;
}

export interface VersionInfo {
  sha: string;
  service: string;
  buildTs: string;
}

export interface AppServerOptions {
  state: AppServerState;
  logger: Logger;
  reload: boolean;
  version?: VersionInfo;
}

/** Build metadata from env vars (set at build time or runtime) */
export function versionFromEnv(source: NodeJS.ProcessEnv): VersionInfo {
  return {
    sha: source.GIT_SHA ?? "unknown",
    service: source.SERVICE_NAME?.trim() || "tunedrop-api",
    buildTs: source.BUILD_TS ?? "unknown",
  };
}

function send(
  res: ServerResponse,
  status: number,
  contentType: string,
  body: string
): void {
  res.writeHead(status, { "Content-Type": contentType });
  res.end(body);
}

export function createAppServer(options: AppServerOptions): Server {
  const { state, logger, reload } = options;
  const version = options.version ?? versionFromEnv(process.env);

  return createServer((req: IncomingMessage, res: ServerResponse) => {
    const startedAt = Date.now();
    const path = (req.url ?? "/").split("?")[0];

    res.once("finish", () => {
      const status = res.statusCode;
      const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
      logger[level](
        { method: req.method, path, status, durationMs: Date.now() - startedAt },
        "request complete"
      );
    });

    switch (path) {
      case "/livez":
        send(res, 200, "text/plain", "ok");
        break;
      case "/readyz":
        if (state.ready) {
          send(res, 200, "text/plain", "ok");
        } else {
          send(res, 503, "text/plain", "not ready");
        }
        break;
      case "/version":
        send(
          res,
          200,
          "application/json",
          JSON.stringify({ ...version, reload })
        );
        break;
      case "/ping":
        send(res, 200, "application/json", JSON.stringify("pong!"));
        break;
      default:
        send(res, 404, "text/plain", "not found");
    }
  });
}

/** Listen on host:port; rejects on bind errors such as EADDRNOTAVAIL or EADDRINUSE. */
export function listen(
  server: Server,
  host: string,
  port: number
): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => reject(err);
    server.once("error", onError);
    server.listen(port, host, () => {
      server.off("error", onError);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address);
      } else {
        reject(new Error(`Server bound to unexpected address: ${address}`));
      }
    });
  });
}

/** Stop accepting connections and wait for in-flight requests. */
export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeIdleConnections();
  });
}
