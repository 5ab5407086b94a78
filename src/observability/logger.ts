// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/observability/logger`
 * Purpose: Pino logger factory - JSON to stdout, optionally mirrored to a log file.
 * Scope: Create configured pino loggers for the launcher and the app server. Does not handle request-scoped logging.
 * Invariants:
 *   - Always emits JSON to stdout; LOG_FILE adds a second sync destination via multistream
 *   - Boot loggers (fileSink: false) never open LOG_FILE, so they work before env validation
 *   - Safe to call at module scope (reads logging env vars directly, no env() validation)
 *   - Silent under vitest or NODE_ENV=test, and opens no destinations then
 * Side-effects: IO (opens LOG_FILE for append when configured)
 * Notes: Formatting via external pipe (pino-pretty). Call flushLogger() before process.exit.
 * Links: redact.ts, bootstrap/env.ts
 * @public
 */

import { resolve } from "node:path";
import type { Level, Logger } from "pino";
import pino from "pino";

import { normalizeLogLevel, parseFlag } from "../shared/env-values.js";
import { REDACT_PATHS } from "./redact.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level: Level;
  enabled: boolean;
  serviceName: string;
  /** Absolute path of the mirror log file, undefined when file logging is off */
  filePath: string | undefined;
  syncStdout: boolean;
}

const destinations = new Set<{ flushSync(): void }>();

export interface MakeLoggerOptions {
  /** Mirror to LOG_FILE when configured (default: true). Boot loggers pass false. */
  fileSink?: boolean;
}

export function resolveLoggerOptions(
  source: NodeJS.ProcessEnv,
  options: MakeLoggerOptions = {}
): LoggerOptions {
  const nodeEnv = source.NODE_ENV ?? "development";
  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = source.VITEST === "true" || nodeEnv === "test";
  const logFile = source.LOG_FILE?.trim();
  const fileEnabled =
    (options.fileSink ?? true) && parseFlag(source.ENABLE_LOGGING, true);

  return {
    level: normalizeLogLevel(source.LOG_LEVEL) ?? "info",
    enabled: !isTestTooling,
    serviceName: source.SERVICE_NAME?.trim() || "launcher",
    filePath: fileEnabled && logFile ? resolve(logFile) : undefined,
    syncStdout: nodeEnv !== "production",
  };
}

export function makeLogger(
  bindings?: Record<string, unknown>,
  loggerOptions: MakeLoggerOptions = {}
): Logger {
  const options = resolveLoggerOptions(process.env, loggerOptions);

  const config = {
    level: options.level,
    enabled: options.enabled,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, app: "tunedrop", service: options.serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  if (!options.enabled) {
    return pino(config);
  }

  // Sync in dev for immediate crash visibility, async in prod
  const stdout = pino.destination({
    dest: 1,
    sync: options.syncStdout,
    minLength: options.syncStdout ? 0 : 4096,
  });
  destinations.add(stdout);

  if (!options.filePath) {
    return pino(config, stdout);
  }

  const file = pino.destination({
    dest: options.filePath,
    sync: true,
    append: true,
    mkdir: false,
  });
  destinations.add(file);

  return pino(
    config,
    pino.multistream([
      { stream: stdout, level: options.level },
      { stream: file, level: options.level },
    ])
  );
}

/** Flush every destination opened by makeLogger. Call before process.exit. */
export function flushLogger(): void {
  for (const destination of destinations) {
    destination.flushSync();
  }
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
