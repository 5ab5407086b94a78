// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/shared/env-values`
 * Purpose: Normalizers for raw environment strings shared by env validation and the logger factory.
 * Scope: Pure string handling. Does not read process.env.
 * Invariants: Empty or whitespace-only values are treated as unset.
 * Side-effects: none
 * @internal
 */

import type { Level } from "pino";

const LOG_LEVELS: readonly Level[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

/** Level names used by other logging stacks, mapped onto pino's. */
const LOG_LEVEL_ALIASES: Readonly<Record<string, Level>> = {
  warning: "warn",
  critical: "fatal",
};

const FALSY_FLAGS = new Set(["0", "false", "no", "off"]);

/** Returns undefined for blank values so zod defaults apply. */
export function blankToUndefined(value: unknown): unknown {
  if (typeof value === "string" && value.trim() === "") {
    return undefined;
  }
  return value;
}

/**
 * Case-insensitive pino level lookup; `WARNING` and `CRITICAL` are accepted.
 * Returns undefined for unset or unknown names.
 */
export function normalizeLogLevel(raw: string | undefined): Level | undefined {
  const lowered = raw?.trim().toLowerCase();
  if (!lowered) return undefined;
  const name = LOG_LEVEL_ALIASES[lowered] ?? lowered;
  return LOG_LEVELS.find((level) => level === name);
}

export function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) return fallback;
  return !FALSY_FLAGS.has(value);
}
