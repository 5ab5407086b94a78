// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/bootstrap/env`
 * Purpose: Environment configuration - dotenv file loading plus Zod validation behind a lazy singleton.
 * Scope: Config parsing only - no adapter construction, no interface queries.
 * Invariants:
 *   - .env is loaded before /run/secrets/app_secrets; neither overrides variables already set
 *   - Blank values count as unset, so defaults apply (PORT="" -> 4000)
 *   - Numeric settings accept decimal digits only; "0x1F90" or "1e3" are invalid
 *   - LOCAL_DEV is kept raw; reload mode is decided by core/launch/config.ts
 *   - Fails fast with EnvValidationError listing missing and invalid keys
 * Side-effects: Reads process.env and env files; stats LOG_FILE
 * Links: README.md (configuration table), Dockerfile
 * @public
 */

import { existsSync, statSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { config as loadDotenv } from "dotenv";
import { ZodError, z } from "zod";

import { DEFAULT_PORT } from "../core/launch/public.js";
import {
  blankToUndefined,
  normalizeLogLevel,
  parseFlag,
} from "../shared/env-values.js";

export const DOTENV_PATH = ".env";
export const SECRETS_PATH = "/run/secrets/app_secrets";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta, details: string) {
    super(`Invalid environment configuration:\n${details}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

export function isEnvValidationError(
  error: unknown
): error is EnvValidationError {
  return error instanceof Error && error.name === "EnvValidationError";
}

function optionalString() {
  return z.preprocess(blankToUndefined, z.string().optional());
}

const DECIMAL_DIGITS = /^\d+$/;

/** Digits only: hex, exponent and fractional spellings are rejected, not rewritten */
function decimalInt(range: z.ZodNumber, fallback: number) {
  return z.preprocess(
    blankToUndefined,
    z
      .string()
      .regex(DECIMAL_DIGITS, "must be a decimal integer")
      .pipe(z.coerce.number().pipe(range))
      .default(String(fallback))
  );
}

function positiveInt(fallback: number) {
  return decimalInt(z.number().int().positive(), fallback);
}

function logFileProblem(path: string): string | undefined {
  const absolute = resolve(path);
  if (existsSync(absolute) && statSync(absolute).isDirectory()) {
    return `LOG_FILE must not be a directory: ${absolute}`;
  }
  const directory = dirname(absolute);
  if (!existsSync(directory) || !statSync(directory).isDirectory()) {
    return `LOG_FILE must be in an existing directory: ${absolute}`;
  }
  return undefined;
}

const EnvSchema = z.object({
  NODE_ENV: z.preprocess(
    blankToUndefined,
    z.enum(["development", "test", "production"]).default("development")
  ),

  /** Local development flag - any non-empty value enables reload mode */
  LOCAL_DEV: z.string().optional(),

  /** Listening port of the app server (default: 4000) */
  PORT: decimalInt(z.number().int().min(1).max(65535), DEFAULT_PORT),

  /** Interface whose first IPv4 address is bound (default: eth0) */
  NETWORK_INTERFACE: z.preprocess(
    blankToUndefined,
    z.string().default("eth0")
  ),

  /** Interface enumeration backend: node:os or the iproute2 binary */
  ADDRESS_SOURCE: z.preprocess(
    blankToUndefined,
    z.enum(["os", "ip"]).default("os")
  ),

  ADDRESS_QUERY_TIMEOUT_MS: positiveInt(5000),

  /** Launch target override (default: bundled server/main) */
  APP_ENTRY: optionalString(),

  /** Tree watched in reload mode (default: launcher source root) */
  RELOAD_WATCH_PATH: optionalString(),

  RELOAD_DEBOUNCE_MS: positiveInt(300),

  /** Grace period between forwarding a stop signal and SIGKILL */
  SHUTDOWN_GRACE_MS: positiveInt(10_000),

  LOG_LEVEL: z.preprocess(
    (value) => {
      const raw = blankToUndefined(value);
      return typeof raw === "string" ? (normalizeLogLevel(raw) ?? raw) : raw;
    },
    z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info")
  ),

  /** Mirror log file; its directory must already exist */
  LOG_FILE: optionalString().superRefine((value, ctx) => {
    if (value === undefined) return;
    const problem = logFileProblem(value);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
    }
  }),

  /** 0/false/no/off disables the LOG_FILE sink (default: enabled) */
  ENABLE_LOGGING: z
    .string()
    .optional()
    .transform((value) => parseFlag(value, true)),

  /** Service name for logging (default: launcher) */
  SERVICE_NAME: z.preprocess(blankToUndefined, z.string().default("launcher")),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Load .env then the container secrets file into `target`.
 * Missing files are skipped; unreadable or malformed files throw.
 * @returns the paths that were loaded
 */
export function loadEnvFiles(
  options: {
    dotenvPath?: string;
    secretsPath?: string;
    /** Load into this object instead of process.env */
    target?: Record<string, string>;
  } = {}
): string[] {
  const paths = [
    options.dotenvPath ?? DOTENV_PATH,
    options.secretsPath ?? SECRETS_PATH,
  ];
  const loaded: string[] = [];

  for (const path of paths) {
    if (!existsSync(path)) continue;
    const result = options.target
      ? loadDotenv({ path, processEnv: options.target })
      : loadDotenv({ path });
    if (result.error) {
      throw result.error;
    }
    loaded.push(path);
  }
  return loaded;
}

/**
 * Validate a raw environment. Pure apart from the LOG_FILE stat.
 * @throws EnvValidationError
 */
export function parseEnv(raw: NodeJS.ProcessEnv): Env {
  try {
    return EnvSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const missing = new Set<string>();
      const invalid = new Set<string>();

      for (const issue of error.issues) {
        const key = issue.path[0]?.toString();
        if (!key) continue;
        if (issue.code === "invalid_type" && issue.received === "undefined") {
          missing.add(key);
        } else {
          invalid.add(key);
        }
      }

      const details = error.issues
        .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
        .join("\n");

      throw new EnvValidationError(
        { code: "INVALID_ENV", missing: [...missing], invalid: [...invalid] },
        details
      );
    }
    throw error;
  }
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
