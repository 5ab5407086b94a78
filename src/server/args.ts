// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/server/args`
 * Purpose: Parse the app server command line produced by the launcher (--host, --port, --reload).
 * Scope: Argument parsing and validation. Does not bind anything.
 * Invariants: An empty host or a non-numeric port is a startup failure of the server, reported as ServerArgsError.
 * Side-effects: none
 * Links: core/launch/invocation.ts (buildServerArgs)
 * @public
 */

import { parseArgs } from "node:util";

import { z } from "zod";

export class ServerArgsError extends Error {
  public readonly code = "INVALID_SERVER_ARGS" as const;

  constructor(message: string) {
    super(`Invalid app server arguments: ${message}`);
    this.name = "ServerArgsError";
  }
}

export function isServerArgsError(error: unknown): error is ServerArgsError {
  return error instanceof Error && error.name === "ServerArgsError";
}

const ServerArgsSchema = z.object({
  host: z.string().min(1, "host is required"),
  port: z
    .string()
    .regex(/^\d+$/, "port must be a decimal integer")
    .pipe(z.coerce.number().int().min(1).max(65535)),
  reload: z.boolean(),
});

export type ServerArgs = z.infer<typeof ServerArgsSchema>;

export function parseServerArgs(argv: readonly string[]): ServerArgs {
  let values: { host?: string; port?: string; reload?: boolean };
  try {
    ({ values } = parseArgs({
      args: [...argv],
      options: {
        host: { type: "string" },
        port: { type: "string" },
        reload: { type: "boolean", default: false },
      },
      strict: true,
      allowPositionals: false,
    }));
  } catch (err) {
    throw new ServerArgsError(err instanceof Error ? err.message : String(err));
  }

  const result = ServerArgsSchema.safeParse({
    host: values.host ?? "",
    port: values.port ?? "",
    reload: values.reload ?? false,
  });
  if (!result.success) {
    throw new ServerArgsError(
      result.error.errors
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; ")
    );
  }
  return result.data;
}
