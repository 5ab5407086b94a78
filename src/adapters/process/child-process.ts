// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/process/child-process`
 * Purpose: ProcessRunnerPort backed by node:child_process spawn (no shell).
 * Scope: Starts the process and relays its lifecycle events. Does not restart or translate exit codes.
 * Invariants: stdio inherited by default so server output reaches the container log unchanged.
 * Side-effects: IO (subprocess execution)
 * Links: ports/process-runner.port.ts, launcher/supervisor.ts
 * @internal
 */

import { type ChildProcess, type StdioOptions, spawn } from "node:child_process";

import type { ChildExit, ServerInvocation } from "../../core/launch/public.js";
import type { ChildHandle, ProcessRunnerPort } from "../../ports/index.js";

export interface ChildProcessRunnerConfig {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdio?: StdioOptions;
}

export class ChildProcessRunner implements ProcessRunnerPort {
  constructor(private readonly config: ChildProcessRunnerConfig = {}) {}

  spawn(invocation: ServerInvocation): ChildHandle {
    const child = spawn(invocation.command, [...invocation.args], {
      stdio: this.config.stdio ?? "inherit",
      env: this.config.env ?? process.env,
      cwd: this.config.cwd,
    });
    return new ChildProcessHandle(child);
  }
}

class ChildProcessHandle implements ChildHandle {
  constructor(private readonly child: ChildProcess) {}

  get pid(): number | undefined {
    return this.child.pid;
  }

  kill(signal: NodeJS.Signals): boolean {
    return this.child.kill(signal);
  }

  onSpawn(listener: () => void): void {
    this.child.once("spawn", listener);
  }

  onExit(listener: (exit: ChildExit) => void): void {
    this.child.once("exit", (code, signal) => listener({ code, signal }));
  }

  onError(listener: (error: Error) => void): void {
    this.child.on("error", listener);
  }
}
