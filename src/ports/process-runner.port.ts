// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/ports/process-runner`
 * Purpose: Spawn boundary for the supervised server process.
 * Scope: Contract only. Does not decide restarts or exit codes (see launcher/supervisor.ts).
 * Invariants:
 *   - onSpawn fires at most once, before onExit
 *   - onError without a prior onSpawn means the process never started
 * Side-effects: none (interface definition only)
 * @public
 */

import type { ChildExit, ServerInvocation } from "../core/launch/public.js";

export interface ChildHandle {
  readonly pid: number | undefined;
  kill(signal: NodeJS.Signals): boolean;
  onSpawn(listener: () => void): void;
  onExit(listener: (exit: ChildExit) => void): void;
  onError(listener: (error: Error) => void): void;
}

export interface ProcessRunnerPort {
  spawn(invocation: ServerInvocation): ChildHandle;
}
