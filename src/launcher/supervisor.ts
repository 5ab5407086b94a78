// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/launcher/supervisor`
 * Purpose: Spawn and supervise the app server process - signal forwarding, reload restarts, exit status reporting.
 * Scope: Owns the child process lifecycle. Does not resolve configuration or touch process.exit.
 * Invariants:
 *   - The server's exit code passes through unchanged; death by signal N maps to 128 + N
 *   - A spawn error before the child started resolves as `failed` with exit code 1
 *   - Reload mode: the watch is in place before the first spawn; if it throws, start() throws and nothing is spawned
 *   - stop() is idempotent; SIGKILL follows after shutdownGraceMs if the child is still alive
 *   - Reload mode: changes are debounced, the child gets SIGTERM and is re-spawned with the same invocation;
 *     an unexpected exit leaves the supervisor waiting for the next change instead of finishing
 *   - `done` resolves exactly once
 * Side-effects: IO (via ProcessRunnerPort and FileWatcherPort), timers
 * Links: ports/process-runner.port.ts, ports/file-watcher.port.ts, launcher/launch.ts
 * @public
 */

import { constants } from "node:os";

import {
  type ChildExit,
  exitCodeFor,
  type ServerInvocation,
} from "../core/launch/public.js";
import type { Logger } from "../observability/logger.js";
import type {
  ChildHandle,
  FileWatcherPort,
  ProcessRunnerPort,
  WatchHandle,
} from "../ports/index.js";

export interface SupervisorDeps {
  runner: ProcessRunnerPort;
  watcher: FileWatcherPort;
  logger: Logger;
  /** Signal name → number, for 128 + N exit codes (default: os.constants.signals) */
  signalNumbers?: Readonly<Partial<Record<NodeJS.Signals, number>>>;
}

export interface SupervisorOptions {
  invocation: ServerInvocation;
  reload: {
    enabled: boolean;
    watchPath: string;
    debounceMs: number;
  };
  shutdownGraceMs: number;
  /** Called once, when the first child process has started */
  onFirstSpawn?: () => void;
}

export type SupervisionOutcome =
  | {
      kind: "exited";
      exitCode: number;
      /** null when stopped while no child was running (reload mode) */
      exit: ChildExit | null;
      restarts: number;
    }
  | { kind: "failed"; exitCode: 1; error: Error };

type Timer = ReturnType<typeof setTimeout>;

export class ProcessSupervisor {
  readonly done: Promise<SupervisionOutcome>;

  private resolveDone: (outcome: SupervisionOutcome) => void = () =>
    undefined;
  private child: ChildHandle | undefined;
  private watchHandle: WatchHandle | undefined;
  private debounceTimer: Timer | undefined;
  private killTimer: Timer | undefined;
  private lastExit: ChildExit | null = null;
  private started = false;
  private everSpawned = false;
  private restartPending = false;
  private stopping = false;
  private settled = false;
  private restartCount = 0;

  constructor(
    private readonly deps: SupervisorDeps,
    private readonly options: SupervisorOptions
  ) {
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  get restarts(): number {
    return this.restartCount;
  }

  start(): void {
    if (this.started) {
      throw new Error("ProcessSupervisor already started");
    }
    this.started = true;

    // Watch before spawning so a failed watch leaves no child behind
    const { reload } = this.options;
    if (reload.enabled) {
      this.watchHandle = this.deps.watcher.watch(reload.watchPath, (path) =>
        this.scheduleRestart(path)
      );
      this.deps.logger.info(
        { watchPath: reload.watchPath, debounceMs: reload.debounceMs },
        "Reload mode enabled, watching for source changes"
      );
    }

    this.spawnChild();
  }

  /** Forward `signal` to the server and stop supervising. Resolve via `done`. */
  stop(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.stopping || this.settled) return;
    this.stopping = true;
    this.restartPending = false;
    this.clearDebounce();
    this.closeWatch();

    const child = this.child;
    if (!child) {
      this.finish({
        kind: "exited",
        exitCode: this.lastExit ? this.exitCodeOf(this.lastExit) : 0,
        exit: this.lastExit,
        restarts: this.restartCount,
      });
      return;
    }

    this.deps.logger.info(
      { signal, pid: child.pid },
      "Forwarding signal to server process"
    );
    child.kill(signal);
    this.armKillTimer(child);
  }

  private spawnChild(): void {
    const { logger } = this.deps;
    const child = this.deps.runner.spawn(this.options.invocation);
    this.child = child;
    let spawned = false;

    child.onSpawn(() => {
      spawned = true;
      logger.info(
        { pid: child.pid, restarts: this.restartCount },
        "Server process started"
      );
      if (!this.everSpawned) {
        this.everSpawned = true;
        this.options.onFirstSpawn?.();
      }
    });

    child.onError((error) => {
      if (!spawned) {
        if (this.child === child) this.child = undefined;
        this.finish({ kind: "failed", exitCode: 1, error });
        return;
      }
      logger.error({ err: error, pid: child.pid }, "Server process error");
    });

    child.onExit((exit) => this.handleExit(child, exit));
  }

  private handleExit(child: ChildHandle, exit: ChildExit): void {
    if (child !== this.child || this.settled) return;
    const { logger } = this.deps;
    this.child = undefined;
    this.lastExit = exit;
    this.clearKillTimer();

    if (this.restartPending && !this.stopping) {
      this.restartPending = false;
      this.restartCount += 1;
      logger.info(
        { code: exit.code, signal: exit.signal, restarts: this.restartCount },
        "Restarting server process"
      );
      this.spawnChild();
      return;
    }

    const exitCode = this.exitCodeOf(exit);

    if (this.options.reload.enabled && !this.stopping) {
      logger.warn(
        { code: exit.code, signal: exit.signal, exitCode },
        "Server process exited, waiting for source changes"
      );
      return;
    }

    logger[exitCode === 0 ? "info" : "warn"](
      { code: exit.code, signal: exit.signal, exitCode },
      "Server process exited"
    );
    this.finish({
      kind: "exited",
      exitCode,
      exit,
      restarts: this.restartCount,
    });
  }

  private scheduleRestart(path: string): void {
    if (this.stopping || this.settled) return;
    this.clearDebounce();
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = undefined;
      this.restart(path);
    }, this.options.reload.debounceMs);
  }

  private restart(path: string): void {
    if (this.stopping || this.settled) return;
    this.deps.logger.info({ path }, "Source change detected");

    const child = this.child;
    if (!child) {
      this.restartCount += 1;
      this.spawnChild();
      return;
    }
    if (this.restartPending) return;
    this.restartPending = true;
    child.kill("SIGTERM");
    this.armKillTimer(child);
  }

  private armKillTimer(child: ChildHandle): void {
    this.clearKillTimer();
    this.killTimer = setTimeout(() => {
      this.killTimer = undefined;
      if (this.child !== child) return;
      this.deps.logger.warn(
        { pid: child.pid, graceMs: this.options.shutdownGraceMs },
        "Server process did not exit in time, sending SIGKILL"
      );
      child.kill("SIGKILL");
    }, this.options.shutdownGraceMs);
  }

  private exitCodeOf(exit: ChildExit): number {
    return exitCodeFor(exit, this.deps.signalNumbers ?? constants.signals);
  }

  private finish(outcome: SupervisionOutcome): void {
    if (this.settled) return;
    this.settled = true;
    this.clearDebounce();
    this.clearKillTimer();
    this.closeWatch();
    this.resolveDone(outcome);
  }

  private clearDebounce(): void {
    if (this.debounceTimer !== undefined) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = undefined;
    }
  }

  private clearKillTimer(): void {
    if (this.killTimer !== undefined) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
  }

  private closeWatch(): void {
    this.watchHandle?.close();
    this.watchHandle = undefined;
  }
}
