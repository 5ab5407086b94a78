// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/core/launch/lifecycle`
 * Purpose: Launcher state machine.
 * Scope: Tracks and validates transitions. Does not perform any launch step.
 * Invariants:
 *   - NOT_STARTED -> LAUNCHING | FAILED; LAUNCHING -> RUNNING | FAILED; RUNNING -> EXITED
 *   - FAILED and EXITED are terminal; there are no recovery transitions
 * Side-effects: none
 * @public
 */

import { IllegalStateTransitionError } from "./errors.js";
import type { LauncherState } from "./model.js";

const TRANSITIONS: Readonly<Record<LauncherState, readonly LauncherState[]>> =
  {
    NOT_STARTED: ["LAUNCHING", "FAILED"],
    LAUNCHING: ["RUNNING", "FAILED"],
    RUNNING: ["EXITED"],
    FAILED: [],
    EXITED: [],
  };

export function canTransition(from: LauncherState, to: LauncherState): boolean {
  return TRANSITIONS[from].includes(to);
}

export type TransitionListener = (
  from: LauncherState,
  to: LauncherState
) => void;

export class LaunchLifecycle {
  private state: LauncherState = "NOT_STARTED";
  private readonly visited: LauncherState[] = ["NOT_STARTED"];

  constructor(private readonly onTransition?: TransitionListener) {}

  get current(): LauncherState {
    return this.state;
  }

  get history(): readonly LauncherState[] {
    return this.visited;
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.state].length === 0;
  }

  /** @throws IllegalStateTransitionError */
  to(next: LauncherState): void {
    if (!canTransition(this.state, next)) {
      throw new IllegalStateTransitionError(this.state, next);
    }
    const previous = this.state;
    this.state = next;
    this.visited.push(next);
    this.onTransition?.(previous, next);
  }
}
