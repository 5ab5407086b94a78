// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/ports`
 * Purpose: Port interfaces - canonical import surface.
 * Scope: Re-exports port interfaces. Does not export implementations.
 * Invariants: Named exports only, no export *
 * Side-effects: none
 * @public
 */

export type { FileWatcherPort, WatchHandle } from "./file-watcher.port.js";
export type { NetworkInterfacesPort } from "./network-interfaces.port.js";
export type { ChildHandle, ProcessRunnerPort } from "./process-runner.port.js";
