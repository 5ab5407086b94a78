// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/process`
 * Purpose: Process and file-watch adapters barrel.
 * Side-effects: none
 * @internal
 */

export {
  ChildProcessRunner,
  type ChildProcessRunnerConfig,
} from "./child-process.js";
export {
  FsFileWatcher,
  isIgnoredChange,
  type WatchFn,
  type WatchSubscription,
} from "./fs-watcher.js";
