// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/ports/file-watcher`
 * Purpose: Source tree change notifications for reload mode.
 * Scope: Contract only.
 * Side-effects: none (interface definition only)
 * @public
 */

export interface WatchHandle {
  close(): void;
}

export interface FileWatcherPort {
  /** `onChange` receives the changed path relative to `root` */
  watch(root: string, onChange: (path: string) => void): WatchHandle;
}
