// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tunedrop/launcher/adapters/process/fs-watcher`
 * Purpose: FileWatcherPort backed by recursive node:fs watch.
 * Scope: Emits changed paths under a root, minus dependency and VCS noise. Does not debounce (see supervisor).
 * Side-effects: IO (filesystem watch handles)
 * @internal
 */

import { watch } from "node:fs";

import type { Logger } from "../../observability/logger.js";
import type { FileWatcherPort, WatchHandle } from "../../ports/index.js";

const IGNORED_SEGMENTS = new Set(["node_modules", ".git"]);

export function isIgnoredChange(path: string): boolean {
  if (path.endsWith(".map") || path.endsWith("~")) return true;
  return path.split(/[\\/]/).some((segment) => IGNORED_SEGMENTS.has(segment));
}

/** The slice of fs.FSWatcher the adapter uses */
export interface WatchSubscription {
  on(event: "error", listener: (error: Error) => void): unknown;
  close(): void;
}

export type WatchFn = (
  root: string,
  options: { recursive: boolean },
  listener: (event: string, filename: string | null) => void
) => WatchSubscription;

export class FsFileWatcher implements FileWatcherPort {
  constructor(
    private readonly logger: Logger,
    private readonly watchFn: WatchFn = (root, options, listener) =>
      watch(root, options, listener)
  ) {}

  watch(root: string, onChange: (path: string) => void): WatchHandle {
    const watcher = this.watchFn(
      root,
      { recursive: true },
      (_event, filename) => {
        if (!filename || isIgnoredChange(filename)) return;
        onChange(filename);
      }
    );
    watcher.on("error", (err) => {
      this.logger.warn({ err, root }, "File watcher error; reload disabled");
      watcher.close();
    });
    return { close: () => watcher.close() };
  }
}
