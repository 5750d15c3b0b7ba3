// ============================================
// Server State
// ============================================
// Everything a running preview server owns, built once at startup and passed
// by reference. Teardown order lives in PreviewServer.stop().

import * as fs from "node:fs";
import * as path from "node:path";
import {
  canonicalizePath,
  ConnectionRegistry,
  EventBridge,
  FilesystemWatcher,
  type Logger,
  MarkedRenderer,
  RenderCache,
  type Renderer,
  type ServerConfig,
  type WatchFactory,
} from "@mdlive/core";

export type ServeMode = "file" | "directory";

export interface ServerState {
  readonly config: ServerConfig;
  readonly mode: ServeMode;
  /** Canonical directory every request path is validated against */
  readonly validationRoot: string;
  /** Canonical path of the served file or directory */
  readonly servePath: string;
  readonly renderer: Renderer;
  readonly renderCache: RenderCache;
  readonly registry: ConnectionRegistry;
  /** Null when live reload is disabled */
  readonly bridge: EventBridge | null;
  /** Null when live reload is disabled */
  readonly watcher: FilesystemWatcher | null;
  readonly logger: Logger;
}

export interface CreateServerStateOptions {
  logger: Logger;
  renderer?: Renderer;
  watchFactory?: WatchFactory;
}

/**
 * Build the server state for a loaded configuration.
 *
 * In file mode the validation root is the file's directory, so sibling
 * documents linked from the served file stay reachable.
 */
export function createServerState(config: ServerConfig, options: CreateServerStateOptions): ServerState {
  const servePath = canonicalizePath(path.resolve(config.servePath));
  const mode: ServeMode = fs.statSync(servePath).isDirectory() ? "directory" : "file";
  const validationRoot = mode === "directory" ? servePath : path.dirname(servePath);
  const { logger } = options;

  const reload = config.reloadEnabled;

  return {
    config,
    mode,
    validationRoot,
    servePath,
    renderer: options.renderer ?? new MarkedRenderer({ logger: logger.child({ component: "renderer" }) }),
    renderCache: new RenderCache({ maxSize: config.renderCacheSize }),
    registry: new ConnectionRegistry({
      keepaliveIntervalMs: config.keepaliveIntervalMs,
      keepaliveTimeoutMs: config.keepaliveTimeoutMs,
      logger: logger.child({ component: "registry" }),
    }),
    bridge: reload
      ? new EventBridge({ timeoutMs: config.bridgeTimeoutMs, logger: logger.child({ component: "bridge" }) })
      : null,
    watcher: reload
      ? new FilesystemWatcher({
          root: validationRoot,
          recursive: config.recursive,
          debounceMs: config.debounceMs,
          watchFactory: options.watchFactory,
          logger: logger.child({ component: "watcher" }),
          name: "FilesystemWatcher",
        })
      : null,
    logger,
  };
}
