// ============================================
// Filesystem Watcher Types
// ============================================

import type { Logger } from "../logger/logger.js";

// ============================================
// Event Types
// ============================================

/**
 * Kind of logical change reported downstream.
 */
export type WatcherEventType = "created" | "modified" | "deleted" | "moved";

/**
 * A classified filesystem change. Frozen once constructed and plain data, so
 * it can be posted across a message channel unchanged.
 */
export interface WatcherEvent {
  readonly eventType: WatcherEventType;
  /** Absolute path of the affected file or directory */
  readonly filePath: string;
  /** Epoch milliseconds at which the raw notification was observed */
  readonly timestamp: number;
  readonly isDirectory: boolean;
}

/**
 * Called with each coalesced event. May return a promise; rejections are logged.
 */
export type WatchCallback = (event: WatcherEvent) => void | Promise<void>;

// ============================================
// Subscription Source
// ============================================

/**
 * Options handed to a {@link WatchFactory}.
 */
export interface WatchSourceOptions {
  recursive: boolean;
  ignored: (filePath: string) => boolean;
  awaitWriteFinish: boolean;
}

/**
 * Minimal surface of an OS-level subscription (chokidar in production).
 */
export interface WatchSource {
  /** Raw notifications: chokidar event name plus path */
  onEvent(listener: (eventName: string, filePath: string) => void): void;
  /** Initial scan finished; events after this are live */
  onReady(listener: () => void): void;
  onError(listener: (error: unknown) => void): void;
  close(): Promise<void>;
}

export type WatchFactory = (root: string, options: WatchSourceOptions) => WatchSource;

// ============================================
// Configuration Types
// ============================================

/**
 * Options for creating a FilesystemWatcher.
 */
export interface FilesystemWatcherOptions {
  /** Root directory (or single file) to watch */
  root: string;
  /** Whether to watch subdirectories recursively (default: true) */
  recursive?: boolean;
  /** Quiet period in milliseconds before a burst is emitted (default: 150) */
  debounceMs?: number;
  /** Additional glob patterns to ignore, relative to root */
  ignore?: string[];
  /** Wait for file writes to stabilize before reporting (default: false) */
  awaitWriteFinish?: boolean;
  /** Upper bound for closing the subscription on stop (default: 2000) */
  closeTimeoutMs?: number;
  /** Subscription factory (default: chokidar) */
  watchFactory?: WatchFactory;
  logger?: Logger;
  /** Human-readable name used in log messages */
  name?: string;
}

/**
 * Default ignore patterns for directories that never hold previewable content.
 */
export const DEFAULT_WATCH_IGNORE_PATTERNS: readonly string[] = [
  "**/node_modules",
  "**/node_modules/**",
  "**/.git",
  "**/.git/**",
  "**/.cache/**",
  "**/*.swp",
  "**/*~",
  "**/.DS_Store",
  "**/Thumbs.db",
];

// ============================================
// State Types
// ============================================

export type WatcherStatus = "stopped" | "starting" | "running" | "stopping";

/**
 * Watcher state information.
 */
export interface WatcherState {
  status: WatcherStatus;
  /** Number of paths waiting for their debounce window to close */
  pendingEvents: number;
  startedAt?: number;
  /** Number of coalesced events delivered to the callback */
  eventCount: number;
  lastError?: Error;
}
