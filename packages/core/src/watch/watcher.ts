// ============================================
// Filesystem Watcher
// ============================================
// Subscribes to OS notifications under a root via chokidar, classifies
// them into WatcherEvents and debounces them per path. Everything here
// belongs to the watcher domain: its only way into the network side is
// the callback, which the server wires to the EventBridge.

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { watch } from "chokidar";
import picomatch from "picomatch";

import { DEFAULT_DEBOUNCE_MS } from "../config/defaults.js";
import { toError, WatcherIOError } from "../errors/index.js";
import { createSilentLogger } from "../logger/factory.js";
import type { Logger } from "../logger/logger.js";
import { DebounceAggregator } from "./debounce.js";
import { classifyRawEvent, createWatcherEvent } from "./event.js";
import {
  DEFAULT_WATCH_IGNORE_PATTERNS,
  type FilesystemWatcherOptions,
  type WatchCallback,
  type WatcherEvent,
  type WatcherState,
  type WatcherStatus,
  type WatchFactory,
  type WatchSource,
} from "./types.js";

// ============================================
// Constants
// ============================================

/** Default upper bound for closing the subscription: 2s */
const DEFAULT_CLOSE_TIMEOUT_MS = 2000;

/** Stability threshold for write finish: 100ms */
const STABILITY_THRESHOLD = 100;

/** Poll interval for write stability: 50ms */
const STABILITY_POLL_INTERVAL = 50;

// ============================================
// Helpers
// ============================================

/**
 * Build an ignore predicate from glob patterns evaluated against the path
 * relative to root (forward slashes).
 */
export function createIgnoreMatcher(root: string, patterns: readonly string[]): (filePath: string) => boolean {
  const matchers = patterns.map((pattern) => picomatch(pattern, { dot: true }));

  return (filePath: string) => {
    const relative = path.relative(root, path.resolve(root, filePath)).replaceAll("\\", "/");
    if (relative === "") {
      return false;
    }
    return matchers.some((match) => match(relative));
  };
}

/**
 * Default {@link WatchFactory} backed by chokidar.
 */
export const chokidarWatchFactory: WatchFactory = (root, options) => {
  const watcher = watch(root, {
    persistent: true,
    ignoreInitial: true,
    ignored: options.ignored,
    depth: options.recursive ? undefined : 0,
    awaitWriteFinish: options.awaitWriteFinish
      ? { stabilityThreshold: STABILITY_THRESHOLD, pollInterval: STABILITY_POLL_INTERVAL }
      : false,
  });

  return {
    onEvent: (listener) => {
      watcher.on("all", (eventName, filePath) => listener(eventName, filePath));
    },
    onReady: (listener) => {
      watcher.once("ready", () => listener());
    },
    onError: (listener) => {
      watcher.on("error", (error) => listener(error));
    },
    close: () => watcher.close(),
  };
};

function delay(ms: number): Promise<"timeout"> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve("timeout"), ms);
    timer.unref?.();
  });
}

// ============================================
// FilesystemWatcher Class
// ============================================

/**
 * Debounced filesystem watcher with a `stopped → running → stopped` lifecycle.
 *
 * - Raw notifications are classified into {@link WatcherEvent}s
 * - Events are coalesced per path by a {@link DebounceAggregator}
 * - Directories are observed too; filtering for reload-worthiness happens downstream
 * - Callback errors are logged and never stop the watcher
 *
 * @example
 * ```typescript
 * const watcher = new FilesystemWatcher({ root: '/docs', debounceMs: 150 });
 *
 * await watcher.start((event) => {
 *   if (shouldTriggerReload(event)) bridge.submit(event);
 * });
 *
 * // Later...
 * await watcher.stop();
 * ```
 */
export class FilesystemWatcher {
  readonly name: string;
  readonly root: string;
  readonly recursive: boolean;
  readonly debounceMs: number;
  readonly ignorePatterns: string[];
  readonly awaitWriteFinish: boolean;

  private readonly closeTimeoutMs: number;
  private readonly watchFactory: WatchFactory;
  private readonly logger: Logger;

  private source: WatchSource | null = null;
  private aggregator: DebounceAggregator | null = null;
  private callback: WatchCallback | null = null;
  private _status: WatcherStatus = "stopped";
  private _startedAt?: number;
  private _eventCount = 0;
  private _lastError?: Error;
  private startSettled: Promise<void> = Promise.resolve();
  private stopPromise: Promise<void> | null = null;

  constructor(options: FilesystemWatcherOptions) {
    this.root = path.resolve(options.root);
    this.name = options.name ?? `FilesystemWatcher(${path.basename(this.root)})`;
    this.recursive = options.recursive ?? true;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.ignorePatterns = [...DEFAULT_WATCH_IGNORE_PATTERNS, ...(options.ignore ?? [])];
    this.awaitWriteFinish = options.awaitWriteFinish ?? false;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
    this.watchFactory = options.watchFactory ?? chokidarWatchFactory;
    this.logger = options.logger ?? createSilentLogger();
  }

  get status(): WatcherStatus {
    return this._status;
  }

  get running(): boolean {
    return this._status === "running";
  }

  get state(): WatcherState {
    return {
      status: this._status,
      pendingEvents: this.aggregator?.pendingCount ?? 0,
      startedAt: this._startedAt,
      eventCount: this._eventCount,
      lastError: this._lastError,
    };
  }

  /**
   * Subscribe to changes under the root and resolve once the initial scan is done.
   *
   * @throws WatcherIOError if the root is missing or the subscription fails; the
   *   watcher is left stopped
   * @throws Error if the watcher is not stopped
   */
  async start(onChange: WatchCallback): Promise<void> {
    if (this._status !== "stopped") {
      throw new Error(`${this.name} is already ${this._status}`);
    }

    this._status = "starting";
    let settle: () => void = () => undefined;
    this.startSettled = new Promise<void>((resolve) => {
      settle = resolve;
    });

    try {
      await this.subscribe(onChange);
    } catch (error) {
      this._lastError = error instanceof WatcherIOError ? error : toError(error);
      await this.teardown();
      throw error instanceof WatcherIOError
        ? error
        : new WatcherIOError(`${this.name} failed to subscribe`, { cause: error });
    } finally {
      settle();
    }
  }

  /**
   * Stop watching. Pending debounced events are discarded, not emitted.
   * Idempotent; safe before start(). Resolves once the subscription is closed
   * or the close timeout has elapsed.
   */
  async stop(): Promise<void> {
    if (this._status === "starting") {
      await this.startSettled;
    }

    if (this._status === "stopped") {
      return;
    }

    if (this.stopPromise) {
      return this.stopPromise;
    }

    this._status = "stopping";
    this.stopPromise = this.teardown().finally(() => {
      this.stopPromise = null;
    });
    await this.stopPromise;
    this.logger.info(`${this.name} stopped`);
  }

  private async subscribe(onChange: WatchCallback): Promise<void> {
    try {
      await fs.stat(this.root);
    } catch (error) {
      throw new WatcherIOError(`${this.name} cannot watch a missing root`, { cause: error });
    }

    this.logger.debug(`Starting ${this.name}`, {
      root: this.root,
      recursive: this.recursive,
      debounceMs: this.debounceMs,
    });

    this.callback = onChange;
    this.aggregator = new DebounceAggregator((event) => this.dispatch(event), {
      debounceMs: this.debounceMs,
      logger: this.logger,
    });

    const source = this.watchFactory(this.root, {
      recursive: this.recursive,
      ignored: createIgnoreMatcher(this.root, this.ignorePatterns),
      awaitWriteFinish: this.awaitWriteFinish,
    });
    this.source = source;

    await new Promise<void>((resolve, reject) => {
      let settled = false;
      source.onReady(() => {
        if (!settled) {
          settled = true;
          resolve();
        }
      });
      source.onError((error) => {
        if (!settled) {
          settled = true;
          reject(new WatcherIOError(`${this.name} subscription failed`, { cause: error }));
          return;
        }
        this.handleError(error);
      });
      source.onEvent((eventName, filePath) => this.handleRaw(eventName, filePath));
    });

    this._status = "running";
    this._startedAt = Date.now();
    this.logger.info(`${this.name} ready`, { root: this.root });
  }

  /**
   * Release the aggregator and subscription; leaves the watcher stopped.
   */
  private async teardown(): Promise<void> {
    const discarded = this.aggregator?.pendingCount ?? 0;
    this.aggregator?.dispose();
    this.aggregator = null;
    this.callback = null;

    if (discarded > 0) {
      this.logger.debug(`${this.name} discarded pending events`, { count: discarded });
    }

    const source = this.source;
    this.source = null;

    if (source) {
      try {
        const outcome = await Promise.race([source.close().then(() => "closed" as const), delay(this.closeTimeoutMs)]);
        if (outcome === "timeout") {
          this.logger.warn(`${this.name} subscription did not close in time`, {
            timeoutMs: this.closeTimeoutMs,
          });
        }
      } catch (error) {
        this._lastError = new WatcherIOError(`${this.name} failed to close`, { cause: error });
        this.logger.error(`${this.name} failed to close`, { error });
      }
    }

    this._status = "stopped";
  }

  private handleRaw(eventName: string, filePath: string): void {
    if (this._status !== "running" || !this.aggregator) {
      return;
    }

    const classified = classifyRawEvent(eventName);
    if (!classified) {
      return;
    }

    let event: WatcherEvent;
    try {
      event = createWatcherEvent(
        classified.eventType,
        path.resolve(this.root, filePath),
        Date.now(),
        classified.isDirectory
      );
    } catch (error) {
      this.logger.warn(`${this.name} dropped unreadable event`, { eventName, error });
      return;
    }

    this.logger.trace(`${this.name} raw event`, {
      type: event.eventType,
      path: path.relative(this.root, event.filePath),
    });
    this.aggregator.push(event);
  }

  private dispatch(event: WatcherEvent): void {
    const callback = this.callback;
    if (this._status !== "running" || !callback) {
      return;
    }

    this._eventCount++;

    try {
      const result = callback(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.handleCallbackError(event, error));
      }
    } catch (error) {
      this.handleCallbackError(event, error);
    }
  }

  private handleCallbackError(event: WatcherEvent, error: unknown): void {
    this._lastError = toError(error);
    this.logger.error(`${this.name} change callback failed`, { path: event.filePath, error });
  }

  private handleError(error: unknown): void {
    const err = new WatcherIOError(`${this.name} error`, { cause: error });
    this._lastError = err;
    this.logger.error(`${this.name} error`, { error: toError(error) });
  }
}

/**
 * Create a new FilesystemWatcher instance.
 */
export function createWatcher(options: FilesystemWatcherOptions): FilesystemWatcher {
  return new FilesystemWatcher(options);
}
