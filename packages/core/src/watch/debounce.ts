// ============================================
// Debounce Aggregator
// ============================================
// Coalesces bursts of raw filesystem events into one event per path.
// Keyed per distinct path: each path has its own sliding window, so
// unrelated files changing together each produce their own event.

import { DEFAULT_DEBOUNCE_MS } from "../config/defaults.js";
import { createSilentLogger } from "../logger/factory.js";
import type { Logger } from "../logger/logger.js";
import { isWellFormedEvent } from "./event.js";
import type { WatcherEvent } from "./types.js";

/**
 * Options for DebounceAggregator.
 */
export interface DebounceAggregatorOptions {
  /** Quiet period in milliseconds (default: 150) */
  debounceMs?: number;
  logger?: Logger;
}

interface PendingChange {
  event: WatcherEvent;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Sliding-window debouncer for watcher events.
 *
 * Every pushed event replaces the pending event for its path and restarts that
 * path's timer. When a timer elapses uninterrupted, `onFire` receives the
 * last-seen event for the path, exactly once.
 *
 * @example
 * ```typescript
 * const aggregator = new DebounceAggregator((event) => notify(event), { debounceMs: 150 });
 * aggregator.push(createWatcherEvent("modified", "/docs/a.md"));
 * aggregator.push(createWatcherEvent("modified", "/docs/a.md"));
 * // 150ms later: notify() called once
 * ```
 */
export class DebounceAggregator {
  readonly debounceMs: number;

  private readonly pending = new Map<string, PendingChange>();
  private readonly logger: Logger;
  private disposed = false;

  constructor(
    private readonly onFire: (event: WatcherEvent) => void,
    options: DebounceAggregatorOptions = {}
  ) {
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Number of paths currently inside their quiet window.
   */
  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Record a raw event. Malformed events are logged and dropped.
   *
   * @returns whether the event was accepted
   */
  push(event: WatcherEvent): boolean {
    if (this.disposed) {
      return false;
    }

    if (!isWellFormedEvent(event)) {
      this.logger.warn("Dropping malformed watcher event", { event });
      return false;
    }

    const key = event.filePath;
    const existing = this.pending.get(key);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const timer = setTimeout(() => this.fire(key), this.debounceMs);
    this.pending.set(key, { event, timer });
    return true;
  }

  /**
   * Drop all pending events without emitting them.
   *
   * @returns number of events discarded
   */
  cancelAll(): number {
    const count = this.pending.size;
    for (const change of this.pending.values()) {
      clearTimeout(change.timer);
    }
    this.pending.clear();
    return count;
  }

  /**
   * Cancel pending events and refuse further input.
   */
  dispose(): void {
    this.cancelAll();
    this.disposed = true;
  }

  private fire(key: string): void {
    const change = this.pending.get(key);
    if (!change) {
      return;
    }
    this.pending.delete(key);

    try {
      this.onFire(change.event);
    } catch (error) {
      this.logger.error("Debounced event handler failed", { path: key, error });
    }
  }
}
