// ============================================
// Filesystem Watching - Barrel Export
// ============================================

export { DebounceAggregator, type DebounceAggregatorOptions } from "./debounce.js";
export {
  classifyRawEvent,
  createWatcherEvent,
  isMarkdownFile,
  isWellFormedEvent,
  shouldTriggerReload,
} from "./event.js";
export {
  DEFAULT_WATCH_IGNORE_PATTERNS,
  type FilesystemWatcherOptions,
  type WatchCallback,
  type WatcherEvent,
  type WatcherEventType,
  type WatcherState,
  type WatcherStatus,
  type WatchFactory,
  type WatchSource,
  type WatchSourceOptions,
} from "./types.js";
export { chokidarWatchFactory, createIgnoreMatcher, createWatcher, FilesystemWatcher } from "./watcher.js";
