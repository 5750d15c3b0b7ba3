// ============================================
// Watcher Events
// ============================================

import * as path from "node:path";
import { MARKDOWN_EXTENSIONS } from "../config/defaults.js";
import type { WatcherEvent, WatcherEventType } from "./types.js";

const EVENT_TYPES: ReadonlySet<string> = new Set<WatcherEventType>(["created", "modified", "deleted", "moved"]);

/** Path segments whose contents affect every rendered page */
const RELOAD_SEGMENTS = ["templates", "static"] as const;

/**
 * Create a frozen WatcherEvent.
 *
 * @throws TypeError when the path is not absolute or the timestamp is not finite
 */
export function createWatcherEvent(
  eventType: WatcherEventType,
  filePath: string,
  timestamp: number = Date.now(),
  isDirectory = false
): WatcherEvent {
  const event = { eventType, filePath, timestamp, isDirectory };
  if (!isWellFormedEvent(event)) {
    throw new TypeError(`Malformed watcher event for "${filePath}"`);
  }
  return Object.freeze(event);
}

/**
 * Runtime check for values arriving from outside the type system
 * (raw notifications, message ports).
 */
export function isWellFormedEvent(value: unknown): value is WatcherEvent {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.eventType === "string" &&
    EVENT_TYPES.has(candidate.eventType) &&
    typeof candidate.filePath === "string" &&
    candidate.filePath.length > 0 &&
    !candidate.filePath.includes("\0") &&
    path.isAbsolute(candidate.filePath) &&
    typeof candidate.timestamp === "number" &&
    Number.isFinite(candidate.timestamp) &&
    typeof candidate.isDirectory === "boolean"
  );
}

/**
 * Map a chokidar event name to a WatcherEvent type.
 * Returns undefined for names that are not filesystem changes (`raw`, `ready`, `error`).
 * Renames arrive from chokidar as a delete followed by a create.
 */
export function classifyRawEvent(
  eventName: string
): { eventType: WatcherEventType; isDirectory: boolean } | undefined {
  switch (eventName) {
    case "add":
      return { eventType: "created", isDirectory: false };
    case "addDir":
      return { eventType: "created", isDirectory: true };
    case "change":
      return { eventType: "modified", isDirectory: false };
    case "unlink":
      return { eventType: "deleted", isDirectory: false };
    case "unlinkDir":
      return { eventType: "deleted", isDirectory: true };
    default:
      return undefined;
  }
}

/**
 * Whether the event concerns a Markdown file (`.md` / `.markdown`, any case).
 */
export function isMarkdownFile(event: Pick<WatcherEvent, "filePath">): boolean {
  return MARKDOWN_EXTENSIONS.has(path.extname(event.filePath).toLowerCase());
}

/**
 * Whether the event should reload open pages: Markdown files, or anything
 * under a `templates` or `static` path segment.
 */
export function shouldTriggerReload(event: Pick<WatcherEvent, "filePath">): boolean {
  if (isMarkdownFile(event)) {
    return true;
  }
  const segments = event.filePath.split(/[\\/]+/);
  return RELOAD_SEGMENTS.some((segment) => segments.includes(segment));
}
