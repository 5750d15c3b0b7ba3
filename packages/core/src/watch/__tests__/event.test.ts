import { describe, expect, it } from "vitest";
import {
  classifyRawEvent,
  createWatcherEvent,
  isMarkdownFile,
  isWellFormedEvent,
  shouldTriggerReload,
} from "../index.js";

describe("createWatcherEvent", () => {
  it("should create a frozen event", () => {
    const event = createWatcherEvent("modified", "/docs/a.md", 1000);

    expect(event).toEqual({ eventType: "modified", filePath: "/docs/a.md", timestamp: 1000, isDirectory: false });
    expect(Object.isFrozen(event)).toBe(true);
  });

  it("should reject relative paths and bad timestamps", () => {
    expect(() => createWatcherEvent("created", "docs/a.md", 1)).toThrow(TypeError);
    expect(() => createWatcherEvent("created", "/docs/a.md", Number.NaN)).toThrow(TypeError);
  });
});

describe("isWellFormedEvent", () => {
  it("should validate untyped values", () => {
    expect(isWellFormedEvent({ eventType: "deleted", filePath: "/x", timestamp: 5, isDirectory: true })).toBe(true);
    expect(isWellFormedEvent({ eventType: "renamed", filePath: "/x", timestamp: 5, isDirectory: false })).toBe(false);
    expect(isWellFormedEvent({ eventType: "deleted", filePath: "", timestamp: 5, isDirectory: false })).toBe(false);
    expect(isWellFormedEvent(null)).toBe(false);
    expect(isWellFormedEvent("event")).toBe(false);
  });
});

describe("classifyRawEvent", () => {
  it("should map chokidar event names", () => {
    expect(classifyRawEvent("add")).toEqual({ eventType: "created", isDirectory: false });
    expect(classifyRawEvent("addDir")).toEqual({ eventType: "created", isDirectory: true });
    expect(classifyRawEvent("change")).toEqual({ eventType: "modified", isDirectory: false });
    expect(classifyRawEvent("unlink")).toEqual({ eventType: "deleted", isDirectory: false });
    expect(classifyRawEvent("unlinkDir")).toEqual({ eventType: "deleted", isDirectory: true });
  });

  it("should ignore non-change notifications", () => {
    expect(classifyRawEvent("raw")).toBeUndefined();
    expect(classifyRawEvent("ready")).toBeUndefined();
    expect(classifyRawEvent("error")).toBeUndefined();
  });
});

describe("isMarkdownFile", () => {
  it("should match .md and .markdown case-insensitively", () => {
    expect(isMarkdownFile({ filePath: "/docs/a.md" })).toBe(true);
    expect(isMarkdownFile({ filePath: "/docs/A.MD" })).toBe(true);
    expect(isMarkdownFile({ filePath: "/docs/b.Markdown" })).toBe(true);
    expect(isMarkdownFile({ filePath: "/docs/c.mdx" })).toBe(false);
    expect(isMarkdownFile({ filePath: "/docs/md" })).toBe(false);
  });
});

describe("shouldTriggerReload", () => {
  it("should reload for markdown files", () => {
    expect(shouldTriggerReload({ filePath: "notes/readme.md" })).toBe(true);
  });

  it("should reload for files under a static or templates segment", () => {
    expect(shouldTriggerReload({ filePath: "static/app.css" })).toBe(true);
    expect(shouldTriggerReload({ filePath: "/site/templates/page.html" })).toBe(true);
  });

  it("should not reload for other files", () => {
    expect(shouldTriggerReload({ filePath: "notes/data.json" })).toBe(false);
    expect(shouldTriggerReload({ filePath: "/site/statics/app.css" })).toBe(false);
  });
});
