import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { WatcherIOError } from "../../errors/index.js";
import { Logger } from "../../logger/logger.js";
import type { LogEntry } from "../../logger/types.js";
import {
  createIgnoreMatcher,
  DEFAULT_WATCH_IGNORE_PATTERNS,
  FilesystemWatcher,
  type WatcherEvent,
  type WatchSource,
  type WatchSourceOptions,
} from "../index.js";

// =============================================================================
// Fake subscription
// =============================================================================

class FakeWatchSource implements WatchSource {
  closed = false;
  private eventListeners: Array<(eventName: string, filePath: string) => void> = [];
  private errorListeners: Array<(error: unknown) => void> = [];

  constructor(
    readonly root: string,
    readonly options: WatchSourceOptions,
    private readonly behavior: { ready: boolean; failWith?: Error }
  ) {}

  onEvent(listener: (eventName: string, filePath: string) => void): void {
    this.eventListeners.push(listener);
  }

  onReady(listener: () => void): void {
    if (this.behavior.ready) {
      listener();
    }
  }

  onError(listener: (error: unknown) => void): void {
    this.errorListeners.push(listener);
    if (this.behavior.failWith) {
      listener(this.behavior.failWith);
    }
  }

  emit(eventName: string, filePath: string): void {
    for (const listener of this.eventListeners) {
      listener(eventName, filePath);
    }
  }

  fail(error: unknown): void {
    for (const listener of this.errorListeners) {
      listener(error);
    }
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

describe("FilesystemWatcher", () => {
  let root: string;
  let sources: FakeWatchSource[];
  let entries: LogEntry[];
  let logger: Logger;

  function createFakeWatcher(behavior: { ready: boolean; failWith?: Error } = { ready: true }): FilesystemWatcher {
    return new FilesystemWatcher({
      root,
      debounceMs: 150,
      logger,
      name: "test-watcher",
      watchFactory: (watchRoot, options) => {
        const source = new FakeWatchSource(watchRoot, options, behavior);
        sources.push(source);
        return source;
      },
    });
  }

  function latestSource(): FakeWatchSource {
    const source = sources.at(-1);
    if (!source) {
      throw new Error("no watch source created");
    }
    return source;
  }

  beforeEach(async () => {
    root = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), "mdlive-watch-")));
    sources = [];
    entries = [];
    logger = new Logger({ level: "trace", transports: [{ log: (entry) => entries.push(entry) }] });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe("lifecycle", () => {
    it("should start in stopped state", () => {
      const watcher = createFakeWatcher();

      expect(watcher.status).toBe("stopped");
      expect(watcher.running).toBe(false);
      expect(watcher.state.eventCount).toBe(0);
    });

    it("should be running once the subscription is ready", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => undefined);

      expect(watcher.running).toBe(true);
      expect(watcher.state.startedAt).toBeTypeOf("number");
      expect(latestSource().root).toBe(root);
      expect(latestSource().options.recursive).toBe(true);

      await watcher.stop();
    });

    it("should refuse a second start", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => undefined);

      await expect(watcher.start(() => undefined)).rejects.toThrow("test-watcher is already running");

      await watcher.stop();
    });

    it("should close the subscription on stop", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => undefined);
      await watcher.stop();

      expect(latestSource().closed).toBe(true);
      expect(watcher.status).toBe("stopped");
    });

    it("should treat stop as idempotent and safe before start", async () => {
      const watcher = createFakeWatcher();
      await watcher.stop();

      await watcher.start(() => undefined);
      await Promise.all([watcher.stop(), watcher.stop()]);
      await watcher.stop();

      expect(watcher.status).toBe("stopped");
      expect(entries.filter((e) => e.message === "test-watcher stopped")).toHaveLength(1);
    });

    it("should be restartable after stop", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => undefined);
      await watcher.stop();
      await watcher.start(() => undefined);

      expect(watcher.running).toBe(true);
      expect(sources).toHaveLength(2);

      await watcher.stop();
    });
  });

  describe("start failures", () => {
    it("should raise WatcherIOError for a missing root", async () => {
      root = path.join(root, "missing");
      const watcher = createFakeWatcher();

      await expect(watcher.start(() => undefined)).rejects.toBeInstanceOf(WatcherIOError);
      expect(watcher.status).toBe("stopped");
      expect(sources).toHaveLength(0);
    });

    it("should raise WatcherIOError when the subscription fails before ready", async () => {
      const watcher = createFakeWatcher({ ready: false, failWith: new Error("EMFILE") });

      await expect(watcher.start(() => undefined)).rejects.toThrow("test-watcher subscription failed");
      expect(watcher.status).toBe("stopped");
      expect(latestSource().closed).toBe(true);
      expect(watcher.state.lastError).toBeInstanceOf(WatcherIOError);
    });
  });

  describe("events", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    it("should classify and debounce raw notifications per path", async () => {
      const events: WatcherEvent[] = [];
      const watcher = createFakeWatcher();
      await watcher.start((event) => {
        events.push(event);
      });

      const source = latestSource();
      source.emit("add", path.join(root, "a.md"));
      source.emit("change", path.join(root, "a.md"));
      source.emit("change", path.join(root, "a.md"));
      source.emit("addDir", path.join(root, "notes"));
      await vi.advanceTimersByTimeAsync(150);

      expect(events.map((e) => [e.eventType, e.filePath, e.isDirectory])).toEqual([
        ["modified", path.join(root, "a.md"), false],
        ["created", path.join(root, "notes"), true],
      ]);
      expect(watcher.state.eventCount).toBe(2);

      await watcher.stop();
    });

    it("should resolve relative notification paths against the root", async () => {
      const events: WatcherEvent[] = [];
      const watcher = createFakeWatcher();
      await watcher.start((event) => {
        events.push(event);
      });

      latestSource().emit("unlink", "docs/old.md");
      await vi.advanceTimersByTimeAsync(150);

      expect(events.map((e) => e.filePath)).toEqual([path.join(root, "docs", "old.md")]);

      await watcher.stop();
    });

    it("should ignore notifications that are not changes", async () => {
      const callback = vi.fn();
      const watcher = createFakeWatcher();
      await watcher.start(callback);

      latestSource().emit("raw", path.join(root, "a.md"));
      latestSource().emit("ready", root);
      await vi.advanceTimersByTimeAsync(500);

      expect(callback).not.toHaveBeenCalled();

      await watcher.stop();
    });

    it("should discard pending events when stopped mid-window", async () => {
      const callback = vi.fn();
      const watcher = createFakeWatcher();
      await watcher.start(callback);

      latestSource().emit("change", path.join(root, "a.md"));
      await vi.advanceTimersByTimeAsync(100);
      expect(watcher.state.pendingEvents).toBe(1);

      await watcher.stop();
      await vi.advanceTimersByTimeAsync(500);

      expect(callback).not.toHaveBeenCalled();
      expect(watcher.state.pendingEvents).toBe(0);
    });

    it("should ignore notifications arriving after stop", async () => {
      const callback = vi.fn();
      const watcher = createFakeWatcher();
      await watcher.start(callback);
      const source = latestSource();
      await watcher.stop();

      source.emit("change", path.join(root, "a.md"));
      await vi.advanceTimersByTimeAsync(500);

      expect(callback).not.toHaveBeenCalled();
    });

    it("should log a throwing callback and keep delivering", async () => {
      const events: WatcherEvent[] = [];
      const watcher = createFakeWatcher();
      await watcher.start((event) => {
        if (events.length === 0) {
          events.push(event);
          throw new Error("callback exploded");
        }
        events.push(event);
      });

      latestSource().emit("change", path.join(root, "a.md"));
      await vi.advanceTimersByTimeAsync(150);
      latestSource().emit("change", path.join(root, "b.md"));
      await vi.advanceTimersByTimeAsync(150);

      expect(events).toHaveLength(2);
      expect(watcher.running).toBe(true);
      expect(entries.filter((e) => e.level === "error").map((e) => e.message)).toEqual([
        "test-watcher change callback failed",
      ]);
      expect(watcher.state.lastError?.message).toBe("callback exploded");

      await watcher.stop();
    });

    it("should log a rejected async callback", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => Promise.reject(new Error("async failure")));

      latestSource().emit("change", path.join(root, "a.md"));
      await vi.advanceTimersByTimeAsync(150);

      await vi.waitFor(() => {
        expect(watcher.state.lastError?.message).toBe("async failure");
      });
      expect(watcher.running).toBe(true);

      await watcher.stop();
    });

    it("should log subscription errors after ready without stopping", async () => {
      const watcher = createFakeWatcher();
      await watcher.start(() => undefined);

      latestSource().fail(new Error("inotify limit"));

      expect(watcher.running).toBe(true);
      expect(watcher.state.lastError).toBeInstanceOf(WatcherIOError);
      expect(entries.some((e) => e.level === "error" && e.message === "test-watcher error")).toBe(true);

      await watcher.stop();
    });
  });

  describe("chokidar", () => {
    it("should report a file written under the root", async () => {
      const events: WatcherEvent[] = [];
      const watcher = new FilesystemWatcher({ root, debounceMs: 50 });
      await watcher.start((event) => {
        events.push(event);
      });

      try {
        const target = path.join(root, "live.md");
        await fs.writeFile(target, "# Live\n");

        await vi.waitFor(
          () => {
            expect(events.map((e) => e.filePath)).toContain(target);
          },
          { timeout: 5000, interval: 50 }
        );
      } finally {
        await watcher.stop();
      }
    });
  });
});

describe("createIgnoreMatcher", () => {
  const matches = createIgnoreMatcher("/srv/docs", DEFAULT_WATCH_IGNORE_PATTERNS);

  it("should ignore dependency and VCS directories at any depth", () => {
    expect(matches("/srv/docs/node_modules")).toBe(true);
    expect(matches("/srv/docs/node_modules/pkg/README.md")).toBe(true);
    expect(matches("/srv/docs/guide/.git/HEAD")).toBe(true);
  });

  it("should ignore editor leftovers", () => {
    expect(matches("/srv/docs/notes.md.swp")).toBe(true);
    expect(matches("/srv/docs/notes.md~")).toBe(true);
  });

  it("should keep content and the root itself", () => {
    expect(matches("/srv/docs")).toBe(false);
    expect(matches("/srv/docs/guide/intro.md")).toBe(false);
    expect(matches("/srv/docs/static/app.css")).toBe(false);
  });

  it("should accept paths relative to the root", () => {
    expect(matches("node_modules/pkg/index.md")).toBe(true);
    expect(matches("guide/intro.md")).toBe(false);
  });
});
