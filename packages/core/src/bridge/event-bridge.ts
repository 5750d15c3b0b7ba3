// ============================================
// Event Bridge
// ============================================
// Hands coalesced watcher events to the scheduler side over a MessageChannel.
// The watcher side owns port1 and only ever posts; the scheduler side owns
// port2, runs the attached handler once per message and posts an ack back.

import { MessageChannel } from "node:worker_threads";
import { z } from "zod";

import { DEFAULT_BRIDGE_TIMEOUT_MS } from "../config/defaults.js";
import { BridgeTimeoutError, BridgeUnavailableError } from "../errors/index.js";
import { createSilentLogger } from "../logger/factory.js";
import type { Logger } from "../logger/logger.js";
import { createWatcherEvent, isWellFormedEvent } from "../watch/event.js";
import type { WatcherEvent } from "../watch/types.js";

// ============================================
// Types
// ============================================

/**
 * Outcome of a submission, from the watcher side's point of view.
 * `scheduled` means the handler ran, not that every client received the message.
 */
export type SubmitResult = "scheduled" | "timeout" | "unavailable";

/**
 * Scheduler-side unit of work. Runs synchronously per event.
 */
export type BridgeHandler = (event: WatcherEvent) => void;

export interface EventBridgeOptions {
  /** Upper bound on waiting for an ack (default: 500) */
  timeoutMs?: number;
  logger?: Logger;
}

export interface EventBridgeStats {
  submitted: number;
  scheduled: number;
  timedOut: number;
  dropped: number;
}

interface PendingSubmission {
  filePath: string;
  timer: ReturnType<typeof setTimeout>;
  resolve: (result: SubmitResult) => void;
}

const EnvelopeSchema = z.object({
  seq: z.number().int(),
  event: z.unknown(),
});

const AckSchema = z.object({
  seq: z.number().int(),
  status: z.enum(["scheduled", "unavailable"]),
});

// ============================================
// EventBridge Class
// ============================================

/**
 * Bounded handoff between the watcher domain and the scheduler domain.
 *
 * @example
 * ```typescript
 * const bridge = new EventBridge({ timeoutMs: 500 });
 * bridge.attach((event) => registry.broadcast(reloadMessage(path.relative(root, event.filePath))));
 *
 * watcher.start(async (event) => {
 *   await bridge.submit(event); // "scheduled" | "timeout" | "unavailable"
 * });
 * ```
 */
export class EventBridge {
  readonly timeoutMs: number;

  private readonly channel = new MessageChannel();
  private readonly pending = new Map<number, PendingSubmission>();
  private readonly logger: Logger;
  private readonly counters: EventBridgeStats = { submitted: 0, scheduled: 0, timedOut: 0, dropped: 0 };
  private handler: BridgeHandler | null = null;
  private nextSeq = 0;
  private closed = false;

  constructor(options: EventBridgeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BRIDGE_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();

    this.channel.port1.on("message", (data: unknown) => this.handleAck(data));
    this.channel.port2.on("message", (data: unknown) => this.handleEnvelope(data));
    // Neither port keeps the process alive on its own
    this.channel.port1.unref();
    this.channel.port2.unref();
  }

  get attached(): boolean {
    return this.handler !== null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get stats(): EventBridgeStats {
    return { ...this.counters };
  }

  /**
   * Start receiving on the scheduler side. Replaces any previous handler.
   */
  attach(handler: BridgeHandler): void {
    if (this.closed) {
      throw new Error("EventBridge is closed");
    }
    this.handler = handler;
  }

  /**
   * Stop receiving. Later submissions resolve as `unavailable`.
   */
  detach(): void {
    this.handler = null;
  }

  /**
   * Post an event to the scheduler side and wait at most `timeoutMs` for the ack.
   * Never rejects.
   */
  submit(event: WatcherEvent): Promise<SubmitResult> {
    if (this.closed || !isWellFormedEvent(event)) {
      this.counters.dropped++;
      this.logger.warn("Dropping event", {
        path: event.filePath,
        error: new BridgeUnavailableError(this.closed ? "closed" : "malformed event"),
      });
      return Promise.resolve("unavailable");
    }

    const seq = ++this.nextSeq;
    this.counters.submitted++;

    return new Promise<SubmitResult>((resolve) => {
      const timer = setTimeout(() => this.settle(seq, "timeout"), this.timeoutMs);
      timer.unref?.();
      this.pending.set(seq, { filePath: event.filePath, timer, resolve });
      this.channel.port1.postMessage({ seq, event });
    });
  }

  /**
   * Detach, settle outstanding submissions as `unavailable` and close both ports.
   * Idempotent.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.handler = null;

    for (const seq of [...this.pending.keys()]) {
      this.settle(seq, "unavailable");
    }

    this.channel.port1.close();
    this.channel.port2.close();
  }

  // ============================================
  // Scheduler side
  // ============================================

  private handleEnvelope(data: unknown): void {
    const parsed = EnvelopeSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn("Ignoring malformed bridge message");
      return;
    }

    const { seq, event } = parsed.data;
    const handler = this.handler;

    if (!handler || !isWellFormedEvent(event)) {
      this.channel.port2.postMessage({ seq, status: "unavailable" });
      return;
    }

    try {
      handler(createWatcherEvent(event.eventType, event.filePath, event.timestamp, event.isDirectory));
    } catch (error) {
      this.logger.error("Bridge handler failed", { path: event.filePath, error });
    }

    this.channel.port2.postMessage({ seq, status: "scheduled" });
  }

  // ============================================
  // Watcher side
  // ============================================

  private handleAck(data: unknown): void {
    const parsed = AckSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn("Ignoring malformed bridge ack");
      return;
    }
    this.settle(parsed.data.seq, parsed.data.status);
  }

  private settle(seq: number, result: SubmitResult): void {
    const submission = this.pending.get(seq);
    if (!submission) {
      return;
    }
    this.pending.delete(seq);
    clearTimeout(submission.timer);

    switch (result) {
      case "scheduled":
        this.counters.scheduled++;
        break;
      case "timeout":
        this.counters.timedOut++;
        this.logger.warn("Bridge submission timed out", {
          path: submission.filePath,
          error: new BridgeTimeoutError(this.timeoutMs),
        });
        break;
      case "unavailable":
        this.counters.dropped++;
        this.logger.warn("Dropping event", {
          path: submission.filePath,
          error: new BridgeUnavailableError(this.closed ? "closed" : "no scheduler attached"),
        });
        break;
    }

    submission.resolve(result);
  }
}
