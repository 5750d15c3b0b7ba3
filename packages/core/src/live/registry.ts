// ============================================
// Connection Registry
// ============================================
// Sole membership list of live-reload connections. Every mutation is a
// synchronous method, so a broadcast (snapshot, send, prune) never interleaves
// with a register or unregister.

import { createId } from "@mdlive/shared";

import { DEFAULT_KEEPALIVE_INTERVAL_MS, DEFAULT_KEEPALIVE_TIMEOUT_MS } from "../config/defaults.js";
import { DeliveryFailureError, StaleConnectionError } from "../errors/index.js";
import { createSilentLogger } from "../logger/factory.js";
import type { Logger } from "../logger/logger.js";
import { encodeLiveMessage, type LiveMessage } from "./messages.js";

// ============================================
// Types
// ============================================

/**
 * The part of a socket the registry needs. Borrowed from the accept layer.
 */
export interface LiveTransport {
  /** Whether the underlying socket can still take frames */
  readonly isOpen: boolean;
  /** Queue one text frame. Throws when the socket cannot take it. */
  send(data: string): void;
  ping(): void;
  /** Graceful close handshake */
  close(code?: number, reason?: string): void;
  /** Drop the socket without a handshake */
  terminate(): void;
}

export interface Connection {
  readonly id: string;
  readonly transport: LiveTransport;
  readonly connectedAt: number;
  /** Epoch ms of the last sign of life */
  lastPing: number;
}

export interface BroadcastResult {
  delivered: number;
  /** Ids of connections that failed and were removed */
  failed: string[];
}

export interface SweepResult {
  pinged: number;
  removed: string[];
}

export interface ConnectionRegistryOptions {
  /** Ping interval (default: 30000) */
  keepaliveIntervalMs?: number;
  /** Connections silent for longer than this are dropped (default: 60000) */
  keepaliveTimeoutMs?: number;
  logger?: Logger;
}

/** Close code sent to clients when the server shuts down */
const CLOSE_GOING_AWAY = 1001;

// ============================================
// ConnectionRegistry Class
// ============================================

/**
 * Tracks open live-reload connections and fans messages out to them.
 *
 * @example
 * ```typescript
 * const registry = new ConnectionRegistry({ logger });
 * const id = registry.register(transport);
 * registry.broadcast(reloadMessage("guide/intro.md"));
 * registry.unregister(id);
 * ```
 */
export class ConnectionRegistry {
  readonly keepaliveIntervalMs: number;
  readonly keepaliveTimeoutMs: number;

  private readonly connections = new Map<string, Connection>();
  private readonly logger: Logger;
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: ConnectionRegistryOptions = {}) {
    this.keepaliveIntervalMs = options.keepaliveIntervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
    this.keepaliveTimeoutMs = options.keepaliveTimeoutMs ?? DEFAULT_KEEPALIVE_TIMEOUT_MS;
    this.logger = options.logger ?? createSilentLogger();
  }

  // ============================================
  // Membership
  // ============================================

  register(transport: LiveTransport): string {
    const now = Date.now();
    const id = createId("conn");
    this.connections.set(id, { id, transport, connectedAt: now, lastPing: now });
    this.logger.debug("Connection registered", { id, count: this.connections.size });
    return id;
  }

  /**
   * @returns false when the id is unknown (already removed)
   */
  unregister(id: string): boolean {
    const removed = this.connections.delete(id);
    if (removed) {
      this.logger.debug("Connection unregistered", { id, count: this.connections.size });
    }
    return removed;
  }

  count(): number {
    return this.connections.size;
  }

  has(id: string): boolean {
    return this.connections.has(id);
  }

  ids(): string[] {
    return [...this.connections.keys()];
  }

  get(id: string): Readonly<Connection> | undefined {
    return this.connections.get(id);
  }

  /**
   * Record a sign of life (pong frame or client message).
   */
  markAlive(id: string, now: number = Date.now()): boolean {
    const connection = this.connections.get(id);
    if (!connection) {
      return false;
    }
    connection.lastPing = now;
    return true;
  }

  // ============================================
  // Delivery
  // ============================================

  /**
   * Send to every connection. Failed connections are removed once the
   * snapshot has been walked; the caller never sees the failure.
   */
  broadcast(message: LiveMessage): BroadcastResult {
    const data = encodeLiveMessage(message);
    const snapshot = [...this.connections.values()];
    const failed: string[] = [];
    let delivered = 0;

    for (const connection of snapshot) {
      if (this.deliver(connection, data)) {
        delivered++;
      } else {
        failed.push(connection.id);
      }
    }

    for (const id of failed) {
      this.unregister(id);
    }

    this.logger.debug("Broadcast", { type: message.type, delivered, failed: failed.length });
    return { delivered, failed };
  }

  /**
   * Send to one connection; a failed connection is removed.
   */
  sendTo(id: string, message: LiveMessage): boolean {
    const connection = this.connections.get(id);
    if (!connection) {
      return false;
    }
    if (this.deliver(connection, encodeLiveMessage(message))) {
      return true;
    }
    this.unregister(id);
    return false;
  }

  private deliver(connection: Connection, data: string): boolean {
    try {
      if (!connection.transport.isOpen) {
        throw new Error("transport is closed");
      }
      connection.transport.send(data);
      return true;
    } catch (error) {
      this.logger.warn("Delivery failed", { error: new DeliveryFailureError(connection.id, { cause: error }) });
      return false;
    }
  }

  // ============================================
  // Keepalive
  // ============================================

  /**
   * Drop connections silent for longer than the timeout and ping the rest.
   */
  sweep(now: number = Date.now()): SweepResult {
    const removed: string[] = [];
    let pinged = 0;

    for (const connection of [...this.connections.values()]) {
      const idleMs = now - connection.lastPing;
      if (idleMs > this.keepaliveTimeoutMs) {
        removed.push(connection.id);
        this.logger.debug("Connection stale", { error: new StaleConnectionError(connection.id, idleMs) });
        this.terminate(connection, "stale");
        continue;
      }

      try {
        connection.transport.ping();
        pinged++;
      } catch (error) {
        removed.push(connection.id);
        this.logger.warn("Ping failed", { error: new DeliveryFailureError(connection.id, { cause: error }) });
        this.terminate(connection, "ping failed");
      }
    }

    for (const id of removed) {
      this.unregister(id);
    }

    if (removed.length > 0) {
      this.logger.info("Removed stale connections", { count: removed.length });
    }
    return { pinged, removed };
  }

  startKeepalive(): void {
    if (this.keepaliveTimer) {
      return;
    }
    this.keepaliveTimer = setInterval(() => this.sweep(), this.keepaliveIntervalMs);
    this.keepaliveTimer.unref?.();
  }

  stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer);
      this.keepaliveTimer = null;
    }
  }

  get keepaliveRunning(): boolean {
    return this.keepaliveTimer !== null;
  }

  /**
   * Optionally send a final message, close every connection and empty the registry.
   *
   * @returns number of connections closed
   */
  closeAll(message?: LiveMessage): number {
    const snapshot = [...this.connections.values()];
    this.connections.clear();

    const data = message ? encodeLiveMessage(message) : undefined;
    for (const connection of snapshot) {
      if (data !== undefined) {
        this.deliver(connection, data);
      }
      try {
        connection.transport.close(CLOSE_GOING_AWAY, "Server shutting down");
      } catch (error) {
        this.logger.warn("Close failed", { id: connection.id, error });
        this.terminate(connection, "close failed");
      }
    }

    if (snapshot.length > 0) {
      this.logger.info("Closed all connections", { count: snapshot.length });
    }
    return snapshot.length;
  }

  private terminate(connection: Connection, reason: string): void {
    try {
      connection.transport.terminate();
    } catch (error) {
      this.logger.warn("Terminate failed", { id: connection.id, reason, error });
    }
  }
}
