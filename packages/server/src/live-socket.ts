// ============================================
// Live-Reload Socket Layer
// ============================================
// Accepts WebSocket upgrades on /ws and registers each socket with the
// ConnectionRegistry. Registry calls happen only from socket callbacks,
// which run on the event loop like every other scheduler-side task.

import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import { type ConnectionRegistry, type LiveTransport, type Logger, parseClientMessage } from "@mdlive/core";
import { type RawData, WebSocket, WebSocketServer } from "ws";

export const LIVE_SOCKET_PATH = "/ws";

/** Largest accepted inbound frame; clients only ever send tiny pings */
const MAX_PAYLOAD_BYTES = 4 * 1024;

/**
 * {@link LiveTransport} over a `ws` socket. Asynchronous send failures are
 * reported through `onSendError` so the owner can prune the connection.
 */
export class WebSocketTransport implements LiveTransport {
  constructor(
    private readonly socket: WebSocket,
    private readonly onSendError: (error: Error) => void
  ) {}

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): void {
    this.socket.send(data, (error) => {
      if (error) {
        this.onSendError(error);
      }
    });
  }

  ping(): void {
    this.socket.ping();
  }

  close(code?: number, reason?: string): void {
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf-8");
  }
  return data.toString("utf-8");
}

export interface LiveSocketOptions {
  registry: ConnectionRegistry;
  logger: Logger;
}

/**
 * Register a socket with the registry and wire its lifecycle events.
 */
export function acceptLiveSocket(socket: WebSocket, { registry, logger }: LiveSocketOptions): string {
  let id = "";
  const transport = new WebSocketTransport(socket, (error) => {
    logger.warn("Send failed, dropping connection", { id, error });
    if (registry.unregister(id)) {
      socket.terminate();
    }
  });
  id = registry.register(transport);

  socket.on("pong", () => {
    registry.markAlive(id);
  });

  socket.on("message", (data, isBinary) => {
    if (isBinary) {
      logger.debug("Ignoring binary frame", { id });
      return;
    }

    const parsed = parseClientMessage(rawDataToString(data));
    if (!parsed.ok) {
      logger.debug("Ignoring client message", { id, reason: parsed.error.message });
      return;
    }

    registry.markAlive(id);
    if (parsed.value.type === "ping") {
      registry.sendTo(id, { type: "pong" });
    }
  });

  socket.on("close", () => {
    registry.unregister(id);
  });

  socket.on("error", (error) => {
    logger.warn("Socket error", { id, error });
    registry.unregister(id);
  });

  return id;
}

/**
 * Attach a WebSocket server to `server` on {@link LIVE_SOCKET_PATH}.
 * Upgrades on any other path are refused.
 */
export function attachLiveSocketServer(server: Server, options: LiveSocketOptions): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true, maxPayload: MAX_PAYLOAD_BYTES });

  wss.on("connection", (socket: WebSocket) => {
    const id = acceptLiveSocket(socket, options);
    options.logger.debug("Live-reload client connected", { id });
  });

  server.on("upgrade", (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    let pathname: string;
    try {
      pathname = new URL(request.url ?? "/", "http://localhost").pathname;
    } catch (error) {
      options.logger.debug("Refusing upgrade with unparseable URL", { url: request.url, error });
      socket.destroy();
      return;
    }
    if (pathname !== LIVE_SOCKET_PATH) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit("connection", ws, request);
    });
  });

  return wss;
}
