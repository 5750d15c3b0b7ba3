// ============================================
// Preview Server
// ============================================

import http from "node:http";
import type { AddressInfo } from "node:net";
import * as path from "node:path";
import {
  createSilentLogger,
  errorMessage,
  type Logger,
  PortInUseError,
  reloadMessage,
  type Renderer,
  type ServerConfig,
  shouldTriggerReload,
  toError,
  type WatcherEvent,
  type WatchFactory,
  WatcherIOError,
} from "@mdlive/core";
import type { WebSocketServer } from "ws";

import { createRoutes } from "./handlers.js";
import { attachLiveSocketServer } from "./live-socket.js";
import { Router, toPosixPath } from "./router.js";
import { createServerState, type ServerState } from "./state.js";

// ============================================
// Types
// ============================================

export interface PreviewServerOptions {
  config: ServerConfig;
  logger?: Logger;
  renderer?: Renderer;
  /** Subscription factory handed to the watcher (default: chokidar) */
  watchFactory?: WatchFactory;
}

export type PreviewServerStatus = "stopped" | "starting" | "running" | "stopping";

const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  "X-Content-Type-Options": "nosniff",
  "X-Frame-Options": "DENY",
  "Referrer-Policy": "no-referrer",
};

const SHUTDOWN_MESSAGE = "Server shutting down";

/** How long sockets get to finish the close handshake before being terminated */
const SOCKET_CLOSE_GRACE_MS = 1000;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Wait for every socket to finish closing, terminating stragglers after `graceMs`.
 */
async function drainSockets(wss: WebSocketServer, graceMs: number): Promise<void> {
  const sockets = [...wss.clients];
  if (sockets.length === 0) {
    return;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const closed = Promise.all(
    sockets.map((socket) => new Promise<void>((resolve) => socket.once("close", () => resolve())))
  );
  const grace = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, graceMs);
  });

  await Promise.race([closed, grace]);
  clearTimeout(timer);

  for (const socket of wss.clients) {
    socket.terminate();
  }
}

// ============================================
// PreviewServer Class
// ============================================

/**
 * HTTP + WebSocket preview server with live reload.
 *
 * @example
 * ```typescript
 * const server = new PreviewServer({ config, logger });
 * await server.start();
 * console.log(`Serving on ${server.url}`);
 *
 * // Later...
 * await server.stop();
 * ```
 */
export class PreviewServer {
  readonly state: ServerState;

  private readonly logger: Logger;
  private readonly router: Router;
  private httpServer: http.Server | null = null;
  private wss: WebSocketServer | null = null;
  private _status: PreviewServerStatus = "stopped";
  private stopPromise: Promise<void> | null = null;
  private startSettled: Promise<void> = Promise.resolve();
  private used = false;

  constructor(options: PreviewServerOptions) {
    this.logger = options.logger ?? createSilentLogger();
    this.state = createServerState(options.config, {
      logger: this.logger,
      renderer: options.renderer,
      watchFactory: options.watchFactory,
    });
    this.router = new Router(createRoutes(this.state));
  }

  get status(): PreviewServerStatus {
    return this._status;
  }

  /**
   * Bound address, once started.
   */
  get address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === "object" ? address : null;
  }

  get url(): string {
    const address = this.address;
    if (!address) {
      throw new Error("PreviewServer is not listening");
    }
    const host = address.family === "IPv6" ? `[${address.address}]` : address.address;
    return `http://${host}:${address.port}`;
  }

  /**
   * Whether file changes are currently being pushed to clients.
   */
  get liveReloadActive(): boolean {
    return this.state.watcher?.running ?? false;
  }

  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Listen, then bring up live reload. A watcher that fails to start is
   * logged and the server keeps serving without live reload.
   *
   * @throws PortInUseError when the address is taken
   */
  async start(): Promise<void> {
    if (this._status !== "stopped") {
      throw new Error(`PreviewServer is already ${this._status}`);
    }
    if (this.used) {
      throw new Error("PreviewServer cannot be restarted; create a new instance");
    }
    this.used = true;
    this._status = "starting";

    let settle: () => void = () => undefined;
    this.startSettled = new Promise<void>((resolve) => {
      settle = resolve;
    });

    try {
      try {
        await this.listen();
        if (this.state.config.reloadEnabled) {
          await this.startLiveReload();
        }
      } catch (error) {
        await this.teardown();
        this._status = "stopped";
        throw error;
      }

      this._status = "running";
      this.logger.info("Preview server listening", {
        url: this.url,
        mode: this.state.mode,
        liveReload: this.liveReloadActive,
      });
    } finally {
      settle();
    }
  }

  /**
   * Tear down in order: watcher, bridge, keepalive, connections, WebSocket
   * server, HTTP server. Idempotent. A stop issued while starting waits for
   * the start to settle first.
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
      this._status = "stopped";
      this.stopPromise = null;
    });
    return this.stopPromise;
  }

  private async listen(): Promise<void> {
    const { host, port } = this.state.config;
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        this.logger.error("Unhandled request failure", { error });
        if (!res.headersSent) {
          res.writeHead(500, SECURITY_HEADERS);
        }
        res.end();
      });
    });
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        server.off("listening", onListening);
        reject(errnoCode(error) === "EADDRINUSE" ? new PortInUseError(host, port, { cause: error }) : error);
      };
      const onListening = () => {
        server.off("error", onError);
        resolve();
      };
      server.once("error", onError);
      server.once("listening", onListening);
      server.listen(port, host);
    });

    server.on("error", (error) => {
      this.logger.error("HTTP server error", { error });
    });
  }

  private async startLiveReload(): Promise<void> {
    const { bridge, watcher, registry } = this.state;
    if (!bridge || !watcher || !this.httpServer) {
      return;
    }

    bridge.attach((event) => this.handleReload(event));
    this.wss = attachLiveSocketServer(this.httpServer, {
      registry,
      logger: this.logger.child({ component: "live-socket" }),
    });
    registry.startKeepalive();

    try {
      await watcher.start((event) => this.forwardEvent(event));
    } catch (error) {
      if (!(error instanceof WatcherIOError)) {
        throw error;
      }
      this.logger.warn("Live reload unavailable: watcher failed to start", { error });
    }
  }

  private async teardown(): Promise<void> {
    const { watcher, bridge, registry } = this.state;

    await watcher?.stop();
    bridge?.close();
    registry.stopKeepalive();
    registry.closeAll(errorMessage(SHUTDOWN_MESSAGE));

    const wss = this.wss;
    this.wss = null;
    if (wss) {
      await drainSockets(wss, SOCKET_CLOSE_GRACE_MS);
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }

    const server = this.httpServer;
    this.httpServer = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error && errnoCode(error) !== "ERR_SERVER_NOT_RUNNING") {
            reject(error);
            return;
          }
          resolve();
        });
        server.closeAllConnections();
      });
    }

    this.logger.info("Preview server stopped");
  }

  // ============================================
  // Live reload
  // ============================================

  /**
   * Watcher side: forward reload-worthy events across the bridge.
   */
  private async forwardEvent(event: WatcherEvent): Promise<void> {
    const bridge = this.state.bridge;
    if (!bridge || !shouldTriggerReload(event)) {
      return;
    }
    const result = await bridge.submit(event);
    this.logger.debug("Bridged change", { path: event.filePath, type: event.eventType, result });
  }

  /**
   * Scheduler side: one synchronous unit of work per change.
   */
  private handleReload(event: WatcherEvent): void {
    const { renderCache, registry, validationRoot } = this.state;
    renderCache.invalidate(event.filePath);

    const relative = toPosixPath(path.relative(validationRoot, event.filePath));
    const result = registry.broadcast(reloadMessage(relative === "" ? null : relative));
    this.logger.info("Reload sent", { path: relative, delivered: result.delivered, failed: result.failed.length });
  }

  // ============================================
  // HTTP
  // ============================================

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    let url: URL;
    try {
      url = new URL(req.url ?? "/", "http://localhost");
    } catch (error) {
      this.logger.debug("Unparseable request URL", { url: req.url, error: toError(error) });
      res.writeHead(400, { ...SECURITY_HEADERS, "Content-Type": "text/plain; charset=utf-8" });
      res.end("Bad request");
      return;
    }

    const response = await this.router.dispatch(method, url, this.state);
    res.writeHead(response.status, { ...SECURITY_HEADERS, ...response.headers });
    res.end(method === "HEAD" ? undefined : response.body);
    this.logger.trace("Request", { method, path: url.pathname, status: response.status });
  }
}
