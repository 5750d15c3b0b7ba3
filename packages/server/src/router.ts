// ============================================
// Route Table
// ============================================
// Explicit method + path table. File routes receive a ResolvedFile that has
// already passed path validation; handlers never see the raw request path.

import * as path from "node:path";
import { MdliveError, NotFoundError, SecurityError, validatePath, type Logger } from "@mdlive/core";
import { ErrorCode } from "@mdlive/shared";

import type { ServerState } from "./state.js";

// ============================================
// Types
// ============================================

export interface ResolvedFile {
  /** Canonical absolute path inside the validation root */
  readonly absolutePath: string;
  /** Path relative to the validation root, `/`-separated */
  readonly relativePath: string;
}

export interface HandlerResponse {
  status: number;
  headers?: Record<string, string>;
  body: string;
}

export interface RequestContext {
  readonly state: ServerState;
  readonly url: URL;
}

export type RouteMethod = "GET";

/** Short-circuits a route before its path is resolved */
export type RouteGuard = (state: ServerState) => HandlerResponse | undefined;

export type Route =
  | {
      readonly kind: "exact";
      readonly method: RouteMethod;
      readonly path: string;
      readonly guard?: RouteGuard;
      readonly handler: (ctx: RequestContext) => Promise<HandlerResponse>;
    }
  | {
      readonly kind: "file";
      readonly method: RouteMethod;
      /** Path prefix ending in `/`; the remainder is the requested file */
      readonly prefix: string;
      readonly guard?: RouteGuard;
      readonly handler: (ctx: RequestContext, file: ResolvedFile) => Promise<HandlerResponse>;
    };

// ============================================
// Responses
// ============================================

export function json(status: number, value: unknown): HandlerResponse {
  return {
    status,
    headers: { "Content-Type": "application/json; charset=utf-8" },
    body: JSON.stringify(value),
  };
}

export function html(body: string, status = 200): HandlerResponse {
  return { status, headers: { "Content-Type": "text/html; charset=utf-8" }, body };
}

export function text(status: number, body: string, headers: Record<string, string> = {}): HandlerResponse {
  return { status, headers: { "Content-Type": "text/plain; charset=utf-8", ...headers }, body };
}

/**
 * Map a thrown value to a response. SecurityError never echoes any path.
 */
export function errorResponse(error: unknown, logger: Logger): HandlerResponse {
  if (error instanceof SecurityError) {
    return json(403, { error: "Access forbidden" });
  }
  if (error instanceof NotFoundError) {
    return json(404, { error: error.message });
  }
  if (error instanceof MdliveError && error.code === ErrorCode.FILE_TOO_LARGE) {
    return json(413, { error: error.message });
  }
  logger.error("Request failed", {
    error: new MdliveError("Request handler failed", ErrorCode.INTERNAL_ERROR, { cause: error }),
  });
  return json(500, { error: "Internal server error" });
}

// ============================================
// Path resolution
// ============================================

export function toPosixPath(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Validate a client-supplied path against the root.
 *
 * @throws SecurityError, NotFoundError
 */
export function resolveFile(requested: string, root: string): ResolvedFile {
  const absolutePath = validatePath(requested, root);
  return { absolutePath, relativePath: toPosixPath(path.relative(root, absolutePath)) };
}

// ============================================
// Router
// ============================================

function matchesMethod(route: Route, method: string): boolean {
  return route.method === method || (route.method === "GET" && method === "HEAD");
}

function matchesPath(route: Route, pathname: string): boolean {
  return route.kind === "exact" ? pathname === route.path : pathname.startsWith(route.prefix);
}

export class Router {
  constructor(private readonly routes: readonly Route[]) {}

  /**
   * Find and run the route for a request. Never throws.
   */
  async dispatch(method: string, url: URL, state: ServerState): Promise<HandlerResponse> {
    const candidates = this.routes.filter((route) => matchesPath(route, url.pathname));
    if (candidates.length === 0) {
      return json(404, { error: "Not found" });
    }

    const route = candidates.find((candidate) => matchesMethod(candidate, method));
    if (!route) {
      const response = json(405, { error: "Method not allowed" });
      return { ...response, headers: { ...response.headers, Allow: "GET, HEAD" } };
    }

    const ctx: RequestContext = { state, url };

    try {
      const blocked = route.guard?.(state);
      if (blocked) {
        return blocked;
      }

      if (route.kind === "exact") {
        return await route.handler(ctx);
      }

      let requested: string;
      try {
        requested = decodeURIComponent(url.pathname.slice(route.prefix.length));
      } catch (error) {
        state.logger.debug("Undecodable request path", { path: url.pathname, error });
        return json(400, { error: "Bad request" });
      }
      if (requested === "") {
        return json(404, { error: "Not found" });
      }

      return await route.handler(ctx, resolveFile(requested, state.validationRoot));
    } catch (error) {
      return errorResponse(error, state.logger);
    }
  }
}
