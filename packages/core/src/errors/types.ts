// ============================================
// mdlive Error Types
// ============================================

import { ErrorCode, type ErrorSeverity, inferSeverity } from "@mdlive/shared";

/**
 * Options for creating an MdliveError.
 */
export interface MdliveErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all mdlive errors.
 *
 * Provides:
 * - Categorized error codes
 * - Automatic severity inference
 * - Error cause chaining
 * - Additional context
 */
export class MdliveError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: MdliveErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "MdliveError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * The severity level of this error, inferred from the error code.
   */
  get severity(): ErrorSeverity {
    return inferSeverity(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * A requested path resolves outside the serve root.
 * Surfaces as 403; the message never contains the resolved absolute path.
 */
export class SecurityError extends MdliveError {
  constructor(message = "Access denied: path is outside the serve root", options?: MdliveErrorOptions) {
    super(message, ErrorCode.PATH_SECURITY, options);
    this.name = "SecurityError";
  }
}

/**
 * A requested path is inside the serve root but does not exist. Surfaces as 404.
 */
export class NotFoundError extends MdliveError {
  constructor(message = "Path not found", options?: MdliveErrorOptions) {
    super(message, ErrorCode.PATH_NOT_FOUND, options);
    this.name = "NotFoundError";
  }
}

/**
 * The OS-level watch subscription failed. The server keeps serving without live reload.
 */
export class WatcherIOError extends MdliveError {
  constructor(message: string, options?: MdliveErrorOptions) {
    super(message, ErrorCode.WATCHER_IO, options);
    this.name = "WatcherIOError";
  }
}

/**
 * The scheduler did not acknowledge a bridged event in time.
 */
export class BridgeTimeoutError extends MdliveError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, options?: MdliveErrorOptions) {
    super(`Scheduler did not acknowledge event within ${timeoutMs}ms`, ErrorCode.BRIDGE_TIMEOUT, options);
    this.name = "BridgeTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An event reached the bridge after it closed or before a scheduler attached.
 */
export class BridgeUnavailableError extends MdliveError {
  constructor(reason: string, options?: MdliveErrorOptions) {
    super(`Event bridge unavailable: ${reason}`, ErrorCode.BRIDGE_UNAVAILABLE, options);
    this.name = "BridgeUnavailableError";
  }
}

/**
 * Sending a message to a single live connection failed.
 */
export class DeliveryFailureError extends MdliveError {
  readonly connectionId: string;

  constructor(connectionId: string, options?: MdliveErrorOptions) {
    super(`Delivery to connection ${connectionId} failed`, ErrorCode.DELIVERY_FAILED, options);
    this.name = "DeliveryFailureError";
    this.connectionId = connectionId;
  }
}

/**
 * A live connection stopped answering keepalive pings.
 */
export class StaleConnectionError extends MdliveError {
  readonly connectionId: string;

  constructor(connectionId: string, idleMs: number) {
    super(`Connection ${connectionId} idle for ${idleMs}ms`, ErrorCode.CONNECTION_STALE, {
      context: { idleMs },
    });
    this.name = "StaleConnectionError";
    this.connectionId = connectionId;
  }
}

/**
 * Configuration could not be read, parsed or validated.
 */
export class ConfigError extends MdliveError {
  constructor(
    message: string,
    code: ErrorCode.CONFIG_INVALID | ErrorCode.CONFIG_NOT_FOUND | ErrorCode.CONFIG_PARSE_ERROR,
    options?: MdliveErrorOptions
  ) {
    super(message, code, options);
    this.name = "ConfigError";
  }
}

/**
 * A served file exceeds the configured size limit. Surfaces as 413.
 */
export class FileTooLargeError extends MdliveError {
  constructor(size: number, limit: number) {
    super(`File size ${size} exceeds limit of ${limit} bytes`, ErrorCode.FILE_TOO_LARGE, {
      context: { size, limit },
    });
    this.name = "FileTooLargeError";
  }
}

/**
 * The HTTP server could not bind its address.
 */
export class PortInUseError extends MdliveError {
  constructor(host: string, port: number, options?: MdliveErrorOptions) {
    super(`Address ${host}:${port} is already in use`, ErrorCode.PORT_IN_USE, {
      ...options,
      context: { host, port },
    });
    this.name = "PortInUseError";
  }
}

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
