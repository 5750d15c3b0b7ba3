/**
 * Error Severity Types
 *
 * @module @mdlive/shared/errors/severity
 */

import { ErrorCode } from "./codes.js";

/**
 * How an error should be handled by the component that catches it.
 */
export type ErrorSeverity = "recoverable" | "user_action" | "fatal";

/**
 * Infers the appropriate severity level from an error code.
 *
 * - recoverable: transient, the pipeline keeps running (timeouts, dropped deliveries)
 * - user_action: the request or configuration is at fault
 * - fatal: internal failures and anything unclassified
 */
export function inferSeverity(code: ErrorCode): ErrorSeverity {
  switch (code) {
    case ErrorCode.WATCHER_IO:
    case ErrorCode.BRIDGE_TIMEOUT:
    case ErrorCode.BRIDGE_UNAVAILABLE:
    case ErrorCode.DELIVERY_FAILED:
    case ErrorCode.CONNECTION_STALE:
      return "recoverable";

    case ErrorCode.CONFIG_INVALID:
    case ErrorCode.CONFIG_NOT_FOUND:
    case ErrorCode.CONFIG_PARSE_ERROR:
    case ErrorCode.PATH_SECURITY:
    case ErrorCode.PATH_NOT_FOUND:
    case ErrorCode.FILE_TOO_LARGE:
    case ErrorCode.PORT_IN_USE:
      return "user_action";

    default:
      return "fatal";
  }
}
