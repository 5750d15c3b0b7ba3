// ============================================
// mdlive Error Codes
// ============================================

/**
 * Centralized error codes for mdlive.
 * Error code ranges:
 * - 1xxx: General/System errors
 * - 2xxx: Configuration errors
 * - 3xxx: Path access errors
 * - 4xxx: Watcher and bridge errors
 * - 5xxx: Live connection errors
 * - 7xxx: Server lifecycle errors
 */
export enum ErrorCode {
  // General Errors (1xxx)
  INTERNAL_ERROR = 1001,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2001,
  CONFIG_NOT_FOUND = 2002,
  CONFIG_PARSE_ERROR = 2003,

  // Path Errors (3xxx)
  PATH_SECURITY = 3001,
  PATH_NOT_FOUND = 3002,
  FILE_TOO_LARGE = 3003,

  // Watcher / Bridge Errors (4xxx)
  WATCHER_IO = 4001,
  BRIDGE_TIMEOUT = 4002,
  BRIDGE_UNAVAILABLE = 4003,

  // Live Connection Errors (5xxx)
  DELIVERY_FAILED = 5001,
  CONNECTION_STALE = 5002,

  // Server Errors (7xxx)
  PORT_IN_USE = 7001,
}
