/**
 * Process exit codes for the mdlive CLI.
 *
 * - 0: Success
 * - 1: General error
 * - 2: Configuration error
 * - 3: Served path not found
 * - 5: Port in use
 *
 * @module cli/commands/exit-codes
 */

import { ConfigError, PortInUseError } from "@mdlive/core";
import { ErrorCode } from "@mdlive/shared";

// =============================================================================
// Exit Code Constants
// =============================================================================

export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid flags, environment or config file */
  CONFIG_ERROR: 2,
  /** The path to serve does not exist */
  NOT_FOUND: 3,
  /** The requested address is already bound */
  PORT_IN_USE: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// =============================================================================
// Mapping
// =============================================================================

/**
 * Map an error raised while starting the server to an exit code.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return error.code === ErrorCode.CONFIG_NOT_FOUND ? EXIT_CODES.NOT_FOUND : EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof PortInUseError) {
    return EXIT_CODES.PORT_IN_USE;
  }
  return EXIT_CODES.ERROR;
}
