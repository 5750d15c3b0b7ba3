// ============================================
// mdlive Errors - Barrel Export
// ============================================

export {
  BridgeTimeoutError,
  BridgeUnavailableError,
  ConfigError,
  DeliveryFailureError,
  FileTooLargeError,
  MdliveError,
  type MdliveErrorOptions,
  NotFoundError,
  PortInUseError,
  SecurityError,
  StaleConnectionError,
  toError,
  WatcherIOError,
} from "./types.js";
