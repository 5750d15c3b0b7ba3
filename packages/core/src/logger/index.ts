export type { CreateLoggerOptions } from "./factory.js";
export { createLogger, createSilentLogger } from "./factory.js";
export { Logger } from "./logger.js";
export { serializeData, serializeError } from "./serialize.js";
export type { ConsoleTransportOptions, JsonTransportOptions } from "./transports/index.js";
export { ConsoleTransport, JsonTransport } from "./transports/index.js";
export type { LogEntry, LoggerOptions, LogLevel, LogTransport } from "./types.js";
export { LOG_LEVEL_PRIORITY } from "./types.js";
