export type { CreateLoggerOptions } from "./factory.js";
export { createLogger } from "./factory.js";
export { Logger, type LoggerOptions } from "./logger.js";
export type { ConsoleTransportOptions } from "./transports/console.js";
export { ConsoleTransport } from "./transports/console.js";
export type { JsonTransportOptions } from "./transports/json.js";
export { JsonTransport } from "./transports/json.js";
export type { LogEntry, LogFields, LogLevel, LogTransport } from "./types.js";
export { LOG_LEVELS, levelRank } from "./types.js";
