import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

/**
 * Options for creating a logger via createLogger factory.
 */
export interface CreateLoggerOptions {
  /** Logger name for identification (default: 'hookchain') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** If true, output JSON format to console (default: false) */
  json?: boolean;
  /** Force colored console output on or off (default: auto-detect) */
  colors?: boolean;
  /** Include timestamps in console output (default: true) */
  timestamps?: boolean;
}

/**
 * Factory function to create a Logger with common transport configurations.
 *
 * @example
 * ```typescript
 * // Human-readable debug output while wiring chains
 * const logger = createLogger({ level: 'debug' });
 *
 * // JSON output for log aggregation
 * const logger = createLogger({ level: 'info', json: true });
 *
 * // No transports at all
 * const logger = createLogger({ console: false });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const logger = new Logger({
    level: options.level ?? "info",
    bindings: { logger: options.name ?? "hookchain" },
  });

  if (options.console ?? true) {
    if (options.json) {
      logger.addTransport(new JsonTransport());
    } else {
      logger.addTransport(
        new ConsoleTransport({
          colors: options.colors,
          timestamps: options.timestamps,
        })
      );
    }
  }

  return logger;
}
