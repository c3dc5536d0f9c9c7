import { context, trace } from "@opentelemetry/api";
import { type LogEntry, type LogFields, type LogLevel, type LogTransport, levelRank } from "./types.js";

export interface LoggerOptions {
  /** Least severe level that reaches the transports (default: 'info') */
  level?: LogLevel;
  bindings?: LogFields;
  transports?: LogTransport[];
}

/**
 * Level-filtered logger writing to a shared list of transports.
 * Child loggers add bindings (`component`, `chain`, ...) and share the parent's
 * transports, so a transport added later reaches every child.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: 'debug', transports: [new ConsoleTransport()] });
 * const runtimeLogger = logger.child({ component: 'runtime' });
 *
 * if (runtimeLogger.isLevelEnabled('debug')) {
 *   runtimeLogger.debug('Registered listener', { event: 'after_insert' });
 * }
 * ```
 */
export class Logger {
  readonly level: LogLevel;
  readonly bindings: LogFields;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.bindings = options.bindings ?? {};
    this.transports = options.transports ?? [];
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  /**
   * Whether `level` reaches the transports. Chain and expander code checks
   * this before building per-firing debug fields.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return levelRank(level) >= levelRank(this.level);
  }

  addTransport(transport: LogTransport): this {
    this.transports.push(transport);
    return this;
  }

  child(bindings: LogFields): Logger {
    return new Logger({
      level: this.level,
      bindings: { ...this.bindings, ...bindings },
      transports: this.transports,
    });
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isLevelEnabled(level) || this.transports.length === 0) {
      return;
    }
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      bindings: this.bindings,
      fields,
      span: activeSpan(),
    };
    for (const transport of this.transports) {
      transport.write(entry);
    }
  }
}

function activeSpan(): LogEntry["span"] {
  const span = trace.getSpan(context.active());
  if (!span) {
    return undefined;
  }
  const { traceId, spanId } = span.spanContext();
  return { traceId, spanId };
}
