/** Levels from most to least verbose; config accepts exactly these names */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Structured key/value pairs attached to a log line */
export type LogFields = Readonly<Record<string, unknown>>;

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * One record handed to every transport.
 */
export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly timestamp: Date;
  /** Fields bound by the logger and its parents, e.g. `{ component: "chain" }` */
  readonly bindings: LogFields;
  /** Fields passed with this call */
  readonly fields?: LogFields;
  /** Ids of the active OpenTelemetry span, if any */
  readonly span?: { readonly traceId: string; readonly spanId: string };
}

export interface LogTransport {
  write(entry: LogEntry): void;
}
