import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Line sink (default: console.log) */
  output?: (line: string) => void;
}

/**
 * One flat JSON object per entry. Bindings, then fields, then span ids are
 * spread beside `time`, `level` and `msg`; those three keys always win.
 *
 * @example
 * ```typescript
 * // {"component":"chain","chain":"audit","removed":2,"time":"2025-12-26T10:00:00.000Z","level":"debug","msg":"Removed chain"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? console.log;
  }

  write(entry: LogEntry): void {
    this.output(
      JSON.stringify({
        ...entry.bindings,
        ...entry.fields,
        ...entry.span,
        time: entry.timestamp.toISOString(),
        level: entry.level,
        msg: entry.message,
      })
    );
  }
}
