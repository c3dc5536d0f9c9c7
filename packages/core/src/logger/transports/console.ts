import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Prefix lines with a timestamp (default: true) */
  timestamps?: boolean;
  /** Line sinks (default: console.log / console.error) */
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

function shouldEnableColors(): boolean {
  if (process.env.NO_COLOR !== undefined || process.env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

/**
 * Human-readable lines for local debugging of chain wiring:
 *
 * ```
 * [2025-12-26 10:00:00] DEBUG chain: Performed one time chain registration {"chain":"audit","stage":1}
 * ```
 *
 * The `component` binding becomes the line's prefix; the other bindings are
 * left out. Errors go to stderr.
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly timestamps: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.timestamps = options.timestamps ?? true;
    this.stdout = options.stdout ?? console.log;
    this.stderr = options.stderr ?? console.error;
  }

  write(entry: LogEntry): void {
    const parts: string[] = [];
    if (this.timestamps) {
      parts.push(`[${entry.timestamp.toISOString().replace("T", " ").slice(0, 19)}]`);
    }
    const level = entry.level.toUpperCase();
    parts.push(this.useColors ? `${LEVEL_COLORS[entry.level]}${level}${RESET}` : level);

    const component = entry.bindings["component"];
    parts.push(typeof component === "string" ? `${component}: ${entry.message}` : entry.message);

    if (entry.fields && Object.keys(entry.fields).length > 0) {
      parts.push(JSON.stringify(entry.fields));
    }

    const line = parts.join(" ");
    if (entry.level === "error" || entry.level === "fatal") {
      this.stderr(line);
    } else {
      this.stdout(line);
    }
  }
}
