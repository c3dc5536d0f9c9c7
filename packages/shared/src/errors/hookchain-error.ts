import { type ErrorCategory, type ErrorCode, categoryOf } from "./codes.js";

/**
 * Options for creating a HookChainError.
 */
export interface HookChainErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional context about the error */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all hookchain errors.
 *
 * Carries a numbered {@link ErrorCode}, optional structured context and the
 * error cause. Subclasses only set a name and a message.
 */
export class HookChainError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, options?: HookChainErrorOptions) {
    super(message, { cause: options?.cause });
    this.name = "HookChainError";
    this.code = code;
    this.context = options?.context;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get category(): ErrorCategory {
    return categoryOf(this.code);
  }

  /**
   * Returns a JSON-serializable representation of this error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      context: this.context,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Type guard for any hookchain error, optionally narrowed to one code.
 */
export function isHookChainError(error: unknown, code?: ErrorCode): error is HookChainError {
  if (!(error instanceof HookChainError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
