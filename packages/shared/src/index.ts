// ============================================
// Hookchain Shared Types
// ============================================

// Errors
export {
  categoryOf,
  type ErrorCategory,
  ErrorCode,
  HookChainError,
  type HookChainErrorOptions,
  isHookChainError,
} from "./errors/index.js";
// Result type (shared so both packages agree on one shape)
export type { Result } from "./types/result.js";
export { Err, isErr, isOk, map, Ok, unwrap, unwrapOr } from "./types/result.js";
