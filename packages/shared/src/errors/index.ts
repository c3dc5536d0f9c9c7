export { categoryOf, type ErrorCategory, ErrorCode } from "./codes.js";
export {
  HookChainError,
  type HookChainErrorOptions,
  isHookChainError,
} from "./hookchain-error.js";
