// ============================================
// Hookchain Core - Barrel Export
// ============================================

export * from "./catalog/index.js";
export * from "./chain/index.js";
export * from "./config/index.js";
export { LocalDispatcher, type LocalDispatcherOptions } from "./dispatch/local.js";
export { SyntheticExpander } from "./dispatch/expander.js";
export { RegistrationRuntime, type RegistrationRuntimeOptions } from "./dispatch/runtime.js";
export { type HookCallback, type HookDispatcher, type ListenOptions, targetLabel } from "./dispatch/types.js";
export {
  type BuildChainOptions,
  type CreateEngineOptions,
  createEngine,
  HookChainEngine,
  toConfigError,
} from "./engine.js";
export {
  CatalogConflictError,
  CatalogLoadError,
  ChainStateError,
  DetachedInstanceError,
  HookArgumentError,
  ModelValidationError,
  TargetKindMismatchError,
  UnknownEventError,
} from "./errors/index.js";
export * from "./lifecycle/index.js";
export * from "./logger/index.js";
