// ============================================
// Hookchain Errors
// ============================================

import { ErrorCode, HookChainError } from "@hookchain/shared";

/**
 * Thrown when a hook or composite event name is in neither the primitive nor
 * the synthetic table of the catalog.
 */
export class UnknownEventError extends HookChainError {
  readonly eventName: string;

  constructor(eventName: string) {
    super(`Unknown event "${eventName}"`, ErrorCode.UNKNOWN_EVENT, {
      context: { eventName },
    });
    this.name = "UnknownEventError";
    this.eventName = eventName;
  }
}

/**
 * Thrown when a catalog merge would replace an existing entry without an
 * explicit override.
 */
export class CatalogConflictError extends HookChainError {
  readonly eventName: string;

  constructor(eventName: string, existingKind: string, incomingKind: string) {
    super(
      `Event "${eventName}" is already registered for target kind "${existingKind}"; ` +
        `refusing to replace it with "${incomingKind}" without an explicit override`,
      ErrorCode.CATALOG_CONFLICT,
      { context: { eventName, existingKind, incomingKind } }
    );
    this.name = "CatalogConflictError";
    this.eventName = eventName;
  }
}

export class CatalogLoadError extends HookChainError {
  constructor(message: string, cause?: unknown) {
    super(message, ErrorCode.CATALOG_LOAD_FAILED, { cause });
    this.name = "CatalogLoadError";
  }
}

/**
 * Thrown when a chain is used out of order: appended to or applied after it
 * went live, or started from a deferred target.
 */
export class ChainStateError extends HookChainError {
  constructor(message: string, chainName?: string) {
    super(message, ErrorCode.CHAIN_STATE, { context: { chain: chainName } });
    this.name = "ChainStateError";
  }
}

export class TargetKindMismatchError extends HookChainError {
  constructor(eventName: string, expected: string, actual: string) {
    super(
      `Event "${eventName}" expects a "${expected}" target but got "${actual}"`,
      ErrorCode.TARGET_KIND_MISMATCH,
      { context: { eventName, expected, actual } }
    );
    this.name = "TargetKindMismatchError";
  }
}

export class HookArgumentError extends HookChainError {
  constructor(eventName: string, expected: number, actual: number) {
    super(
      `Hook "${eventName}" fired with ${actual} argument(s), expected ${expected}`,
      ErrorCode.HOOK_ARGUMENT_MISMATCH,
      { context: { eventName, expected, actual } }
    );
    this.name = "HookArgumentError";
  }
}

/**
 * Thrown when a fired instance has no owning unit of work to chain onto.
 */
export class DetachedInstanceError extends HookChainError {
  constructor(eventName: string) {
    super(
      `Instance fired by "${eventName}" is not attached to a unit of work`,
      ErrorCode.DETACHED_INSTANCE,
      { context: { eventName } }
    );
    this.name = "DetachedInstanceError";
  }
}

export class ModelValidationError extends HookChainError {
  readonly validator: string;

  constructor(model: string, validator: string) {
    super(`Validator "${validator}" rejected ${model} instance`, ErrorCode.MODEL_VALIDATION_FAILED, {
      context: { model, validator },
    });
    this.name = "ModelValidationError";
    this.validator = validator;
  }
}
