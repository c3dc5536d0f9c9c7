import { ChainStateError, DetachedInstanceError } from "../errors/index.js";
import { type DeferredTarget, deferred, type StageTarget } from "../chain/deferred.js";
import type { EventChain } from "../chain/chain.js";
import type { HookDispatcher } from "../dispatch/types.js";
import type { HookChainEngine } from "../engine.js";
import {
  type Model,
  type PendingState,
  pendingInstances,
  type UnitOfWork,
  type UnitOfWorkLocator,
} from "./unit-of-work.js";

// ============================================
// After-persist helpers
// ============================================

export interface AfterPersistOptions {
  /** Second-stage event (default: "after_flush_postexec") */
  executionEvent?: string;
  /** Second-stage target (default: the unit of work owning the fired instance) */
  executionTarget?: StageTarget;
  /** Used to build the default execution target */
  locator?: UnitOfWorkLocator;
  once?: boolean;
  name?: string;
}

export const DEFAULT_EXECUTION_EVENT = "after_flush_postexec";

/**
 * Deferred target resolving the unit of work that owns the instance a mapper
 * hook fired with (its third argument).
 */
export function owningUnitOfWork(locator: UnitOfWorkLocator, eventName: string): DeferredTarget {
  return deferred((_mapper, _connection, instance) => {
    const unitOfWork = locator.unitOfWorkOf(instance);
    if (!unitOfWork) {
      throw new DetachedInstanceError(eventName);
    }
    return unitOfWork;
  });
}

function afterPersist(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  event: string,
  options: AfterPersistOptions
): EventChain<"positional"> {
  const { executionEvent = DEFAULT_EXECUTION_EVENT, locator, once, name } = options;
  let executionTarget = options.executionTarget;
  if (executionTarget === undefined) {
    if (!locator) {
      throw new ChainStateError(`${event} helper needs either a locator or an executionTarget`, name);
    }
    executionTarget = owningUnitOfWork(locator, event);
  }
  return engine.buildChain(model, event, { once, name }).chain(executionTarget, executionEvent);
}

/**
 * Chain from `after_insert` on `model` to the owning unit of work's
 * `after_flush_postexec`. Apply a callback to activate it; the callback gets
 * `(mapper, connection, instance, session, flushContext)`.
 *
 * @example
 * ```typescript
 * afterInsert(engine, User, { locator }).apply((_mapper, _conn, user) => welcome(user));
 * ```
 */
export function afterInsert(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  options: AfterPersistOptions = {}
): EventChain<"positional"> {
  return afterPersist(engine, model, "after_insert", options);
}

export function afterUpdate(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  options: AfterPersistOptions = {}
): EventChain<"positional"> {
  return afterPersist(engine, model, "after_update", options);
}

export function afterDelete(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  options: AfterPersistOptions = {}
): EventChain<"positional"> {
  return afterPersist(engine, model, "after_delete", options);
}

/** Insert or update */
export function afterSave(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  options: AfterPersistOptions = {}
): EventChain<"positional"> {
  return afterPersist(engine, model, "after_save", options);
}

/** Insert, update or delete */
export function afterTouch(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  options: AfterPersistOptions = {}
): EventChain<"positional"> {
  return afterPersist(engine, model, "after_touch", options);
}

// ============================================
// Before-flush helpers
// ============================================

export type BeforeFlushCallback = (
  session: unknown,
  flushContext: unknown,
  instances: unknown,
  instance: object
) => unknown;

/**
 * A listener waiting for its callback.
 */
export interface PendingListener<C> {
  apply(callback: C): EventChain<"positional">;
}

export interface BeforeFlushOptions {
  once?: boolean;
  name?: string;
}

function beforeFlush(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  states: readonly PendingState[],
  options: BeforeFlushOptions
): PendingListener<BeforeFlushCallback> {
  return {
    apply: (callback) =>
      engine
        .buildChain(unitOfWork, "before_flush", {
          once: options.once,
          name: options.name ?? (callback.name || undefined),
        })
        .apply((session, flushContext, instances) => {
          for (const instance of pendingInstances(unitOfWork, model, states)) {
            callback(session, flushContext, instances, instance);
          }
        }),
  };
}

/**
 * Call back once per new `model` instance when `unitOfWork` is about to flush.
 * The callback gets `(session, flushContext, instances, instance)`.
 */
export function beforeInsert(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  options: BeforeFlushOptions = {}
): PendingListener<BeforeFlushCallback> {
  return beforeFlush(engine, model, unitOfWork, ["new"], options);
}

export function beforeUpdate(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  options: BeforeFlushOptions = {}
): PendingListener<BeforeFlushCallback> {
  return beforeFlush(engine, model, unitOfWork, ["dirty"], options);
}

export function beforeDelete(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  options: BeforeFlushOptions = {}
): PendingListener<BeforeFlushCallback> {
  return beforeFlush(engine, model, unitOfWork, ["deleted"], options);
}

export function beforeSave(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  options: BeforeFlushOptions = {}
): PendingListener<BeforeFlushCallback> {
  return beforeFlush(engine, model, unitOfWork, ["new", "dirty"], options);
}

export function beforeTouch(
  engine: HookChainEngine<HookDispatcher>,
  model: Model,
  unitOfWork: UnitOfWork & object,
  options: BeforeFlushOptions = {}
): PendingListener<BeforeFlushCallback> {
  return beforeFlush(engine, model, unitOfWork, ["new", "dirty", "deleted"], options);
}
