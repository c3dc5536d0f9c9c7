import type { HookKwargs } from "../chain/arguments.js";
import type { EventChain } from "../chain/chain.js";
import type { HookDispatcher } from "../dispatch/types.js";
import type { HookChainEngine } from "../engine.js";
import { ModelValidationError } from "../errors/index.js";
import { owningUnitOfWork } from "./helpers.js";
import type { Model, UnitOfWorkLocator } from "./unit-of-work.js";

/**
 * Receives the keyword arguments of both stages, e.g.
 * `{ mapper, connection, target, session, flush_context }`.
 * Returning `false` rejects the instance; throwing works too.
 */
export type ModelValidator = (kwargs: HookKwargs) => boolean | void;

export interface ValidatorOptions {
  /** Event that marks an instance for validation (default: "before_save") */
  triggerEvent?: string;
  /** Unit-of-work event the validator runs on (default: "after_flush") */
  executionEvent?: string;
}

/**
 * Explicit per-model validator registry. Each validator is a two-stage keyword
 * chain: the trigger on the model, then the execution event on the unit of
 * work owning the triggering instance.
 *
 * @example
 * ```typescript
 * const validators = new ModelValidators(engine, locator);
 * validators.register(User, 'hasEmail', ({ target }) => target instanceof User && target.email !== '');
 * ```
 */
export class ModelValidators {
  private readonly engine: HookChainEngine<HookDispatcher>;
  private readonly locator: UnitOfWorkLocator;
  private readonly registry = new Map<Model, Map<string, EventChain<"keyword">>>();

  constructor(engine: HookChainEngine<HookDispatcher>, locator: UnitOfWorkLocator) {
    this.engine = engine;
    this.locator = locator;
  }

  /**
   * Register `validator` under `name` for `model`, replacing any validator
   * already registered under that name.
   */
  register(
    model: Model,
    name: string,
    validator: ModelValidator,
    options: ValidatorOptions = {}
  ): EventChain<"keyword"> {
    const { triggerEvent = "before_save", executionEvent = "after_flush" } = options;
    const qualifiedName = `${model.name}.${name}`;

    let validators = this.registry.get(model);
    if (!validators) {
      validators = new Map();
      this.registry.set(model, validators);
    }
    validators.get(name)?.remove();

    const chain = this.engine
      .buildChain(model, triggerEvent, { useKwargs: true, name: qualifiedName })
      .chain(owningUnitOfWork(this.locator, triggerEvent), executionEvent)
      .apply((kwargs) => {
        if (validator(kwargs) === false) {
          throw new ModelValidationError(model.name, name);
        }
      });
    validators.set(name, chain);
    return chain;
  }

  validatorsFor(model: Model): string[] {
    return [...(this.registry.get(model)?.keys() ?? [])];
  }

  /**
   * Remove every validator of `model`.
   *
   * @returns Number of validators removed
   */
  remove(model: Model): number {
    const validators = this.registry.get(model);
    if (!validators) {
      return 0;
    }
    for (const chain of validators.values()) {
      chain.remove();
    }
    this.registry.delete(model);
    return validators.size;
  }
}
