import { ChainStateError } from "../errors/index.js";
import type { RegistrationRuntime } from "../dispatch/runtime.js";
import { type HookCallback, targetLabel } from "../dispatch/types.js";
import type { Logger } from "../logger/logger.js";
import type { ArgumentMapping, ChainCallback, ChainCondition, InvocationMode } from "./arguments.js";
import { DeferredTarget, type StageTarget } from "./deferred.js";

interface Stage<M extends InvocationMode> {
  readonly target: StageTarget;
  readonly event: string;
  /** Checked on the accumulated arguments before this stage is registered */
  readonly condition?: ChainCondition<M>;
}

/**
 * One subscription the chain installed and has not seen retire yet.
 * Stage ≥ 1 subscriptions are spawned per chain attempt, so several may be
 * live for the same stage at once.
 */
interface LiveSubscription {
  readonly stage: number;
  readonly target: object;
  readonly event: string;
  readonly callback: HookCallback;
}

export interface EventChainOptions {
  /** Retire stage 0 after its first firing too (default: false) */
  once?: boolean;
  /** Name used in log output (default: the callback's function name) */
  name?: string;
  logger?: Logger;
}

/**
 * A listener that waits for a sequence of hooks, possibly on different
 * targets, before calling its callback with every argument fired along the way.
 *
 * Stage 0 stays registered (unless `once`) and every firing starts an
 * independent chain attempt with its own argument accumulator. Each later
 * stage is registered single-shot when the stage before it fires, so it
 * correlates with that particular occurrence.
 *
 * @example
 * ```typescript
 * engine
 *   .buildChain(User, 'after_insert')
 *   .chain(deferred((_mapper, _conn, user) => sessionOf(user)), 'after_commit')
 *   .apply((mapper, connection, user, session) => {
 *     notifyCreated(user);
 *   });
 * ```
 */
export class EventChain<M extends InvocationMode = "positional"> {
  private readonly runtime: RegistrationRuntime;
  private readonly mapping: ArgumentMapping<M>;
  private readonly origin: object;
  private readonly stages: Stage<M>[];
  private readonly once: boolean;
  private readonly logger?: Logger;
  private readonly live = new Set<LiveSubscription>();
  private callback?: ChainCallback<M>;
  private paramNames: readonly string[] = [];
  private chainName?: string;

  constructor(
    runtime: RegistrationRuntime,
    target: object,
    event: string,
    mapping: ArgumentMapping<M>,
    options: EventChainOptions = {}
  ) {
    if (target instanceof DeferredTarget) {
      throw new ChainStateError(
        "The first stage of a chain needs a concrete target; nothing has fired to resolve a deferred one",
        options.name
      );
    }
    this.runtime = runtime;
    this.mapping = mapping;
    this.origin = target;
    this.stages = [{ target, event }];
    this.once = options.once ?? false;
    this.chainName = options.name;
    this.logger = options.logger?.child({ component: "chain" });
  }

  get name(): string {
    return this.chainName ?? "<anonymous chain>";
  }

  get mode(): M {
    return this.mapping.mode;
  }

  get length(): number {
    return this.stages.length;
  }

  get isApplied(): boolean {
    return this.callback !== undefined;
  }

  /** Subscriptions currently installed by this chain, across all attempts */
  get liveSubscriptions(): number {
    return this.live.size;
  }

  /**
   * Append a stage. The condition sees every argument accumulated up to the
   * firing of the previous stage; returning false abandons that attempt.
   */
  chain(target: StageTarget, event: string, condition?: ChainCondition<M>): this {
    this.assertNotApplied("extend");
    this.stages.push({ target, event, condition });
    return this;
  }

  /**
   * Attach the callback and register stage 0. The chain is live on return.
   *
   * @throws UnknownEventError if any stage names an event the catalog lacks
   * @throws ChainStateError if the chain was already applied
   */
  apply(callback: ChainCallback<M>): this {
    this.assertNotApplied("apply");
    this.paramNames = this.stages.flatMap((stage) => this.runtime.lookup(stage.event).paramNames);
    if (this.chainName === undefined && callback.name) {
      this.chainName = callback.name;
    }
    this.callback = callback;
    this.listenStage(0, this.origin, [], callback);
    return this;
  }

  /**
   * Unregister everything this chain installed, including tails spawned by
   * earlier stage-0 firings that have not fired yet.
   *
   * @returns Number of subscriptions removed
   */
  remove(): number {
    const removed = this.live.size;
    for (const subscription of [...this.live]) {
      this.retire(subscription);
    }
    this.logger?.debug("Removed chain", { chain: this.name, removed });
    return removed;
  }

  private listenStage(
    index: number,
    target: object,
    prior: readonly unknown[],
    callback: ChainCallback<M>
  ): void {
    const stage = this.stageAt(index);
    const handler =
      index === this.stages.length - 1
        ? this.terminal(prior, callback)
        : this.advance(index + 1, prior, callback);
    const once = this.once || index > 0;

    this.subscribe(index, target, stage.event, handler, once);
    if (this.logger?.isLevelEnabled("debug")) {
      this.logger.debug(`Performed ${once ? "one time " : ""}${index > 0 ? "chain " : ""}registration`, {
        chain: this.name,
        stage: index,
        target: targetLabel(target),
        event: stage.event,
      });
    }
  }

  /**
   * Handler for the stage before `next`: accumulate, check, resolve, register.
   */
  private advance(next: number, prior: readonly unknown[], callback: ChainCallback<M>): HookCallback {
    return (...args) => {
      const accumulated = [...prior, ...args];
      const stage = this.stageAt(next);

      if (stage.condition && !this.mapping.call<boolean>(stage.condition, this.paramNames, accumulated)) {
        if (this.logger?.isLevelEnabled("debug")) {
          this.logger.debug("Chain attempt abandoned: condition not met", {
            chain: this.name,
            stage: next,
            event: stage.event,
          });
        }
        return;
      }

      const target = stage.target instanceof DeferredTarget ? stage.target.resolve(args) : stage.target;
      this.listenStage(next, target, accumulated, callback);
    };
  }

  private terminal(prior: readonly unknown[], callback: ChainCallback<M>): HookCallback {
    return (...args) => this.mapping.call<unknown>(callback, this.paramNames, [...prior, ...args]);
  }

  private subscribe(
    stage: number,
    target: object,
    event: string,
    handler: HookCallback,
    once: boolean
  ): void {
    const subscription: LiveSubscription = {
      stage,
      target,
      event,
      // A single-shot composite retires all of its members on the first firing
      callback: once
        ? (...args) => {
            if (!this.retire(subscription)) {
              return undefined;
            }
            return handler(...args);
          }
        : handler,
    };
    this.runtime.listen(target, event, subscription.callback, { once });
    this.live.add(subscription);
  }

  private retire(subscription: LiveSubscription): boolean {
    if (!this.live.delete(subscription)) {
      return false;
    }
    this.runtime.unlisten(subscription.target, subscription.event, subscription.callback);
    return true;
  }

  private stageAt(index: number): Stage<M> {
    const stage = this.stages[index];
    if (!stage) {
      throw new ChainStateError(`Chain has no stage ${index}`, this.chainName);
    }
    return stage;
  }

  private assertNotApplied(action: string): void {
    if (this.isApplied) {
      throw new ChainStateError(`Cannot ${action} chain "${this.name}" after it was applied`, this.chainName);
    }
  }
}
