import type { EventCatalog, HookDescriptor } from "../catalog/catalog.js";
import { TargetKindMismatchError } from "../errors/index.js";
import type { Logger } from "../logger/logger.js";
import { SyntheticExpander } from "./expander.js";
import type { HookCallback, HookDispatcher, ListenOptions } from "./types.js";

/**
 * Configuration options for RegistrationRuntime.
 */
export interface RegistrationRuntimeOptions {
  dispatcher: HookDispatcher;
  catalog: EventCatalog;
  /** Composite table override (default: SYNTHETIC_EXPANSIONS) */
  expansions?: Readonly<Record<string, readonly string[]>>;
  logger?: Logger;
  /**
   * Check each target against the catalog's targetKind at registration,
   * when the dispatcher implements kindOf(). Default: false.
   */
  validateTargetKinds?: boolean;
}

/**
 * The engine's only door to the dispatch system. Composite events are routed
 * through the {@link SyntheticExpander}; callback identity is preserved so
 * unlisten() removes exactly what listen() installed.
 */
export class RegistrationRuntime {
  readonly catalog: EventCatalog;
  readonly expander: SyntheticExpander;
  private readonly dispatcher: HookDispatcher;
  private readonly logger?: Logger;
  private readonly validateTargetKinds: boolean;

  constructor(options: RegistrationRuntimeOptions) {
    this.dispatcher = options.dispatcher;
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.validateTargetKinds = options.validateTargetKinds ?? false;
    this.expander = new SyntheticExpander(options.catalog, {
      expansions: options.expansions,
      logger: options.logger,
    });
  }

  /**
   * @throws UnknownEventError for an event the catalog does not know
   * @throws TargetKindMismatchError in validating mode
   */
  listen(target: object, eventName: string, callback: HookCallback, options: ListenOptions = {}): void {
    if (this.validateTargetKinds) {
      this.checkTargetKind(target, eventName);
    }
    this.expander.listen(this.dispatcher, target, eventName, callback, options.once ?? false);
  }

  unlisten(target: object, eventName: string, callback: HookCallback): void {
    this.expander.unlisten(this.dispatcher, target, eventName, callback);
  }

  lookup(eventName: string): HookDescriptor {
    return this.catalog.lookup(eventName);
  }

  private checkTargetKind(target: object, eventName: string): void {
    const actual = this.dispatcher.kindOf?.(target);
    if (actual === undefined) {
      return;
    }
    const expected = this.catalog.lookup(eventName).targetKind;
    if (actual !== expected) {
      this.logger?.warn("Rejected registration against a target of the wrong kind", {
        event: eventName,
        expected,
        actual,
      });
      throw new TargetKindMismatchError(eventName, expected, actual);
    }
  }
}
