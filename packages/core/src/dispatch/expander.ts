import type { EventCatalog } from "../catalog/catalog.js";
import { resolvableExpansions, SYNTHETIC_EXPANSIONS } from "../catalog/synthetic.js";
import { UnknownEventError } from "../errors/index.js";
import type { Logger } from "../logger/logger.js";
import { type HookCallback, type HookDispatcher, targetLabel } from "./types.js";

/**
 * Turns one registration against a composite event into one registration per
 * primitive member. The members stay uncorrelated: each one fires the shared
 * callback on its own.
 *
 * Every member of an active composite is a primitive in the catalog. From the
 * built-in table, composites with a member the catalog lacks are left out; a
 * custom table must resolve completely.
 */
export class SyntheticExpander {
  private readonly catalog: EventCatalog;
  private readonly expansions: ReadonlyMap<string, readonly string[]>;
  private readonly logger?: Logger;

  /**
   * @throws UnknownEventError if a custom expansion names a hook the catalog lacks
   */
  constructor(
    catalog: EventCatalog,
    options: { expansions?: Readonly<Record<string, readonly string[]>>; logger?: Logger } = {}
  ) {
    this.catalog = catalog;
    this.logger = options.logger;
    this.expansions = options.expansions
      ? checkedExpansions(catalog, options.expansions)
      : resolvableExpansions(catalog, SYNTHETIC_EXPANSIONS);
  }

  isComposite(name: string): boolean {
    return this.expansions.has(name);
  }

  /** Composite names this expander routes, sorted */
  composites(): string[] {
    return [...this.expansions.keys()].sort();
  }

  /**
   * Primitive hook names behind `name`; a known primitive expands to itself.
   *
   * @throws UnknownEventError if `name` is neither an active composite nor a catalog primitive
   */
  expand(name: string): readonly string[] {
    const expansion = this.expansions.get(name);
    if (expansion) {
      return expansion;
    }
    // A synthetic entry without an active expansion has no primitive to bind
    if (!this.catalog.has(name) || this.catalog.isSynthetic(name)) {
      throw new UnknownEventError(name);
    }
    return [name];
  }

  listen(
    dispatcher: HookDispatcher,
    target: object,
    event: string,
    callback: HookCallback,
    once: boolean
  ): readonly string[] {
    const primitives = this.expand(event);
    for (const primitive of primitives) {
      dispatcher.listen(target, primitive, callback, { once });
    }
    if (this.isComposite(event) && this.logger?.isLevelEnabled("debug")) {
      this.logger.debug(`Registered listener for composite event "${event}"`, {
        target: targetLabel(target),
        primitives,
        once,
      });
    }
    return primitives;
  }

  unlisten(
    dispatcher: HookDispatcher,
    target: object,
    event: string,
    callback: HookCallback
  ): readonly string[] {
    const primitives = this.expand(event);
    for (const primitive of primitives) {
      dispatcher.unlisten(target, primitive, callback);
    }
    return primitives;
  }
}

function checkedExpansions(
  catalog: EventCatalog,
  expansions: Readonly<Record<string, readonly string[]>>
): ReadonlyMap<string, readonly string[]> {
  const checked = new Map<string, readonly string[]>();
  for (const [composite, members] of Object.entries(expansions)) {
    for (const member of members) {
      if (!catalog.has(member) || catalog.isSynthetic(member)) {
        throw new UnknownEventError(member);
      }
    }
    checked.set(composite, members);
  }
  return checked;
}
