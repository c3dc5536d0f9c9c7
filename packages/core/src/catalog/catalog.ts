import { CatalogConflictError, UnknownEventError } from "../errors/index.js";
import type { HookClassDescriptor } from "./schema.js";

/**
 * What a hook is registered against and the names of the arguments it fires
 * with, in the exact positional order the dispatcher supplies them.
 */
export interface HookDescriptor {
  readonly targetKind: string;
  readonly paramNames: readonly string[];
}

/**
 * What to do when a merge brings a name the catalog already has.
 * - `reject`: throw {@link CatalogConflictError} unless the name is listed in `overrides`
 * - `override`: last write wins
 */
export type ConflictPolicy = "reject" | "override";

export interface MergeOptions {
  onConflict?: ConflictPolicy;
  /** Names allowed to replace an existing entry under the `reject` policy */
  overrides?: readonly string[];
  /** Mark merged entries as synthetic (composite) events */
  synthetic?: boolean;
}

export function describeHook(targetKind: string, paramNames: readonly string[]): HookDescriptor {
  return Object.freeze({ targetKind, paramNames: Object.freeze([...paramNames]) });
}

/**
 * Registry of every hook name the engine can listen to, primitive and synthetic.
 *
 * @example
 * ```typescript
 * const catalog = EventCatalog.fromHookClasses(manifest.hookClasses)
 *   .merge(SYNTHETIC_DESCRIPTORS, { synthetic: true });
 *
 * catalog.lookup('after_insert');
 * // { targetKind: 'mapper', paramNames: ['mapper', 'connection', 'target'] }
 * ```
 */
export class EventCatalog {
  private readonly entries = new Map<string, HookDescriptor>();
  private readonly synthetic = new Set<string>();

  /**
   * Build primitive entries from the dispatch system's hook classes.
   * Two classes declaring the same hook name is a conflict like any other merge.
   */
  static fromHookClasses(
    hookClasses: readonly HookClassDescriptor[],
    options: Omit<MergeOptions, "synthetic"> = {}
  ): EventCatalog {
    const catalog = new EventCatalog();
    for (const hookClass of hookClasses) {
      const descriptors: Record<string, HookDescriptor> = {};
      for (const [hookName, paramNames] of Object.entries(hookClass.hooks)) {
        descriptors[hookName] = describeHook(hookClass.targetKind, paramNames);
      }
      catalog.merge(descriptors, options);
    }
    return catalog;
  }

  merge(descriptors: Readonly<Record<string, HookDescriptor>>, options: MergeOptions = {}): this {
    const policy = options.onConflict ?? "reject";
    const overrides = new Set(options.overrides ?? []);

    for (const [name, descriptor] of Object.entries(descriptors)) {
      const existing = this.entries.get(name);
      if (existing && policy === "reject" && !overrides.has(name)) {
        throw new CatalogConflictError(name, existing.targetKind, descriptor.targetKind);
      }
      this.entries.set(name, describeHook(descriptor.targetKind, descriptor.paramNames));
      if (options.synthetic) {
        this.synthetic.add(name);
      } else {
        this.synthetic.delete(name);
      }
    }
    return this;
  }

  /**
   * @throws UnknownEventError if the name is not in the catalog
   */
  lookup(name: string): HookDescriptor {
    const descriptor = this.entries.get(name);
    if (!descriptor) {
      throw new UnknownEventError(name);
    }
    return descriptor;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  isSynthetic(name: string): boolean {
    return this.synthetic.has(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  get size(): number {
    return this.entries.size;
  }
}
