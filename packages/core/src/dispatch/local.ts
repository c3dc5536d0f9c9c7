import type { EventCatalog } from "../catalog/catalog.js";
import { HookArgumentError } from "../errors/index.js";
import type { HookCallback, HookDispatcher, ListenOptions } from "./types.js";

interface Listener {
  readonly callback: HookCallback;
  readonly once: boolean;
}

type HookListeners = Map<string, Map<HookCallback, Listener>>;

/**
 * Configuration options for LocalDispatcher.
 */
export interface LocalDispatcherOptions {
  /** Catalog used to check argument counts on fire() */
  catalog?: EventCatalog;
  /**
   * When true (and a catalog is given), fire() throws HookArgumentError if the
   * argument count differs from the hook's declared parameters.
   * Useful for development/testing.
   */
  validateArguments?: boolean;
}

/**
 * In-process, synchronous hook dispatcher.
 *
 * Listeners are keyed per target object (weakly, so a dropped target takes its
 * listeners with it) and per hook name. Firing calls the listeners registered
 * at the moment fire() starts, in registration order; listeners added while a
 * hook is firing wait for its next firing.
 *
 * @example
 * ```typescript
 * const dispatcher = new LocalDispatcher();
 * dispatcher.listen(session, 'after_commit', (s) => console.log('committed', s));
 * dispatcher.fire(session, 'after_commit', session);
 * ```
 */
export class LocalDispatcher implements HookDispatcher {
  private readonly listeners = new WeakMap<object, HookListeners>();
  private readonly kinds = new WeakMap<object, string>();
  private readonly catalog?: EventCatalog;
  private readonly validateArguments: boolean;

  constructor(options: LocalDispatcherOptions = {}) {
    this.catalog = options.catalog;
    this.validateArguments = options.validateArguments ?? false;
  }

  listen(target: object, hookName: string, callback: HookCallback, options: ListenOptions = {}): void {
    let hooks = this.listeners.get(target);
    if (!hooks) {
      hooks = new Map();
      this.listeners.set(target, hooks);
    }
    let registered = hooks.get(hookName);
    if (!registered) {
      registered = new Map();
      hooks.set(hookName, registered);
    }
    registered.set(callback, { callback, once: options.once ?? false });
  }

  unlisten(target: object, hookName: string, callback: HookCallback): void {
    const hooks = this.listeners.get(target);
    const registered = hooks?.get(hookName);
    if (!hooks || !registered) {
      return;
    }
    registered.delete(callback);
    // Clean up empty maps
    if (registered.size === 0) {
      hooks.delete(hookName);
    }
  }

  /**
   * Invoke every listener of `hookName` on `target` with `args`.
   * Exceptions from a listener propagate and stop the remaining listeners.
   *
   * @returns Number of listeners invoked
   * @throws HookArgumentError in validating mode when the arity is wrong
   */
  fire(target: object, hookName: string, ...args: unknown[]): number {
    if (this.validateArguments && this.catalog) {
      const expected = this.catalog.lookup(hookName).paramNames.length;
      if (args.length !== expected) {
        throw new HookArgumentError(hookName, expected, args.length);
      }
    }

    const registered = this.listeners.get(target)?.get(hookName);
    if (!registered) {
      return 0;
    }

    let invoked = 0;
    for (const listener of [...registered.values()]) {
      // Removed (or replaced) by an earlier listener during this firing
      if (registered.get(listener.callback) !== listener) {
        continue;
      }
      if (listener.once) {
        this.unlisten(target, hookName, listener.callback);
      }
      listener.callback(...args);
      invoked++;
    }
    return invoked;
  }

  hasListeners(target: object, hookName?: string): boolean {
    return this.listenerCount(target, hookName) > 0;
  }

  /**
   * Listeners on `target` for one hook, or for all hooks when omitted.
   */
  listenerCount(target: object, hookName?: string): number {
    const hooks = this.listeners.get(target);
    if (!hooks) {
      return 0;
    }
    if (hookName !== undefined) {
      return hooks.get(hookName)?.size ?? 0;
    }
    let total = 0;
    for (const registered of hooks.values()) {
      total += registered.size;
    }
    return total;
  }

  /**
   * Remove listeners on `target` for one hook, or for all hooks when omitted.
   */
  clear(target: object, hookName?: string): void {
    if (hookName === undefined) {
      this.listeners.delete(target);
    } else {
      this.listeners.get(target)?.delete(hookName);
    }
  }

  /**
   * Record the kind tag reported by kindOf() for `target`.
   */
  describeTarget(target: object, kind: string): this {
    this.kinds.set(target, kind);
    return this;
  }

  kindOf(target: object): string | undefined {
    return this.kinds.get(target);
  }
}
