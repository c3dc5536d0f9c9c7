/**
 * A listener as the dispatch system sees it: positional arguments in,
 * return value ignored.
 */
export type HookCallback = (...args: unknown[]) => unknown;

export interface ListenOptions {
  /** Remove the listener before its first invocation (default: false) */
  once?: boolean;
}

/**
 * The two primitive operations the engine needs from an external dispatch
 * system. `unlisten` must accept the same callback reference passed to
 * `listen` and be a no-op when it is no longer registered.
 */
export interface HookDispatcher {
  listen(target: object, hookName: string, callback: HookCallback, options?: ListenOptions): void;
  unlisten(target: object, hookName: string, callback: HookCallback): void;
  /** Kind tag of a target, when the dispatcher knows it */
  kindOf?(target: object): string | undefined;
}

/**
 * Short label for a target in log output: a class or function name, otherwise
 * the constructor name of the instance.
 */
export function targetLabel(target: object): string {
  if (typeof target === "function") {
    return target.name || "<anonymous>";
  }
  const ctor: unknown = Object.getPrototypeOf(target)?.constructor;
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object";
}
