// ============================================
// Argument mapping: positional vs keyword invocation
// ============================================

export type InvocationMode = "positional" | "keyword";

/** Accumulated arguments keyed by their catalog parameter names */
export type HookKwargs = Readonly<Record<string, unknown>>;

/**
 * Callable shapes per invocation mode, parameterized by return type so the
 * same table types both callbacks and conditions.
 */
export interface ArgumentShapes<R> {
  positional: (...args: unknown[]) => R;
  keyword: (kwargs: HookKwargs) => R;
}

export type ChainCallback<M extends InvocationMode> = ArgumentShapes<unknown>[M];
export type ChainCondition<M extends InvocationMode> = ArgumentShapes<boolean>[M];

/**
 * Pairs names with values; stops at the shorter list. A repeated name keeps
 * the later value.
 *
 * @example
 * ```typescript
 * zipKeywordArgs(['a', 'b', 'c'], [1, 2]); // { a: 1, b: 2 }
 * ```
 */
export function zipKeywordArgs(names: readonly string[], args: readonly unknown[]): HookKwargs {
  const kwargs: Record<string, unknown> = {};
  const count = Math.min(names.length, args.length);
  for (let i = 0; i < count; i++) {
    const name = names[i];
    if (name !== undefined) {
      kwargs[name] = args[i];
    }
  }
  return kwargs;
}

/**
 * Strategy for calling a user function with accumulated arguments.
 */
export interface ArgumentMapping<M extends InvocationMode> {
  readonly mode: M;
  call<R>(fn: ArgumentShapes<R>[M], names: readonly string[], args: readonly unknown[]): R;
}

export const positionalArguments: ArgumentMapping<"positional"> = {
  mode: "positional",
  call(fn, _names, args) {
    return fn(...args);
  },
};

export const keywordArguments: ArgumentMapping<"keyword"> = {
  mode: "keyword",
  call(fn, names, args) {
    return fn(zipKeywordArgs(names, args));
  },
};
