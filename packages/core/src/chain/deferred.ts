/**
 * Computes the next stage's target from the arguments the previous stage
 * fired with.
 */
export type TargetResolver = (...firedArgs: unknown[]) => object;

/**
 * Marks a stage target as "decide when the previous stage fires".
 *
 * @example
 * ```typescript
 * // mapper hooks fire with (mapper, connection, target)
 * const owningSession = deferred((_mapper, _conn, target) => sessionOf(target));
 * ```
 */
export class DeferredTarget {
  readonly resolver: TargetResolver;

  constructor(resolver: TargetResolver) {
    this.resolver = resolver;
  }

  resolve(firedArgs: readonly unknown[]): object {
    return this.resolver(...firedArgs);
  }
}

export function deferred(resolver: TargetResolver): DeferredTarget {
  return new DeferredTarget(resolver);
}

/** A stage target: a concrete object, or one resolved at firing time */
export type StageTarget = object | DeferredTarget;
