/**
 * A mapped model class. Hooks on model instances are registered against the
 * class itself.
 */
export type Model = abstract new (...args: never[]) => object;

/**
 * Pending changes of a unit of work (a session), as the before-flush helpers
 * read them when `before_flush` fires.
 */
export interface UnitOfWork {
  readonly new: Iterable<object>;
  readonly dirty: Iterable<object>;
  readonly deleted: Iterable<object>;
}

/**
 * Recovers the unit of work that owns an instance fired by a mapper hook.
 */
export interface UnitOfWorkLocator {
  unitOfWorkOf(instance: unknown): object | undefined;
}

/** Which pending collections a before-flush helper visits */
export type PendingState = "new" | "dirty" | "deleted";

/**
 * Instances of `model` in the given pending states, each once, in state order.
 */
export function pendingInstances(
  unitOfWork: UnitOfWork,
  model: Model,
  states: readonly PendingState[]
): object[] {
  const seen = new Set<object>();
  for (const state of states) {
    for (const instance of unitOfWork[state]) {
      if (instance instanceof model) {
        seen.add(instance);
      }
    }
  }
  return [...seen];
}
