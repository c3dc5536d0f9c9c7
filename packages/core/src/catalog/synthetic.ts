import type { EventCatalog, HookDescriptor } from "./catalog.js";

/**
 * Composite events and the primitive hooks each one stands for.
 * Registering a composite registers every member independently (OR, not AND).
 */
export const SYNTHETIC_EXPANSIONS: Readonly<Record<string, readonly string[]>> = {
  before_save: ["before_insert", "before_update"],
  after_save: ["after_insert", "after_update"],
  before_touch: ["before_insert", "before_update", "before_delete"],
  after_touch: ["after_insert", "after_update", "after_delete"],
};

// Every member of every composite fires with the mapper persistence signature,
// so the composite borrows it for keyword mapping.
const MAPPER_PERSIST_PARAMS = ["mapper", "connection", "target"] as const;

function compositeDescriptors(): Record<string, HookDescriptor> {
  const descriptors: Record<string, HookDescriptor> = {};
  for (const name of Object.keys(SYNTHETIC_EXPANSIONS)) {
    descriptors[name] = { targetKind: "mapper", paramNames: MAPPER_PERSIST_PARAMS };
  }
  return descriptors;
}

export const SYNTHETIC_DESCRIPTORS: Readonly<Record<string, HookDescriptor>> = compositeDescriptors();

/**
 * The composites of `table` whose members are all primitives of `catalog`.
 * A manifest without mapper hooks resolves none of the built-in ones.
 */
export function resolvableExpansions(
  catalog: EventCatalog,
  table: Readonly<Record<string, readonly string[]>> = SYNTHETIC_EXPANSIONS
): Map<string, readonly string[]> {
  const resolvable = new Map<string, readonly string[]>();
  for (const [composite, members] of Object.entries(table)) {
    if (members.every((member) => catalog.has(member) && !catalog.isSynthetic(member))) {
      resolvable.set(composite, members);
    }
  }
  return resolvable;
}
