export {
  type ConflictPolicy,
  describeHook,
  EventCatalog,
  type HookDescriptor,
  type MergeOptions,
} from "./catalog.js";
export {
  type BuildCatalogOptions,
  buildCatalog,
  DEFAULT_MANIFEST_PATH,
  defaultCatalog,
  loadHookManifest,
} from "./default.js";
export {
  type HookClassDescriptor,
  HookClassSchema,
  type HookManifest,
  HookManifestSchema,
} from "./schema.js";
export { resolvableExpansions, SYNTHETIC_DESCRIPTORS, SYNTHETIC_EXPANSIONS } from "./synthetic.js";
