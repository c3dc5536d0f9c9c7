import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogLoadError } from "../errors/index.js";
import { type ConflictPolicy, EventCatalog, type HookDescriptor } from "./catalog.js";
import { type HookManifest, HookManifestSchema } from "./schema.js";
import { resolvableExpansions, SYNTHETIC_DESCRIPTORS } from "./synthetic.js";

/** Path of the hook manifest shipped next to this module */
export const DEFAULT_MANIFEST_PATH = fileURLToPath(new URL("./hooks.json", import.meta.url));

/**
 * Read and validate a hook manifest file.
 *
 * @throws CatalogLoadError if the file is missing, not JSON, or fails the schema
 */
export function loadHookManifest(filePath: string = DEFAULT_MANIFEST_PATH): HookManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new CatalogLoadError(
      `Failed to read hook manifest ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }

  const parsed = HookManifestSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CatalogLoadError(`Invalid hook manifest ${filePath}: ${issues}`, parsed.error);
  }
  return parsed.data;
}

export interface BuildCatalogOptions {
  onConflict?: ConflictPolicy;
  overrides?: readonly string[];
}

/**
 * Primitive entries from the manifest, then the synthetic composites whose
 * members the manifest declares.
 */
export function buildCatalog(manifest: HookManifest, options: BuildCatalogOptions = {}): EventCatalog {
  const catalog = EventCatalog.fromHookClasses(manifest.hookClasses, options);
  const composites: Record<string, HookDescriptor> = {};
  for (const name of resolvableExpansions(catalog).keys()) {
    const descriptor = SYNTHETIC_DESCRIPTORS[name];
    if (descriptor) {
      composites[name] = descriptor;
    }
  }
  return catalog.merge(composites, { ...options, synthetic: true });
}

let shared: EventCatalog | undefined;

/**
 * The process-wide catalog built from the bundled manifest, created on first use.
 */
export function defaultCatalog(): EventCatalog {
  if (!shared) {
    shared = buildCatalog(loadHookManifest());
  }
  return shared;
}
