import { z } from "zod";

// ============================================
// Hook Manifest Schemas
// ============================================

/**
 * One hook class of the external dispatch system: the kind of target its hooks
 * are registered against, and each hook's positional parameter names.
 */
export const HookClassSchema = z.object({
  name: z.string().min(1),
  targetKind: z.string().min(1),
  hooks: z.record(z.array(z.string().min(1))),
});

export type HookClassDescriptor = z.infer<typeof HookClassSchema>;

/**
 * Shape of `hooks.json`.
 */
export const HookManifestSchema = z.object({
  version: z.literal(1),
  hookClasses: z.array(HookClassSchema),
});

export type HookManifest = z.infer<typeof HookManifestSchema>;
