import { z } from "zod";
import { LOG_LEVELS } from "../logger/types.js";

// ============================================
// Engine Configuration Schemas
// ============================================

export const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Logger built by createEngine() when no logger is passed in.
 */
export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  /** Single-line JSON output instead of human-readable lines */
  json: z.boolean().default(false),
  /** Force ANSI colors on or off (auto-detected when absent) */
  colors: z.boolean().optional(),
  /** Write to the console at all */
  console: z.boolean().default(true),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const ConflictPolicySchema = z.enum(["reject", "override"]);

/**
 * How the catalog is built.
 */
export const CatalogConfigSchema = z.object({
  /** Hook manifest to load instead of the bundled one */
  manifest: z.string().min(1).optional(),
  /** What a duplicate hook name does during a merge */
  onConflict: ConflictPolicySchema.default("reject"),
  /** Names allowed to replace an existing entry under the reject policy */
  overrides: z.array(z.string()).default([]),
});

export type CatalogConfig = z.infer<typeof CatalogConfigSchema>;

/**
 * Opt-in registration-time and fire-time checks.
 */
export const ValidationConfigSchema = z.object({
  /** Compare targets against the catalog's targetKind when listening */
  targetKinds: z.boolean().default(false),
  /** Compare fired argument counts against the catalog (LocalDispatcher only) */
  argumentCounts: z.boolean().default(false),
});

export type ValidationConfig = z.infer<typeof ValidationConfigSchema>;

export const EngineConfigSchema = z.object({
  logging: LoggingConfigSchema.default({}),
  catalog: CatalogConfigSchema.default({}),
  validation: ValidationConfigSchema.default({}),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** Config as written by a user: every field optional */
export type PartialEngineConfig = z.input<typeof EngineConfigSchema>;
