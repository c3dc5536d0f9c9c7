// ============================================
// Hookchain Error Codes
// ============================================

/**
 * Centralized error codes for hookchain.
 * Error code ranges:
 * - 1xxx: Configuration errors
 * - 2xxx: Event catalog errors
 * - 3xxx: Chain errors
 * - 4xxx: Dispatch errors
 * - 5xxx: Lifecycle and validation errors
 */
export enum ErrorCode {
  // Configuration Errors (1xxx)
  CONFIG_INVALID = 1001,
  CONFIG_PARSE_ERROR = 1002,

  // Catalog Errors (2xxx)
  UNKNOWN_EVENT = 2001,
  CATALOG_CONFLICT = 2002,
  CATALOG_LOAD_FAILED = 2003,

  // Chain Errors (3xxx)
  CHAIN_STATE = 3001,

  // Dispatch Errors (4xxx)
  TARGET_KIND_MISMATCH = 4001,
  HOOK_ARGUMENT_MISMATCH = 4002,

  // Lifecycle Errors (5xxx)
  DETACHED_INSTANCE = 5001,
  MODEL_VALIDATION_FAILED = 5002,
}

/**
 * Human-readable category for an error code, derived from its range.
 */
export type ErrorCategory = "config" | "catalog" | "chain" | "dispatch" | "lifecycle";

export function categoryOf(code: ErrorCode): ErrorCategory {
  if (code < 2000) return "config";
  if (code < 3000) return "catalog";
  if (code < 4000) return "chain";
  if (code < 5000) return "dispatch";
  return "lifecycle";
}
