import * as fs from "node:fs";
import * as path from "node:path";
import * as TOML from "@iarna/toml";
import { Err, Ok, type Result } from "@hookchain/shared";
import { type EngineConfig, EngineConfigSchema, type PartialEngineConfig } from "./schema.js";

// ============================================
// Configuration Loader
// ============================================

export type ConfigErrorCode = "PARSE_ERROR" | "VALIDATION_ERROR" | "READ_ERROR";

/**
 * Configuration error with code and context
 */
export interface ConfigError {
  code: ConfigErrorCode;
  message: string;
  path?: string;
  cause?: unknown;
}

export interface LoadConfigOptions {
  /** Working directory to search for config files (default: process.cwd()) */
  cwd?: string;
  /** Config overrides (highest priority) */
  overrides?: PartialEngineConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectFile?: boolean;
  /** Environment to read HOOKCHAIN_* variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

/** Config file names to search for in order */
const CONFIG_FILE_NAMES = ["hookchain.toml", ".hookchain.toml"];

/**
 * Find the project config file by searching up from startDir to the root.
 *
 * @returns Path to found config file, or undefined if not found
 */
export function findProjectConfig(startDir?: string): string | undefined {
  let currentDir = path.resolve(startDir ?? process.cwd());

  while (true) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const configPath = path.join(currentDir, fileName);
      if (fs.existsSync(configPath) && fs.statSync(configPath).isFile()) {
        return configPath;
      }
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return undefined;
    }
    currentDir = parentDir;
  }
}

/**
 * Environment variable to config path mappings
 */
const ENV_MAPPINGS: Record<string, readonly string[]> = {
  HOOKCHAIN_LOG_LEVEL: ["logging", "level"],
  HOOKCHAIN_LOG_JSON: ["logging", "json"],
  HOOKCHAIN_CATALOG_MANIFEST: ["catalog", "manifest"],
  HOOKCHAIN_CATALOG_ON_CONFLICT: ["catalog", "onConflict"],
  HOOKCHAIN_VALIDATE_TARGET_KINDS: ["validation", "targetKinds"],
  HOOKCHAIN_VALIDATE_ARGUMENTS: ["validation", "argumentCounts"],
};

const BOOLEAN_KEYS = new Set(["json", "targetKinds", "argumentCounts"]);

function coerceValue(value: string, configPath: readonly string[]): unknown {
  const key = configPath[configPath.length - 1];
  if (key !== undefined && BOOLEAN_KEYS.has(key)) {
    return value === "true" || value === "1";
  }
  return value;
}

/**
 * Check if value is a plain object (not array, null, or other type)
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.prototype.toString.call(value) === "[object Object]"
  );
}

function setNestedValue(obj: Record<string, unknown>, configPath: readonly string[], value: unknown): void {
  const [head, ...rest] = configPath;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }
  const existing = obj[head];
  const child: Record<string, unknown> = isPlainObject(existing) ? existing : {};
  obj[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Parse HOOKCHAIN_* environment variables into a partial config object.
 *
 * @example
 * ```typescript
 * // With HOOKCHAIN_LOG_LEVEL=debug set:
 * parseEnvConfig(); // { logging: { level: "debug" } }
 * ```
 */
export function parseEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envVar];
    if (value !== undefined && value !== "") {
      setNestedValue(result, configPath, coerceValue(value, configPath));
    }
  }

  return result;
}

/**
 * Deep merge multiple objects. Later sources override earlier ones.
 * Arrays are replaced (not concatenated) and undefined values don't
 * overwrite existing values.
 *
 * @example
 * ```typescript
 * deepMerge({ a: 1, b: { c: 2 } }, { b: { d: 3 } });
 * // { a: 1, b: { c: 2, d: 3 } }
 * ```
 */
export function deepMerge(...sources: Record<string, unknown>[]): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const source of sources) {
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) continue;

      const targetValue = result[key];
      result[key] =
        isPlainObject(sourceValue) && isPlainObject(targetValue)
          ? deepMerge(targetValue, sourceValue)
          : sourceValue;
    }
  }

  return result;
}

function readTomlFile(filePath: string): Result<Record<string, unknown>, ConfigError> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return Err({
      code: "READ_ERROR",
      message: `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }

  try {
    return Ok(TOML.parse(content));
  } catch (error) {
    return Err({
      code: "PARSE_ERROR",
      message: `Failed to parse TOML: ${error instanceof Error ? error.message : String(error)}`,
      path: filePath,
      cause: error,
    });
  }
}

/**
 * Resolve a relative `catalog.manifest` against the directory of the file
 * that declared it.
 */
function resolveFilePaths(config: Record<string, unknown>, baseDir: string): Record<string, unknown> {
  const catalog = config["catalog"];
  if (!isPlainObject(catalog)) {
    return config;
  }
  const manifest = catalog["manifest"];
  if (typeof manifest !== "string" || manifest === "" || path.isAbsolute(manifest)) {
    return config;
  }
  return { ...config, catalog: { ...catalog, manifest: path.resolve(baseDir, manifest) } };
}

/**
 * Validate a partial config and fill in defaults.
 */
export function parseEngineConfig(input: unknown): Result<EngineConfig, ConfigError> {
  const parseResult = EngineConfigSchema.safeParse(input);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    return Err({
      code: "VALIDATION_ERROR",
      message: `Invalid configuration: ${issues}`,
      cause: parseResult.error,
    });
  }

  return Ok(parseResult.data);
}

/**
 * Load configuration from multiple sources with cascading priority.
 *
 * Load order (later overrides earlier):
 * 1. Schema defaults
 * 2. Project config: hookchain.toml found by findProjectConfig(); a relative
 *    catalog.manifest in it is resolved against the file's directory
 * 3. Environment variables (unless skipEnv)
 * 4. Overrides (options.overrides)
 *
 * @example
 * ```typescript
 * const result = loadEngineConfig({ cwd: "/my/project" });
 * if (result.ok) {
 *   console.log(result.value.logging.level);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function loadEngineConfig(options: LoadConfigOptions = {}): Result<EngineConfig, ConfigError> {
  const { cwd, overrides, skipEnv = false, skipProjectFile = false } = options;
  const configs: Record<string, unknown>[] = [];

  if (!skipProjectFile) {
    const projectPath = findProjectConfig(cwd);
    if (projectPath) {
      const projectResult = readTomlFile(projectPath);
      if (!projectResult.ok) {
        return projectResult;
      }
      configs.push(resolveFilePaths(projectResult.value, path.dirname(projectPath)));
    }
  }

  if (!skipEnv) {
    const envConfig = parseEnvConfig(options.env);
    if (Object.keys(envConfig).length > 0) {
      configs.push(envConfig);
    }
  }

  if (overrides) {
    configs.push(overrides);
  }

  return parseEngineConfig(deepMerge(...configs));
}
