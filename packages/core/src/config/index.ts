export {
  type ConfigError,
  type ConfigErrorCode,
  deepMerge,
  findProjectConfig,
  type LoadConfigOptions,
  loadEngineConfig,
  parseEngineConfig,
  parseEnvConfig,
} from "./loader.js";
export {
  type CatalogConfig,
  CatalogConfigSchema,
  ConflictPolicySchema,
  type EngineConfig,
  EngineConfigSchema,
  type LoggingConfig,
  LoggingConfigSchema,
  LogLevelSchema,
  type PartialEngineConfig,
  type ValidationConfig,
  ValidationConfigSchema,
} from "./schema.js";
