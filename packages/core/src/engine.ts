import { ErrorCode, HookChainError } from "@hookchain/shared";
import type { EventCatalog, HookDescriptor } from "./catalog/catalog.js";
import { buildCatalog, defaultCatalog, loadHookManifest } from "./catalog/default.js";
import { keywordArguments, positionalArguments } from "./chain/arguments.js";
import { EventChain } from "./chain/chain.js";
import { type ConfigError, type LoadConfigOptions, loadEngineConfig, parseEngineConfig } from "./config/loader.js";
import type { EngineConfig, PartialEngineConfig } from "./config/schema.js";
import { LocalDispatcher } from "./dispatch/local.js";
import { RegistrationRuntime } from "./dispatch/runtime.js";
import type { HookCallback, HookDispatcher, ListenOptions } from "./dispatch/types.js";
import { createLogger } from "./logger/factory.js";
import type { Logger } from "./logger/logger.js";

export interface BuildChainOptions {
  /** Call the callback and conditions with keyword arguments */
  useKwargs?: boolean;
  /** Retire stage 0 after its first firing */
  once?: boolean;
  /** Name used in log output */
  name?: string;
}

/**
 * Facade over the catalog, the registration runtime and chain construction,
 * bound to one dispatch system.
 */
export class HookChainEngine<D extends HookDispatcher = HookDispatcher> {
  readonly dispatcher: D;
  readonly catalog: EventCatalog;
  readonly runtime: RegistrationRuntime;
  readonly config: EngineConfig;
  readonly logger: Logger;

  constructor(parts: { dispatcher: D; catalog: EventCatalog; config: EngineConfig; logger: Logger }) {
    this.dispatcher = parts.dispatcher;
    this.catalog = parts.catalog;
    this.config = parts.config;
    this.logger = parts.logger;
    this.runtime = new RegistrationRuntime({
      dispatcher: parts.dispatcher,
      catalog: parts.catalog,
      logger: parts.logger.child({ component: "runtime" }),
      validateTargetKinds: parts.config.validation.targetKinds,
    });
  }

  /**
   * Start a chain at `(target, event)`. Nothing is registered until apply().
   */
  buildChain(target: object, event: string, options?: BuildChainOptions & { useKwargs?: false }): EventChain<"positional">;
  buildChain(target: object, event: string, options: BuildChainOptions & { useKwargs: true }): EventChain<"keyword">;
  buildChain(
    target: object,
    event: string,
    options: BuildChainOptions = {}
  ): EventChain<"positional"> | EventChain<"keyword"> {
    const chainOptions = { once: options.once, name: options.name, logger: this.logger };
    return options.useKwargs
      ? new EventChain(this.runtime, target, event, keywordArguments, chainOptions)
      : new EventChain(this.runtime, target, event, positionalArguments, chainOptions);
  }

  /**
   * Listen to a composite (or primitive) event without chaining. Each member
   * of a composite calls `callback` independently.
   */
  registerComposite(target: object, event: string, callback: HookCallback, options: ListenOptions = {}): void {
    this.runtime.listen(target, event, callback, options);
  }

  unregisterComposite(target: object, event: string, callback: HookCallback): void {
    this.runtime.unlisten(target, event, callback);
  }

  /**
   * @throws UnknownEventError if the event is not in the catalog
   */
  catalogLookup(eventName: string): HookDescriptor {
    return this.catalog.lookup(eventName);
  }
}

export interface CreateEngineOptions<D extends HookDispatcher> {
  /** Dispatch system to register against (default: a new LocalDispatcher) */
  dispatcher?: D;
  config?: PartialEngineConfig;
  /**
   * Load hookchain.toml and HOOKCHAIN_* variables first; `config` then
   * applies on top as overrides
   */
  loadConfig?: boolean | Omit<LoadConfigOptions, "overrides">;
  logger?: Logger;
  /** Catalog to use instead of the one described by config.catalog */
  catalog?: EventCatalog;
}

function resolveCatalog(config: EngineConfig): EventCatalog {
  const { manifest, onConflict, overrides } = config.catalog;
  if (manifest === undefined) {
    return defaultCatalog();
  }
  return buildCatalog(loadHookManifest(manifest), { onConflict, overrides });
}

/**
 * Wrap a config loader failure in the error type the engine throws.
 */
export function toConfigError(error: ConfigError): HookChainError {
  const code = error.code === "PARSE_ERROR" ? ErrorCode.CONFIG_PARSE_ERROR : ErrorCode.CONFIG_INVALID;
  return new HookChainError(error.message, code, {
    cause: error.cause,
    context: error.path ? { path: error.path } : undefined,
  });
}

/**
 * Create an engine from partial config.
 *
 * @throws HookChainError with CONFIG_INVALID when the config fails validation,
 *   or CONFIG_PARSE_ERROR when a loaded config file is malformed
 *
 * @example
 * ```typescript
 * const engine = createEngine({ config: { logging: { level: 'debug' } } });
 * engine.buildChain(User, 'after_save').apply((mapper, connection, user) => audit(user));
 * engine.dispatcher.fire(User, 'after_insert', mapper, connection, user);
 *
 * // Read hookchain.toml and HOOKCHAIN_* variables, keeping the debug level on top
 * const configured = createEngine({ loadConfig: true, config: { logging: { level: 'debug' } } });
 * ```
 */
export function createEngine(options?: CreateEngineOptions<LocalDispatcher> & { dispatcher?: undefined }): HookChainEngine<LocalDispatcher>;
export function createEngine<D extends HookDispatcher>(options: CreateEngineOptions<D> & { dispatcher: D }): HookChainEngine<D>;
export function createEngine(options: CreateEngineOptions<HookDispatcher> = {}): HookChainEngine<HookDispatcher> {
  const parsed = options.loadConfig
    ? loadEngineConfig({
        ...(options.loadConfig === true ? {} : options.loadConfig),
        overrides: options.config,
      })
    : parseEngineConfig(options.config ?? {});
  if (!parsed.ok) {
    throw toConfigError(parsed.error);
  }
  const config = parsed.value;

  const logger =
    options.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.json,
      colors: config.logging.colors,
      console: config.logging.console,
    });
  const catalog = options.catalog ?? resolveCatalog(config);
  const dispatcher =
    options.dispatcher ??
    new LocalDispatcher({ catalog, validateArguments: config.validation.argumentCounts });

  logger.debug("Engine created", { events: catalog.size, validation: config.validation });
  return new HookChainEngine({ dispatcher, catalog, config, logger });
}
