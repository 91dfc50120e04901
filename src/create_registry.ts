import { DEFAULT_ENUM_FILE_NAME, EnumStore, FileEnumStore } from "./enum_store";
import { InvalidConfigError } from "./errors";
import { IdRegistry } from "./id_registry";
import { MAX_IDS } from "./limits";
import { LogLevel, loggerConfig } from "./logger";
import { OwnerResolver } from "./owner";

/**
 * Configuration for {@link createIdRegistry}. Either `store` or `indexRoot`
 * must be given; an explicit store wins.
 */
export interface IdRegistryConfig {
  /** Directory holding the enum store file */
  indexRoot?: string;
  /** File name under `indexRoot` (default: "indices.enum") */
  fileName?: string;
  /** Use this store instead of a file under `indexRoot` */
  store?: EnumStore;
  /** Upper bound for ids (default and maximum: 32767) */
  maxIds?: number;
  resolveOwner?: OwnerResolver;
  /** Sets the global log level */
  logLevel?: LogLevel;
}

/**
 * Builds a registry and loads its store.
 *
 * @example
 * ```typescript
 * const registry = createIdRegistry({ indexRoot: "/var/lib/app/index" });
 * const words = registry.register("word.index", { owner: "search-plugin" });
 * ```
 */
export function createIdRegistry(config: IdRegistryConfig): IdRegistry {
  if (config.logLevel !== undefined) {
    loggerConfig.configure({ level: config.logLevel });
  }

  let store: EnumStore;
  if (config.store) {
    store = config.store;
  } else if (config.indexRoot !== undefined && config.indexRoot.length > 0) {
    store = new FileEnumStore(config.indexRoot, config.fileName ?? DEFAULT_ENUM_FILE_NAME);
  } else {
    throw new InvalidConfigError("Either store or indexRoot must be provided");
  }

  return new IdRegistry({
    store,
    maxIds: config.maxIds ?? MAX_IDS,
    resolveOwner: config.resolveOwner,
  });
}
