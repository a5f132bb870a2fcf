import { ConsoleLogger, Logger, ManagerConfig } from '@repowarden/shared';
import { ConfigLoader, ManagerDependencies, WatchdogManager } from '@repowarden/core';
import { FileCacheStore, MemoryCacheStore } from '@repowarden/repo';

export type GlobalOptions = {
  config?: string;
  root?: string;
  interval?: number;
  json?: boolean;
  verbose?: boolean;
  /** False when `--no-cache` is given */
  cache: boolean;
};

export function loadConfig(opts: GlobalOptions): ManagerConfig {
  return ConfigLoader.load({
    configPath: opts.config,
    flags: { rootDir: opts.root, checkIntervalMs: opts.interval },
  });
}

export function createLogger(opts: GlobalOptions): Logger {
  // stdout belongs to the JSON document in --json mode
  return new ConsoleLogger({ verbose: opts.verbose, quiet: opts.json });
}

export async function openManager(
  opts: GlobalOptions,
  deps: ManagerDependencies = {},
): Promise<WatchdogManager> {
  const config = loadConfig(opts);
  return WatchdogManager.create(config, {
    logger: createLogger(opts),
    cache: opts.cache ? undefined : new MemoryCacheStore(),
    ...deps,
  });
}

/** The cache commands always work on the file, whatever `--no-cache` says. */
export async function openCacheFile(opts: GlobalOptions): Promise<FileCacheStore> {
  const config = loadConfig(opts);
  return FileCacheStore.open(config.cacheFile);
}
