import { ResultCache } from './cache/resultCache.js';
import { createEngines } from './engines/index.js';
import type { EngineRegistry } from './engines/index.js';
import { DeviceLocks } from './gpu/deviceLocks.js';
import { HistoryStore } from './history/historyStore.js';
import { logger as defaultLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { AppConfig } from './types.js';

/** Shared server state, built once at startup and handed to every router. */
export interface AppServices {
  config: AppConfig;
  locks: DeviceLocks;
  cache: ResultCache;
  history: HistoryStore;
  engines: EngineRegistry;
  logger: Logger;
}

export function createServices(
  config: AppConfig,
  overrides: Partial<Omit<AppServices, 'config'>> = {}
): AppServices {
  return {
    config,
    locks: overrides.locks ?? new DeviceLocks(config.devices.count),
    cache: overrides.cache ?? new ResultCache({ ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries }),
    history: overrides.history ?? new HistoryStore(config.history.maxItems),
    engines: overrides.engines ?? createEngines(config),
    logger: overrides.logger ?? defaultLogger,
  };
}
