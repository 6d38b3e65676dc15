/**
 * Factory for creating locator stores based on configuration.
 * Supports both in-memory and Redis backends.
 */

import { ILocatorStore } from './index.js';
import { InMemoryLocatorStore } from './in-memory-locator-store.js';
import { RedisLocatorStore } from './redis-locator-store.js';
import { IConfig, ConfigStub } from '../infra/config.js';
import { ConfigKey } from '../types/config.js';
import { ILogger } from '../infra/logger.js';

export type StorageType = 'memory' | 'redis';

/**
 * Get the configured storage type; anything but "redis" means memory
 */
export function getStorageType(config: IConfig = new ConfigStub()): StorageType {
  return (config.get(ConfigKey.STORAGE_TYPE) || 'memory').toLowerCase() === 'redis' ? 'redis' : 'memory';
}

/**
 * Create a locator store based on STORAGE_TYPE.
 * Defaults to memory if not specified.
 */
export async function createLocatorStore(
  options: { maxEntries?: number; config?: IConfig; logger?: ILogger } = {}
): Promise<ILocatorStore> {
  const config = options.config ?? new ConfigStub();

  switch (getStorageType(config)) {
    case 'redis': {
      const store = new RedisLocatorStore({ url: config.get(ConfigKey.REDIS_URL) }, options.logger);
      await store.connect();
      return store;
    }

    case 'memory':
    default:
      return new InMemoryLocatorStore({ maxEntries: options.maxEntries ?? 1000 }, options.logger);
  }
}
