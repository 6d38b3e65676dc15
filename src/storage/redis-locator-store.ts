/**
 * Redis implementation of ILocatorStore.
 * Shares resolved locators between processes; entries expire through Redis PX.
 *
 * Redis keys structure:
 * - {prefix}{cacheKey} -> JSON(ICacheEntry)
 */

import { createClient, type RedisClientType } from 'redis';
import { ILocatorStore, cacheEntrySchema } from './index.js';
import type { ICacheEntry } from '../types/index.js';
import { ILogger } from '../infra/logger.js';

/**
 * The subset of Redis commands the store relies on
 */
export interface IRedisClient {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  quit(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
}

export function wrapNodeRedisClient(client: RedisClientType): IRedisClient {
  return {
    get isOpen() {
      return client.isOpen;
    },
    async connect() {
      await client.connect();
    },
    async quit() {
      await client.quit();
    },
    get: key => client.get(key),
    async set(key, value, ttlMs) {
      await client.set(key, value, { PX: ttlMs });
    },
    del: keys => client.del(keys),
    keys: pattern => client.keys(pattern)
  };
}

export class RedisLocatorStore implements ILocatorStore {
  private client: IRedisClient;
  private readonly keyPrefix: string;

  constructor(
    options: { url?: string; client?: IRedisClient; keyPrefix?: string } = {},
    private logger?: ILogger
  ) {
    this.keyPrefix = options.keyPrefix ?? 'locator:';
    if (options.client) {
      this.client = options.client;
    } else {
      const url = options.url || process.env.REDIS_URL || 'redis://localhost:6379';
      const nodeClient: RedisClientType = createClient({
        url,
        socket: {
          reconnectStrategy: (retries) => {
            if (retries > 10) {
              return new Error('Too many reconnection attempts');
            }
            return Math.min(retries * 100, 3000);
          }
        }
      });
      nodeClient.on('error', (err: Error) => {
        this.logger?.error('Redis client error', err);
      });
      this.client = wrapNodeRedisClient(nodeClient);
    }
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }

  async get(key: string): Promise<ICacheEntry | null> {
    await this.connect();
    const data = await this.client.get(this.keyPrefix + key);
    if (data === null) {
      return null;
    }

    const parsed = cacheEntrySchema.safeParse(JSON.parse(data));
    if (!parsed.success) {
      this.logger?.warn('Discarding malformed locator entry', { key, issues: parsed.error.issues.length });
      await this.delete(key);
      return null;
    }
    if (Date.now() >= parsed.data.expiresAt) {
      return null;
    }
    return parsed.data;
  }

  async set(entry: ICacheEntry): Promise<void> {
    const ttlMs = entry.expiresAt - Date.now();
    if (ttlMs <= 0) {
      return;
    }
    await this.connect();
    await this.client.set(this.keyPrefix + entry.key, JSON.stringify(entry), Math.ceil(ttlMs));
  }

  async delete(key: string): Promise<void> {
    await this.connect();
    await this.client.del([this.keyPrefix + key]);
  }

  async clear(): Promise<number> {
    await this.connect();
    const keys = await this.client.keys(`${this.keyPrefix}*`);
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(keys);
  }

  async size(): Promise<number> {
    return (await this.keys()).length;
  }

  async keys(): Promise<string[]> {
    await this.connect();
    const keys = await this.client.keys(`${this.keyPrefix}*`);
    return keys.map(key => key.slice(this.keyPrefix.length));
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}
