/**
 * In-memory LRU locator store.
 * Expired entries are dropped on read; the least recently used entry is evicted past maxEntries.
 */

import { ILocatorStore } from './index.js';
import type { ICacheEntry } from '../types/index.js';
import { ILogger } from '../infra/logger.js';

export interface InMemoryLocatorStoreOptions {
  maxEntries: number;
}

export class InMemoryLocatorStore implements ILocatorStore {
  private entries = new Map<string, ICacheEntry>();
  private accessOrder: string[] = [];

  constructor(
    private options: InMemoryLocatorStoreOptions = { maxEntries: 1000 },
    private logger?: ILogger
  ) {}

  async get(key: string): Promise<ICacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (Date.now() >= entry.expiresAt) {
      this.remove(key);
      this.logger?.debug('Locator store entry expired', { key });
      return null;
    }

    this.touch(key);
    return entry;
  }

  async set(entry: ICacheEntry): Promise<void> {
    if (this.entries.has(entry.key)) {
      this.remove(entry.key);
    }

    this.entries.set(entry.key, entry);
    this.accessOrder.push(entry.key);

    while (this.entries.size > this.options.maxEntries) {
      this.evictLRU();
    }
  }

  async delete(key: string): Promise<void> {
    this.remove(key);
  }

  async clear(): Promise<number> {
    const size = this.entries.size;
    this.entries.clear();
    this.accessOrder = [];
    this.logger?.info('Locator store cleared', { entriesRemoved: size });
    return size;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async keys(): Promise<string[]> {
    return [...this.entries.keys()];
  }

  async close(): Promise<void> {}

  /**
   * Drop expired entries, returns how many were removed
   */
  cleanupExpired(): number {
    const now = Date.now();
    const expired = [...this.entries.values()]
      .filter(entry => now >= entry.expiresAt)
      .map(entry => entry.key);

    expired.forEach(key => this.remove(key));

    if (expired.length > 0) {
      this.logger?.info('Locator store cleanup completed', {
        entriesRemoved: expired.length,
        remainingEntries: this.entries.size
      });
    }
    return expired.length;
  }

  private remove(key: string): void {
    if (this.entries.delete(key)) {
      this.accessOrder = this.accessOrder.filter(k => k !== key);
    }
  }

  private touch(key: string): void {
    this.accessOrder = this.accessOrder.filter(k => k !== key);
    this.accessOrder.push(key);
  }

  private evictLRU(): void {
    const lruKey = this.accessOrder.shift();
    if (lruKey === undefined) {
      return;
    }
    this.entries.delete(lruKey);
    this.logger?.debug('Locator store LRU eviction', { key: lruKey, size: this.entries.size });
  }
}
