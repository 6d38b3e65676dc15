/**
 * Locator Cache
 * Maps (page fingerprint, normalized descriptor) to a previously resolved locator.
 */

import { ILocatorStore } from '../storage/index.js';
import type { ICacheEntry, IElementLocator, IPageFingerprint } from '../types/index.js';
import { ILogger } from '../infra/logger.js';

export interface LocatorCacheOptions {
  /** Seconds an entry stays valid */
  ttlSeconds: number;
}

export interface LocatorCacheStats {
  hits: number;
  misses: number;
  writes: number;
  evictions: number;
}

export function normalizeDescriptor(descriptor: string): string {
  return descriptor
    .trim()
    .toLowerCase()
    .replace(/["'`]/g, '')
    .replace(/\s+/g, ' ');
}

export function buildCacheKey(fingerprint: IPageFingerprint, descriptor: string): string {
  return `${fingerprint.id}::${normalizeDescriptor(descriptor)}`;
}

export class LocatorCache {
  private stats: LocatorCacheStats = { hits: 0, misses: 0, writes: 0, evictions: 0 };

  constructor(
    private backend: ILocatorStore,
    private options: LocatorCacheOptions,
    private logger: ILogger
  ) {}

  /**
   * Returns the live entry for this page state, or null.
   * An entry written under different page content is evicted here.
   */
  async lookup(fingerprint: IPageFingerprint, descriptor: string): Promise<ICacheEntry | null> {
    const key = buildCacheKey(fingerprint, descriptor);
    const entry = await this.backend.get(key);

    if (!entry) {
      this.stats.misses++;
      this.logger.debug('Locator cache miss', { key });
      return null;
    }

    if (entry.fingerprint.contentHash !== fingerprint.contentHash) {
      this.stats.misses++;
      await this.evictKey(key, 'fingerprint mismatch');
      return null;
    }

    this.stats.hits++;
    this.logger.debug('Locator cache hit', { key, resolvedBy: entry.locator.resolvedBy });
    return entry;
  }

  async store(fingerprint: IPageFingerprint, descriptor: string, locator: IElementLocator): Promise<ICacheEntry> {
    const key = buildCacheKey(fingerprint, descriptor);
    const entry: ICacheEntry = {
      key,
      descriptor: normalizeDescriptor(descriptor),
      fingerprint: { ...fingerprint },
      locator,
      expiresAt: Date.now() + this.options.ttlSeconds * 1000
    };

    await this.backend.set(entry);
    this.stats.writes++;
    this.logger.debug('Locator cached', { key, resolvedBy: locator.resolvedBy, confidence: locator.confidence });
    return entry;
  }

  async evict(fingerprint: IPageFingerprint, descriptor: string, reason = 'manual'): Promise<void> {
    await this.evictKey(buildCacheKey(fingerprint, descriptor), reason);
  }

  async clear(): Promise<number> {
    const removed = await this.backend.clear();
    this.logger.info('Locator cache cleared', { entriesRemoved: removed });
    return removed;
  }

  getStats(): LocatorCacheStats {
    return { ...this.stats };
  }

  private async evictKey(key: string, reason: string): Promise<void> {
    await this.backend.delete(key);
    this.stats.evictions++;
    this.logger.debug('Locator cache eviction', { key, reason });
  }
}
