/**
 * InMemoryLocatorStore Unit Tests
 *
 * Tests expiry, LRU eviction and cleanup of stored locators
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InMemoryLocatorStore } from '../in-memory-locator-store.js';
import type { ICacheEntry } from '../../types/index.js';

function makeEntry(key: string, expiresAt: number): ICacheEntry {
  return {
    key,
    descriptor: key,
    fingerprint: { url: 'https://app.example.test/login', contentHash: 'abc', id: 'https://app.example.test/login#abc' },
    locator: {
      target: { kind: 'selector', selector: `#${key}` },
      confidence: 1,
      resolvedBy: 'heuristic',
      timestamp: 0
    },
    expiresAt
  };
}

describe('InMemoryLocatorStore', () => {
  let store: InMemoryLocatorStore;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000_000);
    store = new InMemoryLocatorStore({ maxEntries: 3 });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should store and retrieve an entry', async () => {
    const entry = makeEntry('email', 2_000_000);
    await store.set(entry);

    expect(await store.get('email')).toEqual(entry);
    expect(await store.size()).toBe(1);
  });

  it('should return null for missing keys', async () => {
    expect(await store.get('nope')).toBeNull();
  });

  it('should drop entries once expiresAt is reached', async () => {
    await store.set(makeEntry('email', 1_000_500));

    vi.setSystemTime(1_000_500);

    expect(await store.get('email')).toBeNull();
    expect(await store.size()).toBe(0);
  });

  it('should overwrite an existing key', async () => {
    await store.set(makeEntry('email', 2_000_000));
    const replacement = { ...makeEntry('email', 3_000_000), descriptor: 'replacement' };
    await store.set(replacement);

    expect(await store.get('email')).toEqual(replacement);
    expect(await store.size()).toBe(1);
  });

  it('should evict the least recently used entry', async () => {
    await store.set(makeEntry('a', 2_000_000));
    await store.set(makeEntry('b', 2_000_000));
    await store.set(makeEntry('c', 2_000_000));

    // Touch a so b becomes the oldest
    await store.get('a');
    await store.set(makeEntry('d', 2_000_000));

    expect(await store.keys()).toEqual(['a', 'c', 'd']);
  });

  it('should delete and clear', async () => {
    await store.set(makeEntry('a', 2_000_000));
    await store.set(makeEntry('b', 2_000_000));

    await store.delete('a');
    expect(await store.get('a')).toBeNull();

    expect(await store.clear()).toBe(1);
    expect(await store.size()).toBe(0);
  });

  it('should clean up expired entries', async () => {
    await store.set(makeEntry('a', 1_000_100));
    await store.set(makeEntry('b', 2_000_000));

    vi.setSystemTime(1_000_200);

    expect(store.cleanupExpired()).toBe(1);
    expect(await store.keys()).toEqual(['b']);
  });
});
