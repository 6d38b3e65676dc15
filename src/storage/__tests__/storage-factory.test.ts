/**
 * Storage Factory Unit Tests
 *
 * Tests the locator store factory
 */

import { describe, it, expect } from 'vitest';
import { createLocatorStore, getStorageType } from '../storage-factory.js';
import { InMemoryLocatorStore } from '../in-memory-locator-store.js';
import { ConfigStub } from '../../infra/config.js';

describe('Storage Factory', () => {
  describe('getStorageType', () => {
    it('should default to memory', () => {
      expect(getStorageType(new ConfigStub({}))).toBe('memory');
    });

    it('should handle case-insensitive storage type', () => {
      expect(getStorageType(new ConfigStub({ STORAGE_TYPE: 'REDIS' }))).toBe('redis');
    });

    it('should fall back to memory for unknown types', () => {
      expect(getStorageType(new ConfigStub({ STORAGE_TYPE: 'invalid-type' }))).toBe('memory');
    });
  });

  describe('createLocatorStore', () => {
    it('should create InMemoryLocatorStore when STORAGE_TYPE is "memory"', async () => {
      const store = await createLocatorStore({ config: new ConfigStub({ STORAGE_TYPE: 'memory' }) });
      expect(store).toBeInstanceOf(InMemoryLocatorStore);
    });

    it('should create InMemoryLocatorStore when STORAGE_TYPE is not set', async () => {
      const store = await createLocatorStore({ config: new ConfigStub({}) });
      expect(store).toBeInstanceOf(InMemoryLocatorStore);
    });
  });
});
