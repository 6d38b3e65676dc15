/**
 * Storage interface for resolved locators.
 * One store instance is shared by every worker of a run, so each operation
 * is a single-key read or write and concurrent writers resolve last-writer-wins.
 */

import { z } from 'zod';
import type { ICacheEntry } from '../types/index.js';

export interface ILocatorStore {
  get(key: string): Promise<ICacheEntry | null>;

  set(entry: ICacheEntry): Promise<void>;

  delete(key: string): Promise<void>;

  /**
   * Remove every entry, returns how many were removed
   */
  clear(): Promise<number>;

  size(): Promise<number>;

  keys(): Promise<string[]>;

  close(): Promise<void>;
}

const boundingBoxSchema = z.object({
  x: z.number(),
  y: z.number(),
  width: z.number(),
  height: z.number()
});

/**
 * Shape check for entries read back from an external store
 */
export const cacheEntrySchema = z.object({
  key: z.string(),
  descriptor: z.string(),
  fingerprint: z.object({
    url: z.string(),
    contentHash: z.string(),
    id: z.string()
  }),
  locator: z.object({
    target: z.discriminatedUnion('kind', [
      z.object({ kind: z.literal('selector'), selector: z.string() }),
      z.object({ kind: z.literal('coordinates'), x: z.number(), y: z.number() })
    ]),
    confidence: z.number().min(0).max(1),
    resolvedBy: z.enum(['cache', 'heuristic', 'ai']),
    boundingBox: boundingBoxSchema.optional(),
    timestamp: z.number()
  }),
  expiresAt: z.number()
});
