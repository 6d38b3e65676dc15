/**
 * Element Resolver
 *
 * Cascade: locator cache, then heuristic matching, then visual detection.
 * Takes one page snapshot per call and never changes the page.
 */

import { IElementDiscoveryStrategy } from './index.js';
import { computePageFingerprint } from './page-fingerprint.js';
import { LocatorCache } from '../cache/locator-cache.js';
import type {
  ActionKind,
  IElementLocator,
  IPageFingerprint,
  IPageSnapshot,
  ResolutionStage
} from '../types/index.js';
import type { ExecutionContext } from '../runner/execution-context.js';
import { ActionTimeoutError, CacheValidationError, ElementNotFoundError, toError } from '../infra/errors.js';
import { withTimeout } from '../infra/timeout.js';
import { ILogger } from '../infra/logger.js';

export interface ResolveOptions {
  /** Skip stage 1; set on every retry since the cached locator is presumed stale */
  bypassCache?: boolean;
  actionKind?: ActionKind;
}

export interface ElementResolverOptions {
  useCache: boolean;
  /** Milliseconds allowed for the page snapshot */
  snapshotTimeout: number;
}

export type ResolverStats = Record<ResolutionStage | 'notFound' | 'staleEvictions', number>;

/**
 * A cached locator is still usable when its selector names a visible node,
 * or its coordinates fall inside a visible node's box
 */
export function validateLocator(locator: IElementLocator, snapshot: IPageSnapshot): string | null {
  const visible = snapshot.accessibilityTree.filter(node => node.visible !== false);
  const target = locator.target;

  if (target.kind === 'selector') {
    return visible.some(node => node.selector === target.selector)
      ? null
      : `selector ${target.selector} not present`;
  }

  const inside = visible.some(node => {
    const box = node.boundingBox;
    return box !== undefined
      && target.x >= box.x && target.x <= box.x + box.width
      && target.y >= box.y && target.y <= box.y + box.height;
  });
  return inside ? null : `no element at (${target.x}, ${target.y})`;
}

export class ElementResolver {
  private stats: ResolverStats = { cache: 0, heuristic: 0, ai: 0, notFound: 0, staleEvictions: 0 };

  /**
   * @param strategies - stages 2 and 3, in cascade order
   */
  constructor(
    private cache: LocatorCache,
    private strategies: IElementDiscoveryStrategy[],
    private options: ElementResolverOptions,
    private logger: ILogger
  ) {}

  async resolve(
    descriptor: string,
    context: ExecutionContext,
    options: ResolveOptions = {}
  ): Promise<IElementLocator> {
    const snapshot = await withTimeout(
      context.session.snapshot(),
      this.options.snapshotTimeout,
      () => new ActionTimeoutError('snapshot', this.options.snapshotTimeout)
    );
    const fingerprint = computePageFingerprint(snapshot.url, snapshot.accessibilityTree);
    context.fingerprint = fingerprint;
    context.lastSnapshot = snapshot;

    const useCache = this.options.useCache && !options.bypassCache;

    if (useCache) {
      const cached = await this.fromCache(descriptor, fingerprint, snapshot, context);
      if (cached) {
        return cached;
      }
    }

    const failures: string[] = [];
    for (const strategy of this.strategies) {
      let locator: IElementLocator | null;
      try {
        locator = await strategy.discover({ descriptor, actionKind: options.actionKind, snapshot });
      } catch (error) {
        const message = toError(error).message;
        failures.push(`${strategy.name}: ${message}`);
        this.logger.warn(`ELEMENT RESOLUTION: Stage ${strategy.name} failed for "${descriptor}"`, {
          workerId: context.workerId,
          error: message
        });
        continue;
      }

      if (locator) {
        this.stats[strategy.name]++;
        if (this.options.useCache) {
          await this.cache.store(fingerprint, descriptor, locator);
        }
        this.logger.info(`ELEMENT RESOLUTION: "${descriptor}" resolved by ${strategy.name}`, {
          workerId: context.workerId,
          confidence: locator.confidence,
          fingerprint: fingerprint.id
        });
        return locator;
      }
    }

    this.stats.notFound++;
    throw new ElementNotFoundError(descriptor, failures.length > 0 ? failures.join('; ') : undefined);
  }

  getStats(): ResolverStats {
    return { ...this.stats };
  }

  private async fromCache(
    descriptor: string,
    fingerprint: IPageFingerprint,
    snapshot: IPageSnapshot,
    context: ExecutionContext
  ): Promise<IElementLocator | null> {
    const entry = await this.cache.lookup(fingerprint, descriptor);
    if (!entry) {
      return null;
    }

    try {
      const problem = validateLocator(entry.locator, snapshot);
      if (problem) {
        throw new CacheValidationError(entry.key, problem);
      }
    } catch (error) {
      if (!(error instanceof CacheValidationError)) {
        throw error;
      }
      this.stats.staleEvictions++;
      this.logger.debug('ELEMENT RESOLUTION: Cached locator failed validation', {
        workerId: context.workerId,
        reason: error.message
      });
      await this.cache.evict(fingerprint, descriptor, 'validation failed');
      return null;
    }

    this.stats.cache++;
    return { ...entry.locator, resolvedBy: 'cache', timestamp: Date.now() };
  }
}
