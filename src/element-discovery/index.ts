import type { ActionKind, IElementLocator, IPageSnapshot, ResolutionStage } from '../types/index.js';

export interface IDiscoveryRequest {
  descriptor: string;
  actionKind?: ActionKind;
  snapshot: IPageSnapshot;
}

/**
 * One stage of the resolution cascade.
 * Returns null to let the next stage try.
 */
export interface IElementDiscoveryStrategy {
  readonly name: Exclude<ResolutionStage, 'cache'>;
  discover(request: IDiscoveryRequest): Promise<IElementLocator | null>;
}
