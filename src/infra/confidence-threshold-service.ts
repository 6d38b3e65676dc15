import { ILogger } from './logger.js';
import { ActionKind, isActionKind } from '../types/index.js';
import type { AiModelConfig } from '../types/config.js';

/**
 * Minimum detection confidence per action kind.
 * Kinds without their own entry use the run-wide threshold.
 */
export class ConfidenceThresholdService {
  private thresholds = new Map<ActionKind, number>();

  constructor(
    private aiModel: Pick<AiModelConfig, 'confidence_threshold' | 'confidence_thresholds'>,
    private logger: ILogger
  ) {
    for (const [kind, value] of Object.entries(aiModel.confidence_thresholds)) {
      if (value !== undefined && isActionKind(kind)) {
        this.thresholds.set(kind, value);
      }
    }
  }

  getThreshold(actionKind?: ActionKind): number {
    if (actionKind) {
      const configured = this.thresholds.get(actionKind);
      if (configured !== undefined) {
        this.logger.debug(`Using configured confidence threshold for ${actionKind}: ${configured}`);
        return configured;
      }
    }
    return this.aiModel.confidence_threshold;
  }

  getAllThresholds(): Map<ActionKind | 'default', number> {
    const all = new Map<ActionKind | 'default', number>(this.thresholds);
    all.set('default', this.aiModel.confidence_threshold);
    return all;
  }
}
