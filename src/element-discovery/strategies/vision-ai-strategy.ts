import { IDiscoveryRequest, IElementDiscoveryStrategy } from '../index.js';
import { parseDescriptor } from '../descriptor.js';
import type { IDetection, IElementDetector } from '../../detectors/index.js';
import type { IElementLocator } from '../../types/index.js';
import { ILogger } from '../../infra/logger.js';
import { CircuitBreaker } from '../../infra/retry-utils.js';
import { ConfidenceThresholdService } from '../../infra/confidence-threshold-service.js';
import { withTimeout } from '../../infra/timeout.js';
import {
  CIRCUIT_KEYS,
  DETECTION_CLASSES,
  DETECTION_CLASSES_BY_HINT,
  DetectionClass
} from '../../constants/index.js';

function area(detection: IDetection): number {
  return detection.boundingBox.width * detection.boundingBox.height;
}

/**
 * Highest confidence first; then smallest box; then reading order (top, then left)
 */
export function compareDetections(a: IDetection, b: IDetection): number {
  return b.confidence - a.confidence
    || area(a) - area(b)
    || a.boundingBox.y - b.boundingBox.y
    || a.boundingBox.x - b.boundingBox.x;
}

/**
 * Vision AI stage: screenshot plus class vocabulary to the detection collaborator.
 * Produces coordinate locators at the centre of the chosen box.
 */
export class VisionAIStrategy implements IElementDiscoveryStrategy {
  public readonly name = 'ai';

  constructor(
    private detector: IElementDetector,
    private thresholds: ConfidenceThresholdService,
    private circuitBreaker: CircuitBreaker,
    private timeoutMs: number,
    private logger: ILogger
  ) {}

  async discover(request: IDiscoveryRequest): Promise<IElementLocator | null> {
    const query = parseDescriptor(request.descriptor);
    const threshold = this.thresholds.getThreshold(request.actionKind);

    this.logger.info(`VISION AI STRATEGY: Detecting "${request.descriptor}"`, {
      detector: this.detector.name,
      roleHint: query.roleHint,
      threshold
    });

    const detections = await this.circuitBreaker.execute(CIRCUIT_KEYS.DETECTOR, () =>
      withTimeout(
        this.detector.detect(request.snapshot.screenshot, DETECTION_CLASSES, request.descriptor),
        this.timeoutMs,
        () => new Error(`Detection timed out after ${this.timeoutMs}ms`)
      )
    );

    const allowed: readonly DetectionClass[] | undefined = query.roleHint
      ? DETECTION_CLASSES_BY_HINT[query.roleHint]
      : undefined;

    const candidates = detections
      .filter(d => !allowed || allowed.some(label => label === d.label.toLowerCase()))
      .filter(d => d.confidence >= threshold)
      .sort(compareDetections);

    const best = candidates[0];
    if (!best) {
      const topConfidence = detections.reduce((max, d) => Math.max(max, d.confidence), 0);
      this.logger.warn(`VISION AI STRATEGY: No candidate for "${request.descriptor}" cleared the threshold`, {
        detections: detections.length,
        topConfidence,
        threshold
      });
      return null;
    }

    const { x, y, width, height } = best.boundingBox;
    this.logger.info(`VISION AI STRATEGY: Selected ${best.label} for "${request.descriptor}"`, {
      confidence: best.confidence,
      boundingBox: best.boundingBox,
      candidates: candidates.length
    });

    return {
      target: { kind: 'coordinates', x: Math.round(x + width / 2), y: Math.round(y + height / 2) },
      confidence: best.confidence,
      resolvedBy: 'ai',
      boundingBox: { ...best.boundingBox },
      timestamp: Date.now()
    };
  }
}
