import type { IBoundingBox } from '../types/index.js';

export interface IDetection {
  label: string;
  boundingBox: IBoundingBox;
  confidence: number;
}

/**
 * Visual object detection: boxes for semantic classes in a screenshot.
 * Treated as stateless and slow; callers bound it with their own timeout.
 */
export interface IElementDetector {
  readonly name: string;
  detect(image: Buffer, classVocabulary: readonly string[], descriptor?: string): Promise<IDetection[]>;
}
