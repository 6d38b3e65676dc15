import OpenAI from 'openai';
import { z } from 'zod';
import { IDetection, IElementDetector } from './index.js';
import { ILogger } from '../infra/logger.js';
import { IConfig } from '../infra/config.js';
import { PromptManager } from '../infra/prompt-manager.js';
import { ConfigKey } from '../types/config.js';

const MAX_DETECTIONS = 20;

const detectionResponseSchema = z.object({
  detections: z.array(z.object({
    label: z.string(),
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
    confidence: z.number().min(0).max(1)
  })).default([])
});

/**
 * Width and height from a PNG header, or null for anything else
 */
export function readPngSize(image: Buffer): { width: number; height: number } | null {
  const signature = '89504e470d0a1a0a';
  if (image.length < 24 || image.subarray(0, 8).toString('hex') !== signature) {
    return null;
  }
  return { width: image.readUInt32BE(16), height: image.readUInt32BE(20) };
}

/**
 * Vision model as the detection collaborator.
 * Asks for labelled boxes over the screenshot and validates the JSON it returns.
 */
export class OpenAIElementDetector implements IElementDetector {
  public readonly name = 'openai-vision';
  private client: OpenAI;
  private model: string;

  constructor(
    config: IConfig,
    private logger: ILogger,
    private promptManager: PromptManager = PromptManager.getInstance()
  ) {
    const apiKey = config.get(ConfigKey.OPENAI_API_KEY);
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY is not defined for OpenAIElementDetector');
    }
    this.client = new OpenAI({ apiKey });
    this.model = config.get(ConfigKey.OPENAI_VISION_MODEL) || 'gpt-4o';
  }

  async detect(image: Buffer, classVocabulary: readonly string[], descriptor?: string): Promise<IDetection[]> {
    const size = readPngSize(image);
    const systemPrompt = this.promptManager.render('element-detection-system', {
      classes: [...classVocabulary]
    });
    const userPrompt = this.promptManager.render('element-detection-user', {
      descriptor,
      width: size?.width ?? 'unknown',
      height: size?.height ?? 'unknown',
      maxDetections: MAX_DETECTIONS
    });

    this.logger.debug('VISION DETECTOR: Requesting detections', {
      model: this.model,
      descriptor,
      bytes: image.length
    });

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: systemPrompt },
        {
          role: 'user',
          content: [
            { type: 'text', text: userPrompt },
            {
              type: 'image_url',
              image_url: { url: `data:image/png;base64,${image.toString('base64')}` }
            }
          ]
        }
      ],
      response_format: { type: 'json_object' },
      temperature: 0.1,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      this.logger.warn('VISION DETECTOR: Empty response', { model: this.model });
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(`Detector returned invalid JSON: ${content.slice(0, 200)}`, { cause: error });
    }

    const parsed = detectionResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Detector response did not match the expected shape: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }

    const vocabulary = new Set(classVocabulary);
    const detections = parsed.data.detections
      .map(d => ({ ...d, label: d.label.toLowerCase() }))
      .filter(d => vocabulary.has(d.label))
      .map((d): IDetection => ({
        label: d.label,
        boundingBox: { x: d.x, y: d.y, width: d.width, height: d.height },
        confidence: d.confidence
      }));

    this.logger.info('VISION DETECTOR: Received detections', {
      returned: parsed.data.detections.length,
      kept: detections.length
    });

    return detections;
  }
}
