/**
 * Run configuration schema.
 * File values and environment overrides are validated here before any component sees them.
 */

import { z } from 'zod';
import { ACTION_KINDS } from './index.js';

/**
 * Environment keys read by the configuration layer
 */
export enum ConfigKey {
  LOG_LEVEL = 'LOG_LEVEL',
  AI_MODEL_TYPE = 'AI_MODEL_TYPE',
  CONFIDENCE_THRESHOLD = 'CONFIDENCE_THRESHOLD',
  CACHE_TTL = 'CACHE_TTL',
  PARALLEL = 'PARALLEL',
  RETRY_COUNT = 'RETRY_COUNT',
  RETRY_DELAY = 'RETRY_DELAY',
  ACTION_TIMEOUT = 'ACTION_TIMEOUT',
  HEADLESS = 'HEADLESS',
  STORAGE_TYPE = 'STORAGE_TYPE',
  REDIS_URL = 'REDIS_URL',
  OPENAI_API_KEY = 'OPENAI_API_KEY',
  OPENAI_VISION_MODEL = 'OPENAI_VISION_MODEL'
}

export const HEURISTIC_RANKS = ['substring', 'role', 'placeholder', 'label', 'exact'] as const;
export type HeuristicRank = typeof HEURISTIC_RANKS[number];

const actionKindSchema = z.enum(ACTION_KINDS);

export const customMappingSchema = z.object({
  pattern: z.string().min(1),
  action: z.string().min(1),
  params: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({})
});

export type CustomMapping = z.infer<typeof customMappingSchema>;

export const aiModelSchema = z.object({
  type: z.enum(['openai', 'none']).default('openai'),
  confidence_threshold: z.number().min(0).max(1).default(0.6),
  confidence_thresholds: z.record(actionKindSchema, z.number().min(0).max(1)).default({}),
  use_cache: z.boolean().default(true),
  /** Seconds */
  cache_ttl: z.number().int().positive().default(86400),
  cache_max_entries: z.number().int().positive().default(1000),
  /** Milliseconds */
  timeout: z.number().int().positive().default(15000)
});

export const executionSchema = z.object({
  parallel: z.number().int().min(1).default(1),
  retry_count: z.number().int().min(0).default(2),
  /** Seconds */
  retry_delay: z.number().min(0).default(1),
  retry_backoff: z.enum(['constant', 'linear', 'exponential']).default('constant'),
  /** Milliseconds */
  timeout: z.number().int().positive().default(30000),
  continue_on_failure: z.boolean().default(false),
  headless: z.boolean().default(true),
  slow_mo: z.number().int().min(0).default(0),
  screenshot: z.boolean().default(true),
  video: z.boolean().default(false)
});

export const heuristicSchema = z.object({
  min_specificity: z.enum(HEURISTIC_RANKS).default('role')
});

export const runnerConfigSchema = z.object({
  ai_model: aiModelSchema.default({}),
  execution: executionSchema.default({}),
  heuristic: heuristicSchema.default({}),
  custom_mappings: z.array(customMappingSchema).default([]),
  base_url: z.string().url().optional(),
  pages: z.record(z.string()).default({}),
  tags: z.array(z.string()).default([]),
  artifacts_dir: z.string().default('reports')
});

export type RunnerConfig = z.infer<typeof runnerConfigSchema>;
export type RunnerConfigInput = z.input<typeof runnerConfigSchema>;
export type AiModelConfig = RunnerConfig['ai_model'];
export type ExecutionConfig = RunnerConfig['execution'];
