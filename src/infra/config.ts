import { config } from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';
import fs from 'fs';
import { ZodError } from 'zod';
import {
  ConfigKey,
  RunnerConfig,
  runnerConfigSchema
} from '../types/config.js';
import { ConfigurationError } from './errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Find project root by looking for package.json
let currentDir = __dirname;
let projectRoot = currentDir;
while (currentDir !== path.dirname(currentDir)) {
  if (fs.existsSync(path.join(currentDir, 'package.json'))) {
    projectRoot = currentDir;
    break;
  }
  currentDir = path.dirname(currentDir);
}

const envPath = path.join(projectRoot, '.env');
if (fs.existsSync(envPath)) {
  const result = config({ path: envPath });
  if (result.error) {
    console.error('Dotenv error:', result.error);
  }
}

export interface IConfig {
  get(key: string): string | undefined;
}

export class EnvConfig implements IConfig {
  get(key: string): string | undefined {
    const val = process.env[key];
    if (!val) {
      console.warn(`Config warning: Key ${key} not found in environment`);
    }
    return val;
  }
}

export class ConfigStub implements IConfig {
  /** Without explicit values the stub reads process.env */
  constructor(private values?: Record<string, string | undefined>) {}

  get(key: string): string | undefined {
    return (this.values ?? process.env)[key];
  }
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge: nested objects merge key by key, everything else is replaced
 */
export function mergeConfigs(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    if (isPlainObject(existing) && isPlainObject(value)) {
      result[key] = mergeConfigs(existing, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Replace whole-string "${VAR}" values with environment values.
 * Unknown variables leave the placeholder in place.
 */
export function expandEnvReferences(value: unknown, env: IConfig): unknown {
  if (Array.isArray(value)) {
    return value.map(item => expandEnvReferences(item, env));
  }
  if (isPlainObject(value)) {
    const expanded: PlainObject = {};
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandEnvReferences(item, env);
    }
    return expanded;
  }
  if (typeof value === 'string') {
    const match = value.match(/^\$\{([A-Za-z_][A-Za-z0-9_]*)\}$/);
    if (match) {
      return env.get(match[1]) ?? value;
    }
  }
  return value;
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseBoolean(raw: string | undefined): boolean | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  return undefined;
}

function definedEntries(values: PlainObject): PlainObject {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

/**
 * Environment keys override file values
 */
function environmentOverrides(env: IConfig): PlainObject {
  return {
    ai_model: definedEntries({
      type: env.get(ConfigKey.AI_MODEL_TYPE),
      confidence_threshold: parseNumber(env.get(ConfigKey.CONFIDENCE_THRESHOLD)),
      cache_ttl: parseNumber(env.get(ConfigKey.CACHE_TTL))
    }),
    execution: definedEntries({
      parallel: parseNumber(env.get(ConfigKey.PARALLEL)),
      retry_count: parseNumber(env.get(ConfigKey.RETRY_COUNT)),
      retry_delay: parseNumber(env.get(ConfigKey.RETRY_DELAY)),
      timeout: parseNumber(env.get(ConfigKey.ACTION_TIMEOUT)),
      headless: parseBoolean(env.get(ConfigKey.HEADLESS))
    })
  };
}

export function parseRunnerConfig(input: unknown): RunnerConfig {
  try {
    return runnerConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid run configuration: ${issues.join('; ')}`, issues);
    }
    throw error;
  }
}

export interface RunnerConfigSource {
  /** Base configuration object */
  base?: PlainObject;
  /** Per-environment sections; an `overrides` key is applied section by section first */
  environments?: Record<string, PlainObject>;
  /** Selected environment name */
  environment?: string;
}

/**
 * Build the validated run configuration: base, then the selected environment,
 * then "${VAR}" expansion, then environment-key overrides.
 */
export function loadRunnerConfig(source: RunnerConfigSource, env: IConfig = new ConfigStub()): RunnerConfig {
  let merged: PlainObject = { ...(source.base ?? {}) };

  if (source.environment) {
    const section = source.environments?.[source.environment];
    if (!section) {
      throw new ConfigurationError(`Unknown environment "${source.environment}"`);
    }
    const { overrides, ...rest } = section;
    if (isPlainObject(overrides)) {
      merged = mergeConfigs(merged, overrides);
    }
    merged = mergeConfigs(merged, rest);
  }

  const expanded = expandEnvReferences(merged, env);
  const withEnv = mergeConfigs(isPlainObject(expanded) ? expanded : {}, environmentOverrides(env));
  return parseRunnerConfig(withEnv);
}

export interface CliFlags {
  env?: string;
  tags?: string[];
  parallel?: number;
  headless?: boolean;
  slowMo?: number;
  screenshot?: boolean;
  video?: boolean;
}

/**
 * Translate command-line flags into configuration overrides
 */
export function applyCliFlags(runnerConfig: RunnerConfig, flags: CliFlags): RunnerConfig {
  const execution = { ...runnerConfig.execution };
  if (flags.parallel !== undefined) {
    if (!Number.isInteger(flags.parallel) || flags.parallel < 1) {
      throw new ConfigurationError(`--parallel must be a positive integer, got ${flags.parallel}`);
    }
    execution.parallel = flags.parallel;
  }
  if (flags.headless !== undefined) execution.headless = flags.headless;
  if (flags.slowMo !== undefined) execution.slow_mo = flags.slowMo;
  if (flags.screenshot !== undefined) execution.screenshot = flags.screenshot;
  if (flags.video !== undefined) execution.video = flags.video;

  return {
    ...runnerConfig,
    execution,
    tags: flags.tags && flags.tags.length > 0 ? [...flags.tags] : runnerConfig.tags
  };
}

/**
 * Full configuration pipeline for a run: `--env` picks the environment section,
 * the remaining flags override the result.
 */
export function resolveRunnerConfig(
  source: RunnerConfigSource,
  flags: CliFlags = {},
  env: IConfig = new ConfigStub()
): RunnerConfig {
  const loaded = loadRunnerConfig(
    { ...source, environment: flags.env ?? source.environment },
    env
  );
  return applyCliFlags(loaded, flags);
}
