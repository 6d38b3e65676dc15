/**
 * Step failure taxonomy.
 *
 * Every error raised while compiling, resolving or executing a step extends StepError.
 * `transient` tells the retry controller whether another attempt can succeed.
 */

import type { ActionKind, ResolutionStage } from '../types/index.js';

export type StepErrorKind =
  | 'UnmatchedStep'
  | 'ParameterBinding'
  | 'ElementNotFound'
  | 'ActionExecution'
  | 'ActionTimeout'
  | 'AssertionFailed'
  | 'CacheValidation'
  | 'BrowserCrash'
  | 'Configuration'
  | 'Unknown';

export abstract class StepError extends Error {
  abstract readonly kind: StepErrorKind;
  abstract readonly transient: boolean;

  constructor(message: string, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = new.target.name;
  }
}

export class UnmatchedStepError extends StepError {
  readonly kind = 'UnmatchedStep';
  readonly transient = false;

  constructor(public readonly rawText: string) {
    super(`No step pattern matches: "${rawText}"`);
  }
}

export class ParameterBindingError extends StepError {
  readonly kind = 'ParameterBinding';
  readonly transient = false;

  constructor(public readonly reference: string, message?: string) {
    super(message ?? `Unbound reference "${reference}"`);
  }
}

export class ElementNotFoundError extends StepError {
  readonly kind = 'ElementNotFound';
  readonly transient = true;

  constructor(public readonly descriptor: string, detail?: string) {
    super(`Element not found: "${descriptor}"${detail ? ` (${detail})` : ''}`);
  }
}

export class ActionExecutionError extends StepError {
  readonly kind = 'ActionExecution';

  constructor(
    public readonly actionKind: ActionKind,
    message: string,
    public readonly transient: boolean,
    public readonly resolvedBy?: ResolutionStage,
    cause?: Error
  ) {
    super(`${actionKind} failed: ${message}`, cause);
  }
}

export class ActionTimeoutError extends StepError {
  readonly kind = 'ActionTimeout';
  readonly transient = true;

  constructor(public readonly operation: ActionKind | 'snapshot', public readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export class AssertionFailedError extends StepError {
  readonly kind = 'AssertionFailed';
  readonly transient = false;

  constructor(message: string, public readonly expected?: string, public readonly actual?: string) {
    super(message);
  }
}

/**
 * Raised inside the resolver when a cached locator no longer validates.
 * Always recovered by falling through to the next stage.
 */
export class CacheValidationError extends StepError {
  readonly kind = 'CacheValidation';
  readonly transient = true;

  constructor(public readonly cacheKey: string, reason: string) {
    super(`Cached locator for ${cacheKey} is stale: ${reason}`);
  }
}

/**
 * The browser session is unusable. Escapes the step and fails the scenario;
 * the scheduler replaces the session.
 */
export class BrowserCrashError extends StepError {
  readonly kind = 'BrowserCrash';
  readonly transient = false;
}

export class ConfigurationError extends StepError {
  readonly kind = 'Configuration';
  readonly transient = false;

  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function describeError(error: unknown): { kind: string; message: string } {
  if (error instanceof StepError) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: 'Unknown', message: toError(error).message };
}
