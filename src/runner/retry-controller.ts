/**
 * Retry & Failure Controller
 *
 * Compile, resolve and execute run as one unit per attempt. Transient failures
 * are retried with the cache bypassed; the final failure carries a screenshot
 * and the page fingerprint when they can be captured.
 */

import { StepCompiler } from '../parser/step-compiler.js';
import { ElementResolver } from '../element-discovery/element-resolver.js';
import { computePageFingerprint } from '../element-discovery/page-fingerprint.js';
import { ActionExecutor, IActionResult } from '../executor/action-executor.js';
import { ExecutionContext } from './execution-context.js';
import type { ExecutionConfig } from '../types/config.js';
import {
  TARGETLESS_ACTIONS,
  type ICompiledStep,
  type IElementLocator,
  type IPageFingerprint,
  type IRawStep,
  type IStepResult
} from '../types/index.js';
import { IArtifactStore } from '../infra/artifact-store.js';
import { ILogger } from '../infra/logger.js';
import { RetryStrategy, isRetryableError } from '../infra/retry-utils.js';
import { BrowserCrashError, describeError, toError } from '../infra/errors.js';

export type RetrySettings = Pick<ExecutionConfig, 'retry_count' | 'retry_delay' | 'retry_backoff' | 'screenshot'>;

interface IAttemptOutcome {
  step: ICompiledStep;
  locator: IElementLocator | null;
  result: IActionResult;
}

export class RetryController {
  constructor(
    private compiler: StepCompiler,
    private resolver: ElementResolver,
    private executor: ActionExecutor,
    private retryStrategy: RetryStrategy,
    private artifacts: IArtifactStore,
    private settings: RetrySettings,
    private logger: ILogger
  ) {}

  /**
   * Runs one step to a final result. A session crash comes back as a failed
   * result of kind BrowserCrash and is never retried.
   */
  async runStep(raw: IRawStep, index: number, context: ExecutionContext): Promise<IStepResult> {
    const startedAt = Date.now();
    let attempts = 0;
    let lastStep: ICompiledStep | undefined;

    try {
      const outcome = await this.retryStrategy.execute<IAttemptOutcome>(
        async (attempt) => {
          attempts = attempt + 1;
          const step = this.compiler.compile(raw, context);
          lastStep = step;
          const locator = await this.locate(step, context, attempt > 0);
          const result = await this.executor.execute(step.actionKind, locator, step.parameters, context);
          return { step, locator, result };
        },
        {
          maxRetries: this.settings.retry_count,
          backoff: this.settings.retry_backoff,
          initialDelay: this.settings.retry_delay * 1000,
          maxDelay: Math.max(30000, this.settings.retry_delay * 1000),
          jitter: false,
          isRetryable: isRetryableError,
          onRetry: (error, retry) => {
            this.logger.warn(`STEP RETRY: "${raw.text}" attempt ${retry + 1}`, {
              workerId: context.workerId,
              scenarioId: context.scenarioId,
              error: error.message
            });
          }
        }
      );

      return {
        index,
        text: raw.text,
        status: 'passed',
        actionKind: outcome.step.actionKind,
        locator: outcome.locator ?? undefined,
        attempts,
        durationMs: Date.now() - startedAt,
        output: outcome.result.output,
        screenshot: outcome.result.screenshot
      };
    } catch (error) {
      const info = describeError(error);
      this.logger.error(`STEP FAILED: "${raw.text}" after ${attempts} attempt(s)`, toError(error));

      // A dead session has nothing left to capture
      const evidence: { screenshot?: string; fingerprint?: IPageFingerprint } = error instanceof BrowserCrashError
        ? { fingerprint: context.fingerprint }
        : await this.captureEvidence(context);
      return {
        index,
        text: raw.text,
        status: 'failed',
        actionKind: lastStep?.actionKind,
        attempts,
        durationMs: Date.now() - startedAt,
        error: info,
        screenshot: evidence.screenshot,
        fingerprint: evidence.fingerprint
      };
    }
  }

  private async locate(
    step: ICompiledStep,
    context: ExecutionContext,
    bypassCache: boolean
  ): Promise<IElementLocator | null> {
    if (TARGETLESS_ACTIONS.has(step.actionKind) || step.targetDescriptor === '') {
      return null;
    }
    return this.resolver.resolve(step.targetDescriptor, context, {
      bypassCache,
      actionKind: step.actionKind
    });
  }

  private async captureEvidence(
    context: ExecutionContext
  ): Promise<{ screenshot?: string; fingerprint?: IPageFingerprint }> {
    if (!context.session.isAlive()) {
      return { fingerprint: context.fingerprint };
    }

    try {
      const snapshot = await context.session.snapshot();
      const fingerprint = computePageFingerprint(snapshot.url, snapshot.accessibilityTree);
      const screenshot = this.settings.screenshot
        ? await this.artifacts.saveScreenshot(`${context.scenarioId ?? 'step'}-failure`, snapshot.screenshot)
        : undefined;
      return { screenshot, fingerprint };
    } catch (error) {
      this.logger.warn('Could not capture failure evidence', {
        workerId: context.workerId,
        error: toError(error).message
      });
      return { fingerprint: context.fingerprint };
    }
  }
}
