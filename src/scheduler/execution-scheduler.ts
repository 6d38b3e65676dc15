/**
 * Execution Scheduler
 *
 * Bounded worker pool over a FIFO queue of scenarios. Each worker owns one
 * browser session and one ExecutionContext. Results come back in declaration
 * order whatever order the workers finish in.
 */

import { EventEmitter } from 'node:events';
import type { IBrowserSession, IBrowserSessionFactory } from '../browser/index.js';
import { ExecutionContext } from '../runner/execution-context.js';
import { ScenarioRunner } from '../runner/scenario-runner.js';
import type { IRunSummary, IScenarioResult, ITestScenario } from '../types/index.js';
import { ILogger } from '../infra/logger.js';
import { describeError, toError } from '../infra/errors.js';

export interface RunOptions {
  parallelism?: number;
  /** Keep scenarios carrying at least one of these tags */
  tags?: string[];
  signal?: AbortSignal;
}

function normalizeTag(tag: string): string {
  return tag.trim().replace(/^@/, '').toLowerCase();
}

export function filterByTags(scenarios: ITestScenario[], tags: string[] = []): ITestScenario[] {
  const wanted = tags.map(normalizeTag).filter(tag => tag.length > 0);
  if (wanted.length === 0) {
    return scenarios;
  }
  return scenarios.filter(scenario => scenario.tags.some(tag => wanted.includes(normalizeTag(tag))));
}

export function summarizeResults(results: IScenarioResult[], startTime: number, endTime: number): IRunSummary {
  return {
    total: results.length,
    passed: results.filter(r => r.status === 'passed').length,
    failed: results.filter(r => r.status === 'failed').length,
    skipped: results.filter(r => r.status === 'skipped').length,
    startTime,
    endTime
  };
}

/**
 * Emits `scenario:start` (scenario, workerId), `scenario:end` (result)
 * and `run:end` (results, summary)
 */
export class ExecutionScheduler extends EventEmitter {
  constructor(
    private sessions: IBrowserSessionFactory,
    private runner: ScenarioRunner,
    private defaultParallelism: number,
    private logger: ILogger
  ) {
    super();
  }

  async run(scenarios: ITestScenario[], options: RunOptions = {}): Promise<IScenarioResult[]> {
    const startTime = Date.now();
    const queue = filterByTags(scenarios, options.tags);
    const parallelism = Math.max(1, options.parallelism ?? this.defaultParallelism);
    const results: Array<IScenarioResult | undefined> = new Array(queue.length).fill(undefined);
    let nextIndex = 0;
    let acquireError: Error | undefined;

    this.logger.info('SCHEDULER: Starting run', {
      scenarios: queue.length,
      filteredOut: scenarios.length - queue.length,
      parallelism
    });

    const worker = async (workerId: number): Promise<void> => {
      let session: IBrowserSession;
      try {
        session = await this.sessions.acquire(workerId);
      } catch (error) {
        acquireError = toError(error);
        this.logger.error(`SCHEDULER: Worker ${workerId} could not acquire a browser session`, error);
        return;
      }
      const context = new ExecutionContext(workerId, session);
      let holdsSession = true;

      try {
        // eslint-disable-next-line no-constant-condition
        while (true) {
          if (options.signal?.aborted) {
            return;
          }
          const currentIndex = nextIndex;
          if (currentIndex >= queue.length) {
            return;
          }
          nextIndex += 1;

          const scenario = queue[currentIndex];
          const { result, crashed } = await this.runOne(scenario, context);
          results[currentIndex] = result;
          this.emit('scenario:end', result);

          if (crashed || !context.session.isAlive()) {
            await this.releaseQuietly(context.session);
            holdsSession = await this.replaceSession(context);
            if (!holdsSession) {
              return;
            }
          }
        }
      } finally {
        if (holdsSession) {
          await this.releaseQuietly(context.session);
        }
      }
    };

    const workers = Array.from({ length: Math.min(parallelism, queue.length) }, (_, i) => worker(i + 1));
    await Promise.all(workers);

    const finalResults = queue.map((scenario, index) =>
      results[index] ?? this.undispatched(scenario, options.signal?.aborted ?? false, acquireError)
    );

    const summary = summarizeResults(finalResults, startTime, Date.now());
    this.logger.info('SCHEDULER: Run finished', { ...summary });
    this.emit('run:end', finalResults, summary);

    return finalResults;
  }

  private async runOne(
    scenario: ITestScenario,
    context: ExecutionContext
  ): Promise<{ result: IScenarioResult; crashed: boolean }> {
    const startedAt = Date.now();
    this.emit('scenario:start', scenario, context.workerId);

    try {
      const { result, sessionLost } = await this.runner.execute(scenario, context);
      return { result, crashed: sessionLost };
    } catch (error) {
      // Step failures come back as results; this is a scenario that could not start
      this.logger.error(`SCHEDULER: Scenario "${scenario.name}" aborted on worker ${context.workerId}`, error);
      return {
        crashed: true,
        result: {
          scenarioId: scenario.id,
          name: scenario.name,
          status: 'failed',
          steps: [],
          workerId: context.workerId,
          startedAt,
          completedAt: Date.now(),
          error: describeError(error)
        }
      };
    }
  }

  private async replaceSession(context: ExecutionContext): Promise<boolean> {
    try {
      context.replaceSession(await this.sessions.acquire(context.workerId));
      this.logger.info(`SCHEDULER: Worker ${context.workerId} acquired a fresh browser session`);
      return true;
    } catch (error) {
      this.logger.error(`SCHEDULER: Worker ${context.workerId} could not replace its browser session`, error);
      return false;
    }
  }

  private async releaseQuietly(session: IBrowserSession): Promise<void> {
    try {
      await this.sessions.release(session);
    } catch (error) {
      this.logger.warn('SCHEDULER: Failed to release browser session', {
        sessionId: session.id,
        error: toError(error).message
      });
    }
  }

  private undispatched(scenario: ITestScenario, aborted: boolean, acquireError?: Error): IScenarioResult {
    const now = Date.now();
    return {
      scenarioId: scenario.id,
      name: scenario.name,
      status: aborted || !acquireError ? 'skipped' : 'failed',
      steps: [],
      startedAt: now,
      completedAt: now,
      error: aborted
        ? { kind: 'Cancelled', message: 'Run was cancelled before this scenario started' }
        : acquireError
          ? { kind: 'BrowserCrash', message: `No browser session available: ${acquireError.message}` }
          : undefined
    };
  }
}
