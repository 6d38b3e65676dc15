import type { RetryController } from './retry-controller.js';
import { ExecutionContext } from './execution-context.js';
import type { IRawStep, IScenarioResult, IStepResult, ITestScenario } from '../types/index.js';
import { ILogger } from '../infra/logger.js';
import { describeError } from '../infra/errors.js';

export interface IScenarioRun {
  result: IScenarioResult;
  /** The session can no longer be trusted and should be replaced */
  sessionLost: boolean;
}

/**
 * True when the step ended because its browser session died
 */
export function isSessionCrash(step: IStepResult): boolean {
  return step.error?.kind === 'BrowserCrash';
}

/**
 * Runs the steps of one scenario in order on one worker's context.
 * Background steps run first. After a failure the remaining steps are skipped
 * unless `continueOnFailure` is set. A lost session always skips the rest.
 */
export class ScenarioRunner {
  constructor(
    private controller: Pick<RetryController, 'runStep'>,
    private continueOnFailure: boolean,
    private logger: ILogger
  ) {}

  async run(scenario: ITestScenario, context: ExecutionContext): Promise<IScenarioResult> {
    return (await this.execute(scenario, context)).result;
  }

  async execute(scenario: ITestScenario, context: ExecutionContext): Promise<IScenarioRun> {
    const startedAt = Date.now();
    context.beginScenario(scenario);

    const steps = [...(scenario.background ?? []), ...scenario.steps];
    const results: IStepResult[] = [];
    let firstFailure: IStepResult | undefined;
    let sessionLost = false;

    this.logger.info(`SCENARIO: Starting "${scenario.name}"`, {
      scenarioId: scenario.id,
      workerId: context.workerId,
      steps: steps.length
    });

    for (const [index, step] of steps.entries()) {
      if (sessionLost || (firstFailure && !this.continueOnFailure)) {
        results.push({ index, text: step.text, status: 'skipped', attempts: 0, durationMs: 0 });
        continue;
      }

      const { result, threw } = await this.runStep(step, index, context);
      results.push(result);
      sessionLost = threw || isSessionCrash(result);
      if (result.status === 'failed' && !firstFailure) {
        firstFailure = result;
      }
    }

    const completedAt = Date.now();
    this.logger.info(`SCENARIO: "${scenario.name}" ${firstFailure ? 'failed' : 'passed'}`, {
      scenarioId: scenario.id,
      workerId: context.workerId,
      durationMs: completedAt - startedAt,
      sessionLost
    });

    return {
      sessionLost,
      result: {
        scenarioId: scenario.id,
        name: scenario.name,
        status: firstFailure ? 'failed' : 'passed',
        steps: results,
        workerId: context.workerId,
        startedAt,
        completedAt,
        failedStepIndex: firstFailure?.index,
        error: firstFailure?.error,
        screenshot: firstFailure?.screenshot
      }
    };
  }

  /**
   * The controller reports failures as results; anything it throws is unexpected
   */
  private async runStep(
    step: IRawStep,
    index: number,
    context: ExecutionContext
  ): Promise<{ result: IStepResult; threw: boolean }> {
    const startedAt = Date.now();
    try {
      return { result: await this.controller.runStep(step, index, context), threw: false };
    } catch (error) {
      this.logger.error(`SCENARIO: Step "${step.text}" threw on worker ${context.workerId}`, error);
      return {
        threw: true,
        result: {
          index,
          text: step.text,
          status: 'failed',
          attempts: 1,
          durationMs: Date.now() - startedAt,
          error: describeError(error),
          fingerprint: context.fingerprint
        }
      };
    }
  }
}
