import type { IRunSummary, IScenarioResult } from '../types/index.js';

/**
 * Reporter responsible for presenting the results of a run.
 */
export interface IReporter {
  /**
   * @param results scenario results in declaration order
   */
  report(results: readonly IScenarioResult[], summary: IRunSummary): Promise<void>;
}
