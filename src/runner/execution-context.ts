import type { IBrowserSession } from '../browser/index.js';
import type { IPageFingerprint, IPageSnapshot, ITestScenario } from '../types/index.js';

/**
 * Per-worker mutable state. Owned by exactly one worker and reset for every scenario.
 */
export class ExecutionContext {
  readonly variables = new Map<string, string>();
  examples: Readonly<Record<string, string>> = {};
  fingerprint?: IPageFingerprint;
  lastSnapshot?: IPageSnapshot;
  scenarioId?: string;

  constructor(
    readonly workerId: number,
    public session: IBrowserSession
  ) {}

  beginScenario(scenario: ITestScenario): void {
    this.variables.clear();
    this.examples = { ...(scenario.examples ?? {}) };
    this.fingerprint = undefined;
    this.lastSnapshot = undefined;
    this.scenarioId = scenario.id;
  }

  replaceSession(session: IBrowserSession): void {
    this.session = session;
    this.fingerprint = undefined;
    this.lastSnapshot = undefined;
  }
}
