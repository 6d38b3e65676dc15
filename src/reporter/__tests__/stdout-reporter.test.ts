/**
 * StdoutReporter Unit Tests
 *
 * Tests console output reporting for run results
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { StdoutReporter } from '../stdout-reporter.js';
import type { IRunSummary, IScenarioResult } from '../../types/index.js';

const passed: IScenarioResult = {
  scenarioId: 'scn-1',
  name: 'Login with valid credentials',
  status: 'passed',
  workerId: 1,
  startedAt: 1000,
  completedAt: 1500,
  steps: [
    {
      index: 0,
      text: 'When I click the "Sign in" button',
      status: 'passed',
      attempts: 1,
      durationMs: 20,
      locator: { target: { kind: 'selector', selector: '#submit' }, confidence: 1, resolvedBy: 'cache', timestamp: 0 }
    }
  ]
};

const failed: IScenarioResult = {
  scenarioId: 'scn-2',
  name: 'Checkout',
  status: 'failed',
  workerId: 2,
  startedAt: 1000,
  completedAt: 1800,
  failedStepIndex: 0,
  error: { kind: 'ElementNotFound', message: 'Element not found: "Nonexistent Widget"' },
  screenshot: 'screenshots/0001-scn-2-failure.png',
  steps: [
    { index: 0, text: 'When I click the "Nonexistent Widget"', status: 'failed', attempts: 3, durationMs: 90 },
    { index: 1, text: 'Then I should see text "Thanks"', status: 'skipped', attempts: 0, durationMs: 0 }
  ]
};

const summary = (failedCount: number): IRunSummary => ({
  total: 2,
  passed: 2 - failedCount,
  failed: failedCount,
  skipped: 0,
  startTime: 1000,
  endTime: 2000
});

describe('StdoutReporter', () => {
  let reporter: StdoutReporter;
  let consoleLogSpy: MockInstance;

  const output = (): string => consoleLogSpy.mock.calls.map(call => String(call[0])).join('\n');

  beforeEach(() => {
    reporter = new StdoutReporter();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  it('should report a passing run', async () => {
    await reporter.report([passed], summary(0));

    const logs = output();
    expect(logs).toContain('STEPRUNNER REPORT');
    expect(logs).toContain('Login with valid credentials');
    expect(logs).toContain('[cache]');
    expect(logs).toContain('Duration:  1000ms');
    expect(logs).toContain('FINAL STATUS: PASSED');
  });

  it('should report failures with error, screenshot and retries', async () => {
    await reporter.report([passed, failed], summary(1));

    const logs = output();
    expect(logs).toContain('ElementNotFound: Element not found: "Nonexistent Widget"');
    expect(logs).toContain('screenshot: screenshots/0001-scn-2-failure.png');
    expect(logs).toContain('(3 attempts)');
    expect(logs).toContain('FINAL STATUS: FAILED');
  });
});
