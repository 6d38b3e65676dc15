/**
 * Step Runner Integration Tests
 *
 * Wires every component through createStepRunner against in-process sessions
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createStepRunner } from '../index.js';
import { parseRunnerConfig, ConfigStub } from '../infra/config.js';
import { InMemoryLocatorStore } from '../storage/in-memory-locator-store.js';
import { FakeDetector, FakeSessionFactory, MemoryArtifactStore, createMockLogger } from './helpers/fakes.js';
import type { IDetection } from '../detectors/index.js';
import type { ITestScenario } from '../types/index.js';

const fillEmail: ITestScenario = {
  id: 'scn-email',
  name: 'Fill in the email',
  tags: ['smoke'],
  steps: [{ text: 'When I enter "user@example.com" in the "Email" field' }]
};

const clickWidget: ITestScenario = {
  id: 'scn-widget',
  name: 'Click a missing widget',
  tags: ['regression'],
  steps: [
    { text: 'When I click the "Nonexistent Widget"' },
    { text: 'Then I should see text "Done"' }
  ]
};

const lowConfidence: IDetection[] = [
  { label: 'button', boundingBox: { x: 900, y: 600, width: 100, height: 30 }, confidence: 0.4 }
];

describe('createStepRunner', () => {
  let sessions: FakeSessionFactory;
  let detector: FakeDetector;
  let artifacts: MemoryArtifactStore;

  const build = () => createStepRunner(
    parseRunnerConfig({ ai_model: { type: 'openai' }, execution: { retry_delay: 0 } }),
    {
      sessions,
      detector,
      artifacts,
      store: new InMemoryLocatorStore({ maxEntries: 100 }),
      logger: createMockLogger(),
      env: new ConfigStub({})
    }
  );

  beforeEach(() => {
    sessions = new FakeSessionFactory();
    detector = new FakeDetector(() => lowConfidence);
    artifacts = new MemoryArtifactStore();
  });

  it('should resolve a field heuristically and then from the cache', async () => {
    const runner = build();

    const [first] = await runner.run([fillEmail]);
    const [second] = await runner.run([fillEmail]);

    expect(first.status).toBe('passed');
    expect(first.steps[0].locator?.resolvedBy).toBe('heuristic');
    expect(first.steps[0].locator?.target).toEqual({ kind: 'selector', selector: '#email' });
    expect(second.steps[0].locator?.resolvedBy).toBe('cache');
    expect(sessions.acquired[0].actions).toEqual([
      { target: { kind: 'selector', selector: '#email' }, action: 'type', value: 'user@example.com' }
    ]);
    expect(detector.calls).toBe(0);
  });

  it('should fail only the unresolvable scenario of a parallel run', async () => {
    const fillEmailAgain: ITestScenario = { ...fillEmail, id: 'scn-email-again', name: 'Fill in the email again' };

    const results = await build().run([fillEmail, clickWidget, fillEmailAgain], { parallelism: 3 });

    expect(results.map(r => r.scenarioId)).toEqual(['scn-email', 'scn-widget', 'scn-email-again']);
    expect(results.map(r => r.status)).toEqual(['passed', 'failed', 'passed']);
    expect(sessions.acquired).toHaveLength(3);

    const result = results[1];
    expect(result.steps[0]).toMatchObject({
      status: 'failed',
      attempts: 3,
      error: { kind: 'ElementNotFound', message: 'Element not found: "Nonexistent Widget"' }
    });
    expect(result.steps[1].status).toBe('skipped');
    expect(result.screenshot).toBe('screenshots/0001-scn-widget-failure.png');
    expect(detector.calls).toBe(3);
  });

  it('should apply configured tags when the run names none', async () => {
    const runner = createStepRunner(
      parseRunnerConfig({ ai_model: { type: 'none' }, tags: ['smoke'] }),
      { sessions, artifacts, logger: createMockLogger(), env: new ConfigStub({}) }
    );

    const results = await runner.run([fillEmail, clickWidget]);

    expect(results.map(r => r.scenarioId)).toEqual(['scn-email']);
  });
});
