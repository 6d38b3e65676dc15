/**
 * Action Executor
 * Performs one compiled action against the worker's browser session.
 */

import type { ActOutcome, BrowserAction } from '../browser/index.js';
import type { ActionKind, IElementLocator, IParameter } from '../types/index.js';
import type { ExecutionContext } from '../runner/execution-context.js';
import type { RunnerConfig } from '../types/config.js';
import { IArtifactStore } from '../infra/artifact-store.js';
import { ILogger } from '../infra/logger.js';
import { sleep, withTimeout } from '../infra/timeout.js';
import {
  ActionExecutionError,
  ActionTimeoutError,
  AssertionFailedError,
  BrowserCrashError,
  ParameterBindingError,
  StepError,
  toError
} from '../infra/errors.js';
import {
  BROWSER_ACTIONS,
  CRASH_BROWSER_MESSAGES,
  TRANSIENT_BROWSER_MESSAGES
} from '../constants/index.js';

export interface IActionResult {
  output?: string;
  screenshot?: string;
}

export type ExecutorSettings = Pick<RunnerConfig, 'base_url' | 'pages'> & {
  /** Milliseconds allowed for each browser call */
  timeout: number;
};

export type BrowserFailureClass = 'crash' | 'transient' | 'fatal';

export function classifyBrowserFailure(message: string): BrowserFailureClass {
  const text = message.toLowerCase();
  if (CRASH_BROWSER_MESSAGES.some(pattern => text.includes(pattern))) {
    return 'crash';
  }
  if (TRANSIENT_BROWSER_MESSAGES.some(pattern => text.includes(pattern))) {
    return 'transient';
  }
  return 'fatal';
}

function findParameter(parameters: readonly IParameter[], ...names: string[]): string | undefined {
  for (const name of names) {
    const found = parameters.find(p => p.name === name);
    if (found) {
      return found.value;
    }
  }
  return undefined;
}

function requireParameter(
  parameters: readonly IParameter[],
  actionKind: ActionKind,
  ...names: string[]
): string {
  const value = findParameter(parameters, ...names);
  if (value === undefined) {
    throw new ParameterBindingError(names[0], `${actionKind} requires a "${names[0]}" parameter`);
  }
  return value;
}

export class ActionExecutor {
  constructor(
    private settings: ExecutorSettings,
    private artifacts: IArtifactStore,
    private logger: ILogger
  ) {}

  async execute(
    actionKind: ActionKind,
    locator: IElementLocator | null,
    parameters: readonly IParameter[],
    context: ExecutionContext
  ): Promise<IActionResult> {
    this.logger.debug(`Executing ${actionKind}`, {
      workerId: context.workerId,
      target: locator?.target,
      resolvedBy: locator?.resolvedBy
    });

    switch (actionKind) {
      case 'navigate':
        return this.navigate(parameters, context);
      case 'click':
        await this.interact(actionKind, locator, BROWSER_ACTIONS.CLICK, context);
        return {};
      case 'type':
        await this.interact(actionKind, locator, BROWSER_ACTIONS.TYPE, context,
          requireParameter(parameters, actionKind, 'value', 'text'));
        return {};
      case 'select':
        await this.interact(actionKind, locator, BROWSER_ACTIONS.SELECT, context,
          requireParameter(parameters, actionKind, 'option', 'value'));
        return {};
      case 'hover':
        await this.interact(actionKind, locator, BROWSER_ACTIONS.HOVER, context);
        return {};
      case 'press-key':
        await this.interact(actionKind, locator, BROWSER_ACTIONS.PRESS, context,
          requireParameter(parameters, actionKind, 'key'));
        return {};
      case 'assert-visible':
        return this.assertVisible(locator, context);
      case 'assert-text':
        return this.assertText(locator, parameters, context);
      case 'wait':
        return this.wait(parameters);
      case 'screenshot':
        return this.screenshot(parameters, context);
      case 'save-variable':
        return this.saveVariable(locator, parameters, context);
    }
  }

  /**
   * Page names map through `pages`; relative paths resolve against `base_url`
   */
  resolveUrl(target: string): string {
    const named = this.settings.pages[target] ?? this.settings.pages[target.toLowerCase()];
    const url = named ?? target;

    if (/^[a-z][a-z0-9+.-]*:/i.test(url)) {
      return url;
    }
    if (!this.settings.base_url) {
      throw new ActionExecutionError('navigate', `Cannot resolve "${target}" without a base_url`, false);
    }
    return new URL(url, this.settings.base_url).toString();
  }

  private async navigate(parameters: readonly IParameter[], context: ExecutionContext): Promise<IActionResult> {
    const url = this.resolveUrl(requireParameter(parameters, 'navigate', 'url'));
    await this.call('navigate', undefined, () => context.session.navigate(url));
    context.fingerprint = undefined;
    return { output: url };
  }

  private async interact(
    actionKind: ActionKind,
    locator: IElementLocator | null,
    action: BrowserAction,
    context: ExecutionContext,
    value?: string
  ): Promise<Extract<ActOutcome, { ok: true }>> {
    const outcome = await this.call(actionKind, locator ?? undefined, () =>
      context.session.act(locator?.target ?? null, action, value)
    );
    if (!outcome.ok) {
      throw this.wrapFailure(actionKind, outcome.error, locator ?? undefined);
    }
    return outcome;
  }

  private async assertVisible(locator: IElementLocator | null, context: ExecutionContext): Promise<IActionResult> {
    const outcome = await this.interact('assert-visible', locator, BROWSER_ACTIONS.READ, context);
    if (outcome.visible === false) {
      throw new AssertionFailedError('Expected element to be visible', 'visible', 'hidden');
    }
    return {};
  }

  private async assertText(
    locator: IElementLocator | null,
    parameters: readonly IParameter[],
    context: ExecutionContext
  ): Promise<IActionResult> {
    const expected = requireParameter(parameters, 'assert-text', 'text', 'value');
    // Without a target the whole page text is read
    const outcome = await this.interact('assert-text', locator, BROWSER_ACTIONS.READ, context);
    const actual = outcome.text ?? '';

    if (!actual.toLowerCase().includes(expected.toLowerCase())) {
      throw new AssertionFailedError(
        `Expected text "${expected}" but found "${actual.slice(0, 200)}"`,
        expected,
        actual
      );
    }
    return { output: actual };
  }

  private async wait(parameters: readonly IParameter[]): Promise<IActionResult> {
    const seconds = findParameter(parameters, 'seconds');
    const raw = seconds ?? requireParameter(parameters, 'wait', 'milliseconds');
    const amount = Number(raw);
    if (!Number.isFinite(amount) || amount < 0) {
      throw new ParameterBindingError('wait', `Invalid wait duration "${raw}"`);
    }
    const ms = seconds !== undefined ? amount * 1000 : amount;
    await sleep(ms);
    return { output: `${ms}ms` };
  }

  private async screenshot(parameters: readonly IParameter[], context: ExecutionContext): Promise<IActionResult> {
    const snapshot = await this.call('screenshot', undefined, () => context.session.snapshot());
    context.lastSnapshot = snapshot;
    const name = findParameter(parameters, 'name') ?? context.scenarioId ?? 'screenshot';
    const reference = await this.artifacts.saveScreenshot(name, snapshot.screenshot);
    return { output: reference, screenshot: reference };
  }

  private async saveVariable(
    locator: IElementLocator | null,
    parameters: readonly IParameter[],
    context: ExecutionContext
  ): Promise<IActionResult> {
    const name = requireParameter(parameters, 'save-variable', 'name');
    const outcome = await this.interact('save-variable', locator, BROWSER_ACTIONS.READ, context);
    const value = (outcome.text ?? '').trim();
    context.variables.set(name, value);
    this.logger.debug('Variable saved', { workerId: context.workerId, name, length: value.length });
    return { output: value };
  }

  /**
   * Runs one browser call under the action timeout and classifies what it throws
   */
  private async call<T>(
    actionKind: ActionKind,
    locator: IElementLocator | undefined,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await withTimeout(
        operation(),
        this.settings.timeout,
        () => new ActionTimeoutError(actionKind, this.settings.timeout)
      );
    } catch (error) {
      if (error instanceof StepError) {
        throw error;
      }
      throw this.wrapFailure(actionKind, toError(error).message, locator, toError(error));
    }
  }

  private wrapFailure(
    actionKind: ActionKind,
    message: string,
    locator: IElementLocator | undefined,
    cause?: Error
  ): StepError {
    const failure = classifyBrowserFailure(message);
    this.logger.warn(`${actionKind} rejected by browser`, {
      classification: failure,
      error: message,
      resolvedBy: locator?.resolvedBy
    });

    if (failure === 'crash') {
      return new BrowserCrashError(`${actionKind} failed: ${message}`, cause);
    }
    return new ActionExecutionError(actionKind, message, failure === 'transient', locator?.resolvedBy, cause);
  }
}
