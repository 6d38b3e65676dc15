/**
 * Core domain types shared by the compiler, resolver, executor and scheduler.
 */

export const ACTION_KINDS = [
  'navigate',
  'click',
  'type',
  'select',
  'hover',
  'press-key',
  'assert-visible',
  'assert-text',
  'wait',
  'screenshot',
  'save-variable'
] as const;

export type ActionKind = typeof ACTION_KINDS[number];

export function isActionKind(value: string): value is ActionKind {
  return (ACTION_KINDS as readonly string[]).includes(value);
}

/**
 * Action kinds that operate without a target element
 */
export const TARGETLESS_ACTIONS: ReadonlySet<ActionKind> = new Set<ActionKind>([
  'navigate',
  'press-key',
  'wait',
  'screenshot'
]);

export type PatternTier = 'exact' | 'custom' | 'builtin';

export interface IParameter {
  readonly name: string;
  readonly value: string;
}

export interface ICompiledStep {
  readonly actionKind: ActionKind;
  readonly targetDescriptor: string;
  readonly parameters: readonly IParameter[];
  readonly rawText: string;
  readonly patternId: string;
}

export interface IBoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type LocatorTarget =
  | { kind: 'selector'; selector: string }
  | { kind: 'coordinates'; x: number; y: number };

export type ResolutionStage = 'cache' | 'heuristic' | 'ai';

export interface IElementLocator {
  readonly target: LocatorTarget;
  readonly confidence: number;
  readonly resolvedBy: ResolutionStage;
  readonly boundingBox?: IBoundingBox;
  readonly timestamp: number;
}

export interface IPageFingerprint {
  url: string;
  contentHash: string;
  id: string;
}

export interface ICacheEntry {
  key: string;
  descriptor: string;
  fingerprint: IPageFingerprint;
  locator: IElementLocator;
  /** Epoch milliseconds */
  expiresAt: number;
}

/**
 * One node of the accessibility tree a browser session reports.
 * Nodes are listed in document order.
 */
export interface IAccessibilityNode {
  selector: string;
  role: string;
  name?: string;
  text?: string;
  label?: string;
  placeholder?: string;
  visible?: boolean;
  boundingBox?: IBoundingBox;
}

export interface IPageSnapshot {
  url: string;
  screenshot: Buffer;
  accessibilityTree: IAccessibilityNode[];
}

export interface IRawStep {
  text: string;
  /** Two-column key/value rows attached to the step */
  dataTable?: string[][];
}

export interface ITestScenario {
  id: string;
  name: string;
  tags: string[];
  steps: IRawStep[];
  background?: IRawStep[];
  /** Outline example row: column name to value */
  examples?: Record<string, string>;
}

export type StepStatus = 'passed' | 'failed' | 'skipped';
export type ScenarioStatus = 'pending' | 'running' | 'passed' | 'failed' | 'skipped';

export interface IStepErrorInfo {
  kind: string;
  message: string;
}

export interface IStepResult {
  readonly index: number;
  readonly text: string;
  readonly status: StepStatus;
  readonly actionKind?: ActionKind;
  readonly locator?: IElementLocator;
  readonly attempts: number;
  readonly durationMs: number;
  readonly output?: string;
  readonly error?: IStepErrorInfo;
  readonly screenshot?: string;
  readonly fingerprint?: IPageFingerprint;
}

export interface IScenarioResult {
  readonly scenarioId: string;
  readonly name: string;
  readonly status: Exclude<ScenarioStatus, 'pending' | 'running'>;
  readonly steps: readonly IStepResult[];
  readonly workerId?: number;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly failedStepIndex?: number;
  readonly error?: IStepErrorInfo;
  readonly screenshot?: string;
}

export interface IRunSummary {
  total: number;
  passed: number;
  failed: number;
  skipped: number;
  startTime: number;
  endTime: number;
}
