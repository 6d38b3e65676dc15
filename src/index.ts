import { PatternRegistry, createDefaultPatternRegistry } from './parser/pattern-registry.js';
import { StepCompiler } from './parser/step-compiler.js';
import { LocatorCache } from './cache/locator-cache.js';
import { ElementResolver } from './element-discovery/element-resolver.js';
import { IElementDiscoveryStrategy } from './element-discovery/index.js';
import { HeuristicStrategy } from './element-discovery/strategies/heuristic-strategy.js';
import { VisionAIStrategy } from './element-discovery/strategies/vision-ai-strategy.js';
import { ActionExecutor } from './executor/action-executor.js';
import { RetryController } from './runner/retry-controller.js';
import { ScenarioRunner } from './runner/scenario-runner.js';
import { ExecutionScheduler, RunOptions, summarizeResults } from './scheduler/execution-scheduler.js';
import { IElementDetector } from './detectors/index.js';
import { OpenAIElementDetector } from './detectors/openai-detector.js';
import { IBrowserSessionFactory } from './browser/index.js';
import { PlaywrightSessionFactory } from './browser/playwright-session.js';
import { ILocatorStore } from './storage/index.js';
import { InMemoryLocatorStore } from './storage/in-memory-locator-store.js';
import { createLocatorStore } from './storage/storage-factory.js';
import { StdoutReporter } from './reporter/stdout-reporter.js';
import { IReporter } from './reporter/index.js';
import { ArtifactStore, IArtifactStore } from './infra/artifact-store.js';
import { ConfidenceThresholdService } from './infra/confidence-threshold-service.js';
import { EnvConfig, IConfig } from './infra/config.js';
import { ILogger, WinstonLogger } from './infra/logger.js';
import { CircuitBreaker, RetryStrategy, createDefaultCircuitBreaker, createDefaultRetryStrategy } from './infra/retry-utils.js';
import type { RunnerConfig } from './types/config.js';
import type { IScenarioResult, ITestScenario } from './types/index.js';

export interface StepRunnerDependencies {
  sessions: IBrowserSessionFactory;
  /** Required when ai_model.type is "openai" unless OPENAI_API_KEY is set */
  detector?: IElementDetector;
  store?: ILocatorStore;
  artifacts?: IArtifactStore;
  logger?: ILogger;
  env?: IConfig;
  retryStrategy?: RetryStrategy;
  circuitBreaker?: CircuitBreaker;
}

export interface StepRunner {
  registry: PatternRegistry;
  compiler: StepCompiler;
  cache: LocatorCache;
  resolver: ElementResolver;
  executor: ActionExecutor;
  scheduler: ExecutionScheduler;
  run(scenarios: ITestScenario[], options?: RunOptions): Promise<IScenarioResult[]>;
}

/**
 * Wires every component from one validated configuration
 */
export function createStepRunner(config: RunnerConfig, deps: StepRunnerDependencies): StepRunner {
  const logger = deps.logger ?? new WinstonLogger();
  const env = deps.env ?? new EnvConfig();
  const store = deps.store ?? new InMemoryLocatorStore({ maxEntries: config.ai_model.cache_max_entries }, logger);
  const artifacts = deps.artifacts ?? new ArtifactStore(config.artifacts_dir, logger);

  const registry = createDefaultPatternRegistry(config.custom_mappings, logger);
  const compiler = new StepCompiler(registry, logger, env);
  const cache = new LocatorCache(store, { ttlSeconds: config.ai_model.cache_ttl }, logger);

  const strategies: IElementDiscoveryStrategy[] = [
    new HeuristicStrategy(config.heuristic.min_specificity, logger)
  ];
  if (config.ai_model.type !== 'none') {
    const detector = deps.detector ?? new OpenAIElementDetector(env, logger);
    strategies.push(new VisionAIStrategy(
      detector,
      new ConfidenceThresholdService(config.ai_model, logger),
      deps.circuitBreaker ?? createDefaultCircuitBreaker(logger),
      config.ai_model.timeout,
      logger
    ));
  }

  const resolver = new ElementResolver(
    cache,
    strategies,
    { useCache: config.ai_model.use_cache, snapshotTimeout: config.execution.timeout },
    logger
  );
  const executor = new ActionExecutor(
    { base_url: config.base_url, pages: config.pages, timeout: config.execution.timeout },
    artifacts,
    logger
  );
  const controller = new RetryController(
    compiler,
    resolver,
    executor,
    deps.retryStrategy ?? createDefaultRetryStrategy(logger),
    artifacts,
    config.execution,
    logger
  );
  const scenarioRunner = new ScenarioRunner(controller, config.execution.continue_on_failure, logger);
  const scheduler = new ExecutionScheduler(deps.sessions, scenarioRunner, config.execution.parallel, logger);

  return {
    registry,
    compiler,
    cache,
    resolver,
    executor,
    scheduler,
    run: (scenarios, options = {}) => scheduler.run(scenarios, {
      ...options,
      tags: options.tags ?? config.tags
    })
  };
}

/**
 * Runs scenarios end to end in Chromium and prints the report
 */
export async function runScenarios(
  scenarios: ITestScenario[],
  config: RunnerConfig,
  options: RunOptions & { reporter?: IReporter } = {}
): Promise<IScenarioResult[]> {
  const logger = new WinstonLogger();
  const env = new EnvConfig();
  const store = await createLocatorStore({ maxEntries: config.ai_model.cache_max_entries, config: env, logger });
  const sessions = new PlaywrightSessionFactory({
    headless: config.execution.headless,
    slowMo: config.execution.slow_mo,
    video: config.execution.video,
    actionTimeout: config.execution.timeout,
    artifactsDir: config.artifacts_dir
  }, logger);

  const startTime = Date.now();
  try {
    const runner = createStepRunner(config, { sessions, store, logger, env });
    const results = await runner.run(scenarios, options);
    const reporter = options.reporter ?? new StdoutReporter();
    await reporter.report(results, summarizeResults(results, startTime, Date.now()));
    return results;
  } finally {
    await sessions.close();
    await store.close();
  }
}

export * from './types/index.js';
export * from './types/config.js';
export * from './infra/errors.js';
export { PatternRegistry, createDefaultPatternRegistry } from './parser/pattern-registry.js';
export { StepCompiler } from './parser/step-compiler.js';
export { LocatorCache, normalizeDescriptor, buildCacheKey } from './cache/locator-cache.js';
export { ElementResolver } from './element-discovery/element-resolver.js';
export { computePageFingerprint } from './element-discovery/page-fingerprint.js';
export { ActionExecutor } from './executor/action-executor.js';
export { RetryController } from './runner/retry-controller.js';
export { ScenarioRunner } from './runner/scenario-runner.js';
export { ExecutionContext } from './runner/execution-context.js';
export { ExecutionScheduler, filterByTags, summarizeResults } from './scheduler/execution-scheduler.js';
export type { RunOptions } from './scheduler/execution-scheduler.js';
export { StdoutReporter } from './reporter/stdout-reporter.js';
export type { IReporter } from './reporter/index.js';
export type { IBrowserSession, IBrowserSessionFactory, ActOutcome, BrowserAction } from './browser/index.js';
export { PlaywrightSessionFactory } from './browser/playwright-session.js';
export type { IElementDetector, IDetection } from './detectors/index.js';
export { OpenAIElementDetector } from './detectors/openai-detector.js';
export type { ILocatorStore } from './storage/index.js';
export { InMemoryLocatorStore } from './storage/in-memory-locator-store.js';
export { RedisLocatorStore } from './storage/redis-locator-store.js';
export { createLocatorStore } from './storage/storage-factory.js';
export { WinstonLogger, LoggerStub } from './infra/logger.js';
export type { ILogger } from './infra/logger.js';
export { EnvConfig, ConfigStub, loadRunnerConfig, resolveRunnerConfig, parseRunnerConfig, applyCliFlags } from './infra/config.js';
export { ArtifactStore } from './infra/artifact-store.js';
