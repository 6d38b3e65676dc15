/**
 * Retry and Circuit Breaker Utilities
 * Backoff retry for transient step failures and fail-fast protection for the detection service
 */

import { ILogger } from './logger.js';
import { StepError, toError } from './errors.js';

export type BackoffKind = 'exponential' | 'linear' | 'constant';

export interface RetryOptions {
  maxRetries: number;
  backoff: BackoffKind;
  initialDelay?: number; // milliseconds
  maxDelay?: number; // milliseconds
  jitter?: boolean;
  isRetryable?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number) => void;
}

const RETRYABLE_PATTERNS = [
  /timeout/i,
  /timed out/i,
  /network/i,
  /connection/i,
  /ECONNREFUSED/i,
  /ETIMEDOUT/i,
  /rate.?limit/i,
  /too many requests/i,
  /503/,
  /502/,
  /504/
];

/**
 * Step errors carry their own classification; anything else is judged by its message
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof StepError) {
    return error.transient;
  }
  return RETRYABLE_PATTERNS.some(pattern => pattern.test(error.message));
}

/**
 * Retry strategy with configurable backoff
 */
export class RetryStrategy {
  constructor(private logger?: ILogger) {}

  /**
   * Execute an operation with retry logic.
   * The operation receives the zero-based attempt number.
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions
  ): Promise<T> {
    const {
      maxRetries,
      backoff,
      initialDelay = 1000,
      maxDelay = 30000,
      jitter = true,
      isRetryable = isRetryableError,
      onRetry
    } = options;

    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        return await operation(attempt);
      } catch (error) {
        lastError = toError(error);

        const retryable = isRetryable(lastError);

        if (!retryable || attempt === maxRetries) {
          this.logger?.debug('Operation failed, not retrying', {
            attempt: attempt + 1,
            maxRetries,
            error: lastError.message,
            isRetryable: retryable
          });
          throw lastError;
        }

        const delay = this.calculateDelay(attempt, backoff, initialDelay, maxDelay, jitter);

        this.logger?.warn(`Retry attempt ${attempt + 1}/${maxRetries}`, {
          error: lastError.message,
          nextRetryIn: delay
        });

        onRetry?.(lastError, attempt + 1);

        await this.sleep(delay);
      }
    }

    throw lastError ?? new Error('Operation failed');
  }

  /**
   * Calculate retry delay based on backoff strategy
   */
  calculateDelay(
    attempt: number,
    backoff: BackoffKind,
    initialDelay: number,
    maxDelay: number,
    jitter = true
  ): number {
    let delay: number;

    switch (backoff) {
      case 'exponential':
        delay = initialDelay * Math.pow(2, attempt);
        break;
      case 'linear':
        delay = initialDelay * (attempt + 1);
        break;
      case 'constant':
      default:
        delay = initialDelay;
    }

    // 0-20% random variation so parallel workers do not retry in lockstep
    if (jitter) {
      delay = delay + delay * 0.2 * Math.random();
    }

    return Math.min(delay, maxDelay);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export interface CircuitBreakerOptions {
  failureThreshold: number; // failures before opening
  successThreshold: number; // successes in HALF_OPEN before closing
  timeout: number;          // ms before OPEN turns HALF_OPEN
}

interface Circuit {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureTime?: number;
  nextAttemptTime?: number;
}

export class CircuitOpenError extends Error {
  constructor(public readonly key: string, public readonly waitSeconds: number) {
    super(`Circuit breaker is OPEN for "${key}". Wait ${waitSeconds}s before retry.`);
    this.name = 'CircuitOpenError';
  }
}

/**
 * Circuit breaker: fails fast while a dependency keeps failing
 */
export class CircuitBreaker {
  private circuits = new Map<string, Circuit>();

  constructor(
    private options: CircuitBreakerOptions,
    private logger?: ILogger
  ) {}

  async execute<T>(
    key: string,
    operation: () => Promise<T>
  ): Promise<T> {
    const circuit = this.getOrCreateCircuit(key);

    if (circuit.state === CircuitState.OPEN) {
      if (circuit.nextAttemptTime !== undefined && Date.now() >= circuit.nextAttemptTime) {
        this.logger?.info(`Circuit ${key} transitioning to HALF_OPEN`);
        circuit.state = CircuitState.HALF_OPEN;
        circuit.successes = 0;
      } else {
        const waitTime = circuit.nextAttemptTime !== undefined
          ? Math.round((circuit.nextAttemptTime - Date.now()) / 1000)
          : 0;
        throw new CircuitOpenError(key, waitTime);
      }
    }

    try {
      const result = await operation();
      this.onSuccess(key, circuit);
      return result;
    } catch (error) {
      this.onFailure(key, circuit, toError(error));
      throw error;
    }
  }

  private onSuccess(key: string, circuit: Circuit): void {
    circuit.successes++;
    circuit.failures = 0;

    if (circuit.state === CircuitState.HALF_OPEN && circuit.successes >= this.options.successThreshold) {
      this.logger?.info(`Circuit ${key} transitioning to CLOSED after ${circuit.successes} successes`);
      circuit.state = CircuitState.CLOSED;
      circuit.successes = 0;
    }
  }

  private onFailure(key: string, circuit: Circuit, error: Error): void {
    circuit.failures++;
    circuit.lastFailureTime = Date.now();
    circuit.successes = 0;

    if (circuit.state === CircuitState.HALF_OPEN) {
      this.logger?.warn(`Circuit ${key} transitioning back to OPEN after failure in HALF_OPEN`);
      circuit.state = CircuitState.OPEN;
      circuit.nextAttemptTime = Date.now() + this.options.timeout;
    } else if (circuit.state === CircuitState.CLOSED && circuit.failures >= this.options.failureThreshold) {
      this.logger?.warn(`Circuit ${key} transitioning to OPEN after ${circuit.failures} failures`, {
        error: error.message
      });
      circuit.state = CircuitState.OPEN;
      circuit.nextAttemptTime = Date.now() + this.options.timeout;
    }
  }

  private getOrCreateCircuit(key: string): Circuit {
    let circuit = this.circuits.get(key);
    if (!circuit) {
      circuit = { state: CircuitState.CLOSED, failures: 0, successes: 0 };
      this.circuits.set(key, circuit);
    }
    return circuit;
  }

  getState(key: string): CircuitState {
    return this.getOrCreateCircuit(key).state;
  }
}

export function createDefaultRetryStrategy(logger?: ILogger): RetryStrategy {
  return new RetryStrategy(logger);
}

export function createDefaultCircuitBreaker(logger?: ILogger): CircuitBreaker {
  return new CircuitBreaker(
    {
      failureThreshold: 5,
      successThreshold: 2,
      timeout: 60000
    },
    logger
  );
}
