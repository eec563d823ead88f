/**
 * Retry Logic with Exponential Backoff
 *
 * Re-runs a unit of work when it fails with a conflict-class error
 * ({@link AbortedError} or {@link RetriableError}). Any other error propagates
 * immediately. Three equivalent surfaces:
 *
 * - `withRetry(operation, config)` - wrapper
 * - `retryable(fn, config)` - returns a retrying version of `fn`
 * - `retryAttempts(config)` - async generator for loop-style retries
 *
 * @module rpc/retry
 */

import {
  AbortedError,
  ConfigurationError,
  isConflictError,
  type RetriableError,
} from '../errors/index.js';
import { createLogger } from '../observability/index.js';

const logger = createLogger('retry');

// ============================================================================
// Retry Configuration Types
// ============================================================================

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /**
   * Maximum number of retry attempts (not including initial attempt).
   * @default 5
   */
  maxRetries: number;

  /**
   * Base delay in milliseconds for exponential backoff.
   * @default 100
   */
  baseDelayMs: number;

  /**
   * Maximum delay in milliseconds between retries, before jitter.
   * @default 5000
   */
  maxDelayMs: number;

  /**
   * Jitter factor (0-1): up to this fraction of the delay is added at random.
   * @default 0.1
   */
  jitterFactor: number;

  /**
   * Callback for retry events (useful for logging/monitoring).
   * `attempt` is the 1-based number of the attempt that just failed.
   */
  onRetry?: (attempt: number, error: AbortedError | RetriableError, delayMs: number) => void;

  /**
   * Cancels the retry loop; a pending backoff wait rejects with the signal's reason.
   */
  signal?: AbortSignal;
}

/**
 * Retry settings as accepted by callers; unset fields take the defaults.
 */
export type RetryOptions = Partial<RetryConfig>;

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 5,
  baseDelayMs: 100,
  maxDelayMs: 5000,
  jitterFactor: 0.1,
};

// ============================================================================
// Validation
// ============================================================================

function invalid(field: string, value: number, expectation: string): ConfigurationError {
  return new ConfigurationError(`${field} must be ${expectation}, got ${value}`, {
    details: { field, value },
  });
}

/**
 * Layer retry options; a field left undefined in `overrides` keeps its value
 * from `base`.
 */
export function mergeRetryOptions(base: RetryOptions, overrides: RetryOptions): RetryOptions {
  return {
    maxRetries: overrides.maxRetries ?? base.maxRetries,
    baseDelayMs: overrides.baseDelayMs ?? base.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? base.maxDelayMs,
    jitterFactor: overrides.jitterFactor ?? base.jitterFactor,
    onRetry: overrides.onRetry ?? base.onRetry,
    signal: overrides.signal ?? base.signal,
  };
}

/**
 * Merge options over the defaults and validate the result.
 *
 * @throws ConfigurationError for a negative, non-finite or non-integer retry
 * count, negative or non-finite delays, or a jitter factor outside [0, 1]
 */
export function validateRetryConfig(options: RetryOptions = {}): RetryConfig {
  // Fields passed as undefined keep their defaults.
  const config: RetryConfig = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  };
  if (options.onRetry) {
    config.onRetry = options.onRetry;
  }
  if (options.signal) {
    config.signal = options.signal;
  }

  if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
    throw invalid('maxRetries', config.maxRetries, 'a non-negative integer');
  }
  if (!Number.isFinite(config.baseDelayMs) || config.baseDelayMs < 0) {
    throw invalid('baseDelayMs', config.baseDelayMs, 'a non-negative finite number');
  }
  if (!Number.isFinite(config.maxDelayMs) || config.maxDelayMs < 0) {
    throw invalid('maxDelayMs', config.maxDelayMs, 'a non-negative finite number');
  }
  if (!Number.isFinite(config.jitterFactor) || config.jitterFactor < 0 || config.jitterFactor > 1) {
    throw invalid('jitterFactor', config.jitterFactor, 'between 0 and 1');
  }

  return config;
}

// ============================================================================
// Delay Calculation
// ============================================================================

/**
 * Calculate the delay before the next retry attempt.
 *
 * delay = min(baseDelay * 2^attempt, maxDelay), plus up to
 * `jitterFactor` of that value at random.
 *
 * @param attempt - The retry attempt number (0-indexed)
 * @param random - Source of randomness in [0, 1)
 * @returns Delay in milliseconds
 */
export function calculateRetryDelay(
  attempt: number,
  config: Pick<RetryConfig, 'baseDelayMs' | 'maxDelayMs' | 'jitterFactor'>,
  random: () => number = Math.random
): number {
  const cappedDelay = Math.min(config.baseDelayMs * Math.pow(2, attempt), config.maxDelayMs);
  return cappedDelay + cappedDelay * config.jitterFactor * random();
}

/**
 * Wait for `ms` milliseconds; rejects with the signal's reason if it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Log, notify and wait after a failed attempt that still has a successor.
 */
async function backoff(
  attempt: number,
  error: AbortedError | RetriableError,
  config: RetryConfig,
  label?: string
): Promise<void> {
  const delayMs = calculateRetryDelay(attempt, config);
  logger.debug('Transaction conflict, retrying', {
    operation: label,
    attempt: attempt + 1,
    maxAttempts: config.maxRetries + 1,
    delayMs,
    error: error.message,
  });
  config.onRetry?.(attempt + 1, error, delayMs);
  await sleep(delayMs, config.signal);
}

function exhausted(
  config: RetryConfig,
  lastError: AbortedError | RetriableError | undefined,
  label?: string
): AbortedError | RetriableError {
  logger.warn('Transaction failed after retries', {
    operation: label,
    attempts: config.maxRetries + 1,
  });
  return lastError ?? new AbortedError();
}

// ============================================================================
// Retry Wrapper
// ============================================================================

/**
 * Execute an operation, retrying conflict-class failures.
 *
 * With `maxRetries = N` the operation runs at most N + 1 times; after the
 * last failure the last conflict error is thrown.
 *
 * @param operation - Receives the 0-based attempt number
 *
 * @example
 * ```typescript
 * const balance = await withRetry(
 *   async () => {
 *     const txn = client.txn();
 *     try {
 *       await txn.mutate({ setObj: { uid: '_:a', balance: 10 } });
 *       return await txn.commit();
 *     } finally {
 *       await txn.discard();
 *     }
 *   },
 *   { maxRetries: 3, baseDelayMs: 50 }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
  label?: string
): Promise<T> {
  const config = validateRetryConfig(options);
  let lastError: AbortedError | RetriableError | undefined;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    if (config.signal?.aborted) {
      throw config.signal.reason;
    }

    try {
      return await operation(attempt);
    } catch (error) {
      if (!isConflictError(error)) {
        throw error;
      }
      lastError = error;
      if (attempt < config.maxRetries) {
        await backoff(attempt, error, config, label);
      }
    }
  }

  throw exhausted(config, lastError, label);
}

/**
 * Wrap a function so that every call retries conflict-class failures.
 *
 * @example
 * ```typescript
 * const transfer = retryable(async (from: string, to: string, amount: number) => {
 *   // ...one transaction...
 * }, { maxRetries: 3 });
 *
 * await transfer('0x1', '0x2', 10);
 * ```
 */
export function retryable<A extends unknown[], T>(
  fn: (...args: A) => Promise<T>,
  options: RetryOptions = {}
): (...args: A) => Promise<T> {
  validateRetryConfig(options);
  const label = fn.name || undefined;
  return (...args: A) => withRetry(() => fn(...args), options, label);
}

// ============================================================================
// Loop-style retries
// ============================================================================

/**
 * One attempt yielded by {@link retryAttempts}.
 */
export class RetryAttempt {
  private failure: AbortedError | RetriableError | undefined;

  constructor(
    /** 0-based attempt number */
    readonly number: number
  ) {}

  /**
   * Whether the attempt failed with a conflict-class error
   */
  get failed(): boolean {
    return this.failure !== undefined;
  }

  get error(): AbortedError | RetriableError | undefined {
    return this.failure;
  }

  /**
   * Run the attempt's work. A conflict-class failure is recorded and resolves
   * to `undefined`; any other error propagates.
   */
  async run<T>(fn: () => Promise<T>): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      if (isConflictError(error)) {
        this.failure = error;
        return undefined;
      }
      throw error;
    }
  }
}

/**
 * Yield attempts until one completes without a conflict.
 *
 * After a failed attempt the generator waits out the backoff and yields the
 * next one; after the last failed attempt it throws the recorded error.
 *
 * @example
 * ```typescript
 * for await (const attempt of retryAttempts({ maxRetries: 3 })) {
 *   await attempt.run(async () => {
 *     const txn = client.txn();
 *     try {
 *       await txn.mutate({ setObj: { name: 'Alice' } });
 *       await txn.commit();
 *     } finally {
 *       await txn.discard();
 *     }
 *   });
 * }
 * ```
 */
export async function* retryAttempts(
  options: RetryOptions = {}
): AsyncGenerator<RetryAttempt, void, undefined> {
  const config = validateRetryConfig(options);

  for (let number = 0; number <= config.maxRetries; number++) {
    const attempt = new RetryAttempt(number);
    yield attempt;

    const error = attempt.error;
    if (error === undefined) {
      return;
    }
    if (number < config.maxRetries) {
      await backoff(number, error, config);
    } else {
      throw exhausted(config, error);
    }
  }
}
