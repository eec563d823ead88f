/**
 * Tests for conflict retries with exponential backoff
 *
 * Tests cover:
 * - Retry policy validation
 * - Exponential backoff delay calculation
 * - withRetry / retryable wrapper behavior
 * - Loop-style retries with retryAttempts
 * - Cancellation of the backoff wait
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AbortedError,
  ConfigurationError,
  RetriableError,
  TransactionError,
} from '../../src/errors/index.js';
import { configureLogging, resetLogging } from '../../src/observability/index.js';
import {
  calculateRetryDelay,
  DEFAULT_RETRY_CONFIG,
  RetryAttempt,
  retryable,
  retryAttempts,
  validateRetryConfig,
  mergeRetryOptions,
  withRetry,
} from '../../src/rpc/retry.js';

let logged: string[];

beforeEach(() => {
  logged = [];
  configureLogging({ level: 'debug', sink: (_level, line) => logged.push(line) });
});

afterEach(() => {
  resetLogging();
  vi.useRealTimers();
});

// ============================================================================
// Configuration
// ============================================================================

describe('validateRetryConfig', () => {
  it('should fill unset fields from the defaults', () => {
    expect(validateRetryConfig({ maxRetries: 2 })).toEqual({ ...DEFAULT_RETRY_CONFIG, maxRetries: 2 });
    expect(DEFAULT_RETRY_CONFIG).toEqual({
      maxRetries: 5,
      baseDelayMs: 100,
      maxDelayMs: 5000,
      jitterFactor: 0.1,
    });
  });

  it('should keep defaults for fields passed as undefined', () => {
    expect(
      validateRetryConfig({ maxRetries: undefined, baseDelayMs: 10, jitterFactor: undefined })
    ).toEqual({ ...DEFAULT_RETRY_CONFIG, baseDelayMs: 10 });
  });

  it('should layer options without letting undefined fields clear the base', () => {
    expect(mergeRetryOptions({ maxRetries: 0, baseDelayMs: 5 }, { maxRetries: undefined })).toEqual({
      maxRetries: 0,
      baseDelayMs: 5,
      maxDelayMs: undefined,
      jitterFactor: undefined,
      onRetry: undefined,
      signal: undefined,
    });
  });

  it('should reject invalid values with the offending field', () => {
    expect(() => validateRetryConfig({ maxRetries: -1 })).toThrow(
      'maxRetries must be a non-negative integer, got -1'
    );
    expect(() => validateRetryConfig({ maxRetries: 1.5 })).toThrow(ConfigurationError);
    expect(() => validateRetryConfig({ baseDelayMs: Number.NaN })).toThrow(
      'baseDelayMs must be a non-negative finite number, got NaN'
    );
    expect(() => validateRetryConfig({ maxDelayMs: -5 })).toThrow(
      'maxDelayMs must be a non-negative finite number, got -5'
    );
    expect(() => validateRetryConfig({ jitterFactor: 2 })).toThrow(
      'jitterFactor must be between 0 and 1, got 2'
    );
  });
});

// ============================================================================
// Exponential Backoff Delay Calculation
// ============================================================================

describe('calculateRetryDelay', () => {
  const config = { baseDelayMs: 100, maxDelayMs: 5000, jitterFactor: 0.1 };

  it('should double the delay per attempt', () => {
    expect(calculateRetryDelay(0, config, () => 0)).toBe(100);
    expect(calculateRetryDelay(1, config, () => 0)).toBe(200);
    expect(calculateRetryDelay(3, config, () => 0)).toBe(800);
  });

  it('should cap the delay before jitter', () => {
    expect(calculateRetryDelay(10, config, () => 0)).toBe(5000);
    expect(calculateRetryDelay(10, config, () => 0.5)).toBe(5250);
  });

  it('should add up to jitterFactor of the delay', () => {
    expect(calculateRetryDelay(3, config, () => 0.5)).toBe(840);
    expect(calculateRetryDelay(3, { ...config, jitterFactor: 0 }, () => 0.9)).toBe(800);
  });
});

// ============================================================================
// withRetry
// ============================================================================

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const operation = vi.fn(async (attempt: number) => `attempt ${attempt}`);

    await expect(withRetry(operation)).resolves.toBe('attempt 0');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should retry conflicts with exponential backoff', async () => {
    vi.useFakeTimers();
    const onRetry = vi.fn();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new AbortedError())
      .mockRejectedValueOnce(new RetriableError('schema update in progress'))
      .mockResolvedValueOnce('committed');

    const result = withRetry(operation, { baseDelayMs: 100, jitterFactor: 0, onRetry });
    await vi.runAllTimersAsync();

    await expect(result).resolves.toBe('committed');
    expect(operation.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1, 2]);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(AbortedError), 100);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(RetriableError), 200);
  });

  it('should wait the computed delay before the next attempt', async () => {
    vi.useFakeTimers();
    const operation = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new AbortedError())
      .mockResolvedValueOnce('ok');

    const result = withRetry(operation, { baseDelayMs: 100, jitterFactor: 0 });
    await vi.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);

    await vi.runAllTimersAsync();
    await expect(result).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('should not retry other errors', async () => {
    const failure = new TransactionError('Readonly transaction cannot run mutations');
    const operation = vi.fn(async () => {
      throw failure;
    });

    await expect(withRetry(operation)).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should throw the last conflict after maxRetries + 1 attempts', async () => {
    const errors = [new AbortedError(), new AbortedError(), new AbortedError()];
    const operation = vi.fn(async (attempt: number) => {
      throw errors[attempt];
    });

    await expect(withRetry(operation, { maxRetries: 2, baseDelayMs: 0 })).rejects.toBe(errors[2]);
    expect(operation).toHaveBeenCalledTimes(3);
    expect(logged.some((line) => line.includes('Transaction failed after retries'))).toBe(true);
  });

  it('should run once with maxRetries 0', async () => {
    const onRetry = vi.fn();
    const operation = vi.fn(async () => {
      throw new AbortedError();
    });

    await expect(withRetry(operation, { maxRetries: 0, onRetry })).rejects.toBeInstanceOf(
      AbortedError
    );
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('should validate the policy before the first attempt', async () => {
    const operation = vi.fn(async () => 'never');

    await expect(withRetry(operation, { jitterFactor: -0.1 })).rejects.toBeInstanceOf(
      ConfigurationError
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop waiting when the signal aborts during backoff', async () => {
    const controller = new AbortController();
    const reason = new Error('cancelled');
    const operation = vi.fn(async () => {
      throw new AbortedError();
    });

    await expect(
      withRetry(operation, {
        baseDelayMs: 60_000,
        signal: controller.signal,
        onRetry: () => controller.abort(reason),
      })
    ).rejects.toBe(reason);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('too late'));
    const operation = vi.fn(async () => 'never');

    await expect(withRetry(operation, { signal: controller.signal })).rejects.toThrow('too late');
    expect(operation).not.toHaveBeenCalled();
  });
});

// ============================================================================
// retryable
// ============================================================================

describe('retryable', () => {
  it('should pass arguments through on every attempt', async () => {
    let calls = 0;
    const transfer = retryable(
      async (from: string, to: string) => {
        calls++;
        if (calls === 1) {
          throw new AbortedError();
        }
        return `${from}->${to}`;
      },
      { baseDelayMs: 0 }
    );

    await expect(transfer('0x1', '0x2')).resolves.toBe('0x1->0x2');
    expect(calls).toBe(2);
  });

  it('should validate the policy when wrapping', () => {
    expect(() => retryable(async () => 1, { maxRetries: -3 })).toThrow(ConfigurationError);
  });
});

// ============================================================================
// retryAttempts
// ============================================================================

describe('retryAttempts', () => {
  it('should yield attempts until one succeeds', async () => {
    const seen: number[] = [];
    let result: string | undefined;

    for await (const attempt of retryAttempts({ baseDelayMs: 0 })) {
      seen.push(attempt.number);
      result = await attempt.run(async () => {
        if (attempt.number < 2) {
          throw new AbortedError();
        }
        return 'done';
      });
    }

    expect(seen).toEqual([0, 1, 2]);
    expect(result).toBe('done');
  });

  it('should throw the recorded conflict after the last attempt', async () => {
    const seen: number[] = [];
    const loop = async (): Promise<void> => {
      for await (const attempt of retryAttempts({ maxRetries: 1, baseDelayMs: 0 })) {
        seen.push(attempt.number);
        await attempt.run(async () => {
          throw new RetriableError('try again later');
        });
      }
    };

    await expect(loop()).rejects.toThrow('try again later');
    expect(seen).toEqual([0, 1]);
  });

  it('should let non-conflict errors escape the attempt', async () => {
    const attempt = new RetryAttempt(0);

    await expect(
      attempt.run(async () => {
        throw new TypeError('bad input');
      })
    ).rejects.toThrow('bad input');
    expect(attempt.failed).toBe(false);
  });

  it('should record a conflict on the attempt', async () => {
    const attempt = new RetryAttempt(0);
    const conflict = new AbortedError();

    await expect(
      attempt.run(async () => {
        throw conflict;
      })
    ).resolves.toBeUndefined();
    expect(attempt.failed).toBe(true);
    expect(attempt.error).toBe(conflict);
  });
});
