import { afterEach, describe, expect, it, vi } from 'vitest';

import { executeWithExponentialBackoff, executeWithSoftFallback } from './exponential-backoff.util';

describe('executeWithExponentialBackoff', (): void => {
  afterEach((): void => {
    vi.useRealTimers();
  });

  it('returns the first successful result without retrying', async (): Promise<void> => {
    const operation = vi.fn(async (): Promise<string> => 'ok');

    const result: string = await executeWithExponentialBackoff(operation);

    expect(result).toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries exactly once by default and then rethrows', async (): Promise<void> => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error('provider down');
    });
    const onRetry = vi.fn();

    await expect(
      executeWithExponentialBackoff(operation, { onRetry }),
    ).rejects.toThrow('provider down');

    expect(operation).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(expect.any(Error), 1, 0);
  });

  it('stops early when shouldRetry declines', async (): Promise<void> => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new Error('bad request');
    });

    await expect(
      executeWithExponentialBackoff(operation, {
        maxAttempts: 5,
        shouldRetry: (): boolean => false,
      }),
    ).rejects.toThrow('bad request');

    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('doubles the delay between attempts up to the cap', async (): Promise<void> => {
    vi.useFakeTimers();
    const delays: number[] = [];
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockRejectedValueOnce(new Error('third'))
      .mockResolvedValueOnce('ok');

    const pending: Promise<string> = executeWithExponentialBackoff(operation, {
      maxAttempts: 4,
      baseDelayMs: 100,
      maxDelayMs: 300,
      shouldRetry: (): boolean => true,
      onRetry: (_error: unknown, _attempt: number, delayMs: number): void => {
        delays.push(delayMs);
      },
    });
    await vi.runAllTimersAsync();

    await expect(pending).resolves.toBe('ok');
    expect(delays).toEqual([100, 200, 300]);
  });
});

describe('executeWithSoftFallback', (): void => {
  it('resolves to the fallback after the last attempt fails', async (): Promise<void> => {
    const operation = vi.fn(async (): Promise<readonly number[]> => {
      throw new Error('timeout');
    });

    const result: readonly number[] = await executeWithSoftFallback(operation, {
      fallback: (): readonly number[] => [],
    });

    expect(result).toEqual([]);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('passes the last error to the fallback', async (): Promise<void> => {
    const fallback = vi.fn((): string => 'fallback');

    await executeWithSoftFallback(
      async (): Promise<string> => {
        throw new Error('last failure');
      },
      { maxAttempts: 1, shouldRetry: (): boolean => true, fallback },
    );

    expect(fallback).toHaveBeenCalledWith(new Error('last failure'));
  });
});
