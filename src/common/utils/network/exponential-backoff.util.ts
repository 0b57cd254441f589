const DEFAULT_MAX_ATTEMPTS = 2;
const DEFAULT_BASE_DELAY_MS = 0;
const DEFAULT_MAX_DELAY_MS = 60_000;
const BACKOFF_MULTIPLIER = 2;

export interface IExponentialBackoffOptions {
  readonly maxAttempts?: number;
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  /** Defaults to retrying every error. */
  readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export interface ISoftFallbackOptions<TResult> extends IExponentialBackoffOptions {
  readonly fallback: (error: unknown) => TResult;
}

type BackoffSchedule = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
};

const toWholeNumber = (value: number | undefined, fallback: number, minimum: number): number =>
  typeof value === 'number' && Number.isFinite(value) && value >= minimum
    ? Math.floor(value)
    : fallback;

const resolveSchedule = (options: IExponentialBackoffOptions): BackoffSchedule => ({
  maxAttempts: toWholeNumber(options.maxAttempts, DEFAULT_MAX_ATTEMPTS, 1),
  baseDelayMs: toWholeNumber(options.baseDelayMs, DEFAULT_BASE_DELAY_MS, 0),
  maxDelayMs: toWholeNumber(options.maxDelayMs, DEFAULT_MAX_DELAY_MS, 1),
});

// Delay before the retry that follows `attempt`: base, 2*base, 4*base... capped.
const delayAfterAttempt = (schedule: BackoffSchedule, attempt: number): number =>
  Math.min(schedule.baseDelayMs * BACKOFF_MULTIPLIER ** (attempt - 1), schedule.maxDelayMs);

const sleep = async (delayMs: number): Promise<void> => {
  if (delayMs <= 0) {
    return;
  }

  await new Promise<void>((resolve: () => void): void => {
    setTimeout(resolve, delayMs);
  });
};

export const executeWithExponentialBackoff = async <TResult>(
  operation: () => Promise<TResult>,
  options: IExponentialBackoffOptions = {},
): Promise<TResult> => {
  const schedule: BackoffSchedule = resolveSchedule(options);
  let attempt: number = 1;

  for (;;) {
    try {
      return await operation();
    } catch (error: unknown) {
      const canRetry: boolean =
        attempt < schedule.maxAttempts && (options.shouldRetry?.(error, attempt) ?? true);

      if (!canRetry) {
        throw error;
      }

      const delayMs: number = delayAfterAttempt(schedule, attempt);
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
};

// Same attempt loop, but the final failure resolves to the fallback value instead of rejecting.
export const executeWithSoftFallback = async <TResult>(
  operation: () => Promise<TResult>,
  options: ISoftFallbackOptions<TResult>,
): Promise<TResult> => {
  try {
    return await executeWithExponentialBackoff<TResult>(operation, options);
  } catch (error: unknown) {
    return options.fallback(error);
  }
};
