export interface RetryOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt; doubles on every further attempt */
  baseDelayMs: number;
  /** Return false to stop retrying and rethrow immediately */
  isRetryable?: (error: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Exponential backoff delay for a failed attempt (1-based).
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Run an async operation with bounded exponential backoff.
 * The last error is rethrown once the attempt budget is spent.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  for (;;) {
    attempt++;
    try {
      return await operation();
    } catch (error) {
      const retryable = options.isRetryable ? options.isRetryable(error) : true;
      if (!retryable || attempt >= options.maxAttempts) {
        throw error;
      }

      const delay = backoffDelay(options.baseDelayMs, attempt);
      options.onRetry?.(attempt, delay, error);
      await wait(delay);
    }
  }
}
