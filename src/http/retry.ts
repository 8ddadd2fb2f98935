export interface RetryOptions {
  /** Retries after the first attempt; at most `retries + 1` attempts run. */
  retries: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Failures rejected here are rethrown without further attempts. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_INITIAL_DELAY_MS = 50;
export const DEFAULT_MAX_DELAY_MS = 1000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `operation` until it resolves or the retry budget is spent.
 * Backoff doubles from `initialDelayMs` up to `maxDelayMs`, without jitter.
 * The last error is rethrown as is.
 */
export async function retryAsync<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxDelay = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const wait = options.sleep ?? sleep;
  let delay = Math.min(options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS, maxDelay);
  let remaining = Math.max(0, Math.floor(options.retries));

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (remaining === 0) throw error;
      if (options.shouldRetry && !options.shouldRetry(error, attempt)) throw error;

      options.onRetry?.(error, attempt, delay);
      await wait(delay);
      remaining -= 1;
      delay = Math.min(delay * 2, maxDelay);
    }
  }
}
