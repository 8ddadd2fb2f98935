import { describe, expect, it, vi } from 'vitest';
import { retryAsync } from '../src/http/retry.js';

function noSleep() {
  return vi.fn(async (_ms: number) => {});
}

describe('retryAsync', () => {
  it('returns the first success without sleeping', async () => {
    const sleep = noSleep();
    const result = await retryAsync(async () => 'ok', { retries: 3, sleep });
    expect(result).toBe('ok');
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries then succeeds', async () => {
    const sleep = noSleep();
    const attempts: number[] = [];
    const result = await retryAsync(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 2) throw new Error(`fail ${attempt}`);
        return 42;
      },
      { retries: 3, sleep }
    );
    expect(result).toBe(42);
    expect(attempts).toEqual([0, 1, 2]);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([50, 100]);
  });

  it('performs at most retries + 1 attempts and rethrows the last error', async () => {
    const errors: Error[] = [];
    const operation = vi.fn(async (attempt: number) => {
      const error = new Error(`fail ${attempt}`);
      errors.push(error);
      throw error;
    });

    const outcome = retryAsync(operation, { retries: 2, sleep: noSleep() });
    await expect(outcome).rejects.toThrow('fail 2');
    expect(operation).toHaveBeenCalledTimes(3);
    await outcome.catch((error: unknown) => expect(error).toBe(errors[2]));
  });

  it('doubles the delay up to the ceiling', async () => {
    const sleep = noSleep();
    await expect(
      retryAsync(
        async () => {
          throw new Error('down');
        },
        { retries: 4, initialDelayMs: 300, maxDelayMs: 1000, sleep }
      )
    ).rejects.toThrow('down');
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([300, 600, 1000, 1000]);
  });

  it('makes a single attempt with zero retries', async () => {
    const operation = vi.fn(async () => {
      throw new Error('once');
    });
    await expect(retryAsync(operation, { retries: 0, sleep: noSleep() })).rejects.toThrow('once');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('stops early when shouldRetry rejects the failure', async () => {
    const operation = vi.fn(async () => {
      throw new Error('client error');
    });
    const onRetry = vi.fn();
    await expect(
      retryAsync(operation, { retries: 5, shouldRetry: () => false, onRetry, sleep: noSleep() })
    ).rejects.toThrow('client error');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('reports each retry with its attempt and delay', async () => {
    const onRetry = vi.fn();
    await expect(
      retryAsync(
        async () => {
          throw new Error('flaky');
        },
        { retries: 2, initialDelayMs: 10, onRetry, sleep: noSleep() }
      )
    ).rejects.toThrow('flaky');
    expect(onRetry.mock.calls.map(([, attempt, delay]) => [attempt, delay])).toEqual([
      [0, 10],
      [1, 20]
    ]);
  });
});
