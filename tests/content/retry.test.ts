/**
 * Backoff computation and the retry loop.
 */

import { MAX_BACKOFF_MS, computeBackoff, withRetry } from '../../src/content/retry';

describe('computeBackoff', () => {
  const policy = { maxAttempts: 5, backoffBaseMs: 100 };

  it('doubles per attempt without jitter', () => {
    const noJitter = { ...policy, jitter: false };
    expect(computeBackoff(noJitter, 1)).toBe(100);
    expect(computeBackoff(noJitter, 2)).toBe(200);
    expect(computeBackoff(noJitter, 3)).toBe(400);
  });

  it('keeps jitter between half and all of the delay', () => {
    expect(computeBackoff(policy, 3, () => 0)).toBe(200);
    expect(computeBackoff(policy, 3, () => 1)).toBe(400);
    expect(computeBackoff(policy, 3, () => 0.5)).toBe(300);
  });

  it('caps the delay', () => {
    expect(computeBackoff({ ...policy, jitter: false }, 20)).toBe(MAX_BACKOFF_MS);
    expect(computeBackoff({ ...policy, backoffMaxMs: 250, jitter: false }, 3)).toBe(250);
  });
});

describe('withRetry', () => {
  const noSleep = async () => undefined;

  it('retries retryable failures until success', async () => {
    const attempts: number[] = [];
    const result = await withRetry(
      async (attempt) => {
        attempts.push(attempt);
        if (attempt < 3) throw new Error('flaky');
        return 'ok';
      },
      { maxAttempts: 4, backoffBaseMs: 10 },
      { isRetryable: () => true, sleep: noSleep },
    );
    expect(result).toBe('ok');
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('rethrows the last error once attempts run out', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        { maxAttempts: 3, backoffBaseMs: 10 },
        { isRetryable: () => true, sleep: noSleep },
      ),
    ).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
  });

  it('does not retry non-retryable errors', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('fatal');
        },
        { maxAttempts: 5, backoffBaseMs: 10 },
        { isRetryable: () => false, sleep: noSleep },
      ),
    ).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('reports each retry with its delay', async () => {
    const retries: Array<[number, number]> = [];
    const delays: number[] = [];
    await withRetry(
      async (attempt) => {
        if (attempt < 3) throw new Error('flaky');
        return attempt;
      },
      { maxAttempts: 3, backoffBaseMs: 50, jitter: false },
      {
        isRetryable: () => true,
        onRetry: (_err, attempt, delayMs) => retries.push([attempt, delayMs]),
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );
    expect(retries).toEqual([
      [1, 50],
      [2, 100],
    ]);
    expect(delays).toEqual([50, 100]);
  });
});
