import { describe, it, expect } from 'vitest';
import { OracleUnavailableError, backoffDelay, withBackoff } from '@boardscout/core';

describe('backoff', () => {
  it('doubles the delay up to the cap', () => {
    expect([0, 1, 2, 3, 4, 5].map((n) => backoffDelay(n, 1000, 10000))).toEqual([
      1000, 2000, 4000, 8000, 10000, 10000,
    ]);
  });

  it('retries retryable failures and returns the eventual result', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await withBackoff(
      async () => {
        calls++;
        if (calls < 3) throw new OracleUnavailableError('busy', { status: 503 });
        return 'ok';
      },
      {
        retries: 4,
        baseDelayMs: 100,
        maxDelayMs: 1000,
        shouldRetry: () => true,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it('gives up after the configured retries', async () => {
    let calls = 0;
    const attempt = withBackoff(
      async () => {
        calls++;
        throw new Error('down');
      },
      { retries: 2, baseDelayMs: 1, maxDelayMs: 1, shouldRetry: () => true, sleep: async () => {} },
    );

    await expect(attempt).rejects.toThrow('down');
    expect(calls).toBe(3);
  });

  it('does not retry when shouldRetry declines', async () => {
    let calls = 0;
    const attempt = withBackoff(
      async () => {
        calls++;
        throw new Error('unauthorized');
      },
      { retries: 5, baseDelayMs: 1, maxDelayMs: 1, shouldRetry: () => false, sleep: async () => {} },
    );

    await expect(attempt).rejects.toThrow('unauthorized');
    expect(calls).toBe(1);
  });
});
