export interface BackoffOptions {
  /** Retries after the first call. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (err: unknown, retry: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** min(base * 2^retry, max) */
export function backoffDelay(retry: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * 2 ** retry, maxDelayMs);
}

export async function withBackoff<T>(fn: () => Promise<T>, options: BackoffOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  for (let retry = 0; ; retry++) {
    try {
      return await fn();
    } catch (err) {
      if (retry >= options.retries || !options.shouldRetry(err)) throw err;
      const delayMs = backoffDelay(retry, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(err, retry + 1, delayMs);
      await wait(delayMs);
    }
  }
}
