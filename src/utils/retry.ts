export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
};

const DEFAULT_MAX_DELAY_MS = 15_000;

export function computeRetryDelayMs(
  retryCount: number,
  baseDelayMs: number,
  maxDelayMs = DEFAULT_MAX_DELAY_MS
): number {
  return Math.min(baseDelayMs * 2 ** Math.max(0, retryCount), maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Runs `fn` up to `attempts` times. `fn` must be idempotent: a failed attempt
 * may have partially run before the next one starts.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  let attempt = 1;
  for (;;) {
    try {
      return await fn(attempt);
    } catch (err) {
      const canRetry = options.shouldRetry ? options.shouldRetry(err, attempt) : true;
      if (attempt >= attempts || !canRetry) {
        throw err;
      }
      const delayMs = computeRetryDelayMs(attempt - 1, options.baseDelayMs, options.maxDelayMs);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs);
      attempt += 1;
    }
  }
}
