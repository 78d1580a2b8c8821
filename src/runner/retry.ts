type BackoffStrategy = 'linear' | 'exponential';

/**
 * Calculate backoff delay in milliseconds for a zero-based retry attempt
 */
export function calculateBackoff(
  attempt: number,
  backoff: BackoffStrategy,
  baseDelay = 1000,
  maxDelay = Number.POSITIVE_INFINITY
): number {
  const delay = backoff === 'exponential' ? baseDelay * 2 ** attempt : baseDelay * (attempt + 1);
  return Math.min(delay, maxDelay);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
