import { TimeoutError } from './errors.ts';

export { TimeoutError };

/**
 * Race a promise against a timer. The timer is always cleared so it never keeps the process alive.
 * `onTimeout` runs before the rejection, e.g. to abort the underlying operation.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  name = 'Operation',
  onTimeout?: () => void
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(`${name} timed out after ${ms}ms`));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
