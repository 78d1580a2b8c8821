import { describe, expect, it, vi } from 'vitest';
import { ActionError } from './errors.ts';
import { TimeoutError, withTimeout } from './timeout.ts';

describe('timeout', () => {
  it('should resolve if the promise completes before the timeout', async () => {
    const promise = Promise.resolve('ok');
    const result = await withTimeout(promise, 100);
    expect(result).toBe('ok');
  });

  it('should reject if the promise takes longer than the timeout', async () => {
    const promise = new Promise((resolve) => setTimeout(() => resolve('ok'), 200));
    await expect(withTimeout(promise, 50)).rejects.toThrow(TimeoutError);
  });

  it('should include the operation name in the error message', async () => {
    const promise = new Promise((resolve) => setTimeout(() => resolve('ok'), 100));
    await expect(withTimeout(promise, 10, 'MyStep')).rejects.toThrow(/MyStep timed out/);
  });

  it('should be an ActionError of kind timeout and call onTimeout', async () => {
    const onTimeout = vi.fn();
    const promise = new Promise((resolve) => setTimeout(() => resolve('ok'), 100));
    const error = await withTimeout(promise, 10, 'slow', onTimeout).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ActionError);
    expect(error instanceof ActionError && error.kind).toBe('timeout');
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});
