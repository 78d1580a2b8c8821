import { describe, expect, test } from 'vitest';
import { calculateBackoff, sleep } from './retry.ts';

describe('calculateBackoff', () => {
  test('grows linearly or exponentially and respects the cap', () => {
    expect(calculateBackoff(0, 'linear', 100)).toBe(100);
    expect(calculateBackoff(2, 'linear', 100)).toBe(300);
    expect(calculateBackoff(3, 'exponential', 100)).toBe(800);
    expect(calculateBackoff(10, 'exponential', 100, 5000)).toBe(5000);
  });
});

describe('sleep', () => {
  test('resolves early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const pending = sleep(60_000, controller.signal);
    controller.abort();
    await pending;
    expect(Date.now() - started).toBeLessThan(1000);
  });

  test('resolves immediately for an already aborted signal', async () => {
    await expect(sleep(60_000, AbortSignal.abort())).resolves.toBeUndefined();
  });
});
