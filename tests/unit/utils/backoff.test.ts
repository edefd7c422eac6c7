import { describe, it, expect } from 'vitest';
import { computeBackoffDelay, TimeoutError, withTimeout } from '../../../src/utils/backoff';

describe('computeBackoffDelay', () => {
  it('doubles from the base delay', () => {
    expect([1, 2, 3, 4].map((n) => computeBackoffDelay(n, 2000))).toEqual([2000, 4000, 8000, 16000]);
  });

  it('caps at the maximum and treats attempts below 1 as the first', () => {
    expect(computeBackoffDelay(10, 500, 30_000)).toBe(30_000);
    expect(computeBackoffDelay(0, 500)).toBe(500);
  });
});

describe('withTimeout', () => {
  it('resolves with the operation result', async () => {
    await expect(withTimeout('quick', 1000, async () => 'done')).resolves.toBe('done');
  });

  it('rejects with a TimeoutError when the operation is too slow', async () => {
    const never = () => new Promise<string>(() => undefined);
    const result = withTimeout('ocr call', 5, never);
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('ocr call timed out after 5ms');
  });
});
