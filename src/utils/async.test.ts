import { afterEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError, mapWithConcurrency, withRetry, withTimeout } from './async.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('withTimeout', () => {
  it('resolves when the promise settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'fast call')).resolves.toBe('done');
  });

  it('rejects with a TimeoutError when the timer fires first', async () => {
    const never = new Promise<string>(() => {});
    const result = withTimeout(never, 10, 'slow call');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('slow call timed out after 10ms');
  });

  it('does not time out when the limit is zero', async () => {
    await expect(withTimeout(Promise.resolve(1), 0, 'unbounded')).resolves.toBe(1);
  });
});

describe('withRetry', () => {
  it('retries until the operation succeeds', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls < 3) throw new Error('flaky');
      return 'ok';
    });

    await expect(withRetry(operation, { retries: 2, backoffMs: 0, label: '[Test]' })).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('throws the last error once retries run out', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const operation = vi.fn(async () => {
      throw new Error('down');
    });

    await expect(withRetry(operation, { retries: 1, backoffMs: 0, label: '[Test]' })).rejects.toThrow('down');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('stops early when shouldRetry refuses', async () => {
    const operation = vi.fn(async () => {
      throw new Error('bad input');
    });

    await expect(
      withRetry(operation, { retries: 5, backoffMs: 0, label: '[Test]', shouldRetry: () => false })
    ).rejects.toThrow('bad input');
    expect(operation).toHaveBeenCalledTimes(1);
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10];

    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delay));
      inFlight--;
      return `item-${index}`;
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3', 'item-4']);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async () => 1)).toEqual([]);
  });
});
