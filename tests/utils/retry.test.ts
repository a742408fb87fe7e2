import { backoffDelay, withRetry, withTimeout } from '../../src/utils/retry';

const options = { maxAttempts: 4, initialDelayMs: 1, maxDelayMs: 4 };

describe('withRetry', () => {
  it('returns the first successful attempt', async () => {
    const seen: number[] = [];
    const result = await withRetry(async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return 'ok';
    }, options);

    expect(result).toBe('ok');
    expect(seen).toEqual([1, 2, 3]);
  });

  it('rethrows the last error once attempts run out', async () => {
    let calls = 0;
    const run = withRetry(async (attempt) => {
      calls += 1;
      throw new Error(`fail ${attempt}`);
    }, options);

    await expect(run).rejects.toThrow('fail 4');
    expect(calls).toBe(4);
  });

  it('stops as soon as shouldRetry says no', async () => {
    let calls = 0;
    const run = withRetry(
      async () => {
        calls += 1;
        throw new Error('fatal');
      },
      { ...options, shouldRetry: () => false },
    );

    await expect(run).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });

  it('reports each retry with its delay', async () => {
    const delays: number[] = [];
    await withRetry(
      async (attempt) => {
        if (attempt < 4) throw new Error('again');
      },
      { ...options, onRetry: (_error, _attempt, delayMs) => delays.push(delayMs) },
    );

    expect(delays).toEqual([1, 2, 4]);
  });
});

describe('backoffDelay', () => {
  it('grows exponentially up to the cap', () => {
    const opts = { maxAttempts: 10, initialDelayMs: 500, maxDelayMs: 5000 };
    expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, opts))).toEqual([500, 1000, 2000, 4000, 5000, 5000]);
  });
});

describe('withTimeout', () => {
  it('passes through a result that arrives in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 50, () => new Error('late'))).resolves.toBe(42);
  });

  it('rejects with the supplied error when the budget runs out', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withTimeout(never, 10, () => new Error('late'))).rejects.toThrow('late');
  });
});
