import { ExtractionSchemaError, ExtractionTimeout } from '../../lib/errors';
import { RetryPolicy } from '../../lib/retry';

function policy(overrides: ConstructorParameters<typeof RetryPolicy>[0] = {}) {
  const sleeps: number[] = [];
  const retry = new RetryPolicy({
    maxAttempts: 3,
    baseDelayMs: 100,
    maxDelayMs: 1000,
    random: () => 0,
    sleep: async ms => {
      sleeps.push(ms);
    },
    ...overrides,
  });
  return { retry, sleeps };
}

describe('RetryPolicy', () => {
  it('retries transient failures with exponential backoff', async () => {
    const { retry, sleeps } = policy();
    let calls = 0;

    const result = await retry.run(async () => {
      calls++;
      if (calls < 3) throw new ExtractionTimeout('asset-info', 10);
      return 'ok';
    });

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(sleeps).toEqual([100, 200]);
  });

  it('rethrows non-retryable errors at once', async () => {
    const { retry, sleeps } = policy();
    const operation = vi.fn(async () => {
      throw new ExtractionSchemaError('asset-info', ['filename']);
    });

    await expect(retry.run(operation)).rejects.toBeInstanceOf(ExtractionSchemaError);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  it('gives up after maxAttempts with the last error', async () => {
    const { retry, sleeps } = policy();
    let calls = 0;

    await expect(retry.run(async () => {
      calls++;
      throw new ExtractionTimeout(`attempt ${calls}`, 10);
    })).rejects.toThrow('"attempt 3"');
    expect(sleeps).toEqual([100, 200]);
  });

  it('lets delayFor override the computed delay', async () => {
    const { retry, sleeps } = policy({ delayFor: () => 5000 });
    let calls = 0;

    await retry.run(async () => {
      if (calls++ === 0) throw new ExtractionTimeout('x', 1);
    });
    expect(sleeps).toEqual([5000]);
  });

  it('caps the delay and adds jitter', () => {
    expect(policy().retry.delay(10)).toBe(1000);
    expect(policy({ random: () => 1, jitter: 0.5 }).retry.delay(0)).toBe(150);
  });

  it('keeps jittered delays under the cap', () => {
    const { retry } = policy({ random: () => 1, jitter: 0.5 });

    expect([2, 3, 10].map(attempt => retry.delay(attempt))).toEqual([600, 1000, 1000]);
  });

  it('derives policies with overrides', async () => {
    const { retry } = policy();
    const derived = retry.with({ maxAttempts: 1 });

    expect(derived.maxAttempts).toBe(1);
    expect(derived.baseDelayMs).toBe(100);
    await expect(derived.run(async () => {
      throw new ExtractionTimeout('x', 1);
    })).rejects.toBeInstanceOf(ExtractionTimeout);
  });
});
