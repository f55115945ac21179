import { describe, expect, it, vi } from 'vitest';
import { ExplicitRetry, RateLimitError, RetryExceededError, TransientError } from '../errors';
import { attemptOutcome, classifyFailure, executeWithRetryPolicy, type RetryPolicy } from '../retryPolicy';

const policy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  ratelimitRetries: 0,
  ratelimitWaitSeconds: 0.5,
  transientErrorRetries: 0,
  transientErrorWaitSeconds: 0.25,
  ...overrides,
});

const recordingHooks = () => {
  const sleeps: Array<[number, string]> = [];
  return {
    sleeps,
    sleep: async (seconds: number, reason: string) => {
      sleeps.push([seconds, reason]);
    },
  };
};

/** Operation failing with the given errors in order, then resolving `'done'`. */
const failingWith = (...errors: Error[]) =>
  vi.fn(async (): Promise<string> => {
    const error = errors.shift();
    if (error) throw error;
    return 'done';
  });

const run = (operation: () => Promise<string>, retryPolicy: RetryPolicy, hooks = recordingHooks()) =>
  executeWithRetryPolicy(() => attemptOutcome(operation), retryPolicy, hooks);

describe('classifyFailure', () => {
  it('maps retry signals onto their variants', () => {
    expect(classifyFailure(new RateLimitError()).kind).toBe('rate_limit');
    expect(classifyFailure(new TransientError()).kind).toBe('transient');
    expect(classifyFailure(new ExplicitRetry(undefined)).kind).toBe('explicit_retry');
    expect(classifyFailure(new Error('boom')).kind).toBe('fatal');
  });
});

describe('executeWithRetryPolicy', () => {
  it('returns the first successful result', async () => {
    const operation = failingWith();
    await expect(run(operation, policy())).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('makes N + 1 rate-limited attempts before giving up', async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new RateLimitError();
    });
    const hooks = recordingHooks();

    const result = run(operation, policy({ ratelimitRetries: 3 }), hooks);

    await expect(result).rejects.toBeInstanceOf(RetryExceededError);
    await expect(result).rejects.toMatchObject({ retryCount: 3, retryReason: 'RateLimitError' });
    expect(operation).toHaveBeenCalledTimes(4);
    expect(hooks.sleeps).toEqual([
      [0.5, 'ratelimit wait'],
      [0.5, 'ratelimit wait'],
      [0.5, 'ratelimit wait'],
    ]);
  });

  it('spends the transient budget the same way', async () => {
    const operation = vi.fn(async (): Promise<string> => {
      throw new TransientError();
    });
    const hooks = recordingHooks();

    await expect(run(operation, policy({ transientErrorRetries: 2 }), hooks)).rejects.toMatchObject({
      kind: 'retry_exceeded',
      retryCount: 2,
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(hooks.sleeps).toEqual([
      [0.25, 'temporary error wait'],
      [0.25, 'temporary error wait'],
    ]);
  });

  it('re-throws the original error when the budget is zero', async () => {
    const rateLimit = new RateLimitError();
    const operation = failingWith(rateLimit);
    const hooks = recordingHooks();

    await expect(run(operation, policy(), hooks)).rejects.toBe(rateLimit);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(hooks.sleeps).toEqual([]);
  });

  it('prefers the wait carried by the error', async () => {
    const hooks = recordingHooks();
    const operation = failingWith(new RateLimitError(undefined, undefined, { waitSeconds: 2 }));

    await expect(run(operation, policy({ ratelimitRetries: 1 }), hooks)).resolves.toBe('done');
    expect(hooks.sleeps).toEqual([[2, 'ratelimit wait']]);
  });

  it('treats a zero wait on the error as no wait', async () => {
    const hooks = recordingHooks();
    const operation = failingWith(
      new RateLimitError(undefined, undefined, { waitSeconds: 0 }),
      new TransientError(undefined, undefined, { waitSeconds: 0 }),
    );
    const retryPolicy = policy({
      ratelimitRetries: 1,
      ratelimitWaitSeconds: 2,
      transientErrorRetries: 1,
      transientErrorWaitSeconds: 3,
    });

    await expect(run(operation, retryPolicy, hooks)).resolves.toBe('done');
    expect(hooks.sleeps).toEqual([
      [0, 'ratelimit wait'],
      [0, 'temporary error wait'],
    ]);
  });

  it('keeps separate counters per failure kind', async () => {
    const hooks = recordingHooks();
    const operation = failingWith(new RateLimitError(), new TransientError(), new RateLimitError());

    await expect(run(operation, policy({ ratelimitRetries: 2, transientErrorRetries: 1 }), hooks)).resolves.toBe('done');
    expect(hooks.sleeps).toEqual([
      [0.5, 'ratelimit wait'],
      [0.25, 'temporary error wait'],
      [0.5, 'ratelimit wait'],
    ]);
  });

  it('counts explicit retries per ident', async () => {
    const operation = failingWith(
      new ExplicitRetry('session', { retryIdent: 'session', retryCount: 2 }),
      new ExplicitRetry('session', { retryIdent: 'session', retryCount: 2 }),
      new ExplicitRetry('captcha', { retryIdent: 'captcha', retryCount: 1 }),
    );

    await expect(run(operation, policy())).resolves.toBe('done');
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it('fails once an ident exceeds its own budget', async () => {
    const operation = failingWith(
      new ExplicitRetry('challenge', { retryIdent: 'captcha', retryCount: 1 }),
      new ExplicitRetry('challenge', { retryIdent: 'captcha', retryCount: 1 }),
    );

    const result = run(operation, policy());

    await expect(result).rejects.toBeInstanceOf(RetryExceededError);
    await expect(result).rejects.toMatchObject({ retryIdent: 'captcha', retryCount: 1, result: 'challenge' });
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('sleeps before an explicit retry only when asked to', async () => {
    const hooks = recordingHooks();
    const operation = failingWith(
      new ExplicitRetry(undefined, { retryIdent: 'captcha', waitSeconds: 1.5 }),
      new ExplicitRetry(undefined, { retryIdent: 'session' }),
    );

    await expect(run(operation, policy(), hooks)).resolves.toBe('done');
    expect(hooks.sleeps).toEqual([[1.5, 'retry request: captcha']]);
  });

  it('propagates fatal errors immediately', async () => {
    const operation = failingWith(new Error('boom'));

    await expect(run(operation, policy({ ratelimitRetries: 5, transientErrorRetries: 5 }))).rejects.toThrow('boom');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports every retry', async () => {
    const onRetry = vi.fn();
    const operation = failingWith(new TransientError(), new ExplicitRetry(undefined, { retryIdent: 'captcha' }));

    await executeWithRetryPolicy(() => attemptOutcome(operation), policy({ transientErrorRetries: 1 }), {
      sleep: async () => undefined,
      onRetry,
    });

    expect(onRetry).toHaveBeenNthCalledWith(1, expect.objectContaining({ kind: 'transient', attempt: 1 }));
    expect(onRetry).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ kind: 'explicit_retry', attempt: 1, retryIdent: 'captcha' }),
    );
  });
});
