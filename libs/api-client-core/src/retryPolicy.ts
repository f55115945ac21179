import { ExplicitRetry, RateLimitError, RetryExceededError, TransientError } from './errors';

/**
 * Result of a single attempt. Retry signals raised by the operation are
 * mapped onto their own variants so the engine can branch on `kind`.
 */
export type AttemptOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'explicit_retry'; signal: ExplicitRetry }
  | { kind: 'rate_limit'; error: RateLimitError }
  | { kind: 'transient'; error: TransientError }
  | { kind: 'fatal'; error: unknown };

export type FailureOutcome = Exclude<AttemptOutcome<never>, { kind: 'ok' }>;

export function classifyFailure(error: unknown): FailureOutcome {
  if (error instanceof ExplicitRetry) return { kind: 'explicit_retry', signal: error };
  if (error instanceof RateLimitError) return { kind: 'rate_limit', error };
  if (error instanceof TransientError) return { kind: 'transient', error };
  return { kind: 'fatal', error };
}

export async function attemptOutcome<T>(operation: () => Promise<T>): Promise<AttemptOutcome<T>> {
  try {
    return { kind: 'ok', value: await operation() };
  } catch (error) {
    return classifyFailure(error);
  }
}

export interface RetryPolicy {
  ratelimitRetries: number;
  ratelimitWaitSeconds: number;
  transientErrorRetries: number;
  transientErrorWaitSeconds: number;
}

export interface RetryEvent {
  kind: 'explicit_retry' | 'rate_limit' | 'transient';
  /** Attempt number within the current budget, starting at 1. */
  attempt: number;
  retryIdent?: string;
  error: Error;
}

export interface RetryHooks {
  sleep(seconds: number, reason: string): Promise<void>;
  onRetry?(event: RetryEvent): void;
}

/**
 * Runs `attempt` until it succeeds, fails fatally, or a retry budget runs out.
 *
 * Explicit retries are counted per `retryIdent` against the budget carried by
 * the signal. Rate-limit and transient failures each have a single counter
 * against the policy budget; when that budget is zero the original error is
 * re-thrown as is, otherwise it is wrapped in {@link RetryExceededError}.
 * Every counter lives in this call only.
 */
export async function executeWithRetryPolicy<T>(
  attempt: () => Promise<AttemptOutcome<T>>,
  policy: RetryPolicy,
  hooks: RetryHooks,
): Promise<T> {
  const identRetries = new Map<string, number>();
  let ratelimitRetries = 0;
  let transientRetries = 0;

  for (;;) {
    const outcome = await attempt();

    switch (outcome.kind) {
      case 'ok':
        return outcome.value;

      case 'explicit_retry': {
        const { signal } = outcome;
        const count = (identRetries.get(signal.retryIdent) ?? 0) + 1;
        identRetries.set(signal.retryIdent, count);
        if (count > signal.retryCount) {
          throw new RetryExceededError(signal.result, {
            retryIdent: signal.retryIdent,
            retryCount: signal.retryCount,
          });
        }
        hooks.onRetry?.({ kind: 'explicit_retry', attempt: count, retryIdent: signal.retryIdent, error: signal });
        if (signal.waitSeconds > 0) {
          await hooks.sleep(signal.waitSeconds, `retry request: ${signal.retryIdent}`);
        }
        break;
      }

      case 'rate_limit': {
        ratelimitRetries += 1;
        if (ratelimitRetries > policy.ratelimitRetries) {
          throw budgetExceeded(outcome.error, ratelimitRetries);
        }
        hooks.onRetry?.({ kind: 'rate_limit', attempt: ratelimitRetries, error: outcome.error });
        // An explicit `waitSeconds: 0` means no wait; only an unset value takes the policy default.
        await hooks.sleep(outcome.error.waitSeconds ?? policy.ratelimitWaitSeconds, 'ratelimit wait');
        break;
      }

      case 'transient': {
        transientRetries += 1;
        if (transientRetries > policy.transientErrorRetries) {
          throw budgetExceeded(outcome.error, transientRetries);
        }
        hooks.onRetry?.({ kind: 'transient', attempt: transientRetries, error: outcome.error });
        // As above: an explicit 0 skips the wait, an unset value takes the policy default.
        await hooks.sleep(outcome.error.waitSeconds ?? policy.transientErrorWaitSeconds, 'temporary error wait');
        break;
      }

      case 'fatal':
        throw outcome.error;
    }
  }
}

function budgetExceeded(error: RateLimitError | TransientError, attempts: number): Error {
  const retried = attempts - 1;
  return retried > 0 ? new RetryExceededError(error, { retryCount: retried }) : error;
}
