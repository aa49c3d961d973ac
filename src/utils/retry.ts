export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of each delay that is randomised, 0..1. */
  jitter?: number;
  shouldRetry?: (error: unknown) => boolean;
}

export interface RetryHooks {
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(public attempts: number, public lastError: unknown) {
    super(`Gave up after ${attempts} attempt(s)`);
    this.name = 'RetryExhaustedError';
  }
}

export const sleep = (ms: number): Promise<void> => {
  return new Promise(resolve => setTimeout(resolve, ms));
};

export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number = Math.random): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1));
  const jitter = policy.jitter ?? 0;
  if (jitter <= 0) return exponential;
  const spread = exponential * jitter;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}

/**
 * Runs `fn` until it succeeds or the policy gives up.
 *
 * Errors rejected by `shouldRetry` are rethrown unchanged on the first attempt.
 * Running out of attempts throws {@link RetryExhaustedError} holding the last error.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const { maxAttempts, shouldRetry = () => true } = policy;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const waitTime = backoffDelay(policy, attempt);
      hooks.onRetry?.(error, attempt, waitTime);
      await sleep(waitTime);
    }
  }
}
