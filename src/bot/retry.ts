import { setTimeout as sleep } from 'node:timers/promises';

export type RetryPolicy = {
  // total attempts, the first one included
  maxAttempts: number;
  backoffMs: (attempt: number) => number;
};

export function fixedBackoff(maxAttempts: number, delayMs: number): RetryPolicy {
  return { maxAttempts, backoffMs: () => delayMs };
}

/**
 * Exponential backoff capped at `capMs`, plus up to `jitterMs` of random jitter.
 * `attempt` is zero-based: the delay after the first failure is `baseMs`.
 */
export function exponentialBackoff(
  maxAttempts: number,
  baseMs: number,
  opts: { capMs?: number; jitterMs?: number; random?: () => number } = {}
): RetryPolicy {
  const capMs = opts.capMs ?? 30_000;
  const jitterMs = opts.jitterMs ?? 150;
  const random = opts.random ?? Math.random;
  return {
    maxAttempts,
    backoffMs: (attempt) => Math.min(capMs, baseMs * Math.pow(2, attempt)) + Math.floor(random() * jitterMs)
  };
}

export class RetryExhausted extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`gave up after ${attempts} attempts`, { cause });
    this.name = 'RetryExhausted';
    this.attempts = attempts;
  }
}

/**
 * Runs `fn` until it resolves or the policy runs out of attempts.
 * `isRetryable` lets callers fail fast on errors that retrying cannot fix.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: {
    isRetryable?: (e: unknown) => boolean;
    onRetry?: (e: unknown, attempt: number, delayMs: number) => void;
    sleep?: (ms: number) => Promise<unknown>;
  } = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);
  let lastErr: unknown = null;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      lastErr = e;
      if (hooks.isRetryable && !hooks.isRetryable(e)) throw e;
      if (attempt === attempts - 1) break;
      const delayMs = policy.backoffMs(attempt);
      hooks.onRetry?.(e, attempt, delayMs);
      if (delayMs > 0) await wait(delayMs);
    }
  }

  throw new RetryExhausted(attempts, lastErr);
}
