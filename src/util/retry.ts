import { setTimeout as sleep } from 'timers/promises';
import type { Result } from '../core/result.js';

export interface RetryOptions<E> {
  maxAttempts: number; // total attempts including the first
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number; // 0..1 proportion of delay used as +/- random jitter
  shouldRetry: (error: E, attempt: number) => boolean;
  onAttempt?: (attempt: number, delayMs: number, error: E) => void;
}

export interface RetryPolicyConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

function computeDelay<E>(attempt: number, opts: RetryOptions<E>): number {
  let delay = computeBackoffDelay(attempt, opts.baseDelayMs, opts.maxDelayMs);
  if (opts.jitterRatio > 0) {
    const jitterAmt = delay * opts.jitterRatio;
    const delta = (Math.random() * 2 - 1) * jitterAmt;
    delay = Math.max(0, Math.min(opts.maxDelayMs, Math.round(delay + delta)));
  }
  return delay;
}

/**
 * Re-run `fn` while it fails with an error `shouldRetry` accepts. The last
 * failure is returned as-is once attempts run out.
 */
export async function retry<T, E>(fn: () => Promise<Result<T, E>>, opts: RetryOptions<E>): Promise<Result<T, E>> {
  let attempt = 1;
  for (;;) {
    const result = await fn();
    if (result.ok) return result;
    if (attempt >= opts.maxAttempts || !opts.shouldRetry(result.error, attempt)) {
      return result;
    }
    const delay = computeDelay(attempt, opts);
    opts.onAttempt?.(attempt + 1, delay, result.error);
    await sleep(delay);
    attempt++;
  }
}

export function computeBackoffDelay(attempt: number, base: number, max: number): number {
  // exponential backoff: base * 2^(attempt-1)
  const raw = base * Math.pow(2, attempt - 1);
  return Math.min(raw, max);
}
