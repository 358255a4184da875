import { err, ok, type Result } from '../../src/core/result';
import { computeBackoffDelay, retry, type RetryOptions } from '../../src/util/retry';

describe('Unit: retry backoff', () => {
  describe('computeBackoffDelay function', () => {
    it('generates exponential backoff delays', () => {
      const base = 100;
      const max = 10000;

      expect(computeBackoffDelay(1, base, max)).toBe(100);    // 100 * 2^0
      expect(computeBackoffDelay(2, base, max)).toBe(200);    // 100 * 2^1
      expect(computeBackoffDelay(3, base, max)).toBe(400);    // 100 * 2^2
      expect(computeBackoffDelay(4, base, max)).toBe(800);    // 100 * 2^3
      expect(computeBackoffDelay(5, base, max)).toBe(1600);   // 100 * 2^4
    });

    it('caps delays at maximum value', () => {
      expect(computeBackoffDelay(10, 100, 1000)).toBe(1000);
      expect(computeBackoffDelay(20, 100, 1000)).toBe(1000);
    });

    it('handles edge cases', () => {
      expect(computeBackoffDelay(1, 0, 1000)).toBe(0);
      expect(computeBackoffDelay(1, 1, 0)).toBe(0);
    });
  });

  describe('retry function', () => {
    const failing = (attempts: { count: number }, succeedOn = Infinity) =>
      async (): Promise<Result<string, Error>> => {
        attempts.count++;
        return attempts.count >= succeedOn
          ? ok('success')
          : err(new Error(`Attempt ${attempts.count} failed`));
      };

    it('keeps jittered delays within bounds', async () => {
      const attempts = { count: 0 };
      const delays: number[] = [];

      const options: RetryOptions<Error> = {
        maxAttempts: 4,
        baseDelayMs: 10,
        maxDelayMs: 25,
        jitterRatio: 0.1,
        shouldRetry: () => true,
        onAttempt: (_attempt, delayMs) => {
          delays.push(delayMs);
        }
      };

      const result = await retry(failing(attempts, 4), options);

      expect(result).toEqual({ ok: true, value: 'success' });
      expect(delays).toHaveLength(3);
      for (const delay of delays) {
        expect(delay).toBeGreaterThanOrEqual(9);
        expect(delay).toBeLessThanOrEqual(options.maxDelayMs);
      }
    });

    it('respects shouldRetry predicate', async () => {
      const attempts = { count: 0 };

      const result = await retry(failing(attempts), {
        maxAttempts: 5,
        baseDelayMs: 1,
        maxDelayMs: 5,
        jitterRatio: 0,
        shouldRetry: (_error, attempt) => attempt < 3
      });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Attempt 3 failed');
      expect(attempts.count).toBe(3);
    });

    it('handles successful execution on first try', async () => {
      const attempts = { count: 0 };

      const result = await retry(failing(attempts, 1), {
        maxAttempts: 3,
        baseDelayMs: 100,
        maxDelayMs: 1000,
        jitterRatio: 0.1,
        shouldRetry: () => true
      });

      expect(result).toEqual({ ok: true, value: 'success' });
      expect(attempts.count).toBe(1);
    });

    it('reports the attempt number about to run', async () => {
      const attempts = { count: 0 };
      const seen: number[] = [];

      await retry(failing(attempts, 3), {
        maxAttempts: 3,
        baseDelayMs: 1,
        maxDelayMs: 2,
        jitterRatio: 0,
        shouldRetry: () => true,
        onAttempt: (attempt) => {
          seen.push(attempt);
        }
      });

      expect(seen).toEqual([2, 3]);
    });

    it('enforces maximum attempts limit', async () => {
      const attempts = { count: 0 };

      const result = await retry(failing(attempts), {
        maxAttempts: 2,
        baseDelayMs: 1,
        maxDelayMs: 10,
        jitterRatio: 0,
        shouldRetry: () => true
      });

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Attempt 2 failed');
      expect(attempts.count).toBe(2);
    });
  });
});
