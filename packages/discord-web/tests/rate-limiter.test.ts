/**
 * Rate Limiter Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  CancelledError,
  ElementNotFoundError,
  NavigationTimeoutError,
  RateLimitedError,
  ThrottleDetectedError,
  type ThrottleSignal,
} from '../src/automation/errors.js';
import { RateLimiter } from '../src/automation/rate-limiter.js';
import type { RateLimitConfig } from '../src/automation/types.js';
import { sleep } from '../src/utils/index.js';

const BANNER: ThrottleSignal = { reason: 'banner', retryAfterMs: null, detail: 'You are being rate limited.' };

function createLimiter(config: Partial<RateLimitConfig> = {}, extraWaitMs = 0) {
  let clock = 0;
  const sleeps: number[] = [];
  const limiter = new RateLimiter(config, extraWaitMs, {
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
    random: () => 0.5,
  });
  return { limiter, sleeps };
}

describe('RateLimiter', () => {
  describe('backoffDelay', () => {
    it('doubles per attempt up to the cap', () => {
      const { limiter } = createLimiter();
      expect(limiter.backoffDelay(0)).toBe(2000);
      expect(limiter.backoffDelay(1)).toBe(4000);
      expect(limiter.backoffDelay(3)).toBe(16000);
      expect(limiter.backoffDelay(5)).toBe(60000);
    });

    it('never waits less than the platform asked for', () => {
      const { limiter } = createLimiter();
      expect(limiter.backoffDelay(0, 90000)).toBe(90000);
      expect(limiter.backoffDelay(2, 1000)).toBe(8000);
    });

    it('spreads the delay by the jitter ratio', () => {
      const low = new RateLimiter({}, 0, { random: () => 0 });
      const high = new RateLimiter({}, 0, { random: () => 0.999 });
      expect(low.backoffDelay(0)).toBe(1500);
      expect(high.backoffDelay(0)).toBe(2499);
    });
  });

  describe('spacing', () => {
    it('spaces actions of the same kind', async () => {
      const { limiter, sleeps } = createLimiter();
      await limiter.run('navigate', 'first', async () => 1);
      await limiter.run('navigate', 'second', async () => 2);
      await limiter.run('extract', 'other kind', async () => 3);
      expect(sleeps).toEqual([1000]);
    });

    it('adds the extra wait to the spacing', async () => {
      const { limiter, sleeps } = createLimiter({}, 500);
      await limiter.run('search', 'first', async () => 1);
      await limiter.run('search', 'second', async () => 2);
      expect(sleeps).toEqual([2000]);
    });

    it('takes per-kind overrides over the defaults', () => {
      const { limiter } = createLimiter({ minSpacingMs: { navigate: 10, extract: 20, search: 30, send: 40 } });
      expect(limiter.getConfig().minSpacingMs.send).toBe(40);
      expect(limiter.getConfig().maxRetries).toBe(4);
    });
  });

  describe('retries', () => {
    it('retries after a throttle signal and returns the later result', async () => {
      const { limiter, sleeps } = createLimiter();
      const action = vi.fn(async () => 'done');
      const signals: Array<ThrottleSignal | null> = [BANNER, null];

      const result = await limiter.run('extract', 'read', action, {
        detectThrottle: async () => signals.shift() ?? null,
      });

      expect(result).toBe('done');
      expect(action).toHaveBeenCalledTimes(2);
      expect(sleeps).toEqual([2000]);
      expect(limiter.getStats()).toMatchObject({ throttleEvents: 1, retries: 1, lastThrottle: BANNER });
    });

    it('honours retry-after from a thrown throttle signal', async () => {
      const { limiter, sleeps } = createLimiter();
      let calls = 0;
      await limiter.run('send', 'send', async () => {
        calls++;
        if (calls === 1) {
          throw new ThrottleDetectedError({ reason: 'slowmode', retryAfterMs: 5000, detail: '0:05' });
        }
        return calls;
      });
      expect(sleeps).toEqual([5000]);
    });

    it('fails with RateLimitedError once retries are exhausted', async () => {
      const { limiter, sleeps } = createLimiter({ maxRetries: 2 });
      const action = vi.fn(async (): Promise<void> => {
        throw new ThrottleDetectedError(BANNER);
      });

      const error = await limiter.run('navigate', 'listServers', action).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(action).toHaveBeenCalledTimes(3);
      expect(sleeps).toEqual([2000, 4000]);
      if (error instanceof RateLimitedError) {
        expect(error.context.action).toBe('listServers');
        expect(error.context.retryCount).toBe(2);
        expect(error.context.elapsedMs).toBe(6000);
        expect(error.retryable).toBe(true);
      }
    });

    it('retries navigation timeouts and rethrows the last one', async () => {
      const { limiter } = createLimiter({ maxRetries: 1 });
      const last = new NavigationTimeoutError('still loading');
      const errors = [new NavigationTimeoutError('loading'), last];
      const action = vi.fn(async (): Promise<void> => {
        throw errors.shift();
      });

      const error = await limiter.run('navigate', 'openChannel', action).catch((e: unknown) => e);

      expect(error).toBe(last);
      expect(action).toHaveBeenCalledTimes(2);
      expect(last.context).toEqual({ action: 'openChannel', elapsedMs: 2000, retryCount: 1 });
    });

    it('propagates other errors on the first failure with context filled in', async () => {
      const { limiter, sleeps } = createLimiter();
      const action = vi.fn(async (): Promise<void> => {
        throw new ElementNotFoundError('chat.messageList');
      });

      const error = await limiter.run('extract', 'readTimeline', action).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ElementNotFoundError);
      expect(action).toHaveBeenCalledTimes(1);
      expect(sleeps).toEqual([]);
      if (error instanceof ElementNotFoundError) {
        expect(error.context.action).toBe('readTimeline');
      }
    });

    it('passes unknown errors through untouched', async () => {
      const { limiter } = createLimiter();
      const boom = new Error('boom');
      await expect(
        limiter.run('extract', 'x', async () => {
          throw boom;
        }),
      ).rejects.toBe(boom);
    });
  });

  describe('cancellation', () => {
    it('does not start an action after the signal aborted', async () => {
      const { limiter } = createLimiter();
      const controller = new AbortController();
      controller.abort();
      const action = vi.fn(async () => 1);

      await expect(limiter.run('navigate', 'x', action, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(action).not.toHaveBeenCalled();
    });

    it('stops waiting in backoff when the signal aborts', async () => {
      const limiter = new RateLimiter({}, 0, { sleep, random: () => 0.5 });
      const controller = new AbortController();
      const action = vi.fn(async (): Promise<void> => {
        controller.abort();
        throw new ThrottleDetectedError(BANNER);
      });

      await expect(limiter.run('navigate', 'x', action, { signal: controller.signal })).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(action).toHaveBeenCalledTimes(1);
    });
  });
});
