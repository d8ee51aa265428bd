/**
 * Rate Limiter
 *
 * One shared pacing and backoff policy for every UI-driving action:
 * per-kind minimum spacing, exponential backoff with jitter on throttling
 * signals, and a hard retry ceiling.
 */

import {
  AutomationError,
  NavigationTimeoutError,
  RateLimitedError,
  ThrottleDetectedError,
  type ThrottleSignal,
} from './errors.js';
import { DEFAULT_RATE_LIMITS, type ActionKind, type RateLimitConfig } from './types.js';
import { jitter, sleep, throwIfAborted } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rate-limiter');

export interface RateLimiterDeps {
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface RateLimitedRunOptions {
  signal?: AbortSignal;
  /** Consulted after a successful attempt; a signal makes the attempt count as throttled. */
  detectThrottle?: () => Promise<ThrottleSignal | null>;
}

export interface RateLimiterStats {
  throttleEvents: number;
  retries: number;
  lastActionAt: Partial<Record<ActionKind, string>>;
  lastThrottle: ThrottleSignal | null;
}

export class RateLimiter {
  private config: RateLimitConfig;
  private readonly extraWaitMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private lastActionAt: Map<ActionKind, number> = new Map();
  private throttleEvents = 0;
  private retries = 0;
  private lastThrottle: ThrottleSignal | null = null;

  constructor(config: Partial<RateLimitConfig> = {}, extraWaitMs = 0, deps: RateLimiterDeps = {}) {
    this.config = {
      ...DEFAULT_RATE_LIMITS,
      ...config,
      minSpacingMs: { ...DEFAULT_RATE_LIMITS.minSpacingMs, ...config.minSpacingMs },
    };
    this.extraWaitMs = extraWaitMs;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Runs `action` under the policy for `kind`. Throttling and navigation
   * timeouts are retried up to `maxRetries` times; anything else propagates
   * on the first failure.
   */
  async run<T>(kind: ActionKind, label: string, action: () => Promise<T>, options: RateLimitedRunOptions = {}): Promise<T> {
    const startedAt = this.now();
    let attempt = 0;

    for (;;) {
      throwIfAborted(options.signal);
      await this.awaitSpacing(kind, options.signal);
      throwIfAborted(options.signal);
      this.lastActionAt.set(kind, this.now());

      let throttle: ThrottleSignal | null = null;
      let transient: NavigationTimeoutError | null = null;
      try {
        const result = await action();
        throttle = options.detectThrottle ? await options.detectThrottle() : null;
        if (!throttle) {
          return result;
        }
      } catch (error) {
        if (error instanceof ThrottleDetectedError) {
          throttle = error.signal;
        } else if (error instanceof NavigationTimeoutError) {
          transient = error;
        } else {
          if (error instanceof AutomationError) {
            error.withContext({ action: label, elapsedMs: this.now() - startedAt, retryCount: attempt });
          }
          throw error;
        }
      }

      if (throttle) {
        this.throttleEvents++;
        this.lastThrottle = throttle;
      }
      const context = { action: label, elapsedMs: this.now() - startedAt, retryCount: attempt };

      if (attempt >= this.config.maxRetries) {
        if (throttle) {
          log.error(`${label}: still throttled after ${attempt} retries (${throttle.reason})`);
          throw new RateLimitedError(
            `${label} throttled (${throttle.reason}: ${throttle.detail}) after ${attempt} retries`,
            throttle.retryAfterMs,
            { context },
          );
        }
        if (transient) {
          transient.context = context;
          throw transient;
        }
      }

      const delay = this.backoffDelay(attempt, throttle?.retryAfterMs ?? null);
      log.warn(
        `${label}: ${throttle ? `throttled (${throttle.reason})` : 'navigation timeout'}, ` +
          `retry ${attempt + 1}/${this.config.maxRetries} in ${delay}ms`,
      );
      attempt++;
      this.retries++;
      await this.sleep(delay, options.signal);
    }
  }

  /**
   * `baseBackoffMs * 2^attempt`, capped, jittered, and never shorter than
   * what the platform asked for.
   */
  backoffDelay(attempt: number, retryAfterMs: number | null = null): number {
    const base = Math.min(this.config.baseBackoffMs * 2 ** attempt, this.config.maxBackoffMs);
    const delay = Math.min(jitter(base, this.config.jitterRatio, this.random), this.config.maxBackoffMs);
    return Math.max(delay, retryAfterMs ?? 0);
  }

  getConfig(): RateLimitConfig {
    return { ...this.config, minSpacingMs: { ...this.config.minSpacingMs } };
  }

  getStats(): RateLimiterStats {
    const lastActionAt: Partial<Record<ActionKind, string>> = {};
    for (const [kind, at] of this.lastActionAt) {
      lastActionAt[kind] = new Date(at).toISOString();
    }
    return {
      throttleEvents: this.throttleEvents,
      retries: this.retries,
      lastActionAt,
      lastThrottle: this.lastThrottle,
    };
  }

  private async awaitSpacing(kind: ActionKind, signal?: AbortSignal): Promise<void> {
    const last = this.lastActionAt.get(kind);
    if (last === undefined) return;
    const wait = last + this.config.minSpacingMs[kind] + this.extraWaitMs - this.now();
    if (wait > 0) {
      log.debug(`${kind}: spacing ${wait}ms`);
      await this.sleep(wait, signal);
    }
  }
}
