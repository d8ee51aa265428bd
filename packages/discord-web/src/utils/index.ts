/**
 * Discord Web Utilities
 */

import { CancelledError } from '../automation/errors.js';

/** Discord epoch (2015-01-01T00:00:00Z) in milliseconds. */
export const DISCORD_EPOCH_MS = 1420070400000n;

/**
 * Spread `ms` by ±`ratio`. `random` returns a value in [0, 1).
 */
export function jitter(ms: number, ratio: number, random: () => number = Math.random): number {
  const spread = ms * ratio;
  return Math.max(0, Math.round(ms - spread + random() * spread * 2));
}

/**
 * Sleep for specified milliseconds. Rejects with `CancelledError` when the
 * signal aborts before the delay elapses.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * The error an aborted signal should surface as. Reasons that are already
 * errors (such as a queue timeout) are kept.
 */
export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error && reason.name !== 'AbortError') {
    return reason;
  }
  return new CancelledError();
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

/**
 * Whether a string looks like a Discord snowflake id.
 */
export function isSnowflake(value: string): boolean {
  return /^\d{15,21}$/.test(value);
}

/**
 * Creation time encoded in a snowflake id, as ISO-8601 UTC.
 */
export function snowflakeToIso(id: string): string | null {
  if (!/^\d+$/.test(id)) return null;
  const ms = (BigInt(id) >> 22n) + DISCORD_EPOCH_MS;
  return new Date(Number(ms)).toISOString();
}

/**
 * Numeric comparison of two snowflake ids. Non-numeric ids sort as strings.
 */
export function compareSnowflakes(a: string, b: string): number {
  if (/^\d+$/.test(a) && /^\d+$/.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    return left === right ? 0 : left < right ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Truncate string with ellipsis.
 */
export function truncate(str: string, maxLength: number = 100): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength - 3) + '...';
}

/**
 * Shift a `YYYY-MM-DD` date by whole days.
 */
export function shiftDate(date: string, days: number): string {
  const parsed = parseDate(date);
  parsed.setUTCDate(parsed.getUTCDate() + days);
  return parsed.toISOString().slice(0, 10);
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function parseDate(value: string): Date {
  if (!isIsoDate(value)) {
    throw new Error(`Invalid date: ${value} (expected YYYY-MM-DD)`);
  }
  return new Date(`${value}T00:00:00Z`);
}
