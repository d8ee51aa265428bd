/**
 * Error taxonomy for browser-driven operations.
 *
 * Every error surfaced to callers is an `AutomationError` carrying the last
 * action attempted, the elapsed time and the retry count. `retryable` marks
 * the transient classes the rate limiter may retry locally.
 */

export interface ErrorContext {
  action: string;
  elapsedMs: number;
  retryCount: number;
}

export type AutomationErrorCode =
  | 'AUTHENTICATION'
  | 'NAVIGATION_TIMEOUT'
  | 'RATE_LIMITED'
  | 'ELEMENT_NOT_FOUND'
  | 'OUT_OF_RANGE'
  | 'SEND_FAILURE'
  | 'CANCELLED'
  | 'UNEXPECTED';

export interface AutomationErrorOptions {
  context?: Partial<ErrorContext>;
  cause?: unknown;
}

export class AutomationError extends Error {
  readonly code: AutomationErrorCode;
  readonly retryable: boolean;
  context: ErrorContext;

  constructor(
    code: AutomationErrorCode,
    message: string,
    retryable: boolean,
    options: AutomationErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AutomationError';
    this.code = code;
    this.retryable = retryable;
    this.context = {
      action: options.context?.action ?? 'unknown',
      elapsedMs: options.context?.elapsedMs ?? 0,
      retryCount: options.context?.retryCount ?? 0,
    };
  }

  /** Fills in context fields the thrower could not know. Existing values win. */
  withContext(context: Partial<ErrorContext>): this {
    this.context = {
      action: this.context.action === 'unknown' ? context.action ?? 'unknown' : this.context.action,
      elapsedMs: this.context.elapsedMs || (context.elapsedMs ?? 0),
      retryCount: this.context.retryCount || (context.retryCount ?? 0),
    };
    return this;
  }
}

export class AuthenticationError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super('AUTHENTICATION', message, false, options);
    this.name = 'AuthenticationError';
  }
}

export class NavigationTimeoutError extends AutomationError {
  constructor(message: string, options?: AutomationErrorOptions) {
    super('NAVIGATION_TIMEOUT', message, true, options);
    this.name = 'NavigationTimeoutError';
  }
}

export class RateLimitedError extends AutomationError {
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null, options?: AutomationErrorOptions) {
    super('RATE_LIMITED', message, true, options);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class ElementNotFoundError extends AutomationError {
  readonly selector: string;

  constructor(selector: string, message?: string, options?: AutomationErrorOptions) {
    super('ELEMENT_NOT_FOUND', message ?? `UI element not recognized: ${selector}`, false, options);
    this.name = 'ElementNotFoundError';
    this.selector = selector;
  }
}

export class OutOfRangeError extends AutomationError {
  readonly parameter: string;

  constructor(parameter: string, message: string, options?: AutomationErrorOptions) {
    super('OUT_OF_RANGE', message, false, options);
    this.name = 'OutOfRangeError';
    this.parameter = parameter;
  }
}

export interface SendProgress {
  sentCount: number;
  chunkIds: string[];
  failedChunkIndex: number;
  totalChunks: number;
}

export class SendFailureError extends AutomationError {
  readonly progress: SendProgress;

  constructor(message: string, progress: SendProgress, options?: AutomationErrorOptions) {
    super('SEND_FAILURE', message, false, options);
    this.name = 'SendFailureError';
    this.progress = progress;
  }

  get sentCount(): number {
    return this.progress.sentCount;
  }
}

export class CancelledError extends AutomationError {
  constructor(message = 'Operation cancelled by caller', options?: AutomationErrorOptions) {
    super('CANCELLED', message, false, options);
    this.name = 'CancelledError';
  }
}

/**
 * Raised by the UI adapter when a navigation lands on the login route.
 * Handled by the session manager, which re-authenticates once.
 */
export class SessionExpiredError extends Error {
  constructor(readonly url: string) {
    super(`Session expired: redirected to ${url}`);
    this.name = 'SessionExpiredError';
  }
}

export type ThrottleReason = 'banner' | 'slowmode' | 'http-429' | 'empty-dom';

export interface ThrottleSignal {
  reason: ThrottleReason;
  retryAfterMs: number | null;
  detail: string;
}

/** Raised by an action that observed throttling itself. Handled by the rate limiter. */
export class ThrottleDetectedError extends Error {
  constructor(readonly signal: ThrottleSignal) {
    super(`Throttling detected (${signal.reason}): ${signal.detail}`);
    this.name = 'ThrottleDetectedError';
  }
}

function isPlaywrightTimeout(error: Error): boolean {
  return error.name === 'TimeoutError';
}

/** Normalizes anything thrown into an `AutomationError` tagged with the action. */
export function toAutomationError(error: unknown, action: string): AutomationError {
  if (error instanceof AutomationError) {
    return error.withContext({ action });
  }
  if (error instanceof Error) {
    if (isPlaywrightTimeout(error)) {
      return new NavigationTimeoutError(error.message, { context: { action }, cause: error });
    }
    if (error.name === 'AbortError') {
      return new CancelledError(error.message, { context: { action }, cause: error });
    }
    return new AutomationError('UNEXPECTED', error.message, false, { context: { action }, cause: error });
  }
  return new AutomationError('UNEXPECTED', String(error), false, { context: { action } });
}
