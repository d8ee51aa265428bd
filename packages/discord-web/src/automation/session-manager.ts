/**
 * Session Manager
 *
 * Owns the one browser session of the process and its authentication state:
 *
 *   logged_out -> logging_in -> authenticated -> session_expired -> logging_in
 *                      |  \-> logged_out (transient failure)
 *                      \-> fatal (terminal)
 *
 * The storage state is persisted on every logging_in -> authenticated
 * transition, whether the session was restored or freshly logged in.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { ActionQueue } from './action-queue.js';
import {
  PlaywrightBrowserController,
  type BrowserController,
  type StoredBrowserState,
} from './browser-controller.js';
import { createDiscordUi } from './classic-ui.js';
import { CookieStore } from './cookie-store.js';
import {
  AuthenticationError,
  AutomationError,
  ElementNotFoundError,
  NavigationTimeoutError,
  SendFailureError,
  SessionExpiredError,
  toAutomationError,
} from './errors.js';
import { RateLimiter } from './rate-limiter.js';
import type { AutomationConfig, Credentials } from './types.js';
import type { DiscordUi, MfaCodeProvider } from './ui-adapter.js';
import { throwIfAborted } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('session');

export type SessionState = 'logged_out' | 'logging_in' | 'authenticated' | 'session_expired' | 'fatal';

const TRANSITIONS: Record<SessionState, SessionState[]> = {
  logged_out: ['logging_in'],
  logging_in: ['authenticated', 'logged_out', 'fatal'],
  authenticated: ['session_expired', 'logged_out'],
  session_expired: ['logging_in', 'logged_out'],
  fatal: [],
};

export interface StateChange {
  from: SessionState;
  to: SessionState;
  reason: string;
  at: string;
}

export interface Session {
  readonly id: string;
  readonly controller: BrowserController;
  readonly ui: DiscordUi;
  readonly createdAt: number;
  restoredFromStore: boolean;
  lastActivityAt: number;
  lastVerifiedAt: number;
}

export interface PageScope {
  ui: DiscordUi;
  signal: AbortSignal;
  session: Session;
}

export interface PageRunOptions {
  /** Name of the operation, used for queue ownership, logs and error context. */
  label: string;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface SessionStatus {
  state: SessionState;
  sessionId: string | null;
  uiVersion: string;
  sessionFile: string;
  restoredFromStore: boolean;
  createdAt: string | null;
  lastActivityAt: string | null;
  lastVerifiedAt: string | null;
  queue: { busy: boolean; holder: string | null; queueLength: number };
  lastError: string | null;
}

export interface SessionManagerOptions {
  config: AutomationConfig;
  credentials?: Credentials | null;
  mfaCodeProvider?: MfaCodeProvider;
  cookieStore?: CookieStore;
  queue?: ActionQueue;
  rateLimiter?: RateLimiter;
  createController?: () => BrowserController;
  createUi?: (controller: BrowserController) => DiscordUi;
  now?: () => number;
}

export class SessionManager extends EventEmitter {
  readonly config: AutomationConfig;
  readonly queue: ActionQueue;
  readonly rateLimiter: RateLimiter;
  readonly cookieStore: CookieStore;
  private readonly credentials: Credentials | null;
  private readonly mfaCodeProvider?: MfaCodeProvider;
  private readonly createController: () => BrowserController;
  private readonly createUi: (controller: BrowserController) => DiscordUi;
  private readonly now: () => number;
  private session: Session | null = null;
  private state: SessionState = 'logged_out';
  private fatalError: AuthenticationError | null = null;
  private lastError: string | null = null;
  private loginCount = 0;

  constructor(options: SessionManagerOptions) {
    super();
    const config = options.config;
    this.config = config;
    this.credentials = options.credentials ?? null;
    this.mfaCodeProvider = options.mfaCodeProvider;
    this.cookieStore = options.cookieStore ?? new CookieStore(config.sessionFile);
    this.queue =
      options.queue ??
      new ActionQueue({ waitTimeoutMs: config.queueWaitTimeoutMs, runTimeoutMs: config.operationTimeoutMs });
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(config.rateLimits, config.extraWaitMs);
    this.createController =
      options.createController ??
      (() =>
        new PlaywrightBrowserController({
          headless: config.headless,
          navigationTimeoutMs: config.navigationTimeoutMs,
          executablePath: config.executablePath,
        }));
    this.createUi =
      options.createUi ??
      ((controller) =>
        createDiscordUi(config.uiVersion, controller, {
          baseUrl: config.baseUrl,
          navigationTimeoutMs: config.navigationTimeoutMs,
          loginTimeoutMs: config.loginTimeoutMs,
          extraWaitMs: config.extraWaitMs,
        }));
    this.now = options.now ?? Date.now;
  }

  getState(): SessionState {
    return this.state;
  }

  /** Number of interactive logins performed by this manager. */
  getLoginCount(): number {
    return this.loginCount;
  }

  /**
   * Makes sure there is a verified, signed-in session, restoring the stored
   * one or logging in as needed.
   */
  async ensureAuthenticated(signal?: AbortSignal): Promise<Session> {
    return this.queue.run('ensureAuthenticated', (taskSignal) => this.authenticate(taskSignal), { signal });
  }

  /**
   * Runs `action` against an authenticated page while holding the page lock.
   * A session found expired mid-operation is re-authenticated once and the
   * action retried, unless the action already sent something. The page is
   * reset to idle after every attempt.
   */
  async withAuthenticatedPage<T>(action: (scope: PageScope) => Promise<T>, options: PageRunOptions): Promise<T> {
    return this.queue.run(
      options.label,
      async (signal) => {
        let session = await this.authenticate(signal);
        let reauthenticated = false;
        for (;;) {
          try {
            const result = await action({ ui: session.ui, signal, session });
            session.lastActivityAt = this.now();
            return result;
          } catch (error) {
            if (!this.isExpiry(error, session)) {
              throw toAutomationError(error, options.label);
            }
            if (reauthenticated) {
              this.transition('session_expired', 'redirected to login twice');
              throw new AuthenticationError('Session expired again right after re-authentication', {
                context: { action: options.label },
                cause: error,
              });
            }
            reauthenticated = true;
            log.warn(`${options.label}: session expired mid-operation, re-authenticating`);
            this.transition('session_expired', 'redirected to login');
            session = await this.authenticate(signal);
          } finally {
            await this.resetPage(session);
          }
        }
      },
      { signal: options.signal, runTimeoutMs: options.timeoutMs },
    );
  }

  getStatus(): SessionStatus {
    const session = this.session;
    const iso = (ms: number | undefined): string | null => (ms === undefined ? null : new Date(ms).toISOString());
    return {
      state: this.state,
      sessionId: session?.id ?? null,
      uiVersion: this.config.uiVersion,
      sessionFile: this.cookieStore.filePath,
      restoredFromStore: session?.restoredFromStore ?? false,
      createdAt: iso(session?.createdAt),
      lastActivityAt: iso(session?.lastActivityAt),
      lastVerifiedAt: iso(session?.lastVerifiedAt),
      queue: this.queue.getStatus(),
      lastError: this.lastError,
    };
  }

  /** Tears the browser down once the current operation has finished. */
  async close(): Promise<void> {
    await this.queue.run('close', async () => {
      await this.teardown();
      if (this.state !== 'fatal' && this.state !== 'logged_out') {
        this.transition('logged_out', 'closed');
      }
    });
  }

  // === AUTHENTICATION ===

  private async authenticate(signal: AbortSignal): Promise<Session> {
    if (this.state === 'fatal') {
      throw this.fatalFailure();
    }
    const session = this.session;
    if (session && this.state === 'authenticated' && session.controller.isLaunched()) {
      if (this.now() - session.lastVerifiedAt < this.config.sessionCheckIntervalMs) {
        return session;
      }
      throwIfAborted(signal);
      if (await this.probe(session, signal)) {
        session.lastVerifiedAt = this.now();
        return session;
      }
      this.transition('session_expired', 'probe found the session signed out');
    }
    return this.login(signal);
  }

  private async login(signal: AbortSignal): Promise<Session> {
    this.transition('logging_in', this.state === 'session_expired' ? 're-authenticating' : 'starting session');
    try {
      let session = this.session;
      let restored = false;
      if (!session || !session.controller.isLaunched()) {
        const stored = await this.cookieStore.load();
        session = await this.startSession(stored);
        if (stored) {
          throwIfAborted(signal);
          restored = await this.probe(session, signal);
          log.info(restored ? 'Restored stored session' : 'Stored session is no longer valid');
        }
      }
      if (!restored) {
        await this.interactiveLogin(session, signal);
      }

      session.restoredFromStore = restored;
      session.lastVerifiedAt = this.now();
      session.lastActivityAt = this.now();
      this.transition('authenticated', restored ? 'restored from store' : 'logged in');
      this.lastError = null;
      await this.persist(session);
      return session;
    } catch (error) {
      await this.handleLoginFailure(error);
      throw error instanceof AutomationError ? error : toAutomationError(error, 'login');
    }
  }

  private async interactiveLogin(session: Session, signal: AbortSignal): Promise<void> {
    const credentials = this.credentials;
    if (!credentials || !credentials.email || !credentials.password) {
      throw new AuthenticationError('No stored session and no credentials configured (DISCORD_EMAIL / DISCORD_PASSWORD)', {
        context: { action: 'login' },
      });
    }

    this.loginCount++;
    log.info('Logging in with configured credentials');
    const started = this.now();
    throwIfAborted(signal);
    await session.ui.openLogin();
    const outcome = await session.ui.submitCredentials(credentials, signal);

    switch (outcome.kind) {
      case 'rejected':
        throw new AuthenticationError(`Login rejected: ${outcome.reason}`, {
          context: { action: 'login', elapsedMs: this.now() - started },
        });
      case 'timeout':
        throw new NavigationTimeoutError(`Login did not complete within ${this.config.loginTimeoutMs}ms`, {
          context: { action: 'login', elapsedMs: this.now() - started },
        });
      case 'challenge': {
        log.warn(`Login requires a ${outcome.challenge} challenge`);
        const completed = await session.ui.completeChallenge(
          outcome.challenge,
          this.config.mfaTimeoutMs,
          this.mfaCodeProvider,
          signal,
        );
        if (!completed) {
          throw new AuthenticationError(
            `The ${outcome.challenge} challenge was not completed within ${this.config.mfaTimeoutMs}ms`,
            { context: { action: 'login', elapsedMs: this.now() - started } },
          );
        }
        break;
      }
      case 'authenticated':
        break;
    }

    throwIfAborted(signal);
    if (!(await this.probe(session, signal))) {
      throw new NavigationTimeoutError('Login finished but the app did not load a signed-in view', {
        context: { action: 'login', elapsedMs: this.now() - started },
      });
    }
    log.info('Login succeeded');
  }

  private async handleLoginFailure(error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    this.lastError = message;
    if (error instanceof AuthenticationError || error instanceof ElementNotFoundError) {
      this.fatalError =
        error instanceof AuthenticationError
          ? error
          : new AuthenticationError(`Login UI not recognized: ${message}`, { cause: error });
      log.error(`Authentication failed permanently: ${message}`);
      await this.teardown();
      this.transition('fatal', message);
      return;
    }
    log.warn(`Login attempt failed: ${message}`);
    await this.teardown();
    this.transition('logged_out', message);
  }

  private probe(session: Session, signal: AbortSignal): Promise<boolean> {
    return this.rateLimiter.run('navigate', 'probeSession', () => session.ui.probeSession(), { signal });
  }

  private async persist(session: Session): Promise<void> {
    try {
      await this.cookieStore.save(await session.controller.storageState());
    } catch (error) {
      // The live session stays usable; only the next process start is affected.
      log.error(`Could not persist session: ${String(error)}`);
    }
  }

  // === LIFECYCLE ===

  private async startSession(stored: StoredBrowserState | null): Promise<Session> {
    await this.teardown();
    const controller = this.createController();
    await controller.launch(stored);
    const now = this.now();
    const session: Session = {
      id: uuidv4(),
      controller,
      ui: this.createUi(controller),
      createdAt: now,
      restoredFromStore: false,
      lastActivityAt: now,
      lastVerifiedAt: 0,
    };
    this.session = session;
    log.debug(`Session ${session.id} started`);
    return session;
  }

  private async teardown(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) return;
    try {
      await session.controller.close();
    } catch (error) {
      log.warn(`Browser did not close cleanly: ${String(error)}`);
    }
  }

  private async resetPage(session: Session): Promise<void> {
    try {
      await session.ui.resetToIdle();
    } catch (error) {
      log.warn(`Could not reset page to idle: ${String(error)}`);
    }
  }

  private isExpiry(error: unknown, session: Session): boolean {
    // A partially delivered send is never re-run.
    if (error instanceof SendFailureError && error.sentCount > 0) return false;
    if (error instanceof SessionExpiredError) return true;
    return session.controller.isLaunched() && session.ui.isLoginUrl(session.controller.currentUrl());
  }

  private fatalFailure(): AuthenticationError {
    const reason = this.fatalError?.message ?? 'unknown reason';
    return new AuthenticationError(`Session is unusable: ${reason}`, {
      context: { action: 'ensureAuthenticated' },
      cause: this.fatalError ?? undefined,
    });
  }

  private transition(to: SessionState, reason: string): void {
    const from = this.state;
    if (from === to) return;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid session transition ${from} -> ${to}`);
    }
    this.state = to;
    const change: StateChange = { from, to, reason, at: new Date(this.now()).toISOString() };
    log.info(`State ${from} -> ${to} (${reason})`);
    this.emit('state', change);
  }
}
