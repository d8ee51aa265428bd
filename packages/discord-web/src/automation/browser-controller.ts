/**
 * Browser Controller
 *
 * Owns one Playwright browser, context and page. Everything above this layer
 * talks to the page through these primitives, so tests can swap in a fake.
 */

import { chromium, type Browser, type BrowserContext, type Page, type Response } from 'playwright-core';
import { NavigationTimeoutError, toAutomationError, type ThrottleSignal } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('browser');

export interface StoredCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  /** Unix seconds, -1 for session cookies. */
  expires: number;
  httpOnly: boolean;
  secure: boolean;
  sameSite: 'Strict' | 'Lax' | 'None';
}

export interface StoredOrigin {
  origin: string;
  localStorage: Array<{ name: string; value: string }>;
}

/** Same shape as Playwright's `BrowserContext.storageState()`. */
export interface StoredBrowserState {
  cookies: StoredCookie[];
  origins: StoredOrigin[];
}

export type ElementState = 'attached' | 'visible';

export type TextMatch = string | RegExp;

export interface WaitOptions {
  timeoutMs?: number;
  state?: ElementState;
}

export interface ClickOptions {
  timeoutMs?: number;
  /** Only elements whose text contains this string or matches this pattern. */
  hasText?: TextMatch;
  /** Which match to click when several are found. Defaults to the first. */
  index?: number;
}

/**
 * A function serialized into the page and called with one JSON argument.
 * It must not reference anything outside its own body.
 */
export type PageFunction<A, R> = (arg: A) => R;

export interface BrowserController {
  launch(state: StoredBrowserState | null): Promise<void>;
  isLaunched(): boolean;
  navigate(url: string, timeoutMs?: number): Promise<void>;
  currentUrl(): string;
  /** Resolves false when the element did not reach `state` in time. */
  waitForElement(selector: string, options?: WaitOptions): Promise<boolean>;
  /** Resolves false when no matching URL was reached in time. */
  waitForUrl(predicate: (url: string) => boolean, timeoutMs: number): Promise<boolean>;
  exists(selector: string, hasText?: TextMatch): Promise<boolean>;
  count(selector: string, hasText?: TextMatch): Promise<number>;
  extractText(selector: string): Promise<string | null>;
  extractAttribute(selector: string, attribute: string): Promise<string | null>;
  click(selector: string, options?: ClickOptions): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  /**
   * Types at the focused element. Without a delay the text is inserted in one
   * step; with one, each character is a key press (needed for autocomplete).
   */
  typeText(text: string, delayMs?: number): Promise<void>;
  press(key: string): Promise<void>;
  evaluate<A, R>(fn: PageFunction<A, R>, arg: A): Promise<R>;
  wait(ms: number): Promise<void>;
  /** Returns and clears the last HTTP 429 seen by the page. */
  takeHttpThrottle(): ThrottleSignal | null;
  storageState(): Promise<StoredBrowserState>;
  close(): Promise<void>;
}

export interface PlaywrightControllerConfig {
  headless: boolean;
  navigationTimeoutMs: number;
  executablePath?: string;
  /** Only responses from URLs containing this host count as throttling. */
  throttleHost?: string;
}

function parseRetryAfter(value: string | undefined): number | null {
  if (!value) return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : null;
}

export class PlaywrightBrowserController implements BrowserController {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private httpThrottle: ThrottleSignal | null = null;
  private readonly config: PlaywrightControllerConfig;

  constructor(config: PlaywrightControllerConfig) {
    this.config = config;
  }

  async launch(state: StoredBrowserState | null): Promise<void> {
    if (this.page) {
      await this.close();
    }
    log.info(`Launching chromium (headless=${this.config.headless}, restored=${state !== null})`);
    try {
      this.browser = await chromium.launch({
        headless: this.config.headless,
        executablePath: this.config.executablePath,
      });
      this.context = await this.browser.newContext({
        storageState: state ?? undefined,
        viewport: { width: 1280, height: 900 },
      });
      this.page = await this.context.newPage();
      this.page.setDefaultTimeout(this.config.navigationTimeoutMs);
      this.page.on('response', (response) => this.recordResponse(response));
    } catch (error) {
      await this.close();
      throw toAutomationError(error, 'browser.launch');
    }
  }

  isLaunched(): boolean {
    return this.page !== null;
  }

  async navigate(url: string, timeoutMs = this.config.navigationTimeoutMs): Promise<void> {
    const page = this.requirePage();
    log.debug(`navigate ${url}`);
    await this.guard('navigate', () => page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs }));
  }

  currentUrl(): string {
    return this.page ? this.page.url() : '';
  }

  async waitForElement(selector: string, options: WaitOptions = {}): Promise<boolean> {
    const page = this.requirePage();
    try {
      await page.locator(selector).first().waitFor({
        state: options.state ?? 'attached',
        timeout: options.timeoutMs ?? this.config.navigationTimeoutMs,
      });
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        return false;
      }
      throw toAutomationError(error, 'waitForElement');
    }
  }

  async waitForUrl(predicate: (url: string) => boolean, timeoutMs: number): Promise<boolean> {
    const page = this.requirePage();
    try {
      await page.waitForURL((url) => predicate(url.toString()), { timeout: timeoutMs, waitUntil: 'commit' });
      return true;
    } catch (error) {
      if (error instanceof Error && error.name === 'TimeoutError') {
        return false;
      }
      throw toAutomationError(error, 'waitForUrl');
    }
  }

  async exists(selector: string, hasText?: TextMatch): Promise<boolean> {
    return (await this.count(selector, hasText)) > 0;
  }

  async count(selector: string, hasText?: TextMatch): Promise<number> {
    const page = this.requirePage();
    const locator = hasText === undefined ? page.locator(selector) : page.locator(selector).filter({ hasText });
    return this.guard('count', () => locator.count());
  }

  async extractText(selector: string): Promise<string | null> {
    const page = this.requirePage();
    const locator = page.locator(selector).first();
    if ((await locator.count()) === 0) return null;
    return this.guard('extractText', () => locator.innerText());
  }

  async extractAttribute(selector: string, attribute: string): Promise<string | null> {
    const page = this.requirePage();
    const locator = page.locator(selector).first();
    if ((await locator.count()) === 0) return null;
    return this.guard('extractAttribute', () => locator.getAttribute(attribute));
  }

  async click(selector: string, options: ClickOptions = {}): Promise<void> {
    const page = this.requirePage();
    let locator = page.locator(selector);
    if (options.hasText !== undefined) {
      locator = locator.filter({ hasText: options.hasText });
    }
    const target = options.index === undefined ? locator.first() : locator.nth(options.index);
    await this.guard('click', () => target.click({ timeout: options.timeoutMs ?? this.config.navigationTimeoutMs }));
  }

  async fill(selector: string, value: string): Promise<void> {
    const page = this.requirePage();
    await this.guard('fill', () => page.locator(selector).first().fill(value));
  }

  async typeText(text: string, delayMs?: number): Promise<void> {
    const page = this.requirePage();
    if (delayMs === undefined) {
      await this.guard('typeText', () => page.keyboard.insertText(text));
      return;
    }
    await this.guard('typeText', () => page.keyboard.type(text, { delay: delayMs }));
  }

  async press(key: string): Promise<void> {
    const page = this.requirePage();
    await this.guard('press', () => page.keyboard.press(key));
  }

  async evaluate<A, R>(fn: PageFunction<A, R>, arg: A): Promise<R> {
    const page = this.requirePage();
    // Serialized as an expression so the page runs the function body as written.
    const expression = `(${fn.toString()})(${JSON.stringify(arg)})`;
    return this.guard('evaluate', () => page.evaluate<R>(expression));
  }

  async wait(ms: number): Promise<void> {
    if (this.page) {
      await this.page.waitForTimeout(ms);
      return;
    }
    await new Promise<void>((resolve) => setTimeout(resolve, ms));
  }

  takeHttpThrottle(): ThrottleSignal | null {
    const signal = this.httpThrottle;
    this.httpThrottle = null;
    return signal;
  }

  async storageState(): Promise<StoredBrowserState> {
    if (!this.context) {
      throw new Error('Browser context not launched');
    }
    return this.context.storageState();
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.page = null;
    this.context = null;
    this.browser = null;
    if (browser) {
      log.debug('Closing browser');
      await browser.close();
    }
  }

  private recordResponse(response: Response): void {
    if (response.status() !== 429) return;
    const host = this.config.throttleHost ?? 'discord.com';
    if (!response.url().includes(host)) return;
    const retryAfterMs = parseRetryAfter(response.headers()['retry-after']);
    log.warn(`HTTP 429 from ${response.url()} (retry-after ${retryAfterMs ?? 'n/a'} ms)`);
    this.httpThrottle = { reason: 'http-429', retryAfterMs, detail: response.url() };
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new NavigationTimeoutError('Browser page is not available', { context: { action: 'browser' } });
    }
    return this.page;
  }

  private async guard<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw toAutomationError(error, action);
    }
  }
}
