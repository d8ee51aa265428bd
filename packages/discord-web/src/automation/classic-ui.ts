/**
 * Discord web client adapter for the `classic` layout.
 */

import { SelectorRegistry, UnknownUiVersionError, isUiVersion } from '@discord-web/selectors';
import type { BrowserController } from './browser-controller.js';
import {
  extractAlerts,
  extractChannels,
  extractLatestMessage,
  extractSearchResults,
  extractServers,
  extractTimeline,
  scrollContainer,
} from './dom-extractors.js';
import {
  ElementNotFoundError,
  NavigationTimeoutError,
  SessionExpiredError,
  type ThrottleSignal,
} from './errors.js';
import type { Channel, Credentials, MessageLocation, Server } from './types.js';
import {
  classifyAlerts,
  parseResultCount,
  type ChallengeKind,
  type DiscordUi,
  type LoginOutcome,
  type MfaCodeProvider,
  type NewMessageResult,
  type SearchResultsSnapshot,
  type TimelineDirection,
  type TimelineSnapshot,
} from './ui-adapter.js';
import { throwIfAborted } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('ui');

export interface DiscordUiOptions {
  baseUrl: string;
  navigationTimeoutMs: number;
  loginTimeoutMs: number;
  extraWaitMs: number;
}

export interface ClassicDiscordUiDeps {
  /** Clock for poll deadlines. */
  now?: () => number;
}

const POLL_INTERVAL_MS = 250;
const TIMELINE_SCROLL_PX = 2000;
const MAX_SIDEBAR_SCROLLS = 20;
const SEARCH_TYPE_DELAY_MS = 50;

export class ClassicDiscordUi implements DiscordUi {
  readonly version = 'classic';
  readonly controller: BrowserController;
  private readonly registry: SelectorRegistry;
  private readonly options: DiscordUiOptions;
  private readonly now: () => number;

  constructor(controller: BrowserController, options: DiscordUiOptions, deps: ClassicDiscordUiDeps = {}) {
    this.controller = controller;
    this.options = options;
    this.now = deps.now ?? Date.now;
    this.registry = new SelectorRegistry('classic');
  }

  isLoginUrl(url: string): boolean {
    try {
      return /^\/(login|register)(\/|$)/.test(new URL(url).pathname);
    } catch {
      return false;
    }
  }

  // === SESSION ===

  async probeSession(): Promise<boolean> {
    await this.controller.navigate(this.url('/channels/@me'));
    if (this.isLoginUrl(this.controller.currentUrl())) {
      return false;
    }
    const ready = await this.controller.waitForElement(this.css('nav.guildItem'), { state: 'visible' });
    return ready && !this.isLoginUrl(this.controller.currentUrl());
  }

  async openLogin(): Promise<void> {
    await this.controller.navigate(this.url('/login'));
    const found = await this.controller.waitForElement(this.css('auth.emailInput'), { state: 'visible' });
    if (!found) {
      throw new ElementNotFoundError('auth.emailInput', 'Login form not recognized', {
        context: { action: 'login' },
      });
    }
  }

  async submitCredentials(credentials: Credentials, signal?: AbortSignal): Promise<LoginOutcome> {
    await this.controller.fill(this.css('auth.emailInput'), credentials.email);
    await this.controller.fill(this.css('auth.passwordInput'), credentials.password);
    await this.controller.click(this.css('auth.submitButton'));

    const deadline = this.now() + this.options.loginTimeoutMs;
    while (this.now() < deadline) {
      throwIfAborted(signal);
      const url = this.controller.currentUrl();
      if (!this.isLoginUrl(url)) {
        if (url.includes('/verify') || (await this.controller.exists(this.css('auth.verifyNotice')))) {
          return { kind: 'challenge', challenge: 'email' };
        }
        return { kind: 'authenticated' };
      }
      if (await this.controller.exists(this.css('auth.mfaInput'))) {
        return { kind: 'challenge', challenge: 'mfa' };
      }
      if (await this.controller.exists(this.css('auth.captchaFrame'))) {
        return { kind: 'challenge', challenge: 'captcha' };
      }
      const error = await this.controller.extractText(this.css('auth.loginError'));
      if (error && error.trim()) {
        return { kind: 'rejected', reason: error.trim() };
      }
      await this.controller.wait(POLL_INTERVAL_MS * 2);
    }
    return { kind: 'timeout' };
  }

  async completeChallenge(
    challenge: ChallengeKind,
    timeoutMs: number,
    codeProvider?: MfaCodeProvider,
    signal?: AbortSignal,
  ): Promise<boolean> {
    if (challenge === 'mfa' && codeProvider) {
      const code = await codeProvider();
      throwIfAborted(signal);
      await this.controller.fill(this.css('auth.mfaInput'), code.trim());
      await this.controller.press('Enter');
    } else {
      log.warn(`Waiting up to ${Math.round(timeoutMs / 1000)}s for the ${challenge} challenge to be completed`);
    }
    const deadline = this.now() + timeoutMs;
    do {
      throwIfAborted(signal);
      if (this.controller.currentUrl().includes('/channels/')) return true;
      await this.controller.wait(POLL_INTERVAL_MS * 2);
    } while (this.now() < deadline);
    return false;
  }

  // === SIDEBAR ===

  async listServers(): Promise<Server[]> {
    await this.open('/channels/@me');
    await this.requireRegion('nav.guildItem', 'visible');
    await this.settle(1000);

    // The guild list is virtualized; scroll through it so every entry renders.
    const tree = this.css('nav.guildTree');
    await this.controller.evaluate(scrollContainer, { selector: tree, to: 'top' });
    for (let i = 0; i < MAX_SIDEBAR_SCROLLS; i++) {
      const position = await this.controller.evaluate(scrollContainer, { selector: tree, to: 600 });
      if (!position.found || position.atBottom) break;
      await this.settle(100);
    }

    return this.controller.evaluate(
      extractServers,
      this.registry.resolvePaths({ item: 'nav.guildItem', name: 'nav.guildName' }),
    );
  }

  async listChannels(serverId: string): Promise<Channel[]> {
    await this.open(`/channels/${serverId}`);
    await this.requireRegion('channels.channelLink', 'attached');
    await this.settle(1000);

    const link = this.css('channels.channelLink');
    const sidebar = await this.controller.evaluate(extractChannels, { link, serverId });
    const merged = new Map(sidebar.map((channel) => [channel.id, channel]));

    const browse = await this.findBrowseChannels();
    if (browse) {
      try {
        await this.controller.click(browse);
        await this.settle(2000);
        await this.controller.evaluate(scrollContainer, { selector: this.css('channels.channelList'), to: 'bottom' });
        await this.settle(1000);
        const hidden = await this.controller.evaluate(extractChannels, { link, serverId });
        for (const channel of hidden) {
          if (!merged.has(channel.id)) merged.set(channel.id, channel);
        }
      } catch (error) {
        log.warn(`Browse Channels failed, returning sidebar channels only: ${String(error)}`);
      }
    }

    return Array.from(merged.values(), (channel) => ({ ...channel, serverId }));
  }

  // === TIMELINE ===

  async openChannel(serverId: string, channelId: string): Promise<void> {
    await this.open(`/channels/${serverId}/${channelId}`);
    await this.requireRegion('chat.messageList', 'attached');
    await this.settle(500);
  }

  async readTimeline(): Promise<TimelineSnapshot> {
    return this.controller.evaluate(
      extractTimeline,
      this.registry.resolvePaths({
        item: 'chat.messageItem',
        content: 'chat.messageContent',
        username: 'chat.username',
        timestamp: 'chat.timestamp',
        avatar: 'chat.avatar',
        edited: 'chat.editedMarker',
        attachment: 'chat.attachment',
        channelStart: 'chat.channelStart',
      }),
    );
  }

  async scrollTimeline(direction: TimelineDirection): Promise<boolean> {
    const to = direction === 'newest' ? 'bottom' : direction === 'older' ? -TIMELINE_SCROLL_PX : TIMELINE_SCROLL_PX;
    const scroller = this.css('chat.scroller');
    const before = await this.controller.evaluate(scrollContainer, { selector: scroller, to });
    await this.settle(800);
    if (!before.found) return false;
    if (direction === 'newest') return true;
    // History loaded at an edge shifts the position, so measure again.
    const position = await this.controller.evaluate(scrollContainer, { selector: scroller, to: 0 });
    return direction === 'older' ? !position.atTop : !position.atBottom;
  }

  // === SEARCH ===

  async submitSearch(serverId: string, query: string, signal?: AbortSignal): Promise<boolean> {
    await this.open(`/channels/${serverId}`);
    const box = this.css('search.searchBox');
    if (!(await this.controller.waitForElement(box, { state: 'visible' }))) {
      this.checkSessionRedirect();
      throw new ElementNotFoundError('search.searchBox', undefined, { context: { action: 'search' } });
    }
    await this.controller.click(box);
    await this.settle(200);
    await this.controller.press('ControlOrMeta+a');
    await this.controller.press('Backspace');
    await this.controller.typeText(query, SEARCH_TYPE_DELAY_MS);
    await this.settle(200);
    await this.controller.press('Enter');

    if (!(await this.waitForSearchOutcome(signal))) {
      return false;
    }

    const newest = this.css('search.sortTab');
    if (await this.controller.exists(newest, 'Newest')) {
      await this.controller.click(newest, { hasText: 'Newest' });
      await this.settle(1000);
      return this.waitForSearchOutcome(signal);
    }
    await this.settle(500);
    return true;
  }

  async goToSearchPage(pageNumber: number): Promise<boolean> {
    if (pageNumber <= 1) return true;

    const pageButton = this.css('search.pageButton');
    const label = new RegExp(`^\\s*(?:Page\\s+)?${pageNumber}\\s*$`);
    if (await this.controller.exists(pageButton, label)) {
      await this.controller.click(pageButton, { hasText: label });
      await this.settle(1000);
      return true;
    }

    const next = this.css('search.nextButton');
    for (let current = 1; current < pageNumber; current++) {
      if (!(await this.controller.exists(next))) {
        return false;
      }
      await this.controller.click(next);
      await this.settle(800);
    }
    await this.settle(200);
    return true;
  }

  async readSearchResults(): Promise<SearchResultsSnapshot> {
    const page = await this.controller.evaluate(
      extractSearchResults,
      this.registry.resolvePaths({
        result: 'search.result',
        totalCount: 'search.totalCount',
        noResults: 'search.noResults',
        username: 'chat.username',
        timestamp: 'chat.timestamp',
        content: 'chat.messageContent',
        avatar: 'chat.avatar',
      }),
    );
    return {
      results: page.results,
      totalResults: page.noResults ? 0 : parseResultCount(page.totalText),
    };
  }

  async jumpToSearchResult(indexOnPage: number): Promise<MessageLocation> {
    await this.controller.click(`[data-result-index="${indexOnPage}"]`);
    const pattern = /\/channels\/(\d+)\/(\d+)\/(\d+)/;
    const arrived = await this.controller.waitForUrl((url) => pattern.test(url), this.options.navigationTimeoutMs);
    const match = pattern.exec(this.controller.currentUrl());
    if (!arrived || !match) {
      throw new NavigationTimeoutError(`Jump to search result ${indexOnPage} did not open the message`, {
        context: { action: 'jumpToResult' },
      });
    }
    await this.requireRegion('chat.messageList', 'attached');
    await this.settle(1000);
    return { serverId: match[1], channelId: match[2], messageId: match[3] };
  }

  // === COMPOSER ===

  async latestMessageId(): Promise<string | null> {
    const latest = await this.controller.evaluate(extractLatestMessage, this.latestSelectors());
    return latest.id;
  }

  async submitMessage(text: string): Promise<void> {
    const textbox = this.css('composer.textbox');
    if (!(await this.controller.waitForElement(textbox, { state: 'visible' }))) {
      this.checkSessionRedirect();
      throw new ElementNotFoundError('composer.textbox', 'Message composer not found', {
        context: { action: 'send' },
      });
    }
    await this.controller.click(textbox);
    await this.controller.press('ControlOrMeta+a');
    await this.controller.press('Backspace');
    const lines = text.split('\n');
    for (let i = 0; i < lines.length; i++) {
      if (lines[i]) {
        await this.controller.typeText(lines[i]);
      }
      if (i < lines.length - 1) {
        await this.controller.press('Shift+Enter');
      }
    }
    await this.controller.press('Enter');
  }

  async waitForNewMessage(previousId: string | null, timeoutMs: number, signal?: AbortSignal): Promise<NewMessageResult> {
    const deadline = this.now() + timeoutMs;
    const selectors = this.latestSelectors();
    do {
      throwIfAborted(signal);
      const latest = await this.controller.evaluate(extractLatestMessage, selectors);
      if (latest.id && latest.id !== previousId) {
        if (latest.failed) return { status: 'failed', id: latest.id };
        if (!latest.pending) return { status: 'sent', id: latest.id };
      }
      await this.controller.wait(POLL_INTERVAL_MS);
    } while (this.now() < deadline);
    return { status: 'timeout', id: null };
  }

  // === HEALTH ===

  async detectThrottle(): Promise<ThrottleSignal | null> {
    const http = this.controller.takeHttpThrottle();
    if (http) return http;
    if (!this.controller.isLaunched()) return null;
    const alerts = await this.controller.evaluate(extractAlerts, {
      alerts: [this.css('alerts.banner'), this.css('alerts.toast'), this.css('alerts.modal')].join(', '),
      cooldown: this.css('composer.cooldown'),
    });
    return classifyAlerts(alerts);
  }

  async resetToIdle(): Promise<void> {
    if (!this.controller.isLaunched()) return;
    await this.controller.press('Escape');
    await this.controller.press('Escape');
    const close = this.css('search.closeButton');
    if (await this.controller.exists(close)) {
      await this.controller.click(close);
    }
  }

  // === HELPERS ===

  private url(path: string): string {
    return `${this.options.baseUrl.replace(/\/$/, '')}${path}`;
  }

  private css(path: string): string {
    return this.registry.css(path);
  }

  private latestSelectors(): { item: string; failed: string; pending: string } {
    return this.registry.resolvePaths({
      item: 'chat.messageItem',
      failed: 'chat.failedMessage',
      pending: 'chat.pendingMessage',
    });
  }

  private async settle(ms: number): Promise<void> {
    await this.controller.wait(ms + this.options.extraWaitMs);
  }

  /** Navigates inside the app, raising `SessionExpiredError` on a login redirect. */
  private async open(path: string): Promise<void> {
    await this.controller.navigate(this.url(path));
    this.checkSessionRedirect();
  }

  private checkSessionRedirect(): void {
    const url = this.controller.currentUrl();
    if (this.isLoginUrl(url)) {
      throw new SessionExpiredError(url);
    }
  }

  private async requireRegion(path: string, state: 'attached' | 'visible'): Promise<void> {
    const ready = await this.controller.waitForElement(this.css(path), {
      state,
      timeoutMs: this.options.navigationTimeoutMs,
    });
    if (!ready) {
      this.checkSessionRedirect();
      throw new NavigationTimeoutError(`UI region ${path} did not become ready`, {
        context: { action: path },
      });
    }
  }

  private async waitForSearchOutcome(signal?: AbortSignal): Promise<boolean> {
    const result = this.css('search.result');
    const empty = this.css('search.noResults');
    const deadline = this.now() + this.options.navigationTimeoutMs;
    do {
      throwIfAborted(signal);
      if (await this.controller.exists(result)) return true;
      if (await this.controller.exists(empty)) return false;
      await this.controller.wait(POLL_INTERVAL_MS);
    } while (this.now() < deadline);
    throw new NavigationTimeoutError('Search results did not load', { context: { action: 'search' } });
  }

  private async findBrowseChannels(): Promise<string | null> {
    for (const selector of this.registry.getWithFallbacks('channels.browseChannels')) {
      if (await this.controller.exists(selector)) return selector;
    }
    return null;
  }
}

/**
 * Builds the adapter for a known UI version.
 */
export function createDiscordUi(
  version: string,
  controller: BrowserController,
  options: DiscordUiOptions,
  deps: ClassicDiscordUiDeps = {},
): DiscordUi {
  if (!isUiVersion(version)) {
    throw new UnknownUiVersionError(version);
  }
  // Only one layout is known so far.
  return new ClassicDiscordUi(controller, options, deps);
}
