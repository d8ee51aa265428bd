/**
 * UI adapter contract.
 *
 * One implementation exists per known layout of the web client. Scraping,
 * search and send logic only ever talk to this interface, so a layout change
 * is contained in a single adapter plus its selector set.
 */

import type { BrowserController } from './browser-controller.js';
import type { RawMessage, RawSearchResult, RawAlerts } from './dom-extractors.js';
import type { Channel, Credentials, MessageLocation, Server } from './types.js';
import type { ThrottleSignal } from './errors.js';

export type ChallengeKind = 'mfa' | 'email' | 'captcha';

export type LoginOutcome =
  | { kind: 'authenticated' }
  | { kind: 'challenge'; challenge: ChallengeKind }
  | { kind: 'rejected'; reason: string }
  | { kind: 'timeout' };

/** Supplies a one-time code when the login asks for a second factor. */
export type MfaCodeProvider = () => Promise<string>;

export interface TimelineSnapshot {
  /** Oldest first, as rendered. */
  messages: RawMessage[];
  atChannelStart: boolean;
}

export interface SearchResultsSnapshot {
  results: RawSearchResult[];
  totalResults: number | null;
}

export type TimelineDirection = 'older' | 'newer' | 'newest';

export interface NewMessageResult {
  status: 'sent' | 'failed' | 'timeout';
  id: string | null;
}

export interface DiscordUi {
  readonly version: string;
  readonly controller: BrowserController;

  isLoginUrl(url: string): boolean;
  /** Opens the app home and reports whether the session is signed in. */
  probeSession(): Promise<boolean>;
  openLogin(): Promise<void>;
  submitCredentials(credentials: Credentials, signal?: AbortSignal): Promise<LoginOutcome>;
  /** Waits for the challenge to be completed, answering it with `codeProvider` when possible. */
  completeChallenge(
    challenge: ChallengeKind,
    timeoutMs: number,
    codeProvider?: MfaCodeProvider,
    signal?: AbortSignal,
  ): Promise<boolean>;

  listServers(): Promise<Server[]>;
  listChannels(serverId: string): Promise<Channel[]>;

  openChannel(serverId: string, channelId: string): Promise<void>;
  readTimeline(): Promise<TimelineSnapshot>;
  /** Returns false when the timeline cannot move further in that direction. */
  scrollTimeline(direction: TimelineDirection): Promise<boolean>;

  /** Opens the server, submits the query and sorts by newest. Resolves false on no results. */
  submitSearch(serverId: string, query: string, signal?: AbortSignal): Promise<boolean>;
  goToSearchPage(pageNumber: number): Promise<boolean>;
  readSearchResults(): Promise<SearchResultsSnapshot>;
  jumpToSearchResult(indexOnPage: number): Promise<MessageLocation>;

  latestMessageId(): Promise<string | null>;
  submitMessage(text: string): Promise<void>;
  waitForNewMessage(previousId: string | null, timeoutMs: number, signal?: AbortSignal): Promise<NewMessageResult>;

  detectThrottle(): Promise<ThrottleSignal | null>;
  /** Closes overlays and search so the next operation starts from a known state. */
  resetToIdle(): Promise<void>;
}

/**
 * Parses the search header, e.g. `"1,234 Results"`.
 */
export function parseResultCount(text: string | null): number | null {
  if (!text) return null;
  const match = /([\d.,\s]+)\s*result/i.exec(text);
  if (!match) return null;
  const digits = match[1].replace(/[^\d]/g, '');
  return digits ? Number(digits) : null;
}

const THROTTLE_PATTERNS = [
  /you are being rate limited/i,
  /rate limit/i,
  /too many requests/i,
  /slow down/i,
  /try again (?:later|in)/i,
];

/**
 * Seconds to wait, from text such as `"try again in 12 seconds"` or a
 * slowmode countdown like `"0:15"`.
 */
export function parseRetryAfterText(text: string): number | null {
  const seconds = /(\d+(?:\.\d+)?)\s*(?:s\b|sec|second)/i.exec(text);
  if (seconds) return Math.round(Number(seconds[1]) * 1000);
  const minutes = /(\d+)\s*(?:m\b|min|minute)/i.exec(text);
  if (minutes) return Number(minutes[1]) * 60_000;
  const clock = /(\d+):(\d{2})/.exec(text);
  if (clock) return (Number(clock[1]) * 60 + Number(clock[2])) * 1000;
  return null;
}

export function classifyAlerts(alerts: RawAlerts): ThrottleSignal | null {
  if (alerts.cooldown) {
    return {
      reason: 'slowmode',
      retryAfterMs: parseRetryAfterText(alerts.cooldown),
      detail: alerts.cooldown,
    };
  }
  for (const text of alerts.texts) {
    if (THROTTLE_PATTERNS.some((pattern) => pattern.test(text))) {
      return { reason: 'banner', retryAfterMs: parseRetryAfterText(text), detail: text };
    }
  }
  return null;
}
