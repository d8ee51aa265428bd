/**
 * Message Scraper
 *
 * Sidebar listings and time-windowed channel history.
 */

import { OutOfRangeError, ThrottleDetectedError } from './errors.js';
import { compareNewestFirst, toMessage } from './records.js';
import type { SessionManager } from './session-manager.js';
import type { Channel, Message, Server } from './types.js';
import type { DiscordUi, TimelineSnapshot } from './ui-adapter.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('scraper');

export interface ReadMessagesOptions {
  hoursBack?: number;
  signal?: AbortSignal;
}

export interface ListOptions {
  signal?: AbortSignal;
}

export class MessageScraper {
  private readonly sessions: SessionManager;
  private readonly now: () => number;

  constructor(sessions: SessionManager, now: () => number = Date.now) {
    this.sessions = sessions;
    this.now = now;
  }

  async listServers(options: ListOptions = {}): Promise<Server[]> {
    return this.sessions.withAuthenticatedPage(
      ({ ui, signal }) =>
        this.sessions.rateLimiter.run('navigate', 'listServers', () => ui.listServers(), {
          signal,
          detectThrottle: () => ui.detectThrottle(),
        }),
      { label: 'listServers', signal: options.signal },
    );
  }

  async listChannels(serverId: string, options: ListOptions = {}): Promise<Channel[]> {
    return this.sessions.withAuthenticatedPage(
      ({ ui, signal }) =>
        this.sessions.rateLimiter.run('navigate', 'listChannels', () => ui.listChannels(serverId), {
          signal,
          detectThrottle: () => ui.detectThrottle(),
        }),
      { label: 'listChannels', signal: options.signal },
    );
  }

  /**
   * Reads up to `maxMessages` messages, newest first, optionally limited to
   * the last `hoursBack` hours. Arguments are validated before any browser
   * work happens.
   */
  async readMessages(
    serverId: string,
    channelId: string,
    maxMessages: number,
    options: ReadMessagesOptions = {},
  ): Promise<Message[]> {
    const config = this.sessions.config;
    if (!Number.isInteger(maxMessages) || maxMessages < 1 || maxMessages > config.maxMessagesCeiling) {
      throw new OutOfRangeError(
        'maxMessages',
        `maxMessages must be an integer between 1 and ${config.maxMessagesCeiling}, got ${maxMessages}`,
        { context: { action: 'readMessages' } },
      );
    }
    const { hoursBack } = options;
    if (hoursBack !== undefined && (!Number.isFinite(hoursBack) || hoursBack <= 0 || hoursBack > config.maxHoursBack)) {
      throw new OutOfRangeError(
        'hoursBack',
        `hoursBack must be greater than 0 and at most ${config.maxHoursBack}, got ${hoursBack}`,
        { context: { action: 'readMessages' } },
      );
    }
    const cutoff = hoursBack === undefined ? null : new Date(this.now() - hoursBack * 3_600_000).toISOString();

    return this.sessions.withAuthenticatedPage(
      async ({ ui, signal }) => {
        const limiter = this.sessions.rateLimiter;
        const detectThrottle = (): ReturnType<DiscordUi['detectThrottle']> => ui.detectThrottle();
        await limiter.run('navigate', 'openChannel', () => ui.openChannel(serverId, channelId), {
          signal,
          detectThrottle,
        });
        await limiter.run('navigate', 'scrollToNewest', () => ui.scrollTimeline('newest'), { signal });

        const collected = new Map<string, Message>();
        let stalled = 0;
        for (;;) {
          const snapshot = await limiter.run('extract', 'readTimeline', () => this.readNonEmpty(ui), {
            signal,
            detectThrottle,
          });

          let added = 0;
          for (const raw of snapshot.messages) {
            if (!collected.has(raw.id)) {
              collected.set(raw.id, toMessage(raw));
              added++;
            }
          }

          const messages = Array.from(collected.values());
          const inWindow = cutoff === null ? messages : messages.filter((m) => m.timestampUtc >= cutoff);
          const oldest = messages.reduce<string | null>(
            (min, m) => (min === null || m.timestampUtc < min ? m.timestampUtc : min),
            null,
          );
          log.debug(`${channelId}: ${collected.size} collected (+${added}), ${inWindow.length} in window`);

          if (inWindow.length >= maxMessages) break;
          if (cutoff !== null && oldest !== null && oldest < cutoff) break;
          if (snapshot.atChannelStart) break;
          stalled = added === 0 ? stalled + 1 : 0;
          if (stalled >= config.maxStalledScrolls) {
            log.info(`${channelId}: history stopped growing after ${stalled} scrolls`);
            break;
          }

          await limiter.run('navigate', 'scrollOlder', () => ui.scrollTimeline('older'), { signal });
        }

        return Array.from(collected.values())
          .filter((m) => cutoff === null || m.timestampUtc >= cutoff)
          .sort(compareNewestFirst)
          .slice(0, maxMessages);
      },
      { label: 'readMessages', signal: options.signal },
    );
  }

  private async readNonEmpty(ui: DiscordUi): Promise<TimelineSnapshot> {
    const snapshot = await ui.readTimeline();
    if (snapshot.messages.length === 0 && !snapshot.atChannelStart) {
      throw new ThrottleDetectedError({
        reason: 'empty-dom',
        retryAfterMs: null,
        detail: 'message list rendered no messages',
      });
    }
    return snapshot;
  }
}
