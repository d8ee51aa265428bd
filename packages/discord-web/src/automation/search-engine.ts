/**
 * Search Engine
 *
 * Server-scoped message search through the web client's search box,
 * page-by-page retrieval and jump-to-context around a single result.
 */

import { ElementNotFoundError, OutOfRangeError, ThrottleDetectedError } from './errors.js';
import { compareOldestFirst, searchResultToMessage, toMessage } from './records.js';
import { buildSearchQuery, needsChannelNames, validateFilter } from './search-query.js';
import type { PageScope, SessionManager } from './session-manager.js';
import type { ContextWindow, Message, SearchFilter, SearchPage } from './types.js';
import type { DiscordUi, SearchResultsSnapshot } from './ui-adapter.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('search');

export interface SearchOptions {
  signal?: AbortSignal;
}

interface OpenedPage {
  query: string;
  snapshot: SearchResultsSnapshot;
}

export class SearchEngine {
  private readonly sessions: SessionManager;

  constructor(sessions: SessionManager) {
    this.sessions = sessions;
  }

  private get pageSize(): number {
    return this.sessions.config.searchPageSize;
  }

  /**
   * Runs the search and returns the page at `filter.pageOffset`, sorted
   * newest first.
   */
  async search(serverId: string, filter: SearchFilter, options: SearchOptions = {}): Promise<SearchPage> {
    validateFilter(filter);
    return this.sessions.withAuthenticatedPage(
      async (scope) => {
        const opened = await this.openPage(scope, serverId, filter, filter.pageOffset);
        const first = filter.pageOffset * this.pageSize;
        const results = opened.snapshot.results.map((raw, i) => ({
          message: searchResultToMessage(raw, first + i),
          matchRank: first + i,
        }));
        const total = opened.snapshot.totalResults;
        const hasMore =
          results.length > 0 && (total === null ? results.length >= this.pageSize : first + results.length < total);
        log.info(`"${opened.query}" page ${filter.pageOffset}: ${results.length} results (total ${total ?? '?'})`);
        return { pageOffset: filter.pageOffset, results, totalResults: total, hasMore };
      },
      { label: 'search', signal: options.signal },
    );
  }

  /**
   * Pages lazily from `filter.pageOffset`. Every iteration starts over and
   * stops after the first page without more results.
   */
  paginate(serverId: string, filter: SearchFilter, options: SearchOptions = {}): AsyncIterable<SearchPage> {
    validateFilter(filter);
    return {
      [Symbol.asyncIterator]: () => this.pages(serverId, filter, options),
    };
  }

  /**
   * Re-runs the search, jumps to result `resultIndex` and reads the
   * surrounding channel history.
   */
  async resolveContext(
    serverId: string,
    query: string | SearchFilter,
    resultIndex: number,
    beforeCount: number,
    afterCount: number,
    options: SearchOptions = {},
  ): Promise<ContextWindow> {
    const ceiling = this.sessions.config.maxMessagesCeiling;
    requireCount('resultIndex', resultIndex, Number.MAX_SAFE_INTEGER);
    requireCount('beforeCount', beforeCount, ceiling);
    requireCount('afterCount', afterCount, ceiling);
    const filter: SearchFilter = typeof query === 'string' ? { query, pageOffset: 0 } : query;
    const pageOffset = Math.floor(resultIndex / this.pageSize);
    validateFilter({ ...filter, pageOffset });

    return this.sessions.withAuthenticatedPage(
      async (scope) => {
        const { ui, signal } = scope;
        const limiter = this.sessions.rateLimiter;
        const opened = await this.openPage(scope, serverId, filter, pageOffset);
        const indexOnPage = resultIndex - pageOffset * this.pageSize;
        if (indexOnPage >= opened.snapshot.results.length) {
          const total = opened.snapshot.totalResults ?? pageOffset * this.pageSize + opened.snapshot.results.length;
          throw new OutOfRangeError('resultIndex', `resultIndex ${resultIndex} is beyond the ${total} available results`, {
            context: { action: 'resolveContext' },
          });
        }

        const location = await limiter.run('navigate', 'jumpToResult', () => ui.jumpToSearchResult(indexOnPage), {
          signal,
          detectThrottle: () => ui.detectThrottle(),
        });
        log.debug(`Result ${resultIndex} is message ${location.messageId} in ${location.channelId}`);
        return this.readAround(scope, location.messageId, beforeCount, afterCount);
      },
      { label: 'resolveContext', signal: options.signal },
    );
  }

  private async *pages(serverId: string, filter: SearchFilter, options: SearchOptions): AsyncGenerator<SearchPage> {
    let pageOffset = filter.pageOffset;
    for (;;) {
      const page = await this.search(serverId, { ...filter, pageOffset }, options);
      yield page;
      if (!page.hasMore) return;
      pageOffset++;
    }
  }

  /** Submits the query and moves to `pageOffset`; a missing page reads as empty. */
  private async openPage(
    { ui, signal }: PageScope,
    serverId: string,
    filter: SearchFilter,
    pageOffset: number,
  ): Promise<OpenedPage> {
    const limiter = this.sessions.rateLimiter;
    const detectThrottle = (): ReturnType<DiscordUi['detectThrottle']> => ui.detectThrottle();

    let channelNames = new Map<string, string>();
    if (needsChannelNames(filter)) {
      const channels = await limiter.run('navigate', 'listChannels', () => ui.listChannels(serverId), {
        signal,
        detectThrottle,
      });
      channelNames = new Map(channels.map((channel) => [channel.id, channel.name]));
    }
    const query = buildSearchQuery({ ...filter, pageOffset }, channelNames);

    const found = await limiter.run('search', 'submitSearch', () => ui.submitSearch(serverId, query, signal), {
      signal,
      detectThrottle,
    });
    if (!found) {
      return { query, snapshot: { results: [], totalResults: 0 } };
    }

    const reached = await limiter.run('navigate', 'goToSearchPage', () => ui.goToSearchPage(pageOffset + 1), {
      signal,
      detectThrottle,
    });
    const snapshot = await limiter.run(
      'extract',
      'readSearchResults',
      async () => {
        const read = await ui.readSearchResults();
        if (reached && read.results.length === 0 && read.totalResults !== 0) {
          throw new ThrottleDetectedError({
            reason: 'empty-dom',
            retryAfterMs: null,
            detail: `search page ${pageOffset + 1} rendered no results`,
          });
        }
        return read;
      },
      { signal, detectThrottle },
    );
    return { query, snapshot: reached ? snapshot : { results: [], totalResults: snapshot.totalResults } };
  }

  /**
   * Reads the open channel around `anchorId`, scrolling older and then newer
   * until enough neighbours are loaded, the channel edge is reached or
   * scrolling stops adding messages.
   */
  private async readAround(
    { ui, signal }: PageScope,
    anchorId: string,
    beforeCount: number,
    afterCount: number,
  ): Promise<ContextWindow> {
    const limiter = this.sessions.rateLimiter;
    const maxStalled = this.sessions.config.maxStalledScrolls;
    const collected = new Map<string, Message>();
    const edge = { atChannelStart: false };

    const read = async (): Promise<number> => {
      const snapshot = await limiter.run('extract', 'readTimeline', () => ui.readTimeline(), { signal });
      edge.atChannelStart = edge.atChannelStart || snapshot.atChannelStart;
      let added = 0;
      for (const raw of snapshot.messages) {
        if (!collected.has(raw.id)) {
          collected.set(raw.id, toMessage(raw));
          added++;
        }
      }
      return added;
    };
    const ordered = (): Message[] => Array.from(collected.values()).sort(compareOldestFirst);
    const anchorIndex = (): number => ordered().findIndex((message) => message.id === anchorId);

    await read();
    if (anchorIndex() < 0) {
      throw new ElementNotFoundError('chat.messageItem', `Message ${anchorId} is not rendered after the jump`, {
        context: { action: 'resolveContext' },
      });
    }

    // A scroll that hits the edge of the loaded window can still pull in more
    // history, so the timeline is read again before an edge is believed.
    const scrollAndRead = async (direction: 'older' | 'newer', stalled: number): Promise<number | null> => {
      const label = direction === 'older' ? 'scrollOlder' : 'scrollNewer';
      const moved = await limiter.run('navigate', label, () => ui.scrollTimeline(direction), { signal });
      if ((await read()) > 0) return 0;
      return moved ? stalled + 1 : null;
    };

    let stalled: number | null = 0;
    while (stalled !== null && stalled < maxStalled && anchorIndex() < beforeCount && !edge.atChannelStart) {
      stalled = await scrollAndRead('older', stalled);
    }

    stalled = 0;
    while (stalled !== null && stalled < maxStalled && collected.size - anchorIndex() - 1 < afterCount) {
      stalled = await scrollAndRead('newer', stalled);
    }

    const messages = ordered();
    const index = anchorIndex();
    return {
      anchor: messages[index],
      before: messages.slice(Math.max(0, index - beforeCount), index),
      after: messages.slice(index + 1, index + 1 + afterCount),
    };
  }
}

function requireCount(parameter: string, value: number, max: number): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new OutOfRangeError(parameter, `${parameter} must be an integer between 0 and ${max}, got ${value}`, {
      context: { action: 'resolveContext' },
    });
  }
}
