/**
 * Discord Web Client
 *
 * Boundary facade over the automation core. Every operation resolves to an
 * explicit outcome instead of throwing, ready to be marshalled by whatever
 * transport sits in front of it.
 */

import {
  ElementNotFoundError,
  OutOfRangeError,
  RateLimitedError,
  SendFailureError,
  toAutomationError,
  type AutomationError,
  type AutomationErrorCode,
} from '../automation/errors.js';
import { MessageScraper } from '../automation/message-scraper.js';
import { MessageSender } from '../automation/message-sender.js';
import type { RateLimiterStats } from '../automation/rate-limiter.js';
import { SearchEngine } from '../automation/search-engine.js';
import { SessionManager, type SessionManagerOptions, type SessionStatus } from '../automation/session-manager.js';
import type {
  Channel,
  ContextWindow,
  Message,
  SearchFilter,
  SearchPage,
  SendReceipt,
  Server,
} from '../automation/types.js';
import type { DiscordWebConfig } from '../config.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('client');

export interface OperationError {
  code: AutomationErrorCode;
  name: string;
  message: string;
  action: string;
  elapsedMs: number;
  retryCount: number;
  details: Record<string, unknown>;
}

export type OperationResult<T> = { success: true; data: T } | { success: false; error: OperationError };

export interface CallOptions {
  signal?: AbortSignal;
}

export interface ClientStatus extends SessionStatus {
  rateLimiter: RateLimiterStats;
}

function errorDetails(error: AutomationError): Record<string, unknown> {
  const details: Record<string, unknown> = { retryable: error.retryable };
  if (error instanceof SendFailureError) {
    details.sentCount = error.progress.sentCount;
    details.chunkIds = error.progress.chunkIds;
    details.failedChunkIndex = error.progress.failedChunkIndex;
    details.totalChunks = error.progress.totalChunks;
  } else if (error instanceof RateLimitedError) {
    details.retryAfterMs = error.retryAfterMs;
  } else if (error instanceof OutOfRangeError) {
    details.parameter = error.parameter;
  } else if (error instanceof ElementNotFoundError) {
    details.selector = error.selector;
  }
  if (error.cause instanceof Error) {
    details.cause = error.cause.message;
  }
  return details;
}

export function toOperationError(error: unknown, action: string, elapsedMs: number): OperationError {
  const normalized = toAutomationError(error, action);
  return {
    code: normalized.code,
    name: normalized.name,
    message: normalized.message,
    action: normalized.context.action,
    elapsedMs: normalized.context.elapsedMs || elapsedMs,
    retryCount: normalized.context.retryCount,
    details: errorDetails(normalized),
  };
}

export class DiscordWebClient {
  readonly sessions: SessionManager;
  private readonly scraper: MessageScraper;
  private readonly searchEngine: SearchEngine;
  private readonly sender: MessageSender;

  constructor(sessions: SessionManager) {
    this.sessions = sessions;
    this.scraper = new MessageScraper(sessions);
    this.searchEngine = new SearchEngine(sessions);
    this.sender = new MessageSender(sessions);
  }

  // === SESSION ===

  async login(options: CallOptions = {}): Promise<OperationResult<SessionStatus>> {
    return this.call('login', async () => {
      await this.sessions.ensureAuthenticated(options.signal);
      return this.sessions.getStatus();
    });
  }

  getStatus(): OperationResult<ClientStatus> {
    return {
      success: true,
      data: { ...this.sessions.getStatus(), rateLimiter: this.sessions.rateLimiter.getStats() },
    };
  }

  async close(): Promise<OperationResult<{ closed: true }>> {
    return this.call('close', async () => {
      await this.sessions.close();
      return { closed: true as const };
    });
  }

  // === READING ===

  async listServers(options: CallOptions = {}): Promise<OperationResult<Server[]>> {
    return this.call('listServers', () => this.scraper.listServers(options));
  }

  async listChannels(serverId: string, options: CallOptions = {}): Promise<OperationResult<Channel[]>> {
    return this.call('listChannels', () => this.scraper.listChannels(serverId, options));
  }

  async readMessages(
    serverId: string,
    channelId: string,
    maxMessages: number,
    hoursBack?: number,
    options: CallOptions = {},
  ): Promise<OperationResult<Message[]>> {
    return this.call('readMessages', () =>
      this.scraper.readMessages(serverId, channelId, maxMessages, { hoursBack, signal: options.signal }),
    );
  }

  // === SEARCH ===

  async search(serverId: string, filter: SearchFilter, options: CallOptions = {}): Promise<OperationResult<SearchPage>> {
    return this.call('search', () => this.searchEngine.search(serverId, filter, options));
  }

  /** Collects consecutive pages from `filter.pageOffset`, at most `maxPages`. */
  async searchPages(
    serverId: string,
    filter: SearchFilter,
    maxPages: number,
    options: CallOptions = {},
  ): Promise<OperationResult<SearchPage[]>> {
    return this.call('searchPages', async () => {
      if (!Number.isInteger(maxPages) || maxPages < 1) {
        throw new OutOfRangeError('maxPages', `maxPages must be a positive integer, got ${maxPages}`);
      }
      const pages: SearchPage[] = [];
      for await (const page of this.searchEngine.paginate(serverId, filter, options)) {
        pages.push(page);
        if (pages.length >= maxPages) break;
      }
      return pages;
    });
  }

  async resolveContext(
    serverId: string,
    query: string | SearchFilter,
    resultIndex: number,
    beforeCount: number,
    afterCount: number,
    options: CallOptions = {},
  ): Promise<OperationResult<ContextWindow>> {
    return this.call('resolveContext', () =>
      this.searchEngine.resolveContext(serverId, query, resultIndex, beforeCount, afterCount, options),
    );
  }

  // === SENDING ===

  async send(
    serverId: string,
    channelId: string,
    content: string,
    options: CallOptions = {},
  ): Promise<OperationResult<SendReceipt>> {
    return this.call('send', () => this.sender.send(serverId, channelId, content, options));
  }

  private async call<T>(action: string, operation: () => Promise<T>): Promise<OperationResult<T>> {
    const startedAt = Date.now();
    try {
      const data = await operation();
      log.debug(`${action} ok in ${Date.now() - startedAt}ms`);
      return { success: true, data };
    } catch (error) {
      const failure = toOperationError(error, action, Date.now() - startedAt);
      log.error(`${action} failed: ${failure.name}: ${failure.message}`);
      return { success: false, error: failure };
    }
  }
}

/**
 * Create a client from loaded configuration.
 */
export function createDiscordWebClient(
  config: DiscordWebConfig,
  options: Omit<SessionManagerOptions, 'config' | 'credentials'> = {},
): DiscordWebClient {
  return new DiscordWebClient(
    new SessionManager({ ...options, config: config.automation, credentials: config.credentials }),
  );
}
