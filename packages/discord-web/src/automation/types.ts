/**
 * Discord Web Automation Types
 */

export interface Server {
  id: string;
  name: string;
}

export type ChannelType =
  | 'text'
  | 'voice'
  | 'announcement'
  | 'forum'
  | 'stage'
  | 'thread'
  | 'unknown';

export interface Channel {
  id: string;
  serverId: string;
  name: string;
  type: ChannelType;
}

export type AttachmentKind = 'image' | 'video' | 'audio' | 'file';

export interface Attachment {
  url: string;
  kind: AttachmentKind;
}

export interface Message {
  id: string;
  channelId: string;
  authorName: string;
  authorId: string | null;
  /** ISO-8601, always UTC. */
  timestampUtc: string;
  content: string;
  attachments: Attachment[];
  isEdited: boolean;
}

export type ContentType = 'image' | 'video' | 'link' | 'file' | 'embed' | 'sound' | 'sticker' | 'poll';

export type AuthorType = 'user' | 'bot' | 'webhook';

export interface SearchFilter {
  query?: string;
  /** Channel ids (resolved to sidebar names) or channel names as typed in the search box. */
  channelIds?: Iterable<string>;
  /** Author handles as accepted by the `from:` search token. */
  authorIds?: Iterable<string>;
  mentions?: Iterable<string>;
  /** Inclusive lower bound, `YYYY-MM-DD`. */
  dateFrom?: string;
  /** Inclusive upper bound, `YYYY-MM-DD`. */
  dateTo?: string;
  /** A single day, `YYYY-MM-DD`. */
  during?: string;
  contentTypes?: Iterable<ContentType>;
  authorType?: AuthorType;
  pinned?: boolean;
  /** 0-based page index. */
  pageOffset: number;
}

export interface SearchResult {
  message: Message;
  /** Global 0-based position in the result ordering. */
  matchRank: number;
}

export interface SearchPage {
  pageOffset: number;
  results: SearchResult[];
  totalResults: number | null;
  hasMore: boolean;
}

export interface ContextWindow {
  anchor: Message;
  /** Oldest to newest, ending right before the anchor. */
  before: Message[];
  /** Oldest to newest, starting right after the anchor. */
  after: Message[];
}

export interface SendReceipt {
  chunkIds: string[];
  chunkCount: number;
  totalLength: number;
}

export interface MessageLocation {
  serverId: string;
  channelId: string;
  messageId: string;
}

export interface Credentials {
  email: string;
  password: string;
}

export type ActionKind = 'navigate' | 'extract' | 'search' | 'send';

export interface RateLimitConfig {
  /** Minimum time between two actions of the same kind. */
  minSpacingMs: Record<ActionKind, number>;
  baseBackoffMs: number;
  maxBackoffMs: number;
  /** Fraction of the backoff delay randomized in both directions. */
  jitterRatio: number;
  /** Retries after the first attempt before the action fails. */
  maxRetries: number;
}

export const DEFAULT_RATE_LIMITS: RateLimitConfig = {
  minSpacingMs: {
    navigate: 1000,
    extract: 250,
    search: 1500,
    send: 1000,
  },
  baseBackoffMs: 2000,
  maxBackoffMs: 60000,
  jitterRatio: 0.25,
  maxRetries: 4,
};

export interface AutomationConfig {
  baseUrl: string;
  headless: boolean;
  /** Chromium-based browser to drive. Unset uses the Playwright-managed build. */
  executablePath?: string;
  /** Added to every settle wait, for slow machines or connections. */
  extraWaitMs: number;
  uiVersion: string;
  sessionFile: string;
  /** Platform single-message character limit. */
  messageLimit: number;
  chunkDelayMs: number;
  maxMessagesCeiling: number;
  maxHoursBack: number;
  /** Consecutive history scrolls without new messages before giving up. */
  maxStalledScrolls: number;
  searchPageSize: number;
  navigationTimeoutMs: number;
  loginTimeoutMs: number;
  mfaTimeoutMs: number;
  sendConfirmTimeoutMs: number;
  operationTimeoutMs: number;
  queueWaitTimeoutMs: number;
  sessionCheckIntervalMs: number;
  rateLimits: RateLimitConfig;
}

export const DEFAULT_CONFIG: AutomationConfig = {
  baseUrl: 'https://discord.com',
  headless: true,
  extraWaitMs: 0,
  uiVersion: 'classic',
  sessionFile: '.discord_web_session.json',
  messageLimit: 2000,
  chunkDelayMs: 500,
  maxMessagesCeiling: 1000,
  maxHoursBack: 8760,
  maxStalledScrolls: 3,
  searchPageSize: 25,
  navigationTimeoutMs: 15000,
  loginTimeoutMs: 60000,
  mfaTimeoutMs: 120000,
  sendConfirmTimeoutMs: 10000,
  operationTimeoutMs: 300000,
  queueWaitTimeoutMs: 600000,
  sessionCheckIntervalMs: 60000,
  rateLimits: DEFAULT_RATE_LIMITS,
};
