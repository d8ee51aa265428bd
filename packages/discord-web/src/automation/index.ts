/**
 * Discord Web Automation - Main Exports
 */

export {
  PlaywrightBrowserController,
  type BrowserController,
  type PlaywrightControllerConfig,
  type StoredBrowserState,
  type StoredCookie,
  type StoredOrigin,
} from './browser-controller.js';

export { ClassicDiscordUi, createDiscordUi, type DiscordUiOptions } from './classic-ui.js';

export {
  classifyAlerts,
  parseResultCount,
  parseRetryAfterText,
  type DiscordUi,
  type ChallengeKind,
  type LoginOutcome,
  type MfaCodeProvider,
  type TimelineDirection,
  type TimelineSnapshot,
  type SearchResultsSnapshot,
  type NewMessageResult,
} from './ui-adapter.js';

export { CookieStore, SESSION_FILE_VERSION, isStoredBrowserState, resolveSessionPath } from './cookie-store.js';
export { ActionQueue, type ActionQueueOptions, type QueueRunOptions, type QueueStatus } from './action-queue.js';
export { RateLimiter, type RateLimiterDeps, type RateLimitedRunOptions, type RateLimiterStats } from './rate-limiter.js';

export {
  SessionManager,
  type SessionManagerOptions,
  type SessionState,
  type SessionStatus,
  type StateChange,
  type Session,
  type PageScope,
  type PageRunOptions,
} from './session-manager.js';

export { MessageScraper, type ReadMessagesOptions, type ListOptions } from './message-scraper.js';
export { SearchEngine, type SearchOptions } from './search-engine.js';
export { buildSearchQuery, validateFilter } from './search-query.js';
export { MessageSender, type SendOptions, type MessageSenderDeps } from './message-sender.js';
export { splitMessage } from './chunking.js';
export { compareNewestFirst, compareOldestFirst } from './records.js';

export {
  AutomationError,
  AuthenticationError,
  NavigationTimeoutError,
  RateLimitedError,
  ElementNotFoundError,
  OutOfRangeError,
  SendFailureError,
  CancelledError,
  toAutomationError,
  type AutomationErrorCode,
  type ErrorContext,
  type SendProgress,
} from './errors.js';

export {
  type Server,
  type Channel,
  type ChannelType,
  type Message,
  type Attachment,
  type AttachmentKind,
  type SearchFilter,
  type SearchResult,
  type SearchPage,
  type ContextWindow,
  type SendReceipt,
  type MessageLocation,
  type Credentials,
  type ContentType,
  type AuthorType,
  type ActionKind,
  type AutomationConfig,
  type RateLimitConfig,
  DEFAULT_CONFIG,
  DEFAULT_RATE_LIMITS,
} from './types.js';
