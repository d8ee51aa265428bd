/**
 * Discord Web Automation Module
 *
 * Drives the Discord web client through a signed-in browser session:
 * - Session restore, login and second-factor handling
 * - Server, channel and message scraping
 * - Filtered search with jump-to-context
 * - Chunked, paced message sending
 *
 * @example
 * ```typescript
 * import { createDiscordWebClient, loadConfigFromEnv } from '@discord-web/discord-web';
 *
 * const client = createDiscordWebClient(loadConfigFromEnv(process.env));
 * const page = await client.search('81384788765712384', { query: 'release notes', pageOffset: 0 });
 * if (page.success) console.log(page.data.results.length);
 * await client.close();
 * ```
 */

export * from './automation/index.js';

export {
  DiscordWebClient,
  createDiscordWebClient,
  toOperationError,
  type OperationResult,
  type OperationError,
  type CallOptions,
  type ClientStatus,
} from './api/index.js';

export { loadConfigFromEnv, type DiscordWebConfig } from './config.js';

export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';

export { snowflakeToIso, compareSnowflakes, isSnowflake, truncate } from './utils/index.js';
