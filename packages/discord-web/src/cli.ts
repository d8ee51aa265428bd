#!/usr/bin/env node
/**
 * Discord Web CLI
 *
 * Runs one operation per invocation and prints its outcome as JSON on stdout.
 * Logs go to stderr.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { createDiscordWebClient, type DiscordWebClient, type OperationResult } from './api/client.js';
import type { AuthorType, ContentType, SearchFilter, SearchPage } from './automation/types.js';
import { loadConfigFromEnv } from './config.js';
import { logger, setLogLevel } from './utils/logger.js';

interface GlobalOptions {
  headed?: boolean;
  verbose?: boolean;
  mfaCode?: string;
}

interface SearchCommandOptions {
  in: string[];
  from: string[];
  mentions: string[];
  has: string[];
  after?: string;
  before?: string;
  during?: string;
  authorType?: string;
  pinned?: boolean;
  page: number;
  pages: number;
}

const CONTENT_TYPES: readonly ContentType[] = ['image', 'video', 'link', 'file', 'embed', 'sound', 'sticker', 'poll'];
const AUTHOR_TYPES: readonly AuthorType[] = ['user', 'bot', 'webhook'];

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Not an integer: ${value}`);
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function toContentType(value: string): ContentType {
  const match = CONTENT_TYPES.find((type) => type === value);
  if (!match) {
    throw new Error(`Unknown content type "${value}" (expected ${CONTENT_TYPES.join(', ')})`);
  }
  return match;
}

function toAuthorType(value: string): AuthorType {
  const match = AUTHOR_TYPES.find((type) => type === value);
  if (!match) {
    throw new Error(`Unknown author type "${value}" (expected ${AUTHOR_TYPES.join(', ')})`);
  }
  return match;
}

function toFilter(query: string | undefined, options: SearchCommandOptions): SearchFilter {
  return {
    query,
    channelIds: options.in,
    authorIds: options.from,
    mentions: options.mentions,
    contentTypes: options.has.map(toContentType),
    dateFrom: options.after,
    dateTo: options.before,
    during: options.during,
    authorType: options.authorType === undefined ? undefined : toAuthorType(options.authorType),
    pinned: options.pinned,
    pageOffset: options.page,
  };
}

const program = new Command();

program
  .name('discord-web')
  .description('Discord web automation - read, search and send through a signed-in browser session')
  .version('0.1.0')
  .option('--headed', 'Show the browser window (needed to finish a captcha or email check by hand)')
  .option('-v, --verbose', 'Debug logging')
  .option('--mfa-code <code>', 'Second-factor code to answer a login challenge with');

async function run<T>(
  operation: (client: DiscordWebClient, signal: AbortSignal) => Promise<OperationResult<T>>,
): Promise<void> {
  const globals = program.opts<GlobalOptions>();
  if (globals.verbose) setLogLevel('debug');

  const config = loadConfigFromEnv(process.env);
  if (globals.headed) config.automation.headless = false;
  const mfaCode = globals.mfaCode;
  const client = createDiscordWebClient(config, {
    mfaCodeProvider: mfaCode ? async () => mfaCode : undefined,
  });

  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupted, stopping after the current step');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    const result = await operation(client, controller.signal);
    console.log(JSON.stringify(result, null, 2));
    if (!result.success) process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
    await client.close();
  }
}

program
  .command('login')
  .description('Restore or create the session and save it')
  .action(async () => {
    await run((client, signal) => client.login({ signal }));
  });

program
  .command('status')
  .description('Show session and rate limiter state without opening a browser')
  .action(async () => {
    await run(async (client) => client.getStatus());
  });

program
  .command('servers')
  .description('List servers in sidebar order')
  .action(async () => {
    await run((client, signal) => client.listServers({ signal }));
  });

program
  .command('channels')
  .description('List the channels of a server')
  .argument('<serverId>', 'Server id')
  .action(async (serverId: string) => {
    await run((client, signal) => client.listChannels(serverId, { signal }));
  });

program
  .command('read')
  .description('Read recent messages from a channel, newest first')
  .argument('<serverId>', 'Server id')
  .argument('<channelId>', 'Channel id')
  .option('-n, --max <count>', 'Maximum number of messages', parseInteger, 50)
  .option('--hours <hours>', 'Only messages from the last N hours', parseNumber)
  .action(async (serverId: string, channelId: string, options: { max: number; hours?: number }) => {
    await run((client, signal) => client.readMessages(serverId, channelId, options.max, options.hours, { signal }));
  });

program
  .command('search')
  .description('Search a server')
  .argument('<serverId>', 'Server id')
  .argument('[query]', 'Free text')
  .option('--in <channel>', 'Channel id or name (repeatable)', collect, [])
  .option('--from <user>', 'Author handle (repeatable)', collect, [])
  .option('--mentions <user>', 'Mentioned user (repeatable)', collect, [])
  .option('--has <type>', `Content type: ${CONTENT_TYPES.join(', ')} (repeatable)`, collect, [])
  .option('--after <date>', 'From this day, inclusive (YYYY-MM-DD)')
  .option('--before <date>', 'Up to this day, inclusive (YYYY-MM-DD)')
  .option('--during <date>', 'On this day (YYYY-MM-DD)')
  .option('--author-type <type>', `Author type: ${AUTHOR_TYPES.join(', ')}`)
  .option('--pinned', 'Pinned messages only')
  .option('-p, --page <page>', '0-based page to start from', parseInteger, 0)
  .option('--pages <count>', 'Number of pages to fetch', parseInteger, 1)
  .action(async (serverId: string, query: string | undefined, options: SearchCommandOptions) => {
    const filter = toFilter(query, options);
    await run<SearchPage | SearchPage[]>((client, signal) =>
      options.pages > 1
        ? client.searchPages(serverId, filter, options.pages, { signal })
        : client.search(serverId, filter, { signal }),
    );
  });

program
  .command('context')
  .description('Show the messages around one search result')
  .argument('<serverId>', 'Server id')
  .argument('<query>', 'Free text query')
  .option('-i, --index <index>', 'Global 0-based result index', parseInteger, 0)
  .option('-b, --before <count>', 'Older messages to include', parseInteger, 5)
  .option('-a, --after <count>', 'Newer messages to include', parseInteger, 5)
  .action(async (serverId: string, query: string, options: { index: number; before: number; after: number }) => {
    await run((client, signal) =>
      client.resolveContext(serverId, query, options.index, options.before, options.after, { signal }),
    );
  });

program
  .command('send')
  .description('Send a message, split into chunks when it is too long')
  .argument('<serverId>', 'Server id')
  .argument('<channelId>', 'Channel id')
  .argument('<content...>', 'Message text')
  .action(async (serverId: string, channelId: string, content: string[]) => {
    await run((client, signal) => client.send(serverId, channelId, content.join(' '), { signal }));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
