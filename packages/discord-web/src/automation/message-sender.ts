/**
 * Message Sender
 *
 * Sends text to a channel, split into platform-sized chunks that go out in
 * order with a pause between them. A chunk counts as sent once a new message
 * id shows up at the bottom of the channel.
 */

import { splitMessage } from './chunking.js';
import {
  AutomationError,
  OutOfRangeError,
  SendFailureError,
  SessionExpiredError,
  ThrottleDetectedError,
} from './errors.js';
import type { SessionManager } from './session-manager.js';
import type { SendReceipt } from './types.js';
import type { DiscordUi } from './ui-adapter.js';
import { sleep, throwIfAborted, truncate } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('sender');

export interface SendOptions {
  signal?: AbortSignal;
}

export interface MessageSenderDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export class MessageSender {
  private readonly sessions: SessionManager;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(sessions: SessionManager, deps: MessageSenderDeps = {}) {
    this.sessions = sessions;
    this.sleep = deps.sleep ?? sleep;
  }

  /**
   * Sends `content`, chunked at the configured message limit. Chunks that
   * are only whitespace are skipped since the platform drops them. The
   * first chunk that fails stops the send with a `SendFailureError` that
   * reports what already went out.
   */
  async send(serverId: string, channelId: string, content: string, options: SendOptions = {}): Promise<SendReceipt> {
    if (content.trim() === '') {
      throw new OutOfRangeError('content', 'Message content is empty', { context: { action: 'send' } });
    }
    const config = this.sessions.config;
    const chunks = splitMessage(content, config.messageLimit).filter((chunk) => chunk.trim() !== '');

    return this.sessions.withAuthenticatedPage(
      async ({ ui, signal }) => {
        const limiter = this.sessions.rateLimiter;
        await limiter.run('navigate', 'openChannel', () => ui.openChannel(serverId, channelId), {
          signal,
          detectThrottle: () => ui.detectThrottle(),
        });

        const chunkIds: string[] = [];
        for (let index = 0; index < chunks.length; index++) {
          try {
            throwIfAborted(signal);
            if (index > 0) {
              await this.sleep(config.chunkDelayMs, signal);
              throwIfAborted(signal);
            }
            const id = await limiter.run('send', 'sendChunk', () => this.sendChunk(ui, chunks[index], signal), { signal });
            chunkIds.push(id);
            log.debug(`Chunk ${index + 1}/${chunks.length} sent as ${id}`);
          } catch (error) {
            // Nothing went out yet, so a login redirect may still be retried.
            if (error instanceof SessionExpiredError && chunkIds.length === 0) {
              throw error;
            }
            const reason = error instanceof Error ? error.message : String(error);
            log.error(`Chunk ${index + 1}/${chunks.length} failed after ${chunkIds.length} sent: ${reason}`);
            throw new SendFailureError(
              `Sent ${chunkIds.length} of ${chunks.length} chunks; chunk ${index + 1} failed: ${reason}`,
              { sentCount: chunkIds.length, chunkIds: [...chunkIds], failedChunkIndex: index, totalChunks: chunks.length },
              {
                cause: error,
                context: error instanceof AutomationError ? error.context : { action: 'send' },
              },
            );
          }
        }

        log.info(`Sent ${chunkIds.length} chunk(s) to ${channelId}: "${truncate(content, 40)}"`);
        return { chunkIds, chunkCount: chunkIds.length, totalLength: content.length };
      },
      { label: 'send', signal: options.signal },
    );
  }

  private async sendChunk(ui: DiscordUi, chunk: string, signal: AbortSignal): Promise<string> {
    const timeoutMs = this.sessions.config.sendConfirmTimeoutMs;
    const previous = await ui.latestMessageId();
    await ui.submitMessage(chunk);
    const outcome = await ui.waitForNewMessage(previous, timeoutMs, signal);

    if (outcome.status === 'sent' && outcome.id !== null) {
      return outcome.id;
    }
    if (outcome.status === 'failed') {
      throw new AutomationError('SEND_FAILURE', 'The platform marked the message as not delivered', false);
    }
    const throttle = await ui.detectThrottle();
    if (throttle) {
      throw new ThrottleDetectedError(throttle);
    }
    throw new AutomationError('SEND_FAILURE', `No new message appeared within ${timeoutMs}ms`, false);
  }
}
