/**
 * Action Queue
 *
 * Single-owner lock around the one browser page. Tasks run strictly one at a
 * time in FIFO order. Waiting for the lock and running while holding it are
 * both bounded; a run timeout aborts the task's signal so it stops at its
 * next action boundary.
 */

import { NavigationTimeoutError } from './errors.js';
import { abortReason } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('queue');

export interface ActionQueueOptions {
  waitTimeoutMs: number;
  runTimeoutMs: number;
}

export interface QueueRunOptions {
  waitTimeoutMs?: number;
  runTimeoutMs?: number;
  /** Caller cancellation; aborts the wait or the running task. */
  signal?: AbortSignal;
}

export interface ActionLock {
  id: number;
  holder: string;
  acquiredAt: Date;
}

export interface QueueStatus {
  busy: boolean;
  holder: string | null;
  queueLength: number;
}

interface QueueEntry {
  id: number;
  holder: string;
  resolve: (id: number) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort: () => void;
}

export type QueueTask<T> = (signal: AbortSignal) => Promise<T>;

export class ActionQueue {
  private currentLock: ActionLock | null = null;
  private queue: QueueEntry[] = [];
  private lockIdCounter = 0;
  private readonly options: ActionQueueOptions;

  constructor(options: ActionQueueOptions) {
    this.options = options;
  }

  /**
   * Runs `task` once the lock is free. Caller cancellation only aborts the
   * task's signal; a run timeout also rejects right away. Either way the lock
   * is released when the task settles.
   */
  async run<T>(holder: string, task: QueueTask<T>, options: QueueRunOptions = {}): Promise<T> {
    const id = await this.acquire(holder, options.waitTimeoutMs ?? this.options.waitTimeoutMs, options.signal);
    const runTimeoutMs = options.runTimeoutMs ?? this.options.runTimeoutMs;
    const controller = new AbortController();
    const startedAt = Date.now();

    const onCallerAbort = (): void => controller.abort(abortReason(options.signal));
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) onCallerAbort();
    let failOnTimeout: (error: Error) => void = () => undefined;
    const timedOut = new Promise<never>((_, reject) => {
      failOnTimeout = reject;
    });
    const timer = setTimeout(() => {
      log.warn(`${holder} exceeded ${runTimeoutMs}ms, aborting`);
      const error = new NavigationTimeoutError(`${holder} timed out after ${runTimeoutMs}ms`, {
        context: { action: holder, elapsedMs: Date.now() - startedAt },
      });
      controller.abort(error);
      failOnTimeout(error);
    }, runTimeoutMs);

    const running = Promise.resolve().then(() => task(controller.signal));
    const settled = running.then(
      () => undefined,
      (error: unknown) => {
        if (controller.signal.aborted) {
          log.debug(`${holder} stopped after abort: ${String(error)}`);
        }
      },
    );
    void settled.finally(() => {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
      this.release(id);
    });

    return Promise.race([running, timedOut]);
  }

  isLocked(): boolean {
    return this.currentLock !== null;
  }

  getLock(): ActionLock | null {
    return this.currentLock;
  }

  getStatus(): QueueStatus {
    return {
      busy: this.currentLock !== null,
      holder: this.currentLock?.holder ?? null,
      queueLength: this.queue.length,
    };
  }

  private acquire(holder: string, waitTimeoutMs: number, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }
    const id = ++this.lockIdCounter;
    if (!this.currentLock && this.queue.length === 0) {
      this.currentLock = { id, holder, acquiredAt: new Date() };
      log.debug(`Lock acquired by ${holder}`);
      return Promise.resolve(id);
    }

    return new Promise<number>((resolve, reject) => {
      const entry: QueueEntry = {
        id,
        holder,
        resolve,
        reject,
        signal,
        timer: setTimeout(() => {
          this.remove(entry);
          reject(
            new NavigationTimeoutError(
              `${holder} waited ${waitTimeoutMs}ms for the browser (held by ${this.currentLock?.holder ?? 'nobody'})`,
              { context: { action: holder, elapsedMs: waitTimeoutMs } },
            ),
          );
        }, waitTimeoutMs),
        onAbort: () => {
          this.remove(entry);
          reject(abortReason(signal));
        },
      };
      signal?.addEventListener('abort', entry.onAbort, { once: true });
      this.queue.push(entry);
      log.debug(`${holder} queued for lock (${this.queue.length} in queue)`);
    });
  }

  private release(id: number): void {
    if (!this.currentLock || this.currentLock.id !== id) return;
    log.debug(`Lock released by ${this.currentLock.holder}`);
    this.currentLock = null;
    this.processQueue();
  }

  private remove(entry: QueueEntry): void {
    clearTimeout(entry.timer);
    entry.signal?.removeEventListener('abort', entry.onAbort);
    this.queue = this.queue.filter((e) => e !== entry);
  }

  private processQueue(): void {
    if (this.currentLock) return;
    const next = this.queue.shift();
    if (!next) return;
    clearTimeout(next.timer);
    next.signal?.removeEventListener('abort', next.onAbort);
    this.currentLock = { id: next.id, holder: next.holder, acquiredAt: new Date() };
    log.debug(`Lock handed to ${next.holder}`);
    next.resolve(next.id);
  }
}
