/**
 * DealRelay — Source Listener
 *
 * Turns one source channel into a lazy, ordered stream of canonical
 * messages. Position comes from the cursor store only, so a listener can
 * be rebuilt at any time:
 * 1. read the cursor
 * 2. replay what the platform still has after it (when supported)
 * 3. follow the live feed
 * On disconnect it waits with capped exponential backoff and starts
 * again from step 1; `resync()` starts again at once. Messages re-emitted
 * after a restart are skipped downstream by the dedup ledger; a message
 * still pending there gets retried.
 */

import type { CanonicalMessage } from '../types';
import type { PlatformClient, PlatformMessage } from '../platform/types';
import type { CursorStore } from '../state';
import { isFatal, describeError } from '../lib/errors';
import { backoffDelay, sleep } from '../lib/retry';
import { logger, type Logger } from '../lib/logger';

export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface SourceListenerOptions {
  chatId: string;
  platform: PlatformClient;
  cursors: CursorStore;
  reconnect?: Partial<ReconnectPolicy>;
  signal?: AbortSignal;
}

const DEFAULT_RECONNECT: ReconnectPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 60_000,
};

export function toCanonicalMessage(sourceChatId: string, message: PlatformMessage): CanonicalMessage {
  return {
    sourceChatId,
    messageId: message.messageId,
    timestamp: new Date(message.date * 1000).toISOString(),
    text: message.text,
    mediaRefs: message.media.map(media => ({
      kind: media.kind,
      fileId: media.fileId,
      sourceChatId: message.chatId,
      sourceMessageId: message.messageId,
    })),
    raw: message.raw,
    sourceTitle: message.chatTitle,
  };
}

export class SourceListener implements AsyncIterable<CanonicalMessage> {
  readonly chatId: string;
  private readonly platform: PlatformClient;
  private readonly cursors: CursorStore;
  private readonly reconnect: ReconnectPolicy;
  private readonly signal?: AbortSignal;
  private readonly log: Logger;

  /** Ends the current feed attempt; null between attempts */
  private attempt: AbortController | null = null;
  private resyncRequested = false;

  constructor(options: SourceListenerOptions) {
    this.chatId = options.chatId;
    this.platform = options.platform;
    this.cursors = options.cursors;
    this.reconnect = { ...DEFAULT_RECONNECT, ...options.reconnect };
    this.signal = options.signal;
    this.log = logger.child({ component: 'listener', source: options.chatId });
  }

  [Symbol.asyncIterator](): AsyncIterator<CanonicalMessage> {
    return this.messages();
  }

  /**
   * Restart from the cursor without waiting for a disconnect. Used to
   * replay a message whose publish failed.
   */
  resync(): void {
    if (!this.attempt || this.attempt.signal.aborted) return;
    this.resyncRequested = true;
    this.attempt.abort();
  }

  async *messages(): AsyncGenerator<CanonicalMessage, void, undefined> {
    let failures = 0;

    while (!this.signal?.aborted) {
      // Cursor read failures are fatal and propagate
      const resumeAfter = await this.cursors.get(this.chatId);
      let lastSeen = resumeAfter;
      const isNew = (message: PlatformMessage): boolean =>
        lastSeen === null || message.messageId > lastSeen;

      this.log.info('Listening', { resumeAfter, attempt: failures + 1 });

      const attempt = new AbortController();
      const stop = (): void => attempt.abort();
      this.signal?.addEventListener('abort', stop, { once: true });
      this.attempt = attempt;

      try {
        // Subscribed before the replay so nothing posted meanwhile is missed
        const live = this.platform.subscribe(this.chatId, { signal: attempt.signal });

        if (this.platform.fetchHistory) {
          for await (const message of this.platform.fetchHistory(this.chatId, resumeAfter, {
            signal: attempt.signal,
          })) {
            if (!isNew(message)) continue;
            lastSeen = message.messageId;
            yield toCanonicalMessage(this.chatId, message);
          }
        }
        failures = 0;

        for await (const message of live) {
          if (!isNew(message)) {
            this.log.debug('Dropping already seen message', { messageId: message.messageId });
            continue;
          }
          lastSeen = message.messageId;
          yield toCanonicalMessage(this.chatId, message);
        }

        if (attempt.signal.aborted) {
          if (this.signal?.aborted) break;
          if (this.takeResync()) continue;
        }
        this.log.warn('Feed ended unexpectedly');
      } catch (error) {
        if (isFatal(error)) throw error;
        if (this.signal?.aborted) break;
        if (this.takeResync()) continue;
        this.log.warn('Feed interrupted', { error: describeError(error) });
      } finally {
        this.signal?.removeEventListener('abort', stop);
        attempt.abort();
        if (this.attempt === attempt) this.attempt = null;
      }

      failures++;
      const delayMs = backoffDelay(failures, this.reconnect.baseDelayMs, this.reconnect.maxDelayMs);
      this.log.info('Reconnecting', { attempt: failures, delayMs });
      await sleep(delayMs, this.signal);
    }

    this.log.info('Listener stopped');
  }

  private takeResync(): boolean {
    if (!this.resyncRequested) return false;
    this.resyncRequested = false;
    this.log.info('Resyncing from cursor');
    return true;
  }
}
