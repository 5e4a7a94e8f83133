/**
 * DealRelay — Publisher
 *
 * Sends accepted messages to the destination channel: one text post, then
 * one forward per media item. Publishes run strictly one at a time, so the
 * destination sees posts in decision order.
 *
 * Each network op is retried on transient failures with capped exponential
 * backoff. A platform `retry_after` hint is honoured when larger than the
 * computed delay. Permanent failures surface immediately.
 */

import { nanoid } from 'nanoid';
import type { CanonicalMessage, ScoreResult } from '../types';
import type { PlatformClient, SentMessage } from '../platform/types';
import { PublishError, describeError } from '../lib/errors';
import { withRetry } from '../lib/retry';
import type { RetryOptions } from '../lib/retry';
import { logger } from '../lib/logger';
import { composePost, preview } from './format';
import type { TextRewriter } from './rewriter';

const log = logger.child({ component: 'publisher' });

export interface PublishOptions {
  dryRun: boolean;
  score?: ScoreResult;
}

export interface PublishOutcome {
  /** Id of the first destination post; synthetic in dry-run */
  targetMessageId: string;
  dryRun: boolean;
  /** Network ops that reached the destination */
  operations: number;
}

/**
 * What the orchestrator depends on. Tests substitute their own.
 */
export interface MessagePublisher {
  publish(message: CanonicalMessage, options: PublishOptions): Promise<PublishOutcome>;
}

export type PublishRetryPolicy = Pick<RetryOptions, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs'>;

export interface PublisherOptions {
  platform: PlatformClient;
  destination: string;
  retry?: Partial<PublishRetryPolicy>;
  signal?: AbortSignal;
  /** Restates the message text before the header is added */
  rewriter?: TextRewriter;
}

const DEFAULT_PUBLISH_RETRY: PublishRetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
};

function toPublishError(error: unknown, operation: string): PublishError {
  if (error instanceof PublishError) return error;
  return new PublishError(`${operation} failed: ${describeError(error)}`, {
    transient: false,
    cause: error,
  });
}

export class Publisher implements MessagePublisher {
  private readonly platform: PlatformClient;
  private readonly destination: string;
  private readonly retry: PublishRetryPolicy;
  private readonly signal?: AbortSignal;
  private readonly rewriter?: TextRewriter;
  private readonly titles = new Map<string, string>();
  private tail: Promise<unknown> = Promise.resolve();

  constructor(options: PublisherOptions) {
    this.platform = options.platform;
    this.destination = options.destination;
    this.retry = { ...DEFAULT_PUBLISH_RETRY, ...options.retry };
    this.signal = options.signal;
    this.rewriter = options.rewriter;
  }

  publish(message: CanonicalMessage, options: PublishOptions): Promise<PublishOutcome> {
    const run = this.tail.then(() => this.publishNow(message, options));
    // The chain only orders calls; each caller still gets its own rejection
    this.tail = run.catch(() => undefined);
    return run;
  }

  /**
   * Source title for the header. A found title is cached per source;
   * the chat id fallback is not, so the next message looks again.
   */
  async resolveTitle(message: CanonicalMessage): Promise<string> {
    const cached = this.titles.get(message.sourceChatId);
    if (cached) return cached;

    let title = message.sourceTitle;
    if (!title) {
      try {
        title = (await this.platform.getChatTitle(message.sourceChatId)) ?? undefined;
      } catch (error) {
        log.warn('Chat title lookup failed', {
          source: message.sourceChatId,
          error: describeError(error),
        });
      }
    }

    if (!title) return message.sourceChatId;
    this.titles.set(message.sourceChatId, title);
    return title;
  }

  private async publishNow(message: CanonicalMessage, options: PublishOptions): Promise<PublishOutcome> {
    const title = await this.resolveTitle(message);
    const body = this.rewriter ? await this.rewriter.rewrite(message.text) : message.text;
    const text = composePost({ ...message, text: body }, title, options.score);
    const context = { source: message.sourceChatId, messageId: message.messageId };

    if (options.dryRun) {
      const targetMessageId = `dry-run-${nanoid(10)}`;
      log.info('[DRY_RUN] Would publish', {
        ...context,
        destination: this.destination,
        media: message.mediaRefs.length,
        preview: preview(text),
      });
      return { targetMessageId, dryRun: true, operations: 0 };
    }

    const sent: SentMessage[] = [];

    if (text.length > 0) {
      sent.push(await this.attempt('sendText', () => this.platform.sendText(this.destination, text)));
    }
    for (const media of message.mediaRefs) {
      sent.push(
        await this.attempt(`forward ${media.kind}`, () => this.platform.forwardMedia(this.destination, media))
      );
    }

    const [first] = sent;
    if (!first) {
      throw new PublishError('Message has neither text nor media', { transient: false });
    }

    log.debug('Published to destination', { ...context, operations: sent.length });
    return { targetMessageId: first.messageId, dryRun: false, operations: sent.length };
  }

  private attempt(operation: string, send: () => Promise<SentMessage>): Promise<SentMessage> {
    return withRetry(
      async () => {
        try {
          return await send();
        } catch (error) {
          throw toPublishError(error, operation);
        }
      },
      {
        ...this.retry,
        signal: this.signal,
        shouldRetry: error => error instanceof PublishError && error.transient,
        retryAfterMs: error => (error instanceof PublishError ? error.retryAfterMs : undefined),
        onRetry: ({ attempt, delayMs, error }) => {
          log.warn('Publish op failed, retrying', {
            operation,
            attempt,
            delayMs,
            error: describeError(error),
          });
        },
      }
    );
  }
}
