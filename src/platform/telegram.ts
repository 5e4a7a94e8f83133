/**
 * DealRelay — Telegram Client
 *
 * PlatformClient over a Telegram user session (MTProto). A user account
 * reads any channel it has joined without admin rights, and the channel
 * history stays readable, so a restarted listener replays everything
 * after its cursor, including a message whose publish failed.
 *
 * Transport and session live behind TelegramGateway (./mtproto); this
 * class owns subscriptions, message conversion and error mapping.
 */

import { z } from 'zod';
import type { MediaKind, MediaRef } from '../types';
import { AsyncQueue } from '../lib/async-queue';
import { ListenerError, PublishError, RelayError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { FeedOptions, PlatformClient, PlatformMedia, PlatformMessage, SentMessage } from './types';

// ============================================================
// GATEWAY CONTRACT
// ============================================================

/** Telegram limit for a single text message */
export const TELEGRAM_TEXT_LIMIT = 4096;

/**
 * The fields read from an MTProto message. Media getters are set only for
 * the kind the message carries.
 */
export interface TelegramMessageLike {
  id: number;
  /** Unix seconds */
  date: number;
  message: string;
  photo?: unknown;
  video?: unknown;
  gif?: unknown;
  audio?: unknown;
  voice?: unknown;
  document?: unknown;
}

export interface IncomingMessage {
  /** Marked peer id as reported by Telegram */
  chatId: string;
  chatTitle?: string;
  chatUsername?: string;
  message: TelegramMessageLike;
}

export interface TelegramGateway {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Registers a live handler for one chat; the returned function removes it */
  onNewMessage(chat: string, handler: (incoming: IncomingMessage) => void): () => void;
  /** Messages with id above `afterMessageId`, oldest first */
  history(chat: string, afterMessageId: number): AsyncIterable<IncomingMessage>;
  getTitle(chat: string): Promise<string | null>;
  /** Returns the new message id */
  sendMessage(chat: string, text: string): Promise<number>;
  /** Returns the id of the copy in `toChat` */
  forwardMessage(toChat: string, fromChat: string, messageId: number): Promise<number>;
}

// ============================================================
// CONVERSION HELPERS
// ============================================================

// Most specific first: a video or gif is also a document
const MEDIA_KINDS: Array<[MediaKind, keyof TelegramMessageLike]> = [
  ['photo', 'photo'],
  ['animation', 'gif'],
  ['video', 'video'],
  ['voice', 'voice'],
  ['audio', 'audio'],
  ['document', 'document'],
];

function extractMedia(message: TelegramMessageLike): PlatformMedia[] {
  for (const [kind, field] of MEDIA_KINDS) {
    if (message[field] !== undefined && message[field] !== null) {
      return [{ kind, fileId: `${kind}:${message.id}` }];
    }
  }
  return [];
}

export function toPlatformMessage(incoming: IncomingMessage): PlatformMessage {
  const { message } = incoming;
  return {
    chatId: incoming.chatId,
    chatUsername: incoming.chatUsername,
    chatTitle: incoming.chatTitle,
    messageId: message.id,
    date: message.date,
    text: message.message,
    media: extractMedia(message),
    raw: message,
  };
}

/**
 * Split text into chunks no longer than `limit`, preferring line breaks.
 */
export function splitText(text: string, limit: number = TELEGRAM_TEXT_LIMIT): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const window = rest.slice(0, limit);
    const breakAt = window.lastIndexOf('\n');
    const cut = breakAt > limit / 2 ? breakAt + 1 : limit;
    chunks.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut);
  }
  if (rest.trim().length > 0) chunks.push(rest);
  return chunks;
}

// ============================================================
// ERROR MAPPING
// ============================================================

// Shape of an MTProto RPC error; flood waits carry `seconds`
const RpcErrorSchema = z.object({
  code: z.number().optional(),
  errorMessage: z.string().optional(),
  seconds: z.number().optional(),
});

/**
 * Flood waits, server errors and transport failures are transient.
 * Any other RPC error (no rights, unknown chat, bad request) is permanent.
 */
export function toPublishError(operation: string, error: unknown): PublishError {
  if (error instanceof PublishError) return error;

  const parsed = RpcErrorSchema.safeParse(error);
  const rpc = parsed.success ? parsed.data : {};
  const message = `Telegram ${operation} failed: ${describeError(error)}`;

  if (rpc.seconds !== undefined) {
    return new PublishError(message, { transient: true, retryAfterMs: rpc.seconds * 1000, cause: error });
  }
  if (rpc.code === undefined) {
    return new PublishError(message, { transient: true, cause: error });
  }
  return new PublishError(message, { transient: rpc.code === 420 || rpc.code >= 500, cause: error });
}

// ============================================================
// CLIENT
// ============================================================

export class TelegramUserClient implements PlatformClient {
  private readonly log = logger.child({ component: 'telegram' });
  /** Cleanup for every live subscription */
  private readonly releases = new Set<() => void>();
  private closed = false;

  constructor(private readonly gateway: TelegramGateway) {}

  async connect(): Promise<void> {
    await this.gateway.connect();
  }

  get subscriptionCount(): number {
    return this.releases.size;
  }

  subscribe(chatId: string, options: FeedOptions = {}): AsyncIterable<PlatformMessage> {
    const queue = new AsyncQueue<PlatformMessage>();
    const { signal } = options;
    if (this.closed || signal?.aborted) {
      queue.close();
      return queue;
    }

    // The handler is registered now, so messages arriving while the
    // caller replays history are buffered rather than missed
    const detach = this.gateway.onNewMessage(chatId, incoming => {
      queue.push(toPlatformMessage(incoming));
    });
    const release = (): void => {
      if (!this.releases.delete(release)) return;
      detach();
      signal?.removeEventListener('abort', release);
      queue.close();
    };
    this.releases.add(release);
    signal?.addEventListener('abort', release, { once: true });

    return {
      [Symbol.asyncIterator]: () => ({
        next: () => queue.next(),
        return: async () => {
          release();
          return { done: true, value: undefined };
        },
      }),
    };
  }

  async *fetchHistory(
    chatId: string,
    afterMessageId: number | null,
    options: FeedOptions = {}
  ): AsyncGenerator<PlatformMessage, void, undefined> {
    // Without a cursor there is nothing to resume; start from the live feed
    if (afterMessageId === null) return;

    try {
      for await (const incoming of this.gateway.history(chatId, afterMessageId)) {
        if (options.signal?.aborted) return;
        yield toPlatformMessage(incoming);
      }
    } catch (error) {
      if (error instanceof RelayError) throw error;
      throw new ListenerError(`History replay failed: ${describeError(error)}`, chatId, { cause: error });
    }
  }

  async getChatTitle(chatId: string): Promise<string | null> {
    return this.gateway.getTitle(chatId);
  }

  async sendText(chatId: string, text: string): Promise<SentMessage> {
    let first: SentMessage | null = null;
    for (const chunk of splitText(text)) {
      const messageId = await this.call('sendMessage', () => this.gateway.sendMessage(chatId, chunk));
      first ??= { messageId: String(messageId) };
    }
    if (!first) {
      throw new PublishError('Refusing to send an empty text message', { transient: false });
    }
    return first;
  }

  async forwardMedia(chatId: string, media: MediaRef): Promise<SentMessage> {
    const messageId = await this.call('forwardMessages', () =>
      this.gateway.forwardMessage(chatId, media.sourceChatId, media.sourceMessageId)
    );
    return { messageId: String(messageId) };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    for (const release of [...this.releases]) release();
    await this.gateway.disconnect();
    this.log.info('Disconnected');
  }

  private async call<T>(operation: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      throw toPublishError(operation, error);
    }
  }
}
