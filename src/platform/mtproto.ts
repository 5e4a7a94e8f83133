/**
 * DealRelay — MTProto Gateway
 *
 * TelegramGateway on GramJS with a StringSession. The session string is
 * created once with `npm run login` and kept in TG_SESSION.
 *
 * Chat references are `@username` or a marked numeric id (-100...).
 * Numeric ids resolve only for chats the account has seen, so usernames
 * are the safer choice for sources.
 */

import bigInt from 'big-integer';
import { Api, TelegramClient } from 'telegram';
import { NewMessage, type NewMessageEvent } from 'telegram/events';
import { LogLevel } from 'telegram/extensions/Logger';
import { StringSession } from 'telegram/sessions';
import { ConfigError, PublishError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { IncomingMessage, TelegramGateway } from './telegram';

export interface MtprotoOptions {
  apiId: number;
  apiHash: string;
  session: string;
  connectionRetries?: number;
}

export function createTelegramClient(options: MtprotoOptions, session: StringSession): TelegramClient {
  const client = new TelegramClient(session, options.apiId, options.apiHash, {
    connectionRetries: options.connectionRetries ?? 5,
  });
  // GramJS logs every reconnect at info level on its own
  client.setLogLevel(LogLevel.ERROR);
  return client;
}

export function toEntity(ref: string): string | bigInt.BigInteger {
  const trimmed = ref.trim();
  return /^-?\d+$/.test(trimmed) ? bigInt(trimmed) : trimmed;
}

function describeMessage(message: Api.Message): IncomingMessage {
  const chat = message.chat;
  const isGroupLike = chat instanceof Api.Channel || chat instanceof Api.Chat;
  return {
    chatId: message.chatId?.toString() ?? '',
    chatTitle: isGroupLike ? chat.title : undefined,
    chatUsername: chat instanceof Api.Channel ? chat.username : undefined,
    message,
  };
}

export class GramJsGateway implements TelegramGateway {
  private readonly client: TelegramClient;
  private readonly log = logger.child({ component: 'mtproto' });

  constructor(options: MtprotoOptions) {
    this.client = createTelegramClient(options, new StringSession(options.session));
  }

  async connect(): Promise<void> {
    await this.client.connect();
    if (!(await this.client.checkAuthorization())) {
      throw new ConfigError('Telegram session is not authorized', [
        'create TG_SESSION with `npm run login` using the same TG_API_ID and TG_API_HASH',
      ]);
    }
    const me = await this.client.getMe();
    this.log.info('Connected', { user: me.username ?? me.id.toString() });
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  onNewMessage(chat: string, handler: (incoming: IncomingMessage) => void): () => void {
    const event = new NewMessage({ chats: [toEntity(chat)] });
    const callback = (update: NewMessageEvent): void => {
      try {
        handler(describeMessage(update.message));
      } catch (error) {
        this.log.warn('Dropping unreadable update', { chat, error: describeError(error) });
      }
    };
    this.client.addEventHandler(callback, event);
    return () => this.client.removeEventHandler(callback, event);
  }

  async *history(chat: string, afterMessageId: number): AsyncGenerator<IncomingMessage, void, undefined> {
    for await (const item of this.client.iterMessages(toEntity(chat), {
      minId: afterMessageId,
      reverse: true,
    })) {
      // Service messages (pins, title changes) carry no post
      if (item instanceof Api.Message) yield describeMessage(item);
    }
  }

  async getTitle(chat: string): Promise<string | null> {
    const entity = await this.client.getEntity(toEntity(chat));
    if (entity instanceof Api.Channel || entity instanceof Api.Chat) return entity.title;
    if (entity instanceof Api.User) {
      const name = [entity.firstName, entity.lastName].filter(Boolean).join(' ');
      return name || null;
    }
    return null;
  }

  async sendMessage(chat: string, text: string): Promise<number> {
    const sent = await this.client.sendMessage(toEntity(chat), { message: text });
    return sent.id;
  }

  async forwardMessage(toChat: string, fromChat: string, messageId: number): Promise<number> {
    const [copy] = await this.client.forwardMessages(toEntity(toChat), {
      messages: [messageId],
      fromPeer: toEntity(fromChat),
    });
    if (!copy) {
      throw new PublishError(`Forward of message ${messageId} returned nothing`, { transient: false });
    }
    return copy.id;
  }
}
