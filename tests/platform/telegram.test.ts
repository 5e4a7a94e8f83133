/**
 * Tests for the Telegram Client
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { getEventListeners } from 'events';
import {
  TelegramUserClient,
  splitText,
  toPlatformMessage,
  toPublishError,
} from '../../src/platform/telegram';
import type { PlatformMessage } from '../../src/platform/types';
import { ListenerError, PublishError } from '../../src/lib/errors';
import { FakeTelegramGateway, RpcError, incomingMessage } from '../helpers/fake-telegram';

async function collect(feed: AsyncIterable<PlatformMessage>): Promise<number[]> {
  const ids: number[] = [];
  for await (const message of feed) ids.push(message.messageId);
  return ids;
}

describe('Telegram Client', () => {
  let gateway: FakeTelegramGateway;
  let client: TelegramUserClient;

  beforeEach(() => {
    gateway = new FakeTelegramGateway();
    client = new TelegramUserClient(gateway);
  });

  describe('toPlatformMessage', () => {
    it('should carry chat details, text and date', () => {
      const message = toPlatformMessage(incomingMessage('-100777', 12, 'Кеды 990₽'));

      expect(message).toMatchObject({
        chatId: '-100777',
        chatTitle: 'Deals',
        chatUsername: 'deals',
        messageId: 12,
        date: 1_700_000_012,
        text: 'Кеды 990₽',
        media: [],
      });
    });

    it('should describe a photo by its message id', () => {
      const message = toPlatformMessage(incomingMessage('-100777', 7, '', { photo: { id: 1 } }));

      expect(message.media).toEqual([{ kind: 'photo', fileId: 'photo:7' }]);
    });

    it('should prefer the gif over its document copy', () => {
      const message = toPlatformMessage(
        incomingMessage('-100777', 8, 'gif', { gif: { id: 2 }, document: { id: 2 } })
      );

      expect(message.media).toEqual([{ kind: 'animation', fileId: 'animation:8' }]);
    });
  });

  describe('splitText', () => {
    it('should keep short text whole', () => {
      expect(splitText('hello', 10)).toEqual(['hello']);
    });

    it('should break at a late newline when there is one', () => {
      expect(splitText('aaaaaaa\nbbbbbbb', 10)).toEqual(['aaaaaaa', 'bbbbbbb']);
    });

    it('should cut hard when there is no usable newline', () => {
      expect(splitText('abcdefghijkl', 5)).toEqual(['abcde', 'fghij', 'kl']);
    });
  });

  describe('toPublishError', () => {
    it('should treat flood waits as transient with the wait hint', () => {
      const error = toPublishError('sendMessage', new RpcError(420, 'FLOOD', 7));

      expect(error.transient).toBe(true);
      expect(error.retryAfterMs).toBe(7000);
      expect(error.message).toBe('Telegram sendMessage failed: 420: FLOOD');
    });

    it('should treat rejected requests as permanent', () => {
      const error = toPublishError('sendMessage', new RpcError(403, 'CHAT_WRITE_FORBIDDEN'));

      expect(error.transient).toBe(false);
      expect(error.retryAfterMs).toBeUndefined();
    });

    it('should treat server errors as transient', () => {
      expect(toPublishError('sendMessage', new RpcError(500, 'INTERNAL')).transient).toBe(true);
    });

    it('should treat transport failures as transient', () => {
      expect(toPublishError('sendMessage', new Error('Not connected')).transient).toBe(true);
    });

    it('should pass a PublishError through', () => {
      const original = new PublishError('no rights', { transient: false });

      expect(toPublishError('sendMessage', original)).toBe(original);
    });
  });

  describe('subscribe', () => {
    it('should deliver live posts of the subscribed chat only', async () => {
      const controller = new AbortController();
      const feed = client.subscribe('@deals', { signal: controller.signal });

      gateway.post('@deals', incomingMessage('-100777', 1, 'one'));
      gateway.post('@other', incomingMessage('-100888', 9, 'other'));
      gateway.post('@deals', incomingMessage('-100777', 2, 'two'));
      controller.abort();

      await expect(collect(feed)).resolves.toEqual([1, 2]);
    });

    it('should detach from the gateway when the consumer stops', async () => {
      const feed = client.subscribe('@deals');
      gateway.post('@deals', incomingMessage('-100777', 1, 'one'));

      for await (const message of feed) {
        expect(message.messageId).toBe(1);
        break;
      }

      expect(gateway.handlerCount('@deals')).toBe(0);
      expect(client.subscriptionCount).toBe(0);
    });

    it('should leave no abort listeners behind across resubscriptions', async () => {
      const controller = new AbortController();

      for (let i = 0; i < 50; i++) {
        const feed = client.subscribe('@deals', { signal: controller.signal });
        await feed[Symbol.asyncIterator]().return?.();
      }

      expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
      expect(gateway.handlerCount('@deals')).toBe(0);
      expect(client.subscriptionCount).toBe(0);
    });

    it('should detach when the signal aborts', () => {
      const controller = new AbortController();
      client.subscribe('@deals', { signal: controller.signal });
      expect(gateway.handlerCount('@deals')).toBe(1);

      controller.abort();

      expect(gateway.handlerCount('@deals')).toBe(0);
      expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
    });

    it('should end every feed on close', async () => {
      const feed = client.subscribe('@deals');
      gateway.post('@deals', incomingMessage('-100777', 1, 'one'));

      await client.close();

      await expect(collect(feed)).resolves.toEqual([1]);
      expect(gateway.handlerCount('@deals')).toBe(0);
      expect(gateway.connected).toBe(false);
    });
  });

  describe('fetchHistory', () => {
    it('should replay posts after the cursor, oldest first', async () => {
      for (const id of [9, 10, 11, 12]) gateway.post('@deals', incomingMessage('-100777', id, `post ${id}`));

      await expect(collect(client.fetchHistory('@deals', 10))).resolves.toEqual([11, 12]);
      expect(gateway.historyRequests).toEqual([{ chat: '@deals', afterMessageId: 10 }]);
    });

    it('should not replay anything without a cursor', async () => {
      gateway.post('@deals', incomingMessage('-100777', 1, 'old'));

      await expect(collect(client.fetchHistory('@deals', null))).resolves.toEqual([]);
      expect(gateway.historyRequests).toEqual([]);
    });

    it('should report replay failures as a ListenerError', async () => {
      gateway.historyFailure = new Error('CHANNEL_PRIVATE');

      await expect(collect(client.fetchHistory('@deals', 5))).rejects.toBeInstanceOf(ListenerError);
    });
  });

  describe('sendText', () => {
    it('should send the text and return the message id', async () => {
      const sent = await client.sendText('@relay', 'Кеды 990₽');

      expect(sent).toEqual({ messageId: '500' });
      expect(gateway.sent).toEqual([{ chat: '@relay', text: 'Кеды 990₽', id: 500 }]);
    });

    it('should split long text and return the first message id', async () => {
      const text = `${'a'.repeat(3000)}\n${'b'.repeat(3000)}`;

      const sent = await client.sendText('@relay', text);

      expect(sent).toEqual({ messageId: '500' });
      expect(gateway.sent.map(s => s.text.length)).toEqual([3000, 3000]);
    });

    it('should map platform errors to a PublishError', async () => {
      gateway.failSends(new RpcError(403, 'CHAT_WRITE_FORBIDDEN'));

      const error = await client.sendText('@relay', 'text').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PublishError);
      expect(error).toMatchObject({ transient: false });
    });
  });

  describe('forwardMedia', () => {
    it('should forward the source message to the destination', async () => {
      const sent = await client.forwardMedia('@relay', {
        kind: 'photo',
        fileId: 'photo:7',
        sourceChatId: '-100777',
        sourceMessageId: 7,
      });

      expect(sent).toEqual({ messageId: '500' });
      expect(gateway.forwarded).toEqual([{ toChat: '@relay', fromChat: '-100777', messageId: 7, id: 500 }]);
    });
  });

  describe('getChatTitle', () => {
    it('should return the title the gateway resolves', async () => {
      gateway.titles.set('@deals', 'Скидки дня');

      await expect(client.getChatTitle('@deals')).resolves.toBe('Скидки дня');
      await expect(client.getChatTitle('@unknown')).resolves.toBeNull();
    });
  });
});
