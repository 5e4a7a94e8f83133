/**
 * Tests for the Source Listener
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SourceListener, toCanonicalMessage } from '../../src/sources/listener';
import { MemoryCursorStore } from '../../src/state';
import type { CursorStore } from '../../src/state';
import type { CanonicalMessage } from '../../src/types';
import { StateStoreError } from '../../src/lib/errors';
import { FakePlatform, HistoryPlatform, platformMessage } from '../helpers/fake-platform';

const FAST_RECONNECT = { baseDelayMs: 1, maxDelayMs: 1 };

async function expectMessage(
  result: Promise<IteratorResult<CanonicalMessage, void>>
): Promise<CanonicalMessage> {
  const next = await result;
  if (next.done) throw new Error('listener ended early');
  return next.value;
}

describe('Source Listener', () => {
  const controllers: AbortController[] = [];

  function shutdownSignal(): AbortSignal {
    const controller = new AbortController();
    controllers.push(controller);
    return controller.signal;
  }

  afterEach(() => {
    for (const controller of controllers.splice(0)) controller.abort();
  });

  describe('toCanonicalMessage', () => {
    it('should keep the configured source id and convert the date', () => {
      const message = toCanonicalMessage('@deals', {
        chatId: '-100777',
        chatUsername: 'deals',
        chatTitle: 'Deals',
        messageId: 12,
        date: 1_700_000_000,
        text: 'Кеды 990₽',
        media: [{ kind: 'photo', fileId: 'file-1' }],
        raw: { any: 'payload' },
      });

      expect(message).toEqual({
        sourceChatId: '@deals',
        messageId: 12,
        timestamp: '2023-11-14T22:13:20.000Z',
        text: 'Кеды 990₽',
        mediaRefs: [{ kind: 'photo', fileId: 'file-1', sourceChatId: '-100777', sourceMessageId: 12 }],
        raw: { any: 'payload' },
        sourceTitle: 'Deals',
      });
    });
  });

  it('should emit live messages in order', async () => {
    const platform = new FakePlatform();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors: new MemoryCursorStore(),
      signal: shutdownSignal(),
    });
    const messages = listener.messages();

    const first = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toEqual(['@deals']));
    platform.emit('@deals', platformMessage('@deals', 1, 'one'));
    platform.emit('@deals', platformMessage('@deals', 2, 'two'));

    expect((await expectMessage(first)).messageId).toBe(1);
    expect((await expectMessage(messages.next())).messageId).toBe(2);
  });

  it('should drop messages at or below the cursor', async () => {
    const platform = new FakePlatform();
    const cursors = new MemoryCursorStore([{ sourceChatId: '@deals', lastProcessedMessageId: 10 }]);
    const listener = new SourceListener({ chatId: '@deals', platform, cursors, signal: shutdownSignal() });
    const messages = listener.messages();

    const first = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.emit('@deals', platformMessage('@deals', 9, 'old'));
    platform.emit('@deals', platformMessage('@deals', 10, 'old'));
    platform.emit('@deals', platformMessage('@deals', 11, 'new'));

    expect((await expectMessage(first)).messageId).toBe(11);
  });

  it('should drop repeated and out-of-order ids', async () => {
    const platform = new FakePlatform();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors: new MemoryCursorStore(),
      signal: shutdownSignal(),
    });
    const messages = listener.messages();

    const first = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.emit('@deals', platformMessage('@deals', 5, 'five'));
    platform.emit('@deals', platformMessage('@deals', 5, 'five again'));
    platform.emit('@deals', platformMessage('@deals', 4, 'late'));
    platform.emit('@deals', platformMessage('@deals', 6, 'six'));

    expect((await expectMessage(first)).messageId).toBe(5);
    expect((await expectMessage(messages.next())).messageId).toBe(6);
  });

  it('should replay history after the cursor before following the live feed', async () => {
    const platform = new HistoryPlatform();
    platform.history.set('@deals', [
      platformMessage('@deals', 3, 'three'),
      platformMessage('@deals', 4, 'four'),
      platformMessage('@deals', 5, 'five'),
    ]);
    const cursors = new MemoryCursorStore([{ sourceChatId: '@deals', lastProcessedMessageId: 3 }]);
    const listener = new SourceListener({ chatId: '@deals', platform, cursors, signal: shutdownSignal() });
    const messages = listener.messages();

    expect((await expectMessage(messages.next())).messageId).toBe(4);
    expect((await expectMessage(messages.next())).messageId).toBe(5);
    expect(platform.historyRequests).toEqual([{ chatId: '@deals', afterMessageId: 3 }]);

    const live = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.emit('@deals', platformMessage('@deals', 5, 'five, live copy'));
    platform.emit('@deals', platformMessage('@deals', 6, 'six'));

    expect((await expectMessage(live)).messageId).toBe(6);
  });

  it('should reconnect from the cursor after the feed drops', async () => {
    const platform = new FakePlatform();
    const cursors = new MemoryCursorStore();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors,
      reconnect: FAST_RECONNECT,
      signal: shutdownSignal(),
    });
    const messages = listener.messages();

    const first = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.emit('@deals', platformMessage('@deals', 5, 'five'));
    expect((await expectMessage(first)).messageId).toBe(5);

    await cursors.advance('@deals', 5);
    const second = messages.next();
    platform.drop('@deals');

    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(2));
    platform.emit('@deals', platformMessage('@deals', 5, 'five again'));
    platform.emit('@deals', platformMessage('@deals', 6, 'six'));

    expect((await expectMessage(second)).messageId).toBe(6);
  });

  it('should re-emit a message the cursor has not passed after reconnecting', async () => {
    const platform = new FakePlatform();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors: new MemoryCursorStore(),
      reconnect: FAST_RECONNECT,
      signal: shutdownSignal(),
    });
    const messages = listener.messages();

    const first = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.emit('@deals', platformMessage('@deals', 8, 'pending'));
    expect((await expectMessage(first)).messageId).toBe(8);

    const second = messages.next();
    platform.drop('@deals');
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(2));
    platform.emit('@deals', platformMessage('@deals', 8, 'pending'));

    expect((await expectMessage(second)).messageId).toBe(8);
  });

  it('should start the backoff over once a feed has come up again', async () => {
    vi.stubEnv('LOG_LEVEL', 'info');
    const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const platform = new FakePlatform();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors: new MemoryCursorStore(),
      reconnect: FAST_RECONNECT,
      signal: shutdownSignal(),
    });
    const messages = listener.messages();

    const next = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    platform.drop('@deals');
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(2));
    platform.drop('@deals');
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(3));
    platform.emit('@deals', platformMessage('@deals', 1, 'one'));
    expect((await expectMessage(next)).messageId).toBe(1);

    const reconnects = output.mock.calls
      .map(([line]) => String(line))
      .filter(line => line.includes('Reconnecting'));
    output.mockRestore();
    vi.unstubAllEnvs();
    expect(reconnects).toHaveLength(2);
    for (const line of reconnects) expect(line).toContain('"attempt":1,');
  });

  it('should replay from the cursor at once when asked to resync', async () => {
    const platform = new HistoryPlatform();
    platform.history.set('@deals', [platformMessage('@deals', 4, 'four')]);
    const cursors = new MemoryCursorStore([{ sourceChatId: '@deals', lastProcessedMessageId: 3 }]);
    const listener = new SourceListener({ chatId: '@deals', platform, cursors, signal: shutdownSignal() });
    const messages = listener.messages();

    expect((await expectMessage(messages.next())).messageId).toBe(4);
    const replayed = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    listener.resync();

    expect((await expectMessage(replayed)).messageId).toBe(4);
    expect(platform.historyRequests).toEqual([
      { chatId: '@deals', afterMessageId: 3 },
      { chatId: '@deals', afterMessageId: 3 },
    ]);
  });

  it('should stop cleanly when the signal aborts', async () => {
    const platform = new FakePlatform();
    const controller = new AbortController();
    const listener = new SourceListener({
      chatId: '@deals',
      platform,
      cursors: new MemoryCursorStore(),
      signal: controller.signal,
    });
    const messages = listener.messages();

    const next = messages.next();
    await vi.waitFor(() => expect(platform.subscriptions).toHaveLength(1));
    controller.abort();

    await expect(next).resolves.toEqual({ done: true, value: undefined });
  });

  it('should propagate cursor store failures', async () => {
    const cursors: CursorStore = {
      get: async () => {
        throw new StateStoreError('disk gone');
      },
      advance: async () => 0,
      list: async () => [],
    };
    const listener = new SourceListener({
      chatId: '@deals',
      platform: new FakePlatform(),
      cursors,
      signal: shutdownSignal(),
    });

    await expect(listener.messages().next()).rejects.toBeInstanceOf(StateStoreError);
  });
});
