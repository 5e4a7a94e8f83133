/**
 * Tests for In-memory State Stores
 */

import { describe, it, expect } from 'vitest';
import { MemoryCursorStore, MemoryDedupLedger } from '../../src/state';
import type { DedupEntry } from '../../src/types';

const entry = (messageId: number, overrides: Partial<DedupEntry> = {}): DedupEntry => ({
  sourceChatId: '@deals',
  messageId,
  outcome: 'published',
  publishedTargetMessageId: `t${messageId}`,
  decidedAt: '2026-01-01T00:00:00.000Z',
  ...overrides,
});

describe('In-memory State Stores', () => {
  describe('MemoryCursorStore', () => {
    it('should return null for an unknown source', async () => {
      const store = new MemoryCursorStore();

      await expect(store.get('@deals')).resolves.toBeNull();
    });

    it('should never move a cursor backwards', async () => {
      const store = new MemoryCursorStore([{ sourceChatId: '@deals', lastProcessedMessageId: 10 }]);

      await expect(store.advance('@deals', 7)).resolves.toBe(10);
      await expect(store.advance('@deals', 12)).resolves.toBe(12);
      await expect(store.get('@deals')).resolves.toBe(12);
    });

    it('should keep sources independent', async () => {
      const store = new MemoryCursorStore();
      await store.advance('@a', 5);
      await store.advance('@b', 2);

      await expect(store.list()).resolves.toEqual([
        { sourceChatId: '@a', lastProcessedMessageId: 5 },
        { sourceChatId: '@b', lastProcessedMessageId: 2 },
      ]);
    });
  });

  describe('MemoryDedupLedger', () => {
    it('should refuse to overwrite an entry', async () => {
      const ledger = new MemoryDedupLedger();

      await expect(ledger.record(entry(1))).resolves.toBe(true);
      await expect(ledger.record(entry(1, { outcome: 'rejected' }))).resolves.toBe(false);
      await expect(ledger.get({ sourceChatId: '@deals', messageId: 1 })).resolves.toMatchObject({
        outcome: 'published',
      });
    });

    it('should key entries by source and message id', async () => {
      const ledger = new MemoryDedupLedger([entry(1)]);

      await expect(ledger.get({ sourceChatId: '@other', messageId: 1 })).resolves.toBeNull();
    });

    it('should find published entries by fingerprint only', async () => {
      const ledger = new MemoryDedupLedger([
        entry(1, { outcome: 'rejected', fingerprint: 'abc' }),
        entry(2, { fingerprint: 'def' }),
      ]);

      await expect(ledger.findPublishedByFingerprint('abc')).resolves.toBeNull();
      await expect(ledger.findPublishedByFingerprint('def')).resolves.toMatchObject({ messageId: 2 });
    });
  });
});
