/**
 * DealRelay — In-memory State Stores
 *
 * Non-durable; used by tests and by dry runs that should leave no trace.
 */

import type { Cursor, DedupEntry, MessageIdentity } from '../types';
import { identityKey } from '../types';
import type { CursorStore, DedupLedger, StateStores } from './interface';

export class MemoryCursorStore implements CursorStore {
  private readonly cursors = new Map<string, number>();

  constructor(initial: Cursor[] = []) {
    for (const cursor of initial) {
      this.cursors.set(cursor.sourceChatId, cursor.lastProcessedMessageId);
    }
  }

  async get(sourceChatId: string): Promise<number | null> {
    return this.cursors.get(sourceChatId) ?? null;
  }

  async advance(sourceChatId: string, messageId: number): Promise<number> {
    const current = this.cursors.get(sourceChatId);
    const next = current === undefined ? messageId : Math.max(current, messageId);
    this.cursors.set(sourceChatId, next);
    return next;
  }

  async list(): Promise<Cursor[]> {
    return Array.from(this.cursors, ([sourceChatId, lastProcessedMessageId]) => ({
      sourceChatId,
      lastProcessedMessageId,
    }));
  }
}

export class MemoryDedupLedger implements DedupLedger {
  private readonly entries = new Map<string, DedupEntry>();

  constructor(initial: DedupEntry[] = []) {
    for (const entry of initial) {
      this.entries.set(identityKey(entry), entry);
    }
  }

  async get(identity: MessageIdentity): Promise<DedupEntry | null> {
    return this.entries.get(identityKey(identity)) ?? null;
  }

  async record(entry: DedupEntry): Promise<boolean> {
    const key = identityKey(entry);
    if (this.entries.has(key)) return false;
    this.entries.set(key, { ...entry });
    return true;
  }

  async findPublishedByFingerprint(fingerprint: string): Promise<DedupEntry | null> {
    for (const entry of this.entries.values()) {
      if (entry.outcome === 'published' && entry.fingerprint === fingerprint) {
        return entry;
      }
    }
    return null;
  }

  all(): DedupEntry[] {
    return Array.from(this.entries.values());
  }
}

export function createMemoryStores(): StateStores & {
  cursors: MemoryCursorStore;
  ledger: MemoryDedupLedger;
} {
  return {
    cursors: new MemoryCursorStore(),
    ledger: new MemoryDedupLedger(),
    close: async () => {},
  };
}
