/**
 * DealRelay — State Store Interfaces
 *
 * The pipeline orchestrator is the only writer. Every method either
 * resolves after the write is durable or rejects with StateStoreError.
 */

import type { Cursor, DedupEntry, MessageIdentity } from '../types';

export interface CursorStore {
  /** Last processed message id for a source, or null if never advanced */
  get(sourceChatId: string): Promise<number | null>;
  /**
   * Move the cursor to max(current, messageId). Never regresses.
   * Resolves with the stored value.
   */
  advance(sourceChatId: string, messageId: number): Promise<number>;
  list(): Promise<Cursor[]>;
}

export interface DedupLedger {
  get(identity: MessageIdentity): Promise<DedupEntry | null>;
  /**
   * Write an entry unless one already exists for the identity.
   * Resolves true when written, false when an entry was already present.
   */
  record(entry: DedupEntry): Promise<boolean>;
  findPublishedByFingerprint(fingerprint: string): Promise<DedupEntry | null>;
}

export interface StateStores {
  cursors: CursorStore;
  ledger: DedupLedger;
  close(): Promise<void>;
}
