/**
 * DealRelay — File-backed State Stores
 *
 * Layout under the state directory:
 * - cursors.json: `{ "<sourceChatId>": <lastProcessedMessageId> }`,
 *   replaced atomically (write temp, fsync, rename)
 * - ledger.jsonl: one DedupEntry per line, append-only, fsync per write
 *
 * A torn final ledger line (crash mid-append) is dropped on open.
 * Any other unreadable content is a StateStoreError.
 */

import { mkdir, open, readFile, rename, truncate } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { Cursor, DedupEntry, MessageIdentity } from '../types';
import { DedupEntrySchema, identityKey } from '../types';
import { StateStoreError, describeError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { CursorStore, DedupLedger, StateStores } from './interface';

const log = logger.child({ component: 'file-store' });

export const CURSORS_FILE = 'cursors.json';
export const LEDGER_FILE = 'ledger.jsonl';

const CursorFileSchema = z.record(z.string(), z.number().int());

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

async function readOptional(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new StateStoreError(`Cannot read ${filePath}: ${describeError(error)}`, { cause: error });
  }
}

// ============================================================
// CURSOR STORE
// ============================================================

export class FileCursorStore implements CursorStore {
  private constructor(
    private readonly filePath: string,
    private readonly cursors: Map<string, number>
  ) {}

  static async open(directory: string): Promise<FileCursorStore> {
    const filePath = path.join(directory, CURSORS_FILE);
    const content = await readOptional(filePath);
    const cursors = new Map<string, number>();

    if (content !== null && content.trim().length > 0) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(content);
      } catch (error) {
        throw new StateStoreError(`Corrupt cursor file ${filePath}: ${describeError(error)}`, {
          cause: error,
        });
      }
      const result = CursorFileSchema.safeParse(parsed);
      if (!result.success) {
        throw new StateStoreError(`Invalid cursor file ${filePath}: ${result.error.message}`);
      }
      for (const [source, id] of Object.entries(result.data)) {
        cursors.set(source, id);
      }
    }

    return new FileCursorStore(filePath, cursors);
  }

  async get(sourceChatId: string): Promise<number | null> {
    return this.cursors.get(sourceChatId) ?? null;
  }

  async advance(sourceChatId: string, messageId: number): Promise<number> {
    const current = this.cursors.get(sourceChatId);
    if (current !== undefined && current >= messageId) return current;

    const next = new Map(this.cursors).set(sourceChatId, messageId);
    await this.persist(next);
    this.cursors.set(sourceChatId, messageId);
    return messageId;
  }

  async list(): Promise<Cursor[]> {
    return Array.from(this.cursors, ([sourceChatId, lastProcessedMessageId]) => ({
      sourceChatId,
      lastProcessedMessageId,
    }));
  }

  private async persist(cursors: Map<string, number>): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    const body = JSON.stringify(Object.fromEntries(cursors), null, 2) + '\n';

    let handle: FileHandle | undefined;
    try {
      handle = await open(tmpPath, 'w');
      await handle.writeFile(body, 'utf-8');
      await handle.sync();
      await handle.close();
      handle = undefined;
      await rename(tmpPath, this.filePath);
    } catch (error) {
      await handle?.close();
      throw new StateStoreError(`Cannot write ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }
}

// ============================================================
// DEDUP LEDGER
// ============================================================

export class FileDedupLedger implements DedupLedger {
  private closed = false;

  private constructor(
    private readonly filePath: string,
    private readonly handle: FileHandle,
    private readonly entries: Map<string, DedupEntry>,
    private readonly publishedByFingerprint: Map<string, DedupEntry>
  ) {}

  static async open(directory: string): Promise<FileDedupLedger> {
    const filePath = path.join(directory, LEDGER_FILE);
    const content = (await readOptional(filePath)) ?? '';
    const entries = new Map<string, DedupEntry>();
    const byFingerprint = new Map<string, DedupEntry>();

    const lines = content.split('\n');
    const torn = !content.endsWith('\n') && content.length > 0;
    let missingNewline = false;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;

      const isLast = i === lines.length - 1;
      const entry = parseLedgerLine(line);
      if (entry === null) {
        if (isLast && torn) {
          const keep = content.slice(0, content.lastIndexOf('\n') + 1);
          log.warn('Dropping torn ledger line', { filePath, bytes: Buffer.byteLength(line) });
          try {
            await truncate(filePath, Buffer.byteLength(keep));
          } catch (error) {
            throw new StateStoreError(`Cannot repair ${filePath}: ${describeError(error)}`, {
              cause: error,
            });
          }
          continue;
        }
        throw new StateStoreError(`Corrupt ledger line ${i + 1} in ${filePath}`);
      }

      if (isLast && torn) missingNewline = true;

      const key = identityKey(entry);
      // First write wins; entries are never overwritten
      if (entries.has(key)) continue;
      entries.set(key, entry);
      if (entry.outcome === 'published' && entry.fingerprint) {
        byFingerprint.set(entry.fingerprint, entry);
      }
    }

    let handle: FileHandle;
    try {
      handle = await open(filePath, 'a');
      // A complete final entry without its newline would fuse with the next append
      if (missingNewline) await handle.appendFile('\n', 'utf-8');
    } catch (error) {
      throw new StateStoreError(`Cannot open ${filePath}: ${describeError(error)}`, { cause: error });
    }

    log.debug('Ledger loaded', { filePath, entries: entries.size });
    return new FileDedupLedger(filePath, handle, entries, byFingerprint);
  }

  async get(identity: MessageIdentity): Promise<DedupEntry | null> {
    return this.entries.get(identityKey(identity)) ?? null;
  }

  async record(entry: DedupEntry): Promise<boolean> {
    const key = identityKey(entry);
    if (this.entries.has(key)) return false;
    if (this.closed) {
      throw new StateStoreError(`Ledger ${this.filePath} is closed`);
    }

    try {
      await this.handle.appendFile(JSON.stringify(entry) + '\n', 'utf-8');
      await this.handle.datasync();
    } catch (error) {
      throw new StateStoreError(`Cannot append to ${this.filePath}: ${describeError(error)}`, {
        cause: error,
      });
    }

    this.entries.set(key, entry);
    if (entry.outcome === 'published' && entry.fingerprint) {
      this.publishedByFingerprint.set(entry.fingerprint, entry);
    }
    return true;
  }

  async findPublishedByFingerprint(fingerprint: string): Promise<DedupEntry | null> {
    return this.publishedByFingerprint.get(fingerprint) ?? null;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }
}

function parseLedgerLine(line: string): DedupEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  const result = DedupEntrySchema.safeParse(parsed);
  return result.success ? result.data : null;
}

/**
 * Open both stores under one directory, creating it if needed.
 */
export async function openFileStores(directory: string): Promise<StateStores> {
  try {
    await mkdir(directory, { recursive: true });
  } catch (error) {
    throw new StateStoreError(`Cannot create state directory ${directory}: ${describeError(error)}`, {
      cause: error,
    });
  }

  const cursors = await FileCursorStore.open(directory);
  const ledger = await FileDedupLedger.open(directory);

  return {
    cursors,
    ledger,
    close: () => ledger.close(),
  };
}
