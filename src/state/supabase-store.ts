/**
 * DealRelay — Supabase-backed State Stores
 *
 * Tables are created by supabase/migrations/001_relay_state.sql.
 * Rows are validated on the way back in; a row that does not match the
 * schema is treated as a store failure.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Cursor, DedupEntry, MessageIdentity } from '../types';
import { DedupOutcomeSchema } from '../types';
import { StateStoreError } from '../lib/errors';
import { handleSupabaseError, UNIQUE_VIOLATION } from '../db/client';
import type { CursorStore, DedupLedger, StateStores } from './interface';

const CURSORS_TABLE = 'relay_cursors';
const DEDUP_TABLE = 'relay_dedup';

const CursorRowSchema = z.object({
  source_chat_id: z.string(),
  last_processed_message_id: z.coerce.number().int(),
});

const DedupRowSchema = z.object({
  source_chat_id: z.string(),
  message_id: z.coerce.number().int(),
  outcome: DedupOutcomeSchema,
  published_target_message_id: z.string().nullable(),
  decided_at: z.string(),
  reason: z.string().nullable(),
  fingerprint: z.string().nullable(),
});
type DedupRow = z.infer<typeof DedupRowSchema>;

function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, table: string): T {
  const result = schema.safeParse(row);
  if (!result.success) {
    throw new StateStoreError(`Malformed row in ${table}: ${result.error.message}`);
  }
  return result.data;
}

function toEntry(row: DedupRow): DedupEntry {
  return {
    sourceChatId: row.source_chat_id,
    messageId: row.message_id,
    outcome: row.outcome,
    publishedTargetMessageId: row.published_target_message_id ?? undefined,
    decidedAt: row.decided_at,
    reason: row.reason ?? undefined,
    fingerprint: row.fingerprint ?? undefined,
  };
}

function toRow(entry: DedupEntry): DedupRow {
  return {
    source_chat_id: entry.sourceChatId,
    message_id: entry.messageId,
    outcome: entry.outcome,
    published_target_message_id: entry.publishedTargetMessageId ?? null,
    decided_at: entry.decidedAt,
    reason: entry.reason ?? null,
    fingerprint: entry.fingerprint ?? null,
  };
}

// ============================================================
// CURSOR STORE
// ============================================================

export class SupabaseCursorStore implements CursorStore {
  constructor(private readonly client: SupabaseClient) {}

  async get(sourceChatId: string): Promise<number | null> {
    const { data, error } = await this.client
      .from(CURSORS_TABLE)
      .select('source_chat_id, last_processed_message_id')
      .eq('source_chat_id', sourceChatId)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, 'cursor read');
    if (!data) return null;
    return parseRow(CursorRowSchema, data, CURSORS_TABLE).last_processed_message_id;
  }

  async advance(sourceChatId: string, messageId: number): Promise<number> {
    const current = await this.get(sourceChatId);
    if (current !== null && current >= messageId) return current;

    const { error } = await this.client.from(CURSORS_TABLE).upsert(
      {
        source_chat_id: sourceChatId,
        last_processed_message_id: messageId,
        updated_at: new Date().toISOString(),
      },
      { onConflict: 'source_chat_id' }
    );

    if (error) throw handleSupabaseError(error, 'cursor advance');
    return messageId;
  }

  async list(): Promise<Cursor[]> {
    const { data, error } = await this.client
      .from(CURSORS_TABLE)
      .select('source_chat_id, last_processed_message_id');

    if (error) throw handleSupabaseError(error, 'cursor list');
    return (data ?? []).map(row => {
      const parsed = parseRow(CursorRowSchema, row, CURSORS_TABLE);
      return {
        sourceChatId: parsed.source_chat_id,
        lastProcessedMessageId: parsed.last_processed_message_id,
      };
    });
  }
}

// ============================================================
// DEDUP LEDGER
// ============================================================

export class SupabaseDedupLedger implements DedupLedger {
  constructor(private readonly client: SupabaseClient) {}

  async get(identity: MessageIdentity): Promise<DedupEntry | null> {
    const { data, error } = await this.client
      .from(DEDUP_TABLE)
      .select('*')
      .eq('source_chat_id', identity.sourceChatId)
      .eq('message_id', identity.messageId)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, 'ledger read');
    if (!data) return null;
    return toEntry(parseRow(DedupRowSchema, data, DEDUP_TABLE));
  }

  async record(entry: DedupEntry): Promise<boolean> {
    const { error } = await this.client.from(DEDUP_TABLE).insert(toRow(entry));

    if (error) {
      if (error.code === UNIQUE_VIOLATION) return false;
      throw handleSupabaseError(error, 'ledger write');
    }
    return true;
  }

  async findPublishedByFingerprint(fingerprint: string): Promise<DedupEntry | null> {
    const { data, error } = await this.client
      .from(DEDUP_TABLE)
      .select('*')
      .eq('fingerprint', fingerprint)
      .eq('outcome', 'published')
      .limit(1)
      .maybeSingle();

    if (error) throw handleSupabaseError(error, 'ledger fingerprint lookup');
    if (!data) return null;
    return toEntry(parseRow(DedupRowSchema, data, DEDUP_TABLE));
  }
}

export function createSupabaseStores(client: SupabaseClient): StateStores {
  return {
    cursors: new SupabaseCursorStore(client),
    ledger: new SupabaseDedupLedger(client),
    close: async () => {},
  };
}
