/**
 * DealRelay — State Stores
 */

import { createServiceClient, checkDatabaseHealth } from '../db/client';
import { StateStoreError } from '../lib/errors';
import { logger } from '../lib/logger';
import { openFileStores } from './file-store';
import { createMemoryStores } from './memory-store';
import { createSupabaseStores } from './supabase-store';
import type { StateStores } from './interface';

export type { CursorStore, DedupLedger, StateStores } from './interface';
export { MemoryCursorStore, MemoryDedupLedger, createMemoryStores } from './memory-store';
export { FileCursorStore, FileDedupLedger, openFileStores } from './file-store';
export { SupabaseCursorStore, SupabaseDedupLedger, createSupabaseStores } from './supabase-store';

export type StateBackendConfig =
  | { backend: 'file'; directory: string }
  | { backend: 'supabase'; url: string; serviceRoleKey: string }
  | { backend: 'memory' };

/**
 * Open the configured backend. Any failure is a StateStoreError,
 * which the caller treats as fatal.
 */
export async function openStateStores(config: StateBackendConfig): Promise<StateStores> {
  switch (config.backend) {
    case 'file':
      logger.info('Using file state backend', { directory: config.directory });
      return openFileStores(config.directory);

    case 'supabase': {
      const client = createServiceClient({ url: config.url, serviceRoleKey: config.serviceRoleKey });
      const health = await checkDatabaseHealth(client);
      if (!health.healthy) {
        throw new StateStoreError(`Supabase state backend unavailable: ${health.error ?? 'unknown error'}`);
      }
      logger.info('Using supabase state backend', { latencyMs: health.latencyMs });
      return createSupabaseStores(client);
    }

    case 'memory':
      logger.warn('Using in-memory state backend; decisions will not survive a restart');
      return createMemoryStores();
  }
}
