/**
 * DealRelay — Supabase Client
 *
 * Service-role client for the `supabase` state backend. The relay is a
 * background worker, so it never uses an anon/user session.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StateStoreError } from '../lib/errors';

export interface SupabaseConnection {
  url: string;
  serviceRoleKey: string;
}

/**
 * Create a service client. Bypasses Row Level Security.
 */
export function createServiceClient(connection: SupabaseConnection): SupabaseClient {
  return createClient(connection.url, connection.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Check that the relay tables are reachable.
 */
export async function checkDatabaseHealth(client: SupabaseClient): Promise<{
  healthy: boolean;
  latencyMs: number;
  error?: string;
}> {
  const start = Date.now();
  try {
    const { error } = await client.from('relay_cursors').select('source_chat_id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - start;
    return {
      healthy: false,
      latencyMs,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(error: unknown, operation: string): StateStoreError {
  if (error && typeof error === 'object' && 'message' in error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new StateStoreError(
      `Supabase error during ${operation}: ${String(error.message)}${code ? ` (code: ${code})` : ''}`,
      { cause: error }
    );
  }
  return new StateStoreError(`Unknown Supabase error during ${operation}`, { cause: error });
}

/** Postgres unique_violation */
export const UNIQUE_VIOLATION = '23505';
