/**
 * FeedSync — Supabase Client
 *
 * Service-role client used by SupabaseStorage. The sync engine runs as a
 * background service, so the client bypasses RLS and never persists a
 * session.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StorageFailedError } from '../lib/errors';

export interface ServiceClientOptions {
  /** Replaces the global fetch for every PostgREST request */
  fetch?: typeof fetch;
}

export function createServiceClient(
  url: string,
  serviceRoleKey: string,
  options: ServiceClientOptions = {}
): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: { fetch: options.fetch },
  });
}

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(client: SupabaseClient): Promise<{
  healthy: boolean;
  latencyMs: number;
  error?: string;
}> {
  const start = Date.now();
  try {
    const { error } = await client.from('feeds').select('id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    return {
      healthy: false,
      latencyMs: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

/**
 * Wrap a PostgREST error as a StorageFailedError, keeping the original
 * message and code.
 */
export function handleSupabaseError(error: unknown): StorageFailedError {
  if (error && typeof error === 'object' && 'message' in error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new StorageFailedError(
      `Supabase error: ${String(error.message)}${code ? ` (code: ${code})` : ''}`,
      { cause: error }
    );
  }
  return new StorageFailedError('Unknown Supabase error', { cause: error });
}
