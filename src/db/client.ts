/**
 * Feedcast — Supabase Client
 *
 * The client is created once at process start and handed to each store.
 * Service-role key: the core runs as a background job, not on behalf of a user.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';

export interface DatabaseClientOptions {
  url: string;
  serviceRoleKey: string;
  /** Custom fetch implementation (tests) */
  fetch?: typeof fetch;
}

export function createDatabaseClient(options: DatabaseClientOptions): SupabaseClient {
  return createClient(options.url, options.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
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
    const { error } = await client.from('subscribers').select('id').limit(1);
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
export function handleSupabaseError(error: unknown): Error {
  if (error && typeof error === 'object' && 'message' in error && typeof error.message === 'string') {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return new Error(`Supabase error: ${error.message}${code ? ` (code: ${code})` : ''}`);
  }
  return new Error('Unknown Supabase error');
}
