// Supabase client used for the Realtime chat message feed
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { Database } from '../types/database';

let supabaseInstance: SupabaseClient<Database> | null = null;

/**
 * Get the Supabase client (lazy-initialized on first use).
 * Prefers the service role key; the anon key is enough for Realtime reads.
 */
function getSupabase(): SupabaseClient<Database> {
  if (supabaseInstance) return supabaseInstance;

  const supabaseUrl = process.env.SUPABASE_URL?.trim();
  const supabaseKey =
    process.env.SUPABASE_SERVICE_ROLE_KEY?.trim() || process.env.SUPABASE_ANON_KEY?.trim();

  if (!supabaseUrl || !supabaseKey) {
    throw new Error(
      'Missing Supabase environment variables (SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY or SUPABASE_ANON_KEY)'
    );
  }

  supabaseInstance = createClient<Database>(supabaseUrl, supabaseKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });

  return supabaseInstance;
}

/** Drop the cached client (tests) */
function resetSupabase(): void {
  supabaseInstance = null;
}

export { getSupabase, resetSupabase };
