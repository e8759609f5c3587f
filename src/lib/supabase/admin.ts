import { createClient, type SupabaseClient } from '@supabase/supabase-js';

/**
 * Supabase admin client (service role) for scripts and server-side jobs.
 * Bypasses row level security; never ship the key to a browser.
 */
export function createAdminClient(): SupabaseClient {
  const url = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key || key.length === 0) {
    throw new Error(
      'SUPABASE_SERVICE_ROLE_KEY (and SUPABASE_URL) must be set for admin client',
    );
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
