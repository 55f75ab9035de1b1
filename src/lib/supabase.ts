import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { SupabaseSettings } from './config';

/**
 * Create the Supabase client. Returns null if Supabase is not configured
 * (offline-only mode).
 */
export function createSupabaseClient(
  settings: SupabaseSettings | null,
  options: { fetch?: typeof fetch } = {}
): SupabaseClient | null {
  if (!settings) return null;

  return createClient(settings.url, settings.anonKey, {
    auth: {
      // The session lives in memory; the host restores it on start
      persistSession: false,
      autoRefreshToken: false,
    },
    global: options.fetch ? { fetch: options.fetch } : undefined,
  });
}
