import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { loadSupabaseConfig, type SupabaseConfig } from '@/lib/chat/config';

type ClientOverrides = {
  /** Replaces the global fetch used for PostgREST and auth requests. */
  fetch?: typeof fetch;
};

export const createSupabaseClient = (
  config: SupabaseConfig = loadSupabaseConfig(),
  overrides: ClientOverrides = {}
): SupabaseClient => {
  return createClient(config.url, config.anonKey, {
    auth: {
      persistSession: true,
      autoRefreshToken: true,
    },
    ...(overrides.fetch ? { global: { fetch: overrides.fetch } } : {}),
  });
};
