/**
 * Supabase Client
 * Persistence is optional: without SUPABASE_URL and SUPABASE_KEY nothing is written
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { ConfigError, getBaseConfig } from "@equisight/core";

let client: SupabaseClient | null = null;

export function isSupabaseConfigured(): boolean {
  return getBaseConfig().supabase !== undefined;
}

/**
 * Shared client, created on first use
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const settings = getBaseConfig().supabase;
  if (!settings) {
    throw new ConfigError("SUPABASE_URL and SUPABASE_KEY are required for persistence");
  }

  // Server-side key: no session to keep or refresh
  client = createClient(settings.url, settings.key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
