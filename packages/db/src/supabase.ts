/**
 * Supabase Client
 * One client per composition root; nothing here is global
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { DatabaseError } from "./errors.js";

export interface SupabaseSettings {
  url?: string;
  key?: string;
}

/**
 * Check if Supabase is configured
 */
export function isSupabaseConfigured(settings: SupabaseSettings): boolean {
  return Boolean(settings.url && settings.key);
}

/**
 * Create a server-side client (no session persistence or token refresh)
 */
export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  if (!settings.url || !settings.key) {
    throw new DatabaseError(
      "Missing Supabase configuration. Set SUPABASE_URL and SUPABASE_KEY environment variables.",
      "connect"
    );
  }

  return createClient(settings.url, settings.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

/**
 * Test database connection
 */
export async function testConnection(client: SupabaseClient): Promise<boolean> {
  const { error } = await client.from("decisions").select("id").limit(1);
  return !error;
}
