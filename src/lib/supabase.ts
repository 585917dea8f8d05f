import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { getSupabaseEnv } from "./env";

// Server-side client with the service-role key. Never import from client components:
// the key bypasses row-level security, ownership is enforced by the stores instead.
let client: SupabaseClient | null = null;

/** The shared client, or null when SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY are unset */
export function getSupabase(): SupabaseClient | null {
  if (client) return client;
  const env = getSupabaseEnv();
  if (!env) return null;
  client = createClient(env.url, env.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
