import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | null = null;

function missingEnvError(): Error {
  return new Error("Missing Supabase env vars (SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY)");
}

/**
 * Shared service-role client, created on first use so that code paths
 * without persistence never need the env vars.
 */
export function getSupabaseClient(): SupabaseClient {
  if (client) {
    return client;
  }

  const supabaseUrl = process.env.SUPABASE_URL;
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY ?? process.env.SUPABASE_ANON_KEY;
  if (!supabaseUrl || !key) {
    throw missingEnvError();
  }

  client = createClient(supabaseUrl, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
