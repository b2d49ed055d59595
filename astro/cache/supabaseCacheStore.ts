import type { SupabaseClient } from "@supabase/supabase-js";
import { getSupabaseClient } from "../../lib/supabaseClient.js";
import { PersistedCacheRowSchema, type PersistedCacheRow, type PersistentCacheStore } from "./cacheStore.js";

export const CACHE_TABLE = "panchang_result_cache";

/**
 * Cache rows in public.panchang_result_cache, one row per key, value as jsonb.
 */
export class SupabaseCacheStore implements PersistentCacheStore {
  constructor(
    private readonly client: SupabaseClient = getSupabaseClient(),
    private readonly table: string = CACHE_TABLE
  ) {}

  async read(key: string): Promise<PersistedCacheRow | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select("key, kind, value, expires_at")
      .eq("key", key)
      .maybeSingle();

    if (error) {
      throw error;
    }
    if (!data) {
      return null;
    }

    return PersistedCacheRowSchema.parse(data);
  }

  async write(row: PersistedCacheRow): Promise<void> {
    const { error } = await this.client.from(this.table).upsert(
      {
        key: row.key,
        kind: row.kind,
        value: row.value,
        expires_at: row.expires_at,
        updated_at: new Date().toISOString(),
      },
      {
        onConflict: "key",
      }
    );

    if (error) throw error;
  }

  async remove(key: string): Promise<void> {
    const { error } = await this.client.from(this.table).delete().eq("key", key);
    if (error) throw error;
  }
}
