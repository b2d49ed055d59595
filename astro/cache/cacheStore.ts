import { z } from "zod";

export const CACHE_KINDS = ["ayanamsha", "day_timings", "panchang", "muhurta"] as const;
export type CacheKind = (typeof CACHE_KINDS)[number];

export const PersistedCacheRowSchema = z.object({
  key: z.string(),
  kind: z.enum(CACHE_KINDS),
  value: z.unknown(),
  expires_at: z.string().nullable(),
});

export type PersistedCacheRow = z.infer<typeof PersistedCacheRowSchema>;

/**
 * Second cache tier behind the in-memory LRU. Implementations throw on
 * backend failure; the cache decides what to do about it.
 */
export interface PersistentCacheStore {
  read(key: string): Promise<PersistedCacheRow | null>;
  write(row: PersistedCacheRow): Promise<void>;
  remove(key: string): Promise<void>;
}
