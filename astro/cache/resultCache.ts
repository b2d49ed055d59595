import type { z } from "zod";
import { engineLogHelpers } from "../../logging/engineLog.js";
import { deepFreeze } from "../data/deepFreeze.js";
import type { AyanamshaValue } from "../ayanamsha/computeAyanamsha.js";
import type { DayTimings, PanchangResult } from "../schemas/panchang.schema.js";
import type { MuhurtaSearchResult } from "../schemas/muhurta.schema.js";
import { CACHE_KINDS, type CacheKind, type PersistedCacheRow, type PersistentCacheStore } from "./cacheStore.js";

export type { CacheKind } from "./cacheStore.js";

export interface CacheValues {
  ayanamsha: AyanamshaValue;
  day_timings: DayTimings;
  panchang: PanchangResult;
  muhurta: MuhurtaSearchResult;
}

/** Seconds per kind; null never expires. */
export type CacheTtls = Record<CacheKind, number | null>;

export const DEFAULT_CACHE_TTLS: CacheTtls = {
  ayanamsha: null,
  day_timings: 24 * 60 * 60,
  panchang: 30 * 60,
  muhurta: 2 * 60 * 60,
};

export interface ResultCacheOptions {
  maxEntries?: number;
  ttlSeconds?: Partial<CacheTtls>;
  store?: PersistentCacheStore;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  in_flight: number;
}

export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

interface CacheEntry<T> {
  value: T;
  expires_at_ms: number | null;
}

class KindBucket<T> {
  readonly entries = new Map<string, CacheEntry<T>>();
  readonly inFlight = new Map<string, Promise<T>>();
}

type Buckets = { [K in CacheKind]: KindBucket<CacheValues[K]> };

function recencyKey(kind: CacheKind, key: string): string {
  return `${kind}\u0000${key}`;
}

/**
 * In-memory LRU with per-kind TTL and single-flight computation, plus an
 * optional persistent tier. Stored values are deep-frozen, so every caller
 * sees the value as it was computed.
 *
 * Construct one per process and close it on shutdown; there is no shared
 * module-level instance.
 */
export class ResultCache {
  private readonly buckets: Buckets = {
    ayanamsha: new KindBucket(),
    day_timings: new KindBucket(),
    panchang: new KindBucket(),
    muhurta: new KindBucket(),
  };
  /** Insertion order is recency order, oldest first. */
  private readonly recency = new Map<string, { kind: CacheKind; key: string }>();
  private readonly maxEntries: number;
  private readonly ttls: CacheTtls;
  private readonly store: PersistentCacheStore | undefined;
  private readonly now: () => number;
  private closed = false;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResultCacheOptions = {}) {
    const maxEntries = options.maxEntries ?? 5000;
    if (!Number.isInteger(maxEntries) || maxEntries <= 0) {
      throw new Error(`maxEntries must be a positive integer, got ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
    this.ttls = { ...DEFAULT_CACHE_TTLS, ...options.ttlSeconds };
    this.store = options.store;
    this.now = options.now ?? Date.now;
  }

  /**
   * Return the cached value for (kind, key) or compute it once. Concurrent
   * callers for the same key share one computation. A failed computation
   * is not cached.
   */
  async getOrCompute<K extends CacheKind>(
    kind: K,
    key: string,
    compute: () => Promise<CacheValues[K]>,
    options: { schema?: CacheSchema<CacheValues[K]> } = {}
  ): Promise<CacheValues[K]> {
    this.assertOpen();
    const bucket: KindBucket<CacheValues[K]> = this.buckets[kind];

    const cached = this.readMemory(kind, bucket, key);
    if (cached !== undefined) {
      this.hits++;
      engineLogHelpers.cacheHit({ cache_kind: kind, cache_key: key, tier: "memory" });
      return cached.value;
    }

    const pending = bucket.inFlight.get(key);
    if (pending) {
      this.hits++;
      return pending;
    }

    const work = this.load(kind, bucket, key, compute, options.schema);
    bucket.inFlight.set(key, work);
    try {
      return await work;
    } finally {
      bucket.inFlight.delete(key);
    }
  }

  stats(): CacheStats {
    let inFlight = 0;
    for (const kind of CACHE_KINDS) {
      inFlight += this.buckets[kind].inFlight.size;
    }
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.recency.size,
      in_flight: inFlight,
    };
  }

  /**
   * Drop `key` under every kind, in memory and in the persistent tier.
   * Returns true when a memory entry was removed.
   */
  async invalidate(key: string): Promise<boolean> {
    this.assertOpen();
    let removed = false;
    for (const kind of CACHE_KINDS) {
      if (this.buckets[kind].entries.delete(key)) {
        this.recency.delete(recencyKey(kind, key));
        removed = true;
      }
    }

    if (this.store) {
      try {
        await this.store.remove(key);
      } catch (error) {
        engineLogHelpers.cachePersistFailed({ cache_kind: "all", cache_key: key, operation: "remove", error });
      }
    }
    return removed;
  }

  clear(): void {
    this.assertOpen();
    for (const kind of CACHE_KINDS) {
      this.buckets[kind].entries.clear();
    }
    this.recency.clear();
  }

  /** Release entries. Any later call throws. */
  close(): void {
    if (this.closed) return;
    this.clear();
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("ResultCache is closed");
    }
  }

  private readMemory<T>(kind: CacheKind, bucket: KindBucket<T>, key: string): CacheEntry<T> | undefined {
    const entry = bucket.entries.get(key);
    if (!entry) return undefined;

    const rk = recencyKey(kind, key);
    if (entry.expires_at_ms !== null && entry.expires_at_ms <= this.now()) {
      bucket.entries.delete(key);
      this.recency.delete(rk);
      return undefined;
    }

    this.recency.delete(rk);
    this.recency.set(rk, { kind, key });
    return entry;
  }

  private async load<T>(
    kind: CacheKind,
    bucket: KindBucket<T>,
    key: string,
    compute: () => Promise<T>,
    schema: CacheSchema<T> | undefined
  ): Promise<T> {
    if (this.store && schema) {
      const persisted = await this.readPersisted(kind, key, schema);
      if (persisted) {
        this.hits++;
        engineLogHelpers.cacheHit({ cache_kind: kind, cache_key: key, tier: "persistent" });
        this.remember(kind, bucket, key, persisted);
        return persisted.value;
      }
    }

    this.misses++;
    engineLogHelpers.cacheMiss({ cache_kind: kind, cache_key: key });
    const value = deepFreeze(await compute());
    const entry = { value, expires_at_ms: this.expiryFor(kind) };
    this.remember(kind, bucket, key, entry);

    if (this.store && schema) {
      await this.writePersisted(kind, key, entry);
    }
    return value;
  }

  private expiryFor(kind: CacheKind): number | null {
    const ttl = this.ttls[kind];
    return ttl === null ? null : this.now() + ttl * 1000;
  }

  private remember<T>(kind: CacheKind, bucket: KindBucket<T>, key: string, entry: CacheEntry<T>): void {
    if (this.closed) return;
    const rk = recencyKey(kind, key);
    bucket.entries.set(key, entry);
    this.recency.delete(rk);
    this.recency.set(rk, { kind, key });

    while (this.recency.size > this.maxEntries) {
      const oldest = this.recency.entries().next();
      if (oldest.done) break;
      const [oldestKey, target] = oldest.value;
      this.recency.delete(oldestKey);
      this.buckets[target.kind].entries.delete(target.key);
      this.evictions++;
      engineLogHelpers.cacheEvicted({ cache_kind: target.kind, cache_key: target.key });
    }
  }

  private async readPersisted<T>(
    kind: CacheKind,
    key: string,
    schema: CacheSchema<T>
  ): Promise<CacheEntry<T> | null> {
    const store = this.store;
    if (!store) return null;

    let row: PersistedCacheRow | null;
    try {
      row = await store.read(key);
    } catch (error) {
      engineLogHelpers.cachePersistFailed({ cache_kind: kind, cache_key: key, operation: "read", error });
      return null;
    }
    if (!row || row.kind !== kind) {
      return null;
    }

    const expiresAtMs = row.expires_at === null ? null : Date.parse(row.expires_at);
    if (expiresAtMs !== null && !(expiresAtMs > this.now())) {
      return null;
    }

    const parsed = schema.safeParse(row.value);
    if (!parsed.success) {
      engineLogHelpers.cachePersistFailed({ cache_kind: kind, cache_key: key, operation: "read", error: parsed.error });
      return null;
    }
    return { value: deepFreeze(parsed.data), expires_at_ms: expiresAtMs };
  }

  private async writePersisted<T>(kind: CacheKind, key: string, entry: CacheEntry<T>): Promise<void> {
    const store = this.store;
    if (!store) return;
    try {
      await store.write({
        key,
        kind,
        value: entry.value,
        expires_at: entry.expires_at_ms === null ? null : new Date(entry.expires_at_ms).toISOString(),
      });
    } catch (error) {
      engineLogHelpers.cachePersistFailed({ cache_kind: kind, cache_key: key, operation: "write", error });
    }
  }
}
