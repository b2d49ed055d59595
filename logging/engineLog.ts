/**
 * Structured logging for engine events.
 *
 * One JSON object per line on stdout. LOG_LEVEL filters entries
 * (debug | info | warn | error | silent, default info).
 */

export type EngineLogEvent =
  | "panchang.compute.started"
  | "panchang.compute.succeeded"
  | "panchang.compute.failed"
  | "ayanamsha.compare.succeeded"
  | "ayanamsha.compare.failed"
  | "muhurta.search.started"
  | "muhurta.search.succeeded"
  | "muhurta.search.aborted"
  | "muhurta.search.failed"
  | "cache.hit"
  | "cache.miss"
  | "cache.evicted"
  | "cache.persist.failed"
  | "ephemeris.failed"
  | "ephemeris.moon_event_missing";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type EngineLogData = {
  event: EngineLogEvent;
  instant?: string;
  latitude?: number;
  longitude?: number;
  system?: string;
  event_type?: string;
  cache_kind?: string;
  cache_key?: string;
  duration_ms?: number;
  error_kind?: string;
  error_message?: string;
  [key: string]: unknown;
};

function isLevelName(value: string): value is LogLevel | "silent" {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

function thresholdFromEnv(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLevelName(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

export function engineLog(level: LogLevel, data: EngineLogData): void {
  if (LEVEL_RANK[level] < thresholdFromEnv()) {
    return;
  }

  const logEntry = {
    timestamp: new Date().toISOString(),
    level,
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

function errorFields(error: unknown): { error_kind: string; error_message: string } {
  if (error instanceof Error) {
    const kind = "kind" in error && typeof error.kind === "string" ? error.kind : error.name;
    return { error_kind: kind, error_message: error.message };
  }
  return { error_kind: "unknown", error_message: String(error) };
}

/**
 * Convenience helpers for common events.
 */
export const engineLogHelpers = {
  panchangStarted(params: { instant: string; latitude: number; longitude: number; system: string }): void {
    engineLog("debug", { event: "panchang.compute.started", ...params });
  },

  panchangSucceeded(params: {
    instant: string;
    latitude: number;
    longitude: number;
    system: string;
    duration_ms: number;
  }): void {
    engineLog("info", { event: "panchang.compute.succeeded", ...params });
  },

  panchangFailed(params: { instant: string; latitude: number; longitude: number; system: string; error: unknown }): void {
    const { error, ...rest } = params;
    engineLog("warn", { event: "panchang.compute.failed", ...rest, ...errorFields(error) });
  },

  ayanamshaCompared(params: { instant: string; duration_ms: number }): void {
    engineLog("info", { event: "ayanamsha.compare.succeeded", ...params });
  },

  ayanamshaCompareFailed(params: { instant: string; error: unknown }): void {
    engineLog("warn", { event: "ayanamsha.compare.failed", instant: params.instant, ...errorFields(params.error) });
  },

  muhurtaStarted(params: { event_type: string; samples_total: number; rule_version: string }): void {
    engineLog("info", { event: "muhurta.search.started", ...params });
  },

  muhurtaSucceeded(params: {
    event_type: string;
    samples_evaluated: number;
    candidates: number;
    duration_ms: number;
  }): void {
    engineLog("info", { event: "muhurta.search.succeeded", ...params });
  },

  muhurtaAborted(params: { event_type: string; samples_evaluated: number; samples_total: number }): void {
    engineLog("warn", { event: "muhurta.search.aborted", ...params });
  },

  muhurtaFailed(params: { event_type: string; error: unknown }): void {
    engineLog("warn", { event: "muhurta.search.failed", event_type: params.event_type, ...errorFields(params.error) });
  },

  cacheHit(params: { cache_kind: string; cache_key: string; tier: "memory" | "persistent" }): void {
    engineLog("debug", { event: "cache.hit", ...params });
  },

  cacheMiss(params: { cache_kind: string; cache_key: string }): void {
    engineLog("debug", { event: "cache.miss", ...params });
  },

  cacheEvicted(params: { cache_kind: string; cache_key: string }): void {
    engineLog("debug", { event: "cache.evicted", ...params });
  },

  cachePersistFailed(params: { cache_kind: string; cache_key: string; operation: "read" | "write" | "remove"; error: unknown }): void {
    const { error, ...rest } = params;
    engineLog("error", { event: "cache.persist.failed", ...rest, ...errorFields(error) });
  },

  ephemerisFailed(params: { body: string; instant: string; error: unknown }): void {
    const { error, ...rest } = params;
    engineLog("error", { event: "ephemeris.failed", ...rest, ...errorFields(error) });
  },

  moonEventMissing(params: { which: "moonrise" | "moonset"; instant: string; latitude: number; longitude: number }): void {
    engineLog("info", { event: "ephemeris.moon_event_missing", ...params });
  },
};
