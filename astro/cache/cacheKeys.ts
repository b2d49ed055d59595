import { locationKey, type Location } from "../geo/location.js";
import type { Instant } from "../time/instant.js";

export function ayanamshaCacheKey(tableVersion: string, system: string, instant: Instant): string {
  return `ayanamsha:${tableVersion}:${system}:${instant.utc}`;
}

export function dayTimingsCacheKey(tablesVersion: string, location: Location, localDate: string): string {
  return `day_timings:${tablesVersion}:${locationKey(location)}:${localDate}`;
}

export function panchangCacheKey(params: {
  schemaVersion: string;
  tablesVersion: string;
  ayanamshaTableVersion: string;
  system: string;
  location: Location;
  instant: Instant;
}): string {
  return [
    "panchang",
    params.schemaVersion,
    params.tablesVersion,
    params.ayanamshaTableVersion,
    params.system,
    locationKey(params.location),
    params.instant.utc,
  ].join(":");
}

export function muhurtaCacheKey(params: {
  ruleVersion: string;
  eventType: string;
  tablesVersion: string;
  ayanamshaTableVersion: string;
  system: string;
  location: Location;
  start: Instant;
  end: Instant;
  stepMinutes: number;
  durationMinutes: number;
  excludePeriods: ReadonlyArray<{ start: Instant; end: Instant }>;
  minQuality: string | undefined;
  maxResults: number;
}): string {
  return [
    "muhurta",
    params.ruleVersion,
    params.eventType,
    params.tablesVersion,
    params.ayanamshaTableVersion,
    params.system,
    locationKey(params.location),
    params.start.utc,
    params.end.utc,
    params.stepMinutes,
    params.durationMinutes,
    params.excludePeriods.map((p) => `${p.start.utc}/${p.end.utc}`).join(",") || "none",
    params.minQuality ?? "any",
    params.maxResults,
  ].join(":");
}
