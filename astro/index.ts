export {
  PanchangEngine,
  type BirthDetails,
  type FindMuhurtaOptions,
  type MuhurtaCalendarOptions,
  type PanchangEngineOptions,
} from "./panchangEngine.js";
export * from "./errors.js";

export { createInstant, addMinutes, type Instant, type InstantInput } from "./time/instant.js";
export { createLocation, LocationSchema, type Location, type LocationInput } from "./geo/location.js";

export {
  AYANAMSHA_SYSTEMS,
  AyanamshaSystemSchema,
  loadAyanamshaTable,
  parseAyanamshaSystem,
  type AyanamshaSystem,
  type AyanamshaTable,
} from "./ayanamsha/ayanamshaSystems.js";
export {
  ayanamsha,
  ayanamshaDifference,
  ayanamshaSeries,
  compareAll,
  describeAyanamshaSystem,
  toSidereal,
  toTropical,
  type AyanamshaValue,
} from "./ayanamsha/computeAyanamsha.js";

export type { EphemerisProvider, BodyId } from "./ephemeris/ephemerisProvider.js";
export { AstronomyEngineProvider } from "./ephemeris/astronomyEngineProvider.js";

export { deriveCalendarElements, tithiProgress } from "./panchang/deriveCalendarElements.js";
export { deriveDayTimings } from "./panchang/deriveDayTimings.js";
export { derivePanchang } from "./panchang/derivePanchang.js";
export { elementEndTimes } from "./panchang/elementEndTimes.js";
export { chandrabala, tarabala } from "./panchang/personalStrength.js";
export { traditionalYears } from "./panchang/traditionalYears.js";
export * from "./schemas/panchang.schema.js";

export { MUHURTA_EVENT_TYPES, MUHURTA_RULES_V1, type MuhurtaEventType, type MuhurtaRule } from "./muhurta/policy/muhurtaRules.v1.js";
export { QUALITY_TIERS, tierForScore, type QualityTier } from "./muhurta/muhurtaTiers.js";
export { scoreMuhurtaSample, type MuhurtaSample } from "./muhurta/scoreMuhurtaSample.js";
export { searchMuhurta, type MuhurtaSampleSource, type MuhurtaSearchRequest } from "./muhurta/searchMuhurta.js";
export { muhurtaCalendar, type MuhurtaCalendarRequest } from "./muhurta/muhurtaCalendar.js";
export * from "./schemas/muhurta.schema.js";

export { ResultCache, type CacheStats, type ResultCacheOptions } from "./cache/resultCache.js";
export { SupabaseCacheStore } from "./cache/supabaseCacheStore.js";
export type { PersistentCacheStore } from "./cache/cacheStore.js";

export { loadEngineConfig, type EngineConfig } from "../config/engineConfig.js";
