import { loadEngineConfig, type EngineConfig } from "../config/engineConfig.js";
import { engineLogHelpers } from "../logging/engineLog.js";
import {
  AYANAMSHA_SYSTEMS,
  defaultAyanamshaTable,
  mapAyanamshaSystems,
  parseAyanamshaSystem,
} from "./ayanamsha/ayanamshaSystems.js";
import type { AyanamshaSystem, AyanamshaTable } from "./ayanamsha/ayanamshaSystems.js";
import { ayanamsha, toSidereal, type AyanamshaValue } from "./ayanamsha/computeAyanamsha.js";
import { ayanamshaCacheKey, dayTimingsCacheKey, muhurtaCacheKey, panchangCacheKey } from "./cache/cacheKeys.js";
import { ResultCache, type CacheStats } from "./cache/resultCache.js";
import { SupabaseCacheStore } from "./cache/supabaseCacheStore.js";
import { AstronomyEngineProvider } from "./ephemeris/astronomyEngineProvider.js";
import type { BodyId, EphemerisProvider } from "./ephemeris/ephemerisProvider.js";
import { captureEngineErrors, type EngineResult } from "./errors.js";
import { createLocation, type Location, type LocationInput } from "./geo/location.js";
import { parseMuhurtaEventType } from "./muhurta/muhurtaRules.js";
import { parseQualityTier } from "./muhurta/muhurtaTiers.js";
import type { PlanetBody } from "./muhurta/planetaryStrength.js";
import { MUHURTA_RULES_V1, type MuhurtaEventType, type MuhurtaRule } from "./muhurta/policy/muhurtaRules.v1.js";
import type { MuhurtaSample } from "./muhurta/scoreMuhurtaSample.js";
import { muhurtaCalendar } from "./muhurta/muhurtaCalendar.js";
import { searchMuhurta, type MuhurtaSampleSource } from "./muhurta/searchMuhurta.js";
import { deriveDayTimings, localDayFor } from "./panchang/deriveDayTimings.js";
import { derivePanchang, PANCHANG_SCHEMA_VERSION } from "./panchang/derivePanchang.js";
import { panchangTables, type PanchangTables } from "./panchang/panchangTables.js";
import { chandrabala, parseNakshatraName, parseRashiName, tarabala } from "./panchang/personalStrength.js";
import {
  DayTimingsSchema,
  PanchangResultSchema,
  PersonalStrengthSchema,
  type DayTimings,
  type PanchangResult,
  type PersonalStrength,
} from "./schemas/panchang.schema.js";
import {
  MuhurtaCalendarSchema,
  MuhurtaSearchResultSchema,
  type MuhurtaCalendar,
  type MuhurtaSearchResult,
} from "./schemas/muhurta.schema.js";
import { createInstant, type Instant, type InstantInput } from "./time/instant.js";

export interface PanchangEngineOptions {
  config?: EngineConfig;
  ephemeris?: EphemerisProvider;
  /** Supplied caches are not closed by the engine. */
  cache?: ResultCache;
  ayanamshaTable?: AyanamshaTable;
  tables?: PanchangTables;
  rules?: Readonly<Record<MuhurtaEventType, MuhurtaRule>>;
}

function instantLabel(input: InstantInput): string {
  return input instanceof Date ? input.toISOString() : String(input);
}

export interface FindMuhurtaOptions {
  signal?: AbortSignal;
  /** Window length; defaults to the step. */
  durationMinutes?: number;
  excludePeriods?: ReadonlyArray<{ start: InstantInput; end: InstantInput }>;
}

export interface MuhurtaCalendarOptions {
  stepMinutes?: number;
  durationMinutes?: number;
  /** Defaults to "good". */
  minQuality?: string;
  maxPerDay?: number;
  signal?: AbortSignal;
}

export interface BirthDetails {
  nakshatra: string;
  rashi: string;
}

const DEFAULT_CALENDAR_STEP_MINUTES = 30;

/**
 * Public entry point. Every operation validates its raw inputs and returns
 * an EngineResult; engine failures never escape as exceptions.
 */
export class PanchangEngine {
  readonly config: EngineConfig;
  private readonly ephemeris: EphemerisProvider;
  private readonly cache: ResultCache;
  private readonly ownsCache: boolean;
  private readonly ayanamshaTable: AyanamshaTable;
  private readonly tables: PanchangTables;
  private readonly rules: Readonly<Record<MuhurtaEventType, MuhurtaRule>>;

  constructor(options: PanchangEngineOptions = {}) {
    this.config = options.config ?? loadEngineConfig();
    this.ephemeris =
      options.ephemeris ??
      new AstronomyEngineProvider({ minYear: this.config.EPHEMERIS_MIN_YEAR, maxYear: this.config.EPHEMERIS_MAX_YEAR });
    this.ownsCache = options.cache === undefined;
    this.cache = options.cache ?? this.createCache();
    this.ayanamshaTable = options.ayanamshaTable ?? defaultAyanamshaTable();
    this.tables = options.tables ?? panchangTables();
    this.rules = options.rules ?? MUHURTA_RULES_V1;
  }

  private createCache(): ResultCache {
    return new ResultCache({
      maxEntries: this.config.PANCHANG_CACHE_MAX_ENTRIES,
      ttlSeconds: {
        panchang: this.config.PANCHANG_CACHE_TTL_PANCHANG_SECONDS,
        muhurta: this.config.PANCHANG_CACHE_TTL_MUHURTA_SECONDS,
      },
      store: this.config.PANCHANG_CACHE_PERSIST ? new SupabaseCacheStore() : undefined,
    });
  }

  async computePanchang(
    location: LocationInput,
    instant: InstantInput,
    ayanamshaSystem?: string
  ): Promise<EngineResult<PanchangResult>> {
    const startedAt = Date.now();
    const logContext = {
      instant: instantLabel(instant),
      latitude: location.latitude,
      longitude: location.longitude,
      system: ayanamshaSystem ?? this.config.PANCHANG_DEFAULT_AYANAMSHA,
    };
    engineLogHelpers.panchangStarted(logContext);

    const result = await captureEngineErrors(async () => {
      const loc = createLocation(location);
      const at = createInstant(instant);
      const system = ayanamshaSystem === undefined ? this.config.PANCHANG_DEFAULT_AYANAMSHA : parseAyanamshaSystem(ayanamshaSystem);
      return this.panchangAt(loc, at, system);
    });

    if (result.status === "ok") {
      engineLogHelpers.panchangSucceeded({ ...logContext, duration_ms: Date.now() - startedAt });
    } else {
      engineLogHelpers.panchangFailed({ ...logContext, error: result.error });
    }
    return result;
  }

  async compareAyanamsha(instant: InstantInput): Promise<EngineResult<Record<AyanamshaSystem, AyanamshaValue>>> {
    const startedAt = Date.now();
    const result = await captureEngineErrors(async () => {
      const at = createInstant(instant);
      const values = await Promise.all(AYANAMSHA_SYSTEMS.map((system) => this.ayanamshaAt(system, at)));
      return mapAyanamshaSystems((system) => values[AYANAMSHA_SYSTEMS.indexOf(system)]);
    });

    const label = instantLabel(instant);
    if (result.status === "ok") {
      engineLogHelpers.ayanamshaCompared({ instant: label, duration_ms: Date.now() - startedAt });
    } else {
      engineLogHelpers.ayanamshaCompareFailed({ instant: label, error: result.error });
    }
    return result;
  }

  async findMuhurta(
    eventType: string,
    location: LocationInput,
    timeRange: { start: InstantInput; end: InstantInput },
    stepMinutes: number,
    minQuality: string | undefined,
    maxResults: number,
    options: FindMuhurtaOptions = {}
  ): Promise<EngineResult<MuhurtaSearchResult>> {
    return captureEngineErrors(async () => {
      const rule = this.rules[parseMuhurtaEventType(eventType)];
      const loc = createLocation(location);
      const start = createInstant(timeRange.start);
      const end = createInstant(timeRange.end);
      const tier = minQuality === undefined ? undefined : parseQualityTier(minQuality);
      const excludePeriods = (options.excludePeriods ?? []).map((p) => ({
        start: createInstant(p.start),
        end: createInstant(p.end),
      }));

      const run = () =>
        searchMuhurta(
          {
            rule,
            location: loc,
            timeRange: { start, end },
            stepMinutes,
            durationMinutes: options.durationMinutes,
            excludePeriods,
            maxResults,
            minQuality: tier,
            concurrency: this.config.MUHURTA_CONCURRENCY,
            signal: options.signal,
            tables: this.tables,
            dayTimings: (dayLocation, at) => this.dayTimingsAt(dayLocation, at),
          },
          this.sampleSource(rule)
        );

      // Searches with a signal bypass the cache.
      if (options.signal) {
        return run();
      }

      const key = muhurtaCacheKey({
        ruleVersion: rule.rule_version,
        eventType: rule.event_type,
        tablesVersion: this.tables.table_version,
        ayanamshaTableVersion: this.ayanamshaTable.table_version,
        system: this.config.PANCHANG_DEFAULT_AYANAMSHA,
        location: loc,
        start,
        end,
        stepMinutes,
        durationMinutes: options.durationMinutes ?? stepMinutes,
        excludePeriods,
        minQuality: tier,
        maxResults,
      });
      return this.cache.getOrCompute("muhurta", key, run, { schema: MuhurtaSearchResultSchema });
    });
  }

  /**
   * Good days for an event between two local dates (YYYY-MM-DD, inclusive),
   * with the best windows of each.
   */
  async muhurtaCalendar(
    eventType: string,
    location: LocationInput,
    startDate: string,
    endDate: string,
    options: MuhurtaCalendarOptions = {}
  ): Promise<EngineResult<MuhurtaCalendar>> {
    return captureEngineErrors(async () => {
      const rule = this.rules[parseMuhurtaEventType(eventType)];
      const loc = createLocation(location);
      const source = this.sampleSource(rule);
      const calendar = await muhurtaCalendar(
        {
          rule,
          location: loc,
          startDate,
          endDate,
          stepMinutes: options.stepMinutes ?? DEFAULT_CALENDAR_STEP_MINUTES,
          durationMinutes: options.durationMinutes,
          minQuality: options.minQuality === undefined ? undefined : parseQualityTier(options.minQuality),
          maxPerDay: options.maxPerDay,
          concurrency: this.config.MUHURTA_CONCURRENCY,
          signal: options.signal,
          tables: this.tables,
          dayTimings: (dayLocation, at) => this.dayTimingsAt(dayLocation, at),
        },
        (dayRequest) => searchMuhurta(dayRequest, source)
      );
      return MuhurtaCalendarSchema.parse(calendar);
    });
  }

  /** Tarabala and Chandrabala of the Moon at `instant` for a birth star and sign. */
  async computePersonalStrength(
    location: LocationInput,
    instant: InstantInput,
    birth: BirthDetails,
    ayanamshaSystem?: string
  ): Promise<EngineResult<PersonalStrength>> {
    return captureEngineErrors(async () => {
      const loc = createLocation(location);
      const at = createInstant(instant);
      const system = ayanamshaSystem === undefined ? this.config.PANCHANG_DEFAULT_AYANAMSHA : parseAyanamshaSystem(ayanamshaSystem);
      const birthNakshatra = parseNakshatraName(birth.nakshatra, this.tables);
      const birthRashi = parseRashiName(birth.rashi, this.tables);

      const panchang = await this.panchangAt(loc, at, system);
      return PersonalStrengthSchema.parse({
        instant: panchang.instant,
        moon_nakshatra: panchang.nakshatra.name,
        moon_rashi: panchang.moon_rashi.name,
        tarabala: tarabala(birthNakshatra, panchang.nakshatra.index, this.tables),
        chandrabala: chandrabala(birthRashi, panchang.moon_rashi.index, this.tables),
      });
    });
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  close(): void {
    if (this.ownsCache) {
      this.cache.close();
    }
  }

  private ayanamshaAt(system: AyanamshaSystem, instant: Instant): Promise<AyanamshaValue> {
    const key = ayanamshaCacheKey(this.ayanamshaTable.table_version, system, instant);
    return this.cache.getOrCompute("ayanamsha", key, async () => ayanamsha(system, instant, this.ayanamshaTable));
  }

  private dayTimingsAt(location: Location, instant: Instant): Promise<DayTimings> {
    const { local_date } = localDayFor(instant.epoch_ms, location.longitude);
    return this.cache.getOrCompute(
      "day_timings",
      dayTimingsCacheKey(this.tables.table_version, location, local_date),
      () => deriveDayTimings(location, instant, this.ephemeris, { tables: this.tables }),
      { schema: DayTimingsSchema }
    );
  }

  private async siderealLongitude(body: BodyId, instant: Instant, system: AyanamshaSystem): Promise<number> {
    const tropical = await this.ephemeris.getLongitude(body, instant);
    return toSidereal(tropical, system, instant, this.ayanamshaTable);
  }

  private panchangAt(location: Location, instant: Instant, system: AyanamshaSystem): Promise<PanchangResult> {
    return this.cache.getOrCompute(
      "panchang",
      panchangCacheKey({
        schemaVersion: PANCHANG_SCHEMA_VERSION,
        tablesVersion: this.tables.table_version,
        ayanamshaTableVersion: this.ayanamshaTable.table_version,
        system,
        location,
        instant,
      }),
      async () => {
        const [ayanamshaValue, sun, moon] = await Promise.all([
          this.ayanamshaAt(system, instant),
          this.siderealLongitude("sun", instant, system),
          this.siderealLongitude("moon", instant, system),
        ]);
        return derivePanchang(
          {
            sun_sidereal: sun,
            moon_sidereal: moon,
            instant,
            location,
            ayanamsha: ayanamshaValue,
          },
          this.ephemeris,
          { tables: this.tables, dayTimings: (loc, at) => this.dayTimingsAt(loc, at) }
        );
      },
      { schema: PanchangResultSchema }
    );
  }

  private sampleSource(rule: MuhurtaRule): MuhurtaSampleSource {
    return (instant, location) => this.sampleAt(rule, location, instant);
  }

  private async sampleAt(rule: MuhurtaRule, location: Location, instant: Instant): Promise<MuhurtaSample> {
    const system = this.config.PANCHANG_DEFAULT_AYANAMSHA;
    const panchang = await this.panchangAt(location, instant, system);
    const planetLongitudes: Partial<Record<PlanetBody, number>> = {
      sun: panchang.longitudes.sun_sidereal,
      moon: panchang.longitudes.moon_sidereal,
    };

    const others = rule.key_planets.filter((planet) => planet !== "sun" && planet !== "moon");
    const longitudes = await Promise.all(others.map((planet) => this.siderealLongitude(planet, instant, system)));
    others.forEach((planet, i) => {
      planetLongitudes[planet] = longitudes[i];
    });
    return { panchang, planet_longitudes: planetLongitudes };
  }
}
