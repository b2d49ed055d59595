import { NoRiseOrSetError } from "../errors.js";
import type { BodyId, EphemerisProvider } from "../ephemeris/ephemerisProvider.js";
import type { Location } from "../geo/location.js";
import type { DayTimings, Interval, KaalPeriod } from "../schemas/panchang.schema.js";
import { createInstant, isoFromEpochMs, MS_PER_DAY, MS_PER_MINUTE, type Instant } from "../time/instant.js";
import { engineLogHelpers } from "../../logging/engineLog.js";
import { panchangTables, type PanchangTables } from "./panchangTables.js";
import { findHorizonCrossing, type CrossingDirection, type SolverOptions } from "./solveRiseSet.js";

const SUN_REFRACTION_AND_SEMIDIAMETER_DEG = 0.833;
const MOON_REFRACTION_DEG = 0.5667;
const MOON_MEAN_HORIZONTAL_PARALLAX_DEG = 0.9507;
const MOON_RADIUS_PARALLAX_RATIO = 0.2725;

const BRAHMA_START_BEFORE_SUNRISE_MIN = 96;
const BRAHMA_END_BEFORE_SUNRISE_MIN = 48;

/** Horizon dip in degrees for an observer `elevationM` metres up (1.76′ × √h). */
export function horizonDipDeg(elevationM: number): number {
  return (1.76 * Math.sqrt(Math.max(0, elevationM))) / 60;
}

export function sunHorizonDeg(elevationM: number): number {
  return -(SUN_REFRACTION_AND_SEMIDIAMETER_DEG + horizonDipDeg(elevationM));
}

export function moonHorizonDeg(elevationM: number): number {
  return -(
    MOON_REFRACTION_DEG +
    MOON_RADIUS_PARALLAX_RATIO * MOON_MEAN_HORIZONTAL_PARALLAX_DEG +
    horizonDipDeg(elevationM)
  );
}

export interface LocalDay {
  /** YYYY-MM-DD of the mean-solar civil day. */
  local_date: string;
  /** 0 = Sunday. */
  weekday: number;
  start_ms: number;
  end_ms: number;
}

/**
 * The mean-solar civil day containing `epochMs` at `longitude`
 * (local midnight = UTC midnight - longitude / 15 hours).
 */
export function localDayFor(epochMs: number, longitude: number): LocalDay {
  const offsetMs = Math.round((longitude / 15) * 3_600_000);
  const dayNumber = Math.floor((epochMs + offsetMs) / MS_PER_DAY);
  const civilMidnight = new Date(dayNumber * MS_PER_DAY);
  return {
    local_date: civilMidnight.toISOString().split("T")[0],
    weekday: civilMidnight.getUTCDay(),
    start_ms: dayNumber * MS_PER_DAY - offsetMs,
    end_ms: (dayNumber + 1) * MS_PER_DAY - offsetMs,
  };
}

/** The civil day named by `localDate` (YYYY-MM-DD), or null if there is no such date. */
export function localDayOfDate(localDate: string, longitude: number): LocalDay | null {
  const midnightUtc = Date.parse(`${localDate}T00:00:00Z`);
  if (!/^\d{4}-\d{2}-\d{2}$/.test(localDate) || Number.isNaN(midnightUtc)) {
    return null;
  }
  const day = localDayFor(midnightUtc - Math.round((longitude / 15) * 3_600_000), longitude);
  return day.local_date === localDate ? day : null;
}

/**
 * Eight contiguous daylight segments. Boundaries are rounded to whole
 * milliseconds and the last one is pinned to sunset, so durations sum
 * exactly to sunset - sunrise.
 */
export function daylightSegments(sunriseMs: number, sunsetMs: number): Array<{ start_ms: number; end_ms: number }> {
  const length = sunsetMs - sunriseMs;
  const boundaries: number[] = [];
  for (let i = 0; i < 8; i++) {
    boundaries.push(sunriseMs + Math.round((i * length) / 8));
  }
  boundaries.push(sunsetMs);

  return boundaries.slice(0, 8).map((start, i) => ({ start_ms: start, end_ms: boundaries[i + 1] }));
}

function toInterval(startMs: number, endMs: number): Interval {
  return { start: isoFromEpochMs(startMs), end: isoFromEpochMs(endMs) };
}

function kaalPeriod(
  segments: Array<{ start_ms: number; end_ms: number }>,
  table: readonly number[],
  weekday: number
): KaalPeriod {
  const segment = table[weekday];
  const { start_ms, end_ms } = segments[segment - 1];
  return { ...toInterval(start_ms, end_ms), segment };
}

export interface DayTimingsOptions {
  tables?: PanchangTables;
  solver?: Partial<SolverOptions>;
}

/**
 * Rise/set times and the daylight periods for the local day containing `instant`.
 *
 * The Sun is mandatory: no sunrise or sunset after the widened retries is a
 * NoRiseOrSetError. A missing moonrise or moonset is reported as null with a note.
 */
export async function deriveDayTimings(
  location: Location,
  instant: Instant,
  ephemeris: EphemerisProvider,
  options: DayTimingsOptions = {}
): Promise<DayTimings> {
  const tables = options.tables ?? panchangTables();
  const day = localDayFor(instant.epoch_ms, location.longitude);

  const altitude = (body: BodyId) => (epochMs: number) =>
    ephemeris.getAltitude(body, createInstant(epochMs), location);

  const context = {
    instant: instant.utc,
    location: { latitude: location.latitude, longitude: location.longitude, elevation_m: location.elevation_m },
    local_date: day.local_date,
  };

  const sunHorizon = sunHorizonDeg(location.elevation_m);

  const sunrise = await findHorizonCrossing(
    { altitudeAt: altitude("sun"), horizonDeg: sunHorizon, direction: "rise", startMs: day.start_ms, endMs: day.end_ms },
    { ...options.solver, widen: "both" }
  );
  if (sunrise.status !== "found") {
    throw new NoRiseOrSetError("sunrise", `No sunrise found for ${day.local_date} (${sunrise.reason})`, context);
  }

  const sunset = await findHorizonCrossing(
    {
      altitudeAt: altitude("sun"),
      horizonDeg: sunHorizon,
      direction: "set",
      startMs: sunrise.epoch_ms + MS_PER_MINUTE,
      endMs: Math.max(day.end_ms, sunrise.epoch_ms + MS_PER_DAY / 2),
    },
    { ...options.solver, widen: "forward" }
  );
  if (sunset.status !== "found") {
    throw new NoRiseOrSetError("sunset", `No sunset found after sunrise on ${day.local_date} (${sunset.reason})`, context);
  }

  const moonHorizon = moonHorizonDeg(location.elevation_m);
  const moonEvent = async (direction: CrossingDirection): Promise<number | null> => {
    const result = await findHorizonCrossing(
      { altitudeAt: altitude("moon"), horizonDeg: moonHorizon, direction, startMs: day.start_ms, endMs: day.end_ms },
      { ...options.solver, retries: 0 }
    );
    if (result.status === "found") {
      return result.epoch_ms;
    }
    engineLogHelpers.moonEventMissing({
      which: direction === "rise" ? "moonrise" : "moonset",
      instant: instant.utc,
      latitude: location.latitude,
      longitude: location.longitude,
    });
    return null;
  };
  const moonriseMs = await moonEvent("rise");
  const moonsetMs = await moonEvent("set");

  return assembleDayTimings(day, sunrise.epoch_ms, sunset.epoch_ms, moonriseMs, moonsetMs, tables);
}

/**
 * Daylight periods from solved rise/set times.
 */
export function assembleDayTimings(
  day: LocalDay,
  sunriseMs: number,
  sunsetMs: number,
  moonriseMs: number | null,
  moonsetMs: number | null,
  tables: PanchangTables = panchangTables()
): DayTimings {
  const lengthMs = sunsetMs - sunriseMs;
  const segments = daylightSegments(sunriseMs, sunsetMs);
  const solarNoonMs = sunriseMs + Math.round(lengthMs / 2);
  const abhijitHalfMs = Math.round(lengthMs / 30);

  return {
    local_date: day.local_date,
    weekday: day.weekday,
    sunrise: isoFromEpochMs(sunriseMs),
    sunset: isoFromEpochMs(sunsetMs),
    solar_noon: isoFromEpochMs(solarNoonMs),
    day_length_minutes: Number((lengthMs / MS_PER_MINUTE).toFixed(2)),
    moonrise: moonriseMs === null ? null : isoFromEpochMs(moonriseMs),
    moonset: moonsetMs === null ? null : isoFromEpochMs(moonsetMs),
    moon_event_note: moonEventNote(moonriseMs, moonsetMs),
    segments: segments.map((s) => toInterval(s.start_ms, s.end_ms)),
    rahu_kaal: kaalPeriod(segments, tables.kaal_segments.rahu_kaal, day.weekday),
    gulika_kaal: kaalPeriod(segments, tables.kaal_segments.gulika_kaal, day.weekday),
    yamaganda_kaal: kaalPeriod(segments, tables.kaal_segments.yamaganda_kaal, day.weekday),
    brahma_muhurta: toInterval(
      sunriseMs - BRAHMA_START_BEFORE_SUNRISE_MIN * MS_PER_MINUTE,
      sunriseMs - BRAHMA_END_BEFORE_SUNRISE_MIN * MS_PER_MINUTE
    ),
    abhijit_muhurta: toInterval(solarNoonMs - abhijitHalfMs, solarNoonMs + abhijitHalfMs),
  };
}

function moonEventNote(moonriseMs: number | null, moonsetMs: number | null): string | null {
  if (moonriseMs === null && moonsetMs === null) {
    return "The Moon neither rises nor sets during this local day";
  }
  if (moonriseMs === null) {
    return "No moonrise during this local day";
  }
  if (moonsetMs === null) {
    return "No moonset during this local day";
  }
  return null;
}

/** Vara for an instant: before sunrise the previous weekday still applies. */
export function varaIndexFor(instant: Instant, timings: DayTimings): number {
  const sunriseMs = Date.parse(timings.sunrise);
  return instant.epoch_ms < sunriseMs ? (timings.weekday + 6) % 7 : timings.weekday;
}
