import type { AyanamshaValue } from "../ayanamsha/computeAyanamsha.js";
import type { EphemerisProvider } from "../ephemeris/ephemerisProvider.js";
import type { Location } from "../geo/location.js";
import { normalizeDegrees } from "../math/angles.js";
import { PanchangResultSchema, type DayTimings, type PanchangResult } from "../schemas/panchang.schema.js";
import type { Instant } from "../time/instant.js";
import { deriveCalendarElements, derivePanchaka } from "./deriveCalendarElements.js";
import { deriveDayTimings, varaIndexFor } from "./deriveDayTimings.js";
import { elementEndTimes } from "./elementEndTimes.js";
import { panchangTables, type PanchangTables } from "./panchangTables.js";
import { traditionalYears } from "./traditionalYears.js";

export const PANCHANG_SCHEMA_VERSION = "panchang_v2" as const;

export interface PanchangInput {
  sun_sidereal: number;
  moon_sidereal: number;
  instant: Instant;
  location: Location;
  ayanamsha: AyanamshaValue;
}

export type DayTimingsSource = (location: Location, instant: Instant) => Promise<DayTimings>;

export interface DerivePanchangOptions {
  tables?: PanchangTables;
  /** Supplies cached day timings; defaults to solving them with the provider. */
  dayTimings?: DayTimingsSource;
}

/**
 * Full panchang for one instant and place. Elements come from the sidereal
 * longitudes; timings and end times from the provider. Any failure
 * propagates, so a result is either complete or not returned. The result is
 * checked against PanchangResultSchema before it is handed out.
 */
export async function derivePanchang(
  input: PanchangInput,
  ephemeris: EphemerisProvider,
  options: DerivePanchangOptions = {}
): Promise<PanchangResult> {
  const tables = options.tables ?? panchangTables();
  const elements = deriveCalendarElements(input.sun_sidereal, input.moon_sidereal, tables);

  const [day, elementEnds] = await Promise.all([
    options.dayTimings
      ? options.dayTimings(input.location, input.instant)
      : deriveDayTimings(input.location, input.instant, ephemeris, { tables }),
    elementEndTimes(
      {
        instant: input.instant,
        tithi_value: elements.tithi.value,
        moon_sidereal: input.moon_sidereal,
        ayanamsha_deg: input.ayanamsha.degrees,
      },
      ephemeris
    ),
  ]);

  const varaIndex = varaIndexFor(input.instant, day);
  const vara = tables.varas[varaIndex];
  const sunSidereal = normalizeDegrees(input.sun_sidereal);
  const moonSidereal = normalizeDegrees(input.moon_sidereal);

  return PanchangResultSchema.parse({
    schema_version: PANCHANG_SCHEMA_VERSION,
    instant: input.instant.utc,
    location: {
      latitude: input.location.latitude,
      longitude: input.location.longitude,
      elevation_m: input.location.elevation_m,
    },
    ayanamsha: {
      system: input.ayanamsha.system,
      degrees: input.ayanamsha.degrees,
      extrapolated: input.ayanamsha.extrapolated,
    },
    longitudes: {
      sun_tropical: normalizeDegrees(sunSidereal + input.ayanamsha.degrees),
      moon_tropical: normalizeDegrees(moonSidereal + input.ayanamsha.degrees),
      sun_sidereal: sunSidereal,
      moon_sidereal: moonSidereal,
    },
    ...elements,
    vara: { index: varaIndex, name: vara.name, sanskrit: vara.sanskrit, lord: vara.lord },
    element_ends: elementEnds,
    panchaka: derivePanchaka(elements.nakshatra.name, varaIndex, tables),
    day,
    traditional_years: traditionalYears(input.instant, input.location.longitude),
  });
}
