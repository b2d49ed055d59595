import { createLocation, type Location } from "../../geo/location.js";
import type { PlanetBody } from "../../muhurta/planetaryStrength.js";
import type { MuhurtaSample } from "../../muhurta/scoreMuhurtaSample.js";
import type { MuhurtaSampleSource } from "../../muhurta/searchMuhurta.js";
import { assembleDayTimings, localDayFor } from "../../panchang/deriveDayTimings.js";
import { derivePanchang } from "../../panchang/derivePanchang.js";
import type { DayTimings } from "../../schemas/panchang.schema.js";
import { createInstant, type Instant } from "../../time/instant.js";
import { FakeSkyProvider } from "./fakeSkyProvider.js";

export const GREENWICH_40N: Location = createLocation({ latitude: 40, longitude: 0 });

/**
 * Sunday 2024-01-07 at longitude 0 with sunrise 06:00Z and sunset 18:00Z.
 * Segments are 90 min: Rahu 16:30-18:00, Gulika 15:00-16:30,
 * Yamaganda 12:00-13:30.
 */
export function sundayTimings(): DayTimings {
  const day = localDayFor(Date.parse("2024-01-07T12:00:00Z"), 0);
  return assembleDayTimings(
    day,
    Date.parse("2024-01-07T06:00:00Z"),
    Date.parse("2024-01-07T18:00:00Z"),
    null,
    null
  );
}

/** Sunrise 06:00 and sunset 18:00 local mean time on whichever day `instant` falls in. */
export async function dawnToDuskTimings(location: Location, instant: Instant): Promise<DayTimings> {
  const day = localDayFor(instant.epoch_ms, location.longitude);
  return assembleDayTimings(day, day.start_ms + 6 * 3_600_000, day.start_ms + 18 * 3_600_000, null, null);
}

export interface FixedSky {
  sun: number;
  moon: number;
  planets?: Partial<Record<PlanetBody, number>>;
}

export async function sampleAt(instant: Instant, location: Location, sky: FixedSky): Promise<MuhurtaSample> {
  const timings = sundayTimings();
  const panchang = await derivePanchang(
    {
      sun_sidereal: sky.sun,
      moon_sidereal: sky.moon,
      instant,
      location,
      ayanamsha: { system: "LAHIRI", degrees: 24, extrapolated: false, jd_tt: instant.jd_tt },
    },
    new FakeSkyProvider(),
    { dayTimings: async () => timings }
  );
  return { panchang, planet_longitudes: { sun: sky.sun, moon: sky.moon, ...sky.planets } };
}

export function sampleAtIso(iso: string, sky: FixedSky): Promise<MuhurtaSample> {
  return sampleAt(createInstant(iso), GREENWICH_40N, sky);
}

/** A source whose sky never moves, with Sunday's timings for every sample. */
export function fixedSkySource(sky: FixedSky): MuhurtaSampleSource {
  return (instant, location) => sampleAt(instant, location, sky);
}
