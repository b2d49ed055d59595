import type { EphemerisProvider } from "../ephemeris/ephemerisProvider.js";
import { normalizeDegrees, signedAngleDifference } from "../math/angles.js";
import type { ElementEnds } from "../schemas/panchang.schema.js";
import { createInstant, isoFromEpochMs, type Instant } from "../time/instant.js";
import { NAKSHATRA_SPAN_DEG, TITHI_SPAN_DEG } from "./deriveCalendarElements.js";
import { findHorizonCrossing, type SolverOptions } from "./solveRiseSet.js";

/** Longest tithi or nakshatra is under 27 h. */
export const ELEMENT_END_SEARCH_MS = 36 * 3_600_000;

const END_TIME_SOLVER: Partial<SolverOptions> = {
  scanStepMs: 60 * 60_000,
  retries: 0,
};

/**
 * First time after `startMs` at which `angleAt` passes `targetDeg` moving
 * forward, or null when it does not within `searchMs`.
 *
 * The signed difference to the target rises through 0 at the crossing; the
 * wrap on the far side of the circle falls, so it is never taken for one.
 */
export async function findAngleCrossing(
  angleAt: (epochMs: number) => Promise<number>,
  targetDeg: number,
  startMs: number,
  searchMs: number = ELEMENT_END_SEARCH_MS,
  solver: Partial<SolverOptions> = {}
): Promise<number | null> {
  const result = await findHorizonCrossing(
    {
      altitudeAt: async (epochMs) => signedAngleDifference(await angleAt(epochMs), targetDeg),
      horizonDeg: 0,
      direction: "rise",
      startMs,
      endMs: startMs + searchMs,
    },
    { ...END_TIME_SOLVER, ...solver }
  );
  return result.status === "found" ? result.epoch_ms : null;
}

export interface ElementEndInput {
  instant: Instant;
  /** Tithi value in [0, 30) at the instant. */
  tithi_value: number;
  moon_sidereal: number;
  /** Held fixed over the search; it moves well under an arcsecond a day. */
  ayanamsha_deg: number;
}

/**
 * When the current tithi and nakshatra end. Tithi follows the Moon-Sun
 * elongation (the ayanamsha cancels); nakshatra the sidereal Moon.
 */
export async function elementEndTimes(
  input: ElementEndInput,
  ephemeris: EphemerisProvider,
  solver: Partial<SolverOptions> = {}
): Promise<ElementEnds> {
  const startMs = input.instant.epoch_ms;
  const tithiTarget = normalizeDegrees((Math.floor(input.tithi_value) + 1) * TITHI_SPAN_DEG);
  const nakshatraTarget = normalizeDegrees(
    (Math.floor(normalizeDegrees(input.moon_sidereal) / NAKSHATRA_SPAN_DEG) + 1) * NAKSHATRA_SPAN_DEG
  );

  const elongationAt = async (epochMs: number): Promise<number> => {
    const at = createInstant(epochMs);
    const [sun, moon] = await Promise.all([ephemeris.getLongitude("sun", at), ephemeris.getLongitude("moon", at)]);
    return normalizeDegrees(moon - sun);
  };
  const siderealMoonAt = async (epochMs: number): Promise<number> =>
    normalizeDegrees((await ephemeris.getLongitude("moon", createInstant(epochMs))) - input.ayanamsha_deg);

  const [tithiEnd, nakshatraEnd] = await Promise.all([
    findAngleCrossing(elongationAt, tithiTarget, startMs, ELEMENT_END_SEARCH_MS, solver),
    findAngleCrossing(siderealMoonAt, nakshatraTarget, startMs, ELEMENT_END_SEARCH_MS, solver),
  ]);

  return {
    tithi: tithiEnd === null ? null : isoFromEpochMs(tithiEnd),
    nakshatra: nakshatraEnd === null ? null : isoFromEpochMs(nakshatraEnd),
  };
}
