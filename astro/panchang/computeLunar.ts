/**
 * Pure functions for lunar phase data.
 * No ephemeris access; sidereal or tropical longitudes give the same result.
 */

import { directedElongation, normalizeDegrees, toRadians } from "../math/angles.js";
import type { LunarPhaseName, MoonPhase } from "../schemas/panchang.schema.js";

const PHASE_LABELS: Record<LunarPhaseName, string> = {
  new: "New Moon",
  waxing_crescent: "Waxing Crescent",
  first_quarter: "First Quarter",
  waxing_gibbous: "Waxing Gibbous",
  full: "Full Moon",
  waning_gibbous: "Waning Gibbous",
  last_quarter: "Last Quarter",
  waning_crescent: "Waning Crescent",
};

/**
 * Phase name from directed elongation (Moon minus Sun, 0-360).
 *
 * Each name covers 45 degrees centered on its nominal angle:
 * - 0°: New Moon
 * - 45°: Waxing Crescent
 * - 90°: First Quarter
 * - 135°: Waxing Gibbous
 * - 180°: Full Moon
 * - 225°: Waning Gibbous
 * - 270°: Last Quarter
 * - 315°: Waning Crescent
 */
export function phaseNameFromElongation(elongationDeg: number): LunarPhaseName {
  const angle = directedElongation(0, elongationDeg);

  if (angle < 22.5 || angle >= 337.5) {
    return "new";
  } else if (angle < 67.5) {
    return "waxing_crescent";
  } else if (angle < 112.5) {
    return "first_quarter";
  } else if (angle < 157.5) {
    return "waxing_gibbous";
  } else if (angle < 202.5) {
    return "full";
  } else if (angle < 247.5) {
    return "waning_gibbous";
  } else if (angle < 292.5) {
    return "last_quarter";
  } else {
    return "waning_crescent";
  }
}

/**
 * illumination = (1 - cos(elongation)) / 2 * 100, rounded to 2 decimals.
 * 0° → 0%, 180° → 100%.
 */
export function illuminationFromElongation(elongationDeg: number): number {
  const illumination = (1 - Math.cos(toRadians(elongationDeg))) / 2;
  return Number((illumination * 100).toFixed(2));
}

export function computeLunarPhase(sunLongitude: number, moonLongitude: number): MoonPhase {
  const elongation = directedElongation(sunLongitude, moonLongitude);
  const phaseName = phaseNameFromElongation(elongation);

  return {
    phase_name: phaseName,
    label: PHASE_LABELS[phaseName],
    // Rounding can carry 359.99996 up to 360.
    elongation_deg: normalizeDegrees(Number(elongation.toFixed(4))),
    illumination_pct: illuminationFromElongation(elongation),
  };
}
