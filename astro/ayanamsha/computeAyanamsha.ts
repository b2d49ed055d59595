import { InvalidRequestError } from "../errors.js";
import { normalizeDegrees, signedAngleDifference, isFiniteLongitude } from "../math/angles.js";
import { createInstant, decimalYearFromJulianDay, J2000_JD, type Instant } from "../time/instant.js";
import {
  defaultAyanamshaTable,
  getAyanamshaDefinition,
  mapAyanamshaSystems,
  type AyanamshaDefinition,
  type AyanamshaSystem,
  type AyanamshaTable,
} from "./ayanamshaSystems.js";

const DAYS_PER_JULIAN_YEAR = 365.25;
const DAYS_PER_JULIAN_CENTURY = 36_525;

export interface AyanamshaValue {
  system: AyanamshaSystem;
  degrees: number;
  extrapolated: boolean;
  jd_tt: number;
}

function jdForYear(year: number): number {
  return J2000_JD + (year - 2000) * DAYS_PER_JULIAN_YEAR;
}

function polynomialDegrees(def: AyanamshaDefinition, jdTt: number): number {
  const t = (jdTt - def.epoch_jd_tt) / DAYS_PER_JULIAN_CENTURY;
  const arcsec =
    def.rate_arcsec_per_year * 100 * t +
    def.quadratic_arcsec_per_century2 * t * t +
    def.cubic_arcsec_per_century3 * t * t * t;
  return def.base_offset_deg + arcsec / 3600;
}

/**
 * Offset for one system. Inside the validated range the full polynomial
 * applies; outside it the value continues linearly from the nearest
 * boundary at the system's base rate.
 */
export function offsetDegrees(def: AyanamshaDefinition, jdTt: number): { degrees: number; extrapolated: boolean } {
  const year = decimalYearFromJulianDay(jdTt);
  if (year >= def.valid_from_year && year <= def.valid_to_year) {
    return { degrees: polynomialDegrees(def, jdTt), extrapolated: false };
  }

  const boundaryYear = year < def.valid_from_year ? def.valid_from_year : def.valid_to_year;
  const boundaryJd = jdForYear(boundaryYear);
  const years = (jdTt - boundaryJd) / DAYS_PER_JULIAN_YEAR;
  return {
    degrees: polynomialDegrees(def, boundaryJd) + (def.rate_arcsec_per_year * years) / 3600,
    extrapolated: true,
  };
}

export function ayanamsha(
  system: AyanamshaSystem,
  instant: Instant,
  table: AyanamshaTable = defaultAyanamshaTable()
): AyanamshaValue {
  const { degrees, extrapolated } = offsetDegrees(getAyanamshaDefinition(system, table), instant.jd_tt);
  return { system, degrees, extrapolated, jd_tt: instant.jd_tt };
}

export function compareAll(
  instant: Instant,
  table: AyanamshaTable = defaultAyanamshaTable()
): Record<AyanamshaSystem, AyanamshaValue> {
  return mapAyanamshaSystems((system) => ayanamsha(system, instant, table));
}

function requireLongitude(value: number, label: string): void {
  if (!isFiniteLongitude(value)) {
    throw new InvalidRequestError(`${label} longitude must be a finite number`, { [label]: value });
  }
}

export function toSidereal(
  tropical: number,
  system: AyanamshaSystem,
  instant: Instant,
  table?: AyanamshaTable
): number {
  requireLongitude(tropical, "tropical");
  return normalizeDegrees(tropical - ayanamsha(system, instant, table).degrees);
}

export function toTropical(
  sidereal: number,
  system: AyanamshaSystem,
  instant: Instant,
  table?: AyanamshaTable
): number {
  requireLongitude(sidereal, "sidereal");
  return normalizeDegrees(sidereal + ayanamsha(system, instant, table).degrees);
}

export interface AyanamshaSystemInfo {
  system: AyanamshaSystem;
  label: string;
  epoch_jd_tt: number;
  base_offset_deg: number;
  rate_arcsec_per_year: number;
  valid_from_year: number;
  valid_to_year: number;
  table_version: string;
}

export function describeAyanamshaSystem(
  system: AyanamshaSystem,
  table: AyanamshaTable = defaultAyanamshaTable()
): AyanamshaSystemInfo {
  const def = getAyanamshaDefinition(system, table);
  return {
    system,
    label: def.label,
    epoch_jd_tt: def.epoch_jd_tt,
    base_offset_deg: def.base_offset_deg,
    rate_arcsec_per_year: def.rate_arcsec_per_year,
    valid_from_year: def.valid_from_year,
    valid_to_year: def.valid_to_year,
    table_version: table.table_version,
  };
}

/** Signed difference a - b in degrees, shortest way round. */
export function ayanamshaDifference(
  instant: Instant,
  a: AyanamshaSystem,
  b: AyanamshaSystem,
  table?: AyanamshaTable
): number {
  return signedAngleDifference(ayanamsha(a, instant, table).degrees, ayanamsha(b, instant, table).degrees);
}

export interface AyanamshaSeriesPoint {
  year: number;
  degrees: number;
  extrapolated: boolean;
}

/**
 * Values on 1 January (UTC) of every `stepYears`-th year in [startYear, endYear].
 */
export function ayanamshaSeries(
  system: AyanamshaSystem,
  startYear: number,
  endYear: number,
  stepYears = 10,
  table?: AyanamshaTable
): AyanamshaSeriesPoint[] {
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear) || endYear < startYear) {
    throw new InvalidRequestError("Series years must be integers with endYear >= startYear", {
      startYear,
      endYear,
    });
  }
  if (!Number.isInteger(stepYears) || stepYears <= 0) {
    throw new InvalidRequestError("stepYears must be a positive integer", { stepYears });
  }

  const points: AyanamshaSeriesPoint[] = [];
  for (let year = startYear; year <= endYear; year += stepYears) {
    const d = new Date(0);
    d.setUTCFullYear(year, 0, 1);
    const value = ayanamsha(system, createInstant(d), table);
    points.push({ year, degrees: value.degrees, extrapolated: value.extrapolated });
  }
  return points;
}
