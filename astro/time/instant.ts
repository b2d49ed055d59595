import { InvalidInstantError } from "../errors.js";
import { estimateDeltaTSeconds, DELTA_T_MAX_YEAR, DELTA_T_MIN_YEAR } from "./deltaT.js";

export const MS_PER_DAY = 86_400_000;
export const MS_PER_MINUTE = 60_000;
export const JD_UNIX_EPOCH = 2440587.5;
export const J2000_JD = 2451545.0;

/**
 * A time point on a uniform timescale. `jd_tt` is the value every angle
 * computation uses; `utc` / `epoch_ms` are what callers and providers see.
 */
export interface Instant {
  readonly utc: string;
  readonly epoch_ms: number;
  readonly jd_ut: number;
  readonly jd_tt: number;
  readonly delta_t_seconds: number;
}

/** Date, ISO-8601 string with an explicit offset (or a bare YYYY-MM-DD), or epoch ms. */
export type InstantInput = Date | string | number;

const ISO_WITH_OFFSET = /T.*(Z|[+-]\d{2}:?\d{2})$/i;
const ISO_DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function julianDayFromEpochMs(epochMs: number): number {
  return epochMs / MS_PER_DAY + JD_UNIX_EPOCH;
}

export function epochMsFromJulianDay(jd: number): number {
  return (jd - JD_UNIX_EPOCH) * MS_PER_DAY;
}

export function decimalYearFromJulianDay(jd: number): number {
  return 2000 + (jd - J2000_JD) / 365.25;
}

function toEpochMs(input: InstantInput): number {
  if (input instanceof Date) {
    return input.getTime();
  }
  if (typeof input === "number") {
    return input;
  }
  const trimmed = input.trim();
  if (ISO_DATE_ONLY.test(trimmed)) {
    return Date.parse(`${trimmed}T00:00:00Z`);
  }
  if (!ISO_WITH_OFFSET.test(trimmed)) {
    throw new InvalidInstantError(
      `Instant "${input}" must be ISO-8601 with an explicit UTC offset`,
      { instant: input }
    );
  }
  return Date.parse(trimmed);
}

/**
 * Normalize an input to an Instant, applying the ΔT correction.
 * Fails with InvalidInstant for unparseable dates or dates where ΔT is undefined.
 */
export function createInstant(input: InstantInput): Instant {
  const epochMs = toEpochMs(input);
  if (!Number.isFinite(epochMs)) {
    throw new InvalidInstantError(`Invalid instant: ${String(input)}`, {
      instant: String(input),
    });
  }

  const jdUt = julianDayFromEpochMs(epochMs);
  const deltaT = estimateDeltaTSeconds(decimalYearFromJulianDay(jdUt));
  const utc = new Date(epochMs).toISOString();
  if (deltaT === null) {
    throw new InvalidInstantError(
      `ΔT is undefined for ${utc}; supported years are ${DELTA_T_MIN_YEAR} to ${DELTA_T_MAX_YEAR}`,
      { instant: utc }
    );
  }

  return Object.freeze({
    utc,
    epoch_ms: epochMs,
    jd_ut: jdUt,
    jd_tt: jdUt + deltaT / 86_400,
    delta_t_seconds: deltaT,
  });
}

export function addMinutes(instant: Instant, minutes: number): Instant {
  return createInstant(instant.epoch_ms + minutes * MS_PER_MINUTE);
}

export function isoFromEpochMs(epochMs: number): string {
  return new Date(epochMs).toISOString();
}
