/**
 * ΔT = TT - UT, in seconds, by linear interpolation over a coarse
 * historical/predicted table. After the table the long-term parabola
 * -20 + 32u² (u = (year - 1820) / 100) takes over, shifted to meet the last
 * row, up to LONG_TERM_MAX_YEAR. Outside that the correction is undefined
 * and callers must treat the instant as invalid.
 */

const DELTA_T_TABLE: ReadonlyArray<readonly [year: number, seconds: number]> = [
  [-500, 17190],
  [0, 10583],
  [500, 5700],
  [1000, 1570],
  [1500, 200],
  [1600, 120],
  [1700, 9],
  [1800, 14],
  [1900, -3],
  [1950, 29],
  [2000, 64],
  [2020, 69],
  [2050, 93],
  [2100, 203],
  [2150, 328],
];

const [TABLE_END_YEAR, TABLE_END_SECONDS] = DELTA_T_TABLE[DELTA_T_TABLE.length - 1];
const LONG_TERM_MAX_YEAR = 3000;

export const DELTA_T_MIN_YEAR = DELTA_T_TABLE[0][0];
export const DELTA_T_MAX_YEAR = LONG_TERM_MAX_YEAR;

function longTermParabola(decimalYear: number): number {
  const u = (decimalYear - 1820) / 100;
  return -20 + 32 * u * u;
}

/**
 * @returns ΔT in seconds, or null when the year is outside the supported range.
 */
export function estimateDeltaTSeconds(decimalYear: number): number | null {
  if (
    !Number.isFinite(decimalYear) ||
    decimalYear < DELTA_T_MIN_YEAR ||
    decimalYear > DELTA_T_MAX_YEAR
  ) {
    return null;
  }

  if (decimalYear > TABLE_END_YEAR) {
    return longTermParabola(decimalYear) - longTermParabola(TABLE_END_YEAR) + TABLE_END_SECONDS;
  }

  for (let i = 0; i < DELTA_T_TABLE.length - 1; i++) {
    const [y1, dt1] = DELTA_T_TABLE[i];
    const [y2, dt2] = DELTA_T_TABLE[i + 1];
    if (decimalYear >= y1 && decimalYear <= y2) {
      return dt1 + ((dt2 - dt1) * (decimalYear - y1)) / (y2 - y1);
    }
  }

  return null;
}
