/**
 * Angle helpers shared by every layer.
 * Pure functions, degrees in and out unless the name says otherwise.
 */

export const DEG_PER_RAD = 180 / Math.PI;

/**
 * Normalize degrees to the half-open range [0, 360).
 *
 * `((x % 360) + 360) % 360` can return exactly 360 for tiny negative inputs,
 * so that case is folded back to 0. Negative zero comes back as 0.
 */
export function normalizeDegrees(value: number): number {
  let v = value % 360;
  if (v < 0) v += 360;
  if (v >= 360) v -= 360;
  return v === 0 ? 0 : v;
}

export function toRadians(degrees: number): number {
  return degrees / DEG_PER_RAD;
}

export function toDegrees(radians: number): number {
  return radians * DEG_PER_RAD;
}

/**
 * Shortest signed difference a - b on the circle, in (-180, 180].
 */
export function signedAngleDifference(a: number, b: number): number {
  const d = normalizeDegrees(a - b);
  return d > 180 ? d - 360 : d;
}

/**
 * Directed elongation of `to` from `from` (e.g. Moon from Sun), in [0, 360).
 */
export function directedElongation(from: number, to: number): number {
  return normalizeDegrees(to - from);
}

/**
 * Unsigned separation between two longitudes (0-180 degrees).
 */
export function angularSeparation(lon1: number, lon2: number): number {
  return Math.abs(signedAngleDifference(lon1, lon2));
}

export function isFiniteLongitude(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}
