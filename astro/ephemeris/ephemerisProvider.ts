import type { Location } from "../geo/location.js";
import type { Instant } from "../time/instant.js";

export const BODY_IDS = ["sun", "moon", "mercury", "venus", "mars", "jupiter", "saturn"] as const;

export type BodyId = (typeof BODY_IDS)[number];

export interface BodyLongitude {
  body: BodyId;
  /** Tropical apparent geocentric ecliptic longitude, [0, 360). */
  longitude: number;
}

/**
 * Source of raw body positions. Implementations reject with
 * EphemerisUnavailableError outside their supported range.
 */
export interface EphemerisProvider {
  readonly name: string;
  getLongitude(body: BodyId, instant: Instant): Promise<number>;
  /** Topocentric altitude in degrees, without refraction. */
  getAltitude(body: BodyId, instant: Instant, location: Location): Promise<number>;
}
