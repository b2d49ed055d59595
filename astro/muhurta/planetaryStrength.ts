import { EphemerisUnavailableError } from "../errors.js";
import { isFiniteLongitude, normalizeDegrees } from "../math/angles.js";
import { panchangTables, type PanchangTables } from "../panchang/panchangTables.js";

export const PLANET_BODIES = ["sun", "moon", "mars", "mercury", "jupiter", "venus", "saturn"] as const;
export type PlanetBody = (typeof PLANET_BODIES)[number];

export type Dignity = "exalted" | "own_sign" | "debilitated" | "neutral";

export interface PlanetDignity {
  planet: PlanetBody;
  sign_index: number;
  dignity: Dignity;
  favorability: number;
}

const DIGNITY_SCORE: Record<Exclude<Dignity, "neutral">, number> = {
  exalted: 1,
  own_sign: 0.75,
  debilitated: 0,
};

export function dignityFor(
  planet: PlanetBody,
  siderealLongitude: number,
  tables: PanchangTables = panchangTables()
): Dignity {
  const sign = Math.min(11, Math.floor(normalizeDegrees(siderealLongitude) / 30));
  const table = tables.dignities[planet];
  if (sign === table.exalted) return "exalted";
  if (sign === table.debilitated) return "debilitated";
  if (table.own.includes(sign)) return "own_sign";
  return "neutral";
}

/**
 * Average sign-dignity favorability of the key planets. Planets in no
 * special dignity take the neutral value.
 */
export function planetaryStrength(
  keyPlanets: readonly PlanetBody[],
  siderealLongitudes: Partial<Record<PlanetBody, number>>,
  neutral: number,
  tables: PanchangTables = panchangTables()
): { favorability: number; planets: PlanetDignity[] } {
  if (keyPlanets.length === 0) {
    return { favorability: neutral, planets: [] };
  }

  const planets = keyPlanets.map((planet): PlanetDignity => {
    const lon = siderealLongitudes[planet];
    if (lon === undefined || !isFiniteLongitude(lon)) {
      throw new EphemerisUnavailableError(`Missing or malformed ${planet} longitude`, { body: planet });
    }
    const dignity = dignityFor(planet, lon, tables);
    return {
      planet,
      sign_index: Math.min(11, Math.floor(normalizeDegrees(lon) / 30)),
      dignity,
      favorability: dignity === "neutral" ? neutral : DIGNITY_SCORE[dignity],
    };
  });

  const favorability = planets.reduce((sum, p) => sum + p.favorability, 0) / planets.length;
  return { favorability, planets };
}
