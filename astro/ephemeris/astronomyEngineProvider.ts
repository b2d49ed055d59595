import * as Astronomy from "astronomy-engine";
import { EphemerisUnavailableError } from "../errors.js";
import type { Location } from "../geo/location.js";
import { normalizeDegrees } from "../math/angles.js";
import type { Instant } from "../time/instant.js";
import { engineLogHelpers } from "../../logging/engineLog.js";
import type { BodyId, EphemerisProvider } from "./ephemerisProvider.js";

const BODY_MAP: Record<BodyId, Astronomy.Body> = {
  sun: Astronomy.Body.Sun,
  moon: Astronomy.Body.Moon,
  mercury: Astronomy.Body.Mercury,
  venus: Astronomy.Body.Venus,
  mars: Astronomy.Body.Mars,
  jupiter: Astronomy.Body.Jupiter,
  saturn: Astronomy.Body.Saturn,
};

export interface AstronomyEngineProviderOptions {
  minYear?: number;
  maxYear?: number;
}

/**
 * Default provider, backed by astronomy-engine (pure JS, no data files).
 */
export class AstronomyEngineProvider implements EphemerisProvider {
  readonly name = "astronomy-engine";
  readonly minYear: number;
  readonly maxYear: number;

  constructor(options: AstronomyEngineProviderOptions = {}) {
    this.minYear = options.minYear ?? 1600;
    this.maxYear = options.maxYear ?? 2400;
  }

  async getLongitude(body: BodyId, instant: Instant): Promise<number> {
    return this.run(body, instant, (date) => {
      const vector = Astronomy.GeoVector(BODY_MAP[body], date, true);
      return normalizeDegrees(Astronomy.Ecliptic(vector).elon);
    });
  }

  async getAltitude(body: BodyId, instant: Instant, location: Location): Promise<number> {
    return this.run(body, instant, (date) => {
      const observer = new Astronomy.Observer(location.latitude, location.longitude, location.elevation_m);
      const eq = Astronomy.Equator(BODY_MAP[body], date, observer, true, true);
      return Astronomy.Horizon(date, observer, eq.ra, eq.dec).altitude;
    });
  }

  private run(body: BodyId, instant: Instant, compute: (date: Date) => number): number {
    const year = new Date(instant.epoch_ms).getUTCFullYear();
    if (year < this.minYear || year > this.maxYear) {
      throw new EphemerisUnavailableError(
        `${this.name} supports years ${this.minYear} to ${this.maxYear}, got ${year}`,
        { instant: instant.utc, body }
      );
    }

    let value: number;
    try {
      value = compute(new Date(instant.epoch_ms));
    } catch (e) {
      engineLogHelpers.ephemerisFailed({ body, instant: instant.utc, error: e });
      throw new EphemerisUnavailableError(
        `${this.name} failed for ${body} at ${instant.utc}`,
        { instant: instant.utc, body },
        { cause: e }
      );
    }

    if (!Number.isFinite(value)) {
      throw new EphemerisUnavailableError(`${this.name} returned a non-finite value for ${body}`, {
        instant: instant.utc,
        body,
      });
    }
    return value;
  }
}
