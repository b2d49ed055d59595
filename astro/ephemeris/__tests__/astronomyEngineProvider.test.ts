import { describe, expect, it } from "vitest";
import { AstronomyEngineProvider } from "../astronomyEngineProvider.js";
import { EphemerisUnavailableError } from "../../errors.js";
import { createLocation } from "../../geo/location.js";
import { angularSeparation } from "../../math/angles.js";
import { createInstant } from "../../time/instant.js";

describe("AstronomyEngineProvider", () => {
  const provider = new AstronomyEngineProvider();

  it("puts the Sun at the equinox point at the March equinox", async () => {
    const lon = await provider.getLongitude("sun", createInstant("2024-03-20T03:06:00Z"));
    expect(angularSeparation(lon, 0)).toBeLessThan(0.05);
  });

  it("puts the Sun near 90 degrees at the June solstice", async () => {
    const lon = await provider.getLongitude("sun", createInstant("2024-06-20T20:51:00Z"));
    expect(lon).toBeGreaterThan(89.95);
    expect(lon).toBeLessThan(90.05);
  });

  it("aligns Moon and Sun at a new moon", async () => {
    const instant = createInstant("2024-04-08T18:21:00Z");
    const sun = await provider.getLongitude("sun", instant);
    const moon = await provider.getLongitude("moon", instant);
    expect(angularSeparation(sun, moon)).toBeLessThan(0.5);
  });

  it("returns longitudes in [0, 360) for every body", async () => {
    const instant = createInstant("2031-09-02T07:00:00Z");
    for (const body of ["sun", "moon", "mercury", "venus", "mars", "jupiter", "saturn"] as const) {
      const lon = await provider.getLongitude(body, instant);
      expect(lon).toBeGreaterThanOrEqual(0);
      expect(lon).toBeLessThan(360);
    }
  });

  it("gives the noon Sun an altitude of 90 minus latitude at the equinox", async () => {
    const greenwich = createLocation({ latitude: 51.48, longitude: 0 });
    const altitude = await provider.getAltitude("sun", createInstant("2024-03-20T12:07:00Z"), greenwich);
    expect(altitude).toBeGreaterThan(38);
    expect(altitude).toBeLessThan(39.1);
  });

  it("rejects instants outside its configured range", async () => {
    const narrow = new AstronomyEngineProvider({ minYear: 1900, maxYear: 2100 });
    await expect(narrow.getLongitude("sun", createInstant("1850-01-01T00:00:00Z"))).rejects.toBeInstanceOf(
      EphemerisUnavailableError
    );
  });
});
