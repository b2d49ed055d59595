import { describe, expect, it } from "vitest";
import { elementEndTimes, findAngleCrossing } from "../elementEndTimes.js";
import { normalizeDegrees } from "../../math/angles.js";
import { createInstant } from "../../time/instant.js";
import { FakeSkyProvider } from "../../__tests__/fixtures/fakeSkyProvider.js";

const HOUR = 3_600_000;

describe("findAngleCrossing", () => {
  it("follows an angle through 360° to a target of 0°", async () => {
    const at = await findAngleCrossing(async (ms) => normalizeDegrees(350 + ms / HOUR), 0, 0);
    expect(at).not.toBeNull();
    expect(Math.abs((at ?? 0) - 10 * HOUR)).toBeLessThanOrEqual(1000);
  });

  it("does not take the opposite point of the circle for the target", async () => {
    // Passes 180° away from the target at 10 h; the target itself is 190 h out.
    const at = await findAngleCrossing(async (ms) => normalizeDegrees(170 + ms / HOUR), 0, 0);
    expect(at).toBeNull();
  });
});

describe("elementEndTimes", () => {
  it("returns null end times when the bodies do not move", async () => {
    const sky = new FakeSkyProvider({ longitudes: { sun: () => 304, moon: () => 69 } });
    const ends = await elementEndTimes(
      { instant: createInstant("2024-01-07T12:00:00Z"), tithi_value: 125 / 12, moon_sidereal: 45, ayanamsha_deg: 24 },
      sky
    );
    expect(ends).toEqual({ tithi: null, nakshatra: null });
  });
});
