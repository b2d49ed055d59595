import { describe, expect, it } from "vitest";
import { deriveCalendarElements, karanaForIndex, tithiProgress } from "../deriveCalendarElements.js";
import { EphemerisUnavailableError } from "../../errors.js";

describe("deriveCalendarElements", () => {
  it("derives a waxing Ekadashi (sun 280°, moon 45°)", () => {
    const el = deriveCalendarElements(280, 45);

    expect(el.tithi).toEqual({
      index: 10,
      number: 11,
      value: 125 / 12,
      paksha: "Shukla",
      name: "Ekadashi",
      progress_pct: 41.67,
    });
    expect(el.nakshatra.index).toBe(3);
    expect(el.nakshatra.name).toBe("Rohini");
    expect(el.nakshatra.lord).toBe("Moon");
    expect(el.nakshatra.pada).toBe(2);
    expect(el.nakshatra.progress_pct).toBe(37.5);
    expect(el.yoga).toEqual({ index: 24, name: "Brahma" });
    expect(el.karana).toEqual({ index: 20, name: "Vanija", kind: "movable" });
    expect(el.sun_rashi).toEqual({ index: 9, name: "Makara", lord: "Saturn" });
    expect(el.moon_rashi).toEqual({ index: 1, name: "Vrishabha", lord: "Venus" });
    expect(el.moon_phase.phase_name).toBe("waxing_gibbous");
    expect(el.moon_phase.illumination_pct).toBe(78.68);
  });

  it("derives Shukla Pratipada and a new moon at conjunction", () => {
    const el = deriveCalendarElements(10, 10);
    expect(el.tithi.index).toBe(0);
    expect(el.tithi.number).toBe(1);
    expect(el.tithi.value).toBe(0);
    expect(el.tithi.paksha).toBe("Shukla");
    expect(el.tithi.name).toBe("Pratipada");
    expect(el.karana).toEqual({ index: 0, name: "Kimstughna", kind: "fixed" });
    expect(el.moon_phase.phase_name).toBe("new");
    expect(el.moon_phase.illumination_pct).toBe(0);
  });

  it("derives Krishna Pratipada and a full moon at opposition", () => {
    const el = deriveCalendarElements(0, 180);
    expect(el.tithi.number).toBe(16);
    expect(el.tithi.paksha).toBe("Krishna");
    expect(el.tithi.name).toBe("Pratipada");
    expect(el.karana).toEqual({ index: 30, name: "Balava", kind: "movable" });
    expect(el.moon_phase.phase_name).toBe("full");
    expect(el.moon_phase.illumination_pct).toBe(100);
  });

  it("ends the month on Amavasya with the Naga karana", () => {
    const el = deriveCalendarElements(0, 359.99);
    expect(el.tithi.number).toBe(30);
    expect(el.tithi.name).toBe("Amavasya");
    expect(el.karana.name).toBe("Naga");
    expect(el.nakshatra.name).toBe("Revati");
    expect(el.nakshatra.pada).toBe(4);
  });

  it("keeps every index inside its modulus", () => {
    const samples = [0, 1e-12, 7.3, 13.333333333333334, 90, 179.999999, 180, 271.9, 359.9999999999];
    for (let sun = 0; sun < 360; sun += 7.3) samples.push(sun);
    for (const sun of samples) {
      for (const moon of samples) {
        const el = deriveCalendarElements(sun, moon);
        expect(el.tithi.value).toBeGreaterThanOrEqual(0);
        expect(el.tithi.value).toBeLessThan(30);
        expect(el.tithi.index).toBeGreaterThanOrEqual(0);
        expect(el.tithi.index).toBeLessThan(30);
        expect(el.nakshatra.index).toBeGreaterThanOrEqual(0);
        expect(el.nakshatra.index).toBeLessThan(27);
        expect(el.nakshatra.pada).toBeGreaterThanOrEqual(1);
        expect(el.nakshatra.pada).toBeLessThanOrEqual(4);
        expect(el.yoga.index).toBeGreaterThanOrEqual(0);
        expect(el.yoga.index).toBeLessThan(27);
        expect(el.karana.index).toBeGreaterThanOrEqual(0);
        expect(el.karana.index).toBeLessThan(60);
      }
    }
  });

  it("normalizes longitudes outside [0, 360)", () => {
    expect(deriveCalendarElements(370, 370).tithi.value).toBe(0);
    expect(deriveCalendarElements(-80, 45).sun_rashi.name).toBe("Makara");
  });

  it("rejects missing or malformed longitudes", () => {
    expect(() => deriveCalendarElements(Number.NaN, 10)).toThrow(EphemerisUnavailableError);
    expect(() => deriveCalendarElements(10, Number.POSITIVE_INFINITY)).toThrow(EphemerisUnavailableError);
  });
});

describe("karanaForIndex", () => {
  it("pins the fixed karanas to the first and last slots", () => {
    expect(karanaForIndex(0).name).toBe("Kimstughna");
    expect(karanaForIndex(1).name).toBe("Bava");
    expect(karanaForIndex(7).name).toBe("Vishti");
    expect(karanaForIndex(8).name).toBe("Bava");
    expect(karanaForIndex(56).name).toBe("Vishti");
    expect(karanaForIndex(57).name).toBe("Shakuni");
    expect(karanaForIndex(58).name).toBe("Chatushpada");
    expect(karanaForIndex(59).name).toBe("Naga");
  });

  it("uses 11 names, each movable one eight times per month", () => {
    const counts = new Map<string, number>();
    for (let i = 0; i < 60; i++) {
      const { name } = karanaForIndex(i);
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
    expect(counts.size).toBe(11);
    for (const name of ["Bava", "Balava", "Kaulava", "Taitila", "Gara", "Vanija", "Vishti"]) {
      expect(counts.get(name)).toBe(8);
    }
    for (const name of ["Kimstughna", "Shakuni", "Chatushpada", "Naga"]) {
      expect(counts.get(name)).toBe(1);
    }
  });
});

describe("tithiProgress", () => {
  it("reports how far through the current tithi and nakshatra the Moon is", () => {
    expect(tithiProgress(0, 6)).toEqual({ tithi_pct: 50, nakshatra_pct: 45 });
  });
});
