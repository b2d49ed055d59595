import { EphemerisUnavailableError } from "../errors.js";
import { isFiniteLongitude, normalizeDegrees } from "../math/angles.js";
import type { Karana, MoonPhase, Nakshatra, Panchaka, Rashi, Tithi, Yoga } from "../schemas/panchang.schema.js";
import { computeLunarPhase } from "./computeLunar.js";
import { panchangTables, type PanchangTables } from "./panchangTables.js";

export const TITHI_SPAN_DEG = 12;
export const NAKSHATRA_SPAN_DEG = 360 / 27;
export const PADA_SPAN_DEG = NAKSHATRA_SPAN_DEG / 4;
export const RASHI_SPAN_DEG = 30;

export interface CalendarElements {
  tithi: Tithi;
  nakshatra: Nakshatra;
  yoga: Yoga;
  karana: Karana;
  sun_rashi: Rashi;
  moon_rashi: Rashi;
  moon_phase: MoonPhase;
}

function requireLongitude(value: number, body: "sun" | "moon"): number {
  if (!isFiniteLongitude(value)) {
    throw new EphemerisUnavailableError(`Missing or malformed ${body} longitude: ${String(value)}`, { body });
  }
  return normalizeDegrees(value);
}

function boundedIndex(value: number, modulus: number): number {
  return Math.min(Math.floor(value), modulus - 1);
}

function percentOf(value: number): number {
  return Number(((value - Math.floor(value)) * 100).toFixed(2));
}

export function deriveTithi(sun: number, moon: number, tables: PanchangTables = panchangTables()): Tithi {
  const value = normalizeDegrees(moon - sun) / TITHI_SPAN_DEG;
  const index = boundedIndex(value, 30);
  return {
    index,
    number: index + 1,
    value,
    paksha: index < 15 ? "Shukla" : "Krishna",
    name: tables.tithis[index],
    progress_pct: percentOf(value),
  };
}

export function deriveNakshatra(moon: number, tables: PanchangTables = panchangTables()): Nakshatra {
  const value = moon / NAKSHATRA_SPAN_DEG;
  const index = boundedIndex(value, 27);
  const withinNakshatra = moon - index * NAKSHATRA_SPAN_DEG;
  const entry = tables.nakshatras[index];
  return {
    index,
    name: entry.name,
    lord: entry.lord,
    pada: Math.max(1, Math.min(4, Math.floor(withinNakshatra / PADA_SPAN_DEG) + 1)),
    progress_pct: percentOf(value),
  };
}

export function deriveYoga(sun: number, moon: number, tables: PanchangTables = panchangTables()): Yoga {
  const index = boundedIndex(normalizeDegrees(sun + moon) / NAKSHATRA_SPAN_DEG, 27);
  return { index, name: tables.yogas[index] };
}

/**
 * Slot 0 is Kimstughna, slots 1-56 cycle the seven movable karanas,
 * slots 57-59 are Shakuni, Chatushpada and Naga.
 */
export function karanaForIndex(index: number, tables: PanchangTables = panchangTables()): Karana {
  const { first_fixed, movable, last_fixed } = tables.karanas;
  if (index === 0) {
    return { index, name: first_fixed, kind: "fixed" };
  }
  if (index >= 57) {
    return { index, name: last_fixed[index - 57], kind: "fixed" };
  }
  return { index, name: movable[(index - 1) % 7], kind: "movable" };
}

export function deriveKarana(tithiValue: number, tables: PanchangTables = panchangTables()): Karana {
  return karanaForIndex(Math.floor(tithiValue * 2) % 60, tables);
}

export function deriveRashi(longitude: number, tables: PanchangTables = panchangTables()): Rashi {
  const index = boundedIndex(normalizeDegrees(longitude) / RASHI_SPAN_DEG, 12);
  const entry = tables.rashis[index];
  return { index, name: entry.name, lord: entry.lord };
}

/** Panchaka runs while the Moon is in the last five nakshatras; its kind follows the vara. */
export function derivePanchaka(nakshatraName: string, varaIndex: number, tables: PanchangTables = panchangTables()): Panchaka {
  if (!tables.panchaka.nakshatras.includes(nakshatraName)) {
    return { active: false, kind: null };
  }
  return { active: true, kind: tables.panchaka.kinds_by_vara[varaIndex] ?? null };
}

/**
 * All longitude-only elements from sidereal Sun and Moon longitudes.
 */
export function deriveCalendarElements(
  sunSidereal: number,
  moonSidereal: number,
  tables: PanchangTables = panchangTables()
): CalendarElements {
  const sun = requireLongitude(sunSidereal, "sun");
  const moon = requireLongitude(moonSidereal, "moon");
  const tithi = deriveTithi(sun, moon, tables);

  return {
    tithi,
    nakshatra: deriveNakshatra(moon, tables),
    yoga: deriveYoga(sun, moon, tables),
    karana: deriveKarana(tithi.value, tables),
    sun_rashi: deriveRashi(sun, tables),
    moon_rashi: deriveRashi(moon, tables),
    moon_phase: computeLunarPhase(sun, moon),
  };
}

export interface ElementProgress {
  tithi_pct: number;
  nakshatra_pct: number;
}

export function tithiProgress(sunSidereal: number, moonSidereal: number): ElementProgress {
  const sun = requireLongitude(sunSidereal, "sun");
  const moon = requireLongitude(moonSidereal, "moon");
  return {
    tithi_pct: percentOf(normalizeDegrees(moon - sun) / TITHI_SPAN_DEG),
    nakshatra_pct: percentOf(moon / NAKSHATRA_SPAN_DEG),
  };
}
