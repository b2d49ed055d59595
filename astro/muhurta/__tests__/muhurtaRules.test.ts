import { describe, expect, it } from "vitest";
import { getMuhurtaRule, isMuhurtaEventType, parseMuhurtaEventType } from "../muhurtaRules.js";
import { meetsMinimumQuality, parseQualityTier, QUALITY_TIERS, tierForScore } from "../muhurtaTiers.js";
import { MUHURTA_EVENT_TYPES, MUHURTA_FACTORS, MUHURTA_RULES_V1 } from "../policy/muhurtaRules.v1.js";
import { InvalidRequestError } from "../../errors.js";
import { panchangTables } from "../../panchang/panchangTables.js";

describe("muhurta rules v1", () => {
  const tables = panchangTables();
  const knownNames = new Set<string>([
    ...tables.nakshatras.map((n) => n.name),
    ...tables.yogas,
    tables.karanas.first_fixed,
    ...tables.karanas.movable,
    ...tables.karanas.last_fixed,
    ...tables.varas.map((v) => v.name),
  ]);

  it.each(MUHURTA_EVENT_TYPES)("%s names only values present in the panchang tables", (eventType) => {
    const rule = MUHURTA_RULES_V1[eventType];
    for (const sets of [rule.favorable, rule.unfavorable]) {
      for (const name of [...sets.nakshatra, ...sets.yoga, ...sets.karana, ...sets.vara]) {
        expect(knownNames.has(name), name).toBe(true);
      }
      for (const tithi of sets.tithi) {
        expect(tithi).toBeGreaterThanOrEqual(1);
        expect(tithi).toBeLessThanOrEqual(30);
      }
    }
  });

  it.each(MUHURTA_EVENT_TYPES)("%s never lists a value as both favorable and unfavorable", (eventType) => {
    const rule = MUHURTA_RULES_V1[eventType];
    const overlap = <T>(a: readonly T[], b: readonly T[]) => a.filter((v) => b.includes(v));
    expect(overlap(rule.favorable.tithi, rule.unfavorable.tithi)).toEqual([]);
    expect(overlap(rule.favorable.nakshatra, rule.unfavorable.nakshatra)).toEqual([]);
    expect(overlap(rule.favorable.karana, rule.unfavorable.karana)).toEqual([]);
    expect(overlap(rule.favorable.vara, rule.unfavorable.vara)).toEqual([]);
    expect(overlap(rule.favorable.moon_phase, rule.unfavorable.moon_phase)).toEqual([]);
  });

  it("excludes Rahu Kaal everywhere and Yamaganda for marriage only", () => {
    for (const eventType of MUHURTA_EVENT_TYPES) {
      expect(MUHURTA_RULES_V1[eventType].hard_exclusions).toContain("rahu_kaal");
    }
    expect(MUHURTA_RULES_V1.marriage.hard_exclusions).toEqual(["rahu_kaal", "yamaganda_kaal"]);
    expect(MUHURTA_RULES_V1.travel.hard_exclusions).toEqual(["rahu_kaal"]);
  });

  it("weights every factor with a positive weight", () => {
    const rule = getMuhurtaRule("general");
    for (const factor of MUHURTA_FACTORS) {
      expect(rule.weights[factor]).toBeGreaterThan(0);
    }
    const total = MUHURTA_FACTORS.reduce((sum, f) => sum + rule.weights[f], 0);
    expect(total).toBeCloseTo(0.85, 10);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(MUHURTA_RULES_V1.marriage.favorable.tithi)).toBe(true);
    expect(Object.isFrozen(MUHURTA_RULES_V1.marriage.weights)).toBe(true);
  });

  it("parses event types case-insensitively and rejects unknown ones", () => {
    expect(parseMuhurtaEventType(" Marriage ")).toBe("marriage");
    expect(isMuhurtaEventType("funeral")).toBe(false);
    expect(() => parseMuhurtaEventType("funeral")).toThrow(InvalidRequestError);
  });
});

describe("quality tiers", () => {
  it("assigns exactly one tier to every integer score", () => {
    const expected = (score: number) =>
      score >= 80 ? "excellent" : score >= 70 ? "very_good" : score >= 60 ? "good" : score >= 50 ? "average" : score >= 40 ? "poor" : "avoid";
    for (let score = 0; score <= 100; score++) {
      expect(tierForScore(score)).toBe(expected(score));
    }
  });

  it("uses inclusive lower bounds", () => {
    expect(tierForScore(80)).toBe("excellent");
    expect(tierForScore(79)).toBe("very_good");
    expect(tierForScore(40)).toBe("poor");
    expect(tierForScore(39)).toBe("avoid");
  });

  it("orders tiers for minimum-quality filtering", () => {
    expect(QUALITY_TIERS[0]).toBe("excellent");
    expect(meetsMinimumQuality("excellent", "good")).toBe(true);
    expect(meetsMinimumQuality("good", "good")).toBe(true);
    expect(meetsMinimumQuality("average", "good")).toBe(false);
    expect(meetsMinimumQuality("avoid", "avoid")).toBe(true);
  });

  it("parses tier tags", () => {
    expect(parseQualityTier("Very Good")).toBe("very_good");
    expect(parseQualityTier("very-good")).toBe("very_good");
    expect(() => parseQualityTier("great")).toThrow(InvalidRequestError);
  });
});
