/**
 * Muhurta Rules v1
 *
 * Per event type: factor weights, favorable/unfavorable value sets and
 * hard exclusions. Names match data/panchangTables.v1.json.
 *
 * Version: muhurta_rules_v1
 */

import { deepFreeze } from "../../data/deepFreeze.js";
import type { PlanetBody } from "../planetaryStrength.js";
import type { LunarPhaseName } from "../../schemas/panchang.schema.js";

export const MUHURTA_EVENT_TYPES = ["marriage", "business", "travel", "education", "property", "general"] as const;
export type MuhurtaEventType = (typeof MUHURTA_EVENT_TYPES)[number];

export const MUHURTA_FACTORS = [
  "tithi",
  "nakshatra",
  "yoga",
  "karana",
  "vara",
  "moon_phase",
  "planetary_strength",
] as const;
export type MuhurtaFactor = (typeof MUHURTA_FACTORS)[number];

export const KAAL_KINDS = ["rahu_kaal", "gulika_kaal", "yamaganda_kaal"] as const;
export type KaalKind = (typeof KAAL_KINDS)[number];

export interface FactorSets {
  /** Tithi numbers 1-30 (15 = Purnima, 30 = Amavasya). */
  tithi: readonly number[];
  nakshatra: readonly string[];
  yoga: readonly string[];
  karana: readonly string[];
  vara: readonly string[];
  moon_phase: readonly LunarPhaseName[];
}

export interface MuhurtaRule {
  event_type: MuhurtaEventType;
  rule_version: string;
  /** Relative weights; scores are normalized by their sum. */
  weights: Readonly<Record<MuhurtaFactor, number>>;
  favorable: Readonly<FactorSets>;
  unfavorable: Readonly<FactorSets>;
  /** Favorability of a value in neither set, in [0, 1]. */
  neutral_favorability: number;
  /** Planets whose sign dignity feeds the planetary_strength factor. */
  key_planets: readonly PlanetBody[];
  /** Any overlap with one of these periods scores 0. */
  hard_exclusions: readonly KaalKind[];
  /** Warn when a window ends or starts this close to an excluded period. */
  boundary_warning_minutes: number;
}

export const MUHURTA_RULES_VERSION = "muhurta_rules_v1";

const WEIGHTS_V1: MuhurtaRule["weights"] = {
  tithi: 0.15,
  nakshatra: 0.15,
  yoga: 0.1,
  karana: 0.1,
  vara: 0.1,
  moon_phase: 0.1,
  planetary_strength: 0.15,
};

const COMMON_AVOID_TITHIS = [1, 4, 6, 8, 9, 14, 15, 30];
const COMMON_AVOID_NAKSHATRAS = ["Bharani", "Ashlesha", "Jyeshtha", "Mula"];
const FAVORABLE_YOGAS = ["Siddha", "Sadhya", "Shubha", "Shukla", "Brahma", "Indra"];
const UNFAVORABLE_YOGAS = ["Vyaghata", "Parigha", "Vaidhriti", "Vyatipata", "Atiganda", "Shula", "Ganda", "Vajra"];
const FAVORABLE_KARANAS = ["Bava", "Balava", "Kaulava", "Taitila", "Gara", "Vanija"];
const UNFAVORABLE_KARANAS = ["Vishti", "Shakuni", "Chatushpada", "Naga", "Kimstughna"];
const WAXING_AND_FULL: LunarPhaseName[] = ["first_quarter", "waxing_gibbous", "full"];

const businessSets = {
  favorable: {
    tithi: [2, 3, 5, 7, 10, 11, 13],
    nakshatra: [
      "Ashwini", "Rohini", "Pushya", "Magha", "Uttara Phalguni", "Hasta", "Chitra",
      "Swati", "Anuradha", "Uttara Ashadha", "Shravana", "Dhanishta", "Shatabhisha",
    ],
    yoga: FAVORABLE_YOGAS,
    karana: FAVORABLE_KARANAS,
    vara: ["Sunday", "Monday", "Wednesday", "Thursday"],
    moon_phase: WAXING_AND_FULL,
  },
  unfavorable: {
    tithi: COMMON_AVOID_TITHIS,
    nakshatra: COMMON_AVOID_NAKSHATRAS,
    yoga: UNFAVORABLE_YOGAS,
    karana: UNFAVORABLE_KARANAS,
    vara: ["Tuesday", "Saturday"],
    moon_phase: ["new"],
  },
} satisfies Pick<MuhurtaRule, "favorable" | "unfavorable">;

function rule(
  eventType: MuhurtaEventType,
  definition: Pick<MuhurtaRule, "favorable" | "unfavorable" | "key_planets" | "hard_exclusions">
): MuhurtaRule {
  return deepFreeze({
    event_type: eventType,
    rule_version: MUHURTA_RULES_VERSION,
    weights: WEIGHTS_V1,
    neutral_favorability: 0.5,
    boundary_warning_minutes: 15,
    ...definition,
  });
}

export const MUHURTA_RULES_V1: Readonly<Record<MuhurtaEventType, MuhurtaRule>> = Object.freeze({
  marriage: rule("marriage", {
    favorable: {
      tithi: [2, 3, 5, 7, 10, 11, 12, 13],
      nakshatra: [
        "Rohini", "Mrigashira", "Magha", "Uttara Phalguni", "Hasta", "Swati",
        "Anuradha", "Uttara Ashadha", "Uttara Bhadrapada", "Revati",
      ],
      yoga: FAVORABLE_YOGAS,
      karana: FAVORABLE_KARANAS,
      vara: ["Sunday", "Monday", "Wednesday", "Thursday", "Friday"],
      moon_phase: WAXING_AND_FULL,
    },
    unfavorable: {
      tithi: COMMON_AVOID_TITHIS,
      nakshatra: COMMON_AVOID_NAKSHATRAS,
      yoga: UNFAVORABLE_YOGAS,
      karana: UNFAVORABLE_KARANAS,
      vara: ["Tuesday", "Saturday"],
      moon_phase: ["new", "waning_crescent"],
    },
    key_planets: ["venus", "jupiter", "moon"],
    hard_exclusions: ["rahu_kaal", "yamaganda_kaal"],
  }),

  business: rule("business", {
    ...businessSets,
    key_planets: ["mercury", "jupiter", "venus", "moon"],
    hard_exclusions: ["rahu_kaal"],
  }),

  travel: rule("travel", {
    favorable: {
      tithi: [2, 3, 5, 6, 7, 10, 11, 12, 13],
      nakshatra: [
        "Ashwini", "Rohini", "Mrigashira", "Punarvasu", "Pushya", "Hasta", "Chitra",
        "Swati", "Anuradha", "Shravana", "Dhanishta", "Shatabhisha",
      ],
      yoga: FAVORABLE_YOGAS,
      karana: FAVORABLE_KARANAS,
      vara: ["Monday", "Wednesday", "Thursday", "Friday"],
      moon_phase: ["first_quarter", "last_quarter"],
    },
    unfavorable: {
      tithi: [1, 4, 8, 9, 14, 15, 30],
      nakshatra: COMMON_AVOID_NAKSHATRAS,
      yoga: UNFAVORABLE_YOGAS,
      karana: UNFAVORABLE_KARANAS,
      vara: ["Tuesday", "Saturday"],
      moon_phase: ["new"],
    },
    key_planets: ["moon", "mercury"],
    hard_exclusions: ["rahu_kaal"],
  }),

  education: rule("education", {
    favorable: {
      tithi: [2, 3, 5, 7, 10, 11, 12, 13],
      nakshatra: [
        "Ashwini", "Rohini", "Punarvasu", "Pushya", "Hasta", "Chitra", "Swati",
        "Anuradha", "Uttara Ashadha", "Shravana", "Dhanishta", "Revati",
      ],
      yoga: FAVORABLE_YOGAS,
      karana: FAVORABLE_KARANAS,
      vara: ["Monday", "Wednesday", "Thursday", "Friday"],
      moon_phase: WAXING_AND_FULL,
    },
    unfavorable: {
      tithi: COMMON_AVOID_TITHIS,
      nakshatra: COMMON_AVOID_NAKSHATRAS,
      yoga: UNFAVORABLE_YOGAS,
      karana: UNFAVORABLE_KARANAS,
      vara: ["Tuesday", "Saturday"],
      moon_phase: ["new"],
    },
    key_planets: ["mercury", "jupiter"],
    hard_exclusions: ["rahu_kaal"],
  }),

  property: rule("property", {
    favorable: {
      tithi: [2, 3, 5, 7, 10, 11, 12, 13],
      nakshatra: [
        "Rohini", "Mrigashira", "Pushya", "Magha", "Uttara Phalguni", "Hasta", "Chitra",
        "Swati", "Anuradha", "Uttara Ashadha", "Shravana", "Uttara Bhadrapada",
      ],
      yoga: FAVORABLE_YOGAS,
      karana: FAVORABLE_KARANAS,
      vara: ["Sunday", "Monday", "Wednesday", "Thursday", "Friday"],
      moon_phase: WAXING_AND_FULL,
    },
    unfavorable: {
      tithi: COMMON_AVOID_TITHIS,
      nakshatra: COMMON_AVOID_NAKSHATRAS,
      yoga: UNFAVORABLE_YOGAS,
      karana: UNFAVORABLE_KARANAS,
      vara: ["Tuesday", "Saturday"],
      moon_phase: ["new"],
    },
    key_planets: ["mars", "venus", "moon"],
    hard_exclusions: ["rahu_kaal"],
  }),

  // General purpose uses the business sets.
  general: rule("general", {
    ...businessSets,
    key_planets: ["jupiter", "moon"],
    hard_exclusions: ["rahu_kaal"],
  }),
});
