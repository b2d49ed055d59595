import { z } from "zod";
import { IntervalSchema } from "./panchang.schema.js";

/**
 * Zod schema for muhurta search output.
 *
 * Versioning follows the rule set: results are keyed and cached per
 * rule_version, so a new rule file never reads stale candidates.
 */

export const QualityTierSchema = z.enum(["excellent", "very_good", "good", "average", "poor", "avoid"]);

const FactorNameSchema = z.enum([
  "tithi",
  "nakshatra",
  "yoga",
  "karana",
  "vara",
  "moon_phase",
  "planetary_strength",
]);

const KaalKindSchema = z.enum(["rahu_kaal", "gulika_kaal", "yamaganda_kaal"]);

export const FactorBreakdownSchema = z.object({
  factor: FactorNameSchema,
  value: z.string(),
  favorability: z.number().min(0).max(1),
  weight: z.number().min(0).max(1),
  contribution: z.number().min(0).max(100),
  verdict: z.enum(["helped", "hurt", "neutral"]),
});

export const MuhurtaCandidateSchema = z.object({
  window: IntervalSchema,
  score: z.number().int().min(0).max(100),
  tier: QualityTierSchema,
  factors: z.array(FactorBreakdownSchema),
  helped: z.array(z.string()),
  hurt: z.array(z.string()),
  warnings: z.array(z.string()),
  excluded_by: z.array(KaalKindSchema),
  summary: z.object({
    tithi: z.string(),
    nakshatra: z.string(),
    yoga: z.string(),
    karana: z.string(),
    vara: z.string(),
  }),
});

export const MuhurtaSearchResultSchema = z.object({
  event_type: z.string(),
  rule_version: z.string(),
  candidates: z.array(MuhurtaCandidateSchema),
  partial: z.boolean(),
  samples_evaluated: z.number().int().min(0),
  samples_skipped: z.number().int().min(0),
  samples_total: z.number().int().min(0),
});

export const MuhurtaCalendarDaySchema = z.object({
  local_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  best_score: z.number().int().min(0).max(100),
  candidates: z.array(MuhurtaCandidateSchema).min(1),
});

/** Days in a date range that hold at least one window of the requested quality. */
export const MuhurtaCalendarSchema = z.object({
  event_type: z.string(),
  rule_version: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  days: z.array(MuhurtaCalendarDaySchema),
  days_searched: z.number().int().min(0),
  partial: z.boolean(),
});

export type FactorBreakdown = z.infer<typeof FactorBreakdownSchema>;
export type MuhurtaCandidate = z.infer<typeof MuhurtaCandidateSchema>;
export type MuhurtaSearchResult = z.infer<typeof MuhurtaSearchResultSchema>;
export type MuhurtaCalendarDay = z.infer<typeof MuhurtaCalendarDaySchema>;
export type MuhurtaCalendar = z.infer<typeof MuhurtaCalendarSchema>;
