import { z } from "zod";
import { AyanamshaSystemSchema } from "../ayanamsha/ayanamshaSystems.js";

/**
 * Zod schema for a derived panchang.
 *
 * Versioning:
 * - panchang_v1: five limbs + rashi, day timings, kaal periods, traditional years.
 * - panchang_v2: adds tithi/nakshatra end times and panchaka.
 *
 * Used to validate rows read back from the persistent cache tier.
 */

const IsoInstantSchema = z.string().regex(/^-?\d{4,6}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);

const LongitudeSchema = z.number().min(0).lt(360);

export const IntervalSchema = z.object({
  start: IsoInstantSchema,
  end: IsoInstantSchema,
});

const KaalPeriodSchema = IntervalSchema.extend({
  segment: z.number().int().min(1).max(8),
});

export const LunarPhaseNameSchema = z.enum([
  "new",
  "waxing_crescent",
  "first_quarter",
  "waxing_gibbous",
  "full",
  "waning_gibbous",
  "last_quarter",
  "waning_crescent",
]);

export const TithiSchema = z.object({
  index: z.number().int().min(0).max(29),
  number: z.number().int().min(1).max(30),
  value: z.number().min(0).lt(30),
  paksha: z.enum(["Shukla", "Krishna"]),
  name: z.string(),
  progress_pct: z.number().min(0).max(100),
});

export const NakshatraSchema = z.object({
  index: z.number().int().min(0).max(26),
  name: z.string(),
  lord: z.string(),
  pada: z.number().int().min(1).max(4),
  progress_pct: z.number().min(0).max(100),
});

export const YogaSchema = z.object({
  index: z.number().int().min(0).max(26),
  name: z.string(),
});

export const KaranaSchema = z.object({
  index: z.number().int().min(0).max(59),
  name: z.string(),
  kind: z.enum(["fixed", "movable"]),
});

export const RashiSchema = z.object({
  index: z.number().int().min(0).max(11),
  name: z.string(),
  lord: z.string(),
});

export const VaraSchema = z.object({
  index: z.number().int().min(0).max(6),
  name: z.string(),
  sanskrit: z.string(),
  lord: z.string(),
});

export const MoonPhaseSchema = z.object({
  phase_name: LunarPhaseNameSchema,
  label: z.string(),
  elongation_deg: z.number().min(0).lt(360),
  illumination_pct: z.number().min(0).max(100),
});

export const DayTimingsSchema = z.object({
  local_date: z.string().regex(/^-?\d{4,6}-\d{2}-\d{2}$/),
  weekday: z.number().int().min(0).max(6),
  sunrise: IsoInstantSchema,
  sunset: IsoInstantSchema,
  solar_noon: IsoInstantSchema,
  day_length_minutes: z.number().positive(),
  moonrise: IsoInstantSchema.nullable(),
  moonset: IsoInstantSchema.nullable(),
  moon_event_note: z.string().nullable(),
  segments: z.array(IntervalSchema).length(8),
  rahu_kaal: KaalPeriodSchema,
  gulika_kaal: KaalPeriodSchema,
  yamaganda_kaal: KaalPeriodSchema,
  brahma_muhurta: IntervalSchema,
  abhijit_muhurta: IntervalSchema,
});

export const ElementEndsSchema = z.object({
  tithi: IsoInstantSchema.nullable(),
  nakshatra: IsoInstantSchema.nullable(),
});

export const PanchakaSchema = z.object({
  active: z.boolean(),
  /** Named by weekday; null when inactive or on a weekday without a named kind. */
  kind: z.string().nullable(),
});

export const TarabalaSchema = z.object({
  birth_nakshatra: z.string(),
  count: z.number().int().min(1).max(9),
  name: z.string(),
  result: z.string(),
  favorable: z.boolean(),
});

export const ChandrabalaSchema = z.object({
  birth_rashi: z.string(),
  position: z.number().int().min(1).max(12),
  favorable: z.boolean(),
});

export const PersonalStrengthSchema = z.object({
  instant: IsoInstantSchema,
  moon_nakshatra: z.string(),
  moon_rashi: z.string(),
  tarabala: TarabalaSchema,
  chandrabala: ChandrabalaSchema,
});

export const TraditionalYearsSchema = z.object({
  vikram_samvat: z.number().int(),
  shaka_samvat: z.number().int(),
  kali_yuga: z.number().int(),
  bengali_san: z.number().int(),
});

export const PanchangResultSchema = z.object({
  schema_version: z.literal("panchang_v2"),
  instant: IsoInstantSchema,
  location: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
    elevation_m: z.number(),
  }),
  ayanamsha: z.object({
    system: AyanamshaSystemSchema,
    degrees: z.number(),
    extrapolated: z.boolean(),
  }),
  longitudes: z.object({
    sun_tropical: LongitudeSchema,
    moon_tropical: LongitudeSchema,
    sun_sidereal: LongitudeSchema,
    moon_sidereal: LongitudeSchema,
  }),
  tithi: TithiSchema,
  nakshatra: NakshatraSchema,
  yoga: YogaSchema,
  karana: KaranaSchema,
  vara: VaraSchema,
  sun_rashi: RashiSchema,
  moon_rashi: RashiSchema,
  moon_phase: MoonPhaseSchema,
  element_ends: ElementEndsSchema,
  panchaka: PanchakaSchema,
  day: DayTimingsSchema,
  traditional_years: TraditionalYearsSchema,
});

export type Interval = z.infer<typeof IntervalSchema>;
export type KaalPeriod = z.infer<typeof KaalPeriodSchema>;
export type LunarPhaseName = z.infer<typeof LunarPhaseNameSchema>;
export type Tithi = z.infer<typeof TithiSchema>;
export type Nakshatra = z.infer<typeof NakshatraSchema>;
export type Yoga = z.infer<typeof YogaSchema>;
export type Karana = z.infer<typeof KaranaSchema>;
export type Rashi = z.infer<typeof RashiSchema>;
export type Vara = z.infer<typeof VaraSchema>;
export type MoonPhase = z.infer<typeof MoonPhaseSchema>;
export type DayTimings = z.infer<typeof DayTimingsSchema>;
export type ElementEnds = z.infer<typeof ElementEndsSchema>;
export type Panchaka = z.infer<typeof PanchakaSchema>;
export type Tarabala = z.infer<typeof TarabalaSchema>;
export type Chandrabala = z.infer<typeof ChandrabalaSchema>;
export type PersonalStrength = z.infer<typeof PersonalStrengthSchema>;
export type TraditionalYears = z.infer<typeof TraditionalYearsSchema>;
export type PanchangResult = z.infer<typeof PanchangResultSchema>;
