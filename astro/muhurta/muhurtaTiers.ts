import { InvalidRequestError } from "../errors.js";

export const QUALITY_TIERS = ["excellent", "very_good", "good", "average", "poor", "avoid"] as const;
export type QualityTier = (typeof QUALITY_TIERS)[number];

/**
 * Fixed bands, inclusive lower bound. Checked top-down, so every score in
 * [0, 100] lands in exactly one tier.
 */
const TIER_BANDS: ReadonlyArray<{ tier: QualityTier; min: number }> = [
  { tier: "excellent", min: 80 },
  { tier: "very_good", min: 70 },
  { tier: "good", min: 60 },
  { tier: "average", min: 50 },
  { tier: "poor", min: 40 },
  { tier: "avoid", min: 0 },
];

export function tierForScore(score: number): QualityTier {
  for (const band of TIER_BANDS) {
    if (score >= band.min) {
      return band.tier;
    }
  }
  return "avoid";
}

/** True when `tier` is at least as good as `minimum`. */
export function meetsMinimumQuality(tier: QualityTier, minimum: QualityTier): boolean {
  return QUALITY_TIERS.indexOf(tier) <= QUALITY_TIERS.indexOf(minimum);
}

export function parseQualityTier(tag: string): QualityTier {
  const normalized = tag.trim().toLowerCase().replace(/[\s-]+/g, "_");
  const tier = QUALITY_TIERS.find((t) => t === normalized);
  if (!tier) {
    throw new InvalidRequestError(
      `Unknown quality tier "${tag}"; expected one of ${QUALITY_TIERS.join(", ")}`,
      { min_quality: tag }
    );
  }
  return tier;
}
