import { isoFromEpochMs } from "../time/instant.js";
import { panchangTables, type PanchangTables } from "../panchang/panchangTables.js";
import type { DayTimings, KaalPeriod, PanchangResult } from "../schemas/panchang.schema.js";
import type { FactorBreakdown, MuhurtaCandidate } from "../schemas/muhurta.schema.js";
import { tierForScore } from "./muhurtaTiers.js";
import { planetaryStrength, type PlanetBody } from "./planetaryStrength.js";
import {
  KAAL_KINDS,
  MUHURTA_FACTORS,
  type KaalKind,
  type MuhurtaFactor,
  type MuhurtaRule,
} from "./policy/muhurtaRules.v1.js";

export interface ScoringWindow {
  start_ms: number;
  end_ms: number;
}

export interface MuhurtaSample {
  panchang: PanchangResult;
  /** Sidereal longitudes of the planets the rule's strength heuristic reads. */
  planet_longitudes: Partial<Record<PlanetBody, number>>;
}

const KAAL_LABELS: Record<KaalKind, string> = {
  rahu_kaal: "Rahu Kaal",
  gulika_kaal: "Gulika Kaal",
  yamaganda_kaal: "Yamaganda Kaal",
};

interface KaalSpan {
  kind: KaalKind;
  start_ms: number;
  end_ms: number;
}

function kaalSpan(kind: KaalKind, period: KaalPeriod): KaalSpan {
  return { kind, start_ms: Date.parse(period.start), end_ms: Date.parse(period.end) };
}

function overlaps(window: ScoringWindow, kaal: KaalSpan): boolean {
  return window.start_ms < kaal.end_ms && window.end_ms > kaal.start_ms;
}

function inside(window: ScoringWindow, kaal: KaalSpan): boolean {
  return window.start_ms >= kaal.start_ms && window.end_ms <= kaal.end_ms;
}

function setFavorability<T>(value: T, favorable: readonly T[], unfavorable: readonly T[], neutral: number): number {
  if (favorable.includes(value)) return 1;
  if (unfavorable.includes(value)) return 0;
  return neutral;
}

function summaryOf(panchang: PanchangResult): MuhurtaCandidate["summary"] {
  return {
    tithi: `${panchang.tithi.paksha} ${panchang.tithi.name}`,
    nakshatra: panchang.nakshatra.name,
    yoga: panchang.yoga.name,
    karana: panchang.karana.name,
    vara: panchang.vara.name,
  };
}

function kaalWarnings(window: ScoringWindow, spans: KaalSpan[], rule: MuhurtaRule): string[] {
  const warnings: string[] = [];
  const marginMs = rule.boundary_warning_minutes * 60_000;

  for (const span of spans) {
    const label = KAAL_LABELS[span.kind];
    const excluded = rule.hard_exclusions.includes(span.kind);

    if (overlaps(window, span)) {
      if (excluded) {
        warnings.push(inside(window, span) ? `Window falls inside ${label}` : `Window partially overlaps ${label}`);
      } else {
        warnings.push(`Window overlaps ${label}`);
      }
      continue;
    }

    if (!excluded) continue;
    const beforeMs = span.start_ms - window.end_ms;
    const afterMs = window.start_ms - span.end_ms;
    if (beforeMs >= 0 && beforeMs <= marginMs) {
      warnings.push(`Window ends ${Math.round(beforeMs / 60_000)} min before ${label}`);
    } else if (afterMs >= 0 && afterMs <= marginMs) {
      warnings.push(`Window starts ${Math.round(afterMs / 60_000)} min after ${label} ends`);
    }
  }
  return warnings;
}

function factorValues(
  rule: MuhurtaRule,
  sample: MuhurtaSample,
  tables: PanchangTables
): Record<MuhurtaFactor, { value: string; favorability: number }> {
  const { panchang } = sample;
  const neutral = rule.neutral_favorability;
  const strength = planetaryStrength(rule.key_planets, sample.planet_longitudes, neutral, tables);

  return {
    tithi: {
      value: `${panchang.tithi.paksha} ${panchang.tithi.name} (${panchang.tithi.number})`,
      favorability: setFavorability(panchang.tithi.number, rule.favorable.tithi, rule.unfavorable.tithi, neutral),
    },
    nakshatra: {
      value: panchang.nakshatra.name,
      favorability: setFavorability(panchang.nakshatra.name, rule.favorable.nakshatra, rule.unfavorable.nakshatra, neutral),
    },
    yoga: {
      value: panchang.yoga.name,
      favorability: setFavorability(panchang.yoga.name, rule.favorable.yoga, rule.unfavorable.yoga, neutral),
    },
    karana: {
      value: panchang.karana.name,
      favorability: setFavorability(panchang.karana.name, rule.favorable.karana, rule.unfavorable.karana, neutral),
    },
    vara: {
      value: panchang.vara.name,
      favorability: setFavorability(panchang.vara.name, rule.favorable.vara, rule.unfavorable.vara, neutral),
    },
    moon_phase: {
      value: panchang.moon_phase.label,
      favorability: setFavorability(
        panchang.moon_phase.phase_name,
        rule.favorable.moon_phase,
        rule.unfavorable.moon_phase,
        neutral
      ),
    },
    planetary_strength: {
      value: strength.planets.map((p) => `${p.planet} ${p.dignity}`).join(", ") || "none",
      favorability: strength.favorability,
    },
  };
}

/**
 * Score one window against a rule.
 *
 * Hard exclusions are checked first: an overlap with an excluded kaal
 * gives score 0 and tier "avoid" without evaluating any factor. Kaal
 * periods come from the sample's day plus `extraDays`, the later local
 * days a long window runs into.
 */
export function scoreMuhurtaSample(
  rule: MuhurtaRule,
  window: ScoringWindow,
  sample: MuhurtaSample,
  tables: PanchangTables = panchangTables(),
  extraDays: readonly DayTimings[] = []
): MuhurtaCandidate {
  const spans = [sample.panchang.day, ...extraDays].flatMap((day) => KAAL_KINDS.map((kind) => kaalSpan(kind, day[kind])));
  const warnings = [...new Set(kaalWarnings(window, spans, rule))];
  const base = {
    window: { start: isoFromEpochMs(window.start_ms), end: isoFromEpochMs(window.end_ms) },
    summary: summaryOf(sample.panchang),
  };

  const excludedBy = [
    ...new Set(spans.filter((s) => rule.hard_exclusions.includes(s.kind) && overlaps(window, s)).map((s) => s.kind)),
  ];
  if (excludedBy.length > 0) {
    return {
      ...base,
      score: 0,
      tier: "avoid",
      factors: [],
      helped: [],
      hurt: excludedBy.map((kind) => `Hard exclusion: ${KAAL_LABELS[kind]}`),
      warnings,
      excluded_by: excludedBy,
    };
  }

  const values = factorValues(rule, sample, tables);
  const totalWeight = MUHURTA_FACTORS.reduce((sum, f) => sum + rule.weights[f], 0);
  const neutral = rule.neutral_favorability;

  let weighted = 0;
  const factors = MUHURTA_FACTORS.map((factor): FactorBreakdown => {
    const { value, favorability } = values[factor];
    const weight = totalWeight > 0 ? rule.weights[factor] / totalWeight : 0;
    weighted += weight * favorability;
    return {
      factor,
      value,
      favorability,
      weight: Number(weight.toFixed(4)),
      contribution: Number((weight * favorability * 100).toFixed(2)),
      verdict: favorability > neutral ? "helped" : favorability < neutral ? "hurt" : "neutral",
    };
  });

  const score = Math.max(0, Math.min(100, Math.round(100 * weighted)));

  return {
    ...base,
    score,
    tier: tierForScore(score),
    factors,
    helped: factors.filter((f) => f.verdict === "helped").map((f) => `${f.factor}: ${f.value}`),
    hurt: factors.filter((f) => f.verdict === "hurt").map((f) => `${f.factor}: ${f.value}`),
    warnings,
    excluded_by: [],
  };
}
