import { EmptySearchWindowError, InvalidRequestError } from "../errors.js";
import type { Location } from "../geo/location.js";
import { createInstant, MS_PER_DAY, MS_PER_MINUTE, type Instant } from "../time/instant.js";
import type { DayTimingsSource } from "../panchang/derivePanchang.js";
import { localDayFor } from "../panchang/deriveDayTimings.js";
import type { PanchangTables } from "../panchang/panchangTables.js";
import type { DayTimings } from "../schemas/panchang.schema.js";
import type { MuhurtaCandidate, MuhurtaSearchResult } from "../schemas/muhurta.schema.js";
import { engineLogHelpers } from "../../logging/engineLog.js";
import { meetsMinimumQuality, type QualityTier } from "./muhurtaTiers.js";
import type { MuhurtaRule } from "./policy/muhurtaRules.v1.js";
import { scoreMuhurtaSample, type MuhurtaSample } from "./scoreMuhurtaSample.js";

export const DEFAULT_MUHURTA_CONCURRENCY = 8;

/** Supplies the panchang and planet positions for the start of one window. */
export type MuhurtaSampleSource = (instant: Instant, location: Location) => Promise<MuhurtaSample>;

export interface MuhurtaSearchRequest {
  rule: MuhurtaRule;
  location: Location;
  timeRange: { start: Instant; end: Instant };
  stepMinutes: number;
  /** Window length; defaults to the step. */
  durationMinutes?: number;
  /** Windows overlapping any of these are skipped without scoring. */
  excludePeriods?: ReadonlyArray<{ start: Instant; end: Instant }>;
  maxResults: number;
  minQuality?: QualityTier;
  concurrency?: number;
  signal?: AbortSignal;
  tables?: PanchangTables;
  /** Timings of the later local days a window runs into. */
  dayTimings: DayTimingsSource;
}

function validateRequest(request: MuhurtaSearchRequest): void {
  const { stepMinutes, maxResults, concurrency } = request;
  if (!Number.isFinite(stepMinutes) || stepMinutes <= 0) {
    throw new InvalidRequestError(`Step must be a positive number of minutes, got ${stepMinutes}`, {
      step_minutes: stepMinutes,
    });
  }
  if (!Number.isInteger(maxResults) || maxResults <= 0) {
    throw new InvalidRequestError(`maxResults must be a positive integer, got ${maxResults}`, {
      max_results: maxResults,
    });
  }
  const { durationMinutes } = request;
  if (durationMinutes !== undefined && (!Number.isFinite(durationMinutes) || durationMinutes <= 0)) {
    throw new InvalidRequestError(`Duration must be a positive number of minutes, got ${durationMinutes}`, {
      duration_minutes: durationMinutes,
    });
  }
  for (const period of request.excludePeriods ?? []) {
    if (period.end.epoch_ms <= period.start.epoch_ms) {
      throw new InvalidRequestError(`Excluded period ${period.start.utc} to ${period.end.utc} is empty`, {
        instant: period.start.utc,
        end: period.end.utc,
      });
    }
  }
  if (concurrency !== undefined && (!Number.isInteger(concurrency) || concurrency <= 0)) {
    throw new InvalidRequestError(`Concurrency must be a positive integer, got ${concurrency}`, { concurrency });
  }
}

/** Window start times: start, start + step, ... while start + k·step + duration <= end. */
export function sampleStarts(startMs: number, endMs: number, stepMs: number, durationMs: number = stepMs): number[] {
  const span = endMs - startMs;
  if (span < durationMs) return [];
  const count = Math.floor((span - durationMs) / stepMs) + 1;
  return Array.from({ length: count }, (_, k) => startMs + k * stepMs);
}

/** Timings of each local day after the first that the window touches. */
async function laterDays(
  request: MuhurtaSearchRequest,
  startMs: number,
  endMs: number
): Promise<DayTimings[]> {
  const { longitude } = request.location;
  const lastDayStart = localDayFor(endMs - 1, longitude).start_ms;
  const days: DayTimings[] = [];
  for (let dayStart = localDayFor(startMs, longitude).end_ms; dayStart <= lastDayStart; dayStart += MS_PER_DAY) {
    days.push(await request.dayTimings(request.location, createInstant(dayStart)));
  }
  return days;
}

/** Descending score, earlier start first on ties. */
export function compareCandidates(a: MuhurtaCandidate, b: MuhurtaCandidate): number {
  if (b.score !== a.score) return b.score - a.score;
  return Date.parse(a.window.start) - Date.parse(b.window.start);
}

/**
 * Sample the time range, score each window and rank the results.
 *
 * Samples are evaluated in batches of `concurrency`. The signal is checked
 * before each batch; once aborted the candidates scored so far are
 * returned with `partial: true`. A failing sample fails the search.
 * Kaal periods of every local day a window touches take part in its
 * hard-exclusion check, not only those of the day it starts in.
 */
export async function searchMuhurta(
  request: MuhurtaSearchRequest,
  source: MuhurtaSampleSource
): Promise<MuhurtaSearchResult> {
  validateRequest(request);

  const { rule, location, timeRange, signal } = request;
  const stepMs = Math.round(request.stepMinutes * MS_PER_MINUTE);
  const durationMinutes = request.durationMinutes ?? request.stepMinutes;
  const durationMs = Math.round(durationMinutes * MS_PER_MINUTE);
  const startMs = timeRange.start.epoch_ms;
  const endMs = timeRange.end.epoch_ms;

  if (endMs - startMs < durationMs) {
    throw new EmptySearchWindowError(
      `Time range ${timeRange.start.utc} to ${timeRange.end.utc} is shorter than one ${durationMinutes} min window`,
      { instant: timeRange.start.utc, end: timeRange.end.utc, step_minutes: request.stepMinutes }
    );
  }

  const starts = sampleStarts(startMs, endMs, stepMs, durationMs);
  const excluded = (request.excludePeriods ?? []).map((p) => ({ start_ms: p.start.epoch_ms, end_ms: p.end.epoch_ms }));
  const isExcluded = (sampleMs: number): boolean =>
    excluded.some((p) => sampleMs < p.end_ms && sampleMs + durationMs > p.start_ms);
  const concurrency = request.concurrency ?? DEFAULT_MUHURTA_CONCURRENCY;
  const startedAt = Date.now();
  engineLogHelpers.muhurtaStarted({
    event_type: rule.event_type,
    samples_total: starts.length,
    rule_version: rule.rule_version,
  });

  const scored: MuhurtaCandidate[] = [];
  let evaluated = 0;
  let skipped = 0;
  let partial = false;

  try {
    for (let i = 0; i < starts.length; i += concurrency) {
      if (signal?.aborted) {
        partial = true;
        break;
      }

      const chunk = starts.slice(i, i + concurrency);
      const batch = chunk.filter((sampleMs) => !isExcluded(sampleMs));
      skipped += chunk.length - batch.length;
      const settled = await Promise.allSettled(
        batch.map(async (sampleMs) => {
          const windowEndMs = sampleMs + durationMs;
          const [sample, extraDays] = await Promise.all([
            source(createInstant(sampleMs), location),
            laterDays(request, sampleMs, windowEndMs),
          ]);
          return scoreMuhurtaSample(
            rule,
            { start_ms: sampleMs, end_ms: windowEndMs },
            sample,
            request.tables,
            extraDays
          );
        })
      );

      for (const outcome of settled) {
        if (outcome.status === "rejected") {
          throw outcome.reason;
        }
        scored.push(outcome.value);
      }
      evaluated += batch.length;
    }
  } catch (error) {
    engineLogHelpers.muhurtaFailed({ event_type: rule.event_type, error });
    throw error;
  }

  const minQuality = request.minQuality;
  const candidates = scored
    .filter((c) => minQuality === undefined || meetsMinimumQuality(c.tier, minQuality))
    .sort(compareCandidates)
    .slice(0, request.maxResults);

  if (partial) {
    engineLogHelpers.muhurtaAborted({
      event_type: rule.event_type,
      samples_evaluated: evaluated,
      samples_total: starts.length,
    });
  } else {
    engineLogHelpers.muhurtaSucceeded({
      event_type: rule.event_type,
      samples_evaluated: evaluated,
      candidates: candidates.length,
      duration_ms: Date.now() - startedAt,
    });
  }

  return {
    event_type: rule.event_type,
    rule_version: rule.rule_version,
    candidates,
    partial,
    samples_evaluated: evaluated,
    samples_skipped: skipped,
    samples_total: starts.length,
  };
}
