import { InvalidRequestError } from "../errors.js";
import { localDayFor, localDayOfDate, type LocalDay } from "../panchang/deriveDayTimings.js";
import type { MuhurtaCalendar, MuhurtaCalendarDay, MuhurtaSearchResult } from "../schemas/muhurta.schema.js";
import { createInstant, MS_PER_DAY } from "../time/instant.js";
import type { QualityTier } from "./muhurtaTiers.js";
import type { MuhurtaSearchRequest } from "./searchMuhurta.js";

export const MAX_CALENDAR_DAYS = 366;
export const DEFAULT_CALENDAR_MIN_QUALITY: QualityTier = "good";
export const DEFAULT_CALENDAR_MAX_PER_DAY = 3;

export interface MuhurtaCalendarRequest extends Omit<MuhurtaSearchRequest, "timeRange" | "maxResults" | "minQuality"> {
  /** Local civil dates, YYYY-MM-DD, both included. */
  startDate: string;
  endDate: string;
  minQuality?: QualityTier;
  maxPerDay?: number;
}

export type MuhurtaDaySearch = (request: MuhurtaSearchRequest) => Promise<MuhurtaSearchResult>;

function parseDate(field: "start_date" | "end_date", value: string, longitude: number): LocalDay {
  const day = localDayOfDate(value, longitude);
  if (day === null) {
    throw new InvalidRequestError(`${field} must be a YYYY-MM-DD date, got "${value}"`, { [field]: value });
  }
  return day;
}

/**
 * Search every local day from startDate to endDate and keep the days that
 * have windows of at least `minQuality`, best `maxPerDay` each.
 *
 * An abort, or a day search that comes back partial, ends the walk; the
 * days found so far are returned with `partial: true`.
 */
export async function muhurtaCalendar(
  request: MuhurtaCalendarRequest,
  search: MuhurtaDaySearch
): Promise<MuhurtaCalendar> {
  const { startDate, endDate, minQuality, maxPerDay, ...searchOptions } = request;
  const { longitude } = request.location;
  const first = parseDate("start_date", startDate, longitude);
  const last = parseDate("end_date", endDate, longitude);

  const dayCount = Math.round((last.start_ms - first.start_ms) / MS_PER_DAY) + 1;
  if (dayCount < 1) {
    throw new InvalidRequestError(`end_date ${endDate} is before start_date ${startDate}`, {
      start_date: startDate,
      end_date: endDate,
    });
  }
  if (dayCount > MAX_CALENDAR_DAYS) {
    throw new InvalidRequestError(`Calendar spans ${dayCount} days; at most ${MAX_CALENDAR_DAYS} are searched`, {
      start_date: startDate,
      end_date: endDate,
    });
  }

  const days: MuhurtaCalendarDay[] = [];
  let searched = 0;
  let partial = false;

  for (let day = first; day.start_ms <= last.start_ms; day = localDayFor(day.end_ms, longitude)) {
    if (request.signal?.aborted) {
      partial = true;
      break;
    }

    const result = await search({
      ...searchOptions,
      timeRange: { start: createInstant(day.start_ms), end: createInstant(day.end_ms) },
      minQuality: minQuality ?? DEFAULT_CALENDAR_MIN_QUALITY,
      maxResults: maxPerDay ?? DEFAULT_CALENDAR_MAX_PER_DAY,
    });
    searched++;

    const [best] = result.candidates;
    if (best !== undefined) {
      days.push({ local_date: day.local_date, best_score: best.score, candidates: result.candidates });
    }
    if (result.partial) {
      partial = true;
      break;
    }
  }

  return {
    event_type: request.rule.event_type,
    rule_version: request.rule.rule_version,
    start_date: startDate,
    end_date: endDate,
    days,
    days_searched: searched,
    partial,
  };
}
