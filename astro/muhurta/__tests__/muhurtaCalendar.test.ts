import { describe, expect, it } from "vitest";
import { muhurtaCalendar, type MuhurtaCalendarRequest } from "../muhurtaCalendar.js";
import { MUHURTA_RULES_V1 } from "../policy/muhurtaRules.v1.js";
import type { MuhurtaSearchRequest } from "../searchMuhurta.js";
import { InvalidRequestError } from "../../errors.js";
import { createLocation } from "../../geo/location.js";
import { MuhurtaCalendarSchema, type MuhurtaCandidate, type MuhurtaSearchResult } from "../../schemas/muhurta.schema.js";
import { dawnToDuskTimings } from "../../__tests__/fixtures/muhurtaFixtures.js";

const VARANASI = createLocation({ latitude: 25.3, longitude: 82.5 });

function request(overrides: Partial<MuhurtaCalendarRequest> = {}): MuhurtaCalendarRequest {
  return {
    rule: MUHURTA_RULES_V1.marriage,
    location: VARANASI,
    startDate: "2024-01-07",
    endDate: "2024-01-09",
    stepMinutes: 60,
    dayTimings: dawnToDuskTimings,
    ...overrides,
  };
}

function candidate(start: string, score: number): MuhurtaCandidate {
  return {
    window: { start, end: start },
    score,
    tier: "very_good",
    factors: [],
    helped: [],
    hurt: [],
    warnings: [],
    excluded_by: [],
    summary: { tithi: "", nakshatra: "", yoga: "", karana: "", vara: "" },
  };
}

/** Finds one window per day, except on 8 January. */
function recordingSearch(onSearch: (r: MuhurtaSearchRequest) => void = () => {}) {
  const calls: MuhurtaSearchRequest[] = [];
  const search = async (r: MuhurtaSearchRequest): Promise<MuhurtaSearchResult> => {
    calls.push(r);
    onSearch(r);
    const quiet = r.timeRange.start.utc === "2024-01-07T18:30:00.000Z";
    return {
      event_type: r.rule.event_type,
      rule_version: r.rule.rule_version,
      candidates: quiet ? [] : [candidate(r.timeRange.start.utc, 74)],
      partial: false,
      samples_evaluated: 24,
      samples_skipped: 0,
      samples_total: 24,
    };
  };
  return { calls, search };
}

describe("muhurtaCalendar", () => {
  it("searches each local day and keeps the days with windows", async () => {
    const { calls, search } = recordingSearch();
    const result = await muhurtaCalendar(request(), search);

    expect(MuhurtaCalendarSchema.safeParse(result).success).toBe(true);
    // Local midnight at 82.5° E is 18:30 UTC the evening before.
    expect(calls.map((c) => [c.timeRange.start.utc, c.timeRange.end.utc])).toEqual([
      ["2024-01-06T18:30:00.000Z", "2024-01-07T18:30:00.000Z"],
      ["2024-01-07T18:30:00.000Z", "2024-01-08T18:30:00.000Z"],
      ["2024-01-08T18:30:00.000Z", "2024-01-09T18:30:00.000Z"],
    ]);
    expect(result.days.map((d) => [d.local_date, d.best_score])).toEqual([
      ["2024-01-07", 74],
      ["2024-01-09", 74],
    ]);
    expect(result.days_searched).toBe(3);
    expect(result.partial).toBe(false);
    expect(result.event_type).toBe("marriage");
  });

  it("asks each day for good windows, three at most, unless told otherwise", async () => {
    const defaults = recordingSearch();
    await muhurtaCalendar(request({ endDate: "2024-01-07" }), defaults.search);
    expect(defaults.calls[0]).toMatchObject({ minQuality: "good", maxResults: 3, stepMinutes: 60 });

    const custom = recordingSearch();
    await muhurtaCalendar(request({ endDate: "2024-01-07", minQuality: "excellent", maxPerDay: 1 }), custom.search);
    expect(custom.calls[0]).toMatchObject({ minQuality: "excellent", maxResults: 1 });
  });

  it("stops at an abort and reports the days found so far", async () => {
    const controller = new AbortController();
    const { calls, search } = recordingSearch(() => controller.abort());

    const result = await muhurtaCalendar(request({ signal: controller.signal }), search);

    expect(calls).toHaveLength(1);
    expect(result.partial).toBe(true);
    expect(result.days_searched).toBe(1);
    expect(result.days.map((d) => d.local_date)).toEqual(["2024-01-07"]);
  });

  it.each([
    ["an impossible date", { startDate: "2024-02-30" }],
    ["a malformed date", { endDate: "9 Jan 2024" }],
    ["an end before the start", { startDate: "2024-01-09", endDate: "2024-01-07" }],
    ["more than 366 days", { startDate: "2024-01-01", endDate: "2025-01-01" }],
  ])("rejects %s", async (_label, overrides) => {
    const { calls, search } = recordingSearch();
    await expect(muhurtaCalendar(request(overrides), search)).rejects.toBeInstanceOf(InvalidRequestError);
    expect(calls).toHaveLength(0);
  });
});
