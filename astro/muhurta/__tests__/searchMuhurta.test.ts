import { describe, expect, it } from "vitest";
import { compareCandidates, sampleStarts, searchMuhurta, type MuhurtaSearchRequest } from "../searchMuhurta.js";
import { MUHURTA_RULES_V1 } from "../policy/muhurtaRules.v1.js";
import { EmptySearchWindowError, EphemerisUnavailableError, InvalidRequestError } from "../../errors.js";
import { MuhurtaSearchResultSchema, type MuhurtaCandidate } from "../../schemas/muhurta.schema.js";
import { createInstant } from "../../time/instant.js";
import { dawnToDuskTimings, fixedSkySource, GREENWICH_40N } from "../../__tests__/fixtures/muhurtaFixtures.js";

const FAVORABLE_SKY = { sun: 280, moon: 45, planets: { jupiter: 95 } };

function request(overrides: Partial<MuhurtaSearchRequest> = {}): MuhurtaSearchRequest {
  return {
    rule: MUHURTA_RULES_V1.general,
    location: GREENWICH_40N,
    timeRange: {
      start: createInstant("2024-01-07T00:00:00Z"),
      end: createInstant("2024-01-08T00:00:00Z"),
    },
    stepMinutes: 30,
    maxResults: 48,
    dayTimings: dawnToDuskTimings,
    ...overrides,
  };
}

describe("sampleStarts", () => {
  it("keeps only windows that end inside the range", () => {
    expect(sampleStarts(0, 100, 30)).toEqual([0, 30, 60]);
    expect(sampleStarts(0, 90, 30)).toEqual([0, 30, 60]);
    expect(sampleStarts(0, 20, 30)).toEqual([]);
  });

  it("fits windows longer than the step", () => {
    expect(sampleStarts(0, 100, 30, 60)).toEqual([0, 30]);
    expect(sampleStarts(0, 50, 30, 60)).toEqual([]);
  });
});

describe("compareCandidates", () => {
  const candidate = (start: string, score: number): MuhurtaCandidate => ({
    window: { start, end: start },
    score,
    tier: "good",
    factors: [],
    helped: [],
    hurt: [],
    warnings: [],
    excluded_by: [],
    summary: { tithi: "", nakshatra: "", yoga: "", karana: "", vara: "" },
  });

  it("orders by score then earlier start", () => {
    const sorted = [
      candidate("2024-01-07T10:00:00.000Z", 70),
      candidate("2024-01-07T09:00:00.000Z", 70),
      candidate("2024-01-07T11:00:00.000Z", 90),
    ].sort(compareCandidates);
    expect(sorted.map((c) => c.window.start)).toEqual([
      "2024-01-07T11:00:00.000Z",
      "2024-01-07T09:00:00.000Z",
      "2024-01-07T10:00:00.000Z",
    ]);
  });
});

describe("searchMuhurta", () => {
  it("scores 0 inside Rahu Kaal and finds favorable windows outside it", async () => {
    const result = await searchMuhurta(request(), fixedSkySource(FAVORABLE_SKY));

    expect(MuhurtaSearchResultSchema.safeParse(result).success).toBe(true);
    expect(result.samples_total).toBe(48);
    expect(result.samples_evaluated).toBe(48);
    expect(result.partial).toBe(false);
    expect(result.candidates).toHaveLength(48);

    const rahuStart = Date.parse("2024-01-07T16:30:00Z");
    const rahuEnd = Date.parse("2024-01-07T18:00:00Z");
    const inside = result.candidates.filter((c) => {
      const start = Date.parse(c.window.start);
      return start < rahuEnd && start + 30 * 60_000 > rahuStart;
    });
    expect(inside.map((c) => c.window.start).sort()).toEqual([
      "2024-01-07T16:30:00.000Z",
      "2024-01-07T17:00:00.000Z",
      "2024-01-07T17:30:00.000Z",
    ]);
    expect(inside.every((c) => c.score === 0 && c.tier === "avoid")).toBe(true);
    expect(result.candidates.some((c) => c.tier !== "avoid")).toBe(true);
  });

  it("ranks by score with ties broken by earlier start", async () => {
    const result = await searchMuhurta(request({ maxResults: 3 }), fixedSkySource(FAVORABLE_SKY));

    // Before sunrise the vara is Saturday, so daytime windows lead.
    expect(result.candidates.map((c) => [c.window.start, c.score])).toEqual([
      ["2024-01-07T06:00:00.000Z", 100],
      ["2024-01-07T06:30:00.000Z", 100],
      ["2024-01-07T07:00:00.000Z", 100],
    ]);
  });

  it("filters by minimum quality before truncating", async () => {
    const result = await searchMuhurta(request({ minQuality: "excellent" }), fixedSkySource(FAVORABLE_SKY));

    expect(result.candidates).toHaveLength(45);
    expect(result.candidates.every((c) => c.tier === "excellent")).toBe(true);
    expect(result.candidates[result.candidates.length - 1].score).toBe(88);
  });

  it("excludes a window that runs into the next day's Rahu Kaal", async () => {
    const result = await searchMuhurta(
      request({
        timeRange: { start: createInstant("2024-01-07T20:00:00Z"), end: createInstant("2024-01-08T08:00:00Z") },
        stepMinutes: 720,
      }),
      fixedSkySource(FAVORABLE_SKY)
    );

    // Monday's Rahu Kaal is 07:30-09:00; the window ends at 08:00.
    expect(result.samples_total).toBe(1);
    const [candidate] = result.candidates;
    expect(candidate.window).toEqual({ start: "2024-01-07T20:00:00.000Z", end: "2024-01-08T08:00:00.000Z" });
    expect(candidate.score).toBe(0);
    expect(candidate.tier).toBe("avoid");
    expect(candidate.excluded_by).toEqual(["rahu_kaal"]);
    expect(candidate.hurt).toEqual(["Hard exclusion: Rahu Kaal"]);
    expect(candidate.warnings).toEqual(["Window partially overlaps Rahu Kaal"]);
  });

  it("looks up no other day while every window stays inside one", async () => {
    let lookups = 0;
    await searchMuhurta(
      request({
        dayTimings: async (location, instant) => {
          lookups++;
          return dawnToDuskTimings(location, instant);
        },
      }),
      fixedSkySource(FAVORABLE_SKY)
    );
    expect(lookups).toBe(0);
  });

  it("scores windows of a given duration at every step", async () => {
    const result = await searchMuhurta(
      request({ stepMinutes: 60, durationMinutes: 120 }),
      fixedSkySource(FAVORABLE_SKY)
    );

    expect(result.samples_total).toBe(23);
    expect(result.candidates[0].window).toEqual({ start: "2024-01-07T06:00:00.000Z", end: "2024-01-07T08:00:00.000Z" });
    expect(result.candidates[0].score).toBe(100);
    expect(
      result.candidates
        .filter((c) => c.score === 0)
        .map((c) => c.window.start)
        .sort()
    ).toEqual(["2024-01-07T15:00:00.000Z", "2024-01-07T16:00:00.000Z", "2024-01-07T17:00:00.000Z"]);
  });

  it("skips windows that overlap an excluded period", async () => {
    const result = await searchMuhurta(
      request({
        stepMinutes: 60,
        excludePeriods: [{ start: createInstant("2024-01-07T09:00:00Z"), end: createInstant("2024-01-07T11:00:00Z") }],
      }),
      fixedSkySource(FAVORABLE_SKY)
    );

    expect(result.samples_total).toBe(24);
    expect(result.samples_skipped).toBe(2);
    expect(result.samples_evaluated).toBe(22);
    const starts = result.candidates.map((c) => c.window.start);
    expect(starts).not.toContain("2024-01-07T09:00:00.000Z");
    expect(starts).not.toContain("2024-01-07T10:00:00.000Z");
    expect(starts).toContain("2024-01-07T11:00:00.000Z");
  });

  it("rejects an empty excluded period and a non-positive duration", async () => {
    const source = fixedSkySource(FAVORABLE_SKY);
    const at = createInstant("2024-01-07T09:00:00Z");
    await expect(searchMuhurta(request({ excludePeriods: [{ start: at, end: at }] }), source)).rejects.toBeInstanceOf(
      InvalidRequestError
    );
    await expect(searchMuhurta(request({ durationMinutes: 0 }), source)).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("rejects a range shorter than one window", async () => {
    const longWindow = request({ durationMinutes: 25 * 60 });
    await expect(searchMuhurta(longWindow, fixedSkySource(FAVORABLE_SKY))).rejects.toBeInstanceOf(
      EmptySearchWindowError
    );
  });

  it("rejects a range shorter than one step", async () => {
    const short = request({
      timeRange: { start: createInstant("2024-01-07T00:00:00Z"), end: createInstant("2024-01-07T00:20:00Z") },
    });
    await expect(searchMuhurta(short, fixedSkySource(FAVORABLE_SKY))).rejects.toBeInstanceOf(EmptySearchWindowError);
  });

  it("rejects non-positive step and result counts", async () => {
    const source = fixedSkySource(FAVORABLE_SKY);
    await expect(searchMuhurta(request({ stepMinutes: 0 }), source)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(searchMuhurta(request({ maxResults: 0 }), source)).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(searchMuhurta(request({ concurrency: 0 }), source)).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("returns a partial result once aborted", async () => {
    const controller = new AbortController();
    const inner = fixedSkySource(FAVORABLE_SKY);
    let calls = 0;

    const result = await searchMuhurta(request({ signal: controller.signal, concurrency: 2 }), async (instant, location) => {
      calls++;
      controller.abort();
      return inner(instant, location);
    });

    expect(calls).toBe(2);
    expect(result.partial).toBe(true);
    expect(result.samples_evaluated).toBe(2);
    expect(result.samples_total).toBe(48);
    expect(result.candidates.map((c) => c.window.start)).toEqual([
      "2024-01-07T00:00:00.000Z",
      "2024-01-07T00:30:00.000Z",
    ]);
  });

  it("keeps at most `concurrency` samples in flight", async () => {
    const inner = fixedSkySource(FAVORABLE_SKY);
    let inFlight = 0;
    let peak = 0;

    await searchMuhurta(request({ concurrency: 3 }), async (instant, location) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return inner(instant, location);
    });

    expect(peak).toBe(3);
  });

  it("fails the search when a sample fails", async () => {
    const failure = new EphemerisUnavailableError("ephemeris offline", { body: "moon" });

    await expect(
      searchMuhurta(request(), async () => {
        throw failure;
      })
    ).rejects.toBe(failure);
  });
});
