/**
 * Horizon-crossing solver used for sunrise/sunset and moonrise/moonset.
 *
 * Scan the window at a fixed step for a sign change of
 * altitude(t) - horizon, then bisect the bracket. Both stages are bounded:
 * a missing bracket or a bisection that does not converge within
 * `maxIterations` is reported as not found, never as a default time.
 */

export type CrossingDirection = "rise" | "set";

export interface CrossingSearch {
  altitudeAt(epochMs: number): Promise<number>;
  horizonDeg: number;
  direction: CrossingDirection;
  startMs: number;
  endMs: number;
}

export interface SolverOptions {
  scanStepMs: number;
  toleranceMs: number;
  maxIterations: number;
  /** Extra attempts with a wider window after the first one finds no bracket. */
  retries: number;
  widenMs: number;
  /** "both" widens each end; "forward" only pushes the end later. */
  widen: "both" | "forward";
}

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  scanStepMs: 10 * 60_000,
  toleranceMs: 1_000,
  maxIterations: 64,
  retries: 2,
  widenMs: 12 * 3_600_000,
  widen: "both",
};

export type CrossingResult =
  | { status: "found"; epoch_ms: number; attempts: number }
  | { status: "not_found"; reason: "no_bracket" | "no_convergence"; attempts: number };

interface Bracket {
  lo: number;
  hi: number;
}

function isCrossing(direction: CrossingDirection, before: number, after: number): boolean {
  return direction === "rise" ? before < 0 && after >= 0 : before >= 0 && after < 0;
}

async function scanForBrackets(search: CrossingSearch, startMs: number, endMs: number, stepMs: number): Promise<Bracket[]> {
  const brackets: Bracket[] = [];
  let prevT = startMs;
  let prevG = (await search.altitudeAt(prevT)) - search.horizonDeg;

  while (prevT < endMs) {
    const t = Math.min(prevT + stepMs, endMs);
    const g = (await search.altitudeAt(t)) - search.horizonDeg;
    if (isCrossing(search.direction, prevG, g)) {
      brackets.push({ lo: prevT, hi: t });
    }
    prevT = t;
    prevG = g;
  }
  return brackets;
}

function distanceToWindow(bracket: Bracket, startMs: number, endMs: number): number {
  if (bracket.hi < startMs) return startMs - bracket.hi;
  if (bracket.lo > endMs) return bracket.lo - endMs;
  return 0;
}

async function bisect(
  search: CrossingSearch,
  bracket: Bracket,
  options: SolverOptions
): Promise<number | null> {
  let { lo, hi } = bracket;
  let iterations = 0;

  while (hi - lo > options.toleranceMs) {
    if (iterations >= options.maxIterations) {
      return null;
    }
    const mid = Math.floor(lo + (hi - lo) / 2);
    const g = (await search.altitudeAt(mid)) - search.horizonDeg;
    const risen = g >= 0;
    if ((search.direction === "rise") === risen) {
      hi = mid;
    } else {
      lo = mid;
    }
    iterations++;
  }

  return Math.round(lo + (hi - lo) / 2);
}

export async function findHorizonCrossing(
  search: CrossingSearch,
  overrides: Partial<SolverOptions> = {}
): Promise<CrossingResult> {
  const options: SolverOptions = { ...DEFAULT_SOLVER_OPTIONS, ...overrides };

  for (let attempt = 0; attempt <= options.retries; attempt++) {
    const extra = attempt * options.widenMs;
    const startMs = options.widen === "both" ? search.startMs - extra : search.startMs;
    const endMs = search.endMs + extra;

    const brackets = await scanForBrackets(search, startMs, endMs, options.scanStepMs);
    if (brackets.length === 0) {
      continue;
    }

    // Prefer a crossing inside the requested window, then the earliest.
    const [best] = [...brackets].sort(
      (a, b) =>
        distanceToWindow(a, search.startMs, search.endMs) - distanceToWindow(b, search.startMs, search.endMs) ||
        a.lo - b.lo
    );

    const epochMs = await bisect(search, best, options);
    if (epochMs === null) {
      return { status: "not_found", reason: "no_convergence", attempts: attempt + 1 };
    }
    return { status: "found", epoch_ms: epochMs, attempts: attempt + 1 };
  }

  return { status: "not_found", reason: "no_bracket", attempts: options.retries + 1 };
}
