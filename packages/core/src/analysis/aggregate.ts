import type { SessionSummary, TrialResult } from "../types.js";

function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Arithmetic means over a session's trials.
 * Returns undefined for an empty list; callers must check.
 */
export function aggregateSession(
  trials: readonly TrialResult[],
): SessionSummary | undefined {
  if (trials.length === 0) return undefined;

  return {
    trialCount: trials.length,
    avgTime: mean(trials.map((t) => t.timeElapsed)),
    avgSpeed: mean(trials.map((t) => t.avgSpeed)),
    avgCurvature: mean(trials.map((t) => t.curvature)),
    avgThroughput: mean(trials.map((t) => t.throughput)),
  };
}
