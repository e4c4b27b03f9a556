/**
 * Factory functions for creating test fixtures.
 *
 * Every factory produces valid instances of the core types with sensible
 * defaults. Override any field by passing a partial object.
 */
import type {
  Sample,
  SessionRecord,
  Trajectory,
  TrialResult,
} from "@pointing-lab/core";

/**
 * Create a trajectory from `[x, y, t]` triples.
 *
 * @example
 * ```ts
 * const path = createTrajectory([[500, 300, 0], [540, 300, 0.1]]);
 * ```
 */
export function createTrajectory(points: ReadonlyArray<readonly [number, number, number]>): Sample[] {
  return points.map(([x, y, t]) => ({ x, y, t }));
}

/**
 * Evenly-timed straight path from `from` to `to` in `steps` segments.
 */
export function createStraightTrajectory(opts: {
  from: readonly [number, number];
  to: readonly [number, number];
  steps: number;
  duration: number;
  startTime?: number;
}): Sample[] {
  const t0 = opts.startTime ?? 0;
  const [x0, y0] = opts.from;
  const [x1, y1] = opts.to;
  const samples: Sample[] = [];
  for (let i = 0; i <= opts.steps; i++) {
    const u = i / opts.steps;
    samples.push({ x: x0 + (x1 - x0) * u, y: y0 + (y1 - y0) * u, t: t0 + opts.duration * u });
  }
  return samples;
}

/**
 * Create a TrialResult with round-number metrics.
 *
 * @example
 * ```ts
 * const slow = createTrialResult({ timeElapsed: 2, throughput: 0.5 });
 * ```
 */
export function createTrialResult(overrides: Partial<TrialResult> = {}): TrialResult {
  const trajectory: Trajectory = overrides.trajectory ?? [
    { x: 500, y: 300, t: 0 },
    { x: 540, y: 300, t: 0.1 },
  ];
  return {
    timeElapsed: 0.1,
    totalDistance: 40,
    idealDistance: 40,
    avgSpeed: 400,
    peakVelocity: 400,
    curvature: 1,
    reactionTime: 0.1,
    indexOfDifficulty: 1,
    throughput: 10,
    pauseCount: 0,
    targetPos: { x: 540, y: 300 },
    targetRadius: 20,
    ...overrides,
    trajectory,
  };
}

/**
 * Create a finalized-looking SessionRecord.
 *
 * @example
 * ```ts
 * const record = createSessionRecord({ trials: [createTrialResult()] });
 * ```
 */
export function createSessionRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  const trials = overrides.trials ?? [createTrialResult()];
  return {
    mode: "random",
    sampleInterval: 0.01,
    canvas: { width: 1000, height: 600 },
    defaultRadius: 20,
    trialCount: trials.length,
    plan: [],
    stoppedEarly: false,
    ...overrides,
    trials,
  };
}
