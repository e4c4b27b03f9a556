/** Pixel coordinate pair on the task canvas. */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/** Canvas dimensions in pixels. */
export interface CanvasSize {
  readonly width: number;
  readonly height: number;
}

/**
 * A single recorded pointer observation.
 * `t` is a monotonic timestamp in seconds.
 */
export interface Sample {
  readonly x: number;
  readonly y: number;
  readonly t: number;
}

/**
 * Ordered pointer samples for one trial. The first sample is the trial's
 * start position, the last is the hit position. Timestamps never decrease.
 */
export type Trajectory = readonly Sample[];

/** How targets are chosen for a session. */
export type ExperimentMode = "random" | "preset";

/**
 * One planned trial in a preset session.
 *
 * `targetPos` and `radius` stay unset until the trial spawns, because
 * placement depends on where the previous trial ended.
 */
export interface TrialPlanEntry {
  readonly distance: number;
  readonly width: number;
  readonly targetPos?: Point;
  readonly radius?: number;
}

/** Design parameters a preset trial was run with. */
export interface PresetInfo {
  readonly distance: number;
  readonly width: number;
  readonly radius: number;
  readonly targetPos: Point;
}

/**
 * Kinematic metrics for a completed trial.
 *
 * Units: seconds for times, pixels for distances, px/s for speeds,
 * bits for the index of difficulty and bits/s for throughput.
 */
export interface TrialResult {
  readonly timeElapsed: number;
  readonly totalDistance: number;
  readonly idealDistance: number;
  readonly avgSpeed: number;
  readonly peakVelocity: number;
  /** Path length over straight-line distance. 1.0 is a perfectly straight path. */
  readonly curvature: number;
  readonly reactionTime: number;
  readonly indexOfDifficulty: number;
  readonly throughput: number;
  /** Velocity samples below the pause threshold (hesitations). */
  readonly pauseCount: number;
  readonly targetPos: Point;
  readonly targetRadius: number;
  readonly trajectory: Trajectory;
  /** Present when the trial came from a preset plan. */
  readonly preset?: PresetInfo;
}

/** Means over a session's completed trials. */
export interface SessionSummary {
  readonly trialCount: number;
  readonly avgTime: number;
  readonly avgSpeed: number;
  readonly avgCurvature: number;
  readonly avgThroughput: number;
}

/**
 * Everything recorded for one session. Grows by one trial per hit while the
 * session runs and is frozen once the session ends or is stopped.
 */
export interface SessionRecord {
  readonly mode: ExperimentMode;
  /** Minimum sampling interval in seconds. */
  readonly sampleInterval: number;
  readonly canvas: CanvasSize;
  readonly defaultRadius: number;
  readonly trialCount: number;
  readonly plan: readonly TrialPlanEntry[];
  readonly trials: readonly TrialResult[];
  readonly stoppedEarly: boolean;
  readonly summary?: SessionSummary;
}
