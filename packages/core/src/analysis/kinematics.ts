import type { Point, Trajectory, TrialResult } from "../types.js";

/** Cumulative displacement (px) that marks the onset of movement. */
export const MOVEMENT_THRESHOLD_PX = 5;

/** Segment velocity (px/s) below which the pointer counts as paused. */
export const PAUSE_VELOCITY_PX_PER_SEC = 20;

/**
 * Fitts index of difficulty, Shannon formulation: log2(D / W + 1).
 *
 * W is the nominal target diameter rather than an effective width derived
 * from the spread of hit points. Returns 0 when `width <= 0`.
 */
export function indexOfDifficulty(distance: number, width: number): number {
  if (width <= 0) return 0;
  return Math.log2(distance / width + 1);
}

/**
 * Time from the first sample until cumulative path length first reaches
 * MOVEMENT_THRESHOLD_PX. Zero if the threshold is never reached.
 */
export function computeReactionTime(trajectory: Trajectory): number {
  if (trajectory.length < 2) return 0;

  const t0 = trajectory[0].t;
  let travelled = 0;
  for (let i = 1; i < trajectory.length; i++) {
    const prev = trajectory[i - 1];
    const cur = trajectory[i];
    travelled += Math.hypot(cur.x - prev.x, cur.y - prev.y);
    if (travelled >= MOVEMENT_THRESHOLD_PX) {
      return cur.t - t0;
    }
  }
  return 0;
}

/**
 * Derive the metrics of one trial from its recorded trajectory.
 *
 * Pure: calling it twice on the same input gives equal results, and the
 * returned record holds its own copy of the samples.
 *
 * Trajectories with fewer than two samples yield a zero record
 * (curvature 1). Zero-duration segments contribute no velocity sample.
 */
export function analyzeTrajectory(
  trajectory: Trajectory,
  targetPos: Point,
  targetRadius: number,
): TrialResult {
  const samples = trajectory.map((s) => ({ x: s.x, y: s.y, t: s.t }));
  const target = { x: targetPos.x, y: targetPos.y };

  if (samples.length < 2) {
    return {
      timeElapsed: 0,
      totalDistance: 0,
      idealDistance: 0,
      avgSpeed: 0,
      peakVelocity: 0,
      curvature: 1,
      reactionTime: 0,
      indexOfDifficulty: 0,
      throughput: 0,
      pauseCount: 0,
      targetPos: target,
      targetRadius,
      trajectory: samples,
    };
  }

  let totalDistance = 0;
  let peakVelocity = 0;
  let pauseCount = 0;
  for (let i = 1; i < samples.length; i++) {
    const prev = samples[i - 1];
    const cur = samples[i];
    const d = Math.hypot(cur.x - prev.x, cur.y - prev.y);
    const dt = cur.t - prev.t;
    totalDistance += d;
    if (dt > 0) {
      const v = d / dt;
      if (v > peakVelocity) peakVelocity = v;
      if (v < PAUSE_VELOCITY_PX_PER_SEC) pauseCount++;
    }
  }

  const first = samples[0];
  const last = samples[samples.length - 1];
  const idealDistance = Math.hypot(last.x - first.x, last.y - first.y);
  const timeElapsed = Math.max(0, last.t - first.t);
  const avgSpeed = timeElapsed > 0 ? totalDistance / timeElapsed : 0;
  const curvature = idealDistance > 0 ? totalDistance / idealDistance : 1;
  const id = indexOfDifficulty(idealDistance, 2 * targetRadius);
  const throughput = timeElapsed > 0 ? id / timeElapsed : 0;
  // Clamped so out-of-order input cannot break 0 <= reactionTime <= timeElapsed.
  const reactionTime = Math.min(Math.max(0, computeReactionTime(samples)), timeElapsed);

  return {
    timeElapsed,
    totalDistance,
    idealDistance,
    avgSpeed,
    peakVelocity,
    curvature,
    reactionTime,
    indexOfDifficulty: id,
    throughput,
    pauseCount,
    targetPos: target,
    targetRadius,
    trajectory: samples,
  };
}
