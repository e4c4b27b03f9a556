import type { Point, Sample } from "../types.js";
import type { RandomFn } from "../random.js";

/** Range in seconds. */
export interface SecondsRange {
  readonly min: number;
  readonly max: number;
}

export interface SimulatedParticipantConfig {
  /** Override the RNG for deterministic runs. Defaults to Math.random. */
  readonly random?: RandomFn;
  /** Fitts intercept `a` in seconds. Defaults to 0.2. */
  readonly interceptSec?: number;
  /** Fitts slope `b` in seconds per bit. Defaults to 0.15. */
  readonly slopeSecPerBit?: number;
  /** Still period before the pointer starts moving. Defaults to 0.15–0.3 s. */
  readonly reactionTime?: SecondsRange;
  /** Spacing between generated samples. Defaults to 0.008 s (≈125 Hz polling). */
  readonly pollInterval?: number;
  /** Probability of overshooting the target and correcting. Defaults to 0.25. */
  readonly overshootProbability?: number;
}

const DEFAULT_REACTION_TIME: SecondsRange = { min: 0.15, max: 0.3 };

/**
 * Synthetic pointer paths for driving the engine without a human.
 *
 * Produces reasonably natural-looking movements using:
 * - Fitts' Law movement time: MT = a + b·log2(D/W + 1), ±15% jitter
 * - A still reaction period at the start point
 * - Cubic Bezier interpolation with randomized control points
 * - Ease-in-out velocity profile (bell curve)
 * - Micro-jitter noise, zero at both endpoints
 * - Optional overshoot with correction
 *
 * Timestamps are seconds relative to the first sample; coordinates are
 * whole pixels and the final sample lies exactly on the target.
 */
export class SimulatedParticipant {
  private readonly _random: RandomFn;
  private readonly _a: number;
  private readonly _b: number;
  private readonly _reaction: SecondsRange;
  private readonly _poll: number;
  private readonly _overshoot: number;

  constructor(config: SimulatedParticipantConfig = {}) {
    this._random = config.random ?? Math.random;
    this._a = config.interceptSec ?? 0.2;
    this._b = config.slopeSecPerBit ?? 0.15;
    this._reaction = config.reactionTime ?? DEFAULT_REACTION_TIME;
    this._poll = config.pollInterval ?? 0.008;
    this._overshoot = config.overshootProbability ?? 0.25;
  }

  /** Expected (jitter-free) movement time for a target at `distance` of `width`. */
  movementTime(distance: number, width: number): number {
    return this._a + this._b * Math.log2(distance / width + 1);
  }

  /** Generate a path from `start` to `end` for a target `targetWidth` wide. */
  generate(start: Point, end: Point, targetWidth: number): Sample[] {
    const dx = end.x - start.x;
    const dy = end.y - start.y;
    const distance = Math.hypot(dx, dy);
    const reaction = this._reaction.min + this._random() * (this._reaction.max - this._reaction.min);

    // Already on target: only the click remains
    if (distance < 1) {
      return [
        { x: start.x, y: start.y, t: 0 },
        { x: end.x, y: end.y, t: reaction },
      ];
    }

    const duration = this.movementTime(distance, Math.max(1, targetWidth)) *
      (0.85 + this._random() * 0.3);
    const numPoints = Math.max(5, Math.round(duration / this._poll));

    const cp1 = this._controlPoint(start, end, 0.25);
    const cp2 = this._controlPoint(start, end, 0.75);

    const samples: Sample[] = [{ x: start.x, y: start.y, t: 0 }];
    for (let i = 0; i <= numPoints; i++) {
      const u = i / numPoints;
      const pos = cubicBezier(start, cp1, cp2, end, easeInOut(u));

      const jitterScale = Math.sin(u * Math.PI);
      const jitterX = (this._random() - 0.5) * 3 * jitterScale;
      const jitterY = (this._random() - 0.5) * 3 * jitterScale;

      samples.push({
        x: Math.round(pos.x + jitterX),
        y: Math.round(pos.y + jitterY),
        t: reaction + u * duration,
      });
    }

    if (distance > 50 && this._random() < this._overshoot) {
      this._addOvershoot(samples, dx / distance, dy / distance, end);
    }

    const lastIdx = samples.length - 1;
    samples[lastIdx] = { x: end.x, y: end.y, t: samples[lastIdx].t };
    return samples;
  }

  /** Control point offset perpendicular to the start→end line. */
  private _controlPoint(start: Point, end: Point, along: number): Point {
    const dx = end.x - start.x;
    const dy = end.y - start.y;
    const distance = Math.hypot(dx, dy);

    const perpMagnitude = distance * (0.05 + this._random() * 0.2);
    const perpDirection = this._random() < 0.5 ? 1 : -1;

    return {
      x: start.x + dx * along + (-dy / distance) * perpMagnitude * perpDirection,
      y: start.y + dy * along + (dx / distance) * perpMagnitude * perpDirection,
    };
  }

  /** Replace the final approach with a 5–20 px overshoot along (ux, uy) and a correction. */
  private _addOvershoot(samples: Sample[], ux: number, uy: number, target: Point): void {
    const overshootDist = 5 + this._random() * 15;
    const overshootTime = samples[samples.length - 1].t;
    const correctionTime = overshootTime + 0.04 + this._random() * 0.08;

    samples.splice(samples.length - 2, 2);
    samples.push(
      {
        x: Math.round(target.x + ux * overshootDist),
        y: Math.round(target.y + uy * overshootDist),
        t: overshootTime,
      },
      { x: target.x, y: target.y, t: correctionTime },
    );
  }
}

function cubicBezier(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const u = 1 - t;
  const uu = u * u;
  const tt = t * t;
  return {
    x: uu * u * p0.x + 3 * uu * t * p1.x + 3 * u * tt * p2.x + tt * t * p3.x,
    y: uu * u * p0.y + 3 * uu * t * p1.y + 3 * u * tt * p2.y + tt * t * p3.y,
  };
}

/** Smoothstep. */
function easeInOut(t: number): number {
  return t * t * (3 - 2 * t);
}
