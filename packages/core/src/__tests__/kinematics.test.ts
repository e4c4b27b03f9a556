import { describe, it, expect } from "vitest";
import { createTrajectory, createStraightTrajectory } from "@pointing-lab/test-utils";

import {
  analyzeTrajectory,
  computeReactionTime,
  indexOfDifficulty,
} from "../analysis/kinematics.js";
import { createSeededRandom, randomInt } from "../random.js";
import type { Sample } from "../types.js";

describe("indexOfDifficulty", () => {
  it("uses the Shannon formulation", () => {
    expect(indexOfDifficulty(40, 40)).toBe(1);
    expect(indexOfDifficulty(120, 40)).toBe(2);
    expect(indexOfDifficulty(0, 40)).toBe(0);
  });

  it("is zero for a non-positive width", () => {
    expect(indexOfDifficulty(200, 0)).toBe(0);
    expect(indexOfDifficulty(200, -4)).toBe(0);
  });
});

describe("computeReactionTime", () => {
  it("returns the time the path first reaches 5 px", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [2, 0, 0.1],
      [4, 0, 0.2],
      [6, 0, 0.3],
    ]);
    expect(computeReactionTime(path)).toBeCloseTo(0.3, 10);
  });

  it("counts path length, not displacement", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [3, 0, 0.1],
      [0, 0, 0.2],
    ]);
    expect(computeReactionTime(path)).toBeCloseTo(0.2, 10);
  });

  it("is zero when the threshold is never reached", () => {
    expect(computeReactionTime(createTrajectory([[0, 0, 0], [1, 0, 0.1], [2, 0, 0.2]]))).toBe(0);
    expect(computeReactionTime(createTrajectory([[0, 0, 0]]))).toBe(0);
  });
});

describe("analyzeTrajectory", () => {
  it("computes the metrics of a straight 40 px move in 0.1 s", () => {
    const path = createTrajectory([
      [500, 300, 0],
      [520, 300, 0.05],
      [540, 300, 0.1],
    ]);
    const result = analyzeTrajectory(path, { x: 540, y: 300 }, 20);

    expect(result.totalDistance).toBeCloseTo(40, 10);
    expect(result.idealDistance).toBeCloseTo(40, 10);
    expect(result.curvature).toBeCloseTo(1, 10);
    expect(result.timeElapsed).toBeCloseTo(0.1, 10);
    expect(result.avgSpeed).toBeCloseTo(400, 6);
    expect(result.peakVelocity).toBeCloseTo(400, 6);
    expect(result.indexOfDifficulty).toBeCloseTo(1, 10);
    expect(result.throughput).toBeCloseTo(10, 6);
    expect(result.reactionTime).toBeCloseTo(0.05, 10);
    expect(result.pauseCount).toBe(0);
    expect(result.targetPos).toEqual({ x: 540, y: 300 });
    expect(result.targetRadius).toBe(20);
    expect(result.trajectory).toEqual(path);
  });

  it("reports curvature above 1 for a detour", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [30, 40, 0.5],
      [60, 0, 1],
    ]);
    const result = analyzeTrajectory(path, { x: 60, y: 0 }, 10);
    expect(result.totalDistance).toBeCloseTo(100, 10);
    expect(result.idealDistance).toBeCloseTo(60, 10);
    expect(result.curvature).toBeCloseTo(100 / 60, 10);
    expect(result.peakVelocity).toBeCloseTo(100, 6);
  });

  it("returns the zero record for a single sample", () => {
    const result = analyzeTrajectory(createTrajectory([[10, 20, 5]]), { x: 10, y: 20 }, 20);
    expect(result).toEqual({
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
      targetPos: { x: 10, y: 20 },
      targetRadius: 20,
      trajectory: [{ x: 10, y: 20, t: 5 }],
    });
  });

  it("returns the zero record for an empty trajectory", () => {
    const result = analyzeTrajectory([], { x: 0, y: 0 }, 20);
    expect(result.curvature).toBe(1);
    expect(result.trajectory).toEqual([]);
  });

  it("skips zero-duration segments for velocity but keeps their length", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [10, 0, 0],
      [20, 0, 0.1],
    ]);
    const result = analyzeTrajectory(path, { x: 20, y: 0 }, 20);
    expect(result.totalDistance).toBe(20);
    expect(result.peakVelocity).toBeCloseTo(100, 6);
    expect(Number.isFinite(result.avgSpeed)).toBe(true);
  });

  it("uses curvature 1 when start and end coincide", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [10, 0, 0.1],
      [0, 0, 0.2],
    ]);
    const result = analyzeTrajectory(path, { x: 0, y: 0 }, 20);
    expect(result.idealDistance).toBe(0);
    expect(result.curvature).toBe(1);
    expect(result.indexOfDifficulty).toBe(0);
    expect(result.throughput).toBe(0);
  });

  it("clamps elapsed and reaction time for out-of-order timestamps", () => {
    const path = createTrajectory([
      [0, 0, 1],
      [10, 0, 0.5],
    ]);
    const result = analyzeTrajectory(path, { x: 10, y: 0 }, 20);
    expect(result.timeElapsed).toBe(0);
    expect(result.avgSpeed).toBe(0);
    expect(result.throughput).toBe(0);
    expect(result.reactionTime).toBe(0);
    expect(result.peakVelocity).toBe(0);
  });

  it("counts slow segments as pauses", () => {
    const path = createTrajectory([
      [0, 0, 0],
      [1, 0, 0.1],
      [2, 0, 0.2],
      [102, 0, 0.3],
    ]);
    expect(analyzeTrajectory(path, { x: 102, y: 0 }, 20).pauseCount).toBe(2);
  });

  it("uses twice the radius as the target width", () => {
    const path = createStraightTrajectory({ from: [0, 0], to: [120, 0], steps: 4, duration: 0.5 });
    const result = analyzeTrajectory(path, { x: 120, y: 0 }, 20);
    expect(result.indexOfDifficulty).toBeCloseTo(2, 10);
    expect(result.throughput).toBeCloseTo(4, 10);
  });

  it("is idempotent and does not alias its input", () => {
    const path = createTrajectory([
      [500, 300, 0],
      [520, 310, 0.05],
      [540, 300, 0.1],
    ]);
    const target = { x: 540, y: 300 };
    const first = analyzeTrajectory(path, target, 20);
    const second = analyzeTrajectory(path, target, 20);
    expect(second).toEqual(first);

    path[1] = { x: 0, y: 310, t: 0.05 };
    path.push({ x: 1, y: 1, t: 9 });
    target.x = 0;
    expect(first.trajectory).toHaveLength(3);
    expect(first.trajectory[1].x).toBe(520);
    expect(first.targetPos.x).toBe(540);
  });

  it("keeps curvature >= 1 and reaction time within elapsed time on random paths", () => {
    const random = createSeededRandom("kinematics-props");
    for (let run = 0; run < 50; run++) {
      const n = randomInt(2, 20, random);
      const path: Sample[] = [];
      let t = 0;
      for (let i = 0; i < n; i++) {
        t += randomInt(0, 3, random) * 0.01;
        path.push({ x: randomInt(0, 999, random), y: randomInt(0, 599, random), t });
      }
      const result = analyzeTrajectory(path, path[n - 1], 20);
      expect(result.curvature).toBeGreaterThanOrEqual(1 - 1e-12);
      expect(result.reactionTime).toBeGreaterThanOrEqual(0);
      expect(result.reactionTime).toBeLessThanOrEqual(result.timeElapsed);
      expect(result.totalDistance).toBeGreaterThanOrEqual(0);
    }
  });
});
