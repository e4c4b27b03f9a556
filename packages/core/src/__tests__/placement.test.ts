import { describe, it, expect } from "vitest";
import { constantRandom, sequenceRandom } from "@pointing-lab/test-utils";

import {
  FREE_PLACEMENT_MAX_RETRIES,
  placeControlledTarget,
  placeFreeTarget,
  radiusForWidth,
} from "../placement/placer.js";
import { createSeededRandom } from "../random.js";

const CANVAS = { width: 1000, height: 600 };
const CENTRE = { x: 500, y: 300 };

describe("radiusForWidth", () => {
  it("halves the width, rounding to whole pixels", () => {
    expect(radiusForWidth(40)).toBe(20);
    expect(radiusForWidth(41)).toBe(21);
  });

  it("never goes below 2 px", () => {
    expect(radiusForWidth(1)).toBe(2);
    expect(radiusForWidth(3)).toBe(2);
  });
});

describe("placeFreeTarget", () => {
  it("draws x then y inside the margins", () => {
    const placement = placeFreeTarget(CENTRE, CANVAS, sequenceRandom([0, 0.999999]), { radius: 20 });
    expect(placement).toEqual({
      position: { x: 100, y: 500 },
      radius: 20,
      policy: "free",
      attempts: 1,
      fellBack: false,
    });
  });

  it("rejects draws too close to the reference", () => {
    // First draw lands on the reference itself
    const random = sequenceRandom([0.5, 0.5, 0, 0]);
    const placement = placeFreeTarget(CENTRE, CANVAS, random, { radius: 20 });
    expect(placement.position).toEqual({ x: 100, y: 100 });
    expect(placement.attempts).toBe(2);
    expect(random.calls()).toBe(4);
  });

  it("accepts the draw after the retry limit regardless of separation", () => {
    const placement = placeFreeTarget(CENTRE, CANVAS, constantRandom(0.5), { radius: 20 });
    expect(placement.position).toEqual(CENTRE);
    expect(placement.attempts).toBe(FREE_PLACEMENT_MAX_RETRIES + 1);
  });

  it("clamps the range on a canvas smaller than twice the margin", () => {
    const placement = placeFreeTarget(
      { x: 0, y: 0 },
      { width: 150, height: 150 },
      constantRandom(0.99),
      { radius: 20 },
    );
    expect(placement.position).toEqual({ x: 101, y: 101 });
  });

  it("keeps targets larger than the margin fully on the canvas", () => {
    const low = placeFreeTarget(CENTRE, CANVAS, constantRandom(0), { radius: 150 });
    const high = placeFreeTarget(CENTRE, CANVAS, constantRandom(0.999999), { radius: 150 });
    expect(low.position).toEqual({ x: 150, y: 150 });
    expect(high.position).toEqual({ x: 850, y: 450 });
  });

  it("raises a custom margin to the target radius", () => {
    const placement = placeFreeTarget(
      { x: 0, y: 0 },
      { width: 100, height: 100 },
      constantRandom(0),
      { radius: 30, margin: 10, minSeparation: 0 },
    );
    expect(placement.position).toEqual({ x: 30, y: 30 });
  });

  it("honours custom margin and separation", () => {
    const placement = placeFreeTarget(
      { x: 0, y: 0 },
      { width: 100, height: 100 },
      constantRandom(0),
      { radius: 5, margin: 10, minSeparation: 0 },
    );
    expect(placement.position).toEqual({ x: 10, y: 10 });
    expect(placement.radius).toBe(5);
  });

  it("stays inside the margins for seeded draws", () => {
    const random = createSeededRandom("free-placement");
    for (let i = 0; i < 200; i++) {
      const { position } = placeFreeTarget(CENTRE, CANVAS, random, { radius: 20 });
      expect(position.x).toBeGreaterThanOrEqual(100);
      expect(position.x).toBeLessThanOrEqual(900);
      expect(position.y).toBeGreaterThanOrEqual(100);
      expect(position.y).toBeLessThanOrEqual(500);
      expect(Math.hypot(position.x - 500, position.y - 300)).toBeGreaterThanOrEqual(80);
    }
  });
});

describe("placeControlledTarget", () => {
  it("places a target at the requested distance along the drawn angle", () => {
    const placement = placeControlledTarget(CENTRE, 200, 40, CANVAS, constantRandom(0));
    expect(placement).toEqual({
      position: { x: 700, y: 300 },
      radius: 20,
      policy: "controlled",
      attempts: 1,
      fellBack: false,
    });
  });

  it("truncates the candidate to whole pixels", () => {
    // Quarter turn: cos is a tiny positive number, sin is 1
    const placement = placeControlledTarget(CENTRE, 200, 40, CANVAS, constantRandom(0.25));
    expect(placement.position).toEqual({ x: 500, y: 500 });
  });

  it("tries another angle when the candidate leaves the canvas", () => {
    const random = sequenceRandom([0.5, 0]);
    const placement = placeControlledTarget({ x: 100, y: 300 }, 200, 40, CANVAS, random);
    expect(placement.position).toEqual({ x: 300, y: 300 });
    expect(placement.attempts).toBe(2);
  });

  it("falls back to free placement when no angle fits", () => {
    const placement = placeControlledTarget(CENTRE, 2000, 40, CANVAS, constantRandom(0));
    expect(placement).toEqual({
      position: { x: 100, y: 100 },
      radius: 20,
      policy: "free",
      attempts: 1,
      fellBack: true,
    });
  });

  it("widens the fallback margin to cover the target", () => {
    const placement = placeControlledTarget(
      CENTRE,
      2000,
      200,
      CANVAS,
      constantRandom(0),
      { fallbackMargin: 20 },
    );
    // radius 100, controlled margin 110
    expect(placement.position).toEqual({ x: 110, y: 110 });
    expect(placement.fellBack).toBe(true);
  });

  it("lands within √2 px of the requested distance and inside the padded canvas", () => {
    const random = createSeededRandom("controlled-placement");
    for (let i = 0; i < 200; i++) {
      const { position, radius, fellBack } = placeControlledTarget(CENTRE, 200, 40, CANVAS, random);
      expect(fellBack).toBe(false);
      expect(Math.abs(Math.hypot(position.x - 500, position.y - 300) - 200)).toBeLessThan(Math.SQRT2);
      expect(position.x).toBeGreaterThanOrEqual(10 + radius);
      expect(position.x).toBeLessThanOrEqual(1000 - 10 - radius);
      expect(position.y).toBeGreaterThanOrEqual(10 + radius);
      expect(position.y).toBeLessThanOrEqual(600 - 10 - radius);
    }
  });
});
