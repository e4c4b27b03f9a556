import { describe, it, expect } from "vitest";
import { constantRandom } from "@pointing-lab/test-utils";

import {
  DEFAULT_PRESET_DISTANCES,
  DEFAULT_PRESET_WIDTHS,
  buildCombinations,
  buildTrialPlan,
} from "../planning/planner.js";
import { createSeededRandom } from "../random.js";

const key = (e: { distance: number; width: number }): string => `${e.distance}/${e.width}`;

describe("buildCombinations", () => {
  it("crosses distances with widths, distances outermost", () => {
    expect(buildCombinations([120, 200], [20, 40])).toEqual([
      { distance: 120, width: 20 },
      { distance: 120, width: 40 },
      { distance: 200, width: 20 },
      { distance: 200, width: 40 },
    ]);
  });

  it("produces six cells from the defaults", () => {
    expect(buildCombinations(DEFAULT_PRESET_DISTANCES, DEFAULT_PRESET_WIDTHS)).toHaveLength(6);
  });
});

describe("buildTrialPlan", () => {
  const combos = buildCombinations(DEFAULT_PRESET_DISTANCES, DEFAULT_PRESET_WIDTHS);

  it("returns exactly the requested number of entries", () => {
    for (const count of [1, 5, 6, 7, 10, 12, 25]) {
      expect(buildTrialPlan(combos, count, createSeededRandom(`len-${count}`))).toHaveLength(count);
    }
  });

  it("is empty for no combinations or a non-positive count", () => {
    expect(buildTrialPlan([], 10, constantRandom(0))).toEqual([]);
    expect(buildTrialPlan(combos, 0, constantRandom(0))).toEqual([]);
    expect(buildTrialPlan(combos, -3, constantRandom(0))).toEqual([]);
  });

  it("balances each combination to floor or ceil of count / K", () => {
    const plan = buildTrialPlan(combos, 10, createSeededRandom("balance"));
    const counts = new Map<string, number>();
    for (const entry of plan) counts.set(key(entry), (counts.get(key(entry)) ?? 0) + 1);

    expect(counts.size).toBe(6);
    for (const n of counts.values()) {
      expect(n === 1 || n === 2).toBe(true);
    }
  });

  it("lays out every full block as a permutation of the combinations", () => {
    const plan = buildTrialPlan(combos, 18, createSeededRandom("blocks"));
    const expected = combos.map(key).sort();
    for (let block = 0; block < 3; block++) {
      const keys = plan.slice(block * 6, block * 6 + 6).map(key).sort();
      expect(keys).toEqual(expected);
    }
  });

  it("leaves target position and radius unset", () => {
    const plan = buildTrialPlan(combos, 3, createSeededRandom("unset"));
    for (const entry of plan) {
      expect(entry.targetPos).toBeUndefined();
      expect(entry.radius).toBeUndefined();
    }
  });

  it("does not mutate the combinations", () => {
    const input = buildCombinations([120, 200], [20]);
    buildTrialPlan(input, 4, createSeededRandom("immutable"));
    expect(input).toEqual([
      { distance: 120, width: 20 },
      { distance: 200, width: 20 },
    ]);
  });
});
