import type { TrialPlanEntry } from "../types.js";
import { shuffled, type RandomFn } from "../random.js";

/** A (distance, width) design cell. */
export interface DesignCombination {
  readonly distance: number;
  readonly width: number;
}

/** Default preset distances (px). */
export const DEFAULT_PRESET_DISTANCES: readonly number[] = [120, 200, 320];

/** Default preset widths (px). Targets are drawn with radius = width / 2. */
export const DEFAULT_PRESET_WIDTHS: readonly number[] = [20, 40];

/** Full distance × width cross product, distances outermost. */
export function buildCombinations(
  distances: readonly number[],
  widths: readonly number[],
): DesignCombination[] {
  const combos: DesignCombination[] = [];
  for (const distance of distances) {
    for (const width of widths) {
      combos.push({ distance, width });
    }
  }
  return combos;
}

/**
 * Build an ordered plan of exactly `count` trials.
 *
 * Shuffled copies of `combinations` are appended block by block until the
 * plan is long enough, then it is truncated. Every combination therefore
 * appears ⌊count/K⌋ or ⌈count/K⌉ times, and the same combination can only
 * repeat back to back across a block boundary.
 */
export function buildTrialPlan(
  combinations: readonly DesignCombination[],
  count: number,
  random: RandomFn,
): TrialPlanEntry[] {
  if (combinations.length === 0 || count <= 0) return [];

  const plan: TrialPlanEntry[] = [];
  while (plan.length < count) {
    for (const combo of shuffled(combinations, random)) {
      plan.push({ distance: combo.distance, width: combo.width });
    }
  }
  return plan.slice(0, count);
}
