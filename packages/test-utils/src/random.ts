import type { RandomFn } from "@pointing-lab/core";

/** RandomFn that also reports how many values it has handed out. */
export interface CountingRandom extends RandomFn {
  readonly calls: () => number;
}

/**
 * RandomFn that cycles through `seq`. Lets a test dictate every draw.
 *
 * @example
 * ```ts
 * const random = sequenceRandom([0.25, 0.75]); // 0.25, 0.75, 0.25, …
 * ```
 */
export function sequenceRandom(seq: readonly number[]): CountingRandom {
  if (seq.length === 0) throw new Error("sequenceRandom needs at least one value");
  let idx = 0;
  const next = () => {
    const val = seq[idx % seq.length];
    idx++;
    return val;
  };
  return Object.assign(next, { calls: () => idx });
}

/** RandomFn that always returns `value`. */
export function constantRandom(value: number): RandomFn {
  return () => value;
}
