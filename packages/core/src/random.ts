import { createHash } from "node:crypto";

/** RNG function signature — returns a value in [0, 1). */
export type RandomFn = () => number;

/** Clock function signature — returns a monotonic time in seconds. */
export type ClockFn = () => number;

/** Default clock: high-resolution monotonic time in seconds. */
export const monotonicClock: ClockFn = () => performance.now() / 1000;

/**
 * xorshift128+ source behind {@link createSeededRandom}. A string seed
 * reproduces a session's trial plan, target placements and simulated paths.
 */
export class SeededRandom {
  private state0: bigint;
  private state1: bigint;

  constructor(seed: string) {
    const hash = createHash("sha256").update(seed).digest();
    this.state0 = hash.readBigUInt64LE(0);
    this.state1 = hash.readBigUInt64LE(8);
    // xorshift never leaves the all-zero state
    if (this.state0 === 0n) this.state0 = 1n;
    if (this.state1 === 0n) this.state1 = 2n;
  }

  /** Next value in [0, 1), built from the low 52 bits of the sum. */
  next(): number {
    let s1 = this.state0;
    const s0 = this.state1;
    this.state0 = s0;
    s1 ^= (s1 << 23n) & 0xFFFFFFFFFFFFFFFFn;
    s1 ^= s1 >> 17n;
    s1 ^= s0;
    s1 ^= s0 >> 26n;
    this.state1 = s1;
    const combined = (this.state0 + this.state1) & 0xFFFFFFFFFFFFFFFFn;
    return Number(combined & 0xFFFFFFFFFFFFFn) / 0x10000000000000;
  }

  /** Bound `next` as a plain RandomFn. */
  asFn(): RandomFn {
    return () => this.next();
  }
}

/** Convenience: a RandomFn seeded from a string. */
export function createSeededRandom(seed: string): RandomFn {
  return new SeededRandom(seed).asFn();
}

/** Integer drawn uniformly from [min, max], both inclusive. */
export function randomInt(min: number, max: number, random: RandomFn): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** Shuffle a copy of `items` (Fisher-Yates). */
export function shuffled<T>(items: readonly T[], random: RandomFn): T[] {
  const arr = [...items];
  for (let i = arr.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [arr[i], arr[j]] = [arr[j], arr[i]];
  }
  return arr;
}
