import type { ClockFn } from "../random.js";

/**
 * Clock that only moves when told to. Lets a simulated session (or a test)
 * dictate every timestamp the engine sees.
 */
export class ManualClock {
  private _now: number;

  constructor(start = 0) {
    this._now = start;
  }

  /** Current time in seconds. */
  now(): number {
    return this._now;
  }

  /** Move forward by `seconds`. */
  advance(seconds: number): void {
    this._now += seconds;
  }

  /** Jump to `time`. Moving backwards is refused to keep timestamps monotonic. */
  set(time: number): void {
    if (time < this._now) {
      throw new RangeError(`ManualClock: cannot move back from ${this._now} to ${time}`);
    }
    this._now = time;
  }

  /** Bound `now` as a ClockFn. */
  asFn(): ClockFn {
    return () => this._now;
  }
}
