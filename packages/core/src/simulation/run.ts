import type { Point, SessionRecord } from "../types.js";
import { EngineError } from "../errors.js";
import type { SessionController } from "../session/controller.js";
import type { SessionConfigInput } from "../session/config.js";
import type { BoundTarget, DispatchResult } from "../session/state.js";
import type { ManualClock } from "./clock.js";
import type { SimulatedParticipant } from "./participant.js";

export interface RunSessionOptions {
  /** Controller built with `clock.asFn()` as its clock. */
  readonly controller: SessionController;
  readonly participant: SimulatedParticipant;
  readonly clock: ManualClock;
  readonly config?: SessionConfigInput;
  /** Send a stop request once this many trials have completed. */
  readonly stopAfter?: number;
  /** Pause between a hit and the first movement of the next trial (s). Defaults to 0. */
  readonly interTrialPause?: number;
}

/**
 * Drive a whole session with synthetic pointer paths.
 *
 * The participant clicks the start marker where it is drawn, then for each
 * target replays a generated path as motion events (advancing the clock to
 * each sample's time) and finishes with a hit on the final sample.
 *
 * Returns the finalized record, or null when the session ended without a
 * completed trial.
 */
export function runSession(options: RunSessionOptions): SessionRecord | null {
  const { controller, participant, clock } = options;
  const pause = options.interTrialPause ?? 0;

  const started = controller.dispatch({ type: "start", config: options.config });
  if (!started.accepted || !started.startMarker) {
    throw new EngineError(`runSession: controller refused to start in phase ${started.phase}`);
  }

  let from: Point = started.startMarker;
  let result: DispatchResult = controller.dispatch({ type: "start_marker", point: from });
  let target: BoundTarget | undefined = result.target;

  while (target) {
    if (options.stopAfter !== undefined && controller.completedTrials.length >= options.stopAfter) {
      return controller.dispatch({ type: "stop" }).record ?? null;
    }

    clock.advance(pause);
    const t0 = clock.now();
    const path = participant.generate(from, target.position, 2 * target.radius);
    for (let i = 1; i < path.length - 1; i++) {
      clock.set(t0 + path[i].t);
      controller.dispatch({ type: "motion", point: path[i] });
    }

    const last = path[path.length - 1];
    clock.set(t0 + last.t);
    result = controller.dispatch({ type: "target_hit", targetId: target.id, point: last });
    from = { x: last.x, y: last.y };
    target = result.target;
  }

  return result.record ?? null;
}
