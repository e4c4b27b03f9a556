// @pointing-lab/core
// Trial/session engine for Fitts's-law pointing tasks: sampling, target
// placement, trial planning, kinematic analysis and the session state machine.

export type {
  Point,
  CanvasSize,
  Sample,
  Trajectory,
  ExperimentMode,
  TrialPlanEntry,
  PresetInfo,
  TrialResult,
  SessionSummary,
  SessionRecord,
} from "./types.js";

export { EngineError, ConfigurationError } from "./errors.js";

export {
  SeededRandom,
  createSeededRandom,
  monotonicClock,
  randomInt,
  shuffled,
} from "./random.js";
export type { RandomFn, ClockFn } from "./random.js";

export { DEFAULT_SAMPLE_INTERVAL, shouldAcceptSample } from "./sampling/throttle.js";

export {
  FREE_PLACEMENT_MARGIN,
  MIN_TARGET_SEPARATION,
  FREE_PLACEMENT_MAX_RETRIES,
  CONTROLLED_PLACEMENT_ATTEMPTS,
  CONTROLLED_EDGE_PADDING,
  MIN_TARGET_RADIUS,
  radiusForWidth,
  placeFreeTarget,
  placeControlledTarget,
} from "./placement/placer.js";
export type {
  PlacementPolicy,
  TargetPlacement,
  FreePlacementOptions,
  ControlledPlacementOptions,
} from "./placement/placer.js";

export {
  DEFAULT_PRESET_DISTANCES,
  DEFAULT_PRESET_WIDTHS,
  buildCombinations,
  buildTrialPlan,
} from "./planning/planner.js";
export type { DesignCombination } from "./planning/planner.js";

export {
  MOVEMENT_THRESHOLD_PX,
  PAUSE_VELOCITY_PX_PER_SEC,
  indexOfDifficulty,
  computeReactionTime,
  analyzeTrajectory,
} from "./analysis/kinematics.js";
export { aggregateSession } from "./analysis/aggregate.js";

export { TypedEventEmitter } from "./events/emitter.js";

export * from "./session/index.js";
export * from "./simulation/index.js";
