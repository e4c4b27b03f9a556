export { SessionPhase } from "./state.js";
export type {
  SessionEvent,
  SessionEventType,
  StartEvent,
  StartMarkerEvent,
  MotionEvent,
  TargetHitEvent,
  StopEvent,
  ResizeEvent,
  BoundTarget,
  DispatchResult,
  PhaseTransition,
} from "./state.js";

export {
  DEFAULT_TRIAL_COUNT,
  DEFAULT_TARGET_RADIUS,
  DEFAULT_CANVAS,
  resolveSessionConfig,
} from "./config.js";
export type {
  SessionConfigInput,
  SessionConfig,
  ConfigWarning,
  ResolvedConfig,
} from "./config.js";

export {
  canvasCentre,
  createSessionContext,
  hasRemainingTrials,
  spawnTrial,
  recordMotion,
  completeTrial,
  finalizeSession,
} from "./context.js";
export type { SessionContext, PlacementSettings } from "./context.js";

export { SessionController } from "./controller.js";
export type { SessionControllerEvents, SessionControllerConfig } from "./controller.js";
