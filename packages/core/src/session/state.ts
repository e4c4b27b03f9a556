import type {
  CanvasSize,
  Point,
  SessionRecord,
  SessionSummary,
  TrialResult,
} from "../types.js";
import type { TargetPlacement } from "../placement/placer.js";
import type { ConfigWarning, SessionConfigInput } from "./config.js";

/**
 * Lifecycle phases of a pointing session.
 *
 * IDLE → AWAITING_START → RECORDING → (RECORDING | SUMMARIZING) → IDLE
 *
 * SUMMARIZING is transient: it is entered and left within the event that
 * completes (or stops) the session.
 */
export enum SessionPhase {
  IDLE = "IDLE",
  AWAITING_START = "AWAITING_START",
  RECORDING = "RECORDING",
  SUMMARIZING = "SUMMARIZING",
}

/** Begin a session. Ignored unless IDLE. */
export interface StartEvent {
  readonly type: "start";
  readonly config?: SessionConfigInput;
}

/** The participant activated the start marker at `point`. */
export interface StartMarkerEvent {
  readonly type: "start_marker";
  readonly point: Point;
}

/** A pointer motion observation. */
export interface MotionEvent {
  readonly type: "motion";
  readonly point: Point;
}

/** The participant hit the target with id `targetId` at `point`. */
export interface TargetHitEvent {
  readonly type: "target_hit";
  readonly targetId: number;
  readonly point: Point;
}

/** End the session now. Only completed trials are kept. */
export interface StopEvent {
  readonly type: "stop";
}

/** The host canvas changed size. Accepted in every phase. */
export interface ResizeEvent {
  readonly type: "resize";
  readonly canvas: CanvasSize;
}

export type SessionEvent =
  | StartEvent
  | StartMarkerEvent
  | MotionEvent
  | TargetHitEvent
  | StopEvent
  | ResizeEvent;

export type SessionEventType = SessionEvent["type"];

/** The target currently armed for hit detection. */
export interface BoundTarget {
  /** Unique per controller; stale hits carry an old id and are ignored. */
  readonly id: number;
  /** 1-based trial index within the session. */
  readonly trialIndex: number;
  readonly position: Point;
  readonly radius: number;
  readonly placement: TargetPlacement;
}

/**
 * Outcome of feeding one event to the controller.
 * Artifact fields are present only when the event produced them.
 */
export interface DispatchResult {
  /** Phase after the event has been handled. */
  readonly phase: SessionPhase;
  /** False when the event was ignored in the current phase. */
  readonly accepted: boolean;
  /** Where the host should draw the start marker (on `start`). */
  readonly startMarker?: Point;
  /** Configuration fallbacks applied on `start`. */
  readonly warnings?: readonly ConfigWarning[];
  /** Newly spawned target. */
  readonly target?: BoundTarget;
  /** Trial completed by this event. */
  readonly trial?: TrialResult;
  /** Present when the session was finalized with at least one trial. */
  readonly summary?: SessionSummary;
  /** Finalized, frozen session record. */
  readonly record?: SessionRecord;
}

/** Emitted on every phase change. */
export interface PhaseTransition {
  readonly from: SessionPhase;
  readonly to: SessionPhase;
  readonly timestamp: number;
  readonly cause: SessionEventType;
}
