import type {
  CanvasSize,
  Point,
  SessionRecord,
  SessionSummary,
  TrialResult,
} from "../types.js";
import { TypedEventEmitter } from "../events/emitter.js";
import { ConfigurationError, EngineError } from "../errors.js";
import { monotonicClock, type ClockFn, type RandomFn } from "../random.js";
import {
  DEFAULT_CANVAS,
  resolveSessionConfig,
  type ConfigWarning,
  type SessionConfig,
} from "./config.js";
import {
  canvasCentre,
  completeTrial,
  createSessionContext,
  finalizeSession,
  hasRemainingTrials,
  recordMotion,
  spawnTrial,
  type PlacementSettings,
  type SessionContext,
} from "./context.js";
import {
  SessionPhase,
  type BoundTarget,
  type DispatchResult,
  type PhaseTransition,
  type SessionEvent,
  type SessionEventType,
  type StartEvent,
} from "./state.js";

/** Listener signatures for {@link SessionController}. */
export interface SessionControllerEvents {
  transition: (event: PhaseTransition) => void;
  warning: (warning: ConfigWarning) => void;
  target: (target: BoundTarget) => void;
  trial: (result: TrialResult, trialIndex: number) => void;
  summary: (summary: SessionSummary, record: SessionRecord) => void;
}

export interface SessionControllerConfig {
  /** Override the RNG for deterministic testing. Defaults to Math.random. */
  readonly random?: RandomFn;

  /** Override the clock (seconds) for deterministic testing. Defaults to performance.now() / 1000. */
  readonly clock?: ClockFn;

  /** Initial canvas size. Defaults to 1000 × 600. */
  readonly canvas?: CanvasSize;

  /** Edge margin for free placement. */
  readonly freePlacementMargin?: number;

  /** Minimum distance between a free target and the previous hit. */
  readonly minTargetSeparation?: number;
}

/**
 * Trial/session state machine for a Fitts's-law pointing task.
 *
 * The controller does NOT use timers or touch any UI. The host feeds it
 * discrete events through {@link dispatch} (one at a time, in delivery
 * order) and renders whatever the returned {@link DispatchResult} says:
 * the start marker, a new target, a finished trial, the session summary.
 *
 * Events that make no sense in the current phase (motion while idle, a hit
 * on a target that is no longer bound, …) are ignored without side effects.
 *
 * Usage:
 * ```ts
 * const controller = new SessionController({ canvas: { width: 1200, height: 650 } });
 * controller.on("trial", (r, i) => console.log(`trial ${i}: ${r.throughput.toFixed(2)} bits/s`));
 *
 * controller.dispatch({ type: "start", config: { trialCount: 12 } });
 * const { target } = controller.dispatch({ type: "start_marker", point: { x: 600, y: 325 } });
 * controller.dispatch({ type: "motion", point: { x: 610, y: 325 } });
 * if (target) {
 *   controller.dispatch({ type: "target_hit", targetId: target.id, point: target.position });
 * }
 * ```
 */
export class SessionController extends TypedEventEmitter<SessionControllerEvents> {
  private _phase: SessionPhase;
  private _canvas: CanvasSize;
  private _ctx: SessionContext | null;
  private _lastRecord: SessionRecord | null;
  private _nextTargetId: number;

  private readonly _random: RandomFn;
  private readonly _clock: ClockFn;
  private readonly _placement: PlacementSettings;

  constructor(config: SessionControllerConfig = {}) {
    super("SessionController");
    this._random = config.random ?? Math.random;
    this._clock = config.clock ?? monotonicClock;
    this._placement = {
      freeMargin: config.freePlacementMargin,
      minSeparation: config.minTargetSeparation,
    };
    this._canvas = config.canvas ?? DEFAULT_CANVAS;
    this._phase = SessionPhase.IDLE;
    this._ctx = null;
    this._lastRecord = null;
    this._nextTargetId = 1;
  }

  /** Current phase. */
  get phase(): SessionPhase {
    return this._phase;
  }

  /** Canvas size placements are computed against. */
  get canvas(): CanvasSize {
    return this._canvas;
  }

  /** Resolved configuration of the active session, or null when idle. */
  get config(): SessionConfig | null {
    return this._ctx?.config ?? null;
  }

  /** Target armed for hit detection, or null. */
  get currentTarget(): BoundTarget | null {
    return this._ctx?.target ?? null;
  }

  /** 1-based index of the open trial (0 before the first spawn). */
  get trialIndex(): number {
    return this._ctx?.trialIndex ?? 0;
  }

  /** Trials completed so far in the active session. */
  get completedTrials(): readonly TrialResult[] {
    return this._ctx?.trials ?? [];
  }

  /** Record of the most recently finalized session. */
  get lastRecord(): SessionRecord | null {
    return this._lastRecord;
  }

  /**
   * Feed one event into the state machine.
   *
   * This is the single intake for all host input; it never throws for
   * participant input. It throws {@link ConfigurationError} only for a
   * `resize` to non-positive dimensions.
   */
  dispatch(event: SessionEvent): DispatchResult {
    switch (event.type) {
      case "resize":
        return this._resize(event.canvas);
      case "start":
        return this._phase === SessionPhase.IDLE ? this._start(event) : this._ignored();
      case "start_marker":
        return this._phase === SessionPhase.AWAITING_START
          ? this._beginRecording(event.point)
          : this._ignored();
      case "motion":
        return this._motion(event.point);
      case "target_hit":
        return this._hit(event.targetId, event.point);
      case "stop":
        return this._stop();
    }
  }

  // ─── Handlers ─────────────────────────────────────────────────────────────

  private _resize(canvas: CanvasSize): DispatchResult {
    if (!(canvas.width > 0) || !(canvas.height > 0)) {
      throw new ConfigurationError(
        "canvas",
        `dimensions must be positive, got ${canvas.width}x${canvas.height}`,
      );
    }
    this._canvas = { width: canvas.width, height: canvas.height };
    if (this._ctx) this._ctx.canvas = this._canvas;
    return { phase: this._phase, accepted: true };
  }

  private _start(event: StartEvent): DispatchResult {
    const { config, warnings } = resolveSessionConfig(event.config, this._canvas);
    for (const warning of warnings) {
      this.emit("warning", warning);
    }

    this._canvas = config.canvas;
    this._ctx = createSessionContext(config, this._random);
    this._transition(SessionPhase.AWAITING_START, "start");

    return {
      phase: this._phase,
      accepted: true,
      startMarker: canvasCentre(config.canvas),
      warnings,
    };
  }

  private _beginRecording(point: Point): DispatchResult {
    const ctx = this._requireContext();
    ctx.reference = { x: point.x, y: point.y };
    this._transition(SessionPhase.RECORDING, "start_marker");
    const target = this._spawn(ctx);
    return { phase: this._phase, accepted: true, target };
  }

  private _motion(point: Point): DispatchResult {
    const ctx = this._ctx;
    if (this._phase !== SessionPhase.RECORDING || !ctx || !ctx.target) {
      return this._ignored();
    }
    const kept = recordMotion(ctx, point, this._clock());
    return { phase: this._phase, accepted: kept };
  }

  private _hit(targetId: number, point: Point): DispatchResult {
    const ctx = this._ctx;
    const target = ctx?.target;
    if (this._phase !== SessionPhase.RECORDING || !ctx || !target || target.id !== targetId) {
      return this._ignored();
    }

    const trial = completeTrial(ctx, target, point, this._clock());
    this.emit("trial", trial, target.trialIndex);

    if (hasRemainingTrials(ctx)) {
      const next = this._spawn(ctx);
      return { phase: this._phase, accepted: true, trial, target: next };
    }

    return { ...this._summarize(ctx, false, "target_hit"), trial };
  }

  private _stop(): DispatchResult {
    const ctx = this._ctx;
    if (
      !ctx ||
      (this._phase !== SessionPhase.AWAITING_START && this._phase !== SessionPhase.RECORDING)
    ) {
      return this._ignored();
    }

    if (ctx.trials.length === 0) {
      this._ctx = null;
      this._transition(SessionPhase.IDLE, "stop");
      return { phase: this._phase, accepted: true };
    }

    return this._summarize(ctx, true, "stop");
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private _spawn(ctx: SessionContext): BoundTarget {
    const target = spawnTrial(ctx, this._clock(), this._nextTargetId++, this._random, this._placement);
    this.emit("target", target);
    return target;
  }

  /** RECORDING/AWAITING_START → SUMMARIZING → IDLE, producing the record. */
  private _summarize(
    ctx: SessionContext,
    stoppedEarly: boolean,
    cause: SessionEventType,
  ): DispatchResult {
    this._transition(SessionPhase.SUMMARIZING, cause);
    const record = finalizeSession(ctx, stoppedEarly);
    this._lastRecord = record;
    this._ctx = null;

    if (record.summary) {
      this.emit("summary", record.summary, record);
    }
    this._transition(SessionPhase.IDLE, cause);

    return { phase: this._phase, accepted: true, summary: record.summary, record };
  }

  private _transition(to: SessionPhase, cause: SessionEventType): void {
    const from = this._phase;
    this._phase = to;
    this.emit("transition", { from, to, timestamp: this._clock(), cause });
  }

  private _requireContext(): SessionContext {
    if (!this._ctx) {
      throw new EngineError(`SessionController: no session context in phase ${this._phase}`);
    }
    return this._ctx;
  }

  private _ignored(): DispatchResult {
    return { phase: this._phase, accepted: false };
  }
}
