import type {
  CanvasSize,
  Point,
  Sample,
  SessionRecord,
  TrialPlanEntry,
  TrialResult,
} from "../types.js";
import type { RandomFn } from "../random.js";
import type { SessionConfig } from "./config.js";
import type { BoundTarget } from "./state.js";
import { shouldAcceptSample } from "../sampling/throttle.js";
import {
  placeControlledTarget,
  placeFreeTarget,
  type TargetPlacement,
} from "../placement/placer.js";
import { buildCombinations, buildTrialPlan } from "../planning/planner.js";
import { analyzeTrajectory } from "../analysis/kinematics.js";
import { aggregateSession } from "../analysis/aggregate.js";

/** Placement knobs shared by every trial of a controller. */
export interface PlacementSettings {
  readonly freeMargin?: number;
  readonly minSeparation?: number;
}

/**
 * Mutable state of one running session. Owned by a single controller and
 * only touched from within event handling.
 */
export interface SessionContext {
  readonly config: SessionConfig;
  canvas: CanvasSize;
  /** 1-based index of the open (or last) trial; 0 before the first spawn. */
  trialIndex: number;
  plan: TrialPlanEntry[];
  readonly trials: TrialResult[];
  /** Samples of the open trial. */
  trajectory: Sample[];
  lastSampleTime: number;
  /** Where the next trial starts: the start marker, then each hit point. */
  reference: Point;
  target: BoundTarget | null;
}

/** Canvas centre, rounded down to whole pixels. */
export function canvasCentre(canvas: CanvasSize): Point {
  return { x: Math.floor(canvas.width / 2), y: Math.floor(canvas.height / 2) };
}

/** Fresh context for a new session; builds the trial plan in preset mode. */
export function createSessionContext(config: SessionConfig, random: RandomFn): SessionContext {
  const plan = config.mode === "preset"
    ? buildTrialPlan(
      buildCombinations(config.presetDistances, config.presetWidths),
      config.trialCount,
      random,
    )
    : [];

  return {
    config,
    canvas: config.canvas,
    trialIndex: 0,
    plan,
    trials: [],
    trajectory: [],
    lastSampleTime: 0,
    reference: canvasCentre(config.canvas),
    target: null,
  };
}

/** True while trials remain to be spawned. */
export function hasRemainingTrials(ctx: SessionContext): boolean {
  return ctx.trialIndex < ctx.config.trialCount;
}

/**
 * Open the next trial: seed its trajectory with the reference point at
 * `now`, place a target and bind it. In preset mode the plan entry gets
 * its realised position and radius.
 */
export function spawnTrial(
  ctx: SessionContext,
  now: number,
  targetId: number,
  random: RandomFn,
  settings: PlacementSettings,
): BoundTarget {
  ctx.trialIndex++;
  ctx.trajectory = [{ x: ctx.reference.x, y: ctx.reference.y, t: now }];
  ctx.lastSampleTime = now;

  const planIdx = ctx.trialIndex - 1;
  const entry: TrialPlanEntry | undefined = ctx.plan[planIdx];
  let placement: TargetPlacement;

  if (ctx.config.mode === "preset" && entry !== undefined) {
    placement = placeControlledTarget(
      ctx.reference,
      entry.distance,
      entry.width,
      ctx.canvas,
      random,
      { fallbackMargin: settings.freeMargin, minSeparation: settings.minSeparation },
    );
    ctx.plan[planIdx] = { ...entry, targetPos: placement.position, radius: placement.radius };
  } else {
    placement = placeFreeTarget(ctx.reference, ctx.canvas, random, {
      radius: ctx.config.defaultRadius,
      margin: settings.freeMargin,
      minSeparation: settings.minSeparation,
    });
  }

  const target: BoundTarget = {
    id: targetId,
    trialIndex: ctx.trialIndex,
    position: placement.position,
    radius: placement.radius,
    placement,
  };
  ctx.target = target;
  return target;
}

/** Throttle and append a motion sample. Returns whether it was kept. */
export function recordMotion(ctx: SessionContext, point: Point, now: number): boolean {
  if (!shouldAcceptSample(now, ctx.lastSampleTime, ctx.config.sampleInterval)) {
    return false;
  }
  ctx.trajectory.push({ x: point.x, y: point.y, t: now });
  ctx.lastSampleTime = now;
  return true;
}

/**
 * Close the open trial at the hit point: analyse it, attach plan metadata,
 * append the result (frozen, samples included) and move the reference to
 * the hit point.
 */
export function completeTrial(ctx: SessionContext, target: BoundTarget, hit: Point, now: number): TrialResult {
  ctx.trajectory.push({ x: hit.x, y: hit.y, t: now });
  ctx.target = null;

  const metrics = analyzeTrajectory(ctx.trajectory, target.position, target.radius);
  const entry: TrialPlanEntry | undefined = ctx.plan[target.trialIndex - 1];
  const result: TrialResult = ctx.config.mode === "preset" && entry !== undefined
    ? {
      ...metrics,
      preset: {
        distance: entry.distance,
        width: entry.width,
        radius: entry.radius ?? target.radius,
        targetPos: entry.targetPos ?? target.position,
      },
    }
    : metrics;

  ctx.trials.push(freezeTrial(result));
  ctx.reference = { x: hit.x, y: hit.y };
  return result;
}

/** Freeze a trial together with its samples and points. */
function freezeTrial(trial: TrialResult): TrialResult {
  for (const sample of trial.trajectory) Object.freeze(sample);
  Object.freeze(trial.trajectory);
  Object.freeze(trial.targetPos);
  if (trial.preset) {
    Object.freeze(trial.preset.targetPos);
    Object.freeze(trial.preset);
  }
  return Object.freeze(trial);
}

/**
 * Build the record for a session that has ended. The record is frozen all
 * the way down: canvas, plan entries, summary, every trial and its samples.
 */
export function finalizeSession(ctx: SessionContext, stoppedEarly: boolean): SessionRecord {
  ctx.target = null;
  ctx.trajectory = [];

  const trials = Object.freeze([...ctx.trials]);
  const plan = ctx.plan.map((entry) => {
    if (entry.targetPos) Object.freeze(entry.targetPos);
    return Object.freeze({ ...entry });
  });
  const summary = aggregateSession(trials);

  return Object.freeze({
    mode: ctx.config.mode,
    sampleInterval: ctx.config.sampleInterval,
    canvas: Object.freeze({ width: ctx.canvas.width, height: ctx.canvas.height }),
    defaultRadius: ctx.config.defaultRadius,
    trialCount: ctx.config.trialCount,
    plan: Object.freeze(plan),
    trials,
    stoppedEarly,
    summary: summary && Object.freeze(summary),
  });
}
