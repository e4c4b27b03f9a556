import {
  aggregateSession,
  type ExperimentMode,
  type Point,
  type PresetInfo,
  type Sample,
  type SessionRecord,
  type TrialPlanEntry,
  type TrialResult,
} from "@pointing-lab/core";
import { ExportFormatError } from "./errors.js";

// ─── Wire Types ─────────────────────────────────────────────────────────────

/** A trajectory sample as written to disk: [x, y, t]. */
export type SampleTriple = [number, number, number];

export interface ExportedPlanEntry {
  distance: number;
  width: number;
  target_pos?: [number, number];
  radius?: number;
}

export interface ExportedTrial {
  time: number;
  distance: number;
  ideal_distance: number;
  speed: number;
  curvature: number;
  id: number;
  throughput: number;
  target_x: number;
  target_y: number;
  target_radius: number;
  peak_velocity: number;
  reaction_time: number;
  pause_count: number;
  trajectory: SampleTriple[];
  preset_distance?: number;
  preset_width?: number;
  preset_radius?: number;
  preset_target_pos?: [number, number];
}

export interface ExportedSummary {
  trial_count: number;
  avg_time: number;
  avg_speed: number;
  avg_curvature: number;
  avg_throughput: number;
}

/** Top-level shape of a structured session export. */
export interface StructuredExport {
  created_at: string;
  os: string;
  screen: { width: number; height: number };
  target_default_radius: number;
  min_sample_interval_sec: number;
  experiment_mode: ExperimentMode;
  trial_count: number;
  stopped_early: boolean;
  trial_plan: ExportedPlanEntry[];
  summary: ExportedSummary | null;
  trials: ExportedTrial[];
}

export interface ExportMetadata {
  readonly createdAt: Date;
  /** Platform identifier, e.g. "linux 6.1.0 x64". */
  readonly platform: string;
}

/** A parsed structured export. */
export interface ParsedSession {
  readonly createdAt: string;
  readonly platform: string;
  readonly record: SessionRecord;
}

// ─── Serialization ──────────────────────────────────────────────────────────

function pointPair(p: Point): [number, number] {
  return [p.x, p.y];
}

function exportTrial(trial: TrialResult): ExportedTrial {
  const out: ExportedTrial = {
    time: trial.timeElapsed,
    distance: trial.totalDistance,
    ideal_distance: trial.idealDistance,
    speed: trial.avgSpeed,
    curvature: trial.curvature,
    id: trial.indexOfDifficulty,
    throughput: trial.throughput,
    target_x: trial.targetPos.x,
    target_y: trial.targetPos.y,
    target_radius: trial.targetRadius,
    peak_velocity: trial.peakVelocity,
    reaction_time: trial.reactionTime,
    pause_count: trial.pauseCount,
    trajectory: trial.trajectory.map((s): SampleTriple => [s.x, s.y, s.t]),
  };
  if (trial.preset) {
    out.preset_distance = trial.preset.distance;
    out.preset_width = trial.preset.width;
    out.preset_radius = trial.preset.radius;
    out.preset_target_pos = pointPair(trial.preset.targetPos);
  }
  return out;
}

function exportPlanEntry(entry: TrialPlanEntry): ExportedPlanEntry {
  const out: ExportedPlanEntry = { distance: entry.distance, width: entry.width };
  if (entry.targetPos) out.target_pos = pointPair(entry.targetPos);
  if (entry.radius !== undefined) out.radius = entry.radius;
  return out;
}

/** Build the structured export object for a finalized record. */
export function buildStructuredExport(
  record: SessionRecord,
  meta: ExportMetadata,
): StructuredExport {
  const summary = record.summary ?? aggregateSession(record.trials);
  return {
    created_at: meta.createdAt.toISOString(),
    os: meta.platform,
    screen: { width: record.canvas.width, height: record.canvas.height },
    target_default_radius: record.defaultRadius,
    min_sample_interval_sec: record.sampleInterval,
    experiment_mode: record.mode,
    trial_count: record.trialCount,
    stopped_early: record.stoppedEarly,
    trial_plan: record.plan.map(exportPlanEntry),
    summary: summary
      ? {
        trial_count: summary.trialCount,
        avg_time: summary.avgTime,
        avg_speed: summary.avgSpeed,
        avg_curvature: summary.avgCurvature,
        avg_throughput: summary.avgThroughput,
      }
      : null,
    trials: record.trials.map(exportTrial),
  };
}

/** Serialize a record as pretty-printed JSON (two-space indent). */
export function toStructuredJson(record: SessionRecord, meta: ExportMetadata): string {
  return JSON.stringify(buildStructuredExport(record, meta), null, 2);
}

// ─── Parsing ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) throw new ExportFormatError(path, "expected an object");
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new ExportFormatError(path, "expected an array");
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ExportFormatError(path, "expected a finite number");
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") throw new ExportFormatError(path, "expected a string");
  return value;
}

function expectBoolean(value: unknown, path: string): boolean {
  if (typeof value !== "boolean") throw new ExportFormatError(path, "expected a boolean");
  return value;
}

function expectMode(value: unknown, path: string): ExperimentMode {
  if (value === "random" || value === "preset") return value;
  throw new ExportFormatError(path, 'expected "random" or "preset"');
}

function parsePoint(value: unknown, path: string): Point {
  const arr = expectArray(value, path);
  if (arr.length !== 2) throw new ExportFormatError(path, "expected [x, y]");
  return { x: expectNumber(arr[0], `${path}[0]`), y: expectNumber(arr[1], `${path}[1]`) };
}

function parseSample(value: unknown, path: string): Sample {
  const arr = expectArray(value, path);
  if (arr.length !== 3) throw new ExportFormatError(path, "expected [x, y, t]");
  return {
    x: expectNumber(arr[0], `${path}[0]`),
    y: expectNumber(arr[1], `${path}[1]`),
    t: expectNumber(arr[2], `${path}[2]`),
  };
}

function parsePlanEntry(value: unknown, path: string): TrialPlanEntry {
  const obj = expectObject(value, path);
  return {
    distance: expectNumber(obj.distance, `${path}.distance`),
    width: expectNumber(obj.width, `${path}.width`),
    targetPos: obj.target_pos === undefined ? undefined : parsePoint(obj.target_pos, `${path}.target_pos`),
    radius: obj.radius === undefined ? undefined : expectNumber(obj.radius, `${path}.radius`),
  };
}

function parsePreset(obj: Record<string, unknown>, path: string): PresetInfo | undefined {
  if (obj.preset_distance === undefined) return undefined;
  return {
    distance: expectNumber(obj.preset_distance, `${path}.preset_distance`),
    width: expectNumber(obj.preset_width, `${path}.preset_width`),
    radius: expectNumber(obj.preset_radius, `${path}.preset_radius`),
    targetPos: parsePoint(obj.preset_target_pos, `${path}.preset_target_pos`),
  };
}

function parseTrial(value: unknown, path: string): TrialResult {
  const obj = expectObject(value, path);
  const trajectory = expectArray(obj.trajectory, `${path}.trajectory`)
    .map((s, i) => parseSample(s, `${path}.trajectory[${i}]`));

  return {
    timeElapsed: expectNumber(obj.time, `${path}.time`),
    totalDistance: expectNumber(obj.distance, `${path}.distance`),
    idealDistance: expectNumber(obj.ideal_distance, `${path}.ideal_distance`),
    avgSpeed: expectNumber(obj.speed, `${path}.speed`),
    curvature: expectNumber(obj.curvature, `${path}.curvature`),
    indexOfDifficulty: expectNumber(obj.id, `${path}.id`),
    throughput: expectNumber(obj.throughput, `${path}.throughput`),
    targetPos: {
      x: expectNumber(obj.target_x, `${path}.target_x`),
      y: expectNumber(obj.target_y, `${path}.target_y`),
    },
    targetRadius: expectNumber(obj.target_radius, `${path}.target_radius`),
    peakVelocity: expectNumber(obj.peak_velocity, `${path}.peak_velocity`),
    reactionTime: expectNumber(obj.reaction_time, `${path}.reaction_time`),
    pauseCount: obj.pause_count === undefined ? 0 : expectNumber(obj.pause_count, `${path}.pause_count`),
    trajectory,
    preset: parsePreset(obj, path),
  };
}

/**
 * Parse a structured export back into a session record.
 *
 * The summary is recomputed from the parsed trials. Throws
 * ExportFormatError naming the first field that does not fit.
 */
export function parseStructuredExport(json: string): ParsedSession {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ExportFormatError("$", `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const root = expectObject(raw, "$");
  const screen = expectObject(root.screen, "screen");
  const trials = expectArray(root.trials, "trials").map((t, i) => parseTrial(t, `trials[${i}]`));
  const plan = expectArray(root.trial_plan, "trial_plan").map((e, i) => parsePlanEntry(e, `trial_plan[${i}]`));

  const record: SessionRecord = {
    mode: expectMode(root.experiment_mode, "experiment_mode"),
    sampleInterval: expectNumber(root.min_sample_interval_sec, "min_sample_interval_sec"),
    canvas: {
      width: expectNumber(screen.width, "screen.width"),
      height: expectNumber(screen.height, "screen.height"),
    },
    defaultRadius: expectNumber(root.target_default_radius, "target_default_radius"),
    trialCount: root.trial_count === undefined
      ? trials.length
      : expectNumber(root.trial_count, "trial_count"),
    plan,
    trials,
    stoppedEarly: root.stopped_early === undefined
      ? false
      : expectBoolean(root.stopped_early, "stopped_early"),
    summary: aggregateSession(trials),
  };

  return {
    createdAt: expectString(root.created_at, "created_at"),
    platform: expectString(root.os, "os"),
    record,
  };
}
