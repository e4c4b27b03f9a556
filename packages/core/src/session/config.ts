import type { CanvasSize, ExperimentMode } from "../types.js";
import { DEFAULT_SAMPLE_INTERVAL } from "../sampling/throttle.js";
import { DEFAULT_PRESET_DISTANCES, DEFAULT_PRESET_WIDTHS } from "../planning/planner.js";

/** Trials per session when none (or an invalid count) is given. */
export const DEFAULT_TRIAL_COUNT = 10;

/** Radius of free-placement targets (px). */
export const DEFAULT_TARGET_RADIUS = 20;

export const DEFAULT_CANVAS: CanvasSize = { width: 1000, height: 600 };

/**
 * Session settings as a host collects them. Numeric fields also take
 * strings so form input can be passed straight through.
 */
export interface SessionConfigInput {
  /** Positive integer. Defaults to DEFAULT_TRIAL_COUNT. */
  readonly trialCount?: number | string;
  /** Minimum sampling interval in seconds. Defaults to DEFAULT_SAMPLE_INTERVAL. */
  readonly sampleInterval?: number | string;
  /** Defaults to "random". */
  readonly mode?: ExperimentMode;
  readonly canvas?: CanvasSize;
  readonly presetDistances?: readonly number[];
  readonly presetWidths?: readonly number[];
  /** Radius for free-placement targets. Defaults to DEFAULT_TARGET_RADIUS. */
  readonly defaultRadius?: number;
}

/** Fully-resolved session settings. */
export interface SessionConfig {
  readonly trialCount: number;
  readonly sampleInterval: number;
  readonly mode: ExperimentMode;
  readonly canvas: CanvasSize;
  readonly presetDistances: readonly number[];
  readonly presetWidths: readonly number[];
  readonly defaultRadius: number;
}

/** A setting that was replaced by its default. */
export interface ConfigWarning {
  readonly field: keyof SessionConfig;
  readonly message: string;
  readonly received: unknown;
  readonly fallback: unknown;
}

export interface ResolvedConfig {
  readonly config: SessionConfig;
  readonly warnings: readonly ConfigWarning[];
}

function toNumber(value: number | string): number {
  if (typeof value === "number") return value;
  const trimmed = value.trim();
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

function isPositive(n: number): boolean {
  return Number.isFinite(n) && n > 0;
}

function isPositiveList(values: readonly number[]): boolean {
  return values.length > 0 && values.every(isPositive);
}

/**
 * Validate session settings, substituting defaults for anything invalid.
 *
 * A missing or invalid canvas resolves to `fallbackCanvas`, normally the
 * size the host last reported. Never throws: each substitution is reported
 * as a ConfigWarning so the host can tell the operator.
 */
export function resolveSessionConfig(
  input: SessionConfigInput = {},
  fallbackCanvas: CanvasSize = DEFAULT_CANVAS,
): ResolvedConfig {
  const warnings: ConfigWarning[] = [];

  let trialCount = DEFAULT_TRIAL_COUNT;
  if (input.trialCount !== undefined) {
    const n = toNumber(input.trialCount);
    if (Number.isInteger(n) && n > 0) {
      trialCount = n;
    } else {
      warnings.push({
        field: "trialCount",
        message: `Trial count must be a positive integer; using ${DEFAULT_TRIAL_COUNT}`,
        received: input.trialCount,
        fallback: DEFAULT_TRIAL_COUNT,
      });
    }
  }

  let sampleInterval = DEFAULT_SAMPLE_INTERVAL;
  if (input.sampleInterval !== undefined) {
    const n = toNumber(input.sampleInterval);
    if (isPositive(n)) {
      sampleInterval = n;
    } else {
      warnings.push({
        field: "sampleInterval",
        message: `Sample interval must be a positive number of seconds; using ${DEFAULT_SAMPLE_INTERVAL}`,
        received: input.sampleInterval,
        fallback: DEFAULT_SAMPLE_INTERVAL,
      });
    }
  }

  let mode: ExperimentMode = "random";
  if (input.mode !== undefined) {
    if (input.mode === "random" || input.mode === "preset") {
      mode = input.mode;
    } else {
      warnings.push({
        field: "mode",
        message: 'Mode must be "random" or "preset"; using "random"',
        received: input.mode,
        fallback: "random",
      });
    }
  }

  let canvas = fallbackCanvas;
  if (input.canvas !== undefined) {
    if (isPositive(input.canvas.width) && isPositive(input.canvas.height)) {
      canvas = { width: input.canvas.width, height: input.canvas.height };
    } else {
      warnings.push({
        field: "canvas",
        message: `Canvas dimensions must be positive; using ${fallbackCanvas.width}x${fallbackCanvas.height}`,
        received: input.canvas,
        fallback: fallbackCanvas,
      });
    }
  }

  let presetDistances = DEFAULT_PRESET_DISTANCES;
  if (input.presetDistances !== undefined) {
    if (isPositiveList(input.presetDistances)) {
      presetDistances = [...input.presetDistances];
    } else {
      warnings.push({
        field: "presetDistances",
        message: "Preset distances must be a non-empty list of positive numbers; using defaults",
        received: input.presetDistances,
        fallback: DEFAULT_PRESET_DISTANCES,
      });
    }
  }

  let presetWidths = DEFAULT_PRESET_WIDTHS;
  if (input.presetWidths !== undefined) {
    if (isPositiveList(input.presetWidths)) {
      presetWidths = [...input.presetWidths];
    } else {
      warnings.push({
        field: "presetWidths",
        message: "Preset widths must be a non-empty list of positive numbers; using defaults",
        received: input.presetWidths,
        fallback: DEFAULT_PRESET_WIDTHS,
      });
    }
  }

  let defaultRadius = DEFAULT_TARGET_RADIUS;
  if (input.defaultRadius !== undefined) {
    if (isPositive(input.defaultRadius)) {
      defaultRadius = input.defaultRadius;
    } else {
      warnings.push({
        field: "defaultRadius",
        message: `Target radius must be positive; using ${DEFAULT_TARGET_RADIUS}`,
        received: input.defaultRadius,
        fallback: DEFAULT_TARGET_RADIUS,
      });
    }
  }

  return {
    config: {
      trialCount,
      sampleInterval,
      mode,
      canvas,
      presetDistances,
      presetWidths,
      defaultRadius,
    },
    warnings,
  };
}
