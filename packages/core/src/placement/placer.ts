import type { CanvasSize, Point } from "../types.js";
import { randomInt, type RandomFn } from "../random.js";

// ─── Free Placement Constants ───────────────────────────────────────────────

/** Distance kept from every canvas edge by free placement (px). */
export const FREE_PLACEMENT_MARGIN = 100;

/** Minimum distance between a free target and the reference point (px). */
export const MIN_TARGET_SEPARATION = 80;

/** Failed draws after which the current draw is accepted as-is. */
export const FREE_PLACEMENT_MAX_RETRIES = 30;

// ─── Controlled Placement Constants ─────────────────────────────────────────

/** Random angles tried before controlled placement falls back. */
export const CONTROLLED_PLACEMENT_ATTEMPTS = 36;

/** Gap between the target's edge and the canvas edge (px). */
export const CONTROLLED_EDGE_PADDING = 10;

/** Smallest radius a controlled target is drawn with (px). */
export const MIN_TARGET_RADIUS = 2;

export type PlacementPolicy = "free" | "controlled";

/** Where a target ended up and how it got there. */
export interface TargetPlacement {
  readonly position: Point;
  readonly radius: number;
  readonly policy: PlacementPolicy;
  /** Draws (free) or angles (controlled) consumed. */
  readonly attempts: number;
  /** True when controlled placement gave up and used free placement. */
  readonly fellBack: boolean;
}

export interface FreePlacementOptions {
  /** Target radius reported with the placement. */
  readonly radius: number;
  /** Edge margin on both axes, raised to `radius` if smaller. Defaults to FREE_PLACEMENT_MARGIN. */
  readonly margin?: number;
  /** Defaults to MIN_TARGET_SEPARATION. */
  readonly minSeparation?: number;
}

export interface ControlledPlacementOptions {
  /** Margin used if controlled placement falls back. Defaults to FREE_PLACEMENT_MARGIN. */
  readonly fallbackMargin?: number;
  /** Defaults to MIN_TARGET_SEPARATION. */
  readonly minSeparation?: number;
}

/** Radius a controlled target of the given width is drawn with. */
export function radiusForWidth(width: number): number {
  return Math.max(MIN_TARGET_RADIUS, Math.round(width / 2));
}

/**
 * Place a target uniformly at random inside the canvas margins, away from
 * `reference`.
 *
 * Draws whole-pixel coordinates in `[margin, dimension - margin]`, where the
 * margin is never smaller than the target radius. When the margin leaves no
 * room the upper bound is clamped to `margin + 1`. Draws
 * closer than `minSeparation` to the reference are rejected, but after
 * FREE_PLACEMENT_MAX_RETRIES rejections the next draw is taken regardless.
 */
export function placeFreeTarget(
  reference: Point,
  canvas: CanvasSize,
  random: RandomFn,
  options: FreePlacementOptions,
): TargetPlacement {
  const margin = Math.max(options.margin ?? FREE_PLACEMENT_MARGIN, options.radius);
  const minSeparation = options.minSeparation ?? MIN_TARGET_SEPARATION;
  const upperX = Math.max(canvas.width - margin, margin + 1);
  const upperY = Math.max(canvas.height - margin, margin + 1);

  let attempts = 0;
  for (;;) {
    attempts++;
    const x = randomInt(margin, upperX, random);
    const y = randomInt(margin, upperY, random);
    const separation = Math.hypot(x - reference.x, y - reference.y);
    if (separation >= minSeparation || attempts > FREE_PLACEMENT_MAX_RETRIES) {
      return {
        position: { x, y },
        radius: options.radius,
        policy: "free",
        attempts,
        fellBack: false,
      };
    }
  }
}

/**
 * Place a target at `distance` from `reference` in a random direction,
 * sized for Fitts width `width`.
 *
 * Candidates are truncated to whole pixels, so the realised distance can
 * differ from `distance` by up to √2 px. A candidate is accepted when it
 * lies in `[10 + radius, dimension - 10 - radius]` on both axes. If none of
 * the CONTROLLED_PLACEMENT_ATTEMPTS angles fits, free placement is used
 * with a margin no smaller than the controlled one.
 */
export function placeControlledTarget(
  reference: Point,
  distance: number,
  width: number,
  canvas: CanvasSize,
  random: RandomFn,
  options: ControlledPlacementOptions = {},
): TargetPlacement {
  const radius = radiusForWidth(width);
  const margin = CONTROLLED_EDGE_PADDING + radius;

  for (let attempt = 1; attempt <= CONTROLLED_PLACEMENT_ATTEMPTS; attempt++) {
    const angle = random() * 2 * Math.PI;
    const x = Math.trunc(reference.x + distance * Math.cos(angle));
    const y = Math.trunc(reference.y + distance * Math.sin(angle));
    if (
      x >= margin && x <= canvas.width - margin &&
      y >= margin && y <= canvas.height - margin
    ) {
      return {
        position: { x, y },
        radius,
        policy: "controlled",
        attempts: attempt,
        fellBack: false,
      };
    }
  }

  const fallback = placeFreeTarget(reference, canvas, random, {
    radius,
    margin: Math.max(options.fallbackMargin ?? FREE_PLACEMENT_MARGIN, margin),
    minSeparation: options.minSeparation,
  });
  return { ...fallback, fellBack: true };
}
