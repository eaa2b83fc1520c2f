/**
 * packages/core/src/animation/interpolate.ts — Primitive interpolation helpers.
 */

import { len } from "../layout/length.js";
import type { Length, Length2 } from "../layout/types.js";
import type { Interpolator, TweeningFunction } from "./types.js";

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/** Clamp an animation duration to a safe, non-negative number of milliseconds. */
export function normalizeDurationMs(durationMs: number | undefined, fallbackMs: number): number {
  if (durationMs === undefined) return fallbackMs;
  if (!Number.isFinite(durationMs)) return fallbackMs;
  return Math.max(0, durationMs);
}

/**
 * Tween the numeric value in the target's unit. Callers convert `from` into
 * the target unit first when the two differ.
 */
export const interpolateLength: Interpolator<Length> = (
  from: Length,
  to: Length,
  tween: TweeningFunction,
  currentTime: number,
  finalTime: number,
): Length => len(tween(from.value, to.value, currentTime, finalTime), to.unit);

export const interpolateLength2: Interpolator<Length2> = (
  from: Length2,
  to: Length2,
  tween: TweeningFunction,
  currentTime: number,
  finalTime: number,
): Length2 =>
  Object.freeze({
    x: interpolateLength(from.x, to.x, tween, currentTime, finalTime),
    y: interpolateLength(from.y, to.y, tween, currentTime, finalTime),
  });
