/**
 * packages/core/src/layout/clamp.ts — Min/max size constraints.
 *
 * Policy: when min exceeds max on an axis, min wins.
 */

import type { Vec2 } from "./types.js";

export function clampAxis(candidate: number, min: number, max: number): number {
  if (Number.isNaN(candidate)) return min;
  return Math.max(Math.min(candidate, max), min);
}

export function clampSize(candidate: Vec2, min: Vec2, max: Vec2): Vec2 {
  return {
    x: clampAxis(candidate.x, min.x, max.x),
    y: clampAxis(candidate.y, min.y, max.y),
  };
}

export function hasInvertedBounds(min: Vec2, max: Vec2): boolean {
  return min.x > max.x || min.y > max.y;
}

export function clampNonNegative(n: number): number {
  return Number.isNaN(n) || n <= 0 ? 0 : n;
}
