/**
 * packages/core/src/layout/rect.ts — Rect helpers.
 */

import type { Rect, Size } from "./types.js";

export const ZERO_RECT: Rect = Object.freeze({ x: 0, y: 0, w: 0, h: 0 });

export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w, h });
}

export function rectEquals(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

export function rectSize(r: Rect): Size {
  return { w: r.w, h: r.h };
}

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(r: Rect, x: number, y: number): boolean {
  return x >= r.x && x < r.x + r.w && y >= r.y && y < r.y + r.h;
}
