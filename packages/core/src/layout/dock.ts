/**
 * packages/core/src/layout/dock.ts — Edge docking allocation.
 *
 * Children are visited in declared order against a shrinking free rect:
 *   1. edge docks (left/top/right/bottom) carve a strip off the named edge
 *   2. fill docks, after every edge dock regardless of declaration order,
 *      take whatever is left; a later fill gets the empty remainder of an
 *      earlier one
 *
 * Strip sizes above the remaining extent clamp to it; negative or NaN sizes
 * clamp to 0.
 */

import type { DockStyle, Rect } from "./types.js";

export type DockRequest = Readonly<{
  dock: DockStyle;
  /** Resolved strip size along the docking axis; ignored for fill/none. */
  size: number;
}>;

export type DockAllocation = Readonly<{
  /** One entry per request; `null` for `none`. */
  rects: readonly (Rect | null)[];
  /** Free rect left after every request was served. */
  remaining: Rect;
  /** Indexes whose requested size exceeded the remaining extent. */
  overflowed: readonly number[];
}>;

export function isEdgeDock(dock: DockStyle): boolean {
  return dock === "left" || dock === "right" || dock === "top" || dock === "bottom";
}

/** Axis a dock style carves along: `x` for left/right, `y` for top/bottom. */
export function dockAxis(dock: DockStyle): "x" | "y" | null {
  if (dock === "left" || dock === "right") return "x";
  if (dock === "top" || dock === "bottom") return "y";
  return null;
}

type MutableRect = { x: number; y: number; w: number; h: number };

function carve(free: MutableRect, dock: DockStyle, size: number): Rect {
  switch (dock) {
    case "left": {
      const strip = { x: free.x, y: free.y, w: size, h: free.h };
      free.x += size;
      free.w -= size;
      return strip;
    }
    case "right": {
      const strip = { x: free.x + free.w - size, y: free.y, w: size, h: free.h };
      free.w -= size;
      return strip;
    }
    case "top": {
      const strip = { x: free.x, y: free.y, w: free.w, h: size };
      free.y += size;
      free.h -= size;
      return strip;
    }
    case "bottom": {
      const strip = { x: free.x, y: free.y + free.h - size, w: free.w, h: size };
      free.h -= size;
      return strip;
    }
    default: {
      const all = { x: free.x, y: free.y, w: free.w, h: free.h };
      free.w = 0;
      free.h = 0;
      return all;
    }
  }
}

export function dockRects(container: Rect, requests: readonly DockRequest[]): DockAllocation {
  const free: MutableRect = {
    x: container.x,
    y: container.y,
    w: Math.max(0, container.w),
    h: Math.max(0, container.h),
  };
  const rects: (Rect | null)[] = new Array<Rect | null>(requests.length).fill(null);
  const overflowed: number[] = [];

  for (let i = 0; i < requests.length; i++) {
    const req = requests[i];
    if (!req || !isEdgeDock(req.dock)) continue;
    const available = dockAxis(req.dock) === "x" ? free.w : free.h;
    const wanted = Number.isNaN(req.size) ? 0 : Math.max(0, req.size);
    if (wanted > available) overflowed.push(i);
    rects[i] = carve(free, req.dock, Math.min(wanted, available));
  }

  for (let i = 0; i < requests.length; i++) {
    const req = requests[i];
    if (!req || req.dock !== "fill") continue;
    rects[i] = carve(free, "fill", 0);
  }

  return {
    rects,
    remaining: { x: free.x, y: free.y, w: free.w, h: free.h },
    overflowed,
  };
}
