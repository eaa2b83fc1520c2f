/**
 * packages/core/src/layout/anchor.ts — Anchor and alignment placement.
 *
 * Per axis:
 *   - both edges anchored: stretched between them; the raw position is the
 *     near margin and the raw size is reinterpreted as the far margin
 *   - one edge anchored: offset measured inward from that edge
 *   - no edge anchored: WidgetAlign picks start, center or end
 *
 * Offsets always point inward from the chosen edge. On a centered axis a
 * positive offset moves the widget right/down.
 *
 * Size is clamped to [min, max] before positions are derived, so end and
 * center placement use the final size.
 */

import type { IssueReporter } from "../diagnostics/types.js";
import { clampAxis } from "./clamp.js";
import type { AnchorStyle, Rect, Vec2, WidgetAlign } from "./types.js";

export type AxisPlacement = "start" | "center" | "end";

export type AnchorInput = Readonly<{
  /** Resolved raw position: offsets, or near margins on stretched axes. */
  position: Vec2;
  /** Resolved raw dimensions: sizes, or far margins on stretched axes. */
  size: Vec2;
  min: Vec2;
  max: Vec2;
  anchor: AnchorStyle;
  align: WidgetAlign;
  fixedWidth?: boolean;
  fixedHeight?: boolean;
}>;

export const NO_ANCHOR: AnchorStyle = Object.freeze({
  left: false,
  top: false,
  right: false,
  bottom: false,
});

const ALIGN_COMPONENTS: Readonly<Record<WidgetAlign, Readonly<{ x: AxisPlacement; y: AxisPlacement }>>> =
  Object.freeze({
    topLeft: { x: "start", y: "start" },
    top: { x: "center", y: "start" },
    topRight: { x: "end", y: "start" },
    left: { x: "start", y: "center" },
    center: { x: "center", y: "center" },
    right: { x: "end", y: "center" },
    bottomLeft: { x: "start", y: "end" },
    bottom: { x: "center", y: "end" },
    bottomRight: { x: "end", y: "end" },
  });

export function alignComponents(align: WidgetAlign): Readonly<{ x: AxisPlacement; y: AxisPlacement }> {
  return ALIGN_COMPONENTS[align];
}

type AxisSpan = Readonly<{ start: number; size: number }>;

function placeAxis(
  refStart: number,
  refSize: number,
  offset: number,
  rawSize: number,
  min: number,
  max: number,
  nearEdge: boolean,
  farEdge: boolean,
  placement: AxisPlacement,
  fixed: boolean,
  onCollapse: () => void,
): AxisSpan {
  if (nearEdge && farEdge && !fixed) {
    const stretched = refSize - offset - rawSize;
    if (stretched < 0) onCollapse();
    return { start: refStart + offset, size: clampAxis(Math.max(0, stretched), min, max) };
  }

  const size = Math.max(0, clampAxis(rawSize, min, max));
  if (nearEdge) return { start: refStart + offset, size };
  if (farEdge) return { start: refStart + refSize - offset - size, size };

  switch (placement) {
    case "start":
      return { start: refStart + offset, size };
    case "center":
      return { start: refStart + (refSize - size) / 2 + offset, size };
    case "end":
      return { start: refStart + refSize - size - offset, size };
  }
}

/** Place a widget inside `reference` according to its anchors and alignment. */
export function resolveAnchoredRect(
  input: AnchorInput,
  reference: Rect,
  report?: IssueReporter,
): Rect {
  const placement = ALIGN_COMPONENTS[input.align];
  const x = placeAxis(
    reference.x,
    reference.w,
    input.position.x,
    input.size.x,
    input.min.x,
    input.max.x,
    input.anchor.left,
    input.anchor.right,
    placement.x,
    input.fixedWidth === true,
    () =>
      report?.(
        "anchor.marginsExceedReference",
        `x: margins ${String(input.position.x)}+${String(input.size.x)} exceed width ${String(reference.w)}`,
      ),
  );
  const y = placeAxis(
    reference.y,
    reference.h,
    input.position.y,
    input.size.y,
    input.min.y,
    input.max.y,
    input.anchor.top,
    input.anchor.bottom,
    placement.y,
    input.fixedHeight === true,
    () =>
      report?.(
        "anchor.marginsExceedReference",
        `y: margins ${String(input.position.y)}+${String(input.size.y)} exceed height ${String(reference.h)}`,
      ),
  );
  return { x: x.start, y: y.start, w: x.size, h: y.size };
}
