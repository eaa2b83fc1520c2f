/**
 * packages/core/src/layout/units.ts — Length → pixel resolution.
 *
 * The unit kind, never the field name, decides the reference measure. The
 * only place the field's axis matters is the axis-relative `percent` unit.
 *
 * Resolution never throws: a missing reference or a non-finite value yields 0
 * and is handed to the optional reporter.
 */

import type { IssueReporter } from "../diagnostics/types.js";
import { formatLength, len } from "./length.js";
import type { Axis, Length, Length2, ReferenceFrame, Size, UnitKind, Vec2 } from "./types.js";

function minSide(size: Size): number {
  return Math.min(size.w, size.h);
}

function maxSide(size: Size): number {
  return Math.max(size.w, size.h);
}

export function isScreenUnit(unit: UnitKind): boolean {
  return (
    unit === "screenWidth" ||
    unit === "screenHeight" ||
    unit === "screenMin" ||
    unit === "screenMax"
  );
}

/**
 * Reference measure a percent unit resolves against, or `null` when the frame
 * lacks the parent/screen size the unit needs. `px` has no reference.
 */
export function referenceAxisFor(unit: UnitKind, axis: Axis, frame: ReferenceFrame): number | null {
  switch (unit) {
    case "px":
      return null;
    case "percent":
      if (!frame.parent) return null;
      return axis === "x" ? frame.parent.w : frame.parent.h;
    case "parentWidth":
      return frame.parent ? frame.parent.w : null;
    case "parentHeight":
      return frame.parent ? frame.parent.h : null;
    case "parentMin":
      return frame.parent ? minSide(frame.parent) : null;
    case "parentMax":
      return frame.parent ? maxSide(frame.parent) : null;
    case "screenWidth":
      return frame.screen ? frame.screen.w : null;
    case "screenHeight":
      return frame.screen ? frame.screen.h : null;
    case "screenMin":
      return frame.screen ? minSide(frame.screen) : null;
    case "screenMax":
      return frame.screen ? maxSide(frame.screen) : null;
  }
}

/**
 * Resolve against an explicit reference measure.
 *
 * - `px` returns the value unchanged
 * - every percent unit returns `value / 100 * referenceAxis`
 */
export function resolveLengthAgainst(length: Length, referenceAxis: number): number {
  if (length.unit === "px") return length.value;
  return (length.value / 100) * referenceAxis;
}

/** Resolve a Length for one axis of a field against a reference frame. */
export function resolveLength(
  length: Length,
  frame: ReferenceFrame,
  axis: Axis,
  report?: IssueReporter,
): number {
  if (!Number.isFinite(length.value)) {
    report?.("unit.nonFinite", `${axis}: ${formatLength(length)} is not finite`);
    return 0;
  }
  if (length.unit === "px") return length.value;
  const ref = referenceAxisFor(length.unit, axis, frame);
  if (ref === null) {
    const missing = isScreenUnit(length.unit) ? "screen" : "parent";
    report?.("unit.noReference", `${axis}: ${formatLength(length)} has no ${missing} to resolve against`);
    return 0;
  }
  return resolveLengthAgainst(length, ref);
}

/** Resolve x against axis `x` and y against axis `y`, independently. */
export function resolveLength2(
  length2: Length2,
  frame: ReferenceFrame,
  report?: IssueReporter,
): Vec2 {
  return {
    x: resolveLength(length2.x, frame, "x", report),
    y: resolveLength(length2.y, frame, "y", report),
  };
}

/**
 * Re-express `length` in `toUnit` so both resolve to the same pixels under
 * `frame`. A zero or missing target reference yields value 0.
 */
export function convertLength(
  length: Length,
  toUnit: UnitKind,
  frame: ReferenceFrame,
  axis: Axis,
  report?: IssueReporter,
): Length {
  if (length.unit === toUnit) return length;
  const pixels = resolveLength(length, frame, axis, report);
  if (toUnit === "px") return len(pixels, "px");
  const ref = referenceAxisFor(toUnit, axis, frame);
  if (ref === null) {
    const missing = isScreenUnit(toUnit) ? "screen" : "parent";
    report?.("unit.noReference", `${axis}: cannot convert to ${toUnit} without a ${missing}`);
    return len(0, toUnit);
  }
  if (ref === 0) return len(0, toUnit);
  return len((pixels * 100) / ref, toUnit);
}
