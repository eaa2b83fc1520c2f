/**
 * packages/core/src/layout/length.ts — Length constructors and comparisons.
 */

import type { DestRect, Length, Length2, Rect, UnitKind } from "./types.js";

/** Number shorthand for pixels. */
export type LengthInput = Length | number;

export type Length2Input = Length2 | Readonly<{ x: LengthInput; y: LengthInput }>;

export function len(value: number, unit: UnitKind): Length {
  return Object.freeze({ value, unit });
}

export const px = (value: number): Length => len(value, "px");
export const pct = (value: number): Length => len(value, "percent");
export const pw = (value: number): Length => len(value, "parentWidth");
export const ph = (value: number): Length => len(value, "parentHeight");
export const vw = (value: number): Length => len(value, "screenWidth");
export const vh = (value: number): Length => len(value, "screenHeight");
export const vmin = (value: number): Length => len(value, "screenMin");
export const vmax = (value: number): Length => len(value, "screenMax");

export const ZERO_LENGTH: Length = px(0);

export function toLength(input: LengthInput): Length {
  return typeof input === "number" ? px(input) : input;
}

export function length2(x: LengthInput, y: LengthInput): Length2 {
  return Object.freeze({ x: toLength(x), y: toLength(y) });
}

export function px2(x: number, y: number): Length2 {
  return length2(px(x), px(y));
}

export function toLength2(input: Length2Input): Length2 {
  return length2(input.x, input.y);
}

export const ZERO_LENGTH2: Length2 = px2(0, 0);

export function lengthEquals(a: Length, b: Length): boolean {
  return a.unit === b.unit && Object.is(a.value, b.value);
}

export function length2Equals(a: Length2, b: Length2): boolean {
  return lengthEquals(a.x, b.x) && lengthEquals(a.y, b.y);
}

function isDestTuple(dest: DestRect | Rect): dest is DestRect {
  return Array.isArray(dest);
}

/** Normalize a `[x, y, w, h]` tuple or Rect into a Rect. */
export function toRect(dest: DestRect | Rect): Rect {
  if (isDestTuple(dest)) {
    const [x, y, w, h] = dest;
    return Object.freeze({ x, y, w, h });
  }
  return Object.freeze({ x: dest.x, y: dest.y, w: dest.w, h: dest.h });
}

export function formatLength(length: Length): string {
  return length.unit === "px" ? `${String(length.value)}px` : `${String(length.value)}%${length.unit}`;
}
