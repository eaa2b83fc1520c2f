/**
 * packages/core/src/layout/types.ts — Geometry and unit primitives.
 *
 * All resolved coordinates are floating-point pixels with the origin at the
 * screen's top-left corner, y growing downward.
 */

/** Rectangle with position (x,y) and dimensions (w,h) in pixels. */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Width and height in pixels. */
export type Size = Readonly<{ w: number; h: number }>;

/** Pixel-space 2D vector. */
export type Vec2 = Readonly<{ x: number; y: number }>;

/** Seed rectangle as the tuple <x, y, w, h>. */
export type DestRect = readonly [x: number, y: number, w: number, h: number];

export type Axis = "x" | "y";

/**
 * Unit a Length is expressed in.
 *
 * - `px`: absolute pixels
 * - `percent`: percent of the parent along the axis of the field being resolved
 * - `parentWidth` / `parentHeight` / `parentMin` / `parentMax`: percent of that parent measure,
 *   whichever field uses it (e.g. a width in `parentHeight` locks aspect to the parent height)
 * - `screen*`: the same against the root's resolved size
 */
export type UnitKind =
  | "px"
  | "percent"
  | "parentWidth"
  | "parentHeight"
  | "parentMin"
  | "parentMax"
  | "screenWidth"
  | "screenHeight"
  | "screenMin"
  | "screenMax";

/** Unit-tagged scalar. Resolved to pixels only against a reference frame. */
export type Length = Readonly<{ value: number; unit: UnitKind }>;

/** Two independent lengths; each axis resolves by its own unit. */
export type Length2 = Readonly<{ x: Length; y: Length }>;

/** Sizes a Length resolves against. `null` means no such reference exists. */
export type ReferenceFrame = Readonly<{
  parent: Size | null;
  screen: Size | null;
}>;

/** Parent edges a widget sticks to. Opposite edges stretch that axis. */
export type AnchorStyle = Readonly<{
  left: boolean;
  top: boolean;
  right: boolean;
  bottom: boolean;
}>;

export type DockStyle = "none" | "left" | "top" | "right" | "bottom" | "fill";

/**
 * Reference frame selection.
 * - static / relative: the parent's resolved rect
 * - absolute: the root's resolved rect
 * - fixed: the screen rect
 */
export type PositionType = "static" | "relative" | "absolute" | "fixed";

/** Origin used on axes that have no anchored edge. */
export type WidgetAlign =
  | "topLeft"
  | "top"
  | "topRight"
  | "left"
  | "center"
  | "right"
  | "bottomLeft"
  | "bottom"
  | "bottomRight";

/** Style flags carried from the classic control model. */
export type ControlStyle = Readonly<{
  /** Keep the declared width even when anchored to both horizontal edges. */
  fixedWidth: boolean;
  /** Keep the declared height even when anchored to both vertical edges. */
  fixedHeight: boolean;
  /** Whether the widget can take focus; stored for the input collaborator. */
  selectable: boolean;
}>;
