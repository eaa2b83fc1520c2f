/**
 * packages/core/src/widget/types.ts — Capability interfaces between the widget
 * tree and its collaborators.
 */

import type { Rect } from "../layout/types.js";

/** Opaque font handle; the core stores it and never measures text. */
export type FontRef = Readonly<{ id: string }>;

/**
 * Optional drawable capability. A widget without one is pure layout and is
 * never registered with the renderer.
 */
export type WidgetDrawable =
  | Readonly<{ kind: "solid"; /** 0xRRGGBB */ color: number }>
  | Readonly<{ kind: "text"; text: string }>
  | Readonly<{ kind: "image"; source: string }>;

/** Read-only geometry view consumed by renderers and hit testing. */
export type LayoutNode = Readonly<{
  name: string;
  rect: Rect;
  zIndex: number;
  drawable: WidgetDrawable | null;
  font: FontRef | null;
  needsDrawableReload: boolean;
}>;

/**
 * Renderer the tree registers drawables with. Calls arrive synchronously from
 * tree mutations; the renderer reads rects and z-order between frames.
 */
export type RenderCollaborator = Readonly<{
  addDrawables: (node: LayoutNode) => void;
  removeDrawables: (node: LayoutNode) => void;
}>;
