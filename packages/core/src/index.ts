/**
 * packages/core/src/index.ts — Public API of @trellis-ui/core.
 *
 * @example
 * ```ts
 * import { Widget, createRootWidget, px } from "@trellis-ui/core";
 *
 * const root = createRootWidget({ config: { screen: { w: 800, h: 600 } } });
 * const sidebar = new Widget(root, "sidebar");
 * sidebar.setDock("left", px(200));
 * const content = new Widget(root, "content");
 * content.setDock("fill");
 * root.update(16);
 * ```
 */

// =============================================================================
// Geometry & units
// =============================================================================

export type {
  AnchorStyle,
  Axis,
  ControlStyle,
  DestRect,
  DockStyle,
  Length,
  Length2,
  PositionType,
  Rect,
  ReferenceFrame,
  Size,
  UnitKind,
  Vec2,
  WidgetAlign,
} from "./layout/types.js";
export {
  type Length2Input,
  type LengthInput,
  ZERO_LENGTH,
  ZERO_LENGTH2,
  formatLength,
  len,
  length2,
  length2Equals,
  lengthEquals,
  pct,
  ph,
  pw,
  px,
  px2,
  toLength,
  toLength2,
  toRect,
  vh,
  vmax,
  vmin,
  vw,
} from "./layout/length.js";
export {
  convertLength,
  isScreenUnit,
  referenceAxisFor,
  resolveLength,
  resolveLength2,
  resolveLengthAgainst,
} from "./layout/units.js";
export { clampAxis, clampNonNegative, clampSize, hasInvertedBounds } from "./layout/clamp.js";
export {
  type AnchorInput,
  type AxisPlacement,
  NO_ANCHOR,
  alignComponents,
  resolveAnchoredRect,
} from "./layout/anchor.js";
export {
  type DockAllocation,
  type DockRequest,
  dockAxis,
  dockRects,
  isEdgeDock,
} from "./layout/dock.js";
export { ZERO_RECT, contains, rect, rectEquals, rectSize } from "./layout/rect.js";

// =============================================================================
// Animation
// =============================================================================

export type {
  EasingFunction,
  EasingInput,
  EasingName,
  Interpolator,
  Transition,
  TransitionConfig,
  TransitionStep,
  TweeningFunction,
} from "./animation/types.js";
export {
  EASING_NAMES,
  isEasingName,
  linearTween,
  resolveEasing,
  tweenFromEasing,
} from "./animation/easing.js";
export {
  clamp01,
  interpolateLength,
  interpolateLength2,
  normalizeDurationMs,
} from "./animation/interpolate.js";
export {
  DEFAULT_TRANSITION_MS,
  advanceTransition,
  createTransition,
  sampleTransition,
  transitionProgress,
} from "./animation/transition.js";

// =============================================================================
// Widgets
// =============================================================================

export {
  type Length2Field,
  type RootWidgetOptions,
  Widget,
  createRootWidget,
} from "./widget/widget.js";
export type { FontRef, LayoutNode, RenderCollaborator, WidgetDrawable } from "./widget/types.js";
export {
  type WidgetVisitor,
  collectReloadTargets,
  findWidget,
  hitTestWidgets,
  rootOf,
  walkWidgets,
  widgetPath,
} from "./widget/tree.js";

// =============================================================================
// Config, errors, diagnostics, perf
// =============================================================================

export {
  type LayoutConfig,
  type ResolvedLayoutConfig,
  defaultDiagnosticsSink,
  resolveLayoutConfig,
} from "./config.js";
export { WidgetError, type WidgetErrorCode, describeThrown, isWidgetError } from "./errors.js";
export * from "./diagnostics/index.js";
export {
  PERF_ENABLED,
  type PerfPhase,
  type PerfSnapshot,
  type PhaseStats,
  perfReset,
  perfSnapshot,
} from "./perf/perf.js";
