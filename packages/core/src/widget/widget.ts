/**
 * packages/core/src/widget/widget.ts — Widget node: raw state in, pixel rect out.
 *
 * Why: Owns the author-facing raw values (unit-tagged lengths, anchors,
 * docking, transitions) and keeps the resolved rectangle in step with them.
 *
 * Resolution order for a node that is not docked:
 *   raw lengths → units against the reference frame → min/max clamp →
 *   anchor/align inside the reference rect
 * A docked node instead takes the strip its parent's docking pass carved,
 * clamped to its min/max.
 *
 * Invariants:
 *   - Setters re-resolve immediately; only transitions wait for update(dt).
 *   - Parents resolve before children; a container's docking pass runs
 *     before its children recurse.
 *   - The root always holds a resolved config; descendants read the root's.
 *   - A frame pass never throws. Recovered problems go to the diagnostics sink.
 */

import { advanceTransition, createTransition } from "../animation/transition.js";
import { interpolateLength, interpolateLength2 } from "../animation/interpolate.js";
import type { Interpolator, Transition, TransitionConfig } from "../animation/types.js";
import { type LayoutConfig, type ResolvedLayoutConfig, resolveLayoutConfig } from "../config.js";
import { createConsoleDiagnostics } from "../diagnostics/console.js";
import {
  DIAGNOSTIC_SEVERITY,
  type IssueReporter,
  type LayoutDiagnostic,
  type LayoutDiagnosticCode,
} from "../diagnostics/types.js";
import { WidgetError, describeThrown } from "../errors.js";
import { NO_ANCHOR, resolveAnchoredRect } from "../layout/anchor.js";
import { clampNonNegative, clampSize, hasInvertedBounds } from "../layout/clamp.js";
import { dockAxis, dockRects } from "../layout/dock.js";
import {
  type Length2Input,
  type LengthInput,
  ZERO_LENGTH,
  ZERO_LENGTH2,
  length2,
  px,
  px2,
  toLength,
  toLength2,
  toRect,
  vh,
  vw,
} from "../layout/length.js";
import { ZERO_RECT, contains, rectEquals } from "../layout/rect.js";
import type {
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
  Vec2,
  WidgetAlign,
} from "../layout/types.js";
import { convertLength, resolveLength, resolveLength2 } from "../layout/units.js";
import { perfMarkEnd, perfMarkStart } from "../perf/perf.js";
import { rootOf, widgetPath } from "./tree.js";
import type { FontRef, LayoutNode, RenderCollaborator, WidgetDrawable } from "./types.js";

/** Raw fields holding a Length2 that can be animated. */
export type Length2Field = "position" | "dimensions" | "minSize" | "maxSize";

type TransitionField = Length2Field | "dockSize";

type RawState = {
  position: Length2;
  dimensions: Length2;
  minSize: Length2;
  maxSize: Length2;
  dockSize: Length;
};

type ActiveTransitions = {
  position: Transition<Length2> | null;
  dimensions: Transition<Length2> | null;
  minSize: Transition<Length2> | null;
  maxSize: Transition<Length2> | null;
  dockSize: Transition<Length> | null;
};

export type RootWidgetOptions = Readonly<{
  name?: string;
  config?: LayoutConfig;
  renderer?: RenderCollaborator;
}>;

const UNBOUNDED: Length2 = px2(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY);

const DEFAULT_STYLE: ControlStyle = Object.freeze({
  fixedWidth: false,
  fixedHeight: false,
  selectable: false,
});

const LENGTH2_FIELDS: readonly Length2Field[] = Object.freeze([
  "position",
  "dimensions",
  "minSize",
  "maxSize",
]);

/** Receives diagnostics a configured sink failed to accept. */
const fallbackDiagnostics = createConsoleDiagnostics();

function sizeOf(r: Rect): Size {
  return { w: r.w, h: r.h };
}

export class Widget implements LayoutNode {
  readonly name: string;

  private _parent: Widget | null = null;
  private readonly _children: Widget[] = [];
  /** Meaningful only while this widget is a root. */
  private config: ResolvedLayoutConfig | null;

  private readonly raw: RawState;
  private readonly transitions: ActiveTransitions = {
    position: null,
    dimensions: null,
    minSize: null,
    maxSize: null,
    dockSize: null,
  };

  private _anchor: AnchorStyle = NO_ANCHOR;
  private _align: WidgetAlign = "topLeft";
  private _dock: DockStyle = "none";
  private _positionType: PositionType = "static";
  private _style: ControlStyle = DEFAULT_STYLE;
  private _zIndex = 0;
  private _font: FontRef | null = null;
  private _drawable: WidgetDrawable | null = null;
  private _renderer: RenderCollaborator | null = null;
  private _enabled = true;

  private _rect: Rect = ZERO_RECT;
  /** Strip assigned by the parent's docking pass; null when not docked. */
  private dockedRect: Rect | null = null;
  private _needsDrawableReload = true;
  private _disposed = false;

  /**
   * @param parent - Container to register with, or null for a root.
   * @param destRect - `<x, y, w, h>` in pixels, seeding raw position and dimensions.
   * @param config - Tree configuration; accepted only for roots.
   */
  constructor(
    parent: Widget | null,
    name: string,
    destRect: DestRect | Rect = [0, 0, 0, 0],
    config?: LayoutConfig,
  ) {
    if (parent && config !== undefined) {
      throw new WidgetError(
        "WIDGET_INVALID_ARGUMENT",
        `Widget "${name}": config is only accepted by root widgets`,
      );
    }
    this.name = name;
    this.config = parent ? null : resolveLayoutConfig(config);
    const seed = toRect(destRect);
    this.raw = {
      position: px2(seed.x, seed.y),
      dimensions: px2(seed.w, seed.h),
      minSize: ZERO_LENGTH2,
      maxSize: UNBOUNDED,
      dockSize: ZERO_LENGTH,
    };
    if (parent) parent.addChild(this);
    else this.relayout();
  }

  /* --- Resolved geometry --- */

  get rect(): Rect {
    return this._rect;
  }
  get position(): Vec2 {
    return { x: this._rect.x, y: this._rect.y };
  }
  get dimensions(): Vec2 {
    return { x: this._rect.w, y: this._rect.h };
  }
  get x(): number {
    return this._rect.x;
  }
  get y(): number {
    return this._rect.y;
  }
  get width(): number {
    return this._rect.w;
  }
  get height(): number {
    return this._rect.h;
  }
  get needsDrawableReload(): boolean {
    return this._needsDrawableReload;
  }

  /* --- Raw state --- */

  get rawPosition(): Length2 {
    return this.raw.position;
  }
  get rawDimensions(): Length2 {
    return this.raw.dimensions;
  }
  get minSize(): Length2 {
    return this.raw.minSize;
  }
  get maxSize(): Length2 {
    return this.raw.maxSize;
  }
  get dockSize(): Length {
    return this.raw.dockSize;
  }
  get anchor(): AnchorStyle {
    return this._anchor;
  }
  get align(): WidgetAlign {
    return this._align;
  }
  get dock(): DockStyle {
    return this._dock;
  }
  get positionType(): PositionType {
    return this._positionType;
  }
  get style(): ControlStyle {
    return this._style;
  }
  get zIndex(): number {
    return this._zIndex;
  }
  get font(): FontRef | null {
    return this._font;
  }
  get drawable(): WidgetDrawable | null {
    return this._drawable;
  }
  get renderer(): RenderCollaborator | null {
    return this._renderer;
  }
  get isEnabled(): boolean {
    return this._enabled;
  }
  get isDisposed(): boolean {
    return this._disposed;
  }

  /* --- Tree --- */

  get parent(): Widget | null {
    return this._parent;
  }
  get children(): readonly Widget[] {
    return this._children;
  }
  get isRoot(): boolean {
    return this._parent === null;
  }

  /** Point-in-rect test against the resolved rect (right/bottom edges exclusive). */
  isInBounds(x: number, y: number): boolean {
    return contains(this._rect, x, y);
  }

  /**
   * Append `child` (reparenting it if needed) and re-run this container's
   * docking pass. Returns false when it is already a child.
   */
  addChild(child: Widget): boolean {
    this.assertLive();
    child.assertLive();
    if (child === this || child.isAncestorOf(this)) {
      throw new WidgetError(
        "WIDGET_CYCLE",
        `addChild: "${child.name}" is "${this.name}" or one of its ancestors`,
      );
    }
    if (child._parent === this) return false;
    const previous = child._parent;
    if (previous) {
      previous.unlinkChild(child);
      previous.layoutChildren();
    }
    child._parent = this;
    this._children.push(child);
    child.attachSubtreeRenderer(this._renderer);
    this.layoutChildren();
    return true;
  }

  /**
   * Detach `child`; it becomes the root of its own tree, keeping this tree's
   * config. Returns false when it is not a child.
   */
  removeChild(child: Widget): boolean {
    this.assertLive();
    if (!this.unlinkChild(child)) return false;
    child.config = this.treeConfig();
    child.attachSubtreeRenderer(null);
    this.layoutChildren();
    child.relayout();
    return true;
  }

  /** Move to the end of the parent's children: drawn last, docked last. */
  bringToFront(): void {
    this.reorder("bringToFront", (siblings) => siblings.push(this));
  }

  /** Move to the start of the parent's children: drawn first, docked first. */
  sendToBack(): void {
    this.reorder("sendToBack", (siblings) => siblings.unshift(this));
  }

  isAncestorOf(other: Widget): boolean {
    let cur = other._parent;
    while (cur) {
      if (cur === this) return true;
      cur = cur._parent;
    }
    return false;
  }

  /**
   * Release this widget and its subtree: drawables leave the renderer, the
   * parent forgets it, transitions are dropped. Idempotent.
   */
  dispose(): void {
    if (this._disposed) return;
    const parent = this._parent;
    if (parent) parent.unlinkChild(this);
    this.teardown();
    if (parent && !parent._disposed) parent.layoutChildren();
  }

  /* --- Configuration (roots) --- */

  /** Reconfigure the tree. Only valid on a root. */
  configure(config: LayoutConfig): void {
    this.assertLive();
    if (this._parent) {
      throw new WidgetError("WIDGET_INVALID_ARGUMENT", `configure: "${this.name}" is not a root`);
    }
    this.config = resolveLayoutConfig(config);
    this.relayout();
  }

  /** Change the screen size, keeping the rest of the config. Only valid on a root. */
  setScreenSize(screen: Size): void {
    const current = this.treeConfig();
    this.configure({
      screen,
      diagnostics: current.diagnostics,
      defaultTransitionMs: current.defaultTransitionMs,
      defaultEasing: current.defaultEasing,
    });
  }

  get screen(): Size | null {
    return this.treeConfig().screen;
  }

  /* --- Static setters: cancel the field's transition, re-resolve now --- */

  setPosition(position: Length2Input): void {
    this.setLength2("position", toLength2(position));
  }

  setX(x: LengthInput): void {
    this.setLength2("position", length2(x, this.raw.position.y));
  }

  setY(y: LengthInput): void {
    this.setLength2("position", length2(this.raw.position.x, y));
  }

  setDimensions(dimensions: Length2Input): void {
    this.setLength2("dimensions", toLength2(dimensions));
  }

  setWidth(width: LengthInput): void {
    this.setLength2("dimensions", length2(width, this.raw.dimensions.y));
  }

  setHeight(height: LengthInput): void {
    this.setLength2("dimensions", length2(this.raw.dimensions.x, height));
  }

  setMinSize(minSize: Length2Input): void {
    this.setLength2("minSize", toLength2(minSize));
  }

  setMaxSize(maxSize: Length2Input): void {
    this.setLength2("maxSize", toLength2(maxSize));
  }

  /** Seed raw position and dimensions in pixels from `<x, y, w, h>`. */
  setDestRect(destRect: DestRect | Rect): void {
    this.assertLive();
    const r = toRect(destRect);
    this.raw.position = px2(r.x, r.y);
    this.raw.dimensions = px2(r.w, r.h);
    this.transitions.position = null;
    this.transitions.dimensions = null;
    this.invalidate(false);
  }

  setAnchor(anchor: Partial<AnchorStyle>): void {
    this.assertLive();
    this._anchor = Object.freeze({ ...this._anchor, ...anchor });
    this.invalidate(false);
  }

  setAlign(align: WidgetAlign): void {
    this.assertLive();
    this._align = align;
    this.invalidate(false);
  }

  /** Dock style, and optionally the strip size along the docking axis. */
  setDock(dock: DockStyle, size?: LengthInput): void {
    this.assertLive();
    this._dock = dock;
    if (size !== undefined) {
      this.raw.dockSize = toLength(size);
      this.transitions.dockSize = null;
    }
    this.invalidate(true);
  }

  setDockSize(size: LengthInput): void {
    this.assertLive();
    this.raw.dockSize = toLength(size);
    this.transitions.dockSize = null;
    this.invalidate(true);
  }

  setPositionType(positionType: PositionType): void {
    this.assertLive();
    this._positionType = positionType;
    this.invalidate(true);
  }

  setStyle(style: Partial<ControlStyle>): void {
    this.assertLive();
    this._style = Object.freeze({ ...this._style, ...style });
    this.invalidate(false);
  }

  setZIndex(zIndex: number): void {
    this.assertLive();
    if (!Number.isFinite(zIndex)) {
      throw new WidgetError("WIDGET_INVALID_ARGUMENT", `setZIndex: ${String(zIndex)} is not finite`);
    }
    if (zIndex === this._zIndex) return;
    this._zIndex = zIndex;
    this._needsDrawableReload = true;
  }

  setFont(font: FontRef | null): void {
    this.assertLive();
    if (font === this._font) return;
    this._font = font;
    this._needsDrawableReload = true;
  }

  /** Swap the drawable capability, re-registering with the renderer. */
  setDrawable(drawable: WidgetDrawable | null): void {
    this.assertLive();
    if (drawable === this._drawable) return;
    const renderer = this._renderer;
    if (renderer && this._drawable) renderer.removeDrawables(this);
    this._drawable = drawable;
    if (renderer && drawable) renderer.addDrawables(this);
    this._needsDrawableReload = true;
  }

  enable(): void {
    this.assertLive();
    this._enabled = true;
  }

  disable(): void {
    this.assertLive();
    this._enabled = false;
  }

  /** Attach (or detach with null) a renderer for this widget's whole subtree. */
  setRenderer(renderer: RenderCollaborator | null): void {
    this.assertLive();
    this.attachSubtreeRenderer(renderer);
  }

  /** Called by the renderer once it has re-batched this widget. */
  acknowledgeDrawableReload(): void {
    this._needsDrawableReload = false;
  }

  /* --- Transitions --- */

  transitionPosition(target: Length2Input, config?: TransitionConfig): void {
    this.startLength2Transition("position", toLength2(target), config);
  }

  transitionDimensions(target: Length2Input, config?: TransitionConfig): void {
    this.startLength2Transition("dimensions", toLength2(target), config);
  }

  transitionMinSize(target: Length2Input, config?: TransitionConfig): void {
    this.startLength2Transition("minSize", toLength2(target), config);
  }

  transitionMaxSize(target: Length2Input, config?: TransitionConfig): void {
    this.startLength2Transition("maxSize", toLength2(target), config);
  }

  transitionDockSize(target: LengthInput, config?: TransitionConfig): void {
    this.assertLive();
    const goal = toLength(target);
    const axis = dockAxis(this._dock) ?? "x";
    const parentRect = this._parent ? this._parent._rect : this.referenceRect();
    const from = convertLength(
      this.raw.dockSize,
      goal.unit,
      this.frameFor(parentRect),
      axis,
      this.reporter(),
    );
    this.raw.dockSize = from;
    this.transitions.dockSize = createTransition(
      from,
      goal,
      this.withDefaults(config),
      this.treeConfig().defaultTransitionMs,
    );
    this.invalidate(true);
  }

  /** Active transition on a field, if any. */
  transitionOf(field: Length2Field): Transition<Length2> | null;
  transitionOf(field: "dockSize"): Transition<Length> | null;
  transitionOf(field: Length2Field | "dockSize"): Transition<Length2> | Transition<Length> | null {
    return field === "dockSize" ? this.transitions.dockSize : this.transitions[field];
  }

  get hasActiveTransitions(): boolean {
    const t = this.transitions;
    return (
      t.position !== null ||
      t.dimensions !== null ||
      t.minSize !== null ||
      t.maxSize !== null ||
      t.dockSize !== null
    );
  }

  /** Drop every transition on this widget, leaving raw values where they are. */
  cancelTransitions(): void {
    this.transitions.position = null;
    this.transitions.dimensions = null;
    this.transitions.minSize = null;
    this.transitions.maxSize = null;
    this.transitions.dockSize = null;
  }

  /* --- Frame pass --- */

  /**
   * Advance every transition in this subtree by `dtMs`, then re-resolve the
   * subtree (the parent's docking pass too, when this widget is docked).
   */
  update(dtMs: number): void {
    this.assertLive();
    const transitionsToken = perfMarkStart();
    this.advanceSubtree(dtMs);
    perfMarkEnd("transitions", transitionsToken);
    if (this._disposed) return;
    const layoutToken = perfMarkStart();
    this.invalidate(false);
    perfMarkEnd("layout", layoutToken);
  }

  /* --- Internals --- */

  private assertLive(): void {
    if (this._disposed) {
      throw new WidgetError("WIDGET_DISPOSED", `Widget "${this.name}" has been disposed`);
    }
  }

  private treeConfig(): ResolvedLayoutConfig {
    const root = rootOf(this);
    if (!root.config) root.config = resolveLayoutConfig(undefined);
    return root.config;
  }

  /** Hands a diagnostic to the tree's sink; a throwing sink must not break the frame. */
  private report(code: LayoutDiagnosticCode, detail: string): void {
    const diagnostic: LayoutDiagnostic = {
      code,
      severity: DIAGNOSTIC_SEVERITY[code],
      path: widgetPath(this),
      detail,
    };
    try {
      this.treeConfig().diagnostics.report(diagnostic);
    } catch (e: unknown) {
      fallbackDiagnostics.report({
        ...diagnostic,
        detail: `${detail} (diagnostics sink threw: ${describeThrown(e)})`,
      });
    }
  }

  private reporter(): IssueReporter {
    return (code, detail) => this.report(code, detail);
  }

  private withDefaults(config: TransitionConfig | undefined): TransitionConfig {
    const c = config ?? {};
    if (c.tween !== undefined || c.easing !== undefined) return c;
    return { ...c, easing: this.treeConfig().defaultEasing };
  }

  private unlinkChild(child: Widget): boolean {
    const index = this._children.indexOf(child);
    if (index < 0) return false;
    this._children.splice(index, 1);
    child._parent = null;
    child.dockedRect = null;
    return true;
  }

  private reorder(op: string, insert: (siblings: Widget[]) => void): void {
    this.assertLive();
    const parent = this._parent;
    if (!parent) {
      throw new WidgetError("WIDGET_NO_PARENT", `${op}: "${this.name}" has no parent`);
    }
    const index = parent._children.indexOf(this);
    parent._children.splice(index, 1);
    insert(parent._children);
    parent._needsDrawableReload = true;
    parent.layoutChildren();
  }

  private teardown(): void {
    for (const child of this._children.slice()) child.teardown();
    this._children.length = 0;
    if (this._renderer && this._drawable) this._renderer.removeDrawables(this);
    this._renderer = null;
    this._parent = null;
    this.dockedRect = null;
    this.cancelTransitions();
    this._disposed = true;
  }

  private attachSubtreeRenderer(renderer: RenderCollaborator | null): void {
    if (this._renderer !== renderer) {
      if (this._renderer && this._drawable) this._renderer.removeDrawables(this);
      this._renderer = renderer;
      if (renderer && this._drawable) renderer.addDrawables(this);
      this._needsDrawableReload = true;
    }
    for (const child of this._children) child.attachSubtreeRenderer(renderer);
  }

  private participatesInDocking(): boolean {
    return (
      this._dock !== "none" &&
      (this._positionType === "static" || this._positionType === "relative")
    );
  }

  /** Re-resolve after a mutation. Docked widgets re-run the parent's docking pass. */
  private invalidate(dockingChanged: boolean): void {
    const parent = this._parent;
    if (parent && (dockingChanged || this.participatesInDocking())) parent.layoutChildren();
    else this.relayout();
  }

  private setLength2(field: Length2Field, value: Length2): void {
    this.assertLive();
    this.raw[field] = value;
    this.transitions[field] = null;
    this.invalidate(false);
  }

  private screenRect(): Rect | null {
    const screen = this.treeConfig().screen;
    return screen ? { x: 0, y: 0, w: screen.w, h: screen.h } : null;
  }

  /** Rect a non-docked widget is placed inside. */
  private referenceRect(): Rect {
    const parent = this._parent;
    if (!parent) return this.screenRect() ?? ZERO_RECT;
    switch (this._positionType) {
      case "static":
      case "relative":
        return parent._rect;
      case "absolute":
        return rootOf(this)._rect;
      case "fixed":
        return this.screenRect() ?? rootOf(this)._rect;
    }
  }

  /**
   * Parent units resolve against `reference`; screen units against the root's
   * rect (the configured screen for the root itself).
   */
  private frameFor(reference: Rect): ReferenceFrame {
    if (!this._parent) return { parent: null, screen: this.treeConfig().screen };
    return { parent: sizeOf(reference), screen: sizeOf(rootOf(this)._rect) };
  }

  private resolveBounds(frame: ReferenceFrame, report: IssueReporter): Readonly<{ min: Vec2; max: Vec2 }> {
    const rawMin = resolveLength2(this.raw.minSize, frame, report);
    const min = { x: clampNonNegative(rawMin.x), y: clampNonNegative(rawMin.y) };
    const max = {
      x: this.resolveMaxAxis(this.raw.maxSize.x, frame, "x", report),
      y: this.resolveMaxAxis(this.raw.maxSize.y, frame, "y", report),
    };
    if (hasInvertedBounds(min, max)) {
      report(
        "constraint.minExceedsMax",
        `min (${String(min.x)}, ${String(min.y)}) exceeds max (${String(max.x)}, ${String(max.y)}); min wins`,
      );
    }
    return { min, max };
  }

  private resolveMaxAxis(length: Length, frame: ReferenceFrame, axis: Axis, report: IssueReporter): number {
    if (length.value === Number.POSITIVE_INFINITY) return Number.POSITIVE_INFINITY;
    return clampNonNegative(resolveLength(length, frame, axis, report));
  }

  private resolveSelf(): void {
    const report = this.reporter();
    const docked = this.dockedRect;
    if (docked) {
      const frame = this.frameFor(this._parent ? this._parent._rect : docked);
      const { min, max } = this.resolveBounds(frame, report);
      const size = clampSize({ x: docked.w, y: docked.h }, min, max);
      this.commitRect({ x: docked.x, y: docked.y, w: size.x, h: size.y });
      return;
    }
    const reference = this.referenceRect();
    const frame = this.frameFor(reference);
    const position = resolveLength2(this.raw.position, frame, report);
    const size = resolveLength2(this.raw.dimensions, frame, report);
    const { min, max } = this.resolveBounds(frame, report);
    this.commitRect(
      resolveAnchoredRect(
        {
          position,
          size,
          min,
          max,
          anchor: this._anchor,
          align: this._align,
          fixedWidth: this._style.fixedWidth,
          fixedHeight: this._style.fixedHeight,
        },
        reference,
        report,
      ),
    );
  }

  private commitRect(next: Rect): void {
    if (rectEquals(next, this._rect)) return;
    this._rect = Object.freeze({ x: next.x, y: next.y, w: next.w, h: next.h });
    this._needsDrawableReload = true;
  }

  /** Resolve this widget, then its subtree. A failure degrades only this node. */
  private relayout(): void {
    try {
      this.resolveSelf();
    } catch (e: unknown) {
      this.report("node.resolveFailed", describeThrown(e));
      const origin = this.dockedRect ?? this.referenceRect();
      this.commitRect({ x: origin.x, y: origin.y, w: 0, h: 0 });
    }
    this.layoutChildren();
  }

  private resolveDockSize(container: Rect): number {
    const axis = dockAxis(this._dock);
    if (!axis) return 0;
    return resolveLength(this.raw.dockSize, this.frameFor(container), axis, this.reporter());
  }

  /** Docking pass over direct children, then recurse into every child. */
  private layoutChildren(): void {
    const children = this._children.slice();
    const docked = children.filter((c) => c.participatesInDocking());
    for (const child of children) child.dockedRect = null;

    if (docked.length > 0) {
      const allocation = dockRects(
        this._rect,
        docked.map((c) => ({ dock: c._dock, size: c.resolveDockSize(this._rect) })),
      );
      docked.forEach((child, i) => {
        child.dockedRect = allocation.rects[i] ?? null;
      });
      for (const i of allocation.overflowed) {
        const child = docked[i];
        if (!child) continue;
        child.report(
          "dock.sizeExceedsRemaining",
          `${child._dock} strip clamped to the remaining ${dockAxis(child._dock) === "x" ? "width" : "height"}`,
        );
      }
    }

    for (const child of children) child.relayout();
  }

  private advanceSubtree(dtMs: number): void {
    if (this._disposed) return;
    this.advanceTransitions(dtMs);
    for (const child of this._children.slice()) child.advanceSubtree(dtMs);
  }

  /**
   * Step each field on its own. A throwing tween drops only that field's
   * transition; completion callbacks run after every field has stepped, and a
   * throwing callback does not stop the others.
   */
  private advanceTransitions(dtMs: number): void {
    const completed: Array<Readonly<{ field: TransitionField; onComplete: () => void }>> = [];
    const onDone = (field: TransitionField, onComplete: (() => void) | undefined): void => {
      if (onComplete) completed.push({ field, onComplete });
    };

    for (const field of LENGTH2_FIELDS) {
      const active = this.transitions[field];
      if (!active) continue;
      const step = this.stepTransition(field, active, dtMs, interpolateLength2);
      this.transitions[field] = step?.next ?? null;
      if (!step) continue;
      this.raw[field] = step.value;
      if (!step.next) onDone(field, active.onComplete);
    }

    const dock = this.transitions.dockSize;
    if (dock) {
      const step = this.stepTransition("dockSize", dock, dtMs, interpolateLength);
      this.transitions.dockSize = step?.next ?? null;
      if (step) {
        this.raw.dockSize = step.value;
        if (!step.next) onDone("dockSize", dock.onComplete);
      }
    }

    for (const { field, onComplete } of completed) {
      try {
        onComplete();
      } catch (e: unknown) {
        this.report("node.resolveFailed", `${field} onComplete: ${describeThrown(e)}`);
      }
    }
  }

  /** One frame of a transition; `null` when its tween threw (reported). */
  private stepTransition<T>(
    field: TransitionField,
    active: Transition<T>,
    dtMs: number,
    interpolate: Interpolator<T>,
  ): Readonly<{ value: T; next: Transition<T> | null }> | null {
    try {
      const step = advanceTransition(active, dtMs, interpolate);
      return { value: step.value, next: step.done ? null : step.transition };
    } catch (e: unknown) {
      this.report("node.resolveFailed", `${field} transition: ${describeThrown(e)}`);
      return null;
    }
  }

  /**
   * Restart `field` from its current raw value, re-expressed in the target's
   * units so the first frame resolves to the same pixels.
   */
  private startLength2Transition(
    field: Length2Field,
    target: Length2,
    config: TransitionConfig | undefined,
  ): void {
    this.assertLive();
    const report = this.reporter();
    const frame = this.frameFor(this.referenceRect());
    const current = this.raw[field];
    const from: Length2 = length2(
      this.transitionStart(field, current.x, target.x, frame, "x", report),
      this.transitionStart(field, current.y, target.y, frame, "y", report),
    );
    this.raw[field] = from;
    this.transitions[field] = createTransition(
      from,
      target,
      this.withDefaults(config),
      this.treeConfig().defaultTransitionMs,
    );
    this.invalidate(false);
  }

  private transitionStart(
    field: Length2Field,
    current: Length,
    target: Length,
    frame: ReferenceFrame,
    axis: Axis,
    report: IssueReporter,
  ): Length {
    // An unbounded max has no finite starting point; start from the size the widget has now.
    if (field === "maxSize" && current.value === Number.POSITIVE_INFINITY) {
      const resolved = axis === "x" ? this._rect.w : this._rect.h;
      return convertLength(px(resolved), target.unit, frame, axis, report);
    }
    return convertLength(current, target.unit, frame, axis, report);
  }
}

/** Root widget filling the configured screen (`100vw × 100vh`). */
export function createRootWidget(opts: RootWidgetOptions = {}): Widget {
  const root = new Widget(null, opts.name ?? "root", [0, 0, 0, 0], opts.config ?? {});
  root.setDimensions(length2(vw(100), vh(100)));
  if (opts.renderer) root.setRenderer(opts.renderer);
  return root;
}
