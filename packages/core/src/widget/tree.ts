/**
 * packages/core/src/widget/tree.ts — Widget tree traversal and hit testing.
 *
 * Hit-test tie-break: among overlapping siblings the higher z-index wins;
 * equal z-index falls back to declared order, later sibling wins. The
 * deepest matching descendant is returned. Disabled widgets and their
 * subtrees are skipped.
 */

import { contains } from "../layout/rect.js";
import type { Widget } from "./widget.js";

/** Visitor returning `false` skips the visited node's subtree. */
export type WidgetVisitor = (widget: Widget, depth: number) => boolean | void;

/** Pre-order, children in declared order. */
export function walkWidgets(root: Widget, visit: WidgetVisitor): void {
  const stack: Array<Readonly<{ node: Widget; depth: number }>> = [{ node: root, depth: 0 }];
  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) continue;
    if (visit(frame.node, frame.depth) === false) continue;
    const children = frame.node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push({ node: child, depth: frame.depth + 1 });
    }
  }
}

/** First widget named `name` in pre-order, or null. */
export function findWidget(root: Widget, name: string): Widget | null {
  let found: Widget | null = null;
  walkWidgets(root, (w) => {
    if (found) return false;
    if (w.name === name) {
      found = w;
      return false;
    }
    return true;
  });
  return found;
}

/** `root>panel>label` style path used in diagnostics. */
export function widgetPath(widget: Widget): string {
  const names: string[] = [];
  let cur: Widget | null = widget;
  while (cur) {
    names.push(cur.name.length > 0 ? cur.name : "(anonymous)");
    cur = cur.parent;
  }
  return names.reverse().join(">");
}

export function rootOf(widget: Widget): Widget {
  let cur = widget;
  while (cur.parent) cur = cur.parent;
  return cur;
}

/** Widgets whose drawables must be re-batched, in pre-order. */
export function collectReloadTargets(root: Widget): readonly Widget[] {
  const out: Widget[] = [];
  walkWidgets(root, (w) => {
    if (w.needsDrawableReload) out.push(w);
  });
  return Object.freeze(out);
}

function hitChildrenOrder(children: readonly Widget[]): readonly Widget[] {
  return children
    .map((child, index) => ({ child, index }))
    .sort((a, b) => b.child.zIndex - a.child.zIndex || b.index - a.index)
    .map((entry) => entry.child);
}

/** Deepest enabled widget whose rect contains (x, y), or null. */
export function hitTestWidgets(root: Widget, x: number, y: number): Widget | null {
  if (!root.isEnabled || !contains(root.rect, x, y)) return null;
  for (const child of hitChildrenOrder(root.children)) {
    const hit = hitTestWidgets(child, x, y);
    if (hit) return hit;
  }
  return root;
}
