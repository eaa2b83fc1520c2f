import { assert, describe, test } from "@trellis-ui/testkit";
import { createDiagnosticsCollector } from "../../diagnostics/collector.js";
import {
  collectReloadTargets,
  findWidget,
  hitTestWidgets,
  rootOf,
  walkWidgets,
  widgetPath,
} from "../tree.js";
import { Widget, createRootWidget } from "../widget.js";

function buildTree() {
  const diagnostics = createDiagnosticsCollector();
  const root = createRootWidget({ config: { screen: { w: 800, h: 600 }, diagnostics } });
  const a = new Widget(root, "a", [0, 0, 400, 400]);
  const a1 = new Widget(a, "a1", [0, 0, 100, 100]);
  const b = new Widget(root, "b", [200, 200, 400, 400]);
  return { root, a, a1, b };
}

describe("widget tree - structure", () => {
  test("children register with their parent in order", () => {
    const { root, a, a1, b } = buildTree();
    assert.deepEqual(root.children, [a, b]);
    assert.equal(a1.parent, a);
    assert.ok(root.isAncestorOf(a1));
    assert.ok(!a.isAncestorOf(b));
  });

  test("addChild reparents and reports duplicates", () => {
    const { root, a, a1, b } = buildTree();
    assert.equal(root.addChild(a), false);
    assert.equal(b.addChild(a1), true);
    assert.deepEqual(a.children, []);
    assert.deepEqual(b.children, [a1]);
    assert.deepEqual(a1.rect, { x: 200, y: 200, w: 100, h: 100 });
  });

  test("addChild refuses cycles", () => {
    const { root, a1 } = buildTree();
    assert.throws(() => root.addChild(root), { code: "WIDGET_CYCLE" });
    assert.throws(() => a1.addChild(root), { code: "WIDGET_CYCLE" });
  });

  test("removeChild detaches a subtree that keeps the tree's config", () => {
    const { root, a, a1 } = buildTree();
    assert.equal(root.removeChild(a1), false);
    assert.equal(root.removeChild(a), true);
    assert.ok(a.isRoot);
    assert.deepEqual(a.screen, { w: 800, h: 600 });
    assert.equal(rootOf(a1), a);
    assert.deepEqual(a.rect, { x: 0, y: 0, w: 400, h: 400 });
  });

  test("reordering moves a widget to either end", () => {
    const { root, a, b } = buildTree();
    a.bringToFront();
    assert.deepEqual(root.children, [b, a]);
    a.sendToBack();
    assert.deepEqual(root.children, [a, b]);
    assert.throws(() => root.bringToFront(), {
      code: "WIDGET_NO_PARENT",
      message: 'bringToFront: "root" has no parent',
    });
  });

  test("dispose releases the subtree and is idempotent", () => {
    const { root, a, a1 } = buildTree();
    a.dispose();
    assert.ok(a.isDisposed);
    assert.ok(a1.isDisposed);
    assert.equal(root.children.length, 1);
    assert.equal(a.parent, null);
    a.dispose();
    assert.throws(() => a.setX(1), { code: "WIDGET_DISPOSED", message: 'Widget "a" has been disposed' });
    assert.throws(() => root.addChild(a), { code: "WIDGET_DISPOSED" });
  });

  test("disposing a docked widget frees its strip", () => {
    const { root } = buildTree();
    const side = new Widget(root, "side");
    side.setDock("left", 200);
    const body = new Widget(root, "body");
    body.setDock("fill");
    assert.equal(body.x, 200);
    side.dispose();
    assert.deepEqual(body.rect, { x: 0, y: 0, w: 800, h: 600 });
  });
});

describe("widget tree - traversal", () => {
  test("walkWidgets visits in pre-order with depth", () => {
    const { root } = buildTree();
    const seen: string[] = [];
    walkWidgets(root, (w, depth) => {
      seen.push(`${w.name}@${String(depth)}`);
    });
    assert.deepEqual(seen, ["root@0", "a@1", "a1@2", "b@1"]);
  });

  test("returning false skips a subtree", () => {
    const { root } = buildTree();
    const seen: string[] = [];
    walkWidgets(root, (w) => {
      seen.push(w.name);
      return w.name !== "a";
    });
    assert.deepEqual(seen, ["root", "a", "b"]);
  });

  test("findWidget and widgetPath", () => {
    const { root, a1 } = buildTree();
    assert.equal(findWidget(root, "a1"), a1);
    assert.equal(findWidget(root, "missing"), null);
    assert.equal(widgetPath(a1), "root>a>a1");
    assert.equal(widgetPath(new Widget(a1, "")), "root>a>a1>(anonymous)");
  });

  test("collectReloadTargets lists widgets to re-batch in pre-order", () => {
    const { root, a, a1, b } = buildTree();
    walkWidgets(root, (w) => {
      w.acknowledgeDrawableReload();
    });
    assert.deepEqual(collectReloadTargets(root), []);
    b.setZIndex(3);
    a.setX(5);
    assert.deepEqual(collectReloadTargets(root), [a, a1, b]);
  });
});

describe("widget tree - hit testing", () => {
  test("later siblings win overlaps", () => {
    const { root, b } = buildTree();
    assert.equal(hitTestWidgets(root, 250, 250), b);
  });

  test("higher z-index wins overlaps", () => {
    const { root, a } = buildTree();
    a.setZIndex(1);
    assert.equal(hitTestWidgets(root, 250, 250), a);
  });

  test("the deepest widget is returned", () => {
    const { root, a1 } = buildTree();
    assert.equal(hitTestWidgets(root, 50, 50), a1);
  });

  test("disabled subtrees are skipped", () => {
    const { root, a } = buildTree();
    a.disable();
    assert.ok(!a.isEnabled);
    assert.equal(hitTestWidgets(root, 50, 50), root);
    a.enable();
    assert.equal(hitTestWidgets(root, 50, 50), a.children[0]);
  });

  test("points outside the root miss", () => {
    const { root } = buildTree();
    assert.equal(hitTestWidgets(root, 900, 0), null);
    assert.equal(hitTestWidgets(root, 800, 10), null);
  });
});
