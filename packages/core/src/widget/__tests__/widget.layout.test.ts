import { assert, describe, test } from "@trellis-ui/testkit";
import { createDiagnosticsCollector } from "../../diagnostics/collector.js";
import { length2, pct, ph, pw, px, px2, vh, vw } from "../../layout/length.js";
import { Widget, createRootWidget } from "../widget.js";

function screenRoot(w = 800, h = 600) {
  const diagnostics = createDiagnosticsCollector();
  const root = createRootWidget({ config: { screen: { w, h }, diagnostics } });
  return { root, diagnostics };
}

describe("widget layout - units", () => {
  test("the root fills the configured screen", () => {
    const { root } = screenRoot();
    assert.deepEqual(root.rect, { x: 0, y: 0, w: 800, h: 600 });
    assert.deepEqual(root.screen, { w: 800, h: 600 });
    assert.ok(root.isRoot);
  });

  test("a destRect seeds pixel position and dimensions", () => {
    const { root } = screenRoot();
    const w = new Widget(root, "w", [10, 20, 100, 50]);
    assert.deepEqual(w.rect, { x: 10, y: 20, w: 100, h: 50 });
    assert.deepEqual(w.rawPosition, px2(10, 20));
    assert.deepEqual(w.rawDimensions, px2(100, 50));
    assert.deepEqual(w.position, { x: 10, y: 20 });
    assert.deepEqual(w.dimensions, { x: 100, y: 50 });
  });

  test("percent sizes follow the parent", () => {
    const { root } = screenRoot();
    const panel = new Widget(root, "panel", [100, 100, 400, 300]);
    const child = new Widget(panel, "child");
    child.setDimensions(length2(pct(50), pct(50)));
    assert.deepEqual(child.rect, { x: 100, y: 100, w: 200, h: 150 });

    child.setDimensions(length2(ph(100), pw(10)));
    assert.equal(child.width, 300);
    assert.equal(child.height, 40);
  });

  test("descendant screen units resolve against the root rect", () => {
    const diagnostics = createDiagnosticsCollector();
    const root = new Widget(null, "root", [0, 0, 400, 300], { screen: { w: 800, h: 600 }, diagnostics });
    const child = new Widget(root, "child");
    child.setDimensions(length2(vw(50), vh(50)));
    assert.equal(child.width, 200);
    assert.equal(child.height, 150);
  });

  test("parent units on the root resolve to 0 and are reported", () => {
    const diagnostics = createDiagnosticsCollector();
    const root = new Widget(null, "root", [0, 0, 100, 100], { diagnostics });
    root.setWidth(pw(50));
    assert.equal(root.width, 0);
    assert.equal(root.height, 100);
    const issues = diagnostics.byCode("unit.noReference");
    assert.equal(issues.length, 1);
    assert.equal(issues[0]?.path, "root");
    assert.equal(issues[0]?.detail, "x: 50%parentWidth has no parent to resolve against");
  });

  test("non-finite lengths resolve to 0 and are reported", () => {
    const { root, diagnostics } = screenRoot();
    const w = new Widget(root, "w", [10, 10, 10, 10]);
    w.setX(px(Number.NaN));
    assert.equal(w.x, 0);
    assert.equal(diagnostics.byCode("unit.nonFinite")[0]?.detail, "x: NaNpx is not finite");
  });

  test("a throwing diagnostics sink falls back to the console", () => {
    const throwingSink = {
      report(): void {
        throw new Error("sink");
      },
    };
    const root = new Widget(null, "root", [0, 0, 100, 100], { diagnostics: throwingSink });
    const m = new Widget(root, "m", [0, 0, 10, 10]);
    const lines: string[] = [];
    const { warn, error } = console;
    console.warn = (msg: string) => {
      lines.push(msg);
    };
    console.error = (msg: string) => {
      lines.push(msg);
    };
    try {
      assert.doesNotThrow(() => {
        m.setMaxSize(px2(-1, Number.NaN));
        root.update(16);
      });
    } finally {
      console.warn = warn;
      console.error = error;
    }
    assert.ok(
      lines.includes(
        "[trellis-ui] unit.nonFinite at root>m: y: NaNpx is not finite (diagnostics sink threw: Error: sink)",
      ),
    );
  });

  test("fractional percent sizes resolve within rounding", () => {
    const { root } = screenRoot();
    const panel = new Widget(root, "panel", [0, 0, 300, 300]);
    const child = new Widget(panel, "child");
    child.setDimensions(length2(pct(100 / 3), pct(100 / 3)));
    assert.approxRect(child.rect, { x: 0, y: 0, w: 100, h: 100 });
  });

  test("children follow a moved parent", () => {
    const { root } = screenRoot();
    const panel = new Widget(root, "panel", [100, 100, 400, 300]);
    const child = new Widget(panel, "child", [5, 5, 10, 10]);
    panel.setX(200);
    assert.equal(child.x, 205);
    panel.setY(px(0));
    assert.equal(child.y, 5);
  });

  test("a new screen size relayouts the whole tree", () => {
    const { root } = screenRoot();
    const child = new Widget(root, "child");
    child.setDimensions(length2(pct(50), pct(50)));
    root.setScreenSize({ w: 1000, h: 500 });
    assert.deepEqual(root.rect, { x: 0, y: 0, w: 1000, h: 500 });
    assert.deepEqual(child.rect, { x: 0, y: 0, w: 500, h: 250 });
  });

  test("setDestRect replaces position and dimensions", () => {
    const { root } = screenRoot();
    const w = new Widget(root, "w", [1, 2, 3, 4]);
    w.setDestRect({ x: 5, y: 6, w: 7, h: 8 });
    assert.deepEqual(w.rect, { x: 5, y: 6, w: 7, h: 8 });
  });
});

describe("widget layout - constraints", () => {
  test("dimensions clamp to min and max", () => {
    const { root } = screenRoot();
    const w = new Widget(root, "w", [0, 0, 500, 10]);
    w.setMinSize(px2(0, 20));
    w.setMaxSize(px2(300, Number.POSITIVE_INFINITY));
    assert.deepEqual(w.rect, { x: 0, y: 0, w: 300, h: 20 });
  });

  test("min wins over max and the inversion is reported", () => {
    const { root, diagnostics } = screenRoot();
    const w = new Widget(root, "w", [0, 0, 150, 10]);
    w.setMinSize(px2(200, 0));
    w.setMaxSize(px2(100, Number.POSITIVE_INFINITY));
    assert.equal(w.width, 200);
    const issue = diagnostics.byCode("constraint.minExceedsMax")[0];
    assert.equal(issue?.path, "root>w");
    assert.equal(issue?.detail, "min (200, 0) exceeds max (100, Infinity); min wins");
  });

  test("percent bounds follow the parent", () => {
    const { root } = screenRoot();
    const w = new Widget(root, "w", [0, 0, 10, 10]);
    w.setMinSize(length2(pct(25), pct(50)));
    assert.deepEqual(w.dimensions, { x: 200, y: 300 });
  });
});

describe("widget layout - anchors and alignment", () => {
  test("centred inside a 400x300 parent, offset by the raw position", () => {
    const { root } = screenRoot(400, 300);
    const w = new Widget(root, "w", [10, 10, 100, 50]);
    w.setAlign("center");
    assert.deepEqual(w.rect, { x: 160, y: 135, w: 100, h: 50 });
  });

  test("stretching between horizontal edges", () => {
    const { root } = screenRoot();
    const panel = new Widget(root, "panel", [100, 100, 400, 300]);
    const bar = new Widget(panel, "bar", [10, 0, 20, 50]);
    bar.setAnchor({ left: true, right: true });
    assert.deepEqual(bar.rect, { x: 110, y: 100, w: 370, h: 50 });
    assert.deepEqual(bar.anchor, { left: true, top: false, right: true, bottom: false });
  });

  test("fixedWidth keeps the declared width", () => {
    const { root } = screenRoot();
    const bar = new Widget(root, "bar", [10, 0, 20, 50]);
    bar.setAnchor({ left: true, right: true });
    bar.setStyle({ fixedWidth: true });
    assert.equal(bar.width, 20);
    assert.deepEqual(bar.style, { fixedWidth: true, fixedHeight: false, selectable: false });
  });

  test("a bottom-right anchored widget tracks its parent's far edge", () => {
    const { root } = screenRoot();
    const badge = new Widget(root, "badge", [10, 20, 30, 40]);
    badge.setAnchor({ right: true, bottom: true });
    assert.deepEqual(badge.rect, { x: 760, y: 540, w: 30, h: 40 });
    root.setScreenSize({ w: 400, h: 300 });
    assert.deepEqual(badge.rect, { x: 360, y: 240, w: 30, h: 40 });
  });

  test("collapsed stretch margins are reported", () => {
    const { root, diagnostics } = screenRoot();
    const w = new Widget(root, "w", [500, 0, 400, 10]);
    w.setAnchor({ left: true, right: true });
    assert.equal(w.width, 0);
    assert.equal(diagnostics.byCode("anchor.marginsExceedReference").length, 1);
  });
});

describe("widget layout - position types", () => {
  function offsetRoot() {
    const diagnostics = createDiagnosticsCollector();
    const root = new Widget(null, "root", [50, 50, 700, 500], { screen: { w: 800, h: 600 }, diagnostics });
    const panel = new Widget(root, "panel", [100, 100, 400, 300]);
    const kid = new Widget(panel, "kid", [10, 10, 20, 20]);
    return { root, panel, kid };
  }

  test("static and relative use the parent rect", () => {
    const { root, panel, kid } = offsetRoot();
    assert.deepEqual(root.rect, { x: 50, y: 50, w: 700, h: 500 });
    assert.deepEqual(panel.rect, { x: 150, y: 150, w: 400, h: 300 });
    assert.deepEqual(kid.position, { x: 160, y: 160 });
    kid.setPositionType("relative");
    assert.deepEqual(kid.position, { x: 160, y: 160 });
  });

  test("absolute uses the root rect", () => {
    const { kid } = offsetRoot();
    kid.setPositionType("absolute");
    assert.deepEqual(kid.position, { x: 60, y: 60 });
  });

  test("fixed uses the screen", () => {
    const { kid } = offsetRoot();
    kid.setPositionType("fixed");
    assert.deepEqual(kid.position, { x: 10, y: 10 });
  });

  test("fixed falls back to the root rect without a screen", () => {
    const diagnostics = createDiagnosticsCollector();
    const root = new Widget(null, "root", [30, 30, 500, 400], { diagnostics });
    const kid = new Widget(root, "kid", [10, 10, 20, 20]);
    kid.setPositionType("fixed");
    assert.deepEqual(kid.position, { x: 40, y: 40 });
  });
});

describe("widget layout - configuration", () => {
  test("config is accepted only by roots", () => {
    const { root } = screenRoot();
    assert.throws(() => new Widget(root, "bad", [0, 0, 1, 1], {}), {
      code: "WIDGET_INVALID_ARGUMENT",
      message: 'Widget "bad": config is only accepted by root widgets',
    });
    const child = new Widget(root, "child");
    assert.throws(() => child.configure({}), { code: "WIDGET_INVALID_ARGUMENT" });
  });

  test("invalid screen sizes are rejected", () => {
    const { root } = screenRoot();
    assert.throws(() => root.setScreenSize({ w: Number.NaN, h: 1 }), { code: "WIDGET_INVALID_CONFIG" });
  });

  test("isInBounds uses the resolved rect", () => {
    const { root } = screenRoot();
    const w = new Widget(root, "w", [10, 10, 20, 20]);
    assert.ok(w.isInBounds(10, 10));
    assert.ok(!w.isInBounds(30, 30));
  });
});
