import { assert, describe, test } from "@trellis-ui/testkit";
import type { LayoutDiagnosticCode } from "../../diagnostics/types.js";
import { type AnchorInput, NO_ANCHOR, alignComponents, resolveAnchoredRect } from "../anchor.js";
import type { Rect } from "../types.js";

const PARENT: Rect = { x: 0, y: 0, w: 400, h: 300 };
const INF = Number.POSITIVE_INFINITY;

function input(overrides: Partial<AnchorInput>): AnchorInput {
  return {
    position: { x: 0, y: 0 },
    size: { x: 100, y: 50 },
    min: { x: 0, y: 0 },
    max: { x: INF, y: INF },
    anchor: NO_ANCHOR,
    align: "topLeft",
    ...overrides,
  };
}

describe("layout/anchor - alignment", () => {
  test("topLeft measures from the parent origin", () => {
    const r = resolveAnchoredRect(input({ position: { x: 10, y: 20 } }), { x: 5, y: 5, w: 400, h: 300 });
    assert.deepEqual(r, { x: 15, y: 25, w: 100, h: 50 });
  });

  test("center places the widget center at the parent center plus the offset", () => {
    const r = resolveAnchoredRect(input({ position: { x: 10, y: 10 }, align: "center" }), PARENT);
    assert.deepEqual(r, { x: 160, y: 135, w: 100, h: 50 });
    assert.equal(r.x + r.w / 2, 200 + 10);
    assert.equal(r.y + r.h / 2, 150 + 10);
  });

  test("bottomRight measures inward from the far corner", () => {
    const r = resolveAnchoredRect(input({ position: { x: 10, y: 20 }, align: "bottomRight" }), PARENT);
    assert.deepEqual(r, { x: 290, y: 230, w: 100, h: 50 });
  });

  test("edge-centred values mix start, center and end", () => {
    assert.deepEqual(alignComponents("top"), { x: "center", y: "start" });
    assert.deepEqual(alignComponents("right"), { x: "end", y: "center" });
    const r = resolveAnchoredRect(input({ align: "bottom" }), PARENT);
    assert.deepEqual(r, { x: 150, y: 250, w: 100, h: 50 });
  });
});

describe("layout/anchor - edges", () => {
  test("a single anchored edge overrides alignment on that axis", () => {
    const r = resolveAnchoredRect(
      input({
        position: { x: 30, y: 40 },
        anchor: { left: false, top: false, right: true, bottom: true },
        align: "topLeft",
      }),
      PARENT,
    );
    assert.deepEqual(r, { x: 270, y: 210, w: 100, h: 50 });
  });

  test("anchoring both horizontal edges stretches between the margins", () => {
    const r = resolveAnchoredRect(
      input({
        position: { x: 20, y: 10 },
        size: { x: 30, y: 50 },
        anchor: { left: true, top: true, right: true, bottom: false },
      }),
      PARENT,
    );
    assert.deepEqual(r, { x: 20, y: 10, w: 350, h: 50 });
  });

  test("stretched size is clamped by min and max", () => {
    const r = resolveAnchoredRect(
      input({
        size: { x: 0, y: 0 },
        max: { x: 120, y: INF },
        min: { x: 0, y: 295 },
        anchor: { left: true, top: true, right: true, bottom: true },
        position: { x: 0, y: 10 },
      }),
      PARENT,
    );
    assert.deepEqual(r, { x: 0, y: 10, w: 120, h: 295 });
  });

  test("margins wider than the parent collapse to 0 and are reported", () => {
    const codes: LayoutDiagnosticCode[] = [];
    const r = resolveAnchoredRect(
      input({
        position: { x: 300, y: 0 },
        size: { x: 200, y: 50 },
        anchor: { left: true, top: false, right: true, bottom: false },
      }),
      PARENT,
      (code) => codes.push(code),
    );
    assert.deepEqual(r, { x: 300, y: 0, w: 0, h: 50 });
    assert.deepEqual(codes, ["anchor.marginsExceedReference"]);
  });

  test("fixedWidth keeps the declared width on a stretched axis", () => {
    const r = resolveAnchoredRect(
      input({
        position: { x: 20, y: 0 },
        anchor: { left: true, top: false, right: true, bottom: false },
        fixedWidth: true,
      }),
      PARENT,
    );
    assert.deepEqual(r, { x: 20, y: 0, w: 100, h: 50 });
  });

  test("size is clamped before end placement", () => {
    const r = resolveAnchoredRect(
      input({ size: { x: 100, y: 50 }, max: { x: 60, y: INF }, align: "topRight" }),
      PARENT,
    );
    assert.deepEqual(r, { x: 340, y: 0, w: 60, h: 50 });
  });

  test("negative sizes resolve to 0", () => {
    const r = resolveAnchoredRect(input({ size: { x: -10, y: 50 } }), PARENT);
    assert.equal(r.w, 0);
  });
});
