import { assert, describe, test } from "@gantry-ui/testkit";
import type { UserInterface } from "../../app/userInterface.js";
import { TestBox, createTestUi } from "../../testing/index.js";
import { Canvas } from "../../widgets/canvas.js";
import type { Control } from "../../widgets/types.js";
import { Widget, type WidgetProps } from "../../widgets/widget.js";
import { clampNonNegative, clampRange, normalizeAvailable, resolveExplicit } from "../engine/bounds.js";
import { thickness } from "../geometry.js";
import type { Vec2 } from "../types.js";

const SCREEN: Vec2 = { x: 800, y: 600 };

/** Reports a fixed content size and remembers what it was offered. */
class FixedContent implements Control {
  readonly widget: Widget;
  offered: Vec2 | null = null;

  constructor(
    private readonly content: Vec2,
    props: WidgetProps = {},
  ) {
    this.widget = new Widget(props);
  }

  measureOverride(_ui: UserInterface, availableSize: Vec2): Vec2 {
    this.offered = availableSize;
    return this.content;
  }
}

describe("bounds helpers", () => {
  test("clampNonNegative maps negatives and NaN to 0", () => {
    assert.equal(clampNonNegative(-3), 0);
    assert.equal(clampNonNegative(Number.NaN), 0);
    assert.equal(clampNonNegative(4.5), 4.5);
  });

  test("resolveExplicit treats non-finite as unset", () => {
    assert.equal(resolveExplicit(Number.NaN), null);
    assert.equal(resolveExplicit(Number.POSITIVE_INFINITY), null);
    assert.equal(resolveExplicit(-2), 0);
    assert.equal(resolveExplicit(12), 12);
  });

  test("clampRange lets min win over max and ignores NaN bounds", () => {
    assert.equal(clampRange(50, 10, 20), 20);
    assert.equal(clampRange(5, 10, 20), 10);
    assert.equal(clampRange(5, 30, 20), 30);
    assert.equal(clampRange(5, Number.NaN, Number.NaN), 5);
  });

  test("normalizeAvailable keeps infinity and zeroes NaN", () => {
    assert.equal(normalizeAvailable(Number.POSITIVE_INFINITY), Number.POSITIVE_INFINITY);
    assert.equal(normalizeAvailable(Number.NaN), 0);
    assert.equal(normalizeAvailable(-1), 0);
  });
});

describe("layout measure (deterministic)", () => {
  test("explicit size becomes the desired size", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new TestBox({ width: 100, height: 50 }));
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 100, y: 50 });
  });

  test("desired size includes margins", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new TestBox({ width: 100, height: 50, margin: thickness.uniform(10) }));
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 120, y: 70 });
  });

  test("desired size never exceeds the available size", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new TestBox({ width: 1000, height: 1000 }));
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 800, y: 600 });
  });

  test("maxSize clamps an explicit size", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new TestBox({ width: 500, maxSize: { x: 200, y: 1000 } }));
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 200, y: 0 });
  });

  test("minSize wins over a smaller maxSize and is reported once", () => {
    const { ui, warnings } = createTestUi();
    const h = ui.addNode(
      new TestBox({ minSize: { x: 300, y: 0 }, maxSize: { x: 200, y: Number.POSITIVE_INFINITY } }),
    );
    ui.update(SCREEN, 0);
    ui.update(SCREEN, 0);
    assert.equal(ui.getNode(h).widget.desiredSize.x, 300);
    assert.deepEqual(warnings, [
      "[gantry][layout] node#1:1 has minSize (300, 0) larger than maxSize (200, Infinity); minSize wins",
    ]);
  });

  test("negative explicit size clamps to zero and NaN means unset", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new FixedContent({ x: 40, y: 30 }, { width: -5, height: Number.NaN }));
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 0, y: 30 });
  });

  test("measureOverride is offered the space left after margins", () => {
    const { ui } = createTestUi();
    const content = new FixedContent(
      { x: 30, y: 20 },
      { margin: thickness.uniform(10), horizontalAlignment: "left", verticalAlignment: "top" },
    );
    const h = ui.addNode(content);
    ui.update(SCREEN, 0);
    assert.deepEqual(content.offered, { x: 780, y: 580 });
    assert.deepEqual(ui.getNode(h).widget.desiredSize, { x: 50, y: 40 });
  });

  test("a container desires the componentwise max of its children", () => {
    const { ui } = createTestUi();
    const panel = ui.addNode(new Canvas());
    ui.addNode(new TestBox({ width: 60, height: 10 }), panel);
    ui.addNode(new TestBox({ width: 20, height: 40 }), panel);
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(panel).widget.desiredSize, { x: 60, y: 40 });
  });

  test("collapsed and hidden children measure as zero", () => {
    const { ui } = createTestUi();
    const panel = ui.addNode(new Canvas());
    ui.addNode(new TestBox({ width: 60, height: 40 }), panel);
    const collapsed = ui.addNode(
      new TestBox({ width: 200, height: 200, visibility: "collapsed" }),
      panel,
    );
    const hidden = ui.addNode(new TestBox({ width: 300, height: 300, visibility: "hidden" }), panel);
    ui.update(SCREEN, 0);
    assert.deepEqual(ui.getNode(collapsed).widget.desiredSize, { x: 0, y: 0 });
    assert.deepEqual(ui.getNode(hidden).widget.desiredSize, { x: 0, y: 0 });
    assert.deepEqual(ui.getNode(panel).widget.desiredSize, { x: 60, y: 40 });
  });

  test("children of a collapsed node are not measured", () => {
    const { ui } = createTestUi();
    const panel = ui.addNode(new Canvas({ visibility: "collapsed" }));
    const inner = new FixedContent({ x: 10, y: 10 });
    ui.addNode(inner, panel);
    ui.update(SCREEN, 0);
    assert.equal(inner.offered, null);
    assert.equal(inner.widget.measureValid, false);
  });

  test("measure marks nodes valid", () => {
    const { ui } = createTestUi();
    const h = ui.addNode(new TestBox());
    assert.equal(ui.getNode(h).widget.measureValid, false);
    ui.update(SCREEN, 0);
    assert.equal(ui.getNode(h).widget.measureValid, true);
    assert.equal(ui.getNode(h).widget.arrangeValid, true);
  });
});
