import { assert, describe, test } from "@gantry-ui/testkit";
import { NONE_HANDLE, formatHandle } from "../../arena/handle.js";
import type { UserInterface } from "../../app/userInterface.js";
import { TestBox, type TestBoxOptions, createTestUi, runFrame } from "../../testing/index.js";
import type { WidgetProps } from "../../widgets/widget.js";
import { isNodeClipped, isNodeContainsPoint, pickNode } from "../hitTest.js";
import type { Vec2 } from "../types.js";

const SCREEN: Vec2 = { x: 800, y: 600 };

function box(props: TestBoxOptions = {}): TestBox {
  return new TestBox({ horizontalAlignment: "left", verticalAlignment: "top", ...props });
}

function pick(ui: UserInterface, x: number, y: number): string {
  return formatHandle(ui.hitTest({ x, y }));
}

/**
 * Parent at (0,0,100,100) with a child at (50,50,100,100) that overflows the
 * parent on the right and bottom.
 */
function overflowScene(childProps: WidgetProps = {}, parentProps: WidgetProps = {}) {
  const { ui } = createTestUi();
  const parent = ui.addNode(box({ width: 100, height: 100, ...parentProps }));
  const child = ui.addNode(
    box({
      width: 100,
      height: 100,
      margin: { left: 50, top: 50, right: 0, bottom: 0 },
      ...childProps,
    }),
    parent,
  );
  runFrame(ui, SCREEN);
  return { ui, parent, child };
}

describe("hit testing (deterministic)", () => {
  test("overflow scene lays out as expected", () => {
    const { ui, child } = overflowScene();
    assert.deepEqual(ui.getNode(child).widget.getScreenBounds(), { x: 50, y: 50, w: 100, h: 100 });
  });

  test("a point on a node's geometry picks it", () => {
    const { ui, parent } = overflowScene();
    assert.equal(pick(ui, 25, 25), formatHandle(parent));
  });

  test("a child beats its parent where both contain the point", () => {
    const { ui, child } = overflowScene();
    assert.equal(pick(ui, 75, 75), formatHandle(child));
  });

  test("a point outside every node's geometry picks nothing", () => {
    const { ui } = overflowScene();
    assert.equal(pick(ui, 400, 400), "none");
  });

  test("the part of a child outside its parent's clip is not hittable", () => {
    const { ui, child } = overflowScene();
    const point = { x: 120, y: 120 };
    assert.equal(isNodeClipped(ui, child, point), true);
    assert.equal(isNodeContainsPoint(ui, child, point), false);
    assert.equal(pick(ui, 120, 120), "none");
  });

  test("clip rects are inflated so an exact edge still hits", () => {
    const { ui, parent } = overflowScene();
    assert.equal(isNodeClipped(ui, parent, { x: 100.5, y: 50 }), false);
    assert.equal(pick(ui, 99.99, 10), formatHandle(parent));
  });

  test("isHitTestVisible=false prunes the node and its subtree", () => {
    const hiddenChild = overflowScene({ isHitTestVisible: false });
    assert.equal(pick(hiddenChild.ui, 75, 75), formatHandle(hiddenChild.parent));

    const hiddenParent = overflowScene({}, { isHitTestVisible: false });
    assert.equal(pick(hiddenParent.ui, 75, 75), "none");
    assert.equal(pick(hiddenParent.ui, 25, 25), "none");
  });

  test("the later of two overlapping siblings wins", () => {
    const { ui } = createTestUi();
    ui.addNode(box({ width: 100, height: 100 }));
    const second = ui.addNode(box({ width: 100, height: 100 }));
    runFrame(ui, SCREEN);
    assert.equal(pick(ui, 10, 10), formatHandle(second));
  });

  test("hidden and collapsed nodes are never hit", () => {
    const { ui } = createTestUi();
    const visible = ui.addNode(box({ width: 100, height: 100 }));
    ui.addNode(box({ width: 100, height: 100, visibility: "hidden" }));
    ui.addNode(box({ width: 100, height: 100, visibility: "collapsed" }));
    runFrame(ui, SCREEN);
    assert.equal(pick(ui, 10, 10), formatHandle(visible));
  });

  test("a collapsed child has zero size and its region belongs to the parent", () => {
    const { ui } = createTestUi();
    const parent = ui.addNode(box({ width: 200, height: 200 }));
    const child = ui.addNode(box({ width: 50, height: 50, visibility: "collapsed" }), parent);
    runFrame(ui, SCREEN);
    assert.deepEqual(ui.getNode(child).widget.desiredSize, { x: 0, y: 0 });
    assert.deepEqual(ui.getNode(child).widget.actualSize, { x: 0, y: 0 });
    assert.equal(pick(ui, 25, 25), formatHandle(parent));
  });

  test("a node that drew no geometry cannot be hit", () => {
    const { ui } = createTestUi();
    const under = ui.addNode(box({ width: 100, height: 100 }));
    ui.addNode(box({ width: 100, height: 100, fill: false }));
    runFrame(ui, SCREEN);
    assert.equal(pick(ui, 10, 10), formatHandle(under));
  });

  test("nodes are not hittable before the first draw", () => {
    const { ui } = createTestUi();
    ui.addNode(box({ width: 100, height: 100 }));
    ui.update(SCREEN, 0);
    assert.equal(pick(ui, 10, 10), "none");
  });

  test("capture overrides the geometric pick", () => {
    const { ui, parent, child } = overflowScene();
    assert.equal(ui.captureMouse(parent), true);
    assert.equal(pick(ui, 75, 75), formatHandle(parent));
    assert.equal(pick(ui, 700, 500), formatHandle(parent));
    ui.releaseMouseCapture();
    assert.equal(pick(ui, 75, 75), formatHandle(child));
  });

  test("pickNode can start below the root", () => {
    const { ui, child } = overflowScene();
    assert.equal(formatHandle(pickNode(ui, child, { x: 25, y: 25 })), "none");
    assert.equal(formatHandle(pickNode(ui, child, { x: 75, y: 75 })), formatHandle(child));
    assert.equal(formatHandle(pickNode(ui, ui.rootCanvas, { x: 500, y: 500 })), formatHandle(NONE_HANDLE));
  });
});
