/**
 * packages/core/src/layout/engine/layoutEngine.ts — Two-pass measure/arrange.
 *
 * measure: bottom-up. Each node reports the size it wants inside the space
 * its parent offers (desiredSize, margins included).
 * arrange: top-down. Each node receives a rect in its parent's local space
 * and settles on actualSize/actualLocalPosition from its alignment.
 *
 * Layout rules:
 *   - collapsed/hidden nodes measure as zero and are not arranged
 *   - explicit width/height (finite) beat measured and offered sizes
 *   - min/max clamp every computed size, min winning over max
 *   - stretch takes the whole offered span; other alignments shrink to the
 *     desired size and are offset inside the span
 *
 * The whole tree is measured and arranged from the root every frame.
 */

import type { UserInterface } from "../../app/userInterface.js";
import type { NodeHandle } from "../../widgets/types.js";
import type { Widget } from "../../widgets/widget.js";
import { ZERO_VEC2, thicknessExtent } from "../geometry.js";
import type { Rect, Vec2 } from "../types.js";
import { clampNonNegative, clampRange, normalizeAvailable, resolveExplicit } from "./bounds.js";

function checkMinMax(ui: UserInterface, widget: Widget): void {
  if (widget.minSize.x > widget.maxSize.x || widget.minSize.y > widget.maxSize.y) {
    ui.reportDevIssue(
      "layout",
      `minmax:${widget.handle.index}:${widget.handle.generation}`,
      `${ui.describeNode(widget.handle)} has minSize (${widget.minSize.x}, ${widget.minSize.y}) larger than maxSize (${widget.maxSize.x}, ${widget.maxSize.y}); minSize wins`,
    );
  }
}

/** Default measure step: componentwise max of all children's desired sizes. */
export function measureChildren(ui: UserInterface, widget: Widget, available: Vec2): Vec2 {
  let w = 0;
  let h = 0;
  for (const child of widget.children) {
    measureNode(ui, child, available);
    const desired = ui.getNode(child).widget.desiredSize;
    if (desired.x > w) w = desired.x;
    if (desired.y > h) h = desired.y;
  }
  return { x: w, y: h };
}

/** Default arrange step: every child gets the full final size at local origin. */
export function arrangeChildren(ui: UserInterface, widget: Widget, finalSize: Vec2): Vec2 {
  const finalRect: Rect = { x: 0, y: 0, w: finalSize.x, h: finalSize.y };
  for (const child of widget.children) {
    arrangeNode(ui, child, finalRect);
  }
  return finalSize;
}

export function measureNode(ui: UserInterface, handle: NodeHandle, availableSize: Vec2): void {
  const control = ui.getNode(handle);
  const widget = control.widget;

  if (widget.visibility !== "visible") {
    widget.desiredSize = ZERO_VEC2;
    widget.measureValid = true;
    return;
  }

  checkMinMax(ui, widget);

  const available: Vec2 = {
    x: normalizeAvailable(availableSize.x),
    y: normalizeAvailable(availableSize.y),
  };
  const margin = thicknessExtent(widget.margin);
  const explicitW = resolveExplicit(widget.width);
  const explicitH = resolveExplicit(widget.height);

  const sizeForChild: Vec2 = {
    x: clampRange(
      explicitW ?? clampNonNegative(available.x - margin.x),
      widget.minSize.x,
      widget.maxSize.x,
    ),
    y: clampRange(
      explicitH ?? clampNonNegative(available.y - margin.y),
      widget.minSize.y,
      widget.maxSize.y,
    ),
  };

  const measured = control.measureOverride
    ? control.measureOverride(ui, sizeForChild)
    : measureChildren(ui, widget, sizeForChild);

  const contentW = clampRange(
    explicitW ?? clampNonNegative(measured.x),
    widget.minSize.x,
    widget.maxSize.x,
  );
  const contentH = clampRange(
    explicitH ?? clampNonNegative(measured.y),
    widget.minSize.y,
    widget.maxSize.y,
  );

  // Never report more than was offered.
  widget.desiredSize = {
    x: clampNonNegative(Math.min(contentW + margin.x, available.x)),
    y: clampNonNegative(Math.min(contentH + margin.y, available.y)),
  };
  widget.measureValid = true;
}

export function arrangeNode(ui: UserInterface, handle: NodeHandle, finalRect: Rect): void {
  const control = ui.getNode(handle);
  const widget = control.widget;

  if (widget.visibility !== "visible") {
    widget.actualSize = ZERO_VEC2;
    widget.arrangeValid = true;
    return;
  }

  const rectW = clampNonNegative(finalRect.w);
  const rectH = clampNonNegative(finalRect.h);
  const margin = thicknessExtent(widget.margin);

  const withoutMarginW = clampNonNegative(rectW - margin.x);
  const withoutMarginH = clampNonNegative(rectH - margin.y);

  let sizeW = withoutMarginW;
  let sizeH = withoutMarginH;

  if (widget.horizontalAlignment !== "stretch") {
    sizeW = Math.min(sizeW, clampNonNegative(widget.desiredSize.x - margin.x));
  }
  if (widget.verticalAlignment !== "stretch") {
    sizeH = Math.min(sizeH, clampNonNegative(widget.desiredSize.y - margin.y));
  }

  sizeW = resolveExplicit(widget.width) ?? sizeW;
  sizeH = resolveExplicit(widget.height) ?? sizeH;

  const candidate: Vec2 = { x: sizeW, y: sizeH };
  const arranged = control.arrangeOverride
    ? control.arrangeOverride(ui, candidate)
    : arrangeChildren(ui, widget, candidate);

  const finalW = Math.min(clampNonNegative(arranged.x), rectW);
  const finalH = Math.min(clampNonNegative(arranged.y), rectH);

  let offsetX = 0;
  switch (widget.horizontalAlignment) {
    case "center":
    case "stretch":
      offsetX = (withoutMarginW - finalW) * 0.5;
      break;
    case "right":
      offsetX = withoutMarginW - finalW;
      break;
    case "left":
      break;
  }

  let offsetY = 0;
  switch (widget.verticalAlignment) {
    case "center":
    case "stretch":
      offsetY = (withoutMarginH - finalH) * 0.5;
      break;
    case "bottom":
      offsetY = withoutMarginH - finalH;
      break;
    case "top":
      break;
  }

  widget.actualSize = { x: finalW, y: finalH };
  widget.actualLocalPosition = {
    x: finalRect.x + widget.margin.left + offsetX,
    y: finalRect.y + widget.margin.top + offsetY,
  };
  widget.arrangeValid = true;
}

/** Measure and arrange the subtree at `root` against a screen of `screenSize`. */
export function layoutTree(ui: UserInterface, root: NodeHandle, screenSize: Vec2): void {
  measureNode(ui, root, screenSize);
  arrangeNode(ui, root, { x: 0, y: 0, w: screenSize.x, h: screenSize.y });
}
