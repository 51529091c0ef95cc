/**
 * packages/core/src/layout/propagate.ts — Screen position and global visibility.
 *
 * Runs top-down after arrange. A node's screen position is its parent's
 * screen position plus its own local position; it is globally visible only
 * if it is locally visible and its parent is globally visible. The root uses
 * the origin and `true` as its implicit parent values.
 */

import { isSomeHandle } from "../arena/handle.js";
import type { NodeHandle } from "../widgets/types.js";
import type { Widget } from "../widgets/widget.js";
import { ZERO_VEC2, addVec2 } from "./geometry.js";

export type NodeLookup = Readonly<{
  getNode(handle: NodeHandle): Readonly<{ widget: Widget }>;
}>;

export function propagateTransforms(host: NodeLookup, root: NodeHandle): void {
  const stack: NodeHandle[] = [root];
  let isRoot = true;

  while (stack.length > 0) {
    const handle = stack.pop();
    if (handle === undefined) continue;
    const widget = host.getNode(handle).widget;

    let parentPosition = ZERO_VEC2;
    let parentVisible = true;
    if (!isRoot && isSomeHandle(widget.parent)) {
      const parent = host.getNode(widget.parent).widget;
      parentPosition = parent.screenPosition;
      parentVisible = parent.globalVisibility;
    }

    widget.screenPosition = addVec2(parentPosition, widget.actualLocalPosition);
    widget.globalVisibility = widget.visibility === "visible" && parentVisible;
    isRoot = false;

    // Reverse push keeps pre-order (first child processed first).
    for (let i = widget.children.length - 1; i >= 0; i--) {
      const child = widget.children[i];
      if (child !== undefined) stack.push(child);
    }
  }
}
