/**
 * packages/core/src/renderer/drawTree.ts — Draw traversal and command index bookkeeping.
 *
 * Pre-order walk from the root. Each visible node:
 *   1. commits its screen bounds (inflated by `clipInflation`) as the active clip
 *   2. emits its own commands through its draw hook
 *   3. records [start, end) of the commands it emitted, clip included
 *   4. recurses into its children one nesting level deeper
 *   5. reverts the clip to its parent's
 *
 * Globally invisible nodes are skipped with their subtree, so they keep an
 * empty command range and can never be hit.
 */

import type { DrawingContext } from "../drawlist/types.js";
import { inflateRect } from "../layout/geometry.js";
import type { Control, NodeHandle } from "../widgets/types.js";
import { EMPTY_COMMAND_RANGE } from "../widgets/widget.js";

export type DrawHost = Readonly<{
  getNode(handle: NodeHandle): Control;
}>;

export const ROOT_NESTING = 1;

export function resetCommandRanges(controls: Iterable<Control>): void {
  for (const control of controls) {
    control.widget.commandRange = EMPTY_COMMAND_RANGE;
  }
}

export function drawNode(
  host: DrawHost,
  ctx: DrawingContext,
  handle: NodeHandle,
  nesting: number,
  clipInflation: number,
): void {
  const control = host.getNode(handle);
  const widget = control.widget;
  if (!widget.globalVisibility) return;

  const start = ctx.commands.length;
  ctx.setNesting(nesting);
  ctx.commitClipRect(inflateRect(widget.getScreenBounds(), clipInflation, clipInflation));

  try {
    control.draw?.(ctx);

    widget.commandRange = { start, end: ctx.commands.length };

    for (const child of widget.children) {
      drawNode(host, ctx, child, nesting + 1, clipInflation);
    }
  } finally {
    ctx.revertClipRect();
  }
}

export function drawTree(
  host: DrawHost,
  ctx: DrawingContext,
  root: NodeHandle,
  clipInflation: number,
): void {
  drawNode(host, ctx, root, ROOT_NESTING, clipInflation);
}
