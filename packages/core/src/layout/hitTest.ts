/**
 * packages/core/src/layout/hitTest.ts — Point picking against drawn commands.
 *
 * Why: Geometry alone does not say what the user sees. A node is hit only
 * where it actually drew something (its own geometry commands) and where
 * every clip on the way from it to the root lets the point through.
 *
 * Tie-break rule: when several nodes contain the point, the LAST one in
 * depth-first preorder traversal wins.
 *
 * Explicit direction:
 * - Children are traversed first-to-last (tree order).
 * - A node inside a later or deeper subtree overrides earlier matches, so a
 *   child always beats its parent and later siblings beat earlier ones.
 * - A node with isHitTestVisible=false cannot be picked, and neither can
 *   anything below it.
 */

import { NONE_HANDLE, isNoneHandle } from "../arena/handle.js";
import type { CommandKind, DrawingContext } from "../drawlist/types.js";
import type { Control, NodeHandle } from "../widgets/types.js";
import type { Widget } from "../widgets/widget.js";
import type { Vec2 } from "./types.js";

export type HitTestHost = Readonly<{
  getNode(handle: NodeHandle): Control;
  readonly drawingContext: DrawingContext;
}>;

function ownCommandContains(
  ctx: DrawingContext,
  widget: Widget,
  kind: CommandKind,
  point: Vec2,
): boolean {
  const commands = ctx.commands;
  const { start, end } = widget.commandRange;
  for (let i = start; i < end; i++) {
    const command = commands[i];
    if (command === undefined || command.kind !== kind) continue;
    if (ctx.isCommandContainsPoint(command, point)) return true;
  }
  return false;
}

/**
 * True when `point` is cut away by the clip of `handle` or of any ancestor.
 * Clip regions compose by intersection: the point must be inside one of the
 * node's own clip commands and not clipped for the parent. A node without
 * clip commands (never drawn) is fully clipped.
 */
export function isNodeClipped(host: HitTestHost, handle: NodeHandle, point: Vec2): boolean {
  let current = handle;
  for (;;) {
    const widget = host.getNode(current).widget;
    if (!widget.globalVisibility) return true;
    if (!ownCommandContains(host.drawingContext, widget, "clip", point)) return true;
    if (isNoneHandle(widget.parent)) return false;
    current = widget.parent;
  }
}

export function isNodeContainsPoint(host: HitTestHost, handle: NodeHandle, point: Vec2): boolean {
  const widget = host.getNode(handle).widget;
  if (!widget.globalVisibility) return false;
  if (isNodeClipped(host, handle, point)) return false;
  return ownCommandContains(host.drawingContext, widget, "geometry", point);
}

/** Topmost hit-test-visible node under `point` in the subtree at `root`, or NONE_HANDLE. */
export function pickNode(host: HitTestHost, root: NodeHandle, point: Vec2): NodeHandle {
  let winner: NodeHandle = NONE_HANDLE;
  const stack: NodeHandle[] = [root];

  while (stack.length > 0) {
    const handle = stack.pop();
    if (handle === undefined) continue;
    const widget = host.getNode(handle).widget;
    if (!widget.isHitTestVisible) continue;

    if (isNodeContainsPoint(host, handle, point)) {
      winner = handle;
    }

    for (let i = widget.children.length - 1; i >= 0; i--) {
      const child = widget.children[i];
      if (child !== undefined) stack.push(child);
    }
  }

  return winner;
}
