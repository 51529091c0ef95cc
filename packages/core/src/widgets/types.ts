/**
 * packages/core/src/widgets/types.ts — Control contract shared by every node variant.
 *
 * A control is any object exposing a `widget` (the base state record) plus
 * whichever optional hooks it needs. Missing hooks fall back to the default
 * behaviors of the layout engine, drawing pass and router.
 */

import type { Handle } from "../arena/handle.js";
import type { UserInterface } from "../app/userInterface.js";
import type { DrawingContext } from "../drawlist/types.js";
import type { UiEvent } from "../events.js";
import type { Vec2 } from "../layout/types.js";
import type { Widget } from "./widget.js";

export type NodeHandle = Handle<Control>;

export interface Control {
  readonly widget: Widget;

  /**
   * Compute the desired content size for `availableSize` (margins already
   * removed). Implementations measure their children through `ui.measureNode`.
   */
  measureOverride?(ui: UserInterface, availableSize: Vec2): Vec2;

  /** Place children inside `finalSize` and return the size actually used. */
  arrangeOverride?(ui: UserInterface, finalSize: Vec2): Vec2;

  draw?(ctx: DrawingContext): void;

  update?(dt: number): void;

  /**
   * React to a routed event.
   *
   * The node is outside the arena while this runs: borrowing `selfHandle`
   * through `ui` fails. Use `selfHandle` only for comparisons and capture.
   */
  handleEvent?(selfHandle: NodeHandle, ui: UserInterface, event: UiEvent): void;

  getProperty?(name: string): unknown;

  setProperty?(name: string, value: unknown): void;
}
