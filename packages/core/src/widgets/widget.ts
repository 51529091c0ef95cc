/**
 * packages/core/src/widgets/widget.ts — Base state embedded in every control.
 *
 * Inputs (set by the application or by style setters): explicit size, min/max
 * size, margin, alignment, visibility, hit-test eligibility.
 * Outputs (written by the frame pipeline): desired size (measure), actual size
 * and local position (arrange), screen position and global visibility
 * (propagation), command range (draw).
 *
 * `parent`/`children` are maintained by UserInterface.linkNodes/unlinkNode;
 * editing them directly breaks the parent/child invariant.
 */

import { NONE_HANDLE } from "../arena/handle.js";
import type { UiEventDraft, UiEventPayload } from "../events.js";
import { ZERO_VEC2, thickness } from "../layout/geometry.js";
import type {
  HorizontalAlignment,
  Rect,
  Thickness,
  Vec2,
  VerticalAlignment,
  Visibility,
} from "../layout/types.js";
import type { Style } from "./style.js";
import type { NodeHandle } from "./types.js";

/** Half-open range of draw-command indices, `end` exclusive. */
export type CommandRange = Readonly<{ start: number; end: number }>;

export const EMPTY_COMMAND_RANGE: CommandRange = Object.freeze({ start: 0, end: 0 });

const UNBOUNDED: Vec2 = Object.freeze({ x: Number.POSITIVE_INFINITY, y: Number.POSITIVE_INFINITY });

export type WidgetProps = Readonly<{
  name?: string;
  /** NaN (the default) leaves the axis to measurement. */
  width?: number;
  height?: number;
  minSize?: Vec2;
  maxSize?: Vec2;
  margin?: Thickness;
  horizontalAlignment?: HorizontalAlignment;
  verticalAlignment?: VerticalAlignment;
  visibility?: Visibility;
  isHitTestVisible?: boolean;
  /** Existing nodes to re-link under this one when it is added. */
  children?: readonly NodeHandle[];
}>;

export class Widget {
  name: string;
  handle: NodeHandle = NONE_HANDLE;
  parent: NodeHandle = NONE_HANDLE;
  children: NodeHandle[];

  width: number;
  height: number;
  minSize: Vec2;
  maxSize: Vec2;
  margin: Thickness;
  horizontalAlignment: HorizontalAlignment;
  verticalAlignment: VerticalAlignment;

  desiredSize: Vec2 = ZERO_VEC2;
  actualSize: Vec2 = ZERO_VEC2;
  actualLocalPosition: Vec2 = ZERO_VEC2;
  screenPosition: Vec2 = ZERO_VEC2;

  visibility: Visibility;
  globalVisibility = true;

  isHitTestVisible: boolean;
  isMouseOver = false;

  measureValid = false;
  arrangeValid = false;

  commandRange: CommandRange = EMPTY_COMMAND_RANGE;
  style: Style | null = null;

  private readonly outgoing: UiEventDraft[] = [];

  constructor(props: WidgetProps = {}) {
    this.name = props.name ?? "";
    this.width = props.width ?? Number.NaN;
    this.height = props.height ?? Number.NaN;
    this.minSize = props.minSize ?? ZERO_VEC2;
    this.maxSize = props.maxSize ?? UNBOUNDED;
    this.margin = props.margin ?? thickness.zero();
    this.horizontalAlignment = props.horizontalAlignment ?? "stretch";
    this.verticalAlignment = props.verticalAlignment ?? "stretch";
    this.visibility = props.visibility ?? "visible";
    this.isHitTestVisible = props.isHitTestVisible ?? true;
    this.children = props.children ? [...props.children] : [];
  }

  getScreenBounds(): Rect {
    return {
      x: this.screenPosition.x,
      y: this.screenPosition.y,
      w: this.actualSize.x,
      h: this.actualSize.y,
    };
  }

  /** Queue an event; the router stamps this node as its source on the next poll. */
  postEvent(payload: UiEventPayload, target: NodeHandle = NONE_HANDLE): void {
    this.outgoing.push({ payload, target });
  }

  /** Remove and return every queued outgoing event, oldest first. */
  drainEvents(): UiEventDraft[] {
    return this.outgoing.splice(0, this.outgoing.length);
  }

  get pendingEventCount(): number {
    return this.outgoing.length;
  }
}
