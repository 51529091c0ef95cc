/**
 * packages/core/src/events.ts — Routed UI event types.
 *
 * A UiEvent is what the router queues and broadcasts. `source` is the node the
 * event originated from (for input events: the node under the pointer or the
 * keyboard focus node). `target` is NONE_HANDLE unless the sender addressed a
 * specific node. Handlers may flip `handled`; the router never reads it.
 */

import { NONE_HANDLE } from "./arena/handle.js";
import type { Vec2 } from "./layout/types.js";
import type { NodeHandle } from "./widgets/types.js";

export type MouseButton = "left" | "right" | "middle" | "back" | "forward";

/** Physical key name, e.g. "KeyA", "Enter", "ArrowLeft". */
export type KeyCode = string;

export type UiEventPayload =
  | Readonly<{ kind: "mouseDown"; pos: Vec2; button: MouseButton }>
  | Readonly<{ kind: "mouseUp"; pos: Vec2; button: MouseButton }>
  | Readonly<{ kind: "mouseMove"; pos: Vec2 }>
  | Readonly<{ kind: "mouseEnter" }>
  | Readonly<{ kind: "mouseLeave" }>
  | Readonly<{ kind: "mouseWheel"; pos: Vec2; amount: number }>
  | Readonly<{ kind: "keyDown"; code: KeyCode }>
  | Readonly<{ kind: "keyUp"; code: KeyCode }>
  | Readonly<{ kind: "text"; symbol: string }>
  | Readonly<{
      /**
       * Application-defined event. `tag` names it (e.g. "window.close");
       * `payload` is opaque to the core.
       */
      kind: "custom";
      tag: string;
      payload: unknown;
    }>;

export type UiEventKind = UiEventPayload["kind"];

export type UiEvent = {
  readonly payload: UiEventPayload;
  source: NodeHandle;
  readonly target: NodeHandle;
  handled: boolean;
};

/** Event posted by a node before the router stamps its source. */
export type UiEventDraft = Readonly<{
  payload: UiEventPayload;
  target: NodeHandle;
}>;

export function createUiEvent(payload: UiEventPayload, source: NodeHandle): UiEvent {
  return { payload, source, target: NONE_HANDLE, handled: false };
}

/** Event addressed to one node, e.g. a request to close a window. */
export function targetedEvent(target: NodeHandle, payload: UiEventPayload): UiEvent {
  return { payload, source: NONE_HANDLE, target, handled: false };
}

export function customEvent(tag: string, payload?: unknown): UiEventPayload {
  return { kind: "custom", tag, payload };
}
