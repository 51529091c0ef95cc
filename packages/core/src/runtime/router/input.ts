/**
 * packages/core/src/runtime/router/input.ts — Raw input to routed UI events.
 *
 * Routing rules:
 *   - press: re-pick under the last known cursor position; the picked node
 *     also takes keyboard focus (or focus is cleared when nothing is hit)
 *   - release: goes to the node picked at press/move time
 *   - cursor move: mouseLeave to the previous pick (if it had the pointer),
 *     mouseEnter to the new pick (if it did not), then mouseMove
 *   - wheel: vertical line delta only, to the picked node
 *   - keys and characters: to the keyboard focus node, when there is one
 *
 * Every routed event names the affected node as its source. After each raw
 * event the previous pick is set to the current one so the next move can
 * detect enter/leave transitions.
 */

import { NONE_HANDLE, handleEquals, isNoneHandle, isSomeHandle } from "../../arena/handle.js";
import { type UiEvent, type UiEventPayload, createUiEvent } from "../../events.js";
import { ZERO_VEC2 } from "../../layout/geometry.js";
import type { Vec2 } from "../../layout/types.js";
import type { RawInputEvent } from "../../protocol/types.js";
import type { Control, NodeHandle } from "../../widgets/types.js";

/** Pointer and focus state owned by the interface and updated in place. */
export type InputRoutingState = {
  pickedNode: NodeHandle;
  prevPickedNode: NodeHandle;
  keyboardFocusNode: NodeHandle;
  mousePosition: Vec2;
};

export type InputRoutingHost = Readonly<{
  hitTest(point: Vec2): NodeHandle;
  tryGetNode(handle: NodeHandle): Control | null;
  enqueue(event: UiEvent): void;
}>;

export function createInputRoutingState(): InputRoutingState {
  return {
    pickedNode: NONE_HANDLE,
    prevPickedNode: NONE_HANDLE,
    keyboardFocusNode: NONE_HANDLE,
    mousePosition: ZERO_VEC2,
  };
}

function emit(host: InputRoutingHost, source: NodeHandle, payload: UiEventPayload): void {
  host.enqueue(createUiEvent(payload, source));
}

function routeCursorMoved(host: InputRoutingHost, state: InputRoutingState, position: Vec2): boolean {
  state.mousePosition = position;
  state.pickedNode = host.hitTest(position);

  if (!handleEquals(state.pickedNode, state.prevPickedNode) && isSomeHandle(state.prevPickedNode)) {
    const prev = host.tryGetNode(state.prevPickedNode);
    if (prev !== null && prev.widget.isMouseOver) {
      prev.widget.isMouseOver = false;
      emit(host, state.prevPickedNode, { kind: "mouseLeave" });
    }
  }

  if (isNoneHandle(state.pickedNode)) return false;

  const picked = host.tryGetNode(state.pickedNode);
  if (picked !== null && !picked.widget.isMouseOver) {
    picked.widget.isMouseOver = true;
    emit(host, state.pickedNode, { kind: "mouseEnter" });
  }
  emit(host, state.pickedNode, { kind: "mouseMove", pos: position });
  return true;
}

function routeRawEvent(
  host: InputRoutingHost,
  state: InputRoutingState,
  event: RawInputEvent,
): boolean {
  switch (event.kind) {
    case "mouseInput": {
      if (event.state === "pressed") {
        state.pickedNode = host.hitTest(state.mousePosition);
        state.keyboardFocusNode = state.pickedNode;
        if (isNoneHandle(state.pickedNode)) return false;
        emit(host, state.pickedNode, {
          kind: "mouseDown",
          pos: state.mousePosition,
          button: event.button,
        });
        return true;
      }
      if (isNoneHandle(state.pickedNode)) return false;
      emit(host, state.pickedNode, {
        kind: "mouseUp",
        pos: state.mousePosition,
        button: event.button,
      });
      return true;
    }
    case "cursorMoved":
      return routeCursorMoved(host, state, event.position);
    case "mouseWheel": {
      if (event.delta.kind !== "line" || isNoneHandle(state.pickedNode)) return false;
      emit(host, state.pickedNode, {
        kind: "mouseWheel",
        pos: state.mousePosition,
        amount: event.delta.y,
      });
      return true;
    }
    case "keyboardInput": {
      if (isNoneHandle(state.keyboardFocusNode) || event.keyCode === null) return false;
      emit(
        host,
        state.keyboardFocusNode,
        event.state === "pressed"
          ? { kind: "keyDown", code: event.keyCode }
          : { kind: "keyUp", code: event.keyCode },
      );
      return true;
    }
    case "receivedCharacter": {
      if (isNoneHandle(state.keyboardFocusNode)) return false;
      emit(host, state.keyboardFocusNode, { kind: "text", symbol: event.char });
      return true;
    }
    case "focused":
    case "resized":
      return false;
  }
}

/**
 * Translate one raw input event into zero or more queued UI events.
 * Returns true when at least one event was queued.
 */
export function routeInputEvent(
  host: InputRoutingHost,
  state: InputRoutingState,
  event: RawInputEvent,
): boolean {
  const consumed = routeRawEvent(host, state, event);
  state.prevPickedNode = state.pickedNode;
  return consumed;
}
