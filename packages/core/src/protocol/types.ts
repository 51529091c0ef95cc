/**
 * packages/core/src/protocol/types.ts — Raw platform input events.
 *
 * This is the contract between the host's window/input source and
 * UserInterface.processInputEvent. Hosts translate whatever their platform
 * delivers into these records; kinds the core does not route (focus changes,
 * resizes) are accepted and ignored.
 */

import type { KeyCode, MouseButton } from "../events.js";
import type { Vec2 } from "../layout/types.js";

export type ElementState = "pressed" | "released";

/**
 * Scroll amount.
 *   - line: discrete wheel notches (positive y = away from the user)
 *   - pixel: touchpad-style pixel delta; not routed by the core
 */
export type MouseScrollDelta =
  | Readonly<{ kind: "line"; x: number; y: number }>
  | Readonly<{ kind: "pixel"; x: number; y: number }>;

export type RawInputEvent =
  | Readonly<{ kind: "mouseInput"; button: MouseButton; state: ElementState }>
  | Readonly<{ kind: "cursorMoved"; position: Vec2 }>
  | Readonly<{ kind: "mouseWheel"; delta: MouseScrollDelta }>
  | Readonly<{
      kind: "keyboardInput";
      state: ElementState;
      /** null when the platform key has no portable code. */
      keyCode: KeyCode | null;
    }>
  | Readonly<{ kind: "receivedCharacter"; char: string }>
  | Readonly<{ kind: "focused"; focused: boolean }>
  | Readonly<{ kind: "resized"; width: number; height: number }>;

export type RawInputKind = RawInputEvent["kind"];
