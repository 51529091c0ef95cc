/**
 * @gantry-ui/core
 *
 * Retained-mode UI core: a generational node arena, measure/arrange layout,
 * a drawing-command index used for hit testing, and an event router with
 * take-out dispatch. Rendering and platform windowing are left to the host.
 */

// =============================================================================
// Errors
// =============================================================================

export { UiCoreError, isUiCoreError, type UiCoreErrorCode } from "./errors.js";

// =============================================================================
// Arena
// =============================================================================

export {
  NONE_HANDLE,
  formatHandle,
  handleEquals,
  isNoneHandle,
  isSomeHandle,
  makeHandle,
  type Handle,
} from "./arena/handle.js";
export { Pool } from "./arena/pool.js";

// =============================================================================
// Geometry and layout
// =============================================================================

export type {
  HorizontalAlignment,
  Rect,
  Thickness,
  Vec2,
  VerticalAlignment,
  Visibility,
} from "./layout/types.js";
export {
  ZERO_VEC2,
  addVec2,
  boolToVisibility,
  inflateRect,
  intersectRect,
  rect,
  rectContains,
  thickness,
  thicknessExtent,
  vec2,
} from "./layout/geometry.js";
export {
  arrangeChildren,
  arrangeNode,
  layoutTree,
  measureChildren,
  measureNode,
} from "./layout/engine/layoutEngine.js";
export { propagateTransforms, type NodeLookup } from "./layout/propagate.js";
export {
  isNodeClipped,
  isNodeContainsPoint,
  pickNode,
  type HitTestHost,
} from "./layout/hitTest.js";

// =============================================================================
// Drawing
// =============================================================================

export type {
  Color,
  CommandKind,
  DrawCommand,
  DrawingContext,
  TextureRef,
} from "./drawlist/types.js";
export { COLOR_TRANSPARENT, COLOR_WHITE, CommandBuffer, rgba } from "./drawlist/drawingContext.js";
export {
  ROOT_NESTING,
  drawNode,
  drawTree,
  resetCommandRanges,
  type DrawHost,
} from "./renderer/drawTree.js";

// =============================================================================
// Widgets
// =============================================================================

export type { Control, NodeHandle } from "./widgets/types.js";
export {
  EMPTY_COMMAND_RANGE,
  Widget,
  type CommandRange,
  type WidgetProps,
} from "./widgets/widget.js";
export { Canvas } from "./widgets/canvas.js";
export {
  applyStyle,
  createStyle,
  setter,
  styleChain,
  type Style,
  type StyleInput,
  type StyleSetter,
} from "./widgets/style.js";

// =============================================================================
// Events and input
// =============================================================================

export {
  createUiEvent,
  customEvent,
  targetedEvent,
  type KeyCode,
  type MouseButton,
  type UiEvent,
  type UiEventDraft,
  type UiEventKind,
  type UiEventPayload,
} from "./events.js";
export type {
  ElementState,
  MouseScrollDelta,
  RawInputEvent,
  RawInputKind,
} from "./protocol/types.js";
export {
  createInputRoutingState,
  routeInputEvent,
  type InputRoutingHost,
  type InputRoutingState,
} from "./runtime/router/input.js";

// =============================================================================
// UserInterface
// =============================================================================

export {
  UserInterface,
  createUserInterface,
  type NodePredicate,
} from "./app/userInterface.js";
export { DEFAULT_UI_CONFIG, resolveUiConfig } from "./app/config.js";
export type { ResolvedUiConfig, UiConfig, UiWarnSink } from "./app/types.js";
