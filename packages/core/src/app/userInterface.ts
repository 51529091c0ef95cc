/**
 * packages/core/src/app/userInterface.ts — The interface instance: arena, frame pipeline, router.
 *
 * Frame protocol (host calls, in order, once per frame):
 *   1. update(screenSize, dt): measure → arrange → propagate → per-node update
 *   2. draw(): draw traversal; returns the command list for the renderer
 *   3. pollUiEvent(): dispatch one queued event (call repeatedly to drain)
 *   4. processInputEvent(raw): on every raw input event from the platform
 *
 * Dispatch isolation: while an event is broadcast, each node is taken out of
 * the arena for the duration of its own handler. Handlers may look up and
 * mutate any other node, but borrowing their own handle fails. Frame
 * operations invoked from a handler fail with UI_REENTRANT_CALL.
 */

import {
  type Handle,
  NONE_HANDLE,
  handleEquals,
  isNoneHandle,
  isSomeHandle,
} from "../arena/handle.js";
import { Pool } from "../arena/pool.js";
import { COLOR_WHITE, CommandBuffer } from "../drawlist/drawingContext.js";
import type { DrawingContext } from "../drawlist/types.js";
import { UiCoreError } from "../errors.js";
import type { UiEvent } from "../events.js";
import { arrangeNode, layoutTree, measureNode } from "../layout/engine/layoutEngine.js";
import { pickNode } from "../layout/hitTest.js";
import { propagateTransforms } from "../layout/propagate.js";
import type { Rect, Vec2 } from "../layout/types.js";
import type { RawInputEvent } from "../protocol/types.js";
import { drawTree, resetCommandRanges } from "../renderer/drawTree.js";
import {
  type InputRoutingState,
  createInputRoutingState,
  routeInputEvent,
} from "../runtime/router/input.js";
import { Canvas } from "../widgets/canvas.js";
import { type Style, applyStyle } from "../widgets/style.js";
import type { Control, NodeHandle } from "../widgets/types.js";
import { resolveUiConfig } from "./config.js";
import {
  type DevWarningArea,
  type DevWarningContext,
  describeWidget,
  warnDevIssue,
} from "./devWarnings.js";
import type { ResolvedUiConfig, UiConfig } from "./types.js";

export type NodePredicate = (control: Control) => boolean;

type DispatchSlot = Readonly<{ handle: NodeHandle; control: Control }>;

function errorDetail(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

export class UserInterface {
  private readonly pool = new Pool<Control>();
  private readonly commandBuffer = new CommandBuffer();
  private readonly config: ResolvedUiConfig;
  private readonly devWarnings: DevWarningContext;
  private readonly root: NodeHandle;
  private readonly input: InputRoutingState = createInputRoutingState();
  private readonly queue: UiEvent[] = [];
  private captured: NodeHandle = NONE_HANDLE;
  private visualDebug: boolean;
  private dispatching: DispatchSlot | null = null;

  constructor(config?: UiConfig) {
    this.config = resolveUiConfig(config);
    this.visualDebug = this.config.visualDebug;
    this.devWarnings = {
      devMode: this.config.devMode,
      warned: new Set<string>(),
      warn: this.config.warn,
    };
    const rootCanvas = new Canvas({ name: "root" });
    this.root = this.pool.spawn(rootCanvas);
    rootCanvas.widget.handle = this.root;
  }

  /* ========== Accessors ========== */

  get rootCanvas(): NodeHandle {
    return this.root;
  }

  get pickedNode(): NodeHandle {
    return this.input.pickedNode;
  }

  get keyboardFocusNode(): NodeHandle {
    return this.input.keyboardFocusNode;
  }

  get capturedNode(): NodeHandle {
    return this.captured;
  }

  get mousePosition(): Vec2 {
    return this.input.mousePosition;
  }

  get drawingContext(): DrawingContext {
    return this.commandBuffer;
  }

  /** Live nodes, taken-out ones excluded. */
  get nodeCount(): number {
    return this.pool.aliveCount;
  }

  /** Events waiting in the shared queue (node outboxes not included). */
  get queuedEventCount(): number {
    return this.queue.length;
  }

  get isVisualDebug(): boolean {
    return this.visualDebug;
  }

  setVisualDebug(enabled: boolean): void {
    this.visualDebug = enabled;
  }

  /* ========== Node access ========== */

  getNode(handle: NodeHandle): Control {
    return this.pool.borrow(handle);
  }

  tryGetNode(handle: NodeHandle): Control | null {
    return this.pool.tryBorrow(handle);
  }

  isValidHandle(handle: NodeHandle): boolean {
    return this.pool.isValid(handle);
  }

  /** Live `[handle, control]` pairs in arena order. */
  nodes(): IterableIterator<[NodeHandle, Control]> {
    return this.pool.entries();
  }

  /* ========== Tree structure ========== */

  /**
   * Spawn `control` into the arena and link it under `parent` (default: the
   * root canvas). Handles already listed in `control.widget.children` are
   * re-linked under the new node, in order.
   */
  addNode<T extends Control>(control: T, parent: NodeHandle = this.root): NodeHandle {
    const widget = control.widget;
    if (isSomeHandle(widget.handle)) {
      throw new UiCoreError(
        "UI_INVALID_TREE",
        `addNode: control is already attached as ${this.describeNode(widget.handle)}`,
      );
    }
    // Stale parent or children fail here, before anything is spawned.
    this.structuralNode(parent);
    for (const child of widget.children) {
      this.structuralNode(child);
      if (
        handleEquals(child, this.root) ||
        handleEquals(child, parent) ||
        this.isNodeChildOf(parent, child)
      ) {
        throw new UiCoreError(
          "UI_INVALID_TREE",
          `addNode: listed child ${this.describeNode(child)} is the root, or is or contains ${this.describeNode(parent)}`,
        );
      }
    }
    const children = widget.children.splice(0, widget.children.length);
    const handle = this.pool.spawn(control);
    widget.handle = handle;
    this.linkNodes(handle, parent);
    for (const child of children) {
      this.linkNodes(child, handle);
    }
    return handle;
  }

  /**
   * Unlink `handle` and free it together with its whole subtree. Capture,
   * focus and pick state pointing into the subtree is cleared.
   */
  removeNode(handle: NodeHandle): void {
    if (handleEquals(handle, this.root)) {
      throw new UiCoreError("UI_INVALID_TREE", "removeNode: the root canvas cannot be removed");
    }
    const doomed: NodeHandle[] = [];
    const stack: NodeHandle[] = [handle];
    while (stack.length > 0) {
      const h = stack.pop();
      if (h === undefined) continue;
      if (this.isDispatchingSelf(h)) {
        throw new UiCoreError(
          "UI_INVALID_TREE",
          `removeNode: ${this.describeNode(handle)} contains the node handling the current event`,
        );
      }
      doomed.push(h);
      for (const child of this.getNode(h).widget.children) stack.push(child);
    }

    this.unlinkNode(handle);
    for (const h of doomed) {
      const control = this.pool.free(h);
      control.widget.handle = NONE_HANDLE;
      control.widget.parent = NONE_HANDLE;
      control.widget.children.length = 0;
      this.forgetHandle(h);
    }
  }

  /** Make `child` the last child of `parent`, detaching it from its old parent first. */
  linkNodes(child: NodeHandle, parent: NodeHandle): void {
    if (handleEquals(child, this.root)) {
      throw new UiCoreError("UI_INVALID_TREE", "linkNodes: the root canvas cannot be reparented");
    }
    if (handleEquals(child, parent)) {
      throw new UiCoreError(
        "UI_INVALID_TREE",
        `linkNodes: ${this.describeNode(child)} cannot be its own parent`,
      );
    }
    if (this.isNodeChildOf(parent, child)) {
      throw new UiCoreError(
        "UI_INVALID_TREE",
        `linkNodes: ${this.describeNode(parent)} is a descendant of ${this.describeNode(child)}`,
      );
    }
    const parentWidget = this.structuralNode(parent).widget;
    this.unlinkNode(child);
    this.structuralNode(child).widget.parent = parent;
    parentWidget.children.push(child);
  }

  /** Detach `handle` from its parent; it keeps its own children. */
  unlinkNode(handle: NodeHandle): void {
    const widget = this.structuralNode(handle).widget;
    const parentHandle = widget.parent;
    widget.parent = NONE_HANDLE;
    if (isNoneHandle(parentHandle)) return;

    const siblings = this.structuralNode(parentHandle).widget.children;
    const i = siblings.findIndex((h) => handleEquals(h, handle));
    if (i >= 0) siblings.splice(i, 1);
  }

  /* ========== Tree queries ========== */

  /** First node in pre-order below (and including) `start` matching `fn`, or NONE_HANDLE. */
  findByCriteriaDown(start: NodeHandle, fn: NodePredicate): NodeHandle {
    const stack: NodeHandle[] = [start];
    while (stack.length > 0) {
      const handle = stack.pop();
      if (handle === undefined) continue;
      const control = this.structuralNode(handle);
      if (!this.isDispatchingSelf(handle) && fn(control)) return handle;
      const children = control.widget.children;
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child !== undefined) stack.push(child);
      }
    }
    return NONE_HANDLE;
  }

  /** Nearest node on the path from `start` up to the root matching `fn`, or NONE_HANDLE. */
  findByCriteriaUp(start: NodeHandle, fn: NodePredicate): NodeHandle {
    let current = start;
    while (isSomeHandle(current)) {
      const control = this.structuralNode(current);
      if (!this.isDispatchingSelf(current) && fn(control)) return current;
      current = control.widget.parent;
    }
    return NONE_HANDLE;
  }

  findByNameDown(start: NodeHandle, name: string): NodeHandle {
    return this.findByCriteriaDown(start, (control) => control.widget.name === name);
  }

  findByNameUp(start: NodeHandle, name: string): NodeHandle {
    return this.findByCriteriaUp(start, (control) => control.widget.name === name);
  }

  /** Borrow the node found by findByNameDown; fails when there is none. */
  borrowByNameDown(start: NodeHandle, name: string): Control {
    return this.getNode(this.findByNameDown(start, name));
  }

  borrowByNameUp(start: NodeHandle, name: string): Control {
    return this.getNode(this.findByNameUp(start, name));
  }

  borrowByCriteriaUp(start: NodeHandle, fn: NodePredicate): Control {
    return this.getNode(this.findByCriteriaUp(start, fn));
  }

  /** True if `node` is a descendant (at any depth) of `ancestor`. */
  isNodeChildOf(node: NodeHandle, ancestor: NodeHandle): boolean {
    if (!this.isResolvable(node)) return false;
    let current = this.structuralNode(node).widget.parent;
    while (isSomeHandle(current)) {
      if (handleEquals(current, ancestor)) return true;
      current = this.structuralNode(current).widget.parent;
    }
    return false;
  }

  isNodeDirectChildOf(node: NodeHandle, parent: NodeHandle): boolean {
    return this.structuralNode(parent).widget.children.some((h) => handleEquals(h, node));
  }

  /* ========== Layout hooks for controls ========== */

  /** Measure a child from inside a measureOverride. */
  measureNode(handle: NodeHandle, availableSize: Vec2): void {
    measureNode(this, handle, availableSize);
  }

  /** Arrange a child from inside an arrangeOverride. */
  arrangeNode(handle: NodeHandle, finalRect: Rect): void {
    arrangeNode(this, handle, finalRect);
  }

  applyStyle(handle: NodeHandle, style: Style): void {
    applyStyle(this.getNode(handle), style);
  }

  /* ========== Frame pipeline ========== */

  update(screenSize: Vec2, dt: number): void {
    this.assertNotDispatching("update");
    layoutTree(this, this.root, screenSize);
    propagateTransforms(this, this.root);
    for (const control of this.pool.values()) {
      control.update?.(dt);
    }
  }

  draw(): DrawingContext {
    this.assertNotDispatching("draw");
    const ctx = this.commandBuffer;
    ctx.clear();
    resetCommandRanges(this.pool.values());
    drawTree(this, ctx, this.root, this.config.clipInflation);

    if (this.visualDebug) {
      const picked = this.pool.tryBorrow(this.input.pickedNode);
      if (picked !== null) {
        ctx.setNesting(0);
        ctx.pushRect(picked.widget.getScreenBounds(), 1, COLOR_WHITE);
        ctx.commit("geometry");
      }
    }
    return ctx;
  }

  /* ========== Picking and input ========== */

  /** Node under `point`, or the captured node while capture is held. */
  hitTest(point: Vec2): NodeHandle {
    this.assertNotDispatching("hitTest");
    if (this.pool.isValid(this.captured)) return this.captured;
    return pickNode(this, this.root, point);
  }

  /** First capture wins; later requests fail until releaseMouseCapture(). */
  captureMouse(handle: NodeHandle): boolean {
    if (isNoneHandle(this.captured)) {
      this.captured = handle;
      return true;
    }
    this.reportDevIssue(
      "capture",
      `rejected:${handle.index}:${handle.generation}`,
      `captureMouse(${this.describeNode(handle)}) ignored: ${this.describeNode(this.captured)} holds capture`,
    );
    return false;
  }

  releaseMouseCapture(): void {
    this.captured = NONE_HANDLE;
  }

  setKeyboardFocus(handle: NodeHandle): void {
    this.input.keyboardFocusNode = handle;
  }

  /** Translate one raw input event; true when it produced an event for some node. */
  processInputEvent(event: RawInputEvent): boolean {
    this.assertNotDispatching("processInputEvent");
    return routeInputEvent(
      {
        hitTest: (point) => this.hitTest(point),
        tryGetNode: (handle) => this.pool.tryBorrow(handle),
        enqueue: (e) => {
          this.queue.push(e);
        },
      },
      this.input,
      event,
    );
  }

  /* ========== Event queue ========== */

  /** Push an event onto the shared queue; it is dispatched by a later poll. */
  sendEvent(event: UiEvent): void {
    this.queue.push(event);
  }

  /**
   * Collect node-posted events, then pop one event and broadcast it to every
   * node in arena order. Returns the dispatched event, or null when the queue
   * was empty.
   */
  pollUiEvent(): UiEvent | null {
    this.assertNotDispatching("pollUiEvent");

    for (const [handle, control] of this.pool.entries()) {
      for (const draft of control.widget.drainEvents()) {
        this.queue.push({
          payload: draft.payload,
          source: handle,
          target: draft.target,
          handled: false,
        });
      }
    }

    const event = this.queue.shift();
    if (event === undefined) return null;

    if (isSomeHandle(event.target) && !this.pool.isValid(event.target)) {
      this.reportDevIssue(
        "events",
        `stale-target:${event.payload.kind}:${event.target.index}:${event.target.generation}`,
        `${event.payload.kind} event targets ${this.describeNode(event.target)}, which no longer exists`,
      );
    }

    this.broadcast(event);
    return event;
  }

  /* ========== Diagnostics ========== */

  describeNode(handle: NodeHandle): string {
    return describeWidget(handle, this.pool.tryBorrow(handle)?.widget ?? null);
  }

  /** @internal Dev-mode warning hook used by the layout engine and router. */
  reportDevIssue(area: DevWarningArea, key: string, detail: string): void {
    warnDevIssue(this.devWarnings, area, key, detail);
  }

  /* ========== Internals ========== */

  private broadcast(event: UiEvent): void {
    const capacity = this.pool.capacity;
    for (let i = 0; i < capacity; i++) {
      const control = this.pool.takeAt(i);
      if (control === null) continue;
      const handle: Handle<Control> = this.pool.handleFromIndex(i);
      this.dispatching = { handle, control };
      try {
        control.handleEvent?.(handle, this, event);
      } catch (error: unknown) {
        if (error instanceof UiCoreError) throw error;
        throw new UiCoreError(
          "UI_USER_CODE_THROW",
          `handleEvent of ${describeWidget(handle, control.widget)} threw while handling ${event.payload.kind}: ${errorDetail(error)}`,
          { cause: error },
        );
      } finally {
        this.dispatching = null;
        this.pool.putBack(i, control);
      }
    }
  }

  private assertNotDispatching(op: string): void {
    if (this.dispatching === null) return;
    throw new UiCoreError(
      "UI_REENTRANT_CALL",
      `${op}() called from the event handler of ${describeWidget(this.dispatching.handle, this.dispatching.control.widget)}`,
    );
  }

  private isDispatchingSelf(handle: NodeHandle): boolean {
    return this.dispatching !== null && handleEquals(this.dispatching.handle, handle);
  }

  private isResolvable(handle: NodeHandle): boolean {
    return this.pool.isValid(handle) || this.isDispatchingSelf(handle);
  }

  /**
   * Node lookup for tree walks and child-list edits. Resolves the node
   * currently handling an event too, so queries and link/unlink see through
   * it; getNode() on that handle still fails.
   */
  private structuralNode(handle: NodeHandle): Control {
    if (this.dispatching !== null && handleEquals(this.dispatching.handle, handle)) {
      return this.dispatching.control;
    }
    return this.pool.borrow(handle);
  }

  private forgetHandle(handle: NodeHandle): void {
    if (handleEquals(this.captured, handle)) this.captured = NONE_HANDLE;
    if (handleEquals(this.input.pickedNode, handle)) this.input.pickedNode = NONE_HANDLE;
    if (handleEquals(this.input.prevPickedNode, handle)) this.input.prevPickedNode = NONE_HANDLE;
    if (handleEquals(this.input.keyboardFocusNode, handle)) {
      this.input.keyboardFocusNode = NONE_HANDLE;
    }
  }
}

export function createUserInterface(config?: UiConfig): UserInterface {
  return new UserInterface(config);
}
