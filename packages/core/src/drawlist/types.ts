/**
 * packages/core/src/drawlist/types.ts — Drawing context contract.
 *
 * Controls emit shapes through a DrawingContext during the draw pass; the
 * core reads the resulting command list back for hit testing. Rasterizing
 * the commands is left to the host renderer.
 *
 * Usage pattern:
 *   1. pushRect / pushFilledRect accumulate shapes
 *   2. commit(kind) turns pending shapes into one command
 *   3. commitClipRect / revertClipRect bracket each node (stack discipline)
 */

import type { Rect, Vec2 } from "../layout/types.js";

/**
 * Command kinds:
 *   - geometry: visible shapes; what hit testing treats as the node's body
 *   - clip: clip region; hit testing requires the point inside it
 */
export type CommandKind = "geometry" | "clip";

/** Opaque reference to a texture owned by the renderer (font atlas, image). */
export type TextureRef = Readonly<{ id: string }>;

/** Packed 0xRRGGBBAA color. */
export type Color = number;

export type DrawCommand = Readonly<{
  kind: CommandKind;
  texture: TextureRef | null;
  /** Tree depth of the emitting node; the renderer layers clips by it. */
  nesting: number;
  rects: readonly Rect[];
  colors: readonly Color[];
}>;

export interface DrawingContext {
  readonly nesting: number;
  setNesting(nesting: number): void;

  /** Push `rect` as the active clip and emit a clip command for it. */
  commitClipRect(rect: Rect): void;
  /** Pop back to the enclosing clip. No-op on an empty stack. */
  revertClipRect(): void;
  readonly currentClipRect: Rect | null;

  /** Outline of `rect` drawn `thickness` wide, inside the rect. */
  pushRect(rect: Rect, thickness: number, color: Color): void;
  pushFilledRect(rect: Rect, color: Color): void;
  /** Flush pending shapes into one command. Emits nothing when none are pending. */
  commit(kind: CommandKind, texture?: TextureRef | null): void;

  readonly commands: readonly DrawCommand[];
  isCommandContainsPoint(command: DrawCommand, point: Vec2): boolean;

  clear(): void;
}
