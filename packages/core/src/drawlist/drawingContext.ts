/**
 * packages/core/src/drawlist/drawingContext.ts — In-memory command buffer.
 *
 * Commands are append-only for the duration of a frame; clear() resets the
 * buffer, the clip stack and nesting before the next draw pass.
 */

import { rectContains } from "../layout/geometry.js";
import type { Rect, Vec2 } from "../layout/types.js";
import type {
  Color,
  CommandKind,
  DrawCommand,
  DrawingContext,
  TextureRef,
} from "./types.js";

export const COLOR_WHITE: Color = 0xffffffff;
export const COLOR_TRANSPARENT: Color = 0x00000000;

function clampByte(v: number): number {
  if (!Number.isFinite(v) || v <= 0) return 0;
  return v >= 255 ? 255 : Math.round(v);
}

export function rgba(r: number, g: number, b: number, a = 255): Color {
  return ((clampByte(r) << 24) | (clampByte(g) << 16) | (clampByte(b) << 8) | clampByte(a)) >>> 0;
}

export class CommandBuffer implements DrawingContext {
  private readonly list: DrawCommand[] = [];
  private readonly clipStack: Rect[] = [];
  private pendingRects: Rect[] = [];
  private pendingColors: Color[] = [];
  private currentNesting = 0;

  get nesting(): number {
    return this.currentNesting;
  }

  get commands(): readonly DrawCommand[] {
    return this.list;
  }

  get currentClipRect(): Rect | null {
    return this.clipStack[this.clipStack.length - 1] ?? null;
  }

  setNesting(nesting: number): void {
    this.currentNesting = nesting;
  }

  commitClipRect(rect: Rect): void {
    this.clipStack.push(rect);
    this.list.push(
      Object.freeze({
        kind: "clip",
        texture: null,
        nesting: this.currentNesting,
        rects: Object.freeze([rect]),
        colors: Object.freeze([COLOR_TRANSPARENT]),
      }),
    );
  }

  revertClipRect(): void {
    this.clipStack.pop();
  }

  pushRect(rect: Rect, thickness: number, color: Color): void {
    const t = Math.max(0, Math.min(thickness, rect.w * 0.5, rect.h * 0.5));
    if (t <= 0) return;
    // top, bottom, left, right strips
    this.pushFilledRect({ x: rect.x, y: rect.y, w: rect.w, h: t }, color);
    this.pushFilledRect({ x: rect.x, y: rect.y + rect.h - t, w: rect.w, h: t }, color);
    this.pushFilledRect({ x: rect.x, y: rect.y + t, w: t, h: rect.h - t * 2 }, color);
    this.pushFilledRect({ x: rect.x + rect.w - t, y: rect.y + t, w: t, h: rect.h - t * 2 }, color);
  }

  pushFilledRect(rect: Rect, color: Color): void {
    if (!(rect.w > 0) || !(rect.h > 0)) return;
    this.pendingRects.push(rect);
    this.pendingColors.push(color);
  }

  commit(kind: CommandKind, texture: TextureRef | null = null): void {
    if (this.pendingRects.length === 0) return;
    this.list.push(
      Object.freeze({
        kind,
        texture,
        nesting: this.currentNesting,
        rects: Object.freeze(this.pendingRects),
        colors: Object.freeze(this.pendingColors),
      }),
    );
    this.pendingRects = [];
    this.pendingColors = [];
  }

  isCommandContainsPoint(command: DrawCommand, point: Vec2): boolean {
    for (const r of command.rects) {
      if (rectContains(r, point)) return true;
    }
    return false;
  }

  clear(): void {
    this.list.length = 0;
    this.clipStack.length = 0;
    this.pendingRects = [];
    this.pendingColors = [];
    this.currentNesting = 0;
  }
}
