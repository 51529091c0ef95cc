/**
 * packages/core/src/layout/geometry.ts — Vector, rect and thickness helpers.
 */

import type { Rect, Thickness, Vec2, Visibility } from "./types.js";

export const ZERO_VEC2: Vec2 = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function addVec2(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return { x, y, w, h };
}

/** Check if point is inside rect (exclusive of right/bottom edges). */
export function rectContains(r: Rect, p: Vec2): boolean {
  return p.x >= r.x && p.x < r.x + r.w && p.y >= r.y && p.y < r.y + r.h;
}

/** Grow a rect by `dx` on the left and right and `dy` on the top and bottom. */
export function inflateRect(r: Rect, dx: number, dy: number): Rect {
  return { x: r.x - dx, y: r.y - dy, w: r.w + dx * 2, h: r.h + dy * 2 };
}

export function intersectRect(a: Rect, b: Rect): Rect | null {
  const x0 = Math.max(a.x, b.x);
  const y0 = Math.max(a.y, b.y);
  const x1 = Math.min(a.x + a.w, b.x + b.w);
  const y1 = Math.min(a.y + a.h, b.y + b.h);
  if (x1 <= x0 || y1 <= y0) return null;
  return { x: x0, y: y0, w: x1 - x0, h: y1 - y0 };
}

export const thickness = Object.freeze({
  zero(): Thickness {
    return { left: 0, top: 0, right: 0, bottom: 0 };
  },
  uniform(v: number): Thickness {
    return { left: v, top: v, right: v, bottom: v };
  },
  left(v: number): Thickness {
    return { left: v, top: 0, right: 0, bottom: 0 };
  },
  top(v: number): Thickness {
    return { left: 0, top: v, right: 0, bottom: 0 };
  },
  right(v: number): Thickness {
    return { left: 0, top: 0, right: v, bottom: 0 };
  },
  bottom(v: number): Thickness {
    return { left: 0, top: 0, right: 0, bottom: v };
  },
});

/** Total horizontal and vertical extent of a thickness. */
export function thicknessExtent(t: Thickness): Vec2 {
  return { x: t.left + t.right, y: t.top + t.bottom };
}

export function boolToVisibility(value: boolean): Visibility {
  return value ? "visible" : "collapsed";
}
