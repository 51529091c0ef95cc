/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * All coordinates are floating-point screen units with the origin at the
 * top-left corner, x growing right and y growing down.
 */

/** 2D vector (position or size). */
export type Vec2 = Readonly<{ x: number; y: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Per-side spacing around a node. */
export type Thickness = Readonly<{ left: number; top: number; right: number; bottom: number }>;

export type HorizontalAlignment = "stretch" | "left" | "center" | "right";

export type VerticalAlignment = "stretch" | "top" | "center" | "bottom";

/**
 * Local visibility of a node.
 *   - visible: laid out and drawn
 *   - collapsed: measured as zero size and never drawn
 *   - hidden: never drawn; kept distinct so controls can tell it from collapsed
 */
export type Visibility = "visible" | "collapsed" | "hidden";
