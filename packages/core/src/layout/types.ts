/**
 * packages/core/src/layout/types.ts — Geometry primitive type definitions.
 *
 * Why: Defines the fundamental geometric types shared by layout, hit testing
 * and rendering. Coordinates are logical pixels relative to the window's
 * top-left corner; widths and heights are never negative.
 */

/** Point in window coordinates. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size dimensions (width and height). */
export type Size = Readonly<{ w: number; h: number }>;

/** Rectangle with position (x,y) and dimensions (w,h). */
export type Rect = Readonly<{ x: number; y: number; w: number; h: number }>;

/** Alignment along a single axis. */
export type Align = "start" | "center" | "end";

/** Alignment along both axes (used to anchor tooltips). */
export type Align2 = Readonly<{ horizontal: Align; vertical: Align }>;

export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });
export const ZERO_SIZE: Size = Object.freeze({ w: 0, h: 0 });

export const ALIGN2_TOP_START: Align2 = Object.freeze({ horizontal: "start", vertical: "start" });
export const ALIGN2_TOP_CENTER: Align2 = Object.freeze({ horizontal: "center", vertical: "start" });
export const ALIGN2_TOP_END: Align2 = Object.freeze({ horizontal: "end", vertical: "start" });
export const ALIGN2_CENTER: Align2 = Object.freeze({ horizontal: "center", vertical: "center" });
export const ALIGN2_BOTTOM_START: Align2 = Object.freeze({ horizontal: "start", vertical: "end" });
export const ALIGN2_BOTTOM_CENTER: Align2 = Object.freeze({ horizontal: "center", vertical: "end" });
export const ALIGN2_BOTTOM_END: Align2 = Object.freeze({ horizontal: "end", vertical: "end" });

function nonNegative(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value;
}

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function size(w: number, h: number): Size {
  return Object.freeze({ w: nonNegative(w), h: nonNegative(h) });
}

export function rect(x: number, y: number, w: number, h: number): Rect {
  return Object.freeze({ x, y, w: nonNegative(w), h: nonNegative(h) });
}

export function rectFromSize(s: Size): Rect {
  return rect(0, 0, s.w, s.h);
}

export function rectWithOrigin(origin: Point, s: Size): Rect {
  return rect(origin.x, origin.y, s.w, s.h);
}

export function rectOrigin(r: Rect): Point {
  return point(r.x, r.y);
}

export function rectEquals(a: Rect, b: Rect): boolean {
  return a.x === b.x && a.y === b.y && a.w === b.w && a.h === b.h;
}

export function sizeEquals(a: Size, b: Size): boolean {
  return a.w === b.w && a.h === b.h;
}
