/**
 * packages/core/src/widgets/style.ts — Declarative paint value types and helpers.
 *
 * Style values are immutable once published. A style "change" is always a
 * swap of the whole table, never an in-place edit, so the constructors here
 * return frozen objects.
 */

import type { Align } from "../layout/types.js";

/** 8-bit RGBA color. */
export type Rgba = Readonly<{ r: number; g: number; b: number; a: number }>;

export type Background = Readonly<{ kind: "none" }> | Readonly<{ kind: "solid"; color: Rgba }>;

export type BorderStyle = Readonly<{
  color: Rgba;
  width: number;
  radius: number;
}>;

/** Fill and outline of a rectangle. */
export type QuadStyle = Readonly<{
  bg: Background;
  border: BorderStyle;
}>;

export type Padding = Readonly<{ top: number; right: number; bottom: number; left: number }>;

export type TextProperties = Readonly<{
  fontSize: number;
  lineHeight: number;
  /** Horizontal alignment of the text inside its clip box. */
  align: Align;
}>;

function clampChannel(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 255) return 255;
  return Math.round(value);
}

export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return Object.freeze({
    r: clampChannel(r),
    g: clampChannel(g),
    b: clampChannel(b),
    a: clampChannel(a),
  });
}

export const WHITE: Rgba = rgba(255, 255, 255);
export const BLACK: Rgba = rgba(0, 0, 0);
export const TRANSPARENT: Rgba = rgba(0, 0, 0, 0);
export const DEFAULT_ACCENT_COLOR: Rgba = rgba(65, 120, 200);

export const NO_BACKGROUND: Background = Object.freeze({ kind: "none" });

export function solid(color: Rgba): Background {
  return Object.freeze({ kind: "solid", color });
}

export const NO_BORDER: BorderStyle = Object.freeze({ color: TRANSPARENT, width: 0, radius: 0 });

export function border(color: Rgba, width: number, radius = 0): BorderStyle {
  return Object.freeze({ color, width, radius });
}

export function quadStyle(bg: Background, b: BorderStyle = NO_BORDER): QuadStyle {
  return Object.freeze({ bg, border: b });
}

export const ZERO_PADDING: Padding = Object.freeze({ top: 0, right: 0, bottom: 0, left: 0 });

export function padding(top: number, right: number, bottom: number, left: number): Padding {
  return Object.freeze({ top, right, bottom, left });
}

export const DEFAULT_TEXT_PROPERTIES: TextProperties = Object.freeze({
  fontSize: 14,
  lineHeight: 16,
  align: "start",
});

export function rgbaEquals(a: Rgba, b: Rgba): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

export function backgroundEquals(a: Background, b: Background): boolean {
  if (a.kind === "none" || b.kind === "none") return a.kind === b.kind;
  return rgbaEquals(a.color, b.color);
}

export function borderEquals(a: BorderStyle, b: BorderStyle): boolean {
  return a.width === b.width && a.radius === b.radius && rgbaEquals(a.color, b.color);
}

export function quadStyleEquals(a: QuadStyle, b: QuadStyle): boolean {
  if (a === b) return true;
  return backgroundEquals(a.bg, b.bg) && borderEquals(a.border, b.border);
}

export function paddingEquals(a: Padding, b: Padding): boolean {
  return a.top === b.top && a.right === b.right && a.bottom === b.bottom && a.left === b.left;
}

/** True when drawing the quad would produce nothing visible. */
export function isQuadInvisible(style: QuadStyle): boolean {
  const noFill = style.bg.kind === "none" || style.bg.color.a === 0;
  const noBorder = style.border.width <= 0 || style.border.color.a === 0;
  return noFill && noBorder;
}
