/**
 * packages/core/src/widgets/label.ts — Reusable single-line label state.
 *
 * Why: Buttons and toggle buttons are a label plus interaction state. The label
 * owns its text, the cached unclipped text size, and turns a bounding rect plus
 * a resolved LabelStyle into a background quad and a text primitive.
 */

import {
  type QuadPrimitive,
  type TextPrimitive,
  quadPrimitive,
} from "../drawlist/primitives.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import {
  type Align,
  type Point,
  type Rect,
  type Size,
  ZERO_POINT,
  point,
  rect,
  size,
} from "../layout/types.js";
import {
  type Padding,
  type QuadStyle,
  type Rgba,
  type TextProperties,
  isQuadInvisible,
} from "./style.js";

export type LabelStyle = Readonly<{
  properties: TextProperties;
  fontColor: Rgba;
  verticalAlign: Align;
  /** Minimum size of the text clip box. */
  minClippedSize: Size;
  backQuad: QuadStyle;
  /** Space between the text and the bounding rect. */
  padding: Padding;
}>;

export type LabelPrimitives = Readonly<{
  text: TextPrimitive | null;
  bgQuad: QuadPrimitive | null;
}>;

/** Inner rect left after removing padding from `bounds`. */
export function padRect(bounds: Rect, pad: Padding): Rect {
  return rect(
    bounds.x + pad.left,
    bounds.y + pad.top,
    bounds.w - pad.left - pad.right,
    bounds.h - pad.top - pad.bottom,
  );
}

/** Offset of an extent of `inner` placed inside `outer` with `align`. */
export function alignOffset(outer: number, inner: number, align: Align): number {
  switch (align) {
    case "start":
      return 0;
    case "center":
      return (outer - inner) / 2;
    case "end":
      return outer - inner;
  }
}

export function textPrimitive(
  text: string,
  origin: Point,
  clipSize: Size,
  color: Rgba,
  properties: TextProperties,
): TextPrimitive {
  return Object.freeze({ kind: "text", text, origin, clipSize, color, properties });
}

export class LabelInner {
  private textValue: string;
  private offset: Point;
  private properties: TextProperties;
  private cachedSize: Size | null = null;

  constructor(
    text: string,
    style: LabelStyle,
    private readonly measurer: TextMeasurer,
    textOffset: Point = ZERO_POINT,
  ) {
    this.textValue = text;
    this.offset = textOffset;
    this.properties = style.properties;
  }

  text(): string {
    return this.textValue;
  }

  /** Returns `true` if the text has changed. */
  setText(text: string): boolean {
    if (text === this.textValue) return false;
    this.textValue = text;
    this.cachedSize = null;
    return true;
  }

  textOffset(): Point {
    return this.offset;
  }

  /**
   * An offset that can be used mainly to correct the position of icon glyphs.
   * This does not affect the position of the background quad.
   *
   * Returns `true` if the offset has changed.
   */
  setTextOffset(offset: Point): boolean {
    if (offset.x === this.offset.x && offset.y === this.offset.y) return false;
    this.offset = point(offset.x, offset.y);
    return true;
  }

  setStyle(style: LabelStyle): void {
    if (style.properties === this.properties) return;
    this.properties = style.properties;
    this.cachedSize = null;
  }

  /** Size of the text without any clipping. */
  unclippedTextSize(): Size {
    if (this.cachedSize === null) {
      this.cachedSize = this.measurer.measure(this.textValue, this.properties);
    }
    return this.cachedSize;
  }

  /** Size of the padded background if it covered the whole unclipped text. */
  desiredPaddedSize(style: LabelStyle): Size {
    const t = this.unclippedTextSize();
    const p = style.padding;
    return size(t.w + p.left + p.right, t.h + p.top + p.bottom);
  }

  renderPrimitives(bounds: Rect, style: LabelStyle): LabelPrimitives {
    const bgQuad = isQuadInvisible(style.backQuad) ? null : quadPrimitive(style.backQuad, bounds);

    if (this.textValue.length === 0) {
      return Object.freeze({ text: null, bgQuad });
    }

    const content = padRect(bounds, style.padding);
    const t = this.unclippedTextSize();
    const clipW = Math.max(content.w, style.minClippedSize.w);
    const clipH = Math.max(Math.min(content.h, t.h), style.minClippedSize.h);
    const y = content.y + alignOffset(content.h, clipH, style.verticalAlign);

    const text = textPrimitive(
      this.textValue,
      point(content.x + this.offset.x, y + this.offset.y),
      size(clipW, clipH),
      style.fontColor,
      style.properties,
    );

    return Object.freeze({ text, bgQuad });
  }
}
