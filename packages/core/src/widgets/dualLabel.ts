/**
 * packages/core/src/widgets/dualLabel.ts — Two-column label used by menu rows.
 *
 * The left column is aligned to the left edge, the right column (typically a
 * shortcut hint) to the right edge, each inside its own padding.
 */

import type { TextPrimitive } from "../drawlist/primitives.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import { type Align, type Rect, type Size, point, size } from "../layout/types.js";
import { alignOffset, textPrimitive } from "./label.js";
import type { Padding, Rgba, TextProperties } from "./style.js";

export type DualLabelStyle = Readonly<{
  leftProperties: TextProperties;
  rightProperties: TextProperties;
  leftFontColor: Rgba;
  rightFontColor: Rgba;
  verticalAlign: Align;
  leftPadding: Padding;
  rightPadding: Padding;
}>;

export type DualLabelPrimitives = Readonly<{
  leftText: TextPrimitive | null;
  rightText: TextPrimitive | null;
}>;

function paddedSize(t: Size, p: Padding): Size {
  return size(t.w + p.left + p.right, t.h + p.top + p.bottom);
}

export class DualLabelInner {
  private leftSize: Size | null = null;
  private rightSize: Size | null = null;
  private leftProperties: TextProperties;
  private rightProperties: TextProperties;

  constructor(
    private readonly leftText: string,
    private readonly rightText: string,
    style: DualLabelStyle,
    private readonly measurer: TextMeasurer,
  ) {
    this.leftProperties = style.leftProperties;
    this.rightProperties = style.rightProperties;
  }

  texts(): Readonly<{ left: string; right: string }> {
    return { left: this.leftText, right: this.rightText };
  }

  setStyle(style: DualLabelStyle): void {
    if (style.leftProperties !== this.leftProperties) {
      this.leftProperties = style.leftProperties;
      this.leftSize = null;
    }
    if (style.rightProperties !== this.rightProperties) {
      this.rightProperties = style.rightProperties;
      this.rightSize = null;
    }
  }

  private unclippedLeft(): Size {
    if (this.leftSize === null) {
      this.leftSize = this.measurer.measure(this.leftText, this.leftProperties);
    }
    return this.leftSize;
  }

  private unclippedRight(): Size {
    if (this.rightSize === null) {
      this.rightSize = this.measurer.measure(this.rightText, this.rightProperties);
    }
    return this.rightSize;
  }

  desiredPaddedSize(style: DualLabelStyle): Size {
    const left = paddedSize(this.unclippedLeft(), style.leftPadding);
    const right =
      this.rightText.length > 0 ? paddedSize(this.unclippedRight(), style.rightPadding) : size(0, 0);
    return size(left.w + right.w, Math.max(left.h, right.h));
  }

  renderPrimitives(bounds: Rect, style: DualLabelStyle): DualLabelPrimitives {
    let leftText: TextPrimitive | null = null;
    let rightText: TextPrimitive | null = null;

    if (this.leftText.length > 0) {
      const t = this.unclippedLeft();
      const p = style.leftPadding;
      const innerH = Math.max(0, bounds.h - p.top - p.bottom);
      const y = bounds.y + p.top + alignOffset(innerH, t.h, style.verticalAlign);
      leftText = textPrimitive(
        this.leftText,
        point(bounds.x + p.left, y),
        t,
        style.leftFontColor,
        style.leftProperties,
      );
    }

    if (this.rightText.length > 0) {
      const t = this.unclippedRight();
      const p = style.rightPadding;
      const innerH = Math.max(0, bounds.h - p.top - p.bottom);
      const y = bounds.y + p.top + alignOffset(innerH, t.h, style.verticalAlign);
      rightText = textPrimitive(
        this.rightText,
        point(bounds.x + bounds.w - p.right - t.w, y),
        t,
        style.rightFontColor,
        style.rightProperties,
      );
    }

    return Object.freeze({ leftText, rightText });
  }
}
