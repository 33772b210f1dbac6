/**
 * packages/core/src/layout/textMeasure.ts — Text measurement service.
 *
 * Why: Labels need the unclipped size of their text to lay themselves out.
 * Shaping is owned by the embedding toolkit; the core only talks to it through
 * the `TextMeasurer` interface. The monospace measurer below is the default
 * and is fully deterministic, which keeps layout tests exact.
 *
 * Monospace rules:
 *   - Each code point advances fontSize * advanceRatio
 *   - Width is the widest line; height is lineCount * lineHeight
 *   - Empty text measures (0, 0)
 */

import type { TextProperties } from "../widgets/style.js";
import { type Size, ZERO_SIZE, size } from "./types.js";

export interface TextMeasurer {
  /** Desired, unclipped size of `text` rendered with `properties`. */
  measure(text: string, properties: TextProperties): Size;
}

export type MonospaceTextMeasurerOptions = Readonly<{
  /** Glyph advance as a fraction of the font size. Default 0.5. */
  advanceRatio?: number;
}>;

const DEFAULT_ADVANCE_RATIO = 0.5;

function countCodePoints(line: string): number {
  return Array.from(line).length;
}

export function createMonospaceTextMeasurer(opts: MonospaceTextMeasurerOptions = {}): TextMeasurer {
  const ratio =
    typeof opts.advanceRatio === "number" &&
    Number.isFinite(opts.advanceRatio) &&
    opts.advanceRatio > 0
      ? opts.advanceRatio
      : DEFAULT_ADVANCE_RATIO;

  return Object.freeze({
    measure(text: string, properties: TextProperties): Size {
      if (text.length === 0) return ZERO_SIZE;
      const lines = text.split("\n");
      let widest = 0;
      for (const line of lines) {
        const cells = countCodePoints(line);
        if (cells > widest) widest = cells;
      }
      return size(widest * properties.fontSize * ratio, lines.length * properties.lineHeight);
    },
  });
}
