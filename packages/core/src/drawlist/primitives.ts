/**
 * packages/core/src/drawlist/primitives.ts — Render primitive descriptions.
 *
 * Why: Elements never draw. They append primitive descriptions to a
 * PrimitiveGroup, and the embedding backend turns the group into GPU work.
 * Order inside a z-index is significant; batches keep same-kind primitives
 * together so the backend can submit them in one call.
 *
 * Coordinates inside a group are relative to the element's bounding rect.
 */

import type { Point, Rect, Size } from "../layout/types.js";
import type { QuadStyle, Rgba, TextProperties } from "../widgets/style.js";

export type QuadPrimitive = Readonly<{ kind: "quad"; rect: Rect; style: QuadStyle }>;

export type SolidQuadPrimitive = Readonly<{ kind: "solidQuad"; rect: Rect; color: Rgba }>;

export type TextPrimitive = Readonly<{
  kind: "text";
  text: string;
  /** Top-left of the text's clip box. */
  origin: Point;
  clipSize: Size;
  color: Rgba;
  properties: TextProperties;
}>;

export type Primitive = QuadPrimitive | SolidQuadPrimitive | TextPrimitive;

export type PrimitiveEntry =
  | Readonly<{ kind: "single"; zIndex: number; primitive: Primitive }>
  | Readonly<{ kind: "textBatch"; zIndex: number; primitives: readonly TextPrimitive[] }>
  | Readonly<{ kind: "solidQuadBatch"; zIndex: number; primitives: readonly SolidQuadPrimitive[] }>;

export interface PrimitiveGroup {
  /** z-index applied to subsequently added primitives. Starts at 0. */
  setZIndex(zIndex: number): void;
  add(primitive: QuadPrimitive | SolidQuadPrimitive): void;
  addText(primitive: TextPrimitive): void;
  addTextBatch(primitives: readonly TextPrimitive[]): void;
  addSolidQuadBatch(primitives: readonly SolidQuadPrimitive[]): void;
  entries(): readonly PrimitiveEntry[];
  /** All primitives flattened, ordered by z-index then insertion. */
  flatten(): readonly Primitive[];
}

class PrimitiveGroupImpl implements PrimitiveGroup {
  private zIndex = 0;
  private readonly list: PrimitiveEntry[] = [];

  setZIndex(zIndex: number): void {
    this.zIndex = zIndex;
  }

  add(primitive: QuadPrimitive | SolidQuadPrimitive): void {
    this.list.push(Object.freeze({ kind: "single", zIndex: this.zIndex, primitive }));
  }

  addText(primitive: TextPrimitive): void {
    this.list.push(Object.freeze({ kind: "single", zIndex: this.zIndex, primitive }));
  }

  addTextBatch(primitives: readonly TextPrimitive[]): void {
    if (primitives.length === 0) return;
    this.list.push(
      Object.freeze({ kind: "textBatch", zIndex: this.zIndex, primitives: Object.freeze([...primitives]) }),
    );
  }

  addSolidQuadBatch(primitives: readonly SolidQuadPrimitive[]): void {
    if (primitives.length === 0) return;
    this.list.push(
      Object.freeze({
        kind: "solidQuadBatch",
        zIndex: this.zIndex,
        primitives: Object.freeze([...primitives]),
      }),
    );
  }

  entries(): readonly PrimitiveEntry[] {
    return Object.freeze([...this.list]);
  }

  flatten(): readonly Primitive[] {
    // Stable sort keeps insertion order within a z-index.
    const sorted = [...this.list].sort((a, b) => a.zIndex - b.zIndex);
    const out: Primitive[] = [];
    for (const entry of sorted) {
      if (entry.kind === "single") out.push(entry.primitive);
      else out.push(...entry.primitives);
    }
    return Object.freeze(out);
  }
}

export function createPrimitiveGroup(): PrimitiveGroup {
  return new PrimitiveGroupImpl();
}

export function quadPrimitive(style: QuadStyle, rect: Rect): QuadPrimitive {
  return Object.freeze({ kind: "quad", rect, style });
}

export function solidQuadPrimitive(rect: Rect, color: Rgba): SolidQuadPrimitive {
  return Object.freeze({ kind: "solidQuad", rect, color });
}
