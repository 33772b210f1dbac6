/**
 * packages/core/src/layout/overlayContainment.ts — Keep overlays inside the window.
 *
 * Why: Transient overlays (drop-down menus, popups) must stay fully visible.
 * Given the rectangle an overlay would like to occupy and the window size,
 * this computes the corrected rectangle: size clamped to the window, origin
 * moved so the clamped rectangle fits.
 *
 * Per axis:
 *   - size = min(desired, viewport); flagged as clipped when it shrinks
 *   - origin before the viewport start snaps to 0
 *   - origin whose far edge overflows snaps so the far edge meets the viewport
 *   - otherwise the origin is kept
 *
 * `newBounds` is null when nothing changed. Callers use that to skip a
 * redundant bounds update, so a rect already inside the viewport (including one
 * touching the left/top edge at exactly 0) must report null. Applying the
 * function to its own output therefore always reports null.
 */

import type { Rect, Size } from "./types.js";

export type OverlayContainment = Readonly<{
  newBounds: Rect | null;
  widthClipped: boolean;
  heightClipped: boolean;
}>;

type AxisResult = Readonly<{ start: number; extent: number; clipped: boolean; moved: boolean }>;

function containAxis(start: number, extent: number, viewportExtent: number): AxisResult {
  const limit = Math.max(0, viewportExtent);
  const clipped = extent > limit;
  const clampedExtent = clipped ? limit : extent;

  let nextStart = start;
  if (start < 0) {
    nextStart = 0;
  } else if (start + clampedExtent > limit) {
    nextStart = limit - clampedExtent;
  }

  return { start: nextStart, extent: clampedExtent, clipped, moved: nextStart !== start };
}

export function containOverlay(desired: Rect, viewport: Size): OverlayContainment {
  const h = containAxis(desired.x, desired.w, viewport.w);
  const v = containAxis(desired.y, desired.h, viewport.h);

  const changed = h.clipped || v.clipped || h.moved || v.moved;
  const newBounds = changed
    ? Object.freeze({ x: h.start, y: v.start, w: h.extent, h: v.extent })
    : null;

  return Object.freeze({
    newBounds,
    widthClipped: h.clipped,
    heightClipped: v.clipped,
  });
}

/** The rect an overlay should occupy: the corrected rect, or the desired one unchanged. */
export function resolveOverlayBounds(desired: Rect, viewport: Size): Rect {
  return containOverlay(desired, viewport).newBounds ?? desired;
}
