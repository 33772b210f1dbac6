/**
 * packages/core/src/layout/menuRows.ts — Row measurement and hit testing for menus.
 *
 * Why: A list-style overlay maps a pointer's vertical offset to a logical
 * entry. One measurement pass accumulates a running offset and records, per
 * row, the interval the row occupies; hit testing then scans those intervals.
 *
 * Row rules:
 *   - Option: occupies [startY, endY) with endY = startY + rowHeight
 *   - Divider: line drawn at y = offset + dividerPadding; occupies
 *     dividerWidth + 2 * dividerPadding and is never a hit target
 *   - The first row starts at outerPadding
 *   - Size: (ceil(max option width) + 2 * outerPadding, accumulated + outerPadding)
 *   - No rows: size is (0, 0)
 *
 * Menus are small and bounded, so the scan is linear.
 */

import { type Size, ZERO_SIZE, size } from "./types.js";

export type MenuRowMetrics = Readonly<{
  rowHeight: number;
  dividerWidth: number;
  dividerPadding: number;
  outerPadding: number;
}>;

/** Input to measurement: options carry their desired (padded) label width. */
export type MenuRowInput = Readonly<{ kind: "option"; width: number }> | Readonly<{ kind: "divider" }>;

export type MeasuredMenuRow =
  | Readonly<{ kind: "option"; startY: number; endY: number }>
  | Readonly<{ kind: "divider"; y: number }>;

export type MenuRowsLayout = Readonly<{
  rows: readonly MeasuredMenuRow[];
  size: Size;
}>;

export function measureMenuRows(
  rows: readonly MenuRowInput[],
  metrics: MenuRowMetrics,
): MenuRowsLayout {
  if (rows.length === 0) {
    return Object.freeze({ rows: Object.freeze([]), size: ZERO_SIZE });
  }

  const out: MeasuredMenuRow[] = [];
  let maxWidth = 0;
  let total = metrics.outerPadding;

  for (const row of rows) {
    if (row.kind === "option") {
      if (row.width > maxWidth) maxWidth = row.width;
      const startY = total;
      total += metrics.rowHeight;
      out.push(Object.freeze({ kind: "option", startY, endY: total }));
    } else {
      out.push(Object.freeze({ kind: "divider", y: total + metrics.dividerPadding }));
      total += metrics.dividerWidth + metrics.dividerPadding * 2;
    }
  }

  return Object.freeze({
    rows: Object.freeze(out),
    size: size(Math.ceil(maxWidth) + metrics.outerPadding * 2, total + metrics.outerPadding),
  });
}

/**
 * Index of the first option whose half-open interval contains `y`, or null.
 * `y` is relative to the menu's top edge.
 */
export function hitTestMenuRows(rows: readonly MeasuredMenuRow[], y: number): number | null {
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    if (row === undefined || row.kind !== "option") continue;
    if (y >= row.startY && y < row.endY) return i;
  }
  return null;
}
