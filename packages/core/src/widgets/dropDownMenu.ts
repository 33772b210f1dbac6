/**
 * packages/core/src/widgets/dropDownMenu.ts — Drop-down menu overlay.
 *
 * Why: A menu is the overlay case of the handle/element split. The handle only
 * buffers requests in the shared cell (new entries, a style swap, an open
 * request) and notifies. The element drains the cell once per notification,
 * in a fixed order, and turns what it found into measurement, containment and
 * focus requests:
 *
 *   1. content  - rebuild rows (resolves style fresh, supersedes 2.)
 *   2. style    - restyle existing rows
 *   3. open     - show and take focus
 *
 * While open, the menu holds temporary focus and listens outside its bounds,
 * so a press anywhere else closes it.
 */

import {
  type PrimitiveGroup,
  type SolidQuadPrimitive,
  type TextPrimitive,
  quadPrimitive,
  solidQuadPrimitive,
} from "../drawlist/primitives.js";
import { containsPoint } from "../layout/hitTest.js";
import {
  type MeasuredMenuRow,
  type MenuRowInput,
  hitTestMenuRows,
  measureMenuRows,
} from "../layout/menuRows.js";
import { containOverlay } from "../layout/overlayContainment.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import {
  type Point,
  type Rect,
  type Size,
  ZERO_POINT,
  ZERO_SIZE,
  rect,
  rectFromSize,
  rectWithOrigin,
} from "../layout/types.js";
import {
  ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE,
  ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS,
  ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED,
  ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE,
  ELEMENT_FLAG_PAINTS,
  type Element,
  type ElementContext,
  type ElementEvent,
  type ElementFlags,
  type ElementHandle,
  type ElementHost,
  type EventCaptureStatus,
  type PointerEvent,
  type RenderContext,
} from "../runtime/element.js";
import { type SharedCell, createSharedCell } from "../runtime/sharedCell.js";
import { DualLabelInner } from "./dualLabel.js";
import {
  type DropDownMenuStyle,
  menuDualLabelStyle,
  menuRowHeight,
  menuRowMetrics,
} from "./menuStyle.js";

export type MenuEntry =
  | Readonly<{ kind: "option"; leftText: string; rightText: string; uniqueId: number }>
  | Readonly<{ kind: "divider" }>;

export const MENU_DIVIDER: MenuEntry = Object.freeze({ kind: "divider" });

export function menuOption(leftText: string, uniqueId: number, rightText = ""): MenuEntry {
  return Object.freeze({ kind: "option", leftText, rightText, uniqueId });
}

export type DropDownMenuProps<A> = Readonly<{
  style: DropDownMenuStyle;
  entries?: readonly MenuEntry[];
  /** Top-left corner used the next time the menu opens. */
  position?: Point;
  zIndex?: number;
  onEntrySelected?: (uniqueId: number) => A | undefined;
}>;

type MenuSharedState = {
  style: DropDownMenuStyle;
  /** Last undrained replacement wins. */
  newEntries: readonly MenuEntry[] | null;
  openRequested: boolean;
  styleChanged: boolean;
};

type Drained = Readonly<{
  style: DropDownMenuStyle;
  newEntries: readonly MenuEntry[] | null;
  openRequested: boolean;
  styleChanged: boolean;
}>;

type MenuRow =
  | Readonly<{ kind: "option"; label: DualLabelInner; uniqueId: number }>
  | Readonly<{ kind: "divider" }>;

function buildRows(
  entries: readonly MenuEntry[],
  style: DropDownMenuStyle,
  measurer: TextMeasurer,
): MenuRow[] {
  const labelStyle = menuDualLabelStyle(style, false);
  return entries.map((entry): MenuRow => {
    if (entry.kind === "divider") return { kind: "divider" };
    return {
      kind: "option",
      label: new DualLabelInner(entry.leftText, entry.rightText, labelStyle, measurer),
      uniqueId: entry.uniqueId,
    };
  });
}

export class DropDownMenuElement<A> implements Element<A> {
  private rows: MenuRow[];
  private measured: readonly MeasuredMenuRow[] = [];
  private contentSize: Size = ZERO_SIZE;
  private active = false;
  private hoveredIndex: number | null = null;

  constructor(
    private readonly cell: SharedCell<MenuSharedState>,
    entries: readonly MenuEntry[],
    measurer: TextMeasurer,
    private readonly onEntrySelected: ((uniqueId: number) => A | undefined) | null,
  ) {
    const style = cell.read((s) => s.style);
    this.rows = buildRows(entries, style, measurer);
    this.measure(style);
  }

  flags(): ElementFlags {
    return (
      ELEMENT_FLAG_PAINTS |
      ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS |
      ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE |
      ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED |
      ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE
    );
  }

  isActive(): boolean {
    return this.active;
  }

  hoveredEntry(): number | null {
    return this.hoveredIndex;
  }

  size(): Size {
    return this.contentSize;
  }

  onEvent(event: ElementEvent, cx: ElementContext<A>): EventCaptureStatus {
    switch (event.kind) {
      case "customStateChanged":
        this.drain(cx);
        return "notCaptured";
      case "clickedOff":
        cx.releaseFocus();
        return "notCaptured";
      case "exclusiveFocus":
        if (!event.focused) {
          this.active = false;
          this.hoveredIndex = null;
          cx.releaseFocus();
          cx.setBoundingRect(rectWithOrigin(cx.rect(), ZERO_SIZE));
        }
        return "notCaptured";
      case "pointer":
        return this.onPointer(event.event, cx);
      case "positionChanged":
        if (!this.active) return "notCaptured";
        this.contain(cx, cx.rect(), false);
        return "notCaptured";
    }
  }

  /* ========== Drain ========== */

  private drain(cx: ElementContext<A>): void {
    const d: Drained = this.cell.write((s) => {
      const out = {
        style: s.style,
        newEntries: s.newEntries,
        openRequested: s.openRequested,
        styleChanged: s.styleChanged,
      };
      s.newEntries = null;
      s.openRequested = false;
      s.styleChanged = false;
      return out;
    });

    let show = false;
    let requestFocus = false;
    if (d.openRequested && !this.active) {
      this.active = true;
      show = true;
      requestFocus = true;
    }

    let restyle = d.styleChanged;
    let remeasure = false;

    if (d.newEntries !== null) {
      this.rows = buildRows(d.newEntries, d.style, cx.textMeasurer);
      this.hoveredIndex = null;
      remeasure = true;
      restyle = false;
    }

    if (restyle) {
      const labelStyle = menuDualLabelStyle(d.style, false);
      for (const row of this.rows) {
        if (row.kind === "option") row.label.setStyle(labelStyle);
      }
      remeasure = true;
    }

    if (remeasure) {
      show = false;
      this.measure(d.style);
      if (this.active) {
        this.contain(cx, rectWithOrigin(cx.rect(), this.contentSize), true);
        cx.requestRepaint();
      } else {
        cx.setBoundingRect(rectWithOrigin(cx.rect(), ZERO_SIZE));
      }
    }

    if (show) {
      this.contain(cx, rectWithOrigin(cx.rect(), this.contentSize), true);
      cx.requestRepaint();
    }

    if (requestFocus) {
      cx.stealTemporaryFocus();
      cx.listenToPointerClickedOff();
    }
  }

  private measure(style: DropDownMenuStyle): void {
    const labelStyle = menuDualLabelStyle(style, false);
    const inputs = this.rows.map(
      (row): MenuRowInput =>
        row.kind === "option"
          ? { kind: "option", width: row.label.desiredPaddedSize(labelStyle).w }
          : { kind: "divider" },
    );
    const layout = measureMenuRows(inputs, menuRowMetrics(style));
    this.measured = layout.rows;
    this.contentSize = layout.size;
  }

  /**
   * Keep `desired` inside the window. With `always`, the rect is applied even
   * when no correction was needed.
   */
  private contain(cx: ElementContext<A>, desired: Rect, always: boolean): void {
    const win = cx.windowSize();
    const c = containOverlay(desired, win);
    if (c.widthClipped) {
      cx.warn(
        "overlay",
        "width-clipped",
        `menu width ${String(desired.w)} exceeds window width ${String(win.w)}; content is clipped`,
      );
    }
    if (c.heightClipped) {
      cx.warn(
        "overlay",
        "height-clipped",
        `menu height ${String(desired.h)} exceeds window height ${String(win.h)}; content is clipped`,
      );
    }
    if (c.newBounds !== null) cx.setBoundingRect(c.newBounds);
    else if (always) cx.setBoundingRect(desired);
  }

  /* ========== Pointer ========== */

  private rowAt(bounds: Rect, p: Point): number | null {
    if (!containsPoint(bounds, p)) return null;
    return hitTestMenuRows(this.measured, p.y - bounds.y);
  }

  private onPointer(event: PointerEvent, cx: ElementContext<A>): EventCaptureStatus {
    if (!this.active) return "notCaptured";

    switch (event.kind) {
      case "moved": {
        const next = this.rowAt(cx.rect(), event.position);
        if (next !== this.hoveredIndex) {
          this.hoveredIndex = next;
          cx.requestRepaint();
        }
        if (next !== null) cx.setCursorIcon("pointer");
        return "captured";
      }
      case "buttonPressed": {
        if (event.button !== "primary") return "captured";
        const index = this.rowAt(cx.rect(), event.position);
        const row = index === null ? undefined : this.rows[index];
        if (row === undefined || row.kind !== "option") return "captured";
        this.select(row.uniqueId, cx);
        return "captured";
      }
      default:
        return "captured";
    }
  }

  private select(uniqueId: number, cx: ElementContext<A>): void {
    if (this.onEntrySelected !== null) {
      const action = this.onEntrySelected(uniqueId);
      if (action === undefined) {
        cx.warn("action", "onEntrySelected", "onEntrySelected returned undefined; no action was sent");
      } else {
        cx.sendAction(action);
      }
    }
    cx.releaseFocus();
    cx.setCursorIcon("default");
  }

  /* ========== Render ========== */

  renderPrimitives(cx: RenderContext, primitives: PrimitiveGroup): void {
    const style = this.cell.read((s) => s.style);
    const idle = menuDualLabelStyle(style, false);
    const hover = menuDualLabelStyle(style, true);
    const labelW = this.contentSize.w - style.outerPadding * 2;
    const rowH = menuRowHeight(style);

    const texts: TextPrimitive[] = [];
    const dividers: SolidQuadPrimitive[] = [];

    primitives.add(quadPrimitive(style.backQuad, rectFromSize(cx.boundsSize)));

    for (let i = 0; i < this.rows.length; i++) {
      const row = this.rows[i];
      const m = this.measured[i];
      if (row === undefined || m === undefined) continue;

      if (row.kind === "option" && m.kind === "option") {
        const hovered = i === this.hoveredIndex;
        const bounds = rect(style.outerPadding, m.startY, labelW, rowH);
        if (hovered) {
          primitives.setZIndex(1);
          primitives.add(quadPrimitive(style.textBgQuadHover, bounds));
        }
        const p = row.label.renderPrimitives(bounds, hovered ? hover : idle);
        if (p.leftText !== null) texts.push(p.leftText);
        if (p.rightText !== null) texts.push(p.rightText);
      } else if (m.kind === "divider") {
        dividers.push(
          solidQuadPrimitive(rect(style.outerPadding, m.y, labelW, style.dividerWidth), style.dividerColor),
        );
      }
    }

    primitives.setZIndex(2);
    primitives.addTextBatch(texts);
    primitives.addSolidQuadBatch(dividers);
  }
}

/** Public handle to a drop-down menu. */
export class DropDownMenu {
  constructor(
    readonly el: ElementHandle,
    private readonly cell: SharedCell<MenuSharedState>,
  ) {}

  /** No-op when `style` is the current style object. */
  setStyle(style: DropDownMenuStyle): void {
    const changed = this.cell.write((s) => {
      if (s.style === style) return false;
      s.style = style;
      s.styleChanged = true;
      return true;
    });
    if (changed) this.el.notifyCustomStateChange();
  }

  style(): DropDownMenuStyle {
    return this.cell.read((s) => s.style);
  }

  setPosition(position: Point): void {
    this.el.setPos(position);
  }

  /** Replaces any replacement that has not been applied yet. */
  setEntries(entries: readonly MenuEntry[]): void {
    const copy = Object.freeze([...entries]);
    this.cell.write((s) => {
      s.newEntries = copy;
    });
    this.el.notifyCustomStateChange();
  }

  open(position?: Point): void {
    if (position !== undefined) this.setPosition(position);
    this.cell.write((s) => {
      s.openRequested = true;
    });
    this.el.notifyCustomStateChange();
  }
}

export function createDropDownMenu<A>(host: ElementHost<A>, props: DropDownMenuProps<A>): DropDownMenu {
  const cell = createSharedCell<MenuSharedState>({
    style: props.style,
    newEntries: null,
    openRequested: false,
    styleChanged: false,
  });
  const element = new DropDownMenuElement<A>(
    cell,
    props.entries ?? [],
    host.textMeasurer,
    props.onEntrySelected ?? null,
  );
  const el = host.addElement({
    element,
    zIndex: props.zIndex,
    boundingRect: rectWithOrigin(props.position ?? ZERO_POINT, ZERO_SIZE),
  });
  return new DropDownMenu(el, cell);
}
