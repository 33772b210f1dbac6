/**
 * packages/core/src/runtime/view.ts — In-process view host for elements.
 *
 * Why: Elements implement the event/render contract; something has to own
 * their bounding rects, route pointer input to them, hold focus, run hover
 * timeouts and deliver out-of-band notifications. The View does this for a
 * single window, synchronously, with no suspension points.
 *
 * Delivery rules:
 *   - Handle notifications, focus changes and position changes are QUEUED and
 *     delivered by flushUpdates() and around every pointer dispatch, never
 *     from inside another element's handler. This is what lets a handle write
 *     its shared cell without ever overlapping the element's own access.
 *   - Pointer input goes first to the focused element when it listens outside
 *     its bounds, then to visible elements under the pointer, topmost first,
 *     until one captures it.
 *   - A hover timeout is only delivered if, when it fires, the same element is
 *     still hovered and no later move restarted the countdown. Moves inside
 *     the element that armed it restart the countdown; leaving disarms it.
 */

import { type DevLog, createDevLog } from "../debug/devLog.js";
import { type PrimitiveGroup, createPrimitiveGroup } from "../drawlist/primitives.js";
import { type EnvMap, type ViewConfig, resolveViewConfig } from "../config.js";
import { VellumError } from "../errors.js";
import { containsPoint, hitTestStack, intersectRect } from "../layout/hitTest.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import {
  type Point,
  type Rect,
  type Size,
  rect as makeRect,
  rectEquals,
  size as makeSize,
} from "../layout/types.js";
import type { ActionSender } from "./actionChannel.js";
import {
  type CursorIcon,
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
  type ElementId,
  type ElementInit,
  type ElementTooltipInfo,
  type EventCaptureStatus,
  type PointerButton,
  type PointerEvent,
  hasFlag,
} from "./element.js";
import type { TimerService } from "./timers.js";

export type PointerInput =
  | Readonly<{ kind: "moved"; position: Point }>
  | Readonly<{ kind: "pressed"; position: Point; button: PointerButton }>
  | Readonly<{ kind: "released"; position: Point; button: PointerButton }>
  | Readonly<{ kind: "leftWindow" }>;

export type RenderedElement = Readonly<{
  id: ElementId;
  zIndex: number;
  rect: Rect;
  primitives: PrimitiveGroup;
}>;

export type ActiveTooltip = Readonly<{ ownerId: ElementId; info: ElementTooltipInfo }>;

export type ViewOptions<A> = Readonly<{
  windowSize: Size;
  actions: ActionSender<A>;
  config?: ViewConfig;
  env?: EnvMap;
}>;

type ElementEntry<A> = {
  readonly id: ElementId;
  readonly element: Element<A>;
  readonly flags: ElementFlags;
  readonly order: number;
  rect: Rect;
  zIndex: number;
  hidden: boolean;
};

type QueuedEvent = Readonly<{ id: ElementId; event: ElementEvent }>;

const CUSTOM_STATE_CHANGED: ElementEvent = Object.freeze({ kind: "customStateChanged" });
const POSITION_CHANGED: ElementEvent = Object.freeze({ kind: "positionChanged" });
const CLICKED_OFF: ElementEvent = Object.freeze({ kind: "clickedOff" });
const POINTER_LEFT: ElementEvent = Object.freeze<ElementEvent>({ kind: "pointer", event: { kind: "left" } });

function pointerEvent(event: PointerEvent): ElementEvent {
  return Object.freeze({ kind: "pointer", event });
}

function focusEvent(focused: boolean): ElementEvent {
  return Object.freeze({ kind: "exclusiveFocus", focused });
}

export class View<A> implements ElementHost<A> {
  readonly textMeasurer: TextMeasurer;
  private readonly actions: ActionSender<A>;
  private readonly timers: TimerService;
  private readonly hoverTimeoutMs: number;
  private readonly devLog: DevLog;

  private readonly entries = new Map<ElementId, ElementEntry<A>>();
  private nextId = 1;
  private nextOrder = 0;
  private window: Size;

  /* --- Deferred delivery --- */
  private queue: QueuedEvent[] = [];
  private dispatching = false;

  /* --- Pointer/focus state --- */
  private hoveredId: ElementId | null = null;
  private focusedId: ElementId | null = null;
  private readonly clickedOffListeners = new Set<ElementId>();
  private pointerSeq = 0;
  private lastPointer: Point | null = null;
  // Element whose hover countdown is running, if any.
  private hoverArmedId: ElementId | null = null;

  /* --- Output state --- */
  private readonly repaintRequests = new Set<ElementId>();
  private tooltipState: ActiveTooltip | null = null;
  private cursor: CursorIcon = "default";

  constructor(opts: ViewOptions<A>) {
    const config = resolveViewConfig(opts.config, opts.env);
    this.textMeasurer = config.textMeasurer;
    this.timers = config.timers;
    this.hoverTimeoutMs = config.hoverTimeoutMs;
    this.devLog = createDevLog({ devMode: config.devMode, warn: config.warn });
    this.actions = opts.actions;
    this.window = makeSize(opts.windowSize.w, opts.windowSize.h);
  }

  /* ========== Element registry ========== */

  addElement(init: ElementInit<A>): ElementHandle {
    const id = this.nextId++;
    const r = init.boundingRect ?? makeRect(0, 0, 0, 0);
    const entry: ElementEntry<A> = {
      id,
      element: init.element,
      flags: init.element.flags(),
      order: this.nextOrder++,
      rect: makeRect(r.x, r.y, r.w, r.h),
      zIndex: init.zIndex ?? 0,
      hidden: init.manuallyHidden === true,
    };
    this.entries.set(id, entry);
    return this.createHandle(id);
  }

  hasElement(id: ElementId): boolean {
    return this.entries.has(id);
  }

  elementRect(id: ElementId): Rect {
    return this.entryOrThrow(id).rect;
  }

  /* ========== Window ========== */

  windowSize(): Size {
    return this.window;
  }

  setWindowSize(next: Size): void {
    this.window = makeSize(next.w, next.h);
  }

  /* ========== Input ========== */

  handlePointer(input: PointerInput): void {
    if (this.dispatching) {
      throw new VellumError(
        "VELLUM_REENTRANT_DISPATCH",
        "View.handlePointer: called from inside an element event handler",
      );
    }
    this.flushUpdates();
    this.dispatching = true;
    try {
      switch (input.kind) {
        case "moved":
          this.routeMoved(input.position);
          break;
        case "pressed":
          this.routePressed(input.position, input.button);
          break;
        case "released":
          this.routeReleased(input.position, input.button);
          break;
        case "leftWindow":
          this.routeLeftWindow();
          break;
      }
    } finally {
      this.dispatching = false;
    }
    this.flushUpdates();
  }

  /** Deliver all queued notifications and focus/position events. */
  flushUpdates(): void {
    if (this.dispatching) return;
    this.dispatching = true;
    try {
      for (let next = this.queue.shift(); next !== undefined; next = this.queue.shift()) {
        const entry = this.entries.get(next.id);
        if (!entry) continue;
        this.deliver(entry, next.event);
      }
    } finally {
      this.dispatching = false;
    }
  }

  hasPendingUpdates(): boolean {
    return this.queue.length > 0;
  }

  /* ========== Output ========== */

  render(): RenderedElement[] {
    const ordered = [...this.entries.values()].sort((a, b) =>
      a.zIndex !== b.zIndex ? a.zIndex - b.zIndex : a.order - b.order,
    );
    const out: RenderedElement[] = [];
    for (const entry of ordered) {
      if (entry.hidden || !hasFlag(entry.flags, ELEMENT_FLAG_PAINTS)) continue;
      if (entry.rect.w <= 0 || entry.rect.h <= 0) continue;
      const primitives = createPrimitiveGroup();
      entry.element.renderPrimitives(
        { boundsSize: makeSize(entry.rect.w, entry.rect.h), textMeasurer: this.textMeasurer },
        primitives,
      );
      out.push(Object.freeze({ id: entry.id, zIndex: entry.zIndex, rect: entry.rect, primitives }));
    }
    this.repaintRequests.clear();
    return out;
  }

  /** Elements that requested a repaint since the last call or render(). */
  takeRepaintRequests(): ReadonlySet<ElementId> {
    const out = new Set(this.repaintRequests);
    this.repaintRequests.clear();
    return out;
  }

  tooltip(): ActiveTooltip | null {
    return this.tooltipState;
  }

  cursorIcon(): CursorIcon {
    return this.cursor;
  }

  focusedElement(): ElementId | null {
    return this.focusedId;
  }

  hoveredElement(): ElementId | null {
    return this.hoveredId;
  }

  /* ========== Routing ========== */

  private routeMoved(position: Point): void {
    this.pointerSeq++;
    this.lastPointer = position;
    this.cursor = "default";

    let captured: ElementId | null = null;
    for (const entry of this.pointerTargets(position)) {
      const justEntered = this.hoveredId !== entry.id;
      const status = this.deliver(
        entry,
        pointerEvent({ kind: "moved", position, justEntered }),
      );
      if (status === "captured") {
        captured = entry.id;
        break;
      }
    }

    if (this.hoveredId !== null && this.hoveredId !== captured) {
      this.leaveHovered();
    } else if (captured !== null && captured === this.hoveredId && captured === this.hoverArmedId) {
      this.scheduleHoverTimeout(captured);
    }
    this.hoveredId = captured;
  }

  private routePressed(position: Point, button: PointerButton): void {
    this.tooltipState = null;

    for (const id of [...this.clickedOffListeners]) {
      const entry = this.entries.get(id);
      if (!entry) {
        this.clickedOffListeners.delete(id);
        continue;
      }
      if (!this.isWithinVisibleBounds(entry, position)) {
        this.clickedOffListeners.delete(id);
        this.deliver(entry, CLICKED_OFF);
      }
    }

    this.routeUntilCaptured(position, pointerEvent({ kind: "buttonPressed", position, button }));
  }

  private routeReleased(position: Point, button: PointerButton): void {
    this.routeUntilCaptured(position, pointerEvent({ kind: "buttonReleased", position, button }));
  }

  private routeLeftWindow(): void {
    this.pointerSeq++;
    this.lastPointer = null;
    if (this.hoveredId !== null) this.leaveHovered();
    this.hoveredId = null;
  }

  private routeUntilCaptured(position: Point, event: ElementEvent): void {
    for (const entry of this.pointerTargets(position)) {
      if (this.deliver(entry, event) === "captured") return;
    }
  }

  private leaveHovered(): void {
    const prevId = this.hoveredId;
    if (prevId === null) return;
    if (this.hoverArmedId === prevId) this.hoverArmedId = null;
    if (this.tooltipState?.ownerId === prevId) this.tooltipState = null;
    const prev = this.entries.get(prevId);
    if (prev) this.deliver(prev, POINTER_LEFT);
  }

  private pointerTargets(position: Point): ElementEntry<A>[] {
    const out: ElementEntry<A>[] = [];
    const focused = this.focusedId !== null ? this.entries.get(this.focusedId) : undefined;
    if (
      focused &&
      !focused.hidden &&
      hasFlag(focused.flags, ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED)
    ) {
      out.push(focused);
    }

    const candidates: Array<{
      key: ElementEntry<A>;
      rect: Rect;
      zIndex: number;
      order: number;
      hidden: boolean;
    }> = [];
    for (const entry of this.entries.values()) {
      if (entry === focused && out.length > 0) continue;
      if (!hasFlag(entry.flags, ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS)) continue;
      candidates.push({
        key: entry,
        rect: entry.rect,
        zIndex: entry.zIndex,
        order: entry.order,
        hidden: entry.hidden,
      });
    }
    out.push(...hitTestStack(candidates, this.windowRect(), position.x, position.y));
    return out;
  }

  private onHoverTimeout(id: ElementId, seq: number, position: Point): void {
    if (this.dispatching) return;
    if (seq !== this.pointerSeq || this.hoveredId !== id || this.hoverArmedId !== id) return;
    const entry = this.entries.get(id);
    if (!entry) return;
    this.hoverArmedId = null;
    this.dispatching = true;
    try {
      this.deliver(entry, pointerEvent({ kind: "hoverTimeout", position }));
    } finally {
      this.dispatching = false;
    }
    this.flushUpdates();
  }

  private scheduleHoverTimeout(id: ElementId): void {
    const seq = this.pointerSeq;
    const position = this.lastPointer;
    if (position === null) return;
    this.timers.schedule(this.hoverTimeoutMs, () => {
      this.onHoverTimeout(id, seq, position);
    });
  }

  /* ========== Delivery ========== */

  private deliver(entry: ElementEntry<A>, event: ElementEvent): EventCaptureStatus {
    return entry.element.onEvent(event, this.contextFor(entry));
  }

  private enqueue(id: ElementId, event: ElementEvent): void {
    this.queue.push(Object.freeze({ id, event }));
  }

  private enqueueFocus(id: ElementId, focused: boolean): void {
    const entry = this.entries.get(id);
    if (!entry || !hasFlag(entry.flags, ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE)) return;
    this.enqueue(id, focusEvent(focused));
  }

  private windowRect(): Rect {
    return makeRect(0, 0, this.window.w, this.window.h);
  }

  private isWithinVisibleBounds(entry: ElementEntry<A>, p: Point): boolean {
    if (entry.hidden) return false;
    const visible = intersectRect(this.windowRect(), entry.rect);
    return visible !== null && containsPoint(visible, p);
  }

  private contextFor(entry: ElementEntry<A>): ElementContext<A> {
    return {
      textMeasurer: this.textMeasurer,
      rect: () => entry.rect,
      windowSize: () => this.window,
      setBoundingRect: (next: Rect) => {
        entry.rect = makeRect(next.x, next.y, next.w, next.h);
      },
      requestRepaint: () => {
        this.repaintRequests.add(entry.id);
      },
      stealTemporaryFocus: () => {
        if (this.focusedId === entry.id) return;
        const prev = this.focusedId;
        this.focusedId = entry.id;
        if (prev !== null) this.enqueueFocus(prev, false);
        this.enqueueFocus(entry.id, true);
      },
      releaseFocus: () => {
        if (this.focusedId !== entry.id) return;
        this.focusedId = null;
        this.clickedOffListeners.delete(entry.id);
        this.enqueueFocus(entry.id, false);
      },
      listenToPointerClickedOff: () => {
        this.clickedOffListeners.add(entry.id);
      },
      startHoverTimeout: () => {
        if (this.lastPointer === null) return;
        this.hoverArmedId = entry.id;
        this.scheduleHoverTimeout(entry.id);
      },
      showTooltip: (info: ElementTooltipInfo) => {
        this.tooltipState = Object.freeze({ ownerId: entry.id, info });
      },
      sendAction: (action: A) => {
        this.actions.send(action);
      },
      isPointWithinVisibleBounds: (p: Point) => this.isWithinVisibleBounds(entry, p),
      setCursorIcon: (icon: CursorIcon) => {
        this.cursor = icon;
      },
      warn: (area, key, detail) => {
        this.devLog.warn(area, `${String(entry.id)}:${key}`, `element #${String(entry.id)}: ${detail}`);
      },
    };
  }

  /* ========== Handles ========== */

  private entryOrThrow(id: ElementId): ElementEntry<A> {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new VellumError("VELLUM_UNKNOWN_ELEMENT", `element #${String(id)} was removed`);
    }
    return entry;
  }

  private moveEntry(entry: ElementEntry<A>, next: Rect): void {
    const moved = next.x !== entry.rect.x || next.y !== entry.rect.y;
    if (rectEquals(next, entry.rect)) return;
    entry.rect = next;
    if (moved && hasFlag(entry.flags, ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE)) {
      this.enqueue(entry.id, POSITION_CHANGED);
    }
  }

  private removeEntry(id: ElementId): void {
    if (!this.entries.delete(id)) return;
    if (this.hoveredId === id) this.hoveredId = null;
    if (this.hoverArmedId === id) this.hoverArmedId = null;
    if (this.focusedId === id) this.focusedId = null;
    if (this.tooltipState?.ownerId === id) this.tooltipState = null;
    this.clickedOffListeners.delete(id);
    this.repaintRequests.delete(id);
    this.queue = this.queue.filter((q) => q.id !== id);
  }

  private createHandle(id: ElementId): ElementHandle {
    return Object.freeze({
      id,
      notifyCustomStateChange: () => {
        if (!this.entries.has(id)) return;
        this.enqueue(id, CUSTOM_STATE_CHANGED);
      },
      rect: () => this.entryOrThrow(id).rect,
      setPos: (pos: Point) => {
        const entry = this.entryOrThrow(id);
        this.moveEntry(entry, makeRect(pos.x, pos.y, entry.rect.w, entry.rect.h));
      },
      setRect: (next: Rect) => {
        this.moveEntry(this.entryOrThrow(id), makeRect(next.x, next.y, next.w, next.h));
      },
      setHidden: (hidden: boolean) => {
        this.entryOrThrow(id).hidden = hidden;
      },
      remove: () => {
        this.removeEntry(id);
      },
    });
  }
}

export function createView<A>(opts: ViewOptions<A>): View<A> {
  return new View(opts);
}
