/**
 * packages/core/src/runtime/element.ts — Element contract between widgets and the view.
 *
 * Why: A widget is split into a cheaply-held public handle and a view-owned
 * element. The element only reacts to events delivered by the view and talks
 * back exclusively through ElementContext requests; it never polls the view
 * and never reads its own bounds except through `cx.rect()`.
 *
 * @see ./view.ts for the in-process host that implements these interfaces.
 */

import type { DevLogArea } from "../debug/devLog.js";
import type { PrimitiveGroup } from "../drawlist/primitives.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import type { Align2, Point, Rect, Size } from "../layout/types.js";

/* --- Element flags (bit set) --- */
export const ELEMENT_FLAG_PAINTS = 1 << 0;
export const ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS = 1 << 1;
export const ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE = 1 << 2;
export const ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED = 1 << 3;
export const ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE = 1 << 4;

export type ElementFlags = number;

export function hasFlag(flags: ElementFlags, flag: number): boolean {
  return (flags & flag) !== 0;
}

export type PointerButton = "primary" | "secondary" | "middle";

export type PointerEvent =
  | Readonly<{ kind: "moved"; position: Point; justEntered: boolean }>
  | Readonly<{ kind: "left" }>
  | Readonly<{ kind: "buttonPressed"; position: Point; button: PointerButton }>
  | Readonly<{ kind: "buttonReleased"; position: Point; button: PointerButton }>
  | Readonly<{ kind: "hoverTimeout"; position: Point }>;

export type ElementEvent =
  | Readonly<{ kind: "customStateChanged" }>
  | Readonly<{ kind: "pointer"; event: PointerEvent }>
  | Readonly<{ kind: "clickedOff" }>
  | Readonly<{ kind: "exclusiveFocus"; focused: boolean }>
  | Readonly<{ kind: "positionChanged" }>;

export type EventCaptureStatus = "captured" | "notCaptured";

export type CursorIcon = "default" | "pointer";

export type ElementTooltipInfo = Readonly<{
  message: string;
  elementBounds: Rect;
  align: Align2;
}>;

export interface ElementContext<A> {
  /** Current bounding rect in window coordinates. */
  rect(): Rect;
  windowSize(): Size;
  setBoundingRect(rect: Rect): void;
  requestRepaint(): void;
  /** Take focus; the previous holder receives exclusiveFocus(false). */
  stealTemporaryFocus(): void;
  /** Give focus up; this element receives exclusiveFocus(false) after the handler returns. */
  releaseFocus(): void;
  /** Receive `clickedOff` on the next press outside this element. */
  listenToPointerClickedOff(): void;
  startHoverTimeout(): void;
  showTooltip(info: ElementTooltipInfo): void;
  /** Deliver a completed user action. Throws if the channel is closed. */
  sendAction(action: A): void;
  isPointWithinVisibleBounds(p: Point): boolean;
  setCursorIcon(icon: CursorIcon): void;
  readonly textMeasurer: TextMeasurer;
  /** Dev-mode warning, deduplicated per element and key. */
  warn(area: DevLogArea, key: string, detail: string): void;
}

export type RenderContext = Readonly<{
  boundsSize: Size;
  textMeasurer: TextMeasurer;
}>;

export interface Element<A> {
  flags(): ElementFlags;
  onEvent(event: ElementEvent, cx: ElementContext<A>): EventCaptureStatus;
  /** Emit primitives relative to the element's own top-left corner. */
  renderPrimitives(cx: RenderContext, primitives: PrimitiveGroup): void;
}

export type ElementId = number;

/** Public reference to an element owned by a view. */
export interface ElementHandle {
  readonly id: ElementId;
  /** Queue a `customStateChanged` event for the element. Never delivered re-entrantly. */
  notifyCustomStateChange(): void;
  rect(): Rect;
  setPos(pos: Point): void;
  setRect(rect: Rect): void;
  setHidden(hidden: boolean): void;
  remove(): void;
}

export type ElementInit<A> = Readonly<{
  element: Element<A>;
  zIndex?: number;
  boundingRect?: Rect;
  manuallyHidden?: boolean;
}>;

/** What a widget constructor needs from its host. */
export interface ElementHost<A> {
  addElement(init: ElementInit<A>): ElementHandle;
  readonly textMeasurer: TextMeasurer;
}
