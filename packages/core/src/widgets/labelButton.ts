/**
 * packages/core/src/widgets/labelButton.ts — Shared machinery for label buttons.
 *
 * Why: Push buttons and toggle buttons are the same widget with a different
 * style table and a different action edge. This module holds the parts they
 * share: the inner state (label + interaction machine + style), the element
 * that reacts to view events, and the handle that writes the shared cell.
 *
 * Handle mutations follow one protocol: write the cell, release it, then
 * notify. The element answers every notification with a repaint.
 *
 * @see ./button.ts
 * @see ./toggleButton.ts
 */

import type { PrimitiveGroup } from "../drawlist/primitives.js";
import type { TextMeasurer } from "../layout/textMeasure.js";
import {
  ALIGN2_TOP_CENTER,
  type Align2,
  type Point,
  type Rect,
  type Size,
  ZERO_POINT,
  rectFromSize,
} from "../layout/types.js";
import {
  ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS,
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
import {
  type ButtonInteraction,
  type InteractionMode,
  type PressResult,
  type StateChangeResult,
  createButtonInteraction,
} from "../runtime/interaction.js";
import { type SharedCell, createSharedCell } from "../runtime/sharedCell.js";
import { type ButtonState, type ButtonStylePart, buttonStylePartEquals } from "./buttonStyle.js";
import { type LabelPrimitives, type LabelStyle, LabelInner } from "./label.js";

/** How one button flavour maps its style table onto the shared machinery. */
export type LabelButtonKind<S> = Readonly<{
  mode: InteractionMode;
  resolvePart: (style: S, state: ButtonState, toggled: boolean) => ButtonStylePart;
  labelStyle: (style: S, state: ButtonState, toggled: boolean) => LabelStyle;
  assertStyle: (style: S) => void;
}>;

export type TooltipOptions = Readonly<{
  message: string;
  /** Default: ALIGN2_TOP_CENTER. */
  align?: Align2;
}>;

/** Options every label button accepts. */
export type LabelButtonProps<S> = Readonly<{
  style: S;
  text?: string;
  textOffset?: Point;
  disabled?: boolean;
  tooltip?: TooltipOptions;
  zIndex?: number;
  boundingRect?: Rect;
  hidden?: boolean;
}>;

/* ========== Inner state ========== */

/** A label plus an interaction machine, resolved against a swappable style. */
export class LabelButtonInner<S> {
  private styleValue: S;
  private readonly label: LabelInner;
  private readonly interaction: ButtonInteraction;

  constructor(
    private readonly kind: LabelButtonKind<S>,
    text: string,
    style: S,
    measurer: TextMeasurer,
    opts: Readonly<{ toggled?: boolean; textOffset?: Point }> = {},
  ) {
    kind.assertStyle(style);
    this.styleValue = style;
    this.interaction = createButtonInteraction({
      mode: kind.mode,
      toggled: opts.toggled === true,
      resolvePart: (state, toggled) => kind.resolvePart(this.styleValue, state, toggled),
      partsEqual: buttonStylePartEquals,
    });
    this.label = new LabelInner(
      text,
      kind.labelStyle(style, "idle", this.interaction.toggled()),
      measurer,
      opts.textOffset ?? ZERO_POINT,
    );
  }

  style(): S {
    return this.styleValue;
  }

  /** Returns `true` if the style reference changed. */
  setStyle(style: S): boolean {
    if (style === this.styleValue) return false;
    this.kind.assertStyle(style);
    this.styleValue = style;
    this.label.setStyle(this.labelStyle());
    return true;
  }

  state(): ButtonState {
    return this.interaction.state();
  }

  toggled(): boolean {
    return this.interaction.toggled();
  }

  setToggled(toggled: boolean): StateChangeResult {
    return this.interaction.setToggled(toggled);
  }

  setDisabled(disabled: boolean): StateChangeResult {
    return this.interaction.setDisabled(disabled);
  }

  pointerMoved(): StateChangeResult {
    return this.interaction.pointerMoved();
  }

  pointerLeft(): StateChangeResult {
    return this.interaction.pointerLeft();
  }

  primaryPressed(): PressResult {
    return this.interaction.primaryPressed();
  }

  primaryReleased(insideBounds: boolean): StateChangeResult {
    return this.interaction.primaryReleased(insideBounds);
  }

  text(): string {
    return this.label.text();
  }

  /** Returns `true` if the text has changed. */
  setText(text: string): boolean {
    return this.label.setText(text);
  }

  textOffset(): Point {
    return this.label.textOffset();
  }

  /** Returns `true` if the text offset has changed. */
  setTextOffset(offset: Point): boolean {
    return this.label.setTextOffset(offset);
  }

  labelStyle(): LabelStyle {
    return this.kind.labelStyle(this.styleValue, this.interaction.state(), this.interaction.toggled());
  }

  /** Size of the padded background if it covered the whole unclipped text. */
  desiredPaddedSize(): Size {
    return this.label.desiredPaddedSize(this.labelStyle());
  }

  unclippedTextSize(): Size {
    return this.label.unclippedTextSize();
  }

  renderPrimitives(bounds: Rect): LabelPrimitives {
    return this.label.renderPrimitives(bounds, this.labelStyle());
  }
}

/* ========== Element ========== */

/** Action edges a button flavour reacts to. Both run after the cell is released. */
export type LabelButtonActions<A> = Readonly<{
  /** Called after a primary press changed the state, with the toggled value after it. */
  onPress?: (toggled: boolean) => A | undefined;
  /** Called when a primary release inside the visible bounds ends a press. */
  onClick?: () => A | undefined;
}>;

type ActionProducer<A> = () => A | undefined;

function emitAction<A>(cx: ElementContext<A>, callback: string, produce: ActionProducer<A>): void {
  const action = produce();
  if (action === undefined) {
    cx.warn("action", callback, `${callback} returned undefined; no action was sent`);
    return;
  }
  cx.sendAction(action);
}

export class LabelButtonElement<S, A> implements Element<A> {
  constructor(
    private readonly cell: SharedCell<LabelButtonInner<S>>,
    private readonly actions: LabelButtonActions<A>,
    private readonly callbackName: string,
    private readonly tooltip: TooltipOptions | null,
  ) {}

  flags(): ElementFlags {
    return ELEMENT_FLAG_PAINTS | ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS;
  }

  onEvent(event: ElementEvent, cx: ElementContext<A>): EventCaptureStatus {
    switch (event.kind) {
      case "customStateChanged":
        cx.requestRepaint();
        return "notCaptured";
      case "pointer":
        return this.onPointer(event.event, cx);
      default:
        return "notCaptured";
    }
  }

  private onPointer(event: PointerEvent, cx: ElementContext<A>): EventCaptureStatus {
    switch (event.kind) {
      case "moved": {
        const res = this.cell.write((inner) =>
          inner.state() === "disabled" ? null : inner.pointerMoved(),
        );
        if (res === null) return "notCaptured";
        cx.setCursorIcon("pointer");
        if (event.justEntered && this.tooltip !== null) cx.startHoverTimeout();
        if (res.needsRepaint) cx.requestRepaint();
        return "captured";
      }
      case "left": {
        const res = this.cell.write((inner) => inner.pointerLeft());
        if (!res.stateChanged) return "notCaptured";
        if (res.needsRepaint) cx.requestRepaint();
        return "captured";
      }
      case "buttonPressed": {
        if (event.button !== "primary") return "notCaptured";
        const [res, toggled] = this.cell.write(
          (inner) => [inner.primaryPressed(), inner.toggled()] as const,
        );
        if (!res.stateChanged) return "notCaptured";
        if (res.needsRepaint) cx.requestRepaint();
        const onPress = this.actions.onPress;
        if (onPress) emitAction(cx, this.callbackName, () => onPress(toggled));
        return "captured";
      }
      case "buttonReleased": {
        if (event.button !== "primary") return "notCaptured";
        const inside = cx.isPointWithinVisibleBounds(event.position);
        const [res, wasDown] = this.cell.write((inner) => {
          const down = inner.state() === "down";
          return [inner.primaryReleased(inside), down] as const;
        });
        if (!res.stateChanged) return "notCaptured";
        if (res.needsRepaint) cx.requestRepaint();
        const onClick = this.actions.onClick;
        if (onClick && wasDown && inside) emitAction(cx, this.callbackName, onClick);
        return "captured";
      }
      case "hoverTimeout":
        if (this.tooltip !== null) {
          cx.showTooltip({
            message: this.tooltip.message,
            elementBounds: cx.rect(),
            align: this.tooltip.align ?? ALIGN2_TOP_CENTER,
          });
        }
        return "notCaptured";
    }
  }

  renderPrimitives(cx: RenderContext, primitives: PrimitiveGroup): void {
    const p = this.cell.read((inner) => inner.renderPrimitives(rectFromSize(cx.boundsSize)));
    if (p.bgQuad !== null) primitives.add(p.bgQuad);
    if (p.text !== null) {
      primitives.setZIndex(1);
      primitives.addText(p.text);
    }
  }
}

/* ========== Handle ========== */

/** Public handle shared by label buttons. Safe to keep for any length of time. */
export class LabelButtonHandle<S> {
  constructor(
    readonly el: ElementHandle,
    protected readonly cell: SharedCell<LabelButtonInner<S>>,
  ) {}

  /** Write the cell, release it, then notify when `fn` reports a change. */
  protected update(fn: (inner: LabelButtonInner<S>) => boolean): void {
    if (this.cell.write(fn)) this.el.notifyCustomStateChange();
  }

  text(): string {
    return this.cell.read((inner) => inner.text());
  }

  setText(text: string): void {
    this.update((inner) => inner.setText(text));
  }

  style(): S {
    return this.cell.read((inner) => inner.style());
  }

  /** No-op when `style` is the current style object. */
  setStyle(style: S): void {
    this.update((inner) => inner.setStyle(style));
  }

  disabled(): boolean {
    return this.cell.read((inner) => inner.state() === "disabled");
  }

  setDisabled(disabled: boolean): void {
    this.update((inner) => inner.setDisabled(disabled).stateChanged);
  }

  /**
   * Offset mainly used to correct the position of icon glyphs. It does not
   * move the background quad.
   */
  setTextOffset(offset: Point): void {
    this.update((inner) => inner.setTextOffset(offset));
  }

  textOffset(): Point {
    return this.cell.read((inner) => inner.textOffset());
  }

  desiredPaddedSize(): Size {
    return this.cell.read((inner) => inner.desiredPaddedSize());
  }

  unclippedTextSize(): Size {
    return this.cell.read((inner) => inner.unclippedTextSize());
  }
}

/** Build the inner state and register the element with `host`. */
export function mountLabelButton<S, A>(
  host: ElementHost<A>,
  kind: LabelButtonKind<S>,
  props: LabelButtonProps<S> & Readonly<{ toggled?: boolean }>,
  actions: LabelButtonActions<A>,
  callbackName: string,
): Readonly<{ el: ElementHandle; cell: SharedCell<LabelButtonInner<S>> }> {
  const inner = new LabelButtonInner(kind, props.text ?? "", props.style, host.textMeasurer, {
    toggled: props.toggled,
    textOffset: props.textOffset,
  });
  if (props.disabled === true) inner.setDisabled(true);
  const cell = createSharedCell(inner);
  const el = host.addElement({
    element: new LabelButtonElement(cell, actions, callbackName, props.tooltip ?? null),
    zIndex: props.zIndex,
    boundingRect: props.boundingRect,
    manuallyHidden: props.hidden,
  });
  return { el, cell };
}
