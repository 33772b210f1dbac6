/**
 * packages/core/src/widgets/button.ts — Push button widget.
 *
 * `onPressed` fires when a primary release inside the visible bounds ends a
 * press that started on the button. Releasing outside cancels the click.
 */

import type { TextMeasurer } from "../layout/textMeasure.js";
import type { Point } from "../layout/types.js";
import type { ElementHost } from "../runtime/element.js";
import {
  type ButtonStyle,
  assertButtonStyle,
  buttonLabelStyle,
  resolveButtonStylePart,
} from "./buttonStyle.js";
import {
  type LabelButtonKind,
  type LabelButtonProps,
  LabelButtonHandle,
  LabelButtonInner,
  mountLabelButton,
} from "./labelButton.js";

export const BUTTON_KIND: LabelButtonKind<ButtonStyle> = Object.freeze({
  mode: "push",
  resolvePart: resolveButtonStylePart,
  labelStyle: buttonLabelStyle,
  assertStyle: assertButtonStyle,
});

export class ButtonInner extends LabelButtonInner<ButtonStyle> {
  constructor(
    text: string,
    style: ButtonStyle,
    measurer: TextMeasurer,
    opts: Readonly<{ textOffset?: Point }> = {},
  ) {
    super(BUTTON_KIND, text, style, measurer, opts);
  }
}

export type ButtonProps<A> = LabelButtonProps<ButtonStyle> &
  Readonly<{
    onPressed?: () => A | undefined;
  }>;

export class Button extends LabelButtonHandle<ButtonStyle> {}

export function createButton<A>(host: ElementHost<A>, props: ButtonProps<A>): Button {
  const { el, cell } = mountLabelButton(host, BUTTON_KIND, props, { onClick: props.onPressed }, "onPressed");
  return new Button(el, cell);
}
