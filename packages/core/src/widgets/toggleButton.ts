/**
 * packages/core/src/widgets/toggleButton.ts — Toggle button widget.
 *
 * A primary press flips `toggled` and fires `onToggled` with the new value on
 * the press edge. The release that follows only updates the visual state.
 */

import type { TextMeasurer } from "../layout/textMeasure.js";
import type { Point } from "../layout/types.js";
import type { ElementHost } from "../runtime/element.js";
import {
  type ToggleButtonStyle,
  assertToggleButtonStyle,
  resolveToggleButtonStylePart,
  toggleButtonLabelStyle,
} from "./buttonStyle.js";
import {
  type LabelButtonKind,
  type LabelButtonProps,
  LabelButtonHandle,
  LabelButtonInner,
  mountLabelButton,
} from "./labelButton.js";

export const TOGGLE_BUTTON_KIND: LabelButtonKind<ToggleButtonStyle> = Object.freeze({
  mode: "toggle",
  resolvePart: resolveToggleButtonStylePart,
  labelStyle: toggleButtonLabelStyle,
  assertStyle: assertToggleButtonStyle,
});

/** Reusable toggle-button state for elements that embed one. */
export class ToggleButtonInner extends LabelButtonInner<ToggleButtonStyle> {
  constructor(
    text: string,
    style: ToggleButtonStyle,
    measurer: TextMeasurer,
    opts: Readonly<{ toggled?: boolean; textOffset?: Point }> = {},
  ) {
    super(TOGGLE_BUTTON_KIND, text, style, measurer, opts);
  }
}

export type ToggleButtonProps<A> = LabelButtonProps<ToggleButtonStyle> &
  Readonly<{
    toggled?: boolean;
    onToggled?: (toggled: boolean) => A | undefined;
  }>;

export class ToggleButton extends LabelButtonHandle<ToggleButtonStyle> {
  toggled(): boolean {
    return this.cell.read((inner) => inner.toggled());
  }

  setToggled(toggled: boolean): void {
    this.update((inner) => inner.setToggled(toggled).stateChanged);
  }
}

export function createToggleButton<A>(host: ElementHost<A>, props: ToggleButtonProps<A>): ToggleButton {
  const { el, cell } = mountLabelButton(
    host,
    TOGGLE_BUTTON_KIND,
    props,
    { onPress: props.onToggled },
    "onToggled",
  );
  return new ToggleButton(el, cell);
}
