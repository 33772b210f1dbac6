/**
 * packages/core/src/runtime/interaction.ts — Button-class interaction state machine.
 *
 * Why: Buttons, toggle buttons and similar controls share one visual-feedback
 * state machine. It tracks the interaction state plus an orthogonal `toggled`
 * flag and reports, for every transition, whether the resolved style part
 * actually changed so callers only repaint when the appearance differs.
 *
 * Transitions:
 *   - pointerMoved:    idle -> hovered (ignored while disabled)
 *   - pointerLeft:     hovered | down -> idle
 *   - primaryPressed:  idle | hovered -> down; in toggle mode also flips
 *                      `toggled` in the same step (press edge, fires once)
 *   - primaryReleased: down | hovered -> hovered (inside) | idle (outside)
 *   - setDisabled:     any -> disabled, disabled -> idle
 *
 * Disabled suppresses every pointer-driven transition.
 */

import type { ButtonState } from "../widgets/buttonStyle.js";

export type StateChangeResult = Readonly<{
  stateChanged: boolean;
  needsRepaint: boolean;
}>;

export const NO_CHANGE: StateChangeResult = Object.freeze({
  stateChanged: false,
  needsRepaint: false,
});

export type InteractionMode = "push" | "toggle";

export type ButtonInteractionOptions<P> = Readonly<{
  mode: InteractionMode;
  toggled?: boolean;
  /** Resolve the style part in effect for a (state, toggled) pair. Must be total. */
  resolvePart: (state: ButtonState, toggled: boolean) => P;
  partsEqual: (a: P, b: P) => boolean;
}>;

export type PressResult = StateChangeResult &
  Readonly<{
    /** True when this press flipped `toggled` (toggle mode only). */
    toggledChanged: boolean;
  }>;

export interface ButtonInteraction {
  readonly mode: InteractionMode;
  state(): ButtonState;
  toggled(): boolean;
  setState(state: ButtonState): StateChangeResult;
  setToggled(toggled: boolean): StateChangeResult;
  setDisabled(disabled: boolean): StateChangeResult;
  pointerMoved(): StateChangeResult;
  pointerLeft(): StateChangeResult;
  primaryPressed(): PressResult;
  primaryReleased(insideBounds: boolean): StateChangeResult;
}

class ButtonInteractionImpl<P> implements ButtonInteraction {
  readonly mode: InteractionMode;
  private current: ButtonState = "idle";
  private isToggled: boolean;
  private readonly resolvePart: (state: ButtonState, toggled: boolean) => P;
  private readonly partsEqual: (a: P, b: P) => boolean;

  constructor(opts: ButtonInteractionOptions<P>) {
    this.mode = opts.mode;
    this.isToggled = opts.toggled === true;
    this.resolvePart = opts.resolvePart;
    this.partsEqual = opts.partsEqual;
  }

  state(): ButtonState {
    return this.current;
  }

  toggled(): boolean {
    return this.isToggled;
  }

  setState(state: ButtonState): StateChangeResult {
    if (this.current === state) return NO_CHANGE;
    const before = this.resolvePart(this.current, this.isToggled);
    const after = this.resolvePart(state, this.isToggled);
    this.current = state;
    return Object.freeze({ stateChanged: true, needsRepaint: !this.partsEqual(before, after) });
  }

  setToggled(toggled: boolean): StateChangeResult {
    if (this.isToggled === toggled) return NO_CHANGE;
    const before = this.resolvePart(this.current, this.isToggled);
    const after = this.resolvePart(this.current, toggled);
    this.isToggled = toggled;
    return Object.freeze({ stateChanged: true, needsRepaint: !this.partsEqual(before, after) });
  }

  setDisabled(disabled: boolean): StateChangeResult {
    if (disabled && this.current !== "disabled") return this.setState("disabled");
    if (!disabled && this.current === "disabled") return this.setState("idle");
    return NO_CHANGE;
  }

  pointerMoved(): StateChangeResult {
    if (this.current !== "idle") return NO_CHANGE;
    return this.setState("hovered");
  }

  pointerLeft(): StateChangeResult {
    if (this.current !== "hovered" && this.current !== "down") return NO_CHANGE;
    return this.setState("idle");
  }

  primaryPressed(): PressResult {
    if (this.current !== "idle" && this.current !== "hovered") {
      return Object.freeze({ ...NO_CHANGE, toggledChanged: false });
    }
    // One comparison across the state change and the flip.
    const before = this.resolvePart(this.current, this.isToggled);
    const toggledChanged = this.mode === "toggle";
    this.current = "down";
    if (toggledChanged) this.isToggled = !this.isToggled;
    const after = this.resolvePart(this.current, this.isToggled);
    return Object.freeze({
      stateChanged: true,
      needsRepaint: !this.partsEqual(before, after),
      toggledChanged,
    });
  }

  primaryReleased(insideBounds: boolean): StateChangeResult {
    if (this.current !== "down" && this.current !== "hovered") return NO_CHANGE;
    return this.setState(insideBounds ? "hovered" : "idle");
  }
}

export function createButtonInteraction<P>(opts: ButtonInteractionOptions<P>): ButtonInteraction {
  return new ButtonInteractionImpl(opts);
}
