/**
 * packages/core/src/widgets/buttonStyle.ts — Button style tables and resolution.
 *
 * Why: Every interactive control maps (interaction state, toggled) to exactly
 * one style part. The resolvers here are total over that domain, so a lookup
 * can never come back empty; completeness of a table is checked once, when a
 * widget is constructed, by the assert* functions.
 *
 * Toggle tables carry no "down" parts: a pressed toggle button resolves to its
 * hovered part for the current toggled value.
 */

import { VellumError } from "../errors.js";
import { type Align, type Size, size } from "../layout/types.js";
import type { LabelStyle } from "./label.js";
import {
  DEFAULT_ACCENT_COLOR,
  DEFAULT_TEXT_PROPERTIES,
  type Padding,
  type QuadStyle,
  type Rgba,
  type TextProperties,
  WHITE,
  border,
  padding,
  quadStyle,
  quadStyleEquals,
  rgba,
  rgbaEquals,
  solid,
} from "./style.js";

export type ButtonState = "idle" | "hovered" | "down" | "disabled";

export const BUTTON_STATES: readonly ButtonState[] = Object.freeze([
  "idle",
  "hovered",
  "down",
  "disabled",
]);

/** Paint parameters for one (state, toggled) combination. */
export type ButtonStylePart = Readonly<{
  fontColor: Rgba;
  backQuad: QuadStyle;
}>;

type LabelLayoutFields = Readonly<{
  properties: TextProperties;
  verticalAlign: Align;
  minClippedSize: Size;
  padding: Padding;
}>;

export type ButtonStyle = LabelLayoutFields &
  Readonly<{
    idle: ButtonStylePart;
    hovered: ButtonStylePart;
    down: ButtonStylePart;
    disabled: ButtonStylePart;
  }>;

export type ToggleButtonStyle = LabelLayoutFields &
  Readonly<{
    idleOn: ButtonStylePart;
    hoveredOn: ButtonStylePart;
    disabledOn: ButtonStylePart;
    idleOff: ButtonStylePart;
    hoveredOff: ButtonStylePart;
    disabledOff: ButtonStylePart;
  }>;

export function buttonStylePartEquals(a: ButtonStylePart, b: ButtonStylePart): boolean {
  if (a === b) return true;
  return rgbaEquals(a.fontColor, b.fontColor) && quadStyleEquals(a.backQuad, b.backQuad);
}

export function resolveButtonStylePart(style: ButtonStyle, state: ButtonState): ButtonStylePart {
  switch (state) {
    case "idle":
      return style.idle;
    case "hovered":
      return style.hovered;
    case "down":
      return style.down;
    case "disabled":
      return style.disabled;
  }
}

export function resolveToggleButtonStylePart(
  style: ToggleButtonStyle,
  state: ButtonState,
  toggled: boolean,
): ButtonStylePart {
  if (toggled) {
    switch (state) {
      case "idle":
        return style.idleOn;
      case "hovered":
      case "down":
        return style.hoveredOn;
      case "disabled":
        return style.disabledOn;
    }
  }
  switch (state) {
    case "idle":
      return style.idleOff;
    case "hovered":
    case "down":
      return style.hoveredOff;
    case "disabled":
      return style.disabledOff;
  }
}

function labelStyleFromPart(fields: LabelLayoutFields, part: ButtonStylePart): LabelStyle {
  return {
    properties: fields.properties,
    fontColor: part.fontColor,
    verticalAlign: fields.verticalAlign,
    minClippedSize: fields.minClippedSize,
    backQuad: part.backQuad,
    padding: fields.padding,
  };
}

export function buttonLabelStyle(style: ButtonStyle, state: ButtonState): LabelStyle {
  return labelStyleFromPart(style, resolveButtonStylePart(style, state));
}

export function toggleButtonLabelStyle(
  style: ToggleButtonStyle,
  state: ButtonState,
  toggled: boolean,
): LabelStyle {
  return labelStyleFromPart(style, resolveToggleButtonStylePart(style, state, toggled));
}

/* ========== Validation ========== */

function isStylePart(value: unknown): value is ButtonStylePart {
  if (typeof value !== "object" || value === null) return false;
  if (!("fontColor" in value) || !("backQuad" in value)) return false;
  return (
    typeof value.fontColor === "object" &&
    value.fontColor !== null &&
    typeof value.backQuad === "object" &&
    value.backQuad !== null
  );
}

function assertParts(kind: string, parts: Readonly<Record<string, unknown>>): void {
  const missing = Object.keys(parts).filter((key) => !isStylePart(parts[key]));
  if (missing.length > 0) {
    throw new VellumError(
      "VELLUM_INVALID_STYLE",
      `${kind} is missing style parts: ${missing.join(", ")}`,
    );
  }
}

export function assertButtonStyle(style: ButtonStyle): void {
  assertParts("ButtonStyle", {
    idle: style.idle,
    hovered: style.hovered,
    down: style.down,
    disabled: style.disabled,
  });
}

export function assertToggleButtonStyle(style: ToggleButtonStyle): void {
  assertParts("ToggleButtonStyle", {
    idleOn: style.idleOn,
    hoveredOn: style.hoveredOn,
    disabledOn: style.disabledOn,
    idleOff: style.idleOff,
    hoveredOff: style.hoveredOff,
    disabledOff: style.disabledOff,
  });
}

/* ========== Defaults ========== */

const BORDER_IDLE = rgba(105, 105, 105);
const BORDER_HOVER = rgba(135, 135, 135);
const BORDER_DISABLED = rgba(80, 80, 80);
const FONT_DISABLED = rgba(150, 150, 150);
const BG_OFF = rgba(40, 40, 40);

const CENTERED_TEXT: TextProperties = Object.freeze({ ...DEFAULT_TEXT_PROPERTIES, align: "center" });

const DEFAULT_LABEL_FIELDS: LabelLayoutFields = Object.freeze({
  properties: CENTERED_TEXT,
  verticalAlign: "center",
  minClippedSize: size(5, 5),
  padding: padding(6, 6, 6, 6),
});

function part(fontColor: Rgba, bg: Rgba, borderColor: Rgba): ButtonStylePart {
  return Object.freeze({
    fontColor,
    backQuad: quadStyle(solid(bg), border(borderColor, 1, 4)),
  });
}

export function defaultButtonStyle(overrides: Partial<ButtonStyle> = {}): ButtonStyle {
  const style: ButtonStyle = Object.freeze({
    ...DEFAULT_LABEL_FIELDS,
    idle: part(WHITE, BG_OFF, BORDER_IDLE),
    hovered: part(WHITE, BG_OFF, BORDER_HOVER),
    down: part(WHITE, rgba(30, 30, 30), BORDER_HOVER),
    disabled: part(FONT_DISABLED, BG_OFF, BORDER_DISABLED),
    ...overrides,
  });
  assertButtonStyle(style);
  return style;
}

export function defaultToggleButtonStyle(
  overrides: Partial<ToggleButtonStyle> = {},
): ToggleButtonStyle {
  const style: ToggleButtonStyle = Object.freeze({
    ...DEFAULT_LABEL_FIELDS,
    idleOn: part(WHITE, DEFAULT_ACCENT_COLOR, BORDER_IDLE),
    hoveredOn: part(WHITE, DEFAULT_ACCENT_COLOR, BORDER_HOVER),
    disabledOn: part(FONT_DISABLED, rgba(76, 76, 76), BORDER_DISABLED),
    idleOff: part(WHITE, BG_OFF, BORDER_IDLE),
    hoveredOff: part(WHITE, BG_OFF, BORDER_HOVER),
    disabledOff: part(FONT_DISABLED, BG_OFF, BORDER_DISABLED),
    ...overrides,
  });
  assertToggleButtonStyle(style);
  return style;
}
