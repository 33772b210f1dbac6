/**
 * packages/core/src/widgets/menuStyle.ts — Drop-down menu style and resolution.
 */

import type { MenuRowMetrics } from "../layout/menuRows.js";
import type { DualLabelStyle } from "./dualLabel.js";
import {
  DEFAULT_TEXT_PROPERTIES,
  type Padding,
  type QuadStyle,
  type Rgba,
  type TextProperties,
  WHITE,
  border,
  padding,
  quadStyle,
  rgba,
  solid,
} from "./style.js";

export type DropDownMenuStyle = Readonly<{
  leftTextProperties: TextProperties;
  rightTextProperties: TextProperties;

  leftTextColorIdle: Rgba;
  rightTextColorIdle: Rgba;
  leftTextColorHover: Rgba;
  rightTextColorHover: Rgba;

  backQuad: QuadStyle;
  /** Background behind the hovered row. */
  textBgQuadHover: QuadStyle;

  outerPadding: number;
  leftTextPadding: Padding;
  rightTextPadding: Padding;

  dividerColor: Rgba;
  dividerWidth: number;
  dividerPadding: number;
}>;

export function defaultDropDownMenuStyle(
  overrides: Partial<DropDownMenuStyle> = {},
): DropDownMenuStyle {
  return Object.freeze({
    leftTextProperties: DEFAULT_TEXT_PROPERTIES,
    rightTextProperties: DEFAULT_TEXT_PROPERTIES,

    leftTextColorIdle: WHITE,
    rightTextColorIdle: WHITE,
    leftTextColorHover: WHITE,
    rightTextColorHover: WHITE,

    backQuad: quadStyle(solid(rgba(40, 40, 40)), border(rgba(105, 105, 105), 1, 4)),
    textBgQuadHover: quadStyle(solid(rgba(65, 65, 65)), border(rgba(105, 105, 105), 1, 4)),

    outerPadding: 4,
    leftTextPadding: padding(5, 10, 5, 10),
    rightTextPadding: padding(5, 10, 5, 30),

    dividerColor: rgba(105, 105, 105, 150),
    dividerWidth: 1,
    dividerPadding: 2,
    ...overrides,
  });
}

/** Height of one option row: the taller of the two padded text columns. */
export function menuRowHeight(style: DropDownMenuStyle): number {
  const left =
    style.leftTextProperties.lineHeight + style.leftTextPadding.top + style.leftTextPadding.bottom;
  const right =
    style.rightTextProperties.lineHeight +
    style.rightTextPadding.top +
    style.rightTextPadding.bottom;
  return Math.max(left, right);
}

export function menuRowMetrics(style: DropDownMenuStyle): MenuRowMetrics {
  return {
    rowHeight: menuRowHeight(style),
    dividerWidth: style.dividerWidth,
    dividerPadding: style.dividerPadding,
    outerPadding: style.outerPadding,
  };
}

export function menuDualLabelStyle(style: DropDownMenuStyle, hovered: boolean): DualLabelStyle {
  return {
    leftProperties: style.leftTextProperties,
    rightProperties: style.rightTextProperties,
    leftFontColor: hovered ? style.leftTextColorHover : style.leftTextColorIdle,
    rightFontColor: hovered ? style.rightTextColorHover : style.rightTextColorIdle,
    verticalAlign: "center",
    leftPadding: style.leftTextPadding,
    rightPadding: style.rightTextPadding,
  };
}
