/**
 * @vellum-ui/core
 *
 * Reactive widget core: handle/element split over a shared configuration
 * cell, the button interaction state machine, overlay containment and menu
 * row measurement. Rendering, text shaping and the window pump belong to the
 * embedding toolkit; the in-process View stands in for them.
 */

// =============================================================================
// Errors, logging and configuration
// =============================================================================

export { VellumError, isVellumError, type VellumErrorCode } from "./errors.js";
export {
  createDevLog,
  defaultWarnSink,
  type DevLog,
  type DevLogArea,
  type WarnSink,
} from "./debug/devLog.js";
export {
  DEFAULT_HOVER_TIMEOUT_MS,
  resolveViewConfig,
  type EnvMap,
  type ResolvedViewConfig,
  type ViewConfig,
} from "./config.js";

// =============================================================================
// Geometry and layout
// =============================================================================

export {
  ALIGN2_BOTTOM_CENTER,
  ALIGN2_BOTTOM_END,
  ALIGN2_BOTTOM_START,
  ALIGN2_CENTER,
  ALIGN2_TOP_CENTER,
  ALIGN2_TOP_END,
  ALIGN2_TOP_START,
  ZERO_POINT,
  ZERO_SIZE,
  point,
  rect,
  rectEquals,
  rectFromSize,
  rectOrigin,
  rectWithOrigin,
  size,
  sizeEquals,
  type Align,
  type Align2,
  type Point,
  type Rect,
  type Size,
} from "./layout/types.js";
export {
  contains,
  containsPoint,
  hitTestStack,
  intersectRect,
  type HitTestCandidate,
} from "./layout/hitTest.js";
export {
  containOverlay,
  resolveOverlayBounds,
  type OverlayContainment,
} from "./layout/overlayContainment.js";
export {
  hitTestMenuRows,
  measureMenuRows,
  type MeasuredMenuRow,
  type MenuRowInput,
  type MenuRowMetrics,
  type MenuRowsLayout,
} from "./layout/menuRows.js";
export {
  createMonospaceTextMeasurer,
  type MonospaceTextMeasurerOptions,
  type TextMeasurer,
} from "./layout/textMeasure.js";

// =============================================================================
// Primitives
// =============================================================================

export {
  createPrimitiveGroup,
  quadPrimitive,
  solidQuadPrimitive,
  type Primitive,
  type PrimitiveEntry,
  type PrimitiveGroup,
  type QuadPrimitive,
  type SolidQuadPrimitive,
  type TextPrimitive,
} from "./drawlist/primitives.js";

// =============================================================================
// Runtime
// =============================================================================

export { createSharedCell, type SharedCell } from "./runtime/sharedCell.js";
export {
  NO_CHANGE,
  createButtonInteraction,
  type ButtonInteraction,
  type ButtonInteractionOptions,
  type InteractionMode,
  type PressResult,
  type StateChangeResult,
} from "./runtime/interaction.js";
export {
  createActionChannel,
  type ActionChannel,
  type ActionReceiver,
  type ActionSender,
} from "./runtime/actionChannel.js";
export { createNodeTimerService, type TimerService } from "./runtime/timers.js";
export {
  ELEMENT_FLAG_LISTENS_TO_FOCUS_CHANGE,
  ELEMENT_FLAG_LISTENS_TO_POINTER_INSIDE_BOUNDS,
  ELEMENT_FLAG_LISTENS_TO_POINTER_OUTSIDE_BOUNDS_WHEN_FOCUSED,
  ELEMENT_FLAG_LISTENS_TO_POSITION_CHANGE,
  ELEMENT_FLAG_PAINTS,
  hasFlag,
  type CursorIcon,
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
  type RenderContext,
} from "./runtime/element.js";
export {
  View,
  createView,
  type ActiveTooltip,
  type PointerInput,
  type RenderedElement,
  type ViewOptions,
} from "./runtime/view.js";

// =============================================================================
// Styles
// =============================================================================

export {
  BLACK,
  DEFAULT_ACCENT_COLOR,
  DEFAULT_TEXT_PROPERTIES,
  NO_BACKGROUND,
  NO_BORDER,
  TRANSPARENT,
  WHITE,
  ZERO_PADDING,
  backgroundEquals,
  border,
  borderEquals,
  isQuadInvisible,
  padding,
  paddingEquals,
  quadStyle,
  quadStyleEquals,
  rgba,
  rgbaEquals,
  solid,
  type Background,
  type BorderStyle,
  type Padding,
  type QuadStyle,
  type Rgba,
  type TextProperties,
} from "./widgets/style.js";
export {
  BUTTON_STATES,
  assertButtonStyle,
  assertToggleButtonStyle,
  buttonLabelStyle,
  buttonStylePartEquals,
  defaultButtonStyle,
  defaultToggleButtonStyle,
  resolveButtonStylePart,
  resolveToggleButtonStylePart,
  toggleButtonLabelStyle,
  type ButtonState,
  type ButtonStyle,
  type ButtonStylePart,
  type ToggleButtonStyle,
} from "./widgets/buttonStyle.js";
export {
  defaultDropDownMenuStyle,
  menuDualLabelStyle,
  menuRowHeight,
  menuRowMetrics,
  type DropDownMenuStyle,
} from "./widgets/menuStyle.js";

// =============================================================================
// Widgets
// =============================================================================

export { LabelInner, type LabelPrimitives, type LabelStyle } from "./widgets/label.js";
export {
  DualLabelInner,
  type DualLabelPrimitives,
  type DualLabelStyle,
} from "./widgets/dualLabel.js";
export {
  LabelButtonHandle,
  LabelButtonInner,
  type LabelButtonKind,
  type LabelButtonProps,
  type TooltipOptions,
} from "./widgets/labelButton.js";
export { BUTTON_KIND, Button, ButtonInner, createButton, type ButtonProps } from "./widgets/button.js";
export {
  TOGGLE_BUTTON_KIND,
  ToggleButton,
  ToggleButtonInner,
  createToggleButton,
  type ToggleButtonProps,
} from "./widgets/toggleButton.js";
export {
  DropDownMenu,
  DropDownMenuElement,
  MENU_DIVIDER,
  createDropDownMenu,
  menuOption,
  type DropDownMenuProps,
  type MenuEntry,
} from "./widgets/dropDownMenu.js";
