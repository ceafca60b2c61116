export type {
  BorderRadius,
  Corner,
  EdgeInsets,
  LayoutGeometry,
  PlacementInput,
  PlacementResult,
  PopupId,
  PopupIndicator,
  PopupLocation,
  Rect,
  Size,
  SpotlightTheme,
  TargetAnchor,
} from "./types/spotlight";

export {
  SpotlightError,
  LookupError,
  DuplicatePageError,
  DuplicatePopupError,
  type LookupKind,
} from "./lib/errors";
export { ObservableValue, type VisibilityHandle } from "./lib/observable-value";
export { PopupSequencer, type PopupSequencerOptions } from "./lib/popup-sequencer";
export {
  PopupManager,
  type PopupManagerOptions,
  type DuplicatePagePolicy,
} from "./lib/popup-manager";
export {
  POPUP_PADDING,
  CORNER_RADIUS,
  RESERVED_TOP,
  NO_INSETS,
  measureSpace,
  resolvePlacement,
  anchorPoint,
  overlayPosition,
  type OverlayPosition,
} from "./lib/placement";
export {
  createPlacementScheduler,
  type PlacementScheduler,
  type PlacementSchedulerOptions,
} from "./lib/placement-scheduler";
export {
  popupOptionsSchema,
  resolvePopupOptions,
  type PopupOptions,
  type PopupOptionsInput,
} from "./lib/popup-options";
export {
  createSeenStore,
  seenKey,
  type SeenStore,
  type SeenStorage,
} from "./lib/seen-store";
export { SpotlightProvider, useSpotlight, DEFAULT_THEME } from "./lib/spotlight-context";
export { useDiscover } from "./hooks/use-discover";
export { useVisibility } from "./hooks/use-visibility";
export { SpotlightPopup } from "./components/ui/spotlight-popup";
export { IndicatorIcon } from "./components/ui/indicator-icon";
