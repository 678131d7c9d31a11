/**
 * Barrel export for the library.
 *
 * Re-exports every public symbol so consumers can use a single import path.
 */

// Core
export * from './core/Geometry';
export { Instant, ManualClock, hrtimeClock, performanceClock, systemClock, type Clock } from './core/Time';
export { EventBus } from './core/EventBus';

// Host
export {
  Context,
  monospaceMeasurer,
  type AreaOptions,
  type ContextOptions,
  type FrameOutput,
  type RawInput,
  type TextMeasurer,
} from './host/Context';
export * from './host/Layout';
export * from './host/Painter';
export { defaultStyle, type Style } from './host/Style';
export { TempStore, type TypeGuard } from './host/TempStore';
export { Ui, type FrameOptions, type InnerResponse, type Response, type Spacing, type UiCheckpoint } from './host/Ui';

// Toasts
export * from './toasts/Toast';
export * from './toasts/Placement';
export * from './toasts/Progress';
export * from './toasts/DefaultContents';
export {
  Toasts,
  defaultToastsConfig,
  type ToastContents,
  type ToastEvents,
  type ToastsConfig,
} from './toasts/Toasts';

// Canvas backend
export { CanvasRenderer, canvasMeasurer, traceRoundedRect, type CanvasRenderOptions } from './renderer/CanvasRenderer';
export { startFrameLoop, type FrameLoop, type FrameLoopOptions } from './ui/FrameLoop';
