export * from './types/interaction'
export { logger, type ScopedLogger } from './shared/utils/logger'
export {
  DEFAULT_MONITOR_CONFIG,
  loadMonitorConfig,
  type MonitorConfig,
  type MonitorConfigOverrides,
  type SurfaceGravity,
  type SurfaceLayoutConfig
} from './shared/config/monitor-config'
export * from './features/core/bridges'
export {
  GestureClassifier,
  buildSwipeEvent,
  swipeDirection,
  type GestureClassifierOptions
} from './features/gestures/gesture-classifier'
export { BoundedEventLog } from './features/timeline/bounded-event-log'
export {
  formatEntryTime,
  formatLogToggleLabel,
  formatTimeline,
  formatTimelineEntry,
  type TimelineRow
} from './features/timeline/timeline-formatter'
export { RateSampler, type RateSamplerOptions } from './features/overlay/rate-sampler'
export {
  OverlayVisibilityController,
  detectFullscreenStub,
  type OverlayVisibilityControllerOptions
} from './features/overlay/overlay-visibility-controller'
export { InteractionMonitor, type InteractionMonitorOptions } from './features/monitor/interaction-monitor'
export { parseNotification, parseRect } from './features/monitor/notification-parser'
export { DesktopInputSource, type DesktopInputSourceOptions } from './features/input/desktop-input-source'
export {
  createHookEmitter,
  resetInputHookManager,
  setInputHookFactory,
  type InputHook
} from './features/input/input-hook-manager'
