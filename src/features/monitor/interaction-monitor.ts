/**
 * Entry point for the UI composition layer.
 * Feeds every notification through the visibility controller and the gesture
 * classifier, and keeps classified gestures in the bounded log.
 */

import type {
  InteractionKind,
  OverlayState,
  Rect,
  TimelineEntry
} from '../../types/interaction'
import { loadMonitorConfig, type MonitorConfig } from '../../shared/config/monitor-config'
import { logger } from '../../shared/utils/logger'
import {
  getPlatformBridge,
  getSurfaceBridge,
  type PlatformBridge,
  type SurfaceBridge
} from '../core/bridges'
import { GestureClassifier } from '../gestures/gesture-classifier'
import { BoundedEventLog } from '../timeline/bounded-event-log'
import { formatLogToggleLabel, formatTimeline, type TimelineRow } from '../timeline/timeline-formatter'
import { OverlayVisibilityController } from '../overlay/overlay-visibility-controller'
import { parseNotification } from './notification-parser'

const log = logger.scope('InteractionMonitor')

export interface InteractionMonitorOptions {
  config?: MonitorConfig
  surfaceBridge?: SurfaceBridge
  platformBridge?: PlatformBridge
  fullscreenDetector?: () => boolean
  onRate?: (rate: number) => void
}

export class InteractionMonitor {
  readonly config: MonitorConfig
  private readonly classifier: GestureClassifier
  private readonly eventLog: BoundedEventLog
  private readonly visibility: OverlayVisibilityController
  // Log panel visibility; owned here so it outlives overlay hide/show cycles
  private logVisible = true
  private readonly viewListeners = new Set<() => void>()
  private disposed = false

  constructor(options: InteractionMonitorOptions = {}) {
    this.config = options.config ?? loadMonitorConfig()
    if (this.config.debug) {
      logger.setDebug(true)
    }

    const platformBridge = options.platformBridge ?? getPlatformBridge()
    const surfaceBridge = options.surfaceBridge ?? getSurfaceBridge()

    this.classifier = new GestureClassifier({
      clock: () => platformBridge.currentTimeMillis(),
      swipeTimeoutMs: this.config.swipeTimeoutMs
    })
    this.eventLog = new BoundedEventLog(this.config.maxEntries)
    this.visibility = new OverlayVisibilityController({
      surfaceBridge,
      platformBridge,
      layout: this.config.surface,
      sampler: {
        intervalMs: this.config.tickIntervalMs,
        windowMs: this.config.rateWindowMs
      },
      onRate: options.onRate,
      fullscreenDetector: options.fullscreenDetector
    })
  }

  /**
   * Evaluates overlay visibility once without waiting for a notification.
   */
  attach(): OverlayState {
    return this.visibility.update()
  }

  /**
   * Typed entry point. Returns the gesture recorded for this notification, if any.
   */
  onNotification(kind: InteractionKind, bounds: Rect): TimelineEntry | null {
    if (this.disposed) return null

    this.visibility.update()

    const entry = this.classifier.classify({ kind, bounds })
    if (entry) {
      this.eventLog.append(entry)
    }
    return entry
  }

  /**
   * Entry point for untyped payloads. Malformed payloads still count as a
   * notification for visibility polling but record nothing.
   */
  ingest(payload: unknown): TimelineEntry | null {
    if (this.disposed) return null

    const notification = parseNotification(payload)
    if (!notification) {
      log.debug('Dropped malformed notification')
      this.visibility.update()
      return null
    }
    return this.onNotification(notification.kind, notification.bounds)
  }

  getTimeline(): TimelineEntry[] {
    return this.eventLog.snapshot()
  }

  /** Display rows, or none while the log panel is hidden. */
  getTimelineRows(): TimelineRow[] {
    if (!this.logVisible) return []
    return formatTimeline(this.eventLog.snapshot())
  }

  isLogVisible(): boolean {
    return this.logVisible
  }

  setLogVisible(visible: boolean): void {
    if (this.logVisible === visible) return
    this.logVisible = visible
    log.debug(`Log panel ${visible ? 'shown' : 'hidden'}`)
    for (const listener of this.viewListeners) listener()
  }

  /**
   * Flips the log panel. Recording continues while it is hidden.
   * @returns The new visibility
   */
  toggleLogVisible(): boolean {
    this.setLogVisible(!this.logVisible)
    return this.logVisible
  }

  /** Label for the control that flips the log panel. */
  getLogToggleLabel(): string {
    return formatLogToggleLabel(this.logVisible)
  }

  clearLog(): void {
    this.eventLog.clear()
  }

  getCurrentRate(): number {
    return this.visibility.getCurrentRate()
  }

  getOverlayState(): OverlayState {
    return this.visibility.getState()
  }

  /** Notified after every log change and every log panel toggle. */
  subscribe(listener: () => void): () => void {
    const notify = () => listener()
    const unsubscribeLog = this.eventLog.subscribe(notify)
    this.viewListeners.add(notify)
    return () => {
      unsubscribeLog()
      this.viewListeners.delete(notify)
    }
  }

  /**
   * Hides the overlay and stops sampling. Later notifications are ignored.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.visibility.hide()
    this.classifier.reset()
    log.info('Disposed')
  }
}
