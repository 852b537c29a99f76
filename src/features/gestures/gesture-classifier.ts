/**
 * Turns raw interaction notifications into gesture records.
 *
 * Direct kinds map one-to-one onto a TouchEvent at the center of the
 * notification's bounds. Scroll notifications are paired: the first one opens a
 * pending swipe, the next one closes it into a SwipeEvent.
 *
 * Pairing does not check that both scrolls belong to the same gesture, so two
 * unrelated scrolls far apart in time still form a swipe. `swipeTimeoutMs`
 * bounds that gap when set; it is off by default.
 */

import {
  InteractionKind,
  SwipeDirection,
  TouchAction,
  type InteractionNotification,
  type Rect,
  type SwipeEvent,
  type SwipeTrackingState,
  type TimelineEntry,
  type TouchEvent
} from '../../types/interaction'
import { logger } from '../../shared/utils/logger'

const log = logger.scope('GestureClassifier')

export interface GestureClassifierOptions {
  clock?: () => number
  swipeTimeoutMs?: number | null
}

interface SwipePoint {
  x: number
  y: number
  time: number
}

const TOUCH_ACTIONS: Record<Exclude<InteractionKind, InteractionKind.Scroll>, TouchAction> = {
  [InteractionKind.Click]: TouchAction.Click,
  [InteractionKind.LongClick]: TouchAction.LongClick,
  [InteractionKind.GestureStart]: TouchAction.GestureStart,
  [InteractionKind.GestureEnd]: TouchAction.GestureEnd,
  [InteractionKind.Focus]: TouchAction.Focus,
  [InteractionKind.Select]: TouchAction.Select,
  [InteractionKind.TextChange]: TouchAction.TextChange
}

export function isUsableRect(rect: Rect): boolean {
  return (
    Number.isFinite(rect.x) &&
    Number.isFinite(rect.y) &&
    Number.isFinite(rect.width) &&
    Number.isFinite(rect.height) &&
    rect.width > 0 &&
    rect.height > 0
  )
}

export function rectCenter(rect: Rect): { x: number; y: number } {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 }
}

export function swipeDirection(dx: number, dy: number): SwipeDirection {
  if (Math.abs(dx) > Math.abs(dy)) {
    return dx > 0 ? SwipeDirection.Right : SwipeDirection.Left
  }
  return dy > 0 ? SwipeDirection.Down : SwipeDirection.Up
}

export function buildSwipeEvent(start: SwipePoint, end: SwipePoint): SwipeEvent {
  const dx = end.x - start.x
  const dy = end.y - start.y
  const distance = Math.sqrt(dx * dx + dy * dy)
  const durationMs = end.time - start.time
  const velocity = durationMs > 0 ? (distance / durationMs) * 1000 : 0

  return {
    type: 'swipe',
    startX: start.x,
    startY: start.y,
    endX: end.x,
    endY: end.y,
    durationMs,
    velocity,
    direction: swipeDirection(dx, dy),
    timestamp: end.time
  }
}

export class GestureClassifier {
  private readonly clock: () => number
  private readonly swipeTimeoutMs: number | null
  private tracking: SwipeTrackingState = { status: 'idle' }

  constructor(options: GestureClassifierOptions = {}) {
    this.clock = options.clock ?? (() => Date.now())
    this.swipeTimeoutMs = options.swipeTimeoutMs ?? null
  }

  /**
   * Classifies a notification. Returns null for unusable bounds and for the
   * first half of a swipe.
   */
  classify(notification: InteractionNotification): TimelineEntry | null {
    const { kind, bounds } = notification
    if (!isUsableRect(bounds)) {
      return null
    }

    const { x, y } = rectCenter(bounds)
    const now = this.clock()

    if (kind === InteractionKind.Scroll) {
      return this.trackScroll({ x, y, time: now })
    }

    const touch: TouchEvent = {
      type: 'touch',
      action: TOUCH_ACTIONS[kind],
      x,
      y,
      timestamp: now
    }
    return touch
  }

  getTrackingState(): SwipeTrackingState {
    return { ...this.tracking }
  }

  reset(): void {
    this.tracking = { status: 'idle' }
  }

  private trackScroll(point: SwipePoint): SwipeEvent | null {
    const pending = this.tracking
    if (pending.status === 'idle') {
      this.tracking = { status: 'pending', startX: point.x, startY: point.y, startTime: point.time }
      return null
    }

    if (this.swipeTimeoutMs !== null && point.time - pending.startTime > this.swipeTimeoutMs) {
      log.debug(`Pending swipe expired after ${point.time - pending.startTime}ms`)
      this.tracking = { status: 'pending', startX: point.x, startY: point.y, startTime: point.time }
      return null
    }

    this.tracking = { status: 'idle' }
    return buildSwipeEvent({ x: pending.startX, y: pending.startY, time: pending.startTime }, point)
  }
}
