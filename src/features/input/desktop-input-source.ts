/**
 * Turns global mouse input into interaction notifications for hosts without
 * an accessibility event stream. Primary-button presses become clicks (or long
 * clicks when held), wheel ticks become scrolls. Each notification carries a
 * small box centered on the pointer, so its center is the pointer position.
 */

import { InteractionKind, type InteractionNotification, type Rect } from '../../types/interaction'
import { INPUT_HOOK, TIMING } from '../../shared/constants/timing'
import { logger } from '../../shared/utils/logger'
import {
  registerHandler,
  startInputHook,
  stopInputHook,
  unregisterAllHandlers,
  type PointerHookEvent,
  type WheelHookEvent
} from './input-hook-manager'

const log = logger.scope('DesktopInput')

const MODULE_NAME = 'desktop-input'
const PRIMARY_BUTTON = 1

export interface DesktopInputSourceOptions {
  longPressMs?: number
  hitBoxSize?: number
  clock?: () => number
}

export class DesktopInputSource {
  private readonly longPressMs: number
  private readonly hitBoxSize: number
  private readonly clock: () => number
  private pressStart: { x: number; y: number; time: number } | null = null
  private isActive = false
  private pendingStart: Promise<boolean> | null = null
  // Bumped by stop(); a start that began under an older value is cancelled
  private generation = 0

  constructor(
    private readonly sink: (notification: InteractionNotification) => void,
    options: DesktopInputSourceOptions = {}
  ) {
    this.longPressMs = options.longPressMs ?? TIMING.DEFAULT_LONG_PRESS_MS
    this.hitBoxSize = options.hitBoxSize ?? INPUT_HOOK.DEFAULT_HIT_BOX_SIZE
    this.clock = options.clock ?? (() => Date.now())
  }

  /**
   * Starts listening. Returns false when the input hook is unavailable or when
   * stop() is called before the hook finishes starting.
   */
  async start(): Promise<boolean> {
    if (this.isActive) return true

    if (!this.pendingStart) {
      const pending = this.activate(this.generation)
      this.pendingStart = pending
      try {
        return await pending
      } finally {
        if (this.pendingStart === pending) this.pendingStart = null
      }
    }
    return this.pendingStart
  }

  stop(): void {
    this.generation++
    if (!this.isActive) return

    this.isActive = false
    this.pressStart = null
    unregisterAllHandlers(MODULE_NAME)
    stopInputHook(MODULE_NAME)
    log.info('Stopped')
  }

  private async activate(generation: number): Promise<boolean> {
    if (!(await startInputHook(MODULE_NAME))) {
      log.warn('Input hook not available, desktop input disabled')
      return false
    }

    if (generation !== this.generation) {
      stopInputHook(MODULE_NAME)
      log.debug('Stopped while starting, start cancelled')
      return false
    }

    registerHandler(MODULE_NAME, 'mousedown', (event) => this.handleMouseDown(event))
    registerHandler(MODULE_NAME, 'mouseup', (event) => this.handleMouseUp(event))
    registerHandler(MODULE_NAME, 'wheel', (event) => this.handleWheel(event))

    this.isActive = true
    log.info('Started')
    return true
  }

  private handleMouseDown(event: PointerHookEvent): void {
    if (event.button !== PRIMARY_BUTTON) return
    this.pressStart = { x: event.x, y: event.y, time: this.clock() }
  }

  private handleMouseUp(event: PointerHookEvent): void {
    if (event.button !== PRIMARY_BUTTON || !this.pressStart) return

    const press = this.pressStart
    this.pressStart = null
    const heldMs = this.clock() - press.time
    const kind = heldMs >= this.longPressMs ? InteractionKind.LongClick : InteractionKind.Click
    this.emit(kind, press.x, press.y)
  }

  private handleWheel(event: WheelHookEvent): void {
    this.emit(InteractionKind.Scroll, event.x, event.y)
  }

  private emit(kind: InteractionKind, x: number, y: number): void {
    try {
      this.sink({ kind, bounds: this.hitBox(x, y) })
    } catch (error) {
      log.error('Notification sink failed:', error)
    }
  }

  private hitBox(x: number, y: number): Rect {
    const half = this.hitBoxSize / 2
    return { x: x - half, y: y - half, width: this.hitBoxSize, height: this.hitBoxSize }
  }
}
