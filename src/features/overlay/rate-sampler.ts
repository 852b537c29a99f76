/**
 * Periodic tick counter behind the overlay's FPS readout.
 *
 * Each tick bumps a counter; once at least `windowMs` has passed since the last
 * publish, the counter becomes the published rate and starts over. The value is
 * "ticks seen in the last window of at least one second", so timer jitter makes
 * it an approximation of the frame rate rather than a measurement of it.
 */

import { TIMING } from '../../shared/constants/timing'
import { logger } from '../../shared/utils/logger'

const log = logger.scope('RateSampler')

export interface RateSamplerOptions {
  clock?: () => number
  intervalMs?: number
  windowMs?: number
  onRate?: (rate: number) => void
}

export class RateSampler {
  private readonly clock: () => number
  private readonly intervalMs: number
  private readonly windowMs: number
  private readonly onRate?: (rate: number) => void

  private abortController: AbortController | null = null
  private tickTimer: NodeJS.Timeout | null = null
  private tickCount = 0
  private lastPublish = 0
  private currentRate = 0

  constructor(options: RateSamplerOptions = {}) {
    this.clock = options.clock ?? (() => Date.now())
    this.intervalMs = options.intervalMs ?? TIMING.DEFAULT_TICK_INTERVAL_MS
    this.windowMs = options.windowMs ?? TIMING.RATE_WINDOW_MS
    this.onRate = options.onRate
  }

  /**
   * Starts sampling. Returns false when already running.
   */
  start(): boolean {
    if (this.abortController) {
      log.warn('Already running')
      return false
    }

    const controller = new AbortController()
    this.abortController = controller
    this.tickCount = 0
    this.lastPublish = this.clock()

    this.tick(controller.signal)
    log.debug(`Started (${this.intervalMs}ms ticks)`)
    return true
  }

  /**
   * Requests cancellation. No publish happens after this returns.
   */
  stop(): void {
    if (!this.abortController) return

    this.abortController.abort()
    this.abortController = null
    if (this.tickTimer) {
      clearTimeout(this.tickTimer)
      this.tickTimer = null
    }
    log.debug('Stopped')
  }

  isRunning(): boolean {
    return this.abortController !== null
  }

  /** Last published rate; kept after stop. */
  getCurrentRate(): number {
    return this.currentRate
  }

  private tick(signal: AbortSignal): void {
    if (signal.aborted) return

    this.tickCount++
    const now = this.clock()

    if (now - this.lastPublish >= this.windowMs) {
      this.currentRate = this.tickCount
      this.tickCount = 0
      this.lastPublish = now
      this.publish(this.currentRate)
    }

    // publish listeners may have stopped the sampler
    if (signal.aborted) return
    this.tickTimer = setTimeout(() => this.tick(signal), this.intervalMs)
  }

  private publish(rate: number): void {
    if (!this.onRate) return
    try {
      this.onRate(rate)
    } catch (error) {
      log.error('Rate listener failed:', error)
    }
  }
}
