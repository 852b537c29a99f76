/**
 * Shows the FPS overlay while the display is in a landscape rotation and hides
 * it otherwise. Orientation is polled: `update()` runs on every incoming
 * notification rather than on a rotation event.
 */

import { OverlayState } from '../../types/interaction'
import { DEFAULT_MONITOR_CONFIG, type SurfaceLayoutConfig } from '../../shared/config/monitor-config'
import { logger } from '../../shared/utils/logger'
import {
  getPlatformBridge,
  getSurfaceBridge,
  isLandscape,
  type PlatformBridge,
  type SurfaceBridge,
  type SurfaceConfig,
  type SurfaceHandle
} from '../core/bridges'
import { RateSampler, type RateSamplerOptions } from './rate-sampler'

const log = logger.scope('OverlayVisibility')

export interface OverlayVisibilityControllerOptions {
  surfaceBridge?: SurfaceBridge
  platformBridge?: PlatformBridge
  layout?: SurfaceLayoutConfig
  sampler?: Omit<RateSamplerOptions, 'onRate'>
  /** Extra listener for published rates, called after the surface text is updated */
  onRate?: (rate: number) => void
  fullscreenDetector?: () => boolean
}

/**
 * Fullscreen detection is not implemented yet. `false` here means "unknown",
 * not "verified windowed".
 */
export const detectFullscreenStub = (): boolean => false

export const formatRateText = (rate: number): string => `FPS: ${rate}`

export class OverlayVisibilityController {
  private readonly surfaceBridge: SurfaceBridge
  private readonly platformBridge: PlatformBridge
  private readonly layout: SurfaceLayoutConfig
  private readonly sampler: RateSampler
  private readonly onRate?: (rate: number) => void
  private readonly fullscreenDetector: () => boolean

  private state: OverlayState = OverlayState.Hidden
  // Surface-scoped references, only set while Visible
  private surfaceHandle: SurfaceHandle | null = null
  private surfaceSize: { width: number; height: number } | null = null

  constructor(options: OverlayVisibilityControllerOptions = {}) {
    this.surfaceBridge = options.surfaceBridge ?? getSurfaceBridge()
    this.platformBridge = options.platformBridge ?? getPlatformBridge()
    this.layout = options.layout ?? DEFAULT_MONITOR_CONFIG.surface
    this.onRate = options.onRate
    this.fullscreenDetector = options.fullscreenDetector ?? detectFullscreenStub
    this.sampler = new RateSampler({
      clock: () => this.platformBridge.currentTimeMillis(),
      ...options.sampler,
      onRate: (rate) => this.handleRate(rate)
    })
  }

  getState(): OverlayState {
    return this.state
  }

  getSurfaceHandle(): SurfaceHandle | null {
    return this.surfaceHandle
  }

  isSamplerRunning(): boolean {
    return this.sampler.isRunning()
  }

  getCurrentRate(): number {
    return this.sampler.getCurrentRate()
  }

  shouldShow(): boolean {
    return isLandscape(this.platformBridge.currentOrientation()) || this.fullscreenDetector()
  }

  /**
   * Re-evaluates visibility from the current orientation and applies any
   * transition. Calls that do not change the target state are no-ops.
   */
  update(): OverlayState {
    const shouldShow = this.shouldShow()
    if (shouldShow && this.state === OverlayState.Hidden) {
      this.show()
    } else if (!shouldShow && this.state === OverlayState.Visible) {
      this.hide()
    }
    return this.state
  }

  /**
   * Creates the surface and starts the sampler. Returns false, staying Hidden,
   * when the permission is missing or the surface cannot be created.
   */
  show(): boolean {
    if (this.state === OverlayState.Visible) return true

    if (!this.platformBridge.hasOverlayPermission()) {
      log.warn('Overlay permission not granted, staying hidden')
      return false
    }

    const config = this.buildSurfaceConfig()
    let handle: SurfaceHandle | null
    try {
      handle = this.surfaceBridge.createSurface(config, {
        onPointerMove: (rawX, rawY) => this.handleDrag(rawX, rawY)
      })
    } catch (error) {
      log.error('Failed to create surface:', error)
      return false
    }

    if (!handle) {
      log.warn('Surface creation refused, staying hidden')
      return false
    }

    this.surfaceHandle = handle
    this.surfaceSize = { width: config.width, height: config.height }
    this.state = OverlayState.Visible
    this.setSurfaceText(formatRateText(0))
    this.sampler.start()

    log.info(`Overlay shown (${config.width}x${config.height})`)
    return true
  }

  /**
   * Stops the sampler, removes the surface and drops every surface-scoped reference.
   */
  hide(): void {
    if (this.state === OverlayState.Hidden) return

    this.sampler.stop()

    const handle = this.surfaceHandle
    this.surfaceHandle = null
    this.surfaceSize = null
    this.state = OverlayState.Hidden

    if (handle) {
      try {
        this.surfaceBridge.removeSurface(handle)
      } catch (error) {
        log.error('Failed to remove surface:', error)
      }
    }

    log.info('Overlay hidden')
  }

  private buildSurfaceConfig(): SurfaceConfig {
    const screen = this.platformBridge.screenSize()
    return {
      width: Math.trunc(screen.width * this.layout.widthRatio),
      height: Math.trunc(screen.height * this.layout.heightRatio),
      gravity: this.layout.gravity,
      x: this.layout.offsetX,
      y: this.layout.offsetY,
      translucent: true,
      focusable: false
    }
  }

  // Centers the surface on the pointer
  private handleDrag(rawX: number, rawY: number): void {
    const handle = this.surfaceHandle
    const size = this.surfaceSize
    if (!handle || !size) return

    const x = Math.trunc(rawX - size.width / 2)
    const y = Math.trunc(rawY - size.height / 2)
    try {
      this.surfaceBridge.repositionSurface(handle, x, y)
    } catch (error) {
      log.error('Failed to reposition surface:', error)
    }
  }

  private handleRate(rate: number): void {
    this.setSurfaceText(formatRateText(rate))
    this.onRate?.(rate)
  }

  private setSurfaceText(text: string): void {
    if (!this.surfaceHandle) return
    try {
      this.surfaceBridge.updateSurfaceText(this.surfaceHandle, text)
    } catch (error) {
      log.error('Failed to update surface text:', error)
    }
  }
}
