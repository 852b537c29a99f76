/**
 * Surface Bridge
 * Narrow boundary to the windowing layer that owns the always-on-top overlay.
 * The monitor only ever creates, updates, moves and removes one surface through it.
 */

import type { SurfaceGravity } from '../../../shared/config/monitor-config'
import { logger } from '../../../shared/utils/logger'

const log = logger.scope('HeadlessSurface')

// ============================================================================
// Types
// ============================================================================

export interface SurfaceConfig {
  width: number
  height: number
  gravity: SurfaceGravity
  /** Anchor offset from the gravity corner */
  x: number
  y: number
  translucent: boolean
  focusable: boolean
}

export interface SurfaceHandlers {
  /** Pointer moved over the surface; coordinates are absolute screen positions */
  onPointerMove?: (rawX: number, rawY: number) => void
}

export interface SurfaceHandle {
  readonly id: number
}

// ============================================================================
// Surface Bridge Interface
// ============================================================================

export interface SurfaceBridge {
  /** Returns null when the overlay permission is missing or a surface is already live */
  createSurface(config: SurfaceConfig, handlers: SurfaceHandlers): SurfaceHandle | null
  /** Best effort; ignored for stale handles */
  updateSurfaceText(handle: SurfaceHandle, text: string): void
  repositionSurface(handle: SurfaceHandle, x: number, y: number): void
  removeSurface(handle: SurfaceHandle): void
}

// ============================================================================
// Headless implementation
// ============================================================================

export interface LiveSurface {
  handle: SurfaceHandle
  config: SurfaceConfig
  text: string
  position: { x: number; y: number }
}

export interface HeadlessSurfaceBridge extends SurfaceBridge {
  getLiveSurface(): LiveSurface | null
  /** Feeds a pointer move into the live surface's handlers, as a drag would */
  dispatchPointerMove(rawX: number, rawY: number): boolean
}

/**
 * In-memory surface bridge for hosts without a windowing layer.
 * Holds at most one surface and logs what a real window would display.
 */
export function createHeadlessSurfaceBridge(): HeadlessSurfaceBridge {
  let nextId = 1
  let live: (LiveSurface & { handlers: SurfaceHandlers }) | null = null

  const isLive = (handle: SurfaceHandle): boolean => live !== null && live.handle.id === handle.id

  return {
    createSurface(config, handlers) {
      if (live) {
        log.warn('Surface already exists, refusing to create another')
        return null
      }
      const handle: SurfaceHandle = { id: nextId++ }
      live = {
        handle,
        config: { ...config },
        handlers,
        text: '',
        position: { x: config.x, y: config.y }
      }
      log.debug(`Created surface #${handle.id} (${config.width}x${config.height})`)
      return handle
    },

    updateSurfaceText(handle, text) {
      if (!live || !isLive(handle)) return
      live.text = text
      log.debug(`#${handle.id}: ${text}`)
    },

    repositionSurface(handle, x, y) {
      if (!live || !isLive(handle)) return
      live.position = { x, y }
    },

    removeSurface(handle) {
      if (!isLive(handle)) return
      live = null
      log.debug(`Removed surface #${handle.id}`)
    },

    getLiveSurface() {
      if (!live) return null
      return {
        handle: live.handle,
        config: { ...live.config },
        text: live.text,
        position: { ...live.position }
      }
    },

    dispatchPointerMove(rawX, rawY) {
      if (!live?.handlers.onPointerMove) return false
      live.handlers.onPointerMove(rawX, rawY)
      return true
    }
  }
}

// ============================================================================
// Singleton accessor
// ============================================================================

let surfaceBridge: SurfaceBridge | null = null

/**
 * Get the surface bridge singleton.
 * Falls back to a headless bridge when the host has not installed one.
 */
export function getSurfaceBridge(): SurfaceBridge {
  if (!surfaceBridge) {
    surfaceBridge = createHeadlessSurfaceBridge()
  }
  return surfaceBridge
}

/**
 * Set a custom surface bridge (the host's windowing layer, or a test double).
 */
export function setSurfaceBridge(bridge: SurfaceBridge): void {
  surfaceBridge = bridge
}

/**
 * Reset the surface bridge to default.
 */
export function resetSurfaceBridge(): void {
  surfaceBridge = null
}
