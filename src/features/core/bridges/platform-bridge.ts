/**
 * Platform Bridge
 * Orientation, time and permission signals the monitor polls from the host.
 */

import type { Orientation, ScreenSize } from '../../../types/interaction'

export interface PlatformBridge {
  currentOrientation(): Orientation
  currentTimeMillis(): number
  hasOverlayPermission(): boolean
  screenSize(): ScreenSize
}

export interface StaticPlatformOptions {
  orientation?: Orientation
  overlayPermission?: boolean
  screenSize?: ScreenSize
  clock?: () => number
}

export interface StaticPlatformBridge extends PlatformBridge {
  setOrientation(orientation: Orientation): void
  setOverlayPermission(granted: boolean): void
  setScreenSize(size: ScreenSize): void
}

const DEFAULT_SCREEN_SIZE: ScreenSize = { width: 1920, height: 1080 }

/**
 * Platform bridge backed by plain values. Hosts that learn about rotation or
 * permission changes push them in through the setters.
 */
export function createStaticPlatformBridge(options: StaticPlatformOptions = {}): StaticPlatformBridge {
  let orientation: Orientation = options.orientation ?? 0
  let overlayPermission = options.overlayPermission ?? true
  let size: ScreenSize = { ...(options.screenSize ?? DEFAULT_SCREEN_SIZE) }
  const clock = options.clock ?? (() => Date.now())

  return {
    currentOrientation: () => orientation,
    currentTimeMillis: () => clock(),
    hasOverlayPermission: () => overlayPermission,
    screenSize: () => ({ ...size }),
    setOrientation(next) {
      orientation = next
    },
    setOverlayPermission(granted) {
      overlayPermission = granted
    },
    setScreenSize(next) {
      size = { ...next }
    }
  }
}

export const isLandscape = (orientation: Orientation): boolean =>
  orientation === 90 || orientation === 270

let platformBridge: PlatformBridge | null = null

export function getPlatformBridge(): PlatformBridge {
  if (!platformBridge) {
    platformBridge = createStaticPlatformBridge()
  }
  return platformBridge
}

export function setPlatformBridge(bridge: PlatformBridge): void {
  platformBridge = bridge
}

export function resetPlatformBridge(): void {
  platformBridge = null
}
