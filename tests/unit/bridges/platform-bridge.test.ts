import {
  createStaticPlatformBridge,
  getPlatformBridge,
  isLandscape,
  resetPlatformBridge,
  setPlatformBridge
} from '@/features/core/bridges'
import type { Orientation } from '@/types/interaction'

describe('static platform bridge', () => {
  it('starts in portrait with the permission granted', () => {
    const bridge = createStaticPlatformBridge()

    expect(bridge.currentOrientation()).toBe(0)
    expect(bridge.hasOverlayPermission()).toBe(true)
    expect(bridge.screenSize()).toEqual({ width: 1920, height: 1080 })
  })

  it('reports values pushed through its setters', () => {
    const bridge = createStaticPlatformBridge()
    bridge.setOrientation(270)
    bridge.setOverlayPermission(false)
    bridge.setScreenSize({ width: 800, height: 1280 })

    expect(bridge.currentOrientation()).toBe(270)
    expect(bridge.hasOverlayPermission()).toBe(false)
    expect(bridge.screenSize()).toEqual({ width: 800, height: 1280 })
  })

  it('does not expose its screen size for mutation', () => {
    const bridge = createStaticPlatformBridge({ screenSize: { width: 100, height: 200 } })
    bridge.screenSize().width = 5

    expect(bridge.screenSize().width).toBe(100)
  })

  it('reads time from the injected clock', () => {
    let now = 42
    const bridge = createStaticPlatformBridge({ clock: () => now })
    expect(bridge.currentTimeMillis()).toBe(42)

    now = 43
    expect(bridge.currentTimeMillis()).toBe(43)
  })
})

describe('isLandscape', () => {
  const cases: Array<[Orientation, boolean]> = [
    [0, false],
    [90, true],
    [180, false],
    [270, true]
  ]

  it.each(cases)('%d degrees -> %s', (orientation, expected) => {
    expect(isLandscape(orientation)).toBe(expected)
  })
})

describe('platform bridge accessor', () => {
  afterEach(() => {
    resetPlatformBridge()
  })

  it('returns an installed bridge until reset', () => {
    const custom = createStaticPlatformBridge({ orientation: 90 })
    setPlatformBridge(custom)
    expect(getPlatformBridge().currentOrientation()).toBe(90)

    resetPlatformBridge()
    expect(getPlatformBridge().currentOrientation()).toBe(0)
  })
})
