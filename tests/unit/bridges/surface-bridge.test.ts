import {
  createHeadlessSurfaceBridge,
  getSurfaceBridge,
  resetSurfaceBridge,
  setSurfaceBridge,
  type SurfaceConfig
} from '@/features/core/bridges'

const config: SurfaceConfig = {
  width: 400,
  height: 300,
  gravity: 'top-end',
  x: 20,
  y: 100,
  translucent: true,
  focusable: false
}

describe('headless surface bridge', () => {
  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined)
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it('creates a surface at its configured offset', () => {
    const bridge = createHeadlessSurfaceBridge()
    const handle = bridge.createSurface(config, {})

    expect(handle).toEqual({ id: 1 })
    expect(bridge.getLiveSurface()).toEqual({
      handle: { id: 1 },
      config,
      text: '',
      position: { x: 20, y: 100 }
    })
  })

  it('holds at most one surface', () => {
    const bridge = createHeadlessSurfaceBridge()
    bridge.createSurface(config, {})

    expect(bridge.createSurface(config, {})).toBeNull()
  })

  it('updates text and position of the live surface', () => {
    const bridge = createHeadlessSurfaceBridge()
    const handle = bridge.createSurface(config, {})
    if (!handle) throw new Error('surface not created')

    bridge.updateSurfaceText(handle, 'FPS: 30')
    bridge.repositionSurface(handle, 5, 6)

    expect(bridge.getLiveSurface()).toMatchObject({ text: 'FPS: 30', position: { x: 5, y: 6 } })
  })

  it('ignores calls made with a removed handle', () => {
    const bridge = createHeadlessSurfaceBridge()
    const first = bridge.createSurface(config, {})
    if (!first) throw new Error('surface not created')
    bridge.removeSurface(first)

    const second = bridge.createSurface(config, {})
    bridge.updateSurfaceText(first, 'stale')
    bridge.repositionSurface(first, 1, 1)
    bridge.removeSurface(first)

    expect(second).toEqual({ id: 2 })
    expect(bridge.getLiveSurface()).toMatchObject({ handle: { id: 2 }, text: '', position: { x: 20, y: 100 } })
  })

  it('returns copies of the live surface', () => {
    const bridge = createHeadlessSurfaceBridge()
    bridge.createSurface(config, {})

    const live = bridge.getLiveSurface()
    if (!live) throw new Error('surface not created')
    live.position.x = 999

    expect(bridge.getLiveSurface()?.position.x).toBe(20)
  })

  it('dispatches pointer moves to the surface handlers', () => {
    const bridge = createHeadlessSurfaceBridge()
    expect(bridge.dispatchPointerMove(1, 2)).toBe(false)

    const onPointerMove = jest.fn()
    bridge.createSurface(config, { onPointerMove })

    expect(bridge.dispatchPointerMove(300, 200)).toBe(true)
    expect(onPointerMove).toHaveBeenCalledWith(300, 200)
  })
})

describe('surface bridge accessor', () => {
  afterEach(() => {
    resetSurfaceBridge()
  })

  it('defaults to one shared headless bridge', () => {
    expect(getSurfaceBridge()).toBe(getSurfaceBridge())
  })

  it('returns an installed bridge until reset', () => {
    const custom = createHeadlessSurfaceBridge()
    setSurfaceBridge(custom)
    expect(getSurfaceBridge()).toBe(custom)

    resetSurfaceBridge()
    expect(getSurfaceBridge()).not.toBe(custom)
  })
})
