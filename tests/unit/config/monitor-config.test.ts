import { DEFAULT_MONITOR_CONFIG, loadMonitorConfig } from '@/shared/config/monitor-config'

describe('loadMonitorConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadMonitorConfig({})).toEqual(DEFAULT_MONITOR_CONFIG)
  })

  it('has the documented defaults', () => {
    expect(DEFAULT_MONITOR_CONFIG).toMatchObject({
      maxEntries: 100,
      tickIntervalMs: 16,
      rateWindowMs: 1000,
      swipeTimeoutMs: null,
      longPressMs: 500,
      hitBoxSize: 2,
      debug: false
    })
    expect(DEFAULT_MONITOR_CONFIG.surface).toEqual({
      widthRatio: 0.4,
      heightRatio: 0.6,
      offsetX: 20,
      offsetY: 100,
      gravity: 'top-end'
    })
  })

  it('reads values from the environment', () => {
    const config = loadMonitorConfig({
      MONITOR_MAX_ENTRIES: '250',
      MONITOR_TICK_INTERVAL_MS: '33',
      MONITOR_SWIPE_TIMEOUT_MS: '750',
      MONITOR_LONG_PRESS_MS: '800',
      MONITOR_DEBUG: 'true'
    })

    expect(config).toMatchObject({
      maxEntries: 250,
      tickIntervalMs: 33,
      swipeTimeoutMs: 750,
      longPressMs: 800,
      debug: true
    })
  })

  it('clamps out-of-range values', () => {
    const config = loadMonitorConfig({
      MONITOR_MAX_ENTRIES: '0',
      MONITOR_TICK_INTERVAL_MS: '1',
      MONITOR_SWIPE_TIMEOUT_MS: '999999',
      MONITOR_LONG_PRESS_MS: '10'
    })

    expect(config).toMatchObject({
      maxEntries: 1,
      tickIntervalMs: 4,
      swipeTimeoutMs: 60000,
      longPressMs: 50
    })
  })

  it('falls back to defaults for unparseable values', () => {
    const config = loadMonitorConfig({
      MONITOR_MAX_ENTRIES: 'lots',
      MONITOR_TICK_INTERVAL_MS: '',
      MONITOR_SWIPE_TIMEOUT_MS: 'soon',
      MONITOR_DEBUG: 'yes'
    })

    expect(config).toMatchObject({
      maxEntries: 100,
      tickIntervalMs: 16,
      swipeTimeoutMs: null,
      debug: false
    })
  })

  it('treats "off" as no swipe timeout', () => {
    expect(loadMonitorConfig({ MONITOR_SWIPE_TIMEOUT_MS: 'off' }).swipeTimeoutMs).toBeNull()
  })

  it('accepts "1" as a debug flag', () => {
    expect(loadMonitorConfig({ MONITOR_DEBUG: '1' }).debug).toBe(true)
  })

  it('lets overrides win over the environment', () => {
    const config = loadMonitorConfig(
      { MONITOR_MAX_ENTRIES: '250', MONITOR_SWIPE_TIMEOUT_MS: '750', MONITOR_DEBUG: 'true' },
      { maxEntries: 20, swipeTimeoutMs: null, debug: false }
    )

    expect(config.maxEntries).toBe(20)
    expect(config.swipeTimeoutMs).toBeNull()
    expect(config.debug).toBe(false)
  })

  it('truncates and clamps numeric overrides', () => {
    const config = loadMonitorConfig({}, { maxEntries: 12.9, rateWindowMs: 0, hitBoxSize: 500 })

    expect(config.maxEntries).toBe(12)
    expect(config.rateWindowMs).toBe(1)
    expect(config.hitBoxSize).toBe(64)
  })

  it('merges partial surface overrides and rejects unusable ratios', () => {
    const config = loadMonitorConfig({}, { surface: { widthRatio: 2, heightRatio: -1, gravity: 'bottom-start' } })

    expect(config.surface).toEqual({
      widthRatio: 1,
      heightRatio: 0.6,
      offsetX: 20,
      offsetY: 100,
      gravity: 'bottom-start'
    })
  })
})
