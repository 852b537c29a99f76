/**
 * Timing and capacity limits shared by the monitor's components.
 */

export const TIMING = {
  /** ~60Hz sampler cadence */
  DEFAULT_TICK_INTERVAL_MS: 16,
  MIN_TICK_INTERVAL_MS: 4,
  MAX_TICK_INTERVAL_MS: 1000,

  /** The sampler publishes once at least this much time has elapsed */
  RATE_WINDOW_MS: 1000,

  DEFAULT_LONG_PRESS_MS: 500,
  MIN_LONG_PRESS_MS: 50,
  MAX_LONG_PRESS_MS: 5000,

  MIN_SWIPE_TIMEOUT_MS: 1,
  MAX_SWIPE_TIMEOUT_MS: 60000
} as const

export const LOG_LIMITS = {
  DEFAULT_MAX_ENTRIES: 100,
  MIN_MAX_ENTRIES: 1,
  MAX_MAX_ENTRIES: 10000
} as const

export const SURFACE_LAYOUT = {
  WIDTH_RATIO: 0.4,
  HEIGHT_RATIO: 0.6,
  OFFSET_X: 20,
  OFFSET_Y: 100
} as const

export const INPUT_HOOK = {
  DEFAULT_HIT_BOX_SIZE: 2
} as const
