import { INPUT_HOOK, LOG_LIMITS, SURFACE_LAYOUT, TIMING } from '../constants/timing'

export type SurfaceGravity = 'top-start' | 'top-end' | 'bottom-start' | 'bottom-end'

export interface SurfaceLayoutConfig {
  /** Fraction of the screen width the overlay occupies */
  widthRatio: number
  /** Fraction of the screen height the overlay occupies */
  heightRatio: number
  offsetX: number
  offsetY: number
  gravity: SurfaceGravity
}

export interface MonitorConfig {
  maxEntries: number
  tickIntervalMs: number
  rateWindowMs: number
  /** null disables the swipe pairing timeout */
  swipeTimeoutMs: number | null
  longPressMs: number
  hitBoxSize: number
  surface: SurfaceLayoutConfig
  debug: boolean
}

export type MonitorConfigOverrides = Partial<Omit<MonitorConfig, 'surface'>> & {
  surface?: Partial<SurfaceLayoutConfig>
}

export const DEFAULT_MONITOR_CONFIG: MonitorConfig = {
  maxEntries: LOG_LIMITS.DEFAULT_MAX_ENTRIES,
  tickIntervalMs: TIMING.DEFAULT_TICK_INTERVAL_MS,
  rateWindowMs: TIMING.RATE_WINDOW_MS,
  swipeTimeoutMs: null,
  longPressMs: TIMING.DEFAULT_LONG_PRESS_MS,
  hitBoxSize: INPUT_HOOK.DEFAULT_HIT_BOX_SIZE,
  surface: {
    widthRatio: SURFACE_LAYOUT.WIDTH_RATIO,
    heightRatio: SURFACE_LAYOUT.HEIGHT_RATIO,
    offsetX: SURFACE_LAYOUT.OFFSET_X,
    offsetY: SURFACE_LAYOUT.OFFSET_Y,
    gravity: 'top-end'
  },
  debug: false
}

const clampInt = (value: unknown, min: number, max: number, fallback: number): number => {
  const parsed = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(String(value ?? ''), 10)
  if (!Number.isFinite(parsed)) return fallback
  return Math.max(min, Math.min(max, parsed))
}

const clampRatio = (value: number, fallback: number): number =>
  Number.isFinite(value) && value > 0 ? Math.min(1, value) : fallback

function parseSwipeTimeout(value: unknown): number | null {
  if (value === null || value === undefined || value === '' || value === 'off') return null
  const parsed = clampInt(value, TIMING.MIN_SWIPE_TIMEOUT_MS, TIMING.MAX_SWIPE_TIMEOUT_MS, Number.NaN)
  return Number.isNaN(parsed) ? null : parsed
}

const isTruthyFlag = (value: string | undefined): boolean =>
  value === 'true' || value === '1'

/**
 * Builds the monitor configuration from environment variables, then applies
 * explicit overrides. Numeric values are clamped to their supported ranges.
 *
 * Recognized variables: MONITOR_MAX_ENTRIES, MONITOR_TICK_INTERVAL_MS,
 * MONITOR_SWIPE_TIMEOUT_MS ("off" disables it), MONITOR_LONG_PRESS_MS,
 * MONITOR_DEBUG.
 */
export function loadMonitorConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: MonitorConfigOverrides = {}
): MonitorConfig {
  const defaults = DEFAULT_MONITOR_CONFIG
  const surface: SurfaceLayoutConfig = { ...defaults.surface, ...overrides.surface }

  return {
    maxEntries: clampInt(
      overrides.maxEntries ?? env.MONITOR_MAX_ENTRIES,
      LOG_LIMITS.MIN_MAX_ENTRIES,
      LOG_LIMITS.MAX_MAX_ENTRIES,
      defaults.maxEntries
    ),
    tickIntervalMs: clampInt(
      overrides.tickIntervalMs ?? env.MONITOR_TICK_INTERVAL_MS,
      TIMING.MIN_TICK_INTERVAL_MS,
      TIMING.MAX_TICK_INTERVAL_MS,
      defaults.tickIntervalMs
    ),
    rateWindowMs: clampInt(overrides.rateWindowMs, 1, 60000, defaults.rateWindowMs),
    swipeTimeoutMs: overrides.swipeTimeoutMs !== undefined
      ? parseSwipeTimeout(overrides.swipeTimeoutMs)
      : parseSwipeTimeout(env.MONITOR_SWIPE_TIMEOUT_MS),
    longPressMs: clampInt(
      overrides.longPressMs ?? env.MONITOR_LONG_PRESS_MS,
      TIMING.MIN_LONG_PRESS_MS,
      TIMING.MAX_LONG_PRESS_MS,
      defaults.longPressMs
    ),
    hitBoxSize: clampInt(overrides.hitBoxSize, 2, 64, defaults.hitBoxSize),
    surface: {
      ...surface,
      widthRatio: clampRatio(surface.widthRatio, defaults.surface.widthRatio),
      heightRatio: clampRatio(surface.heightRatio, defaults.surface.heightRatio)
    },
    debug: overrides.debug ?? isTruthyFlag(env.MONITOR_DEBUG)
  }
}
