import { formatEntryTime, formatLogToggleLabel, formatTimeline, formatTimelineEntry } from '@/features/timeline/timeline-formatter'
import { SwipeDirection, TouchAction, type SwipeEvent, type TouchEvent } from '@/types/interaction'

// Local wall-clock time, so the expectations hold in any time zone
const AT_09_05_07_042 = new Date(2024, 0, 15, 9, 5, 7, 42).getTime()

const click: TouchEvent = {
  type: 'touch',
  action: TouchAction.Click,
  x: 60.7,
  y: 40.2,
  timestamp: AT_09_05_07_042
}

const rightSwipe: SwipeEvent = {
  type: 'swipe',
  startX: 0,
  startY: 0,
  endX: 100,
  endY: 0,
  durationMs: 200,
  velocity: 499.9,
  direction: SwipeDirection.Right,
  timestamp: AT_09_05_07_042
}

describe('formatEntryTime', () => {
  it('formats as HH:mm:ss.SSS', () => {
    expect(formatEntryTime(AT_09_05_07_042)).toBe('09:05:07.042')
  })
})

describe('formatTimelineEntry', () => {
  it('formats a touch with truncated coordinates', () => {
    expect(formatTimelineEntry(click)).toEqual({
      type: 'touch',
      title: 'CLICK at (60, 40)',
      subtitle: '09:05:07.042',
      isNewest: false
    })
  })

  it('formats a swipe with truncated velocity and its duration', () => {
    expect(formatTimelineEntry(rightSwipe)).toEqual({
      type: 'swipe',
      title: 'SWIPE RIGHT (499px/s)',
      subtitle: '09:05:07.042 - 200ms',
      isNewest: false
    })
  })

  it('prefixes the newest entry with a marker', () => {
    const row = formatTimelineEntry(click, { isNewest: true })
    expect(row.title).toBe('🆕 CLICK at (60, 40)')
    expect(row.isNewest).toBe(true)
  })
})

describe('formatLogToggleLabel', () => {
  it('offers the opposite of the current state', () => {
    expect(formatLogToggleLabel(true)).toBe('Hide Log')
    expect(formatLogToggleLabel(false)).toBe('Show Log')
  })
})

describe('formatTimeline', () => {
  it('marks only the first row as newest', () => {
    const rows = formatTimeline([rightSwipe, click])

    expect(rows.map((row) => row.isNewest)).toEqual([true, false])
    expect(rows[0].title).toBe('🆕 SWIPE RIGHT (499px/s)')
    expect(rows[1].title).toBe('CLICK at (60, 40)')
  })

  it('returns no rows for an empty timeline', () => {
    expect(formatTimeline([])).toEqual([])
  })
})
