import { format } from 'date-fns'
import type { TimelineEntry } from '../../types/interaction'

export interface TimelineRow {
  type: TimelineEntry['type']
  title: string
  subtitle: string
  isNewest: boolean
}

const NEWEST_MARKER = '🆕 '

/**
 * Wall-clock time of an entry as HH:mm:ss.SSS, in the local time zone.
 */
export const formatEntryTime = (timestamp: number): string => format(new Date(timestamp), 'HH:mm:ss.SSS')

export function formatTimelineEntry(entry: TimelineEntry, options: { isNewest?: boolean } = {}): TimelineRow {
  const isNewest = options.isNewest ?? false
  const marker = isNewest ? NEWEST_MARKER : ''

  if (entry.type === 'touch') {
    return {
      type: 'touch',
      title: `${marker}${entry.action} at (${Math.trunc(entry.x)}, ${Math.trunc(entry.y)})`,
      subtitle: formatEntryTime(entry.timestamp),
      isNewest
    }
  }

  return {
    type: 'swipe',
    title: `${marker}SWIPE ${entry.direction} (${Math.trunc(entry.velocity)}px/s)`,
    subtitle: `${formatEntryTime(entry.timestamp)} - ${entry.durationMs}ms`,
    isNewest
  }
}

/**
 * Rows for a newest-first timeline; only the first row is marked as newest.
 */
export function formatTimeline(entries: readonly TimelineEntry[]): TimelineRow[] {
  return entries.map((entry, index) => formatTimelineEntry(entry, { isNewest: index === 0 }))
}

export const formatLogToggleLabel = (isLogVisible: boolean): string => (isLogVisible ? 'Hide Log' : 'Show Log')
