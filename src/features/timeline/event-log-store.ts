/**
 * Event Log Store
 *
 * Fixed-capacity history of classified gestures. Touches and swipes live in
 * separate buckets, each evicting its own oldest entry once it exceeds
 * `maxEntries`. Both buckets sit in one immutable store state, so every append
 * or clear replaces the whole state and a reader never sees half of a change.
 */

import { createStore } from 'zustand/vanilla'
import { immer } from 'zustand/middleware/immer'
import type { SwipeEvent, TimelineEntry, TouchEvent } from '../../types/interaction'
import { LOG_LIMITS } from '../../shared/constants/timing'

interface LoggedEntry<T extends TimelineEntry> {
  /** Insertion order, used to break timestamp ties */
  sequence: number
  entry: T
}

export interface EventLogState {
  maxEntries: number
  touches: LoggedEntry<TouchEvent>[]
  swipes: LoggedEntry<SwipeEvent>[]
  nextSequence: number
}

interface EventLogActions {
  append: (entry: TimelineEntry) => void
  clear: () => void
}

export type EventLogStoreState = EventLogState & EventLogActions

export function createEventLogStore(maxEntries: number = LOG_LIMITS.DEFAULT_MAX_ENTRIES) {
  const capacity = Number.isFinite(maxEntries)
    ? Math.max(LOG_LIMITS.MIN_MAX_ENTRIES, Math.floor(maxEntries))
    : LOG_LIMITS.DEFAULT_MAX_ENTRIES

  return createStore<EventLogStoreState>()(
    immer((set) => ({
      maxEntries: capacity,
      touches: [],
      swipes: [],
      nextSequence: 0,

      append: (entry) => {
        set((state) => {
          const sequence = state.nextSequence++
          if (entry.type === 'touch') {
            state.touches.push({ sequence, entry })
            while (state.touches.length > state.maxEntries) {
              state.touches.shift()
            }
          } else {
            state.swipes.push({ sequence, entry })
            while (state.swipes.length > state.maxEntries) {
              state.swipes.shift()
            }
          }
        })
      },

      clear: () => {
        set((state) => {
          state.touches = []
          state.swipes = []
        })
      }
    }))
  )
}

export type EventLogStore = ReturnType<typeof createEventLogStore>

/**
 * Merged view of both buckets, newest first. Equal timestamps keep the most
 * recently inserted entry first.
 */
export function selectTimeline(state: EventLogState): TimelineEntry[] {
  const merged: LoggedEntry<TimelineEntry>[] = [...state.touches, ...state.swipes]
  merged.sort((a, b) => b.entry.timestamp - a.entry.timestamp || b.sequence - a.sequence)
  return merged.map((logged) => logged.entry)
}

export function selectBucketSizes(state: EventLogState): { touches: number; swipes: number } {
  return { touches: state.touches.length, swipes: state.swipes.length }
}
