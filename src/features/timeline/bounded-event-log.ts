import type { TimelineEntry } from '../../types/interaction'
import {
  createEventLogStore,
  selectBucketSizes,
  selectTimeline,
  type EventLogStore
} from './event-log-store'

export class BoundedEventLog {
  private readonly store: EventLogStore

  constructor(maxEntries?: number) {
    this.store = createEventLogStore(maxEntries)
  }

  get maxEntries(): number {
    return this.store.getState().maxEntries
  }

  append(entry: TimelineEntry): void {
    this.store.getState().append(entry)
  }

  clear(): void {
    this.store.getState().clear()
  }

  /** Fresh merged view, newest first. */
  snapshot(): TimelineEntry[] {
    return selectTimeline(this.store.getState())
  }

  size(): { touches: number; swipes: number } {
    return selectBucketSizes(this.store.getState())
  }

  /** Called after every append or clear. */
  subscribe(listener: () => void): () => void {
    return this.store.subscribe(() => listener())
  }
}
