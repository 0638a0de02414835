/**
 * Selection and scroll position over one room's event sequence
 * Index 0 is the oldest cached event. After any operation the selection is
 * in [0, size) or 0 when the room is empty.
 */

import type { EventStore } from './eventStore'
import type { TimelineEvent } from './events'

export const DEFAULT_PAGE_SIZE = 10

export interface ViewWindow {
  start: number
  end: number // exclusive
}

export class TimelineView {
  private index = 0
  private anchorId: string | undefined
  private following = true
  private offset = 0

  constructor(
    private readonly store: EventStore,
    readonly pageSize: number = DEFAULT_PAGE_SIZE
  ) {
    this.sync()
  }

  get selected(): number {
    return this.index
  }

  get isFollowing(): boolean {
    return this.following
  }

  selectedEvent(): TimelineEvent | undefined {
    return this.store.at(this.index)
  }

  /**
   * Re-anchor after the store changed: stay on the latest event while following,
   * otherwise stay on the same event if it is still cached, else clamp
   */
  sync(): void {
    const size = this.store.size
    if (size === 0) {
      this.index = 0
      this.anchorId = undefined
      this.following = true
      return
    }

    if (this.following) {
      this.index = size - 1
    } else if (this.anchorId !== undefined) {
      const found = this.store.indexOf(this.anchorId)
      if (found >= 0) this.index = found
    }
    this.settle()
  }

  select(index: number): void {
    this.index = index
    this.settle()
  }

  moveBy(delta: number): void {
    this.select(this.index + delta)
  }

  pageUp(): void {
    this.moveBy(-Math.max(1, this.pageSize))
  }

  pageDown(): void {
    this.moveBy(Math.max(1, this.pageSize))
  }

  jumpToLatest(): void {
    this.select(this.store.size - 1)
  }

  jumpToOldest(): void {
    this.select(0)
  }

  /**
   * Visible slice of at most `height` rows that contains the selection
   */
  window(height: number): ViewWindow {
    const size = this.store.size
    const rows = Math.max(1, height)
    if (this.index < this.offset) this.offset = this.index
    if (this.index >= this.offset + rows) this.offset = this.index - rows + 1
    this.offset = Math.max(0, Math.min(this.offset, size - rows))
    return { start: this.offset, end: Math.min(size, this.offset + rows) }
  }

  private settle(): void {
    const size = this.store.size
    this.index = size === 0 ? 0 : Math.max(0, Math.min(this.index, size - 1))
    this.following = size === 0 || this.index === size - 1
    this.anchorId = this.store.at(this.index)?.id
  }
}
