/**
 * Holding area for relations (edits, reactions, redactions) that arrive
 * before the event they point at. Entries expire after a window or are
 * pushed out when the buffer is full; neither case is surfaced to the user.
 */

import type { RelationEvent } from './events'

export interface RelationBufferOptions {
  maxPending?: number
  windowMs?: number
  now?: () => number
}

interface Pending {
  event: RelationEvent
  receivedAt: number
}

export const DEFAULT_MAX_PENDING = 512
export const DEFAULT_RELATION_WINDOW_MS = 30_000

export class RelationBuffer {
  private readonly maxPending: number
  private readonly windowMs: number
  private readonly now: () => number
  private pending: Pending[] = []

  constructor(options: RelationBufferOptions = {}) {
    this.maxPending = options.maxPending ?? DEFAULT_MAX_PENDING
    this.windowMs = options.windowMs ?? DEFAULT_RELATION_WINDOW_MS
    this.now = options.now ?? Date.now
  }

  get size(): number {
    return this.pending.length
  }

  /**
   * Hold a relation; returns how many entries were dropped to make room or by expiry
   */
  hold(event: RelationEvent): number {
    let dropped = this.expire()
    if (this.maxPending <= 0) return dropped + 1
    if (this.pending.some((p) => p.event.id === event.id)) return dropped
    this.pending.push({ event, receivedAt: this.now() })
    while (this.pending.length > this.maxPending) {
      this.pending.shift()
      dropped++
    }
    return dropped
  }

  /**
   * Remove and return every live relation for a target, in arrival order
   */
  take(targetId: string): RelationEvent[] {
    this.expire()
    const taken: RelationEvent[] = []
    const kept: Pending[] = []
    for (const p of this.pending) {
      if (p.event.content.targetId === targetId) taken.push(p.event)
      else kept.push(p)
    }
    this.pending = kept
    return taken
  }

  /**
   * Drop entries older than the window; returns the count dropped
   */
  expire(): number {
    const cutoff = this.now() - this.windowMs
    const before = this.pending.length
    this.pending = this.pending.filter((p) => p.receivedAt >= cutoff)
    return before - this.pending.length
  }
}
