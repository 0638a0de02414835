/**
 * Per-room bounded event cache
 * Keeps messages in arrival order, deduplicates by id and folds edits,
 * reactions and redactions into the message they target
 */

import {
  ProtocolEvent,
  RelationEvent,
  TimelineEvent,
  MessageBody,
  isRelation,
  toTimelineEvent,
} from './events'
import { RelationBuffer, RelationBufferOptions } from './relationBuffer'
import { createLogger } from '@/helpers/logger'

const logger = createLogger('store')

// ==================== Types ====================

export type InsertOutcome = 'appended' | 'duplicate' | 'folded' | 'pending'

export interface EventStoreOptions {
  /** Negative means unlimited */
  capacity?: number
  relations?: RelationBufferOptions
}

export type Lookup =
  | { found: true; index: number; event: TimelineEvent }
  | { found: false }

// ==================== Constants ====================

export const DEFAULT_MAX_EVENTS = 8192
const MAX_REMEMBERED_REDACTIONS = 1024

// ==================== Store ====================

export class EventStore {
  private entries: TimelineEvent[] = []
  private byId = new Map<string, TimelineEvent>()
  private reactionTargets = new Map<string, string>() // reaction event id -> message id
  private redacted = new Set<string>()
  private readonly relations: RelationBuffer
  private capacity: number
  private _revision = 0
  private _evicted = 0

  constructor(options: EventStoreOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_MAX_EVENTS
    this.relations = new RelationBuffer(options.relations)
  }

  get size(): number {
    return this.entries.length
  }

  /** Bumped on every visible change */
  get revision(): number {
    return this._revision
  }

  /** Total entries evicted over the store's lifetime */
  get evictedCount(): number {
    return this._evicted
  }

  get pendingRelations(): number {
    return this.relations.size
  }

  get maxEvents(): number {
    return this.capacity
  }

  /**
   * Insert a protocol event. Relations fold into their target or wait in the buffer.
   */
  insert(event: ProtocolEvent): InsertOutcome {
    if (isRelation(event)) {
      return this.applyRelation(event)
    }

    if (this.byId.has(event.id) || this.redacted.has(event.id)) {
      return 'duplicate'
    }

    const { content } = event
    if (content.kind !== 'text' && content.kind !== 'media') return 'duplicate'

    const entry = toTimelineEvent({ ...event, content })
    this.entries.push(entry)
    this.byId.set(entry.id, entry)
    this._revision++

    for (const relation of this.relations.take(entry.id)) {
      this.fold(relation, entry)
    }

    this.evictOverCapacity()
    return 'appended'
  }

  /**
   * Trim oldest entries until the store fits its capacity; returns the count evicted
   */
  evictOverCapacity(): number {
    if (this.capacity < 0) return 0
    const excess = this.entries.length - this.capacity
    if (excess <= 0) return 0

    const evicted = this.entries.splice(0, excess)
    for (const entry of evicted) {
      this.forget(entry)
    }
    this._evicted += evicted.length
    this._revision++
    return evicted.length
  }

  setCapacity(capacity: number): number {
    this.capacity = capacity
    return this.evictOverCapacity()
  }

  /**
   * Lazy iteration from oldest to newest; each call to the returned iterable starts over
   */
  iter(): Iterable<TimelineEvent> {
    const entries = () => this.entries
    return {
      *[Symbol.iterator]() {
        const snapshot = entries()
        for (let i = 0; i < snapshot.length; i++) {
          yield snapshot[i]
        }
      },
    }
  }

  get(id: string): TimelineEvent | undefined {
    return this.byId.get(id)
  }

  at(index: number): TimelineEvent | undefined {
    return this.entries[index]
  }

  indexOf(id: string): number {
    if (!this.byId.has(id)) return -1
    return this.entries.findIndex((e) => e.id === id)
  }

  lookup(id: string): Lookup {
    const index = this.indexOf(id)
    const event = this.entries[index]
    return index >= 0 && event ? { found: true, index, event } : { found: false }
  }

  /**
   * Index of the cached event closest in time, or -1 when empty
   */
  nearestIndex(timestamp: number): number {
    let best = -1
    let bestDistance = Infinity
    this.entries.forEach((entry, index) => {
      const distance = Math.abs(entry.timestamp - timestamp)
      if (distance < bestDistance) {
        best = index
        bestDistance = distance
      }
    })
    return best
  }

  /**
   * Message that a folded reaction event belongs to
   */
  reactionTarget(reactionEventId: string): string | undefined {
    return this.reactionTargets.get(reactionEventId)
  }

  // ==================== Folding ====================

  private applyRelation(event: RelationEvent): InsertOutcome {
    const { content } = event

    // A redaction may point at a reaction rather than a message
    if (content.kind === 'redaction') {
      const messageId = this.reactionTargets.get(content.targetId)
      const message = messageId ? this.byId.get(messageId) : undefined
      if (message) {
        this.removeReactionEvent(message, content.targetId)
        this._revision++
        return 'folded'
      }
    }

    const target = this.byId.get(content.targetId)
    if (!target) {
      const dropped = this.relations.hold(event)
      if (dropped > 0) {
        logger.debug(`Dropped ${dropped} relation(s) whose target never arrived`)
      }
      return 'pending'
    }

    this.fold(event, target)
    return 'folded'
  }

  private fold(event: RelationEvent, target: TimelineEvent): void {
    const { content } = event
    switch (content.kind) {
      case 'edit': {
        if (target.appliedEdits.includes(event.id)) return
        target.appliedEdits.push(event.id)
        // Same text again (e.g. a link preview resolving) is not an edit
        if (target.body.kind === 'text' && target.body.body === content.body) return
        const previous: MessageBody = target.body
        target.history.push(previous)
        target.body =
          previous.kind === 'text'
            ? { ...previous, body: content.body }
            : { kind: 'text', body: content.body, format: 'plain' }
        break
      }

      case 'reaction':
        if (!this.applyReaction(target, event, content.key, content.action)) return
        break

      case 'redaction':
        this.removeEntry(target)
        break
    }
    this._revision++
  }

  /**
   * Add, remove or toggle one sender's reaction; false when nothing changed
   */
  private applyReaction(
    target: TimelineEvent,
    event: RelationEvent,
    key: string,
    action: 'add' | 'remove' | undefined
  ): boolean {
    const group = target.reactions.find((r) => r.key === key)
    const existing = group?.senders.find((s) => s.senderId === event.senderId)

    if (group && existing) {
      if (action === 'add') return false
      group.senders = group.senders.filter((s) => s !== existing)
      this.reactionTargets.delete(existing.eventId)
      if (group.senders.length === 0) {
        target.reactions = target.reactions.filter((r) => r !== group)
      }
      return true
    }

    if (action === 'remove') return false
    const sender = { senderId: event.senderId, sender: event.sender, eventId: event.id }
    if (group) {
      group.senders.push(sender)
    } else {
      target.reactions.push({ key, senders: [sender] })
    }
    this.reactionTargets.set(event.id, target.id)
    return true
  }

  private removeReactionEvent(target: TimelineEvent, reactionEventId: string): void {
    for (const group of target.reactions) {
      group.senders = group.senders.filter((s) => s.eventId !== reactionEventId)
    }
    target.reactions = target.reactions.filter((r) => r.senders.length > 0)
    this.reactionTargets.delete(reactionEventId)
  }

  private removeEntry(target: TimelineEvent): void {
    const index = this.entries.indexOf(target)
    if (index >= 0) this.entries.splice(index, 1)
    this.forget(target)

    this.redacted.add(target.id)
    if (this.redacted.size > MAX_REMEMBERED_REDACTIONS) {
      const oldest = this.redacted.values().next()
      if (!oldest.done) this.redacted.delete(oldest.value)
    }
  }

  private forget(entry: TimelineEvent): void {
    this.byId.delete(entry.id)
    for (const group of entry.reactions) {
      for (const s of group.senders) {
        this.reactionTargets.delete(s.eventId)
      }
    }
  }
}
