/**
 * Joined rooms, ordered by recent activity
 * Each room owns its EventStore and TimelineView. Muted rooms stay listed
 * but activity no longer moves them.
 */

import { EventStore, EventStoreOptions } from './eventStore'
import { TimelineView, DEFAULT_PAGE_SIZE } from './timelineView'

// ==================== Types ====================

export type Membership = 'join' | 'invite' | 'leave'

export interface Room {
  id: string
  name: string
  membership: Membership
  muted: boolean
  lastActivity: number
  unread: number
  readonly store: EventStore
  readonly view: TimelineView
}

export interface RoomRegistryOptions {
  store?: EventStoreOptions
  pageSize?: number
}

interface RoomEntry {
  room: Room
  sortKey: number // Activity used for ordering; frozen while muted
  seq: number // Creation order, breaks ties
}

// ==================== Registry ====================

export class RoomRegistry {
  private rooms = new Map<string, RoomEntry>()
  private focusedId: string | null = null
  private mutedKeys = new Set<string>()
  private storeOptions: EventStoreOptions
  private readonly pageSize: number
  private seq = 0

  constructor(options: RoomRegistryOptions = {}) {
    this.storeOptions = { ...options.store }
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
  }

  get size(): number {
    return this.rooms.size
  }

  get(id: string): Room | undefined {
    return this.rooms.get(id)?.room
  }

  has(id: string): boolean {
    return this.rooms.has(id)
  }

  /**
   * Get a room, creating it on first sight
   */
  ensure(id: string, name?: string, membership: Membership = 'join'): Room {
    const existing = this.rooms.get(id)
    if (existing) {
      if (name) existing.room.name = name
      if (membership !== 'leave') existing.room.membership = membership
      return existing.room
    }

    const store = new EventStore(this.storeOptions)
    const room: Room = {
      id,
      name: name || id,
      membership,
      muted: false,
      lastActivity: 0,
      unread: 0,
      store,
      view: new TimelineView(store, this.pageSize),
    }
    room.muted = this.isMutedByConfig(room)
    this.rooms.set(id, { room, sortKey: 0, seq: this.seq++ })
    if (this.focusedId === null) this.focusedId = id
    return room
  }

  /**
   * Forget a room entirely (explicit leave)
   */
  remove(id: string): boolean {
    const removed = this.rooms.delete(id)
    if (removed && this.focusedId === id) {
      this.focusedId = this.ordered()[0]?.id ?? null
    }
    return removed
  }

  /**
   * Record activity in a room at the given time
   */
  touch(id: string, timestamp: number): void {
    const entry = this.rooms.get(id)
    if (!entry) return
    entry.room.lastActivity = Math.max(entry.room.lastActivity, timestamp)
    if (!entry.room.muted) entry.sortKey = entry.room.lastActivity
  }

  /**
   * Count a new message; focused and muted rooms stay at zero
   */
  markUnread(id: string): void {
    const room = this.get(id)
    if (room && room.id !== this.focusedId && !room.muted) room.unread++
  }

  /**
   * Rooms by activity, most recent first
   */
  ordered(): Room[] {
    return Array.from(this.rooms.values())
      .sort((a, b) => b.sortKey - a.sortKey || a.room.name.localeCompare(b.room.name) || a.seq - b.seq)
      .map((entry) => entry.room)
  }

  /**
   * Ordered rooms whose name contains the text, ignoring case
   */
  filter(text: string): Room[] {
    const needle = text.toLowerCase()
    return this.ordered().filter((room) => room.name.toLowerCase().includes(needle))
  }

  // ==================== Focus ====================

  focus(id: string): Room | undefined {
    const room = this.get(id)
    if (!room) return undefined
    this.focusedId = id
    room.unread = 0
    return room
  }

  focused(): Room | undefined {
    return this.focusedId === null ? undefined : this.get(this.focusedId)
  }

  // ==================== Muting ====================

  setMuted(id: string, muted: boolean): void {
    const entry = this.rooms.get(id)
    if (!entry) return
    entry.room.muted = muted
    if (muted) {
      entry.room.unread = 0
    } else {
      entry.sortKey = entry.room.lastActivity
    }
  }

  toggleMuted(id: string): boolean {
    const room = this.get(id)
    if (!room) return false
    this.setMuted(id, !room.muted)
    return room.muted
  }

  /**
   * Apply the configured mute list; entries match a room id or name.
   * Only rooms whose membership in the list changed are touched, so a mute
   * toggled by hand survives unrelated reloads.
   */
  applyMutedSet(keys: Iterable<string>): void {
    const previous = this.mutedKeys
    this.mutedKeys = new Set(keys)
    for (const { room } of this.rooms.values()) {
      const muted = this.isMutedByConfig(room)
      if (muted !== matchesMuteList(previous, room)) this.setMuted(room.id, muted)
    }
  }

  // ==================== Capacity ====================

  setCapacity(capacity: number): void {
    this.storeOptions = { ...this.storeOptions, capacity }
    for (const { room } of this.rooms.values()) {
      room.store.setCapacity(capacity)
      room.view.sync()
    }
  }

  private isMutedByConfig(room: Room): boolean {
    return matchesMuteList(this.mutedKeys, room)
  }
}

function matchesMuteList(keys: Set<string>, room: Room): boolean {
  return keys.has(room.id) || keys.has(room.name)
}
