/**
 * Live search over one room's cached events
 * Brute-force scan per query; nothing is indexed between keystrokes
 */

import { TimelineEvent, displayText } from './events'
import type { EventStore } from './eventStore'
import { NotFoundError } from '@/helpers/errors'

// ==================== Types ====================

export type SearchOrder = 'newest-first' | 'oldest-first'

export interface SearchOptions {
  order?: SearchOrder
  /** Events scanned at most; negative means all */
  depth?: number
}

/** [start, end) into the event's display text */
export interface MatchSpan {
  start: number
  end: number
}

/**
 * A back-reference into the store, never a copy of the event
 */
export interface SearchMatch {
  eventId: string
  timestamp: number
  span: MatchSpan
}

export type Resolution =
  | { found: true; index: number }
  | { found: false; error: NotFoundError; fallbackIndex: number }

// ==================== Matching ====================

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Build a case-insensitive matcher, or null for a blank query
 */
export function compileQuery(query: string): RegExp | null {
  if (query.trim() === '') return null
  return new RegExp(escapeRegExp(query), 'iu')
}

export function matchEvent(event: TimelineEvent, pattern: RegExp): MatchSpan | null {
  const text = displayText(event)
  const match = pattern.exec(text)
  if (!match) return null
  return { start: match.index, end: match.index + match[0].length }
}

// ==================== Engine ====================

export function search(store: EventStore, query: string, options: SearchOptions = {}): SearchMatch[] {
  const pattern = compileQuery(query)
  if (!pattern) return []

  const order = options.order ?? 'newest-first'
  const depth = options.depth ?? -1
  const limit = depth < 0 ? store.size : Math.min(depth, store.size)
  const matches: SearchMatch[] = []

  for (let scanned = 0; scanned < limit; scanned++) {
    const index = order === 'newest-first' ? store.size - 1 - scanned : scanned
    const event = store.at(index)
    if (!event) continue
    const span = matchEvent(event, pattern)
    if (span) {
      matches.push({ eventId: event.id, timestamp: event.timestamp, span })
    }
  }
  return matches
}

/**
 * Find a match's current position; if it has been evicted, fall back to the
 * cached event nearest in time
 */
export function resolve(store: EventStore, match: SearchMatch): Resolution {
  const index = store.indexOf(match.eventId)
  if (index >= 0) return { found: true, index }
  return {
    found: false,
    error: new NotFoundError(match.eventId),
    fallbackIndex: store.nearestIndex(match.timestamp),
  }
}
