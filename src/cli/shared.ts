/**
 * Shared text utilities for the terminal UI
 */

import { emojify as emojifyNode, which as whichEmoji } from 'node-emoji'
import stringWidth from 'string-width'
import type { Reaction, TimelineEvent } from '@/core/events'
import { isEdited, prettyList } from '@/core/events'

// ==================== Emoji Utilities ====================

/**
 * Convert emoji shortcodes to Unicode emojis in text
 */
export const emojify = (text: string): string => {
  return emojifyNode(text)
}

/**
 * Shortcode for an emoji, e.g. 👍 -> :+1:; the key itself when unknown
 */
export const shortcode = (emoji: string): string => {
  const name = whichEmoji(emoji)
  return name ? `:${name}:` : emoji
}

/**
 * Get the visual width of a string (handles emoji width correctly)
 */
export const getStringWidth = (text: string): number => {
  return stringWidth(text)
}

const ELLIPSIS = '…'
const ELLIPSIS_WIDTH = stringWidth(ELLIPSIS)

/**
 * Truncate text to fit within maxWidth (in terminal columns).
 * Emoji and other wide chars count as 2. Appends … when truncated.
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  if (maxWidth < ELLIPSIS_WIDTH) return ''
  const w = stringWidth(text)
  if (w <= maxWidth) return text
  let prefix = ''
  for (const c of text) {
    if (stringWidth(prefix + c) + ELLIPSIS_WIDTH > maxWidth) break
    prefix += c
  }
  return prefix + ELLIPSIS
}

// ==================== Message Formatting ====================

export const formatDateHeader = (date: Date, today: Date = new Date()): string => {
  const yesterday = new Date(today)
  yesterday.setDate(yesterday.getDate() - 1)

  if (date.toDateString() === today.toDateString()) {
    return 'Today'
  } else if (date.toDateString() === yesterday.toDateString()) {
    return 'Yesterday'
  } else {
    return date.toLocaleDateString('en-US', {
      weekday: 'long',
      year: 'numeric',
      month: 'long',
      day: 'numeric',
    })
  }
}

export const formatTime = (timestamp: number): string => {
  const date = new Date(timestamp)
  return `${String(date.getHours()).padStart(2, '0')}:${String(date.getMinutes()).padStart(2, '0')}`
}

/**
 * "❤️ 2  👍 1"
 */
export function formatReactions(reactions: Reaction[]): string {
  return reactions.map((r) => `${r.key} ${r.senders.length}`).join('  ')
}

/**
 * "Alice and Bob reacted with :+1:"
 */
export function describeReaction(reaction: Reaction): string {
  return `${prettyList(reaction.senders.map((s) => s.sender))} reacted with ${shortcode(reaction.key)}`
}

/**
 * First line of the message body, with media marked and edits flagged
 */
export function summarizeEvent(event: TimelineEvent): string {
  const firstLine = event.body.body.split('\n')[0] ?? ''
  const prefix = event.body.kind === 'media' ? '📎 ' : ''
  return `${prefix}${firstLine}${isEdited(event) ? ' (edited)' : ''}`
}

/**
 * Whole-room transcript for the viewer, oldest first
 */
export function roomTranscript(name: string, events: Iterable<TimelineEvent>): string {
  const lines = [`# ${name}`, '']
  let day = ''
  for (const event of events) {
    const date = new Date(event.timestamp)
    if (date.toDateString() !== day) {
      day = date.toDateString()
      lines.push(`## ${formatDateHeader(date)}`, '')
    }
    const prefix = event.body.kind === 'media' ? '📎 ' : ''
    const body = event.body.body.split('\n').join('\n    ')
    lines.push(`[${formatTime(event.timestamp)}] ${event.sender}: ${prefix}${body}`)
  }
  return lines.join('\n')
}

// ==================== Links ====================

const URL_PATTERN = /\bhttps?:\/\/[^\s<>"]+|\bwww\.[^\s<>"]+/gi

/**
 * http(s) and www. links in a message, in order, without trailing punctuation
 */
export const extractUrls = (text: string): string[] => {
  const matches = text.match(URL_PATTERN) ?? []
  return matches
    .map((url) => url.replace(/[.,;:!?)\]]+$/, ''))
    .map((url) => (url.startsWith('http') ? url : `https://${url}`))
}
