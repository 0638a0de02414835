/**
 * Discord type adapters - convert Discord.js types to protocol events and rooms
 * Message-side adapters take the few fields they read, so real discord.js
 * objects and plain test objects both fit.
 */

import { TextChannel, ThreadChannel, DMChannel } from 'discord.js'
import type { ProtocolEvent } from '@/core/events'
import type { IPlatformRoom } from '../types'

export type RoomChannel = TextChannel | ThreadChannel | DMChannel

export function isRoomChannel(channel: unknown): channel is RoomChannel {
  return channel instanceof TextChannel || channel instanceof ThreadChannel || channel instanceof DMChannel
}

// ==================== Shapes ====================

export interface DiscordUserLike {
  id: string
  displayName: string
  partial: boolean
}

export interface DiscordAttachmentLike {
  id: string
  name: string
  url: string
  contentType: string | null
  size: number
}

export interface DiscordMessageLike {
  id: string
  channelId: string
  content: string
  createdTimestamp: number
  editedTimestamp: number | null
  author: { id: string; displayName: string }
  member: { displayName: string } | null
  reference: { messageId?: string } | null
  attachments: { values(): Iterable<DiscordAttachmentLike> }
}

export interface DiscordMessageRef {
  id: string
  channelId: string
}

export interface DiscordReactionLike {
  emoji: { name: string | null }
  message: DiscordMessageRef
}

// ==================== Channel Adapters ====================

/**
 * Convert Discord.js channel to platform room interface
 */
export function adaptDiscordChannel(channel: RoomChannel): IPlatformRoom {
  let type: IPlatformRoom['type']
  if (channel.isDMBased()) {
    type = 'dm'
  } else if (channel.isThread()) {
    type = 'thread'
  } else {
    type = 'text'
  }

  if (channel instanceof DMChannel) {
    return {
      id: channel.id,
      name: channel.recipient ? `@${channel.recipient.username}` : 'DM',
      type,
      platform: 'discord',
    }
  }

  return {
    id: channel.id,
    name: channel.name,
    type,
    platform: 'discord',
    parentName: channel.guild.name,
  }
}

// ==================== Message Adapters ====================

export function senderName(user: DiscordUserLike): string {
  return user.partial ? user.id : user.displayName
}

/**
 * Convert a Discord.js message to leaf events. Text comes first and carries the
 * message id; each attachment becomes a media event. A message with no text
 * gives its id to the first attachment so relations still find it.
 */
export function adaptDiscordMessage(message: DiscordMessageLike): ProtocolEvent[] {
  const base = {
    roomId: message.channelId,
    senderId: message.author.id,
    sender: message.member?.displayName ?? message.author.displayName,
    timestamp: message.createdTimestamp,
    inReplyTo: message.reference?.messageId,
  }
  const events: ProtocolEvent[] = []

  if (message.content) {
    events.push({
      ...base,
      id: message.id,
      content: { kind: 'text', body: message.content, format: 'markdown' },
    })
  }

  for (const attachment of message.attachments.values()) {
    events.push({
      ...base,
      id: events.length === 0 ? message.id : `${message.id}:${attachment.id}`,
      content: {
        kind: 'media',
        body: attachment.name,
        url: attachment.url,
        mimeType: attachment.contentType ?? undefined,
        size: attachment.size,
      },
    })
  }

  return events
}

/**
 * The Discord message an event id came from
 */
export function messageIdOf(eventId: string): string {
  return eventId.split(':')[0] ?? eventId
}

/**
 * Convert an updated message to an edit of the original. Updates without an
 * edit time (embeds resolving, pins) are not edits and give null.
 */
export function adaptDiscordEdit(message: DiscordMessageLike): ProtocolEvent | null {
  if (message.editedTimestamp === null) return null
  return {
    id: `${message.id}:edit:${message.editedTimestamp}`,
    roomId: message.channelId,
    senderId: message.author.id,
    sender: message.member?.displayName ?? message.author.displayName,
    timestamp: message.editedTimestamp,
    content: { kind: 'edit', targetId: message.id, body: message.content },
  }
}

/**
 * One redaction per event the message was split into
 */
export function adaptDiscordDelete(message: DiscordMessageRef, eventIds: string[] = [message.id]): ProtocolEvent[] {
  const timestamp = Date.now()
  return eventIds.map((targetId) => ({
    id: `${targetId}:redact`,
    roomId: message.channelId,
    senderId: '',
    sender: '',
    timestamp,
    content: { kind: 'redaction', targetId },
  }))
}

/**
 * Reaction add and remove carry their direction, so a remove can only ever
 * take away that user's reaction
 */
export function adaptDiscordReaction(
  reaction: DiscordReactionLike,
  user: DiscordUserLike,
  action: 'add' | 'remove'
): ProtocolEvent | null {
  const key = reaction.emoji.name
  if (!key) return null

  const timestamp = Date.now()
  return {
    id: `${reaction.message.id}:react:${user.id}:${key}:${action}:${timestamp}`,
    roomId: reaction.message.channelId,
    senderId: user.id,
    sender: senderName(user),
    timestamp,
    content: { kind: 'reaction', targetId: reaction.message.id, key, action },
  }
}

// ==================== Event Index ====================

const MAX_INDEXED_MESSAGES = 4096

/**
 * Remembers which events a multi-part message became, so a delete (which
 * may arrive as a bare id) redacts all of them
 */
export class MessageEventIndex {
  private parts = new Map<string, string[]>()

  constructor(private readonly limit = MAX_INDEXED_MESSAGES) {}

  get size(): number {
    return this.parts.size
  }

  record(messageId: string, events: ProtocolEvent[]): void {
    if (events.length < 2) return
    this.parts.delete(messageId)
    this.parts.set(
      messageId,
      events.map((event) => event.id)
    )
    while (this.parts.size > this.limit) {
      const oldest = this.parts.keys().next()
      if (oldest.done) break
      this.parts.delete(oldest.value)
    }
  }

  /**
   * Every event id of the message, forgetting it
   */
  take(messageId: string): string[] {
    const ids = this.parts.get(messageId) ?? [messageId]
    this.parts.delete(messageId)
    return ids
  }
}
