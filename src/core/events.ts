/**
 * Event model shared by the store, search and views
 */

// ==================== Protocol Events ====================

export interface TextContent {
  kind: 'text'
  body: string
  format: 'plain' | 'markdown'
}

export interface MediaContent {
  kind: 'media'
  body: string // Filename or caption
  url: string
  mimeType?: string
  size?: number
}

export interface ReactionContent {
  kind: 'reaction'
  targetId: string
  key: string
  /** Absent means toggle the (sender, key) pair */
  action?: 'add' | 'remove'
}

export interface RedactionContent {
  kind: 'redaction'
  targetId: string
}

export interface EditContent {
  kind: 'edit'
  targetId: string
  body: string
}

export type MessageBody = TextContent | MediaContent
export type RelationContent = ReactionContent | RedactionContent | EditContent
export type EventContent = MessageBody | RelationContent

/**
 * An event as delivered by the protocol. Immutable once received.
 */
export interface ProtocolEvent {
  readonly id: string
  readonly roomId: string
  readonly senderId: string
  readonly sender: string // Display name
  readonly timestamp: number // ms since epoch
  readonly content: EventContent
  readonly inReplyTo?: string
}

export type RelationEvent = ProtocolEvent & { readonly content: RelationContent }

export function isRelation(event: ProtocolEvent): event is RelationEvent {
  const { kind } = event.content
  return kind === 'reaction' || kind === 'redaction' || kind === 'edit'
}

// ==================== Stored Entries ====================

export interface ReactionSender {
  senderId: string
  sender: string
  eventId: string
}

/**
 * Reactions grouped by key; one entry per sender
 */
export interface Reaction {
  key: string
  senders: ReactionSender[]
}

/**
 * A message as held by the store, with relations folded in
 */
export interface TimelineEvent {
  id: string
  roomId: string
  senderId: string
  sender: string
  timestamp: number
  body: MessageBody
  history: MessageBody[] // Bodies replaced by edits, oldest first
  reactions: Reaction[]
  appliedEdits: string[]
  inReplyTo?: string
}

export function toTimelineEvent(event: ProtocolEvent & { content: MessageBody }): TimelineEvent {
  return {
    id: event.id,
    roomId: event.roomId,
    senderId: event.senderId,
    sender: event.sender,
    timestamp: event.timestamp,
    body: event.content,
    history: [],
    reactions: [],
    appliedEdits: [],
    inReplyTo: event.inReplyTo,
  }
}

/**
 * Text that search and the timeline operate on
 */
export function displayText(event: TimelineEvent): string {
  return event.body.body
}

export function isEdited(event: TimelineEvent): boolean {
  return event.history.length > 0
}

/**
 * "a", "a and b", "a, b and c"
 */
export function prettyList(names: string[]): string {
  if (names.length <= 1) return names.join('')
  return `${names.slice(0, -1).join(', ')} and ${names[names.length - 1]}`
}
