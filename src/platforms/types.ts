/**
 * Platform abstraction: the boundary between the UI core and a chat protocol
 * A client turns protocol traffic into a normalized notification stream and
 * accepts outbound calls; transport, sync and encryption stay behind it.
 */

import type { MediaContent, ProtocolEvent } from '@/core/events'
import type { Membership } from '@/core/roomRegistry'

// ==================== Platform Types ====================

export type PlatformType = 'discord'

// ==================== Rooms ====================

/**
 * Platform-agnostic room/channel representation
 */
export interface IPlatformRoom {
  id: string
  name: string
  type: 'text' | 'dm' | 'group' | 'thread'
  platform: PlatformType
  parentName?: string // Guild name for Discord
}

export interface IPlatformUser {
  id: string
  username: string
}

// ==================== Notifications ====================

export interface EventNotification {
  type: 'event'
  event: ProtocolEvent
  /** Fetched history rather than live traffic: never unread, never order-checked */
  history?: boolean
}

export interface MembershipNotification {
  type: 'membership'
  roomId: string
  userId: string
  membership: Membership
  roomName?: string
}

export interface VerificationRequestNotification {
  type: 'verificationRequest'
  requestId: string
  from: string
}

export type ProtocolNotification =
  | EventNotification
  | MembershipNotification
  | VerificationRequestNotification

// ==================== Outbound ====================

/**
 * Options for sending a message
 */
export interface SendMessageOptions {
  roomId: string
  body: string
  inReplyTo?: string
}

// ==================== Client Interface ====================

/**
 * Every platform client implements this; outbound calls reject with an Error
 * the UI shows as a notice
 */
export interface IPlatformClient {
  readonly type: PlatformType
  readonly isConnected: boolean

  connect(): Promise<void>
  disconnect(): Promise<void>
  getCurrentUser(): IPlatformUser | null
  getRooms(): Promise<IPlatformRoom[]>

  /**
   * Recent history for a room, oldest first
   */
  backfill(roomId: string, limit: number): Promise<ProtocolEvent[]>

  /**
   * Live notifications in receipt order; ends when the client disconnects
   */
  notifications(): AsyncIterable<ProtocolNotification>

  sendMessage(options: SendMessageOptions): Promise<void>
  editMessage(roomId: string, eventId: string, body: string): Promise<void>
  sendReaction(roomId: string, eventId: string, key: string): Promise<void>
  removeReaction(roomId: string, eventId: string, key: string): Promise<void>
  uploadFile(roomId: string, path: string): Promise<void>
  redactMessage(roomId: string, eventId: string): Promise<void>
  verify(passphrase: string, requestId?: string): Promise<void>
  setIdle(idle: boolean): Promise<void>
  setTyping(roomId: string, typing: boolean): Promise<void>

  /**
   * Move the read marker of a room up to an event
   */
  markRead(roomId: string, eventId: string): Promise<void>

  /**
   * Fetch the bytes behind a media event
   */
  downloadMedia(media: MediaContent): Promise<Uint8Array>
}
