/**
 * Sync bridge
 * The background half pumps the protocol notification stream into the UI
 * channel; the UI half applies each notification to rooms and stores. Only
 * the UI task ever calls apply().
 */

import type {
  IPlatformUser,
  MembershipNotification,
  ProtocolNotification,
  VerificationRequestNotification,
} from '@/platforms/types'
import { ProtocolEvent, isRelation } from './events'
import type { Channel } from './channel'
import type { InsertOutcome } from './eventStore'
import type { RoomRegistry } from './roomRegistry'
import { InconsistentStateError, errorMessage } from '@/helpers/errors'
import { createLogger, Logger } from '@/helpers/logger'

// ==================== Types ====================

export type BridgeMessage =
  | { type: 'protocol'; notification: ProtocolNotification }
  | { type: 'notice'; text: string }

export type ApplyResult =
  | { type: 'event'; roomId: string; outcome: InsertOutcome; anomaly?: InconsistentStateError }
  | { type: 'roomJoined'; roomId: string }
  | { type: 'roomLeft'; roomId: string }
  | { type: 'ignored' }
  | { type: 'verificationRequest'; request: VerificationRequestNotification }

export interface SyncBridgeOptions {
  /** The local user; own messages (matched by id) never count as unread */
  self: () => IPlatformUser | null
  logger?: Logger
}

// ==================== Bridge ====================

export class SyncBridge {
  private newest = new Map<string, number>() // room id -> newest applied timestamp
  private readonly logger: Logger
  private readonly self: () => IPlatformUser | null

  constructor(
    private readonly registry: RoomRegistry,
    options: SyncBridgeOptions
  ) {
    this.self = options.self
    this.logger = options.logger ?? createLogger('sync')
  }

  /**
   * Forward every notification into the channel, waiting whenever it is full.
   * A failing stream is logged and reported; it is not restarted.
   */
  async pump(source: AsyncIterable<ProtocolNotification>, channel: Pick<Channel<BridgeMessage>, 'send' | 'isClosed'>): Promise<void> {
    try {
      for await (const notification of source) {
        await channel.send({ type: 'protocol', notification })
      }
      this.logger.info('Notification stream ended')
    } catch (error) {
      this.logger.error('Notification stream failed', error)
      if (!channel.isClosed) {
        await channel.send({ type: 'notice', text: `Sync stopped: ${errorMessage(error)}` })
      }
    }
  }

  /**
   * Apply one notification to the registry
   */
  apply(notification: ProtocolNotification): ApplyResult {
    switch (notification.type) {
      case 'event':
        return this.applyEvent(notification.event, notification.history ?? false)

      case 'membership':
        return this.applyMembership(notification)

      case 'verificationRequest':
        return { type: 'verificationRequest', request: notification }
    }
  }

  private applyEvent(event: ProtocolEvent, history: boolean): ApplyResult {
    const room = this.registry.ensure(event.roomId)

    const outcome = room.store.insert(event)
    if (outcome === 'duplicate') {
      this.logger.debug(`Duplicate event ${event.id} absorbed`)
    }

    // Relations carry their own clocks; only new messages are checked for order
    let anomaly: InconsistentStateError | undefined
    if (outcome === 'appended' && !isRelation(event)) {
      if (history) {
        this.newest.set(room.id, Math.max(this.newest.get(room.id) ?? 0, event.timestamp))
      } else {
        anomaly = this.checkOrder(event)
        if (event.senderId !== this.self()?.id) this.registry.markUnread(room.id)
      }
      this.registry.touch(room.id, event.timestamp)
    }

    room.view.sync()
    return { type: 'event', roomId: room.id, outcome, anomaly }
  }

  private checkOrder(event: ProtocolEvent): InconsistentStateError | undefined {
    const newest = this.newest.get(event.roomId)
    if (newest !== undefined && event.timestamp < newest) {
      const anomaly = new InconsistentStateError(
        `Event ${event.id} in ${event.roomId} is ${newest - event.timestamp}ms older than one already applied`
      )
      this.logger.warn(anomaly.message)
      return anomaly
    }
    this.newest.set(event.roomId, event.timestamp)
    return undefined
  }

  private applyMembership(notification: MembershipNotification): ApplyResult {
    const { roomId, userId, membership, roomName } = notification
    if (userId !== this.self()?.id) return { type: 'ignored' }

    if (membership === 'leave') {
      this.newest.delete(roomId)
      return this.registry.remove(roomId) ? { type: 'roomLeft', roomId } : { type: 'ignored' }
    }

    this.registry.ensure(roomId, roomName, membership)
    return { type: 'roomJoined', roomId }
  }
}
