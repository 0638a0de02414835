/**
 * Discord platform client implementation
 * Gateway events are normalized into protocol notifications and queued
 * until the sync bridge reads them.
 */

import { Client, Events, Guild, Message } from 'discord.js'
import * as https from 'https'
import type { MediaContent, ProtocolEvent } from '@/core/events'
import { Channel } from '@/core/channel'
import { createLogger } from '@/helpers/logger'
import { errorMessage } from '@/helpers/errors'
import {
  IPlatformClient,
  IPlatformRoom,
  IPlatformUser,
  ProtocolNotification,
  SendMessageOptions,
} from '../types'
import {
  RoomChannel,
  isRoomChannel,
  adaptDiscordChannel,
  adaptDiscordMessage,
  adaptDiscordEdit,
  adaptDiscordDelete,
  adaptDiscordReaction,
  messageIdOf,
  MessageEventIndex,
} from './adapters'
import { createDiscordClient, connectDiscord, disconnectDiscord } from './auth'

const logger = createLogger('discord')

export class DiscordPlatformClient implements IPlatformClient {
  readonly type = 'discord' as const
  private client: Client
  private _isConnected = false
  private feed = new Channel<ProtocolNotification>()
  private eventIndex = new MessageEventIndex()

  constructor(client: Client = createDiscordClient()) {
    this.client = client
    this.setupEventListeners()
  }

  get isConnected(): boolean {
    return this._isConnected
  }

  private push(notification: ProtocolNotification): void {
    if (!this.feed.trySend(notification)) {
      logger.warn(`Notification feed closed, discarding ${notification.type}`)
    }
  }

  private pushEvent(event: ProtocolEvent | null): void {
    if (event) this.push({ type: 'event', event })
  }

  private setupEventListeners(): void {
    this.client.on(Events.MessageCreate, (message) => {
      for (const event of this.adaptMessage(message)) {
        this.pushEvent(event)
      }
    })

    this.client.on(Events.MessageUpdate, (_oldMessage, newMessage) => {
      const resolve = newMessage.partial ? newMessage.fetch() : Promise.resolve(newMessage)
      resolve
        .then((message) => this.pushEvent(adaptDiscordEdit(message)))
        .catch((error) => logger.error(`Could not fetch edited message ${newMessage.id}`, error))
    })

    this.client.on(Events.MessageDelete, (message) => {
      for (const event of adaptDiscordDelete(message, this.eventIndex.take(message.id))) {
        this.pushEvent(event)
      }
    })

    this.client.on(Events.MessageReactionAdd, (reaction, user) => {
      this.pushEvent(adaptDiscordReaction(reaction, user, 'add'))
    })

    this.client.on(Events.MessageReactionRemove, (reaction, user) => {
      this.pushEvent(adaptDiscordReaction(reaction, user, 'remove'))
    })

    this.client.on(Events.ChannelCreate, (channel) => {
      if (isRoomChannel(channel)) {
        this.pushMembership(channel.id, 'join', adaptDiscordChannel(channel).name)
      }
    })

    this.client.on(Events.ChannelDelete, (channel) => {
      this.pushMembership(channel.id, 'leave')
    })

    this.client.on(Events.GuildDelete, (guild: Guild) => {
      for (const channel of guild.channels.cache.values()) {
        this.pushMembership(channel.id, 'leave')
      }
    })
  }

  private adaptMessage(message: Message): ProtocolEvent[] {
    const events = adaptDiscordMessage(message)
    this.eventIndex.record(message.id, events)
    return events
  }

  /**
   * Reactions already on a fetched message, one add per reacting user
   */
  private async existingReactions(message: Message): Promise<ProtocolEvent[]> {
    const events: ProtocolEvent[] = []
    for (const reaction of message.reactions.cache.values()) {
      try {
        const users = await reaction.users.fetch()
        for (const user of users.values()) {
          const event = adaptDiscordReaction(reaction, user, 'add')
          if (event) events.push(event)
        }
      } catch (error) {
        logger.warn(`Could not load reactions on ${message.id}: ${errorMessage(error)}`)
      }
    }
    return events
  }

  private pushMembership(roomId: string, membership: 'join' | 'leave', roomName?: string): void {
    const self = this.client.user
    if (!self) return
    this.push({ type: 'membership', roomId, userId: self.id, membership, roomName })
  }

  async connect(): Promise<void> {
    await connectDiscord(this.client)
    this._isConnected = true
  }

  async disconnect(): Promise<void> {
    await disconnectDiscord(this.client)
    this._isConnected = false
    this.feed.close()
  }

  getCurrentUser(): IPlatformUser | null {
    if (!this.client.user) {
      return null
    }

    return {
      id: this.client.user.id,
      username: this.client.user.displayName,
    }
  }

  async getRooms(): Promise<IPlatformRoom[]> {
    const rooms: IPlatformRoom[] = []

    for (const guild of this.client.guilds.cache.values()) {
      const guildChannels = await guild.channels.fetch()
      for (const channel of guildChannels.values()) {
        if (isRoomChannel(channel)) {
          rooms.push(adaptDiscordChannel(channel))
        }
      }
    }

    for (const channel of this.client.channels.cache.values()) {
      if (channel.isDMBased() && isRoomChannel(channel)) {
        rooms.push(adaptDiscordChannel(channel))
      }
    }

    return rooms
  }

  async backfill(roomId: string, limit: number): Promise<ProtocolEvent[]> {
    const channel = await this.fetchRoomChannel(roomId)
    const messages = await channel.messages.fetch({ limit })
    const events: ProtocolEvent[] = []
    for (const message of Array.from(messages.values()).reverse()) {
      events.push(...this.adaptMessage(message), ...(await this.existingReactions(message)))
    }
    return events
  }

  notifications(): AsyncIterable<ProtocolNotification> {
    return this.feed
  }

  async sendMessage(options: SendMessageOptions): Promise<void> {
    const channel = await this.fetchRoomChannel(options.roomId)
    await channel.send({
      content: options.body,
      reply: options.inReplyTo ? { messageReference: messageIdOf(options.inReplyTo) } : undefined,
    })
  }

  async editMessage(roomId: string, eventId: string, body: string): Promise<void> {
    const message = await this.fetchMessage(roomId, eventId)
    await message.edit(body)
  }

  async redactMessage(roomId: string, eventId: string): Promise<void> {
    const message = await this.fetchMessage(roomId, eventId)
    await message.delete()
  }

  async sendReaction(roomId: string, eventId: string, key: string): Promise<void> {
    const message = await this.fetchMessage(roomId, eventId)
    await message.react(key)
  }

  async removeReaction(roomId: string, eventId: string, key: string): Promise<void> {
    const message = await this.fetchMessage(roomId, eventId)
    const reaction = message.reactions.cache.find((r) => r.emoji.name === key)

    if (reaction && this.client.user) {
      await reaction.users.remove(this.client.user.id)
    }
  }

  async uploadFile(roomId: string, path: string): Promise<void> {
    const channel = await this.fetchRoomChannel(roomId)
    await channel.send({ files: [path] })
  }

  async verify(): Promise<void> {
    throw new Error('Session verification is not supported on Discord')
  }

  async setIdle(idle: boolean): Promise<void> {
    try {
      this.client.user?.setPresence({ status: idle ? 'idle' : 'online' })
    } catch (error) {
      logger.warn(`Presence update failed: ${errorMessage(error)}`)
    }
  }

  /**
   * Discord clears the indicator by itself after a few seconds or on send
   */
  async setTyping(roomId: string, typing: boolean): Promise<void> {
    if (!typing) return
    const channel = await this.fetchRoomChannel(roomId)
    await channel.sendTyping()
  }

  async markRead(roomId: string, eventId: string): Promise<void> {
    // Bot accounts have no read state on Discord
    logger.debug(`Read marker for ${roomId} at ${eventId} not sent`)
  }

  downloadMedia(media: MediaContent): Promise<Uint8Array> {
    return download(media.url)
  }

  // ==================== Helpers ====================

  private async fetchRoomChannel(roomId: string): Promise<RoomChannel> {
    const channel = await this.client.channels.fetch(roomId)
    if (!isRoomChannel(channel)) {
      throw new Error('Channel not found or not text-based')
    }
    return channel
  }

  private async fetchMessage(roomId: string, eventId: string): Promise<Message> {
    const channel = await this.fetchRoomChannel(roomId)
    return channel.messages.fetch(messageIdOf(eventId))
  }
}

const MAX_REDIRECTS = 3

/**
 * GET a CDN URL into memory, following redirects
 */
function download(url: string, redirects = 0): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    https
      .get(url, (response) => {
        const status = response.statusCode ?? 0
        const location = response.headers.location
        if (status >= 300 && status < 400 && location && redirects < MAX_REDIRECTS) {
          response.resume()
          download(new URL(location, url).toString(), redirects + 1).then(resolve, reject)
          return
        }
        if (status !== 200) {
          response.resume()
          reject(new Error(`Download failed with HTTP ${status}`))
          return
        }
        const chunks: Buffer[] = []
        response.on('data', (chunk: Buffer) => chunks.push(chunk))
        response.on('end', () => resolve(Buffer.concat(chunks)))
        response.on('error', reject)
      })
      .on('error', reject)
  })
}
