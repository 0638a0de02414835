/**
 * UI loop
 * Owns every piece of core state. Background work (the sync stream, config
 * reloads, timers, external processes, outbound calls) only ever reaches it
 * through the channel, which is drained once per cycle. Renderers subscribe
 * and pull a frame after each cycle or key press.
 */

import { Channel } from '@/core/channel'
import { DelayTimer } from '@/core/delayTimer'
import type { ProtocolEvent, TimelineEvent } from '@/core/events'
import { RoomRegistry, Room } from '@/core/roomRegistry'
import type { SearchMatch, SearchOptions } from '@/core/searchEngine'
import { SyncBridge, BridgeMessage } from '@/core/syncBridge'
import type { ViewWindow } from '@/core/timelineView'
import type { IPlatformClient } from '@/platforms/types'
import { ConfigError, errorMessage } from '@/helpers/errors'
import { createLogger, Logger } from '@/helpers/logger'
import { AppConfig, DEFAULT_CONFIG } from './config'
import { InputDispatcher, Command, DispatchContext, KeyPress, UiMode } from './dispatcher'

// ==================== Types ====================

export type ExternalOutcome =
  | { kind: 'text'; text: string | null }
  | { kind: 'files'; paths: string[] }
  | { kind: 'failed'; error: string }

export type LoopMessage =
  | BridgeMessage
  | { type: 'blurred' }
  | { type: 'config'; config: AppConfig }
  | { type: 'configError'; error: ConfigError }
  | { type: 'externalDone'; token: number; outcome: ExternalOutcome }
  | { type: 'outboundResult'; description: string; error?: string; notice?: string }

export interface ExternalRunners {
  editText: (initial: string, options: { signal: AbortSignal; clearVim: boolean }) => Promise<string | null>
  pickFiles: (options: { signal: AbortSignal }) => Promise<string[]>
  /** Hand a URL to the desktop's opener */
  openTarget: (target: string) => Promise<void>
  /** Store downloaded media; resolves to the path written */
  saveFile: (fileName: string, data: Uint8Array) => Promise<string>
}

export interface UiLoopOptions {
  client: IPlatformClient
  external: ExternalRunners
  channel?: Channel<LoopMessage>
  config?: AppConfig
  pageSize?: number
  relationWindowMs?: number
  /** Upper bound on messages applied per cycle */
  batchSize?: number
  logger?: Logger
}

export interface RoomSummary {
  id: string
  name: string
  unread: number
  muted: boolean
  focused: boolean
}

export interface SearchRow {
  match: SearchMatch
  event: TimelineEvent | undefined
}

/**
 * Everything a renderer needs for one frame
 */
export interface Frame {
  mode: UiMode
  room: RoomSummary | null
  rooms: RoomSummary[]
  switcher: RoomSummary[]
  events: TimelineEvent[]
  window: ViewWindow
  selected: number
  total: number
  searchRows: SearchRow[]
  self: string | null
  notice: string | null
  idle: boolean
}

interface PendingExternal {
  token: number
  controller: AbortController
}

const DEFAULT_BATCH_SIZE = 256
const TYPING_REFRESH_MS = 8000

// ==================== Loop ====================

export class UiLoop {
  readonly channel: Channel<LoopMessage>
  readonly registry: RoomRegistry
  readonly dispatcher = new InputDispatcher()
  private readonly bridge: SyncBridge
  private readonly client: IPlatformClient
  private readonly external: ExternalRunners
  private readonly logger: Logger
  private readonly blurTimer: DelayTimer
  private readonly batchSize: number
  private config: AppConfig
  private listeners = new Set<() => void>()
  private pending: PendingExternal | null = null
  private typing: { roomId: string; timer: ReturnType<typeof setInterval> } | null = null
  private nextToken = 1
  private notice: string | null = null
  private idle = false
  private running = false

  constructor(options: UiLoopOptions) {
    this.client = options.client
    this.external = options.external
    this.channel = options.channel ?? new Channel<LoopMessage>(1024)
    this.logger = options.logger ?? createLogger('ui')
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE
    this.config = options.config ?? DEFAULT_CONFIG
    this.registry = new RoomRegistry({
      pageSize: options.pageSize,
      store: {
        capacity: this.config.max_events,
        relations: { windowMs: options.relationWindowMs },
      },
    })
    this.registry.applyMutedSet(this.config.muted)
    this.bridge = new SyncBridge(this.registry, { self: () => this.client.getCurrentUser(), logger: this.logger })
    this.blurTimer = new DelayTimer(this.config.blur_delay * 1000, () => {
      this.channel.send({ type: 'blurred' }).catch((error) => this.logger.error('Could not queue blur', error))
    })
  }

  get currentConfig(): AppConfig {
    return this.config
  }

  // ==================== Subscription ====================

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private publish(): void {
    for (const listener of this.listeners) {
      listener()
    }
  }

  // ==================== Lifecycle ====================

  /**
   * Consume the client's notification stream in the background
   */
  pumpNotifications(): Promise<void> {
    return this.bridge.pump(this.client.notifications(), this.channel)
  }

  /**
   * Queue recent history for each room, marked so it neither counts as
   * unread nor trips the ordering check. A failing room is logged and skipped.
   */
  async backfill(roomIds: string[], limit: number): Promise<void> {
    for (const roomId of roomIds) {
      if (this.channel.isClosed) return
      let events: ProtocolEvent[]
      try {
        events = await this.client.backfill(roomId, limit)
      } catch (error) {
        this.logger.warn(`Backfill of ${roomId} failed: ${errorMessage(error)}`)
        continue
      }
      for (const event of events) {
        await this.channel.send({ type: 'protocol', notification: { type: 'event', event, history: true } })
      }
    }
  }

  /**
   * History first, then the live stream, so live events never land ahead of older ones
   */
  async startSync(roomIds: string[], limit: number): Promise<void> {
    await this.backfill(roomIds, limit)
    await this.pumpNotifications()
  }

  /**
   * Drain the channel until stop() is called
   */
  async run(): Promise<void> {
    this.running = true
    this.blurTimer.record()
    while (this.running) {
      await this.channel.readable()
      if (this.channel.isClosed && this.channel.length === 0) break
      this.cycle()
    }
  }

  stop(): void {
    this.running = false
    this.blurTimer.cancel()
    this.cancelExternal()
    this.stopTyping()
    this.channel.close()
  }

  /**
   * One UI cycle: apply everything queued, then publish a single frame
   */
  cycle(): number {
    const messages = this.channel.drain(this.batchSize)
    for (const message of messages) {
      this.applyMessage(message)
    }
    if (messages.length > 0) {
      this.dispatcher.refreshSearch(this.context())
      this.publish()
    }
    return messages.length
  }

  /**
   * Seed a room from the platform before live notifications arrive
   */
  addRoom(id: string, name: string): Room {
    return this.registry.ensure(id, name)
  }

  // ==================== Input ====================

  handleKey(keyPress: KeyPress): void {
    this.blurTimer.record()
    if (this.idle) {
      this.idle = false
      this.outbound('Presence', () => this.client.setIdle(false))
    }
    this.notice = null

    const commands = this.dispatcher.handle(keyPress, this.context())
    for (const command of commands) {
      this.execute(command)
    }

    // Leaving compose by any route abandons whatever was running
    if (this.pending && this.dispatcher.mode.name !== 'compose') {
      this.cancelExternal()
    }
    this.publish()
  }

  private context(): DispatchContext {
    const order = this.config.search_order === 'oldest' ? 'oldest-first' : 'newest-first'
    const search: SearchOptions = { order, depth: this.config.search_depth }
    return {
      registry: this.registry,
      palette: this.config.reactions,
      search,
      selfId: this.client.getCurrentUser()?.id ?? null,
    }
  }

  // ==================== Commands ====================

  private execute(command: Command): void {
    switch (command.type) {
      case 'compose': {
        const clearVim = this.config.clear_vim
        this.startExternal((signal) =>
          this.external.editText(command.initial, { signal, clearVim }).then((text): ExternalOutcome => ({ kind: 'text', text }))
        )
        if (command.purpose !== 'view') this.startTyping(command.roomId)
        break
      }

      case 'pickFile':
        this.startExternal((signal) =>
          this.external.pickFiles({ signal }).then((paths): ExternalOutcome => ({ kind: 'files', paths }))
        )
        break

      case 'react': {
        const { roomId, targetId, key } = command
        if (command.remove) {
          this.outbound(`Remove ${key}`, () => this.client.removeReaction(roomId, targetId, key))
        } else {
          this.outbound(`React ${key}`, () => this.client.sendReaction(roomId, targetId, key))
        }
        break
      }

      case 'verify':
        this.outbound('Verification', () => this.client.verify(command.passphrase, command.requestId))
        break

      case 'open':
        for (const target of command.targets) {
          this.outbound(`Open ${target}`, () => this.external.openTarget(target))
        }
        break

      case 'save': {
        const { media } = command
        this.outbound(`Save ${media.body}`, async () => {
          const data = await this.client.downloadMedia(media)
          const path = await this.external.saveFile(media.body, data)
          return `Saved to ${path}`
        })
        break
      }

      case 'redact': {
        const { roomId, targetId } = command
        this.outbound('Delete', () => this.client.redactMessage(roomId, targetId))
        break
      }

      case 'cancelExternal':
        this.cancelExternal()
        break

      case 'roomChanged':
        this.cancelExternal()
        this.markRead(command.roomId)
        break

      case 'notice':
        this.notice = command.text
        break
    }
  }

  private startExternal(run: (signal: AbortSignal) => Promise<ExternalOutcome>): void {
    this.cancelExternal()
    const token = this.nextToken++
    const controller = new AbortController()
    this.pending = { token, controller }
    this.blurTimer.cancel()

    run(controller.signal)
      .catch((error): ExternalOutcome => ({ kind: 'failed', error: errorMessage(error) }))
      .then((outcome) => this.channel.send({ type: 'externalDone', token, outcome }))
      .catch((error) => this.logger.error('Could not report external process result', error))
  }

  private cancelExternal(): void {
    if (!this.pending) return
    this.pending.controller.abort()
    this.pending = null
    this.stopTyping()
  }

  /**
   * Fire an outbound call; its result (and any success notice) comes back through the channel
   */
  private outbound(description: string, call: () => Promise<string | void>): void {
    call()
      .then(
        (notice): LoopMessage => ({
          type: 'outboundResult',
          description,
          notice: typeof notice === 'string' ? notice : undefined,
        }),
        (error): LoopMessage => ({ type: 'outboundResult', description, error: errorMessage(error) })
      )
      .then((message) => this.channel.send(message))
      .catch((error) => this.logger.error(`Could not report ${description}`, error))
  }

  /**
   * Calls nobody needs to hear about: failures are logged only
   */
  private quietly(description: string, call: () => Promise<void>): void {
    call().catch((error) => this.logger.debug(`${description} failed: ${errorMessage(error)}`))
  }

  // ==================== Typing and Read Markers ====================

  private startTyping(roomId: string): void {
    this.stopTyping()
    const notify = () => this.quietly('Typing notice', () => this.client.setTyping(roomId, true))
    notify()
    this.typing = { roomId, timer: setInterval(notify, TYPING_REFRESH_MS) }
  }

  private stopTyping(): void {
    if (!this.typing) return
    const { roomId, timer } = this.typing
    clearInterval(timer)
    this.typing = null
    this.quietly('Typing notice', () => this.client.setTyping(roomId, false))
  }

  /**
   * Move the room's read marker to its newest cached message
   */
  private markRead(roomId: string): void {
    const store = this.registry.get(roomId)?.store
    const latest = store?.at(store.size - 1)
    if (latest) this.quietly('Read marker', () => this.client.markRead(roomId, latest.id))
  }

  // ==================== Channel Messages ====================

  private applyMessage(message: LoopMessage): void {
    switch (message.type) {
      case 'protocol': {
        const result = this.bridge.apply(message.notification)
        if (result.type === 'verificationRequest') {
          this.dispatcher.requestVerification(result.request)
        } else if (result.type === 'roomLeft') {
          this.notice = `Left ${result.roomId}`
        }
        break
      }

      case 'notice':
        this.notice = message.text
        break

      case 'blurred':
        if (!this.idle) {
          this.idle = true
          this.outbound('Presence', () => this.client.setIdle(true))
        }
        break

      case 'config':
        this.applyConfig(message.config)
        break

      case 'configError':
        this.notice = `Config not reloaded: ${message.error.message}`
        break

      case 'externalDone':
        this.finishExternal(message.token, message.outcome)
        break

      case 'outboundResult':
        if (message.error) {
          this.logger.warn(`${message.description} failed: ${message.error}`)
          this.notice = `${message.description} failed: ${message.error}`
        } else if (message.notice) {
          this.notice = message.notice
        }
        break
    }
  }

  applyConfig(config: AppConfig): void {
    this.config = config
    this.registry.applyMutedSet(config.muted)
    this.registry.setCapacity(config.max_events)
    this.blurTimer.setDelay(config.blur_delay * 1000)
    this.blurTimer.record()
  }

  private finishExternal(token: number, outcome: ExternalOutcome): void {
    if (!this.pending || this.pending.token !== token) return
    this.pending = null
    this.stopTyping()

    const mode = this.dispatcher.mode
    this.dispatcher.resumeAfterExternal()
    this.blurTimer.record()
    if (mode.name !== 'compose') return

    if (outcome.kind === 'failed') {
      this.logger.warn(`External process failed: ${outcome.error}`)
      this.notice = outcome.error
      return
    }

    const { roomId, targetId, purpose } = mode
    if (outcome.kind === 'files') {
      for (const path of outcome.paths) {
        this.outbound(`Upload ${path}`, () => this.client.uploadFile(roomId, path))
      }
      return
    }

    const text = outcome.text
    if (text === null || purpose === 'view') return

    if (purpose === 'edit' && targetId) {
      const original = this.registry.get(roomId)?.store.get(targetId)
      if (original && original.body.body === text) return
      this.outbound('Edit', () => this.client.editMessage(roomId, targetId, text))
    } else {
      const inReplyTo = purpose === 'reply' ? targetId : undefined
      this.outbound('Send', () => this.client.sendMessage({ roomId, body: text, inReplyTo }))
    }
  }

  // ==================== Frames ====================

  /**
   * Build the frame for a viewport showing `height` timeline rows
   */
  frame(height: number): Frame {
    const focused = this.registry.focused()
    const summarize = (room: Room): RoomSummary => ({
      id: room.id,
      name: room.name,
      unread: room.unread,
      muted: room.muted,
      focused: room === focused,
    })

    const mode = this.dispatcher.mode
    const window = focused ? focused.view.window(height) : { start: 0, end: 0 }
    const events: TimelineEvent[] = []
    for (let i = window.start; i < window.end; i++) {
      const event = focused?.store.at(i)
      if (event) events.push(event)
    }

    const matches = mode.name === 'search' || mode.name === 'searchResults' ? mode.matches : []

    return {
      mode,
      room: focused ? summarize(focused) : null,
      rooms: this.registry.ordered().map(summarize),
      switcher: mode.name === 'roomSwitcher' ? this.registry.filter(mode.filter).map(summarize) : [],
      events,
      window,
      selected: focused?.view.selected ?? 0,
      total: focused?.store.size ?? 0,
      searchRows: matches.map((match) => ({ match, event: focused?.store.get(match.eventId) })),
      self: this.client.getCurrentUser()?.username ?? null,
      notice: this.notice,
      idle: this.idle,
    }
  }
}
