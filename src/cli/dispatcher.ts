/**
 * Input dispatcher: the modal state machine behind every key press
 * Exactly one mode is active at a time. Each mode has its own key table;
 * keys a mode does not know are ignored and Escape always returns to normal.
 * Local state (selection, rooms, search) is changed directly; anything that
 * must leave the process is returned as a Command for the UI loop to run.
 */

import type { Key } from 'ink'
import type { RoomRegistry, Room } from '@/core/roomRegistry'
import type { MediaContent, TimelineEvent } from '@/core/events'
import { search, resolve, SearchMatch, SearchOptions } from '@/core/searchEngine'
import type { VerificationRequestNotification } from '@/platforms/types'
import { extractUrls, roomTranscript, summarizeEvent } from './shared'

// ==================== Types ====================

export type ComposePurpose = 'new' | 'edit' | 'reply' | 'view' | 'upload'

export type UiMode =
  | { name: 'normal' }
  | { name: 'roomSwitcher'; filter: string; selected: number }
  | { name: 'search'; query: string; matches: SearchMatch[] }
  | { name: 'searchResults'; query: string; matches: SearchMatch[]; selected: number }
  | { name: 'compose'; purpose: ComposePurpose; roomId: string; targetId?: string; resume: UiMode }
  | { name: 'verifyPassphrase'; passphrase: string; requestId?: string; from?: string }
  | { name: 'react'; roomId: string; targetId: string; palette: string[]; existing: string[]; selected: number }
  | { name: 'confirmDelete'; roomId: string; targetId: string; summary: string }
  | { name: 'help' }

export type ModeName = UiMode['name']

export type Command =
  | { type: 'compose'; purpose: Exclude<ComposePurpose, 'upload'>; roomId: string; initial: string; targetId?: string }
  | { type: 'pickFile'; roomId: string }
  | { type: 'react'; roomId: string; targetId: string; key: string; remove: boolean }
  | { type: 'verify'; passphrase: string; requestId?: string }
  | { type: 'open'; targets: string[] }
  | { type: 'save'; media: MediaContent }
  | { type: 'redact'; roomId: string; targetId: string }
  | { type: 'cancelExternal' }
  | { type: 'roomChanged'; roomId: string }
  | { type: 'notice'; text: string }

export type KeyFlags = Partial<
  Pick<
    Key,
    | 'upArrow'
    | 'downArrow'
    | 'leftArrow'
    | 'rightArrow'
    | 'pageUp'
    | 'pageDown'
    | 'return'
    | 'escape'
    | 'ctrl'
    | 'meta'
    | 'tab'
    | 'backspace'
    | 'delete'
  >
>

export interface KeyPress {
  input: string
  key: KeyFlags
}

export interface DispatchContext {
  registry: RoomRegistry
  /** Configured reaction palette */
  palette: string[]
  search: SearchOptions
  /** Id of the local user */
  selfId: string | null
}

export const NORMAL: UiMode = { name: 'normal' }

// ==================== Key Helpers ====================

export function press(input: string, key: KeyFlags = {}): KeyPress {
  return { input, key }
}

// Normal-mode keys that act on the selected message
const SELECTION_KEYS = ['c', 'R', 'v', 'r', 's', 'd']

const isDown = ({ input, key }: KeyPress) => Boolean(key.downArrow) || (!key.ctrl && input === 'j')
const isUp = ({ input, key }: KeyPress) => Boolean(key.upArrow) || (!key.ctrl && input === 'k')

/**
 * Apply a text-editing key to a single-line value; null when the key is not an edit
 */
export function editLine(value: string, { input, key }: KeyPress): string | null {
  if (key.backspace || key.delete) return value.slice(0, -1)
  if (key.ctrl || key.meta || key.escape || key.return || key.tab) return null
  if (key.upArrow || key.downArrow || key.leftArrow || key.rightArrow || key.pageUp || key.pageDown) return null
  return input ? value + input : null
}

function wrap(index: number, length: number): number {
  if (length === 0) return 0
  return ((index % length) + length) % length
}

function clamp(index: number, length: number): number {
  return length === 0 ? 0 : Math.max(0, Math.min(index, length - 1))
}

// ==================== Dispatcher ====================

export class InputDispatcher {
  private _mode: UiMode = NORMAL
  private pendingVerification: VerificationRequestNotification | null = null

  get mode(): UiMode {
    return this._mode
  }

  /**
   * Route one key press to the active mode's table
   */
  handle(keyPress: KeyPress, ctx: DispatchContext): Command[] {
    const mode = this._mode
    if (keyPress.key.escape && mode.name !== 'normal') {
      this._mode = NORMAL
      return mode.name === 'compose' ? [{ type: 'cancelExternal' }] : []
    }

    switch (mode.name) {
      case 'normal':
        return this.handleNormal(keyPress, ctx)
      case 'roomSwitcher':
        return this.handleRoomSwitcher(mode, keyPress, ctx)
      case 'search':
        return this.handleSearch(mode, keyPress, ctx)
      case 'searchResults':
        return this.handleSearchResults(mode, keyPress, ctx)
      case 'react':
        return this.handleReact(mode, keyPress)
      case 'verifyPassphrase':
        return this.handleVerify(mode, keyPress)
      case 'confirmDelete':
        return this.handleConfirmDelete(mode, keyPress)
      case 'help':
        this._mode = NORMAL
        return []
      case 'compose':
        return []
    }
  }

  // ==================== External Process ====================

  /**
   * The external process finished (or failed): go back to where it started
   */
  resumeAfterExternal(): void {
    if (this._mode.name !== 'compose') return
    this._mode = this._mode.resume
    this.offerPendingVerification()
  }

  // ==================== Verification ====================

  /**
   * A verification request arrived; prompt now unless an external process owns the terminal
   */
  requestVerification(request: VerificationRequestNotification): void {
    this.pendingVerification = request
    if (this._mode.name !== 'compose') this.offerPendingVerification()
  }

  private offerPendingVerification(): void {
    const request = this.pendingVerification
    if (!request) return
    this.pendingVerification = null
    this._mode = { name: 'verifyPassphrase', passphrase: '', requestId: request.requestId, from: request.from }
  }

  /**
   * Re-run the live search after the focused room changed underneath it
   */
  refreshSearch(ctx: DispatchContext): void {
    const mode = this._mode
    if (mode.name !== 'search') return
    this._mode = { ...mode, matches: runSearch(ctx, mode.query) }
  }

  // ==================== Normal ====================

  private handleNormal(keyPress: KeyPress, ctx: DispatchContext): Command[] {
    const { input, key } = keyPress

    if (input === ' ') {
      this._mode = { name: 'roomSwitcher', filter: '', selected: 0 }
      return []
    }
    if (input === '?') {
      this._mode = { name: 'help' }
      return []
    }
    if (input === '/') {
      this._mode = { name: 'search', query: '', matches: [] }
      return []
    }

    const room = ctx.registry.focused()
    if (!room) return []
    const view = room.view

    if (isDown(keyPress)) {
      view.moveBy(1)
    } else if (isUp(keyPress)) {
      view.moveBy(-1)
    } else if (key.pageDown || (key.ctrl && input === 'd')) {
      view.pageDown()
    } else if (key.pageUp || (key.ctrl && input === 'u')) {
      view.pageUp()
    } else if (input === 'G') {
      view.jumpToLatest()
    } else if (input === 'g') {
      view.jumpToOldest()
    } else if (input === 'i') {
      return this.compose(room, 'new')
    } else if (input === 'u') {
      this._mode = { name: 'compose', purpose: 'upload', roomId: room.id, resume: NORMAL }
      return [{ type: 'pickFile', roomId: room.id }]
    } else if (input === 'm') {
      const muted = ctx.registry.toggleMuted(room.id)
      return [{ type: 'notice', text: `${room.name} ${muted ? 'muted' : 'unmuted'}` }]
    } else if (input === 'V') {
      return this.viewRoom(room)
    } else if (key.return || SELECTION_KEYS.includes(input)) {
      const selected = view.selectedEvent()
      if (!selected) return []
      if (key.return) return openSelected(selected)
      if (input === 'c') return this.composeEdit(ctx, room, selected)
      if (input === 'R') return this.compose(room, 'reply', selected)
      if (input === 'v') return this.compose(room, 'view', selected)
      if (input === 's') return saveSelected(selected)
      if (input === 'd') return this.confirmDelete(ctx, room, selected)
      this.openReactPicker(ctx, room, selected)
    }
    return []
  }

  private viewRoom(room: Room): Command[] {
    const initial = roomTranscript(room.name, room.store.iter())
    this._mode = { name: 'compose', purpose: 'view', roomId: room.id, resume: NORMAL }
    return [{ type: 'compose', purpose: 'view', roomId: room.id, initial }]
  }

  private confirmDelete(ctx: DispatchContext, room: Room, target: TimelineEvent): Command[] {
    if (target.senderId !== ctx.selfId) {
      return [{ type: 'notice', text: 'Only your own messages can be deleted' }]
    }
    this._mode = { name: 'confirmDelete', roomId: room.id, targetId: target.id, summary: summarizeEvent(target) }
    return []
  }

  private compose(
    room: Room,
    purpose: Exclude<ComposePurpose, 'upload'>,
    target?: TimelineEvent
  ): Command[] {
    const initial = purpose === 'view' || purpose === 'edit' ? target?.body.body ?? '' : ''
    this._mode = { name: 'compose', purpose, roomId: room.id, targetId: target?.id, resume: NORMAL }
    return [{ type: 'compose', purpose, roomId: room.id, initial, targetId: target?.id }]
  }

  private composeEdit(ctx: DispatchContext, room: Room, target: TimelineEvent): Command[] {
    if (target.senderId !== ctx.selfId || target.body.kind !== 'text') {
      return [{ type: 'notice', text: 'Only your own text messages can be edited' }]
    }
    return this.compose(room, 'edit', target)
  }

  private openReactPicker(ctx: DispatchContext, room: Room, target: TimelineEvent): void {
    const existing = target.reactions
      .filter((r) => r.senders.some((s) => s.senderId === ctx.selfId))
      .map((r) => r.key)
    const palette = Array.from(new Set([...existing, ...ctx.palette]))
    if (palette.length === 0) return
    this._mode = { name: 'react', roomId: room.id, targetId: target.id, palette, existing, selected: 0 }
  }

  // ==================== Room Switcher ====================

  private handleRoomSwitcher(
    mode: Extract<UiMode, { name: 'roomSwitcher' }>,
    keyPress: KeyPress,
    ctx: DispatchContext
  ): Command[] {
    const rooms = ctx.registry.filter(mode.filter)

    if (keyPress.key.return) {
      const room = rooms[clamp(mode.selected, rooms.length)]
      this._mode = NORMAL
      if (!room) return []
      ctx.registry.focus(room.id)
      return [{ type: 'roomChanged', roomId: room.id }]
    }
    if (keyPress.key.downArrow) {
      this._mode = { ...mode, selected: wrap(mode.selected + 1, rooms.length) }
      return []
    }
    if (keyPress.key.upArrow) {
      this._mode = { ...mode, selected: wrap(mode.selected - 1, rooms.length) }
      return []
    }

    const filter = editLine(mode.filter, keyPress)
    if (filter !== null) this._mode = { ...mode, filter, selected: 0 }
    return []
  }

  // ==================== Search ====================

  private handleSearch(
    mode: Extract<UiMode, { name: 'search' }>,
    keyPress: KeyPress,
    ctx: DispatchContext
  ): Command[] {
    if (keyPress.key.return) {
      this._mode = { name: 'searchResults', query: mode.query, matches: mode.matches, selected: 0 }
      return []
    }

    const query = editLine(mode.query, keyPress)
    if (query !== null) {
      this._mode = { ...mode, query, matches: runSearch(ctx, query) }
    }
    return []
  }

  private handleSearchResults(
    mode: Extract<UiMode, { name: 'searchResults' }>,
    keyPress: KeyPress,
    ctx: DispatchContext
  ): Command[] {
    if (isDown(keyPress)) {
      this._mode = { ...mode, selected: clamp(mode.selected + 1, mode.matches.length) }
      return []
    }
    if (isUp(keyPress)) {
      this._mode = { ...mode, selected: clamp(mode.selected - 1, mode.matches.length) }
      return []
    }
    if (keyPress.input === '/') {
      this._mode = { name: 'search', query: mode.query, matches: runSearch(ctx, mode.query) }
      return []
    }
    if (!keyPress.key.return) return []

    const match = mode.matches[mode.selected]
    const room = ctx.registry.focused()
    if (!match || !room) return []

    this._mode = NORMAL
    const resolution = resolve(room.store, match)
    if (resolution.found) {
      room.view.select(resolution.index)
      return []
    }
    if (resolution.fallbackIndex >= 0) room.view.select(resolution.fallbackIndex)
    return [{ type: 'notice', text: 'That message is no longer cached; showing the nearest one' }]
  }

  // ==================== React ====================

  private handleReact(mode: Extract<UiMode, { name: 'react' }>, keyPress: KeyPress): Command[] {
    if (isDown(keyPress)) {
      this._mode = { ...mode, selected: wrap(mode.selected + 1, mode.palette.length) }
      return []
    }
    if (isUp(keyPress)) {
      this._mode = { ...mode, selected: wrap(mode.selected - 1, mode.palette.length) }
      return []
    }
    if (!keyPress.key.return) return []

    const key = mode.palette[mode.selected]
    this._mode = NORMAL
    if (!key) return []
    return [{ type: 'react', roomId: mode.roomId, targetId: mode.targetId, key, remove: mode.existing.includes(key) }]
  }

  // ==================== Verification ====================

  private handleVerify(mode: Extract<UiMode, { name: 'verifyPassphrase' }>, keyPress: KeyPress): Command[] {
    if (keyPress.key.return) {
      this._mode = NORMAL
      if (!mode.passphrase) return []
      return [{ type: 'verify', passphrase: mode.passphrase, requestId: mode.requestId }]
    }

    const passphrase = editLine(mode.passphrase, keyPress)
    if (passphrase !== null) this._mode = { ...mode, passphrase }
    return []
  }

  // ==================== Delete ====================

  private handleConfirmDelete(mode: Extract<UiMode, { name: 'confirmDelete' }>, { input, key }: KeyPress): Command[] {
    if (input === 'n') {
      this._mode = NORMAL
      return []
    }
    if (input !== 'y' && !key.return) return []
    this._mode = NORMAL
    return [{ type: 'redact', roomId: mode.roomId, targetId: mode.targetId }]
  }
}

/**
 * Media opens itself; text opens every link it contains
 */
function openSelected(event: TimelineEvent): Command[] {
  const targets = event.body.kind === 'media' ? [event.body.url] : extractUrls(event.body.body)
  if (targets.length === 0) return [{ type: 'notice', text: 'Nothing to open in this message' }]
  return [{ type: 'open', targets }]
}

function saveSelected(event: TimelineEvent): Command[] {
  if (event.body.kind !== 'media') return [{ type: 'notice', text: 'Only media can be saved' }]
  return [{ type: 'save', media: event.body }]
}

function runSearch(ctx: DispatchContext, query: string): SearchMatch[] {
  const room = ctx.registry.focused()
  return room ? search(room.store, query, ctx.search) : []
}
