/**
 * Ink-based terminal UI
 * Pulls a frame from the UI loop after every change and forwards key presses
 * back to it. Components are stateless; all state lives in the loop.
 */

import React, { useEffect, useReducer } from 'react'
import { render, Box, Text, useInput, useStdout } from 'ink'
import type { TimelineEvent } from '@/core/events'
import type { UiLoop, Frame, RoomSummary, SearchRow } from '../runtime'
import type { UiMode } from '../dispatcher'
import {
  truncateToWidth,
  formatDateHeader,
  formatTime,
  formatReactions,
  describeReaction,
  summarizeEvent,
} from '../shared'

// ==================== Types ====================

type Binding = { key: string; label: string }

const DEFAULT_ROWS = 24
const DEFAULT_COLUMNS = 100
const CHROME_ROWS = 3 // status bar, notice line, help bar

export const HELP_BINDINGS: Binding[] = [
  { key: 'space', label: 'switch room' },
  { key: 'j/k', label: 'move selection' },
  { key: 'PgUp/PgDn', label: 'page' },
  { key: 'g/G', label: 'oldest/latest' },
  { key: 'i', label: 'compose in $EDITOR' },
  { key: 'R', label: 'reply to selected' },
  { key: 'c', label: 'edit selected' },
  { key: 'v', label: 'view selected in $EDITOR' },
  { key: 'V', label: 'view whole room in $EDITOR' },
  { key: 'Enter', label: 'open media or links' },
  { key: 's', label: 'save media' },
  { key: 'd', label: 'delete own message' },
  { key: 'r', label: 'react' },
  { key: 'u', label: 'upload a file' },
  { key: 'm', label: 'mute/unmute room' },
  { key: '/', label: 'search this room' },
  { key: 'Esc', label: 'back to timeline' },
  { key: '?', label: 'help' },
]

function bindingsFor(mode: UiMode): Binding[] {
  switch (mode.name) {
    case 'normal':
      return [
        { key: 'space', label: 'rooms' },
        { key: 'i', label: 'compose' },
        { key: 'r', label: 'react' },
        { key: '/', label: 'search' },
        { key: '?', label: 'help' },
      ]
    case 'roomSwitcher':
      return [
        { key: '↑/↓', label: 'select' },
        { key: 'Enter', label: 'open' },
        { key: 'Esc', label: 'cancel' },
      ]
    case 'search':
      return [
        { key: 'Enter', label: 'browse results' },
        { key: 'Esc', label: 'cancel' },
      ]
    case 'searchResults':
      return [
        { key: 'j/k', label: 'select' },
        { key: 'Enter', label: 'jump' },
        { key: '/', label: 'refine' },
        { key: 'Esc', label: 'cancel' },
      ]
    case 'react':
      return [
        { key: 'j/k', label: 'select' },
        { key: 'Enter', label: 'toggle' },
        { key: 'Esc', label: 'cancel' },
      ]
    case 'verifyPassphrase':
      return [
        { key: 'Enter', label: 'verify' },
        { key: 'Esc', label: 'cancel' },
      ]
    case 'confirmDelete':
      return [
        { key: 'y', label: 'delete' },
        { key: 'n/Esc', label: 'keep' },
      ]
    case 'help':
      return [{ key: 'any key', label: 'close' }]
    case 'compose':
      return []
  }
}

// ==================== Components ====================

interface StatusBarProps {
  text: string
  columns: number
}

function StatusBar({ text, columns }: StatusBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text inverse color="blue">
        {truncateToWidth(text, columns).padEnd(columns)}
      </Text>
    </Box>
  )
}

interface HelpBarProps {
  bindings: Binding[]
}

function HelpBar({ bindings }: HelpBarProps) {
  return (
    <Box width="100%" height={1}>
      <Text color="gray">{bindings.map((b) => `${b.key}=${b.label}`).join(' · ')}</Text>
    </Box>
  )
}

interface TimelinePaneProps {
  events: TimelineEvent[]
  start: number
  selected: number
  columns: number
}

function TimelinePane({ events, start, selected, columns }: TimelinePaneProps) {
  if (events.length === 0) {
    return <Text color="gray">No messages yet</Text>
  }

  return (
    <Box flexDirection="column" flexGrow={1}>
      {events.map((event, idx) => {
        const isSelected = start + idx === selected
        const prefix = isSelected ? '▶ ' : '  '
        const reactions = event.reactions.length > 0 ? `  ${formatReactions(event.reactions)}` : ''
        const reply = event.inReplyTo ? '↳ ' : ''
        const line = `${prefix}[${formatTime(event.timestamp)}] ${event.sender}: ${reply}${summarizeEvent(event)}${reactions}`
        return (
          <Text key={event.id} inverse={isSelected} color={isSelected ? 'blue' : 'white'}>
            {truncateToWidth(line, columns)}
          </Text>
        )
      })}
    </Box>
  )
}

interface RoomSwitcherViewProps {
  filter: string
  rooms: RoomSummary[]
  selected: number
  rows: number
}

function RoomSwitcherView({ filter, rooms, selected, rows }: RoomSwitcherViewProps) {
  const visibleCount = Math.max(1, rows - 1)
  const startIndex = Math.max(0, Math.min(selected - Math.floor(visibleCount / 2), rooms.length - visibleCount))

  return (
    <Box flexDirection="column" flexGrow={1}>
      <Text color="yellow">Room: {filter}</Text>
      {rooms.length === 0 && <Text color="gray">No matching rooms</Text>}
      {rooms.slice(startIndex, startIndex + visibleCount).map((room, idx) => {
        const isSelected = startIndex + idx === selected
        const unread = room.unread > 0 ? ` (${room.unread})` : ''
        const muted = room.muted ? ' [muted]' : ''
        return (
          <Text key={room.id} inverse={isSelected} color={isSelected ? 'green' : 'blackBright'}>
            {isSelected ? '▶ ' : '  '}
            {room.name}
            {unread}
            {muted}
          </Text>
        )
      })}
    </Box>
  )
}

interface SearchViewProps {
  query: string
  rows: SearchRow[]
  selected: number | null
  height: number
  columns: number
}

function SearchView({ query, rows, selected, height, columns }: SearchViewProps) {
  const visible = rows.slice(0, Math.max(0, height - 1))

  return (
    <Box flexDirection="column" flexGrow={1}>
      <Text color="yellow">
        Search: {query}
        {selected === null ? '▏' : ''} <Text color="gray">({rows.length} found)</Text>
      </Text>
      {visible.map(({ match, event }, idx) => {
        const isSelected = idx === selected
        if (!event) {
          return (
            <Text key={match.eventId} color="gray">
              {'  '}(no longer cached)
            </Text>
          )
        }
        const text = event.body.body
        const before = truncateToWidth(`${event.sender}: ${text.slice(0, match.span.start)}`, Math.floor(columns / 2))
        return (
          <Text key={match.eventId} inverse={isSelected}>
            {isSelected ? '▶ ' : '  '}
            {before}
            <Text color="magenta" bold>
              {text.slice(match.span.start, match.span.end)}
            </Text>
            {text.slice(match.span.end).split('\n')[0]}
          </Text>
        )
      })}
    </Box>
  )
}

interface ReactViewProps {
  palette: string[]
  existing: string[]
  selected: number
}

function ReactView({ palette, existing, selected }: ReactViewProps) {
  return (
    <Box flexDirection="column" flexGrow={1}>
      <Text color="yellow">React to message:</Text>
      {palette.map((key, idx) => {
        const isSelected = idx === selected
        return (
          <Text key={key} inverse={isSelected}>
            {isSelected ? '▶ ' : '  '}
            {key}
            {existing.includes(key) ? '  (remove)' : ''}
          </Text>
        )
      })}
    </Box>
  )
}

interface VerifyViewProps {
  passphrase: string
  from?: string
}

function VerifyView({ passphrase, from }: VerifyViewProps) {
  return (
    <Box flexDirection="column" flexGrow={1}>
      {from && <Text color="cyan">Verification requested by {from}</Text>}
      <Text color="yellow">
        Recovery Key/Passphrase: <Text color="white">{'*'.repeat(passphrase.length)}▏</Text>
      </Text>
    </Box>
  )
}

function ConfirmDeleteView({ summary }: { summary: string }) {
  return (
    <Box flexDirection="column" flexGrow={1}>
      <Text color="yellow">Delete this message?</Text>
      <Text color="gray">{summary}</Text>
    </Box>
  )
}

function HelpView({ event }: { event: TimelineEvent | undefined }) {
  return (
    <Box flexDirection="column" flexGrow={1}>
      <Text color="yellow">Keys</Text>
      {HELP_BINDINGS.map((b) => (
        <Text key={b.key}>
          <Text color="cyan">{b.key.padEnd(10)}</Text> {b.label}
        </Text>
      ))}
      {event && event.reactions.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text color="yellow">Reactions on selected message</Text>
          {event.reactions.map((r) => (
            <Text key={r.key} color="gray">
              {describeReaction(r)}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  )
}

function statusText(frame: Frame): string {
  if (!frame.room) return 'murmur · no rooms yet'
  const selected = frame.events[frame.selected - frame.window.start]
  const day = selected ? ` · ${formatDateHeader(new Date(selected.timestamp))}` : ''
  const muted = frame.room.muted ? ' [muted]' : ''
  const unread = frame.rooms.reduce((sum, room) => sum + (room.focused ? 0 : room.unread), 0)
  const others = unread > 0 ? ` · ${unread} unread elsewhere` : ''
  const idle = frame.idle ? ' · idle' : ''
  return `${frame.room.name}${muted}${day} · ${frame.total} cached${others}${idle}`
}

// ==================== Main App ====================

export interface AppProps {
  loop: UiLoop
  rows?: number
  columns?: number
}

export function App({ loop, rows: rowsOverride, columns: columnsOverride }: AppProps) {
  const { stdout } = useStdout()
  const [, refresh] = useReducer((n: number) => n + 1, 0)

  useEffect(() => loop.subscribe(refresh), [loop])

  const rows = rowsOverride ?? stdout.rows ?? DEFAULT_ROWS
  const columns = columnsOverride ?? stdout.columns ?? DEFAULT_COLUMNS
  const bodyRows = Math.max(1, rows - CHROME_ROWS)
  const frame = loop.frame(bodyRows)
  const { mode } = frame
  // The external program owns the keyboard until it exits
  const suspended = mode.name === 'compose'

  useInput(
    (input, key) => {
      loop.handleKey({ input, key })
    },
    { isActive: !suspended }
  )

  if (suspended) {
    return <Text color="gray">Waiting for external program…</Text>
  }

  let body: React.ReactNode
  switch (mode.name) {
    case 'roomSwitcher':
      body = <RoomSwitcherView filter={mode.filter} rooms={frame.switcher} selected={mode.selected} rows={bodyRows} />
      break
    case 'search':
      body = <SearchView query={mode.query} rows={frame.searchRows} selected={null} height={bodyRows} columns={columns} />
      break
    case 'searchResults':
      body = (
        <SearchView query={mode.query} rows={frame.searchRows} selected={mode.selected} height={bodyRows} columns={columns} />
      )
      break
    case 'react':
      body = <ReactView palette={mode.palette} existing={mode.existing} selected={mode.selected} />
      break
    case 'verifyPassphrase':
      body = <VerifyView passphrase={mode.passphrase} from={mode.from} />
      break
    case 'confirmDelete':
      body = <ConfirmDeleteView summary={mode.summary} />
      break
    case 'help':
      body = <HelpView event={frame.events[frame.selected - frame.window.start]} />
      break
    default:
      body = <TimelinePane events={frame.events} start={frame.window.start} selected={frame.selected} columns={columns} />
  }

  return (
    <Box flexDirection="column" height={rows}>
      <StatusBar text={statusText(frame)} columns={columns} />
      <Box flexDirection="column" flexGrow={1}>
        {body}
      </Box>
      <Text color="red">{frame.notice ?? ' '}</Text>
      <HelpBar bindings={bindingsFor(mode)} />
    </Box>
  )
}

// ==================== Render helper ====================

export function renderApp(props: AppProps) {
  return render(<App {...props} />)
}
