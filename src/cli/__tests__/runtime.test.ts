import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { UiLoop, ExternalRunners } from '@/cli/runtime'
import { DEFAULT_CONFIG, AppConfig } from '@/cli/config'
import { press } from '@/cli/dispatcher'
import { ConfigError, ExternalProcessError } from '@/helpers/errors'
import type { ProtocolEvent } from '@/core/events'
import { FakePlatformClient, OutboundCall, textEvent, resetClock } from '../../../tests/helpers/fakePlatform'

const ENTER = press('', { return: true })
const ESC = press('', { escape: true })

interface EditorCall {
  initial: string
  signal: AbortSignal
  clearVim: boolean
  finish: (text: string | null) => void
  fail: (error: Error) => void
}

/** Calls other than typing notices and read markers */
const sentCalls = (client: FakePlatformClient): OutboundCall[] =>
  client.calls.filter((call) => call.method !== 'setTyping' && call.method !== 'markRead')

/**
 * External runners whose results the test decides
 */
function fakeExternal() {
  const edits: EditorCall[] = []
  const picks: Array<{ finish: (paths: string[]) => void }> = []
  const opened: string[] = []
  const saved: Array<{ fileName: string; text: string }> = []
  let failOpen: Error | null = null
  const runners: ExternalRunners = {
    editText: (initial, { signal, clearVim }) =>
      new Promise((resolve, reject) => {
        signal.addEventListener('abort', () => reject(new ExternalProcessError('cancelled')))
        edits.push({ initial, signal, clearVim, finish: resolve, fail: reject })
      }),
    pickFiles: () =>
      new Promise((resolve) => {
        picks.push({ finish: resolve })
      }),
    openTarget: async (target) => {
      if (failOpen) throw failOpen
      opened.push(target)
    },
    saveFile: async (fileName, data) => {
      saved.push({ fileName, text: new TextDecoder().decode(data) })
      return `/downloads/${fileName}`
    },
  }
  const failOpens = (error: Error) => {
    failOpen = error
  }
  return { runners, edits, picks, opened, saved, failOpens }
}

function setup(config: Partial<AppConfig> = {}) {
  const client = new FakePlatformClient()
  const external = fakeExternal()
  const loop = new UiLoop({ client, external: external.runners, config: { ...DEFAULT_CONFIG, ...config } })
  loop.addRoom('!room', 'room')

  const deliver = (...events: ProtocolEvent[]) => {
    for (const event of events) loop.channel.trySend({ type: 'protocol', notification: { type: 'event', event } })
    loop.cycle()
  }
  // Let queued promise chains land in the channel, then run a cycle
  const settle = async () => {
    await new Promise((resolve) => setTimeout(resolve, 0))
    loop.cycle()
  }
  const lastEdit = () => {
    const edit = external.edits[external.edits.length - 1]
    if (!edit) throw new Error('editor was not started')
    return edit
  }
  return { client, loop, deliver, settle, lastEdit, external }
}

describe('UiLoop', () => {
  beforeEach(() => resetClock())

  describe('composing', () => {
    it('sends the text written in the editor', async () => {
      const { client, loop, settle, lastEdit } = setup()
      loop.handleKey(press('i'))
      expect(lastEdit()).toMatchObject({ initial: '', clearVim: false })

      lastEdit().finish('hello there')
      await settle()

      expect(sentCalls(client)).toEqual([
        { method: 'sendMessage', options: { roomId: '!room', body: 'hello there', inReplyTo: undefined } },
      ])
      expect(loop.dispatcher.mode.name).toBe('normal')
    })

    it('passes the clear_vim setting to the editor', () => {
      const { loop, lastEdit } = setup({ clear_vim: true })
      loop.handleKey(press('i'))
      expect(lastEdit().clearVim).toBe(true)
    })

    it('sends nothing when the editor comes back empty', async () => {
      const { client, loop, settle, lastEdit } = setup()
      loop.handleKey(press('i'))
      lastEdit().finish(null)
      await settle()
      expect(sentCalls(client)).toEqual([])
    })

    it('replies to the selected message', async () => {
      const { client, loop, deliver, settle, lastEdit } = setup()
      deliver(textEvent('e1', 'question?'))
      loop.handleKey(press('R'))
      lastEdit().finish('answer')
      await settle()

      expect(sentCalls(client)).toEqual([
        { method: 'sendMessage', options: { roomId: '!room', body: 'answer', inReplyTo: 'e1' } },
      ])
    })

    it('edits an own message only when the text changed', async () => {
      const { client, loop, deliver, settle, lastEdit } = setup()
      deliver(textEvent('mine', 'draft', { sender: 'me' }))

      loop.handleKey(press('c'))
      expect(lastEdit().initial).toBe('draft')
      lastEdit().finish('draft')
      await settle()
      expect(sentCalls(client)).toEqual([])

      loop.handleKey(press('c'))
      lastEdit().finish('final')
      await settle()
      expect(sentCalls(client)).toEqual([{ method: 'editMessage', roomId: '!room', eventId: 'mine', body: 'final' }])
    })

    it('never sends from the viewer', async () => {
      const { client, loop, deliver, settle, lastEdit } = setup()
      deliver(textEvent('e1', 'long text'))
      loop.handleKey(press('v'))
      expect(lastEdit().initial).toBe('long text')
      lastEdit().finish('long text, changed')
      await settle()
      expect(sentCalls(client)).toEqual([])
    })

    it('shows the editor failure and stays usable', async () => {
      const { client, loop, settle, lastEdit } = setup()
      loop.handleKey(press('i'))
      lastEdit().fail(new ExternalProcessError('vi exited with code 1', 1))
      await settle()

      expect(loop.frame(10).notice).toBe('vi exited with code 1')
      expect(loop.dispatcher.mode.name).toBe('normal')
      expect(sentCalls(client)).toEqual([])
    })

    it('cancels the editor on Escape and ignores its late result', async () => {
      const { client, loop, settle, lastEdit } = setup()
      loop.handleKey(press('i'))
      const edit = lastEdit()
      loop.handleKey(ESC)

      expect(edit.signal.aborted).toBe(true)
      await settle()
      expect(loop.frame(10).notice).toBeNull()
      expect(sentCalls(client)).toEqual([])
    })
  })

  describe('uploads', () => {
    it('uploads every picked file', async () => {
      const { client, loop, settle, external } = setup()
      loop.handleKey(press('u'))
      external.picks[0]?.finish(['/tmp/a.png', '/tmp/b.txt'])
      await settle()

      expect(sentCalls(client)).toEqual([
        { method: 'uploadFile', roomId: '!room', path: '/tmp/a.png' },
        { method: 'uploadFile', roomId: '!room', path: '/tmp/b.txt' },
      ])
    })
  })

  describe('reactions', () => {
    it('sends the chosen reaction', () => {
      const { client, loop, deliver } = setup()
      deliver(textEvent('e1', 'nice'))
      loop.handleKey(press('r'))
      loop.handleKey(ENTER)

      expect(sentCalls(client)).toEqual([{ method: 'sendReaction', roomId: '!room', eventId: 'e1', key: '❤️' }])
    })

    it('reports a failed outbound call as a notice', async () => {
      const { client, loop, deliver, settle } = setup()
      deliver(textEvent('e1', 'nice'))
      client.failNext = new Error('boom')
      loop.handleKey(press('r'))
      loop.handleKey(ENTER)
      await settle()

      expect(loop.frame(10).notice).toBe('React ❤️ failed: boom')
    })
  })

  describe('channel messages', () => {
    it('applies a new configuration', () => {
      const { loop, deliver } = setup()
      deliver(textEvent('e1', 'a'), textEvent('e2', 'b'), textEvent('e3', 'c'))

      loop.channel.trySend({ type: 'config', config: { ...DEFAULT_CONFIG, muted: ['room'], max_events: 2 } })
      loop.cycle()

      const room = loop.registry.get('!room')
      expect(room?.muted).toBe(true)
      expect(room?.store.size).toBe(2)
      expect(loop.currentConfig.max_events).toBe(2)
    })

    it('keeps running with the old configuration after a bad reload', () => {
      const { loop } = setup()
      loop.channel.trySend({
        type: 'configError',
        error: new ConfigError('Invalid config at /tmp/c.yaml: max_events: Expected number, received string', '/tmp/c.yaml'),
      })
      loop.cycle()

      expect(loop.frame(10).notice).toBe(
        'Config not reloaded: Invalid config at /tmp/c.yaml: max_events: Expected number, received string'
      )
      expect(loop.currentConfig).toEqual(DEFAULT_CONFIG)
    })

    it('prompts for a passphrase when verification is requested', () => {
      const { client, loop } = setup()
      loop.channel.trySend({
        type: 'protocol',
        notification: { type: 'verificationRequest', requestId: 'req-1', from: 'laptop' },
      })
      loop.cycle()
      expect(loop.dispatcher.mode.name).toBe('verifyPassphrase')

      loop.handleKey(press('p'))
      loop.handleKey(press('w'))
      loop.handleKey(ENTER)
      expect(client.calls).toEqual([{ method: 'verify', passphrase: 'pw', requestId: 'req-1' }])
    })

    it('clears a notice on the next key press', () => {
      const { loop } = setup()
      loop.channel.trySend({ type: 'notice', text: 'hello' })
      loop.cycle()
      expect(loop.frame(10).notice).toBe('hello')

      loop.handleKey(press('j'))
      expect(loop.frame(10).notice).toBeNull()
    })

    it('publishes once per cycle that applied something', () => {
      const { loop, deliver } = setup()
      const listener = vi.fn()
      loop.subscribe(listener)

      deliver(textEvent('e1', 'a'), textEvent('e2', 'b'))
      expect(listener).toHaveBeenCalledTimes(1)
      expect(loop.cycle()).toBe(0)
      expect(listener).toHaveBeenCalledTimes(1)
    })
  })

  describe('muting', () => {
    it('keeps a room muted by hand when the config reloads', () => {
      const { loop } = setup()
      loop.handleKey(press('m'))
      expect(loop.registry.get('!room')?.muted).toBe(true)

      loop.channel.trySend({ type: 'config', config: { ...DEFAULT_CONFIG, reactions: ['🎉'] } })
      loop.cycle()
      expect(loop.registry.get('!room')?.muted).toBe(true)
    })
  })

  describe('messages in the timeline', () => {
    const media = { kind: 'media' as const, body: 'cat.png', url: 'https://example.test/cat.png' }

    it('opens every link of the selected message', async () => {
      const { loop, deliver, settle, external } = setup()
      deliver(textEvent('e1', 'https://example.test/a https://example.test/b'))
      loop.handleKey(ENTER)
      await settle()

      expect(external.opened).toEqual(['https://example.test/a', 'https://example.test/b'])
      expect(loop.frame(10).notice).toBeNull()
    })

    it('reports an opener that fails', async () => {
      const { loop, deliver, settle, external } = setup()
      deliver(textEvent('e1', 'https://example.test/a'))
      external.failOpens(new ExternalProcessError('xdg-open exited with 4', 4))
      loop.handleKey(ENTER)
      await settle()

      expect(loop.frame(10).notice).toBe('Open https://example.test/a failed: xdg-open exited with 4')
    })

    it('downloads and saves media', async () => {
      const { client, loop, deliver, settle, external } = setup()
      deliver(textEvent('pic', '', { content: media }))
      loop.handleKey(press('s'))
      await settle()

      expect(client.calls).toEqual([{ method: 'downloadMedia', url: 'https://example.test/cat.png' }])
      expect(external.saved).toEqual([{ fileName: 'cat.png', text: 'bytes' }])
      expect(loop.frame(10).notice).toBe('Saved to /downloads/cat.png')
    })

    it('reports a failed download without saving', async () => {
      const { client, loop, deliver, settle, external } = setup()
      deliver(textEvent('pic', '', { content: media }))
      client.failNext = new Error('Download failed with HTTP 404')
      loop.handleKey(press('s'))
      await settle()

      expect(external.saved).toEqual([])
      expect(loop.frame(10).notice).toBe('Save cat.png failed: Download failed with HTTP 404')
    })

    it('deletes an own message once confirmed', () => {
      const { client, loop, deliver } = setup()
      deliver(textEvent('mine', 'oops', { sender: 'me' }))
      loop.handleKey(press('d'))
      expect(client.calls).toEqual([])

      loop.handleKey(press('y'))
      expect(client.calls).toEqual([{ method: 'redactMessage', roomId: '!room', eventId: 'mine' }])
    })

    it('marks the newest message read when switching rooms', () => {
      const { client, loop, deliver } = setup()
      loop.addRoom('!b', 'books')
      deliver(textEvent('b1', 'one', { roomId: '!b' }), textEvent('b2', 'two', { roomId: '!b' }))
      loop.handleKey(press(' '))
      loop.handleKey(press('b'))
      loop.handleKey(ENTER)

      expect(client.calls).toEqual([{ method: 'markRead', roomId: '!b', eventId: 'b2' }])
    })
  })

  describe('typing notices', () => {
    afterEach(() => {
      vi.useRealTimers()
    })

    it('repeats while the editor is open and stops when it closes', () => {
      vi.useFakeTimers()
      const { client, loop } = setup()
      loop.handleKey(press('i'))
      expect(client.calls).toEqual([{ method: 'setTyping', roomId: '!room', typing: true }])

      vi.advanceTimersByTime(8000)
      expect(client.calls).toHaveLength(2)

      loop.handleKey(ESC)
      vi.advanceTimersByTime(16_000)
      expect(client.calls).toEqual([
        { method: 'setTyping', roomId: '!room', typing: true },
        { method: 'setTyping', roomId: '!room', typing: true },
        { method: 'setTyping', roomId: '!room', typing: false },
      ])
      loop.stop()
    })

    it('stays quiet in the viewer', () => {
      vi.useFakeTimers()
      const { client, loop, deliver } = setup()
      deliver(textEvent('e1', 'long text'))
      loop.handleKey(press('v'))
      vi.advanceTimersByTime(8000)
      expect(client.calls).toEqual([])
      loop.stop()
    })
  })

  describe('history', () => {
    it('loads history without unread counts, then follows the live stream', async () => {
      const { client, loop } = setup()
      loop.addRoom('!other', 'other')
      const history = Array.from({ length: 50 }, (_, i) => textEvent(`h${i}`, 'old', { roomId: '!other' }))
      client.history.set('!other', history)
      client.push({ type: 'event', event: textEvent('live', 'new', { roomId: '!other' }) })
      await client.disconnect()

      await loop.startSync(['!other'], 50)
      while (loop.cycle() > 0) {
        // drain
      }

      const room = loop.registry.get('!other')
      expect(room?.store.size).toBe(51)
      expect(room?.store.at(50)?.id).toBe('live')
      expect(room?.unread).toBe(1)
    })

    it('skips rooms whose history cannot be read', async () => {
      const { client, loop } = setup()
      client.history.set('!room', [textEvent('h1', 'old')])
      vi.spyOn(client, 'backfill').mockRejectedValueOnce(new Error('Missing Access'))

      await loop.backfill(['!gone', '!room'], 50)
      loop.cycle()
      expect(loop.registry.get('!room')?.store.size).toBe(1)
    })
  })

  describe('idle presence', () => {
    afterEach(() => {
      vi.useRealTimers()
    })

    it('goes idle after the blur delay and back on the next key', () => {
      vi.useFakeTimers()
      const { client, loop } = setup({ blur_delay: 2 })
      loop.handleKey(press('j'))

      vi.advanceTimersByTime(1999)
      loop.cycle()
      expect(loop.frame(10).idle).toBe(false)

      vi.advanceTimersByTime(1)
      loop.cycle()
      expect(loop.frame(10).idle).toBe(true)
      expect(client.calls).toEqual([{ method: 'setIdle', idle: true }])

      loop.handleKey(press('j'))
      expect(loop.frame(10).idle).toBe(false)
      expect(client.calls).toEqual([
        { method: 'setIdle', idle: true },
        { method: 'setIdle', idle: false },
      ])
      loop.stop()
    })
  })

  describe('lifecycle', () => {
    it('pumps notifications from the client into rooms', async () => {
      const { client, loop } = setup()
      client.push({ type: 'event', event: textEvent('e1', 'hi') })
      client.push({ type: 'membership', roomId: '!new', userId: 'u-me', membership: 'join', roomName: 'new' })
      await client.disconnect()

      await loop.pumpNotifications()
      loop.cycle()

      expect(loop.registry.get('!room')?.store.size).toBe(1)
      expect(loop.registry.get('!new')?.name).toBe('new')
    })

    it('runs until stopped', async () => {
      const { loop } = setup()
      const running = loop.run()
      loop.channel.trySend({ type: 'notice', text: 'queued' })
      await new Promise((resolve) => setTimeout(resolve, 0))
      expect(loop.frame(10).notice).toBe('queued')

      loop.stop()
      await running
      expect(loop.channel.isClosed).toBe(true)
    })
  })

  describe('frames', () => {
    it('shows the window around the selection', () => {
      const { loop, deliver } = setup()
      deliver(textEvent('e1', 'a'), textEvent('e2', 'b'), textEvent('e3', 'c'))

      const frame = loop.frame(2)
      expect(frame.events.map((e) => e.id)).toEqual(['e2', 'e3'])
      expect(frame.window).toEqual({ start: 1, end: 3 })
      expect(frame.selected).toBe(2)
      expect(frame.total).toBe(3)
      expect(frame.room).toEqual({ id: '!room', name: 'room', unread: 0, muted: false, focused: true })
      expect(frame.self).toBe('me')
    })

    it('lists search matches with their events', () => {
      const { loop, deliver } = setup()
      deliver(textEvent('e1', 'apple pie'), textEvent('e2', 'banana'))
      loop.handleKey(press('/'))
      for (const ch of 'apple') loop.handleKey(press(ch))

      const rows = loop.frame(10).searchRows
      expect(rows).toHaveLength(1)
      expect(rows[0]?.event?.id).toBe('e1')
      expect(rows[0]?.match.span).toEqual({ start: 0, end: 5 })
    })

    it('filters rooms in the switcher', () => {
      const { loop } = setup()
      loop.addRoom('!b', 'books')
      loop.handleKey(press(' '))
      loop.handleKey(press('b'))
      expect(loop.frame(10).switcher.map((r) => r.name)).toEqual(['books'])
    })
  })
})
