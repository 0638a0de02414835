import { describe, it, expect } from 'vitest'
import {
  adaptDiscordMessage,
  adaptDiscordEdit,
  adaptDiscordDelete,
  adaptDiscordReaction,
  messageIdOf,
  MessageEventIndex,
  DiscordAttachmentLike,
  DiscordMessageLike,
  DiscordUserLike,
} from '@/platforms/discord/adapters'
import { EventStore } from '@/core/eventStore'

const photo: DiscordAttachmentLike = {
  id: 'a1',
  name: 'photo.png',
  url: 'https://example.test/photo.png',
  contentType: 'image/png',
  size: 2048,
}

function message(overrides: Partial<DiscordMessageLike> = {}): DiscordMessageLike {
  return {
    id: '100',
    channelId: 'c1',
    content: 'hello',
    createdTimestamp: 1000,
    editedTimestamp: null,
    author: { id: 'u1', displayName: 'Alice' },
    member: null,
    reference: null,
    attachments: new Map<string, DiscordAttachmentLike>(),
    ...overrides,
  }
}

const bob: DiscordUserLike = { id: 'u2', displayName: 'Bob', partial: false }

describe('adaptDiscordMessage', () => {
  it('takes the sender id from the author and the name from the member', () => {
    const [event] = adaptDiscordMessage(message({ member: { displayName: 'Ali' } }))
    expect(event).toMatchObject({ id: '100', senderId: 'u1', sender: 'Ali' })
  })

  it('splits text and attachments into separate events', () => {
    const events = adaptDiscordMessage(message({ attachments: new Map([['a1', photo]]) }))
    expect(events.map((e) => [e.id, e.content.kind])).toEqual([
      ['100', 'text'],
      ['100:a1', 'media'],
    ])
  })
})

describe('messageIdOf', () => {
  it('strips the attachment part of an event id', () => {
    expect(messageIdOf('100:a1')).toBe('100')
    expect(messageIdOf('100')).toBe('100')
  })
})

describe('adaptDiscordEdit', () => {
  it('ignores updates that are not edits', () => {
    expect(adaptDiscordEdit(message())).toBeNull()
  })

  it('keys the edit by its edit time', () => {
    expect(adaptDiscordEdit(message({ content: 'hello!', editedTimestamp: 5000 }))).toMatchObject({
      id: '100:edit:5000',
      content: { kind: 'edit', targetId: '100', body: 'hello!' },
    })
  })
})

describe('deleting a message with attachments', () => {
  it('removes every event the message became', () => {
    const index = new MessageEventIndex()
    const store = new EventStore()
    const original = message({ attachments: new Map([['a1', photo]]) })
    const events = adaptDiscordMessage(original)
    index.record(original.id, events)
    for (const event of events) store.insert(event)
    expect(store.size).toBe(2)

    for (const redaction of adaptDiscordDelete(original, index.take(original.id))) {
      store.insert(redaction)
    }
    expect(store.size).toBe(0)
    expect(index.size).toBe(0)
  })

  it('falls back to the bare message id', () => {
    const index = new MessageEventIndex()
    expect(adaptDiscordDelete({ id: '7', channelId: 'c1' }, index.take('7')).map((e) => e.id)).toEqual(['7:redact'])
  })

  it('forgets the oldest messages past its limit', () => {
    const index = new MessageEventIndex(1)
    const first = adaptDiscordMessage(message({ id: '1', attachments: new Map([['a1', photo]]) }))
    const second = adaptDiscordMessage(message({ id: '2', attachments: new Map([['a1', photo]]) }))
    index.record('1', first)
    index.record('2', second)

    expect(index.size).toBe(1)
    expect(index.take('1')).toEqual(['1'])
    expect(index.take('2')).toEqual(['2', '2:a1'])
  })
})

describe('adaptDiscordReaction', () => {
  const reaction = { emoji: { name: '👍' }, message: { id: '100', channelId: 'c1' } }

  it('ignores reactions without a usable emoji', () => {
    expect(adaptDiscordReaction({ ...reaction, emoji: { name: null } }, bob, 'add')).toBeNull()
  })

  it('lets a removal undo a reaction seeded from history', () => {
    const store = new EventStore()
    for (const event of adaptDiscordMessage(message())) store.insert(event)

    const seeded = adaptDiscordReaction(reaction, bob, 'add')
    const removed = adaptDiscordReaction(reaction, bob, 'remove')
    if (seeded) store.insert(seeded)
    expect(store.get('100')?.reactions.map((r) => r.senders.map((s) => s.senderId))).toEqual([['u2']])

    if (removed) store.insert(removed)
    if (removed) store.insert(removed)
    expect(store.get('100')?.reactions).toEqual([])
  })
})
