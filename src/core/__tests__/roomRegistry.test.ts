import { describe, it, expect } from 'vitest'
import { RoomRegistry } from '@/core/roomRegistry'
import { textEvent } from '../../../tests/helpers/fakePlatform'

const names = (registry: RoomRegistry) => registry.ordered().map((r) => r.name)

describe('RoomRegistry', () => {
  it('creates a room once and updates its name later', () => {
    const registry = new RoomRegistry()
    const first = registry.ensure('!a')
    const again = registry.ensure('!a', 'General')

    expect(again).toBe(first)
    expect(first.name).toBe('General')
    expect(registry.size).toBe(1)
  })

  it('focuses the first room it sees', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    expect(registry.focused()?.id).toBe('!a')
  })

  it('orders rooms by most recent activity', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    registry.touch('!a', 100)
    registry.touch('!b', 200)
    expect(names(registry)).toEqual(['beta', 'alpha'])

    registry.touch('!a', 300)
    expect(names(registry)).toEqual(['alpha', 'beta'])
  })

  it('does not reorder muted rooms but keeps them listed', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    registry.touch('!a', 300)
    registry.touch('!b', 200)
    registry.setMuted('!b', true)

    registry.touch('!b', 500)
    expect(names(registry)).toEqual(['alpha', 'beta'])
    expect(registry.get('!b')?.lastActivity).toBe(500)

    registry.setMuted('!b', false)
    expect(names(registry)).toEqual(['beta', 'alpha'])
  })

  it('counts unread messages only for unfocused, unmuted rooms', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    registry.ensure('!c', 'gamma')
    registry.setMuted('!c', true)

    registry.markUnread('!a')
    registry.markUnread('!b')
    registry.markUnread('!b')
    registry.markUnread('!c')

    expect(registry.get('!a')?.unread).toBe(0)
    expect(registry.get('!b')?.unread).toBe(2)
    expect(registry.get('!c')?.unread).toBe(0)

    registry.focus('!b')
    expect(registry.get('!b')?.unread).toBe(0)
  })

  it('filters by name ignoring case', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'General')
    registry.ensure('!b', 'Random')
    registry.ensure('!c', 'general-dev')
    expect(registry.filter('GEN').map((r) => r.id).sort()).toEqual(['!a', '!c'])
    expect(registry.filter('')).toHaveLength(3)
  })

  it('moves focus when the focused room is left', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')

    expect(registry.remove('!a')).toBe(true)
    expect(registry.has('!a')).toBe(false)
    expect(registry.focused()?.id).toBe('!b')
    expect(registry.remove('!a')).toBe(false)
  })

  it('applies the configured mute list by id or name', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    registry.applyMutedSet(['!a', 'beta'])
    expect(registry.get('!a')?.muted).toBe(true)
    expect(registry.get('!b')?.muted).toBe(true)

    const late = registry.ensure('!c', 'beta')
    expect(late.muted).toBe(true)

    registry.applyMutedSet([])
    expect(registry.get('!a')?.muted).toBe(false)
  })

  it('keeps mutes toggled by hand across an unrelated reload of the list', () => {
    const registry = new RoomRegistry()
    registry.ensure('!a', 'alpha')
    registry.ensure('!b', 'beta')
    registry.applyMutedSet(['beta'])

    registry.toggleMuted('!a')
    registry.toggleMuted('!b')
    registry.applyMutedSet(['beta'])
    expect(registry.get('!a')?.muted).toBe(true)
    expect(registry.get('!b')?.muted).toBe(false)

    registry.applyMutedSet([])
    expect(registry.get('!a')?.muted).toBe(true)
    expect(registry.get('!b')?.muted).toBe(false)
  })

  it('propagates a new capacity to every store', () => {
    const registry = new RoomRegistry({ store: { capacity: -1 } })
    const room = registry.ensure('!room')
    for (let i = 0; i < 5; i++) room.store.insert(textEvent(`e${i}`, 'x'))

    registry.setCapacity(2)
    expect(room.store.size).toBe(2)
    expect(room.view.selected).toBe(1)
    expect(registry.ensure('!other').store.maxEvents).toBe(2)
  })
})
