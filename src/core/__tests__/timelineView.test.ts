import { describe, it, expect, beforeEach } from 'vitest'
import { EventStore } from '@/core/eventStore'
import { TimelineView } from '@/core/timelineView'
import { textEvent, resetClock } from '../../../tests/helpers/fakePlatform'

function fill(store: EventStore, from: number, to: number): void {
  for (let i = from; i <= to; i++) store.insert(textEvent(`e${i}`, `message ${i}`))
}

describe('TimelineView', () => {
  beforeEach(() => resetClock())

  it('stays at zero while the room is empty', () => {
    const view = new TimelineView(new EventStore())
    view.moveBy(5)
    view.pageDown()
    expect(view.selected).toBe(0)
    expect(view.window(10)).toEqual({ start: 0, end: 0 })
  })

  it('follows the latest event until the user scrolls away', () => {
    const store = new EventStore()
    const view = new TimelineView(store)
    fill(store, 1, 5)
    view.sync()
    expect(view.selected).toBe(4)

    view.moveBy(-2)
    expect(view.isFollowing).toBe(false)
    fill(store, 6, 6)
    view.sync()
    expect(view.selectedEvent()?.id).toBe('e3')

    view.jumpToLatest()
    fill(store, 7, 7)
    view.sync()
    expect(view.selected).toBe(6)
  })

  it('clamps paging to the ends of the sequence', () => {
    const store = new EventStore()
    const view = new TimelineView(store, 10)
    fill(store, 1, 5)
    view.sync()

    view.pageUp()
    expect(view.selected).toBe(0)
    view.pageDown()
    expect(view.selected).toBe(4)
    view.select(99)
    expect(view.selected).toBe(4)
    view.select(-3)
    expect(view.selected).toBe(0)
  })

  it('keeps the selected event when older ones are evicted', () => {
    const store = new EventStore({ capacity: 5 })
    const view = new TimelineView(store)
    fill(store, 1, 5)
    view.select(2)
    fill(store, 6, 7)
    view.sync()

    expect(view.selectedEvent()?.id).toBe('e3')
    expect(view.selected).toBe(0)
  })

  it('clamps when the selected event itself is evicted', () => {
    const store = new EventStore({ capacity: 3 })
    const view = new TimelineView(store)
    fill(store, 1, 3)
    view.select(0)
    fill(store, 4, 4)
    view.sync()

    expect(view.selected).toBe(0)
    expect(view.selectedEvent()?.id).toBe('e2')
  })

  it('resets to zero when the sequence becomes empty', () => {
    const store = new EventStore()
    const view = new TimelineView(store)
    fill(store, 1, 4)
    view.select(2)
    store.setCapacity(0)
    view.sync()

    expect(store.size).toBe(0)
    expect(view.selected).toBe(0)
    expect(view.selectedEvent()).toBeUndefined()
  })

  it('scrolls the window to keep the selection visible', () => {
    const store = new EventStore()
    const view = new TimelineView(store)
    fill(store, 1, 20)
    view.sync()

    expect(view.window(5)).toEqual({ start: 15, end: 20 })
    view.jumpToOldest()
    expect(view.window(5)).toEqual({ start: 0, end: 5 })
    view.select(7)
    expect(view.window(5)).toEqual({ start: 3, end: 8 })
  })

  it('keeps the index in range through a long sequence of mixed operations', () => {
    const store = new EventStore({ capacity: 7 })
    const view = new TimelineView(store, 3)
    let seed = 42
    const next = () => (seed = (seed * 1103515245 + 12345) % 2147483648)

    for (let step = 0; step < 500; step++) {
      switch (next() % 6) {
        case 0:
          store.insert(textEvent(`s${step}`, 'x'))
          view.sync()
          break
        case 1:
          view.moveBy((next() % 9) - 4)
          break
        case 2:
          view.pageUp()
          break
        case 3:
          view.pageDown()
          break
        case 4:
          store.setCapacity(next() % 8)
          view.sync()
          break
        default:
          view.jumpToLatest()
      }
      const size = store.size
      if (size === 0) {
        expect(view.selected).toBe(0)
      } else {
        expect(view.selected).toBeGreaterThanOrEqual(0)
        expect(view.selected).toBeLessThan(size)
      }
    }
  })
})
