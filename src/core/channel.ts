/**
 * Bounded single-consumer queue
 * Background producers await send() when the queue is full; the UI task
 * drains everything queued once per cycle. Nothing is ever dropped.
 */

export class ChannelClosedError extends Error {
  name = 'ChannelClosedError'

  constructor() {
    super('Channel closed')
  }
}

export class Channel<T> implements AsyncIterable<T> {
  private queue: T[] = []
  private closed = false
  private readers: Array<() => void> = []
  private writers: Array<{ item: T; resolve: () => void; reject: (error: Error) => void }> = []

  constructor(readonly capacity: number = Infinity) {
    if (!(capacity > 0)) throw new RangeError('Channel capacity must be positive')
  }

  get length(): number {
    return this.queue.length
  }

  /** Producers currently waiting for room */
  get waiting(): number {
    return this.writers.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Queue an item, waiting for room when the channel is full
   */
  send(item: T): Promise<void> {
    if (this.closed) return Promise.reject(new ChannelClosedError())
    if (this.queue.length < this.capacity) {
      this.queue.push(item)
      this.wakeReaders()
      return Promise.resolve()
    }
    return new Promise((resolve, reject) => {
      this.writers.push({ item, resolve, reject })
    })
  }

  /**
   * Queue an item only if there is room
   */
  trySend(item: T): boolean {
    if (this.closed || this.queue.length >= this.capacity) return false
    this.queue.push(item)
    this.wakeReaders()
    return true
  }

  /**
   * Take up to `max` queued items in arrival order
   */
  drain(max = Infinity): T[] {
    const count = Math.min(max, this.queue.length)
    const items = this.queue.splice(0, count)
    this.admitWriters()
    return items
  }

  /**
   * Resolves once something is queued or the channel closes
   */
  readable(): Promise<void> {
    if (this.queue.length > 0 || this.closed) return Promise.resolve()
    return new Promise((resolve) => this.readers.push(resolve))
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const writer of this.writers.splice(0)) {
      writer.reject(new ChannelClosedError())
    }
    this.wakeReaders()
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      await this.readable()
      if (this.queue.length === 0 && this.closed) return
      for (const item of this.drain()) {
        yield item
      }
    }
  }

  private wakeReaders(): void {
    for (const resolve of this.readers.splice(0)) {
      resolve()
    }
  }

  private admitWriters(): void {
    while (this.writers.length > 0 && this.queue.length < this.capacity) {
      const writer = this.writers.shift()
      if (!writer) break
      this.queue.push(writer.item)
      writer.resolve()
    }
    if (this.queue.length > 0) this.wakeReaders()
  }
}
