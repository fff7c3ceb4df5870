/**
 * Options for a single subscriber feed
 */
export interface StateFeedOptions {
  /** Backlog size at which `onHighWaterMark` fires */
  highWaterMark: number
  /** Called once each time the backlog climbs to the high-water mark */
  onHighWaterMark: (feedId: number, backlog: number) => void
  /** Called exactly once when the feed stops, whichever side stopped it */
  onClose: (feedId: number) => void
}

/**
 * One subscriber's ordered view of the state stream.
 *
 * @remarks
 * Values pushed by the hub land in a private unbounded buffer, so a slow consumer never
 * holds up the publisher or other feeds. Breaking out of a `for await` loop calls
 * {@link StateFeed.return}, which deregisters the feed.
 *
 * @example
 * ```typescript
 * const feed = engine.subscribe()
 * for await (const state of feed) {
 *   render(state)
 *   if (state.done) break
 * }
 * ```
 */
export class StateFeed<S> implements AsyncIterableIterator<S> {
  readonly id: number
  // Boxed so that an `undefined` state is not mistaken for an empty buffer
  private buffer: Array<{value: S}> = []
  private waiters: Array<(result: IteratorResult<S, undefined>) => void> = []
  private closed = false
  private completing = false
  private aboveWatermark = false

  constructor(
    id: number,
    initial: S,
    private options: StateFeedOptions
  ) {
    this.id = id
    this.buffer.push({value: initial})
  }

  /** True once the feed will yield no more values */
  get isClosed(): boolean {
    return this.closed
  }

  /** Number of values delivered to the feed but not yet consumed */
  get backlog(): number {
    return this.buffer.length
  }

  /** @internal Called by the hub on every publish */
  push(value: S): void {
    if (this.closed || this.completing) return

    const waiter = this.waiters.shift()
    if (waiter) {
      waiter({value, done: false})
      return
    }

    this.buffer.push({value})
    if (this.buffer.length >= this.options.highWaterMark) {
      if (!this.aboveWatermark) {
        this.aboveWatermark = true
        this.options.onHighWaterMark(this.id, this.buffer.length)
      }
    } else {
      this.aboveWatermark = false
    }
  }

  /**
   * @internal Ends the feed from the publisher side. Values already buffered are still
   * delivered before `done`.
   */
  complete(): void {
    if (this.closed || this.completing) return
    this.completing = true
    if (this.buffer.length === 0) this.close()
  }

  next(): Promise<IteratorResult<S, undefined>> {
    const entry = this.buffer.shift()
    if (entry) {
      if (this.buffer.length < this.options.highWaterMark) this.aboveWatermark = false
      if (this.completing && this.buffer.length === 0) this.close()
      return Promise.resolve({value: entry.value, done: false})
    }
    if (this.closed) return Promise.resolve({value: undefined, done: true})

    return new Promise(resolve => {
      this.waiters.push(resolve)
    })
  }

  /** Stops consuming and releases the feed */
  unsubscribe(): void {
    this.buffer = []
    this.close()
  }

  return(): Promise<IteratorResult<S, undefined>> {
    this.unsubscribe()
    return Promise.resolve({value: undefined, done: true})
  }

  [Symbol.asyncIterator](): StateFeed<S> {
    return this
  }

  private close(): void {
    if (this.closed) return
    this.closed = true
    const waiters = this.waiters
    this.waiters = []
    waiters.forEach(resolve => resolve({value: undefined, done: true}))
    this.options.onClose(this.id)
  }
}
