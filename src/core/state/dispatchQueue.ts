/**
 * Promise-chain FIFO queue that runs one dispatch cycle at a time.
 *
 * A job starts only after every previously enqueued job has settled, whether it resolved
 * or rejected. A rejected job rejects its own caller and does not poison the queue.
 */
export class DispatchQueue {
  private tail: Promise<void> = Promise.resolve()
  private pending = 0
  private idleWaiters: Array<() => void> = []

  async run<T>(job: () => Promise<T>): Promise<T> {
    let release: () => void = () => {}
    const gate = new Promise<void>(resolve => {
      release = resolve
    })

    const prev = this.tail
    this.tail = gate
    this.pending++

    await prev
    try {
      return await job()
    } finally {
      this.pending--
      release()
      if (this.pending === 0) this.flushIdleWaiters()
    }
  }

  /** Number of jobs queued or running */
  size(): number {
    return this.pending
  }

  whenIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve()
    return new Promise(resolve => {
      this.idleWaiters.push(resolve)
    })
  }

  private flushIdleWaiters(): void {
    const waiters = this.idleWaiters
    this.idleWaiters = []
    waiters.forEach(resolve => resolve())
  }
}
