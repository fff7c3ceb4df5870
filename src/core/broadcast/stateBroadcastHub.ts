import {SubscriberError} from '../../shared/errors'
import type {EngineLogger, StateListener} from '../state/types'
import {StateFeed} from './stateFeed'

export interface StateBroadcastHubOptions {
  highWaterMark: number
  logger: EngineLogger
  handleError: (error: SubscriberError) => void
}

/**
 * Multicast delivery of committed states.
 *
 * Every feed is seeded with the state current at attach time and then receives each
 * published state in order. Feeds and watchers are keyed by a numeric token; the hub keeps
 * no other reference to the observer.
 */
export class StateBroadcastHub<S> {
  private feeds = new Map<number, StateFeed<S>>()
  private watchers = new Map<number, StateListener<S>>()
  private nextToken = 1
  private closed = false

  constructor(
    private getCurrent: () => S,
    private options: StateBroadcastHubOptions
  ) {}

  subscribe(): StateFeed<S> {
    const id = this.nextToken++
    const feed = new StateFeed<S>(id, this.getCurrent(), {
      highWaterMark: this.options.highWaterMark,
      onHighWaterMark: (feedId, backlog) => {
        this.options.logger.warn(
          `Subscriber ${feedId} has ${backlog} undelivered states; it is consuming slower than the engine publishes`
        )
      },
      onClose: feedId => {
        this.feeds.delete(feedId)
      },
    })

    if (this.closed) {
      this.options.logger.warn('Cannot create subscription on destroyed engine')
      feed.unsubscribe()
      return feed
    }

    this.feeds.set(id, feed)
    return feed
  }

  watch(listener: StateListener<S>): () => void {
    if (this.closed) {
      this.options.logger.warn('Cannot watch a destroyed engine')
      return () => {}
    }

    const token = this.nextToken++
    this.watchers.set(token, listener)
    this.invoke(token, listener, this.getCurrent(), undefined)
    return () => {
      this.watchers.delete(token)
    }
  }

  publish(state: S, prevState: S): void {
    if (this.closed) return

    // Snapshot so a feed or watcher removed mid-publish does not disturb iteration
    for (const feed of [...this.feeds.values()]) {
      feed.push(state)
    }
    for (const [token, listener] of [...this.watchers]) {
      this.invoke(token, listener, state, prevState)
    }
  }

  count(): number {
    return this.feeds.size + this.watchers.size
  }

  /** Completes every feed and drops every watcher */
  close(): void {
    if (this.closed) return
    this.closed = true
    for (const feed of [...this.feeds.values()]) {
      feed.complete()
    }
    this.watchers.clear()
  }

  private invoke(token: number, listener: StateListener<S>, state: S, prevState: S | undefined) {
    try {
      listener(state, prevState)
    } catch (error) {
      this.options.handleError(
        new SubscriberError('Listener invocation failed', {
          operation: 'notifyListeners',
          error,
          additionalInfo: {subscriber: token},
        })
      )
    }
  }
}
