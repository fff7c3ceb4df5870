import {describe, it, expect, vi} from 'vitest'
import {StateFeed} from '../../src/core/broadcast/stateFeed'

function createFeed<S>(initial: S, highWaterMark = 10) {
  const onHighWaterMark = vi.fn()
  const onClose = vi.fn()
  const feed = new StateFeed<S>(7, initial, {highWaterMark, onHighWaterMark, onClose})
  return {feed, onHighWaterMark, onClose}
}

describe('StateFeed', () => {
  it('should yield the seed value first', async () => {
    const {feed} = createFeed('seed')

    await expect(feed.next()).resolves.toEqual({value: 'seed', done: false})
  })

  it('should deliver an undefined state as a value rather than an empty buffer', async () => {
    const {feed} = createFeed<string | undefined>(undefined)
    feed.push('later')

    await expect(feed.next()).resolves.toEqual({value: undefined, done: false})
    await expect(feed.next()).resolves.toEqual({value: 'later', done: false})
  })

  it('should drain buffered values before reporting done after complete', async () => {
    const {feed, onClose} = createFeed(0)
    feed.push(1)
    feed.complete()
    feed.push(2)

    expect(feed.isClosed).toBe(false)
    const values: number[] = []
    for await (const value of feed) values.push(value)

    expect(values).toEqual([0, 1])
    expect(onClose).toHaveBeenCalledTimes(1)
    expect(onClose).toHaveBeenCalledWith(7)
  })

  it('should discard the backlog on unsubscribe', async () => {
    const {feed, onClose} = createFeed(0)
    feed.push(1)

    feed.unsubscribe()
    feed.unsubscribe()

    expect(feed.backlog).toBe(0)
    expect(onClose).toHaveBeenCalledTimes(1)
    await expect(feed.next()).resolves.toEqual({value: undefined, done: true})
  })

  it('should signal the high-water mark once per crossing', async () => {
    const {feed, onHighWaterMark} = createFeed(0, 2)

    feed.push(1)
    feed.push(2)
    expect(onHighWaterMark).toHaveBeenCalledTimes(1)
    expect(onHighWaterMark).toHaveBeenCalledWith(7, 2)

    await feed.next()
    await feed.next()
    feed.push(3)

    expect(onHighWaterMark).toHaveBeenCalledTimes(2)
    expect(onHighWaterMark).toHaveBeenLastCalledWith(7, 2)
  })
})
