import {vi} from 'vitest'
import type {EngineLogger} from '../../src/core'

export interface Deferred<T> {
  promise: Promise<T>
  resolve: (value: T) => void
}

/**
 * Promise whose settlement the test controls
 */
export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(res => {
    resolve = res
  })
  return {promise, resolve}
}

/**
 * Lets every pending microtask and zero-delay timer run
 */
export function flush(): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, 0))
}

/**
 * Collects the first `count` values of a feed, then stops consuming it
 */
export async function take<T>(feed: AsyncIterable<T>, count: number): Promise<T[]> {
  const values: T[] = []
  if (count <= 0) return values
  for await (const value of feed) {
    values.push(value)
    if (values.length >= count) break
  }
  return values
}

/**
 * Drains a feed until it completes
 */
export async function drain<T>(feed: AsyncIterable<T>): Promise<T[]> {
  const values: T[] = []
  for await (const value of feed) {
    values.push(value)
  }
  return values
}

export function createMockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies EngineLogger
}
