import {describe, it, expect, vi} from 'vitest'
import type {EffectTask, EffectTaskOutcome} from '../../src/core'
import {createSearchEngine, type SearchAction} from '../../examples/search-debounce'
import {createMockLogger, deferred} from '../utils/helpers'

function setup(search: (query: string, signal: AbortSignal) => Promise<string[]>) {
  const launched: EffectTask<SearchAction>[] = []
  const engine = createSearchEngine({search}, 500, {
    logger: createMockLogger(),
    plugins: [{name: 'task-recorder', onEffectTaskLaunch: task => launched.push(task)}],
  })

  // Tasks launched while earlier ones settle are picked up as the list grows
  async function settleAll(): Promise<EffectTaskOutcome<SearchAction>[]> {
    const outcomes: EffectTaskOutcome<SearchAction>[] = []
    for (let i = 0; i < launched.length; i++) {
      outcomes.push(await launched[i].result)
    }
    return outcomes
  }

  return {engine, launched, settleAll}
}

describe('Debounced search', () => {
  it('should search once, for the last query typed within the debounce window', async () => {
    vi.useFakeTimers()
    const search = vi.fn(async (query: string) => [`${query}: result 1`])
    const {engine, settleAll} = setup(search)

    await engine.dispatch({type: 'updateQuery', query: 'a'})
    await vi.advanceTimersByTimeAsync(100)
    await engine.dispatch({type: 'updateQuery', query: 'ab'})
    await vi.advanceTimersByTimeAsync(100)
    await engine.dispatch({type: 'updateQuery', query: 'abc'})

    expect(engine.currentState().isSearching).toBe(true)
    expect(search).not.toHaveBeenCalled()

    await vi.advanceTimersByTimeAsync(500)
    const outcomes = await settleAll()

    expect(search).toHaveBeenCalledTimes(1)
    expect(search.mock.calls[0][0]).toBe('abc')
    expect(outcomes).toEqual([
      {status: 'cancelled'},
      {status: 'cancelled'},
      {status: 'dispatched', action: {type: 'search', id: 3}},
      {
        status: 'dispatched',
        action: {type: 'searchCompleted', id: 3, results: ['abc: result 1']},
      },
    ])
    expect(engine.currentState()).toMatchObject({
      query: 'abc',
      results: ['abc: result 1'],
      isSearching: false,
      hasSearched: true,
      searchHistory: ['abc'],
      pendingSearchId: 3,
    })
    expect(engine.activeTaskCount()).toBe(0)
  })

  it('should drop a search still in flight when the user cancels', async () => {
    vi.useFakeTimers()
    const response = deferred<string[]>()
    const search = vi.fn((_query: string, _signal: AbortSignal) => response.promise)
    const {engine, launched} = setup(search)

    await engine.dispatch({type: 'updateQuery', query: 'shoes'})
    await vi.advanceTimersByTimeAsync(500)
    await launched[0].result

    expect(search).toHaveBeenCalledTimes(1)
    const [, signal] = search.mock.calls[0]
    expect(engine.activeTaskCount()).toBe(1)

    await engine.dispatch({type: 'cancelSearch'})
    response.resolve(['shoes: late result'])

    await expect(launched[1].result).resolves.toEqual({status: 'cancelled'})
    expect(signal.aborted).toBe(true)
    expect(engine.currentState()).toMatchObject({
      results: [],
      isSearching: false,
      hasSearched: false,
      pendingSearchId: null,
    })
  })

  it('should turn a client failure into an error state', async () => {
    vi.useFakeTimers()
    const search = vi.fn(async () => {
      throw new Error('Network error. Please try again.')
    })
    const {engine, settleAll} = setup(search)

    await engine.dispatch({type: 'updateQuery', query: 'boots'})
    await vi.advanceTimersByTimeAsync(500)
    await settleAll()

    expect(engine.currentState()).toMatchObject({
      searchError: 'Network error. Please try again.',
      results: [],
      isSearching: false,
      hasSearched: true,
      searchHistory: [],
    })
  })

  it('should not schedule a search for an empty query', async () => {
    vi.useFakeTimers()
    const search = vi.fn(async () => [])
    const {engine, launched} = setup(search)

    await engine.dispatch({type: 'updateQuery', query: 'x'})
    await engine.dispatch({type: 'updateQuery', query: ''})
    await vi.advanceTimersByTimeAsync(1000)

    expect(launched).toHaveLength(1)
    expect(launched[0].action).toEqual({type: 'updateQuery', query: 'x'})
    await expect(launched[0].result).resolves.toEqual({status: 'cancelled'})
    expect(search).not.toHaveBeenCalled()
    expect(engine.currentState()).toMatchObject({query: '', isSearching: false})
  })
})
