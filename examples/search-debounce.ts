/**
 * Example: Debounced Search
 *
 * Typing updates the query at once; the search itself waits for a quiet period. Every new
 * query cancels the pending debounce and any search still in flight, so only the latest
 * query ever reaches the search client.
 *
 * Note: The import below uses a relative path for development purposes.
 * In a real application, you would import from the published package:
 *
 * import {createEngine} from "effect-store";
 */

import {createEngine, type Effect, type EngineOptions, type Reducer} from '../src'

export interface SearchState {
  query: string
  results: string[]
  isSearching: boolean
  hasSearched: boolean
  searchError: string | null
  searchHistory: string[]
  pendingSearchId: number | null
  nextSearchId: number
}

export type SearchAction =
  | {type: 'updateQuery'; query: string}
  | {type: 'search'; id: number}
  | {type: 'searchCompleted'; id: number; results: string[]}
  | {type: 'searchFailed'; id: number; error: string}
  | {type: 'clearHistory'}
  | {type: 'cancelSearch'}

export interface SearchClient {
  search: (query: string, signal: AbortSignal) => Promise<string[]>
}

const HISTORY_LIMIT = 10

export const initialSearchState: SearchState = {
  query: '',
  results: [],
  isSearching: false,
  hasSearched: false,
  searchError: null,
  searchHistory: [],
  pendingSearchId: null,
  nextSearchId: 1,
}

export const searchReducer: Reducer<SearchState, SearchAction> = (draft, action) => {
  switch (action.type) {
    case 'updateQuery':
      draft.query = action.query
      draft.searchError = null
      if (action.query === '') {
        draft.results = []
        draft.hasSearched = false
        draft.isSearching = false
        draft.pendingSearchId = null
      } else {
        draft.pendingSearchId = draft.nextSearchId
        draft.nextSearchId += 1
        draft.isSearching = true
      }
      break

    case 'searchCompleted':
      // A late answer to a superseded query is ignored
      if (draft.pendingSearchId !== action.id) break
      draft.results = action.results
      draft.isSearching = false
      draft.hasSearched = true
      if (!draft.searchHistory.includes(draft.query)) {
        draft.searchHistory.unshift(draft.query)
        draft.searchHistory.splice(HISTORY_LIMIT)
      }
      break

    case 'searchFailed':
      if (draft.pendingSearchId !== action.id) break
      draft.searchError = action.error
      draft.results = []
      draft.isSearching = false
      draft.hasSearched = true
      break

    case 'clearHistory':
      draft.searchHistory = []
      break

    case 'cancelSearch':
      draft.isSearching = false
      draft.pendingSearchId = null
      break

    case 'search':
      break
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms)
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer)
        reject(signal.reason)
      },
      {once: true}
    )
  })
}

/**
 * Builds a search engine around `client`.
 */
export function createSearchEngine(
  client: SearchClient,
  debounceMs = 500,
  options: EngineOptions<SearchState, SearchAction> = {}
) {
  const debounce: Effect<SearchState, SearchAction> = async (_action, state, {signal}) => {
    await sleep(debounceMs, signal)
    if (state.pendingSearchId === null) return
    return {type: 'search', id: state.pendingSearchId}
  }

  const runSearch: Effect<SearchState, SearchAction> = async (action, state, {signal}) => {
    if (action.type !== 'search') return
    try {
      const results = await client.search(state.query, signal)
      return {type: 'searchCompleted', id: action.id, results}
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      return {type: 'searchFailed', id: action.id, error: message}
    }
  }

  const scheduleSearch: Effect<SearchState, SearchAction> = (action, state) => {
    if (action.type === 'updateQuery' && state.pendingSearchId !== null) {
      engine.launchEffect(debounce, action)
    } else if (action.type === 'search') {
      engine.launchEffect(runSearch, action)
    }
  }

  const engine = createEngine(initialSearchState, searchReducer, [scheduleSearch], {
    name: 'search',
    ...options,
  })

  // A new query or an explicit cancel supersedes whatever is still pending
  engine.setPreDispatchHook(action => {
    if (action.type === 'updateQuery' || action.type === 'cancelSearch') {
      engine.cancelAllEffectTasks()
    }
  })

  return engine
}
