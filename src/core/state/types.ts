import type {Draft} from 'immer'
import type {ErrorContext, EngineError} from '../../shared/errors'
import type {StateFeed} from '../broadcast/stateFeed'
import type {EffectTask, EffectTaskOutcome} from '../effects/types'

/**
 * Computes the next state from the current one and an action.
 *
 * @remarks
 * The reducer receives an Immer draft. Mutate it in place, or return a replacement value.
 * Plain objects, arrays, `Map` and `Set` are drafted. Primitives, class instances and `Date`
 * are handed over as they are: return a new value for those instead of mutating, or the
 * previous state changes with it. Throwing from a reducer is treated as a programmer error
 * and tears the engine down.
 *
 * @example
 * ```typescript
 * const reducer: Reducer<{count: number}, 'inc' | 'dec'> = (draft, action) => {
 *   if (action === 'inc') draft.count += 1
 *   if (action === 'dec') draft.count -= 1
 * }
 * ```
 */
export type Reducer<S, A> = (draft: Draft<S>, action: A) => Draft<S> | void

export interface EffectContext {
  /**
   * Aborted when the work is no longer wanted: on engine teardown for pipeline effects,
   * on cancellation for launched effect tasks.
   */
  signal: AbortSignal
}

/**
 * Asynchronous reaction to a committed transition.
 *
 * @remarks
 * Effects run after every transition, in registration order. An effect decides relevance
 * itself and returns `undefined` when it has nothing to add. Failures of the effect's own
 * work should be turned into an action (or nothing) by the effect; the engine only awaits it.
 */
export type Effect<S, A> = (
  action: A,
  state: S,
  context: EffectContext
) => Promise<A | void> | A | void

/**
 * Runs before the reducer for every action, redispatched ones included.
 * Typically cancels in-flight effect tasks that a new action supersedes.
 */
export type PreDispatchHook<S, A> = (action: A, state: S) => void | Promise<void>

/**
 * Callback-style subscriber. Receives the current state on attach (with `prevState`
 * undefined) and every committed state afterwards.
 */
export type StateListener<S> = (state: S, prevState: S | undefined) => void

/**
 * Minimal logger surface. A consola instance satisfies it, and so does `console`.
 */
export interface EngineLogger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

export interface Plugin<S, A> {
  name: string
  /**
   * Called once the engine is constructed.
   * @throws Error to fail engine creation.
   */
  onEngineCreate?: (engine: Engine<S, A>) => void
  /**
   * Called before the pre-dispatch hook and the reducer run for an action.
   */
  beforeDispatch?: (action: A, state: S, engine: Engine<S, A>) => void
  /**
   * Invoked after a transition is committed and published.
   */
  onStateChange?: (state: S, prevState: S, action: A, engine: Engine<S, A>) => void
  onEffectTaskLaunch?: (task: EffectTask<A>, engine: Engine<S, A>) => void
  onEffectTaskSettled?: (
    task: EffectTask<A>,
    outcome: EffectTaskOutcome<A>,
    engine: Engine<S, A>
  ) => void
  /**
   * Called when the engine reports an error.
   * @remarks Failures inside this hook are logged, never reported again.
   */
  onError?: (error: EngineError, context: ErrorContext, engine: Engine<S, A>) => void
  onDestroy?: (engine: Engine<S, A>) => void
}

export interface EngineOptions<S, A> {
  /** Used in log tags and error messages */
  name?: string
  plugins?: Plugin<S, A>[]
  /** Receives every reported error after plugins have seen it. Defaults to logging it. */
  onError?: (error: EngineError) => void
  /** Defaults to a consola instance tagged with the engine name */
  logger?: EngineLogger
  /** Deep-freeze committed states. Defaults to true. */
  freezeState?: boolean
  /** Nested redispatch limit for a single dispatch. Defaults to 1000. */
  maxRedispatchDepth?: number
  /** Backlog size at which a subscriber feed logs a warning. Defaults to 1024. */
  subscriberHighWaterMark?: number
}

export interface Engine<S, A> {
  /**
   * Applies the reducer, publishes the new state, then runs every effect in order,
   * fully resolving each follow-up action before the next effect.
   * Concurrent calls are serialized.
   *
   * @remarks
   * Do not await `dispatch` from inside an effect: the call queues behind the cycle that is
   * running the effect and never resolves. Return the follow-up action instead.
   */
  dispatch: (action: A) => Promise<void>
  currentState: () => S
  /** Starts an independent feed seeded with the current state */
  subscribe: () => StateFeed<S>
  watch: (listener: StateListener<S>) => () => void
  launchEffect: (effect: Effect<S, A>, action: A) => EffectTask<A>
  /** @returns the number of tasks that were cancelled */
  cancelAllEffectTasks: () => number
  activeTaskCount: () => number
  subscriberCount: () => number
  setPreDispatchHook: (hook: PreDispatchHook<S, A> | undefined) => void
  /** Resolves once no dispatch cycle is queued or running */
  whenIdle: () => Promise<void>
  getName: () => string | undefined
  isDestroyed: () => boolean
  destroy: () => void
}
