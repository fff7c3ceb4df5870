import * as immer from 'immer'
import type {Draft} from 'immer'
import {PluginManager} from '../../plugins/pluginManager'
import {
  EffectError,
  EffectLoopError,
  type EngineError,
  HookError,
  TransitionError,
} from '../../shared/errors'
import {StateBroadcastHub} from '../broadcast/stateBroadcastHub'
import {EffectTaskRegistry, isAction} from '../effects/effectTaskRegistry'
import {createEngineLogger} from '../utils/logger'
import {DispatchQueue} from './dispatchQueue'
import type {Effect, Engine, EngineOptions, PreDispatchHook, Reducer} from './types'

// Map and Set states (and nested collections) are drafted like plain objects
immer.enableMapSet()

/**
 * Creates a new engine
 *
 * @param initialState - Starting state. Deep-frozen unless `freezeState` is false.
 * @param reducer - Transition function, the only code that ever changes the state
 * @param effects - Run in this order after every transition; copied at construction
 * @param options - Name, plugins, logging and limits
 *
 * @example
 * ```typescript
 * const engine = createEngine({count: 0}, (draft, action: 'inc') => {
 *   draft.count += 1
 * })
 *
 * await engine.dispatch('inc')
 * engine.currentState() // {count: 1}
 * ```
 */
export function createEngine<S, A>(
  initialState: S,
  reducer: Reducer<S, A>,
  effects: readonly Effect<S, A>[] = [],
  options: EngineOptions<S, A> = {}
): Engine<S, A> {
  const {
    name,
    plugins = [],
    logger = createEngineLogger(name),
    freezeState = true,
    maxRedispatchDepth = 1000,
    subscriberHighWaterMark = 1024,
    onError = (err: EngineError) => logger.error(err.message, err.context),
  } = options

  const producer = new immer.Immer({autoFreeze: freezeState})
  const effectList = Object.freeze([...effects])
  const queue = new DispatchQueue()
  const lifetime = new AbortController()

  let state = freezeState ? immer.freeze(initialState, true) : initialState
  let preDispatchHook: PreDispatchHook<S, A> | undefined
  let destroyed = false

  // --- Error reporting ---
  const handleError = (error: EngineError): void => {
    pluginManager.onError(error, error.context, engine)
    try {
      onError(error)
    } catch (callbackError) {
      logger.error('onError callback failed', {
        originalError: error.message,
        callbackError,
      })
    }
  }

  const pluginManager = new PluginManager<S, A>(plugins, handleError, logger)

  const hub = new StateBroadcastHub<S>(() => state, {
    highWaterMark: subscriberHighWaterMark,
    logger,
    handleError,
  })

  const registry = new EffectTaskRegistry<S, A>({
    getState: () => state,
    dispatchFollowUp: (action, shouldSkip) =>
      queue.run(async () => {
        if (destroyed || shouldSkip()) return false
        await runCycle(action, 0)
        return true
      }),
    handleError,
    onLaunch: task => pluginManager.onEffectTaskLaunch(task, engine),
    onSettled: (task, outcome) => {
      if (outcome.status === 'cancelled') {
        logger.debug(`Effect task ${task.id} cancelled`)
      }
      pluginManager.onEffectTaskSettled(task, outcome, engine)
    },
  })

  // --- Dispatch cycle ---
  const applyTransition = (action: A): S => {
    try {
      // Primitives and non-draftable values (class instances, Date) reach the reducer as-is
      // inside the box; whatever it returns replaces them
      const next = producer.produce({value: state}, (box: Draft<{value: S}>) => {
        const replacement = reducer(box.value, action)
        if (replacement !== undefined && replacement !== box.value) box.value = replacement
      })
      return next.value
    } catch (error) {
      const failure = new TransitionError('Reducer threw while applying an action', {
        operation: 'transition',
        action,
        error,
      })
      handleError(failure)
      teardown()
      throw failure
    }
  }

  const runEffect = async (effect: Effect<S, A>, action: A, snapshot: S): Promise<A | void> => {
    try {
      return await effect(action, snapshot, {signal: lifetime.signal})
    } catch (error) {
      handleError(
        new EffectError('Effect threw instead of returning an action', {
          operation: 'runEffect',
          action,
          error,
          additionalInfo: {effectName: effect.name || 'anonymous'},
        })
      )
      return undefined
    }
  }

  /**
   * One full cycle: hook, transition, publish, then each effect with its follow-up chain
   * resolved depth-first before the next effect runs.
   */
  const runCycle = async (action: A, depth: number): Promise<void> => {
    if (destroyed) return
    if (depth > maxRedispatchDepth) {
      const loopError = new EffectLoopError(maxRedispatchDepth, action)
      handleError(loopError)
      throw loopError
    }

    pluginManager.beforeDispatch(action, state, engine)
    if (preDispatchHook) {
      try {
        await preDispatchHook(action, state)
      } catch (error) {
        handleError(
          new HookError('Pre-dispatch hook failed', {operation: 'preDispatchHook', action, error})
        )
      }
      if (destroyed) return
    }

    const prevState = state
    const committed = applyTransition(action)
    state = committed

    hub.publish(committed, prevState)
    pluginManager.onStateChange(committed, prevState, action, engine)

    for (const effect of effectList) {
      if (destroyed) return
      const followUp = await runEffect(effect, action, committed)
      if (isAction(followUp)) {
        await runCycle(followUp, depth + 1)
      }
    }
  }

  const teardown = (): void => {
    if (destroyed) return
    destroyed = true

    registry.close()
    lifetime.abort()
    hub.close()
    preDispatchHook = undefined
    pluginManager.onDestroy(engine)
    logger.debug('Engine destroyed')
  }

  // --- Engine methods ---
  const engine: Engine<S, A> = {
    dispatch: action => {
      if (destroyed) {
        logger.warn('Cannot dispatch on destroyed engine')
        return Promise.resolve()
      }
      return queue.run(() => runCycle(action, 0))
    },

    currentState: () => state,

    subscribe: () => hub.subscribe(),

    watch: listener => hub.watch(listener),

    launchEffect: (effect, action) => {
      if (destroyed) logger.warn('Cannot launch an effect on destroyed engine')
      return registry.launch(effect, action)
    },

    cancelAllEffectTasks: () => registry.cancelAll(),

    activeTaskCount: () => registry.size(),

    subscriberCount: () => hub.count(),

    setPreDispatchHook: hook => {
      if (destroyed) return
      preDispatchHook = hook
    },

    whenIdle: () => queue.whenIdle(),

    getName: () => name,

    isDestroyed: () => destroyed,

    destroy: teardown,
  }

  pluginManager.onEngineCreate(engine)

  return engine
}

export default createEngine
