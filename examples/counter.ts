/**
 * Example: Counter
 *
 * A counter with a delayed increment, an effect that keeps the count below a limit, a
 * subscriber printing every state, and a launched timer that is cancelled before it fires.
 *
 * Note: The import below uses a relative path for development purposes.
 * In a real application, you would import from the published package:
 *
 * import {createEngine} from "effect-store";
 */

import {createEngine, createLoggerPlugin, type Effect, type Reducer} from '../src'

interface CounterState {
  count: number
}

type CounterAction = 'increment' | 'decrement' | 'incrementLater' | 'reset'

const LIMIT = 5

const reducer: Reducer<CounterState, CounterAction> = (draft, action) => {
  switch (action) {
    case 'increment':
      draft.count += 1
      break
    case 'decrement':
      draft.count -= 1
      break
    case 'reset':
      draft.count = 0
      break
  }
}

const wait = (ms: number) => new Promise(resolve => setTimeout(resolve, ms))

const incrementLater: Effect<CounterState, CounterAction> = async action => {
  if (action !== 'incrementLater') return
  await wait(100)
  return 'increment'
}

const keepBelowLimit: Effect<CounterState, CounterAction> = (action, state) => {
  if (action === 'increment' && state.count >= LIMIT) return 'decrement'
}

const engine = createEngine({count: 0}, reducer, [incrementLater, keepBelowLimit], {
  name: 'counter',
  plugins: [createLoggerPlugin<CounterState, CounterAction>(console, {enabled: true})],
})

const printer = (async () => {
  for await (const state of engine.subscribe()) {
    console.log('count is now', state.count)
  }
})()

for (let i = 0; i < 6; i++) {
  await engine.dispatch('increment')
}
console.log('held at', engine.currentState().count)

await engine.dispatch('incrementLater')

// A timer launched outside the pipeline can be cancelled before it fires
const timer = engine.launchEffect(async (_action, _state, {signal}) => {
  await wait(1000)
  if (signal.aborted) return
  return 'reset'
}, 'reset')
timer.cancel()
console.log('timer outcome:', (await timer.result).status)

engine.destroy()
await printer
