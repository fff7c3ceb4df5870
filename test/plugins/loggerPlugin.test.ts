import {describe, it, expect, vi} from 'vitest'
import {createEngine} from '../../src/core'
import {
  createLoggerPlugin,
  describeAction,
  type LoggerPluginOptions,
  type SupportedLogger,
} from '../../src/plugins/loggerPlugin'
import {counterReducer, type CounterAction, type CounterState} from '../utils/counter'
import {createMockLogger, deferred} from '../utils/helpers'

function createConsoleLike() {
  return {
    log: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    groupCollapsed: vi.fn(),
    groupEnd: vi.fn(),
  }
}

function createLoggedEngine(
  output: SupportedLogger,
  options: LoggerPluginOptions<CounterAction> = {}
) {
  return createEngine<CounterState, CounterAction>({count: 0}, counterReducer, [], {
    logger: createMockLogger(),
    plugins: [
      createLoggerPlugin<CounterState, CounterAction>(output, {includeTimestamp: false, ...options}),
    ],
  })
}

describe('createLoggerPlugin', () => {
  it('should log previous state, action and next state inside a collapsed group', async () => {
    const output = createConsoleLike()
    const engine = createLoggedEngine(output)

    await engine.dispatch('increment')

    expect(output.groupCollapsed).toHaveBeenCalledWith('Action: increment')
    expect(output.log.mock.calls).toEqual([
      ['Prev state', {count: 0}],
      ['Action', 'increment'],
      ['Next state', {count: 1}],
    ])
    expect(output.groupEnd).toHaveBeenCalledTimes(1)
  })

  it('should write the label as a plain line when grouping is off', async () => {
    const output = createConsoleLike()
    const engine = createLoggedEngine(output, {useGrouping: false, logLevel: 'info'})

    await engine.dispatch('decrement')

    expect(output.groupCollapsed).not.toHaveBeenCalled()
    expect(output.info.mock.calls[0]).toEqual(['Action: decrement'])
    expect(output.info).toHaveBeenCalledTimes(4)
  })

  it('should accept a plain function as the logger', async () => {
    const output = vi.fn()
    const engine = createLoggedEngine(output)

    await engine.dispatch('increment')

    expect(output).toHaveBeenNthCalledWith(1, 'Action: increment')
    expect(output).toHaveBeenNthCalledWith(4, 'Next state', {count: 1})
  })

  it('should append an ISO timestamp to the label when enabled', async () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'))
    const output = createConsoleLike()
    const engine = createLoggedEngine(output, {includeTimestamp: true})

    await engine.dispatch('increment')

    expect(output.groupCollapsed).toHaveBeenCalledWith(
      'Action: increment @ 2024-03-01T12:00:00.000Z'
    )
  })

  it('should stay silent when disabled', async () => {
    const output = createConsoleLike()
    const engine = createLoggedEngine(output, {enabled: false})

    await engine.dispatch('increment')

    expect(output.log).not.toHaveBeenCalled()
    expect(output.groupCollapsed).not.toHaveBeenCalled()
  })

  it('should use a custom action name formatter and fall back when it throws', async () => {
    const output = createConsoleLike()
    const formatted = createLoggedEngine(output, {
      actionNameFormatter: action => action.toUpperCase(),
    })
    await formatted.dispatch('increment')
    expect(output.groupCollapsed).toHaveBeenLastCalledWith('Action: INCREMENT')

    const failure = new Error('bad formatter')
    const broken = createLoggedEngine(output, {
      actionNameFormatter: () => {
        throw failure
      },
    })
    await broken.dispatch('increment')

    expect(output.warn).toHaveBeenCalledWith('Custom actionNameFormatter threw an error:', failure)
    expect(output.groupCollapsed).toHaveBeenLastCalledWith('Action: increment')
  })

  it('should log cancelled and failed effect tasks', async () => {
    const output = createConsoleLike()
    const engine = createLoggedEngine(output)
    const gate = deferred()
    const failure = new Error('network down')

    const cancelled = engine.launchEffect(async () => {
      await gate.promise
    }, 'startTimer')
    cancelled.cancel()
    await cancelled.result

    const failed = engine.launchEffect(async () => {
      throw failure
    }, 'slow')
    await failed.result

    expect(output.info).toHaveBeenCalledWith(`Effect task ${cancelled.id} (startTimer) cancelled`)
    expect(output.warn).toHaveBeenCalledWith(`Effect task ${failed.id} (slow) failed`, failure)
  })
})

describe('describeAction', () => {
  it('should name actions by their shape', () => {
    expect(describeAction('increment')).toBe('increment')
    expect(describeAction({type: 'todos/add', text: 'milk'})).toBe('todos/add')
    expect(describeAction({query: 'abc', page: 2})).toBe('query, page')
    expect(describeAction({})).toBe('[empty action]')
    expect(describeAction(42)).toBe('42')
    expect(describeAction(null)).toBe('[null]')
    expect(describeAction(undefined)).toBe('[undefined]')
    expect(describeAction(Symbol('x'))).toBe('[symbol]')
  })
})
