import {consola} from 'consola'
import type {Plugin} from '../core/state/types'
import {isDevMode} from '../core/utils/devMode'

type LogMethod = (message: string, ...args: unknown[]) => void

/**
 * Logger shapes the plugin accepts: a plain function, `console`, a consola instance,
 * or any object exposing some of these methods.
 */
export type SupportedLogger =
  | LogMethod
  | {
      log?: LogMethod
      info?: LogMethod
      success?: LogMethod
      debug?: LogMethod
      trace?: LogMethod
      warn?: LogMethod
      error?: LogMethod
      group?: (label: string) => void
      groupCollapsed?: (label: string) => void
      groupEnd?: () => void
    }

export type LoggerLevel = 'log' | 'info' | 'success' | 'debug' | 'trace' | 'warn' | 'error'

/**
 * Configuration options for the logger plugin.
 */
export interface LoggerPluginOptions<A> {
  /** Whether logging is enabled. Defaults to true in development, false otherwise. */
  enabled?: boolean
  /** The log level to use. Defaults to 'log'. */
  logLevel?: LoggerLevel
  /** Whether to group the lines of one transition. Defaults to true. */
  useGrouping?: boolean
  /** Whether to include timestamps in group labels. Defaults to true. */
  includeTimestamp?: boolean
  /** Also log launched effect tasks that end cancelled or failed. Defaults to true. */
  logEffectTasks?: boolean
  /** Custom action name formatter. */
  actionNameFormatter?: (action: A) => string
}

/**
 * Creates a plugin that logs every transition: previous state, action, next state.
 *
 * @example
 * ```typescript
 * const engine = createEngine({count: 0}, reducer, [], {
 *   plugins: [createLoggerPlugin(console, {enabled: true, includeTimestamp: false})],
 * })
 *
 * await engine.dispatch({type: 'increment'})
 * // Action: increment
 * //   Prev state {count: 0}
 * //   Action {type: 'increment'}
 * //   Next state {count: 1}
 * ```
 */
export function createLoggerPlugin<S, A>(
  logger: SupportedLogger = consola.withTag('effect-store'),
  options: LoggerPluginOptions<A> = {}
): Plugin<S, A> {
  const {
    enabled = isDevMode(),
    logLevel = 'log',
    useGrouping = true,
    includeTimestamp = true,
    logEffectTasks = true,
    actionNameFormatter,
  } = options

  function write(level: LoggerLevel, message: string, ...args: unknown[]): void {
    if (typeof logger === 'function') {
      logger(message, ...args)
    } else if (logger[level]) {
      logger[level]?.(message, ...args)
    } else {
      logger.log?.(message, ...args)
    }
  }

  function inferActionName(action: A): string {
    if (actionNameFormatter) {
      try {
        return actionNameFormatter(action)
      } catch (err) {
        write('warn', 'Custom actionNameFormatter threw an error:', err)
      }
    }
    return describeAction(action)
  }

  return {
    name: 'logger',

    onStateChange(state, prevState, action) {
      if (!enabled) return

      const timestamp = includeTimestamp ? ` @ ${new Date().toISOString()}` : ''
      const label = `Action: ${inferActionName(action)}${timestamp}`
      const grouped =
        useGrouping &&
        typeof logger !== 'function' &&
        typeof (logger.groupCollapsed ?? logger.group) === 'function'

      try {
        if (grouped && typeof logger !== 'function') {
          if (logger.groupCollapsed) logger.groupCollapsed(label)
          else logger.group?.(label)
        } else {
          write(logLevel, label)
        }

        write(logLevel, 'Prev state', prevState)
        write(logLevel, 'Action', action)
        write(logLevel, 'Next state', state)
      } finally {
        if (grouped && typeof logger !== 'function') logger.groupEnd?.()
      }
    },

    onEffectTaskSettled(task, outcome) {
      if (!enabled || !logEffectTasks) return
      if (outcome.status === 'cancelled') {
        write('info', `Effect task ${task.id} (${inferActionName(task.action)}) cancelled`)
      } else if (outcome.status === 'failed') {
        write(
          'warn',
          `Effect task ${task.id} (${inferActionName(task.action)}) failed`,
          outcome.error
        )
      }
    },
  }
}

/**
 * Human-friendly action name: a string action as-is, the `type` field of a tagged
 * object, otherwise its keys.
 */
export function describeAction(action: unknown): string {
  if (action === null || action === undefined) return `[${String(action)}]`
  if (typeof action === 'string') return action
  if (typeof action === 'number' || typeof action === 'boolean') return String(action)
  if (typeof action !== 'object') return `[${typeof action}]`

  if ('type' in action && typeof action.type === 'string') return action.type

  const keys = Object.keys(action)
  if (keys.length === 0) return '[empty action]'
  return keys.join(', ')
}
