import type {EffectTask, EffectTaskOutcome} from '../core/effects/types'
import type {Engine, EngineLogger, Plugin} from '../core/state/types'
import {type EngineError, type ErrorContext, PluginError} from '../shared/errors'

type HookName = Exclude<keyof Plugin<unknown, unknown>, 'name' | 'onError'>

/**
 * Plugin lifecycle manager to handle plugin hooks consistently
 */
export class PluginManager<S, A> {
  private plugins: Plugin<S, A>[]

  constructor(
    plugins: Plugin<S, A>[],
    private handleError: (error: EngineError) => void,
    private logger: EngineLogger
  ) {
    this.plugins = [...plugins]
  }

  /**
   * Safely execute a plugin hook for all plugins
   */
  private executeHook(
    hookName: HookName,
    invoke: (plugin: Plugin<S, A>) => void,
    options: {continueOnError?: boolean} = {}
  ): void {
    const {continueOnError = true} = options

    for (const plugin of this.plugins) {
      if (typeof plugin[hookName] !== 'function') continue
      try {
        invoke(plugin)
      } catch (e) {
        this.handleError(
          new PluginError(`Plugin ${plugin.name}.${hookName} failed`, {
            error: e,
            pluginName: plugin.name,
            operation: hookName,
          })
        )

        if (!continueOnError) {
          throw e
        }
      }
    }
  }

  public onEngineCreate(engine: Engine<S, A>): void {
    this.executeHook('onEngineCreate', plugin => plugin.onEngineCreate?.(engine), {
      continueOnError: false,
    })
  }

  public beforeDispatch(action: A, state: S, engine: Engine<S, A>): void {
    this.executeHook('beforeDispatch', plugin => plugin.beforeDispatch?.(action, state, engine))
  }

  public onStateChange(state: S, prevState: S, action: A, engine: Engine<S, A>): void {
    this.executeHook('onStateChange', plugin =>
      plugin.onStateChange?.(state, prevState, action, engine)
    )
  }

  public onEffectTaskLaunch(task: EffectTask<A>, engine: Engine<S, A>): void {
    this.executeHook('onEffectTaskLaunch', plugin => plugin.onEffectTaskLaunch?.(task, engine))
  }

  public onEffectTaskSettled(
    task: EffectTask<A>,
    outcome: EffectTaskOutcome<A>,
    engine: Engine<S, A>
  ): void {
    this.executeHook('onEffectTaskSettled', plugin =>
      plugin.onEffectTaskSettled?.(task, outcome, engine)
    )
  }

  public onDestroy(engine: Engine<S, A>): void {
    this.executeHook('onDestroy', plugin => plugin.onDestroy?.(engine))
  }

  public onError(error: EngineError, context: ErrorContext, engine: Engine<S, A>): void {
    // Not routed through executeHook: reporting a failure here would recurse
    for (const plugin of this.plugins) {
      try {
        plugin.onError?.(error, context, engine)
      } catch (pluginError) {
        this.logger.error(`Plugin ${plugin.name}.onError failed`, {
          originalError: error.message,
          pluginError: pluginError instanceof Error ? pluginError.message : String(pluginError),
          pluginName: plugin.name,
        })
      }
    }
  }
}
