/**
 * Context information attached to every engine error
 */
export interface ErrorContext {
  operation: string
  action?: unknown
  pluginName?: string
  taskId?: number
  error?: unknown
  additionalInfo?: Record<string, unknown>
}

export class EngineError extends Error {
  constructor(
    message: string,
    public context: ErrorContext
  ) {
    super(message)
    this.name = this.constructor.name
  }
}

/** The reducer threw. The engine cannot recover from this. */
export class TransitionError extends EngineError {}
export class EffectError extends EngineError {}
export class HookError extends EngineError {}
export class PluginError extends EngineError {}
export class SubscriberError extends EngineError {}

/**
 * Raised when effects keep redispatching past the configured depth
 */
export class EffectLoopError extends EngineError {
  constructor(
    public depth: number,
    action: unknown
  ) {
    super(`Redispatch depth exceeded ${depth}; an effect chain never settles`, {
      operation: 'dispatch',
      action,
    })
  }
}

/**
 * Abort reason handed to a cancelled effect task's signal
 */
export class EffectCancelledError extends EngineError {
  constructor(taskId: number) {
    super(`Effect task ${taskId} was cancelled`, {operation: 'cancelEffectTask', taskId})
  }
}

/**
 * Normalizes anything thrown into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
