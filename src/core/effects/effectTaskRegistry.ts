import {EffectError, type EngineError, toError} from '../../shared/errors'
import type {Effect} from '../state/types'
import {ManagedEffectTask} from './effectTask'
import type {EffectTask, EffectTaskOutcome} from './types'

export interface EffectTaskRegistryOptions<S, A> {
  /** Snapshot handed to the effect at launch */
  getState: () => S
  /**
   * Runs the follow-up action through the engine's dispatch queue. `shouldSkip` is checked
   * when the queued cycle is about to start; resolves false when the cycle was skipped.
   */
  dispatchFollowUp: (action: A, shouldSkip: () => boolean) => Promise<boolean>
  handleError: (error: EngineError) => void
  onLaunch?: (task: EffectTask<A>) => void
  onSettled?: (task: EffectTask<A>, outcome: EffectTaskOutcome<A>) => void
}

/**
 * Tracks independently launched effect tasks.
 *
 * @remarks
 * A task leaves the tracked set as soon as it settles. Cancellation settles it at once with
 * `cancelled`, unless its follow-up cycle has already started, in which case it settles as
 * `dispatched` when that cycle ends. An effect that ignores its abort signal keeps running,
 * but whatever it returns afterwards is discarded.
 */
export class EffectTaskRegistry<S, A> {
  private tasks = new Map<number, ManagedEffectTask<A>>()
  private nextId = 1
  private closed = false

  constructor(private options: EffectTaskRegistryOptions<S, A>) {}

  launch(effect: Effect<S, A>, action: A): EffectTask<A> {
    const task = new ManagedEffectTask<A>(this.nextId++, action)

    if (this.closed) {
      task.cancel()
      task.settle({status: 'cancelled'})
      return task
    }

    this.tasks.set(task.id, task)
    task.signal.addEventListener('abort', () => this.handleAbort(task), {once: true})
    this.options.onLaunch?.(task)

    void this.execute(effect, task, this.options.getState())
    return task
  }

  /**
   * Cancels every task tracked right now. Tasks launched afterwards are unaffected, and so
   * are tasks whose follow-up cycle has already started.
   * @returns the number of tasks cancelled
   */
  cancelAll(): number {
    const snapshot = [...this.tasks.values()].filter(
      task => !task.isCancelled && !task.committed
    )
    snapshot.forEach(task => task.cancel())
    return snapshot.length
  }

  size(): number {
    return this.tasks.size
  }

  /** Cancels everything and refuses new launches */
  close(): void {
    this.closed = true
    this.cancelAll()
  }

  private async execute(effect: Effect<S, A>, task: ManagedEffectTask<A>, snapshot: S) {
    let followUp: A | void
    try {
      followUp = await effect(task.action, snapshot, {signal: task.signal})
    } catch (error) {
      if (task.isCancelled) {
        this.finish(task, {status: 'cancelled'})
        return
      }
      const failure = toError(error)
      this.options.handleError(
        new EffectError('Launched effect task failed', {
          operation: 'launchEffect',
          action: task.action,
          taskId: task.id,
          error: failure,
        })
      )
      this.finish(task, {status: 'failed', error: failure})
      return
    }

    if (task.isCancelled) {
      this.finish(task, {status: 'cancelled'})
      return
    }
    if (!isAction(followUp)) {
      this.finish(task, {status: 'completed'})
      return
    }

    const action = followUp
    try {
      const dispatched = await this.options.dispatchFollowUp(action, () => {
        if (task.isCancelled) return true
        task.committed = true
        return false
      })
      this.finish(task, dispatched ? {status: 'dispatched', action} : {status: 'cancelled'})
    } catch (error) {
      // The engine has already reported the failed cycle
      this.finish(task, {status: 'failed', error: toError(error)})
    }
  }

  private handleAbort(task: ManagedEffectTask<A>): void {
    if (task.committed) return
    this.finish(task, {status: 'cancelled'})
  }

  private finish(task: ManagedEffectTask<A>, outcome: EffectTaskOutcome<A>): void {
    this.tasks.delete(task.id)
    if (task.settle(outcome)) {
      this.options.onSettled?.(task, outcome)
    }
  }
}

/**
 * Distinguishes a follow-up action from "nothing to dispatch"
 */
export function isAction<A>(value: A | void): value is A {
  return value !== undefined
}
