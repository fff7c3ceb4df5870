import {EffectCancelledError} from '../../shared/errors'
import type {EffectTask, EffectTaskOutcome} from './types'

/**
 * Registry-owned implementation of {@link EffectTask}
 */
export class ManagedEffectTask<A> implements EffectTask<A> {
  readonly result: Promise<EffectTaskOutcome<A>>
  /** Set once the follow-up cycle has started; cancelling after that cannot undo it */
  committed = false
  private controller = new AbortController()
  private resolveResult: (outcome: EffectTaskOutcome<A>) => void = () => {}
  private settled = false

  constructor(
    readonly id: number,
    readonly action: A
  ) {
    this.result = new Promise(resolve => {
      this.resolveResult = resolve
    })
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }

  get isSettled(): boolean {
    return this.settled
  }

  cancel(): void {
    if (this.isCancelled) return
    this.controller.abort(new EffectCancelledError(this.id))
  }

  /** First outcome wins */
  settle(outcome: EffectTaskOutcome<A>): boolean {
    if (this.settled) return false
    this.settled = true
    this.resolveResult(outcome)
    return true
  }
}
