/**
 * How an independently launched effect task ended
 */
export type EffectTaskOutcome<A> =
  | {status: 'dispatched'; action: A}
  | {status: 'completed'}
  | {status: 'cancelled'}
  | {status: 'failed'; error: Error}

/**
 * Handle to a launched, cancellable unit of effect work
 */
export interface EffectTask<A> {
  readonly id: number
  readonly action: A
  readonly signal: AbortSignal
  readonly isCancelled: boolean
  /** Signals the effect to stop and suppresses its follow-up dispatch. Idempotent. */
  cancel: () => void
  /** Settles with the outcome; never rejects */
  readonly result: Promise<EffectTaskOutcome<A>>
}
