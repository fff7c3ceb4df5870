/**
 * effect-store
 *
 * @remarks
 * A unidirectional state container: one state value changed only by a reducer,
 * asynchronous effects that react to every transition and may dispatch follow-up actions,
 * cancellable effect tasks, and a multicast feed of every committed state.
 *
 * @example
 * ```typescript
 * import {createEngine} from 'effect-store'
 *
 * const engine = createEngine({count: 0}, (draft, action: 'inc') => {
 *   draft.count += 1
 * })
 * await engine.dispatch('inc')
 * ```
 *
 * @packageDocumentation
 */

// Re-export everything from core
export * from './core'

export * from './plugins'

export * from './shared'
