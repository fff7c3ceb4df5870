/**
 * Core engine: dispatch loop, effect tasks and state broadcasting.
 */
export * from './state/createEngine'
export * from './state/dispatchQueue'
export type * from './state/types'
export * from './effects/effectTaskRegistry'
export type * from './effects/types'
export * from './broadcast/stateBroadcastHub'
export * from './broadcast/stateFeed'
export * from './utils/devMode'
export * from './utils/logger'
