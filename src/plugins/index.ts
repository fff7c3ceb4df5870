/**
 * Plugins
 *
 * @remarks
 * Lifecycle hooks for observing and extending an engine, plus the built-in logger plugin.
 *
 * @packageDocumentation
 */

export * from './pluginManager'
export * from './loggerPlugin'
