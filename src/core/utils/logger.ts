import {consola, LogLevels, type ConsolaInstance} from 'consola'
import {isDevMode} from './devMode'

/**
 * Creates the default logger for an engine: a consola instance tagged with the engine name,
 * logging debug output in development mode and warnings and errors otherwise.
 */
export function createEngineLogger(name?: string): ConsolaInstance {
  const logger = consola.withTag(`Engine: ${name || 'Unnamed'}`)
  logger.level = isDevMode() ? LogLevels.debug : LogLevels.warn
  return logger
}
