import type { ConsolaInstance, LogType } from 'consola'
import { createConsola, LogLevels } from 'consola'

// Root instance. Scoped loggers are created from it with .withTag()
export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// withTag() copies the level at creation time, so scoped loggers are tracked
// and kept in step by setLogLevel()
const scoped: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  scoped.push(child)
  return child
}

/**
 * Set the level of the root logger and every scoped logger.
 *
 * Accepts a numeric consola level or a level name such as `'debug'` or `'silent'`.
 */
export function setLogLevel(level: number | LogType): void {
  const value = typeof level === 'number' ? level : LogLevels[level]
  logger.level = value
  for (const child of scoped) {
    child.level = value
  }
}

export { LogLevels } from 'consola'
export type { ConsolaInstance, LogType } from 'consola'
