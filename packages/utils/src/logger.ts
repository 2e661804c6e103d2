import type { ConsolaInstance } from 'consola'
import { createConsola, LogLevels } from 'consola'

export const logger: ConsolaInstance = createConsola({ level: LogLevels.info })

// withTag copies the root's options, so children are tracked for setLogLevel
const children: ConsolaInstance[] = []

// Scoped logger with [tag] prefix
export function createLogger(tag: string): ConsolaInstance {
  const child = logger.withTag(tag)
  children.push(child)
  return child
}

// Set global log level; LogLevels.debug traces each cross-reference pass
export function setLogLevel(level: number): void {
  logger.level = level
  for (const child of children) {
    child.level = level
  }
}

export { LogLevels } from 'consola'
