import { createLogger, logger, LogLevels, setLogLevel } from '@rosterlink/utils'
import { afterEach, describe, expect, it } from 'vitest'

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevels.info)
  })

  it('starts at info level', () => {
    expect(logger.level).toBe(LogLevels.info)
    expect(createLogger('Test').level).toBe(LogLevels.info)
  })

  it('setLogLevel reaches loggers created before and after the call', () => {
    const before = createLogger('Before')

    setLogLevel(LogLevels.debug)

    expect(logger.level).toBe(LogLevels.debug)
    expect(before.level).toBe(LogLevels.debug)
    expect(createLogger('After').level).toBe(LogLevels.debug)
  })
})
