import { createLogger, logger, LogLevels, setLogLevel } from '@pagegraph/utils/logger'
import { afterEach, describe, expect, it } from 'vitest'

describe('logger', () => {
  afterEach(() => {
    setLogLevel(LogLevels.info)
  })

  it('createLogger starts at the root level', () => {
    setLogLevel('warn')
    const log = createLogger('test-root-level')
    expect(log.level).toBe(LogLevels.warn)
  })

  it('setLogLevel updates previously created scoped loggers', () => {
    const log = createLogger('test-scoped')
    setLogLevel('debug')
    expect(logger.level).toBe(LogLevels.debug)
    expect(log.level).toBe(LogLevels.debug)
  })

  it('setLogLevel accepts numeric levels', () => {
    const log = createLogger('test-numeric')
    setLogLevel(1)
    expect(log.level).toBe(1)
  })
})
