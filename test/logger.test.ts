// logger.test.ts
import { describe, it, expect } from 'vitest'
import { noopLogger, scopedLogger } from '../src/logger'
import { recordingLogger } from './helpers'

describe('scopedLogger', () => {
  it('should prefix every message with the scope name', () => {
    const logger = recordingLogger()
    const scoped = scopedLogger(logger, 'io')
    const detail = { lane: 0 }

    scoped.debug('lane started', detail)
    scoped.info('ready')
    scoped.warn('slow')
    scoped.error('failed')

    expect(logger.debug).toHaveBeenCalledWith('[io] lane started', detail)
    expect(logger.info).toHaveBeenCalledWith('[io] ready')
    expect(logger.warn).toHaveBeenCalledWith('[io] slow')
    expect(logger.error).toHaveBeenCalledWith('[io] failed')
  })

  it('should hand back the no-op logger unchanged', () => {
    expect(scopedLogger(noopLogger, 'io')).toBe(noopLogger)
  })
})
