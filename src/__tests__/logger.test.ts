import { afterEach, describe, it, expect, vi } from 'vitest'
import { Logger, LogLevel, parseLogLevel } from '@/lib/logger'

describe('Logger', () => {
  afterEach(() => {
    Logger.setSink(null)
    Logger.setLevel(LogLevel.WARN)
  })

  it('prefixes messages with the module name', () => {
    const sink = vi.fn()
    Logger.setSink(sink)
    Logger.setLevel(LogLevel.WARN)
    new Logger('store').warn('Dropping record', 42)
    expect(sink).toHaveBeenCalledWith(LogLevel.WARN, '[store] Dropping record', 42)
  })

  it('drops messages below the level', () => {
    const sink = vi.fn()
    Logger.setSink(sink)
    Logger.setLevel(LogLevel.WARN)
    const log = new Logger('catalog')
    log.debug('hidden')
    log.info('hidden')
    log.error('shown')
    expect(sink).toHaveBeenCalledOnce()
    expect(sink).toHaveBeenCalledWith(LogLevel.ERROR, '[catalog] shown')
  })

  it('writes to the console by default', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {})
    Logger.setLevel(LogLevel.INFO)
    new Logger('metadata').info('probing')
    expect(spy).toHaveBeenCalledWith('[metadata] probing')
    spy.mockRestore()
  })
})

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG)
    expect(parseLogLevel(' warn ')).toBe(LogLevel.WARN)
    expect(parseLogLevel('verbose')).toBeUndefined()
    expect(parseLogLevel(undefined)).toBeUndefined()
  })
})
