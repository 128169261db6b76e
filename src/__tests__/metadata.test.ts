import { afterEach, describe, it, expect, vi } from 'vitest'
import { collectFfprobeTags, parseIso6709, probe } from '@/lib/metadata'

describe('collectFfprobeTags', () => {
  it('merges container and stream tags with lower-cased names', () => {
    const tags = collectFfprobeTags({
      format: { tags: { 'com.apple.quicktime.creationdate': '2024-01-15T17:00:00+0700', Creation_Time: 'container' } },
      streams: [
        { tags: { creation_time: 'stream', handler_name: 'Core Media Video' } },
        { codec_type: 'audio' },
      ],
    })
    expect(tags).toEqual({
      'com.apple.quicktime.creationdate': '2024-01-15T17:00:00+0700',
      creation_time: 'container',
      handler_name: 'Core Media Video',
    })
  })

  it('ignores non-string values and malformed output', () => {
    expect(collectFfprobeTags({ format: { tags: { duration: 12 } } })).toEqual({})
    expect(collectFfprobeTags(null)).toEqual({})
  })
})

describe('parseIso6709', () => {
  it('reads phone location tags', () => {
    expect(parseIso6709('+25.0330+121.5654+010.000/')).toEqual({ lat: 25.033, lon: 121.5654 })
    expect(parseIso6709('-33.8688+151.2093/')).toEqual({ lat: -33.8688, lon: 151.2093 })
  })

  it('rejects out-of-range or malformed values', () => {
    expect(parseIso6709('+95.0000+010.0000/')).toBeUndefined()
    expect(parseIso6709('somewhere')).toBeUndefined()
  })
})

describe('probe', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('returns the value of a fast probe', async () => {
    expect(await probe('fast', async () => 'value', 100)).toBe('value')
  })

  it('turns a rejection into undefined', async () => {
    expect(await probe('broken', () => Promise.reject(new Error('bad file')), 100)).toBeUndefined()
  })

  it('gives up after the timeout', async () => {
    vi.useFakeTimers()
    const pending = probe('slow', () => new Promise<string>(() => {}), 100)
    await vi.advanceTimersByTimeAsync(100)
    expect(await pending).toBeUndefined()
  })
})
