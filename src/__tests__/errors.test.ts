import { describe, it, expect } from 'vitest'
import {
  describeError,
  InvalidTimestampError,
  MediaChronicleError,
  RenameGroupError,
  StoreFormatError,
} from '@/lib/errors'

describe('errors', () => {
  it('carries a code and the subclass name', () => {
    const err = new InvalidTimestampError('2024/13/01')
    expect(err).toBeInstanceOf(MediaChronicleError)
    expect(err.code).toBe('invalid-timestamp')
    expect(err.name).toBe('InvalidTimestampError')
    expect(err.message).toBe('Invalid date/time "2024/13/01". Expected YYYY/MM/DD HH:MM:SS')
  })

  it('keeps the cause of a failed rename group', () => {
    const cause = new Error('EEXIST')
    const err = new RenameGroupError('beach.jpg', cause)
    expect(err.cause).toBe(cause)
    expect(err.fileName).toBe('beach.jpg')
  })

  describe('describeError', () => {
    it('uses library messages as they are', () => {
      expect(describeError(new StoreFormatError('/a.json', 'broken'))).toBe('Collection file /a.json is not usable: broken')
    })

    it('translates common filesystem codes', () => {
      expect(describeError(Object.assign(new Error('open failed'), { code: 'ENOENT' }))).toBe('File not found')
      expect(describeError(Object.assign(new Error('open failed'), { code: 'EACCES' }))).toBe('Permission denied')
    })

    it('falls back to the message or a generic text', () => {
      expect(describeError(new Error('boom'))).toBe('boom')
      expect(describeError('boom')).toBe('Unexpected error')
    })
  })
})
