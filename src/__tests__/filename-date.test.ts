import { describe, it, expect } from 'vitest'
import { parseFilenameDate } from '@/lib/filename-date'

describe('parseFilenameDate', () => {
  it('reads camera-style names with a time', () => {
    expect(parseFilenameDate('IMG_20240101_120000.jpg')).toEqual({
      year: 2024, month: 1, day: 1, hour: 12, minute: 0, second: 0,
    })
  })

  it('reads dashed dates without a time as midnight', () => {
    expect(parseFilenameDate('VID-2023-07-14.mp4')).toEqual({
      year: 2023, month: 7, day: 14, hour: 0, minute: 0, second: 0,
    })
  })

  it('reads dotted and spaced forms', () => {
    expect(parseFilenameDate('Screenshot 2022.05.06 at 21.15.30.png')).toEqual({
      year: 2022, month: 5, day: 6, hour: 0, minute: 0, second: 0,
    })
    expect(parseFilenameDate('PXL_20220506 211530.jpg')).toEqual({
      year: 2022, month: 5, day: 6, hour: 21, minute: 15, second: 30,
    })
  })

  it('keeps the date when the time of day is impossible', () => {
    expect(parseFilenameDate('IMG_20240101_256000.jpg')).toEqual({
      year: 2024, month: 1, day: 1, hour: 0, minute: 0, second: 0,
    })
  })

  it('skips digit runs that are not calendar dates', () => {
    expect(parseFilenameDate('IMG_20241399.jpg')).toBeUndefined()
    expect(parseFilenameDate('beach.jpg')).toBeUndefined()
  })

  it('does not match inside a longer number', () => {
    expect(parseFilenameDate('3202401015.jpg')).toBeUndefined()
  })
})
