import { isValidCalendar, type WallClockParts } from './wall-clock'

// 2000-2099, optional separators, then an optional HHMMSS block
const FILENAME_DATE_PATTERN =
  /(?<!\d)(20\d{2})[-_.]?(\d{2})[-_.]?(\d{2})(?:[-_ T.]?(\d{2})[-_.:]?(\d{2})[-_.:]?(\d{2})(?!\d))?/g

/**
 * Find a capture date embedded in a file name, e.g. `IMG_20240101_120000.jpg`
 * or `VID-2023-07-14.mp4`. The first match that is a real calendar date wins;
 * an impossible time of day is dropped rather than the whole date.
 */
export function parseFilenameDate(fileName: string): WallClockParts | undefined {
  for (const m of fileName.matchAll(FILENAME_DATE_PATTERN)) {
    const date = { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]), hour: 0, minute: 0, second: 0 }
    if (!isValidCalendar(date)) continue
    if (m[4] !== undefined) {
      const withTime = { ...date, hour: Number(m[4]), minute: Number(m[5]), second: Number(m[6]) }
      if (isValidCalendar(withTime)) return withTime
    }
    return date
  }
  return undefined
}
