/**
 * Wall-clock values: the calendar date and time of day a device recorded,
 * with no timezone attached. The canonical text form is `YYYY/MM/DD HH:MM:SS`.
 */

export interface WallClockParts {
  year: number
  /** 1-12 */
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

const WALL_CLOCK_PATTERN =
  /^(\d{4})[/:-](\d{1,2})[/:-](\d{1,2})(?:[T ]+(\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?$/

export function isValidCalendar(parts: WallClockParts): boolean {
  const { year, month, day, hour, minute, second } = parts
  if (month < 1 || month > 12 || day < 1) return false
  if (hour > 23 || minute > 59 || second > 59) return false
  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  return day <= daysInMonth
}

/**
 * Parse `2024/01/15 17:00:00`, the EXIF form `2024:01:15 17:00:00`, or ISO-like
 * `2024-01-15T17:00` (seconds optional, time optional). Returns undefined for
 * anything else or for dates that do not exist on the calendar.
 */
export function parseWallClock(value: string): WallClockParts | undefined {
  const match = value.trim().match(WALL_CLOCK_PATTERN)
  if (!match) return undefined
  const parts: WallClockParts = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4] ?? '0'),
    minute: Number(match[5] ?? '0'),
    second: Number(match[6] ?? '0'),
  }
  return isValidCalendar(parts) ? parts : undefined
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0')

export function formatWallClock(parts: WallClockParts): string {
  return `${pad(parts.year, 4)}/${pad(parts.month)}/${pad(parts.day)} ${pad(parts.hour)}:${pad(parts.minute)}:${pad(parts.second)}`
}

/** Epoch seconds of a wall-clock observed at a fixed offset (minutes east of UTC). */
export function wallClockToEpoch(parts: WallClockParts, offsetMinutes: number): number {
  const asUtc = Date.UTC(parts.year, parts.month - 1, parts.day, parts.hour, parts.minute, parts.second)
  return asUtc / 1000 - offsetMinutes * 60
}

export function epochToWallClock(epoch: number, offsetMinutes: number): WallClockParts {
  const shifted = new Date(Math.floor(epoch) * 1000 + offsetMinutes * 60_000)
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    second: shifted.getUTCSeconds(),
  }
}
