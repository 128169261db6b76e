import tzlookup from 'tz-lookup'
import type { UtcOffset } from './types'
import { epochToWallClock, wallClockToEpoch, type WallClockParts } from './wall-clock'

/**
 * Get IANA timezone string from GPS coordinates.
 * Returns e.g. "America/Los_Angeles", "Pacific/Honolulu".
 */
export function getTimezoneFromCoords(lat: number, lon: number): string {
  return tzlookup(lat, lon)
}

/**
 * Get the UTC offset string (e.g. "+00:00", "-10:00", "+05:30") for a given
 * IANA timezone at a specific instant.
 *
 * Intl.DateTimeFormat resolves the offset, which handles DST transitions
 * for the given date.
 */
export function getUtcOffsetString(timezone: string, date: Date): UtcOffset {
  let parts: Intl.DateTimeFormatPart[] | undefined
  for (const tzName of ['longOffset', 'shortOffset', 'short'] as const) {
    try {
      parts = new Intl.DateTimeFormat('en-US', {
        timeZone: timezone,
        timeZoneName: tzName,
      }).formatToParts(date)
      break
    } catch {
      // try next format
    }
  }
  if (!parts) return '+00:00'

  const tzPart = parts.find(p => p.type === 'timeZoneName')
  if (!tzPart) return '+00:00'

  // tzPart.value is like "GMT", "GMT-10:00", "GMT+5:30", "GMT+5"
  const match = tzPart.value.match(/GMT([+-]\d{1,2}(?::\d{2})?)/)
  if (!match) return '+00:00' // "GMT" with no offset means UTC

  return normalizeOffset(match[1]) ?? '+00:00'
}

/**
 * Normalize "+7", "+0700", "+07:00", "-5:30" into "±HH:MM". Returns undefined
 * for anything that is not an offset between -14:00 and +14:00.
 */
export function normalizeOffset(value: string): UtcOffset | undefined {
  const m = value.trim().match(/^([+-])(\d{1,2})(?::?(\d{2}))?$/)
  if (!m) return undefined
  const hours = Number(m[2])
  const minutes = Number(m[3] ?? '0')
  if (hours > 14 || minutes > 59 || (hours === 14 && minutes > 0)) return undefined
  return `${m[1]}${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
}

/**
 * Parse an offset string like "+05:30" or "-10:00" into minutes east of UTC.
 */
export function offsetToMinutes(offset: UtcOffset): number {
  const m = offset.match(/^([+-])(\d{2}):(\d{2})$/)
  if (!m) return 0
  const sign = m[1] === '+' ? 1 : -1
  return sign * (Number(m[2]) * 60 + Number(m[3]))
}

/**
 * Get the correct UTC offset for a given local wall time in a timezone.
 * The naive guess (wall time read as UTC) may land on the wrong side of a
 * DST boundary, so the offset is re-checked at the corrected instant.
 */
export function getOffsetForLocalWallTime(timezone: string, parts: WallClockParts): UtcOffset {
  const wallAsUtc = wallClockToEpoch(parts, 0) * 1000
  const offset1 = getUtcOffsetString(timezone, new Date(wallAsUtc))

  // wallTime = utc + offset
  const correctedUtc = wallAsUtc - offsetToMinutes(offset1) * 60_000
  const offset2 = getUtcOffsetString(timezone, new Date(correctedUtc))
  if (offset1 === offset2) return offset1

  const correctedUtc2 = wallAsUtc - offsetToMinutes(offset2) * 60_000
  return getUtcOffsetString(timezone, new Date(correctedUtc2))
}

/** Epoch seconds of a naive wall-clock read in an IANA zone. */
export function wallClockToEpochInZone(parts: WallClockParts, timezone: string): number {
  return wallClockToEpoch(parts, offsetToMinutes(getOffsetForLocalWallTime(timezone, parts)))
}

/** The wall-clock an observer in `timezone` would have read at `epoch`. */
export function epochToWallClockInZone(epoch: number, timezone: string): WallClockParts {
  const offset = getUtcOffsetString(timezone, new Date(Math.floor(epoch) * 1000))
  return epochToWallClock(epoch, offsetToMinutes(offset))
}
