import { FAR_FUTURE_EPOCH } from './config'
import { parseFilenameDate } from './filename-date'
import { Logger } from './logger'
import { probe, type FileStatReader, type MetadataReader, type VideoTags } from './metadata'
import { epochToWallClockInZone, normalizeOffset, offsetToMinutes, wallClockToEpochInZone } from './timezone'
import type { MediaItem, TimestampRecord, TimestampSource, UtcOffset } from './types'
import {
  formatWallClock,
  isValidCalendar,
  parseWallClock,
  wallClockToEpoch,
  type WallClockParts,
} from './wall-clock'

const log = new Logger('timestamps')

/** Vendor fields that carry the device's UTC offset. */
export const VIDEO_OFFSET_FIELDS = ['com.apple.quicktime.creationdate'] as const

/** Generic video date fields, most trusted first. */
export const VIDEO_GENERIC_FIELDS = [
  'creation_time',
  'date',
  'encoded_date',
  'tagged_date',
  'recorded_date',
] as const

export interface ResolverContext {
  metadata: MetadataReader
  stat: FileStatReader
  naiveTimeZone: string
  probeTimeoutMs: number
}

// ─── Record construction ────────────────────────────────────

export function unresolvedRecord(): TimestampRecord {
  return { utcEpoch: FAR_FUTURE_EPOCH, wallClock: '', hasTimezone: false, source: 'unresolved' }
}

/** A record whose wall-clock carries no offset; its epoch is read in `naiveTimeZone`. */
export function naiveRecord(parts: WallClockParts, source: TimestampSource, naiveTimeZone: string): TimestampRecord {
  return {
    utcEpoch: wallClockToEpochInZone(parts, naiveTimeZone),
    wallClock: formatWallClock(parts),
    hasTimezone: false,
    source,
  }
}

export function explicitRecord(parts: WallClockParts, offset: UtcOffset, source: TimestampSource): TimestampRecord {
  return {
    utcEpoch: wallClockToEpoch(parts, offsetToMinutes(offset)),
    wallClock: formatWallClock(parts),
    hasTimezone: true,
    tzOffset: offset,
    source,
  }
}

/** An absolute instant with no known local offset, shown as naive time in `naiveTimeZone`. */
function instantRecord(epoch: number, source: TimestampSource, naiveTimeZone: string): TimestampRecord {
  return {
    utcEpoch: epoch,
    wallClock: formatWallClock(epochToWallClockInZone(epoch, naiveTimeZone)),
    hasTimezone: false,
    exactInstant: true,
    source,
  }
}

// ─── Metadata values ────────────────────────────────────────

const METADATA_DATE_PATTERN =
  /^(\d{4})[-:/](\d{2})[-:/](\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?\s*(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Parse a metadata date value. Offsets become explicit records; a `Z`
 * suffix or `UTC ` prefix marks an instant, which is shown as naive local
 * time. Container zero dates (1970 and earlier) are rejected.
 */
export function parseMetadataDate(
  raw: string,
  source: TimestampSource,
  naiveTimeZone: string,
): TimestampRecord | undefined {
  let value = raw.trim()
  let utc = false
  if (/^UTC\s+/i.test(value)) {
    utc = true
    value = value.replace(/^UTC\s+/i, '')
  }

  const m = value.match(METADATA_DATE_PATTERN)
  if (!m) return undefined
  const parts: WallClockParts = {
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
    hour: Number(m[4]),
    minute: Number(m[5]),
    second: Number(m[6] ?? '0'),
  }
  if (!isValidCalendar(parts) || parts.year <= 1970) return undefined

  const zone = m[7]
  if (utc || zone?.toUpperCase() === 'Z') {
    return instantRecord(wallClockToEpoch(parts, 0), source, naiveTimeZone)
  }
  if (zone) {
    const offset = normalizeOffset(zone)
    return offset ? explicitRecord(parts, offset, source) : undefined
  }
  return naiveRecord(parts, source, naiveTimeZone)
}

/**
 * Rank the video tags: a vendor field with an explicit offset first, then the
 * generic fields in priority order, then a vendor field without an offset.
 */
export function resolveFromVideoTags(tags: VideoTags, naiveTimeZone: string): TimestampRecord | undefined {
  const vendor = VIDEO_OFFSET_FIELDS
    .map(field => tags[field])
    .filter((value): value is string => value !== undefined)
    .map(value => parseMetadataDate(value, 'device-metadata', naiveTimeZone))

  const explicit = vendor.find(record => record?.hasTimezone)
  if (explicit) return explicit

  for (const field of VIDEO_GENERIC_FIELDS) {
    const value = tags[field]
    if (value === undefined) continue
    const record = parseMetadataDate(value, 'generic-video-metadata', naiveTimeZone)
    if (record) return record
    log.debug(`Unparseable ${field} value "${value}"`)
  }

  return vendor.find(record => record !== undefined)
}

// ─── Resolution ─────────────────────────────────────────────

/** Earliest positive birth/modify/change time, in whole seconds. */
function earliestFileTime(times: { birthtimeMs: number; mtimeMs: number; ctimeMs: number }): number | undefined {
  const candidates = [times.birthtimeMs, times.mtimeMs, times.ctimeMs].filter(ms => Number.isFinite(ms) && ms > 0)
  if (candidates.length === 0) return undefined
  return Math.floor(Math.min(...candidates) / 1000)
}

/**
 * Resolve the capture time of one item from its best available source.
 * Never rejects: every failing source is skipped, and an item nothing can
 * date gets the far-future sentinel.
 */
export async function resolveTimestamp(item: MediaItem, ctx: ResolverContext): Promise<TimestampRecord> {
  const { naiveTimeZone, probeTimeoutMs } = ctx

  if (item.kind === 'image') {
    const raw = await probe(`EXIF ${item.path}`, () => ctx.metadata.readImageDate(item.path), probeTimeoutMs)
    // Cameras record local time without an offset
    const parts = raw ? parseWallClock(raw) : undefined
    if (parts && parts.year > 1970) return naiveRecord(parts, 'device-metadata', naiveTimeZone)
  } else {
    const tags = await probe(`video tags ${item.path}`, () => ctx.metadata.readVideoTags(item.path), probeTimeoutMs)
    const record = tags ? resolveFromVideoTags(tags, naiveTimeZone) : undefined
    if (record) return record
  }

  const fromName = parseFilenameDate(item.fileName)
  if (fromName) return naiveRecord(fromName, 'filename-pattern', naiveTimeZone)

  const times = await probe(`stat ${item.path}`, () => ctx.stat.statTimes(item.path), probeTimeoutMs)
  const epoch = times ? earliestFileTime(times) : undefined
  if (epoch !== undefined) return instantRecord(epoch, 'filesystem', naiveTimeZone)

  log.info(`No capture time for ${item.key}`)
  return unresolvedRecord()
}
