import { Logger } from './logger'
import {
  epochToWallClockInZone,
  getOffsetForLocalWallTime,
  getTimezoneFromCoords,
  getUtcOffsetString,
  offsetToMinutes,
  wallClockToEpochInZone,
} from './timezone'
import type { LatLon, TimestampRecord, UtcOffset } from './types'
import { epochToWallClock, formatWallClock, parseWallClock, wallClockToEpoch } from './wall-clock'

const log = new Logger('timezone-inference')

export interface InferenceEntry {
  key: string
  record: TimestampRecord
  gps?: LatLon
}

export interface InferenceOptions {
  naiveTimeZone: string
  /** Prefer an offset looked up from the item's own coordinates. */
  gpsTimeZone?: boolean
}

/**
 * Drop a previously inferred offset and go back to the naive epoch, so every
 * pass starts from the evidence alone.
 */
function withoutInferredOffset(record: TimestampRecord, naiveTimeZone: string): TimestampRecord {
  if (record.inferredOffset === undefined) return record
  const rest: TimestampRecord = { ...record }
  delete rest.inferredOffset
  if (record.exactInstant) {
    return { ...rest, wallClock: formatWallClock(epochToWallClockInZone(record.utcEpoch, naiveTimeZone)) }
  }
  const parts = parseWallClock(record.wallClock)
  return parts ? { ...rest, utcEpoch: wallClockToEpochInZone(parts, naiveTimeZone) } : rest
}

function offsetFromCoords(gps: LatLon, record: TimestampRecord, key: string): UtcOffset | undefined {
  try {
    const zone = getTimezoneFromCoords(gps.lat, gps.lon)
    if (record.exactInstant) return getUtcOffsetString(zone, new Date(record.utcEpoch * 1000))
    const parts = parseWallClock(record.wallClock)
    return parts ? getOffsetForLocalWallTime(zone, parts) : undefined
  } catch (err) {
    log.warn(`No timezone for ${key} at ${gps.lat},${gps.lon}:`, err instanceof Error ? err.message : err)
    return undefined
  }
}

/**
 * Fill in missing UTC offsets from temporal neighbours.
 *
 * Records are walked in capture order carrying the last explicit (or
 * inferred) offset; a record without one borrows the running value and its
 * epoch is recomputed from its own wall-clock at that offset. Explicit
 * offsets are never touched. An exact instant keeps its epoch; only its
 * wall-clock is re-rendered at the borrowed offset. Inferred offsets are
 * recomputed on every pass, which makes the pass idempotent. Entries come
 * back in input order.
 */
export function inferTimezones(entries: InferenceEntry[], options: InferenceOptions): InferenceEntry[] {
  const reset = entries.map(entry => ({
    ...entry,
    record: entry.record.hasTimezone ? entry.record : withoutInferredOffset(entry.record, options.naiveTimeZone),
  }))

  const order = reset
    .map((entry, index) => ({ entry, index }))
    .sort((a, b) => a.entry.record.utcEpoch - b.entry.record.utcEpoch)

  let running: UtcOffset | undefined
  for (const { entry } of order) {
    const { record } = entry
    if (record.source === 'unresolved') continue
    if (record.hasTimezone) {
      running = record.tzOffset
      continue
    }

    const parts = parseWallClock(record.wallClock)
    if (!parts) continue

    let offset = running
    if (options.gpsTimeZone && entry.gps) {
      const fromGps = offsetFromCoords(entry.gps, record, entry.key)
      if (fromGps) {
        offset = fromGps
        running = fromGps
      }
    }
    if (offset === undefined) continue

    entry.record = record.exactInstant
      ? {
        ...record,
        inferredOffset: offset,
        wallClock: formatWallClock(epochToWallClock(record.utcEpoch, offsetToMinutes(offset))),
      }
      : {
        ...record,
        inferredOffset: offset,
        utcEpoch: wallClockToEpoch(parts, offsetToMinutes(offset)),
      }
  }

  return reset
}
