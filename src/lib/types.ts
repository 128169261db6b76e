export type MediaKind = 'image' | 'video'

/** Signed UTC offset in `±HH:MM` form, e.g. "+07:00", "-10:00". */
export type UtcOffset = string

export type TimestampSource =
  | 'device-metadata'
  | 'generic-video-metadata'
  | 'filename-pattern'
  | 'filesystem'
  | 'manual'
  | 'unresolved'

export interface TimestampRecord {
  /** Seconds since the Unix epoch. */
  utcEpoch: number
  /** Device-local calendar time, `YYYY/MM/DD HH:MM:SS`. Empty when unresolved. */
  wallClock: string
  hasTimezone: boolean
  /** Offset recorded by the device. Present iff `hasTimezone`. */
  tzOffset?: UtcOffset
  /** Offset borrowed from neighbouring captures (or GPS); never set when `tzOffset` is. */
  inferredOffset?: UtcOffset
  /**
   * `utcEpoch` is an exact instant (a UTC-tagged value) and `wallClock` is
   * rendered from it, not recorded by the device.
   */
  exactInstant?: boolean
  source: TimestampSource
}

/**
 * One logical entry of the collection. Several logical items may point at
 * the same physical file, distinguished by `versionSuffix`.
 */
export interface MediaItem {
  /** Store key: `fileName` or `fileName##versionSuffix`. */
  key: string
  /** Logical file name with any embedded version suffix removed. */
  fileName: string
  /** Absolute path of the physical file. */
  path: string
  versionSuffix?: string
  kind: MediaKind
}

export interface LatLon {
  lat: number
  lon: number
}

export interface StoredAnnotation {
  time: number
  text: string
  skip?: boolean
}

export interface StoredLocation {
  manual_text?: string
  automated_text?: string
  latitude_longitude?: [number, number]
}

/** Per-item record as persisted in the collection file. Unknown fields are kept. */
export interface StoredItemRecord {
  annotations?: StoredAnnotation[]
  text?: string
  creation_time_utc?: number
  local_time_zone?: UtcOffset
  local_time_zone_inferred?: UtcOffset
  creation_local_naive?: string
  creation_date_time?: string
  creation_time_manual?: string
  creation_time_source?: TimestampSource
  creation_time_exact?: boolean
  location?: StoredLocation
  rotation?: number
  volume?: number
  skip?: boolean
  crop?: unknown
  /** Key of the item this logical duplicate was made from. */
  duplicate_of?: string
  [field: string]: unknown
}
