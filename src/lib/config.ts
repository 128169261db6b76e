import { Logger } from './logger'

const log = new Logger('config')

// ─── Constants ──────────────────────────────────────────────

export const SUPPORTED_IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['.jpg', '.jpeg', '.png', '.bmp', '.gif'])
export const SUPPORTED_VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(['.mp4', '.mov', '.avi', '.mkv'])

/** 9999-12-31T23:59:59Z. Items nothing could date sort after everything else. */
export const FAR_FUTURE_EPOCH = 253_402_300_799

export const STORE_FILE_NAME = 'annotations.json'
export const SETTINGS_KEY = '_settings'
export const VERSION_SEPARATOR = '##'

/** Shown instead of a skip segment's own text while playback is not advancing. */
export const SKIPPED_SEGMENT_TEXT = 'segment skipped'

// ─── Collection settings ────────────────────────────────────

export interface CollectionSettings {
  /** IANA zone used to turn naive wall-clock times into epochs. */
  naiveTimeZone: string
  /** Look up inferred offsets from GPS coordinates when an item has them. */
  gpsTimeZone: boolean
  probeTimeoutMs: number
  geocodeTimeoutMs: number
  backupOnSave: boolean
  /** Oldest backups beyond this count are deleted after a save. */
  maxBackups: number
}

export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

export function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: zone })
    return true
  } catch {
    return false
  }
}

export function defaultSettings(): CollectionSettings {
  return {
    naiveTimeZone: hostTimeZone(),
    gpsTimeZone: false,
    probeTimeoutMs: 5_000,
    geocodeTimeoutMs: 3_000,
    backupOnSave: true,
    maxBackups: 10,
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function positiveInteger(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : undefined
}

/**
 * Read the `_settings` entry of a collection file. Each invalid field falls
 * back to its default on its own; unknown fields are ignored.
 */
export function parseSettings(raw: unknown): CollectionSettings {
  const settings = defaultSettings()
  if (raw === undefined) return settings
  if (!isPlainObject(raw)) {
    log.warn('Ignoring non-object _settings entry')
    return settings
  }

  const invalid = (field: string) => log.warn(`Invalid value for ${field}; using default`)

  if (raw.naiveTimeZone !== undefined) {
    if (typeof raw.naiveTimeZone === 'string' && isValidTimeZone(raw.naiveTimeZone)) {
      settings.naiveTimeZone = raw.naiveTimeZone
    } else invalid('naiveTimeZone')
  }
  if (raw.gpsTimeZone !== undefined) {
    if (typeof raw.gpsTimeZone === 'boolean') settings.gpsTimeZone = raw.gpsTimeZone
    else invalid('gpsTimeZone')
  }
  if (raw.backupOnSave !== undefined) {
    if (typeof raw.backupOnSave === 'boolean') settings.backupOnSave = raw.backupOnSave
    else invalid('backupOnSave')
  }
  for (const field of ['probeTimeoutMs', 'geocodeTimeoutMs', 'maxBackups'] as const) {
    if (raw[field] === undefined) continue
    const value = positiveInteger(raw[field])
    if (value !== undefined) settings[field] = value
    else invalid(field)
  }

  return settings
}
