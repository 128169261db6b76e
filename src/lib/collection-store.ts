import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { parseSettings, SETTINGS_KEY, STORE_FILE_NAME, type CollectionSettings } from './config'
import { StoreFormatError } from './errors'
import { Logger } from './logger'
import type { StoredAnnotation, StoredItemRecord, StoredLocation, TimestampRecord, TimestampSource } from './types'

const log = new Logger('store')

const TIMESTAMP_SOURCES: readonly TimestampSource[] = [
  'device-metadata',
  'generic-video-metadata',
  'filename-pattern',
  'filesystem',
  'manual',
  'unresolved',
]

// ─── Record validation ──────────────────────────────────────

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function parseAnnotations(value: unknown): StoredAnnotation[] | undefined {
  if (!Array.isArray(value)) return undefined
  const annotations: StoredAnnotation[] = []
  for (const entry of value) {
    if (!isPlainObject(entry) || typeof entry.time !== 'number' || !Number.isFinite(entry.time)) continue
    const annotation: StoredAnnotation = { time: entry.time, text: typeof entry.text === 'string' ? entry.text : '' }
    if (entry.skip === true) annotation.skip = true
    annotations.push(annotation)
  }
  return annotations
}

function parseLocation(value: unknown): StoredLocation | undefined {
  if (!isPlainObject(value)) return undefined
  const location: StoredLocation = {}
  if (typeof value.manual_text === 'string') location.manual_text = value.manual_text
  if (typeof value.automated_text === 'string') location.automated_text = value.automated_text
  const coords = value.latitude_longitude
  if (Array.isArray(coords) && coords.length === 2 && typeof coords[0] === 'number' && typeof coords[1] === 'number') {
    location.latitude_longitude = [coords[0], coords[1]]
  }
  return location
}

const STRING_FIELDS = [
  'text',
  'local_time_zone',
  'local_time_zone_inferred',
  'creation_local_naive',
  'creation_date_time',
  'creation_time_manual',
  'duplicate_of',
] as const

const NUMBER_FIELDS = ['creation_time_utc', 'rotation', 'volume'] as const

/**
 * Validate the known fields of one stored item. Fields of the wrong type are
 * dropped; fields this library does not know are kept as they are.
 */
export function parseItemRecord(key: string, raw: unknown): StoredItemRecord | undefined {
  if (!isPlainObject(raw)) {
    log.warn(`Dropping non-object record for "${key}"`)
    return undefined
  }
  const record: StoredItemRecord = {}
  for (const [field, value] of Object.entries(raw)) record[field] = value
  const drop = (field: string) => {
    log.warn(`Dropping invalid ${field} of "${key}"`)
    delete record[field]
  }

  for (const field of STRING_FIELDS) {
    if (field in record && typeof record[field] !== 'string') drop(field)
  }
  for (const field of NUMBER_FIELDS) {
    const value = record[field]
    if (field in record && (typeof value !== 'number' || !Number.isFinite(value))) drop(field)
  }
  for (const field of ['skip', 'creation_time_exact'] as const) {
    if (field in record && typeof record[field] !== 'boolean') drop(field)
  }
  if ('creation_time_source' in record) {
    const source = TIMESTAMP_SOURCES.find(s => s === record.creation_time_source)
    if (source) record.creation_time_source = source
    else drop('creation_time_source')
  }
  if ('annotations' in record) {
    const annotations = parseAnnotations(raw.annotations)
    if (annotations) record.annotations = annotations
    else drop('annotations')
  }
  if ('location' in record) {
    const location = parseLocation(raw.location)
    if (location) record.location = location
    else drop('location')
  }
  return record
}

// ─── Timestamp fields ───────────────────────────────────────

export function timestampRecordFromStored(stored: StoredItemRecord | undefined): TimestampRecord | undefined {
  if (stored?.creation_time_utc === undefined || stored.creation_date_time === undefined) return undefined
  const record: TimestampRecord = {
    utcEpoch: stored.creation_time_utc,
    wallClock: stored.creation_date_time,
    hasTimezone: stored.local_time_zone !== undefined,
    source: stored.creation_time_source ?? 'filesystem',
  }
  if (stored.local_time_zone !== undefined) record.tzOffset = stored.local_time_zone
  else if (stored.local_time_zone_inferred !== undefined) record.inferredOffset = stored.local_time_zone_inferred
  if (stored.creation_time_exact === true && stored.local_time_zone === undefined) record.exactInstant = true
  return record
}

/** A stored record is reused as-is only when it has an epoch and some offset. */
export function isCompleteTimestamp(stored: StoredItemRecord | undefined): boolean {
  return stored?.creation_time_utc !== undefined
    && stored.creation_date_time !== undefined
    && (stored.local_time_zone !== undefined || stored.local_time_zone_inferred !== undefined)
}

export function applyTimestampRecord(stored: StoredItemRecord, record: TimestampRecord): void {
  stored.creation_time_utc = record.utcEpoch
  stored.creation_date_time = record.wallClock
  stored.creation_time_source = record.source
  delete stored.local_time_zone
  delete stored.local_time_zone_inferred
  delete stored.creation_local_naive
  delete stored.creation_time_exact
  if (record.tzOffset !== undefined) stored.local_time_zone = record.tzOffset
  else {
    if (record.inferredOffset !== undefined) stored.local_time_zone_inferred = record.inferredOffset
    if (record.exactInstant) stored.creation_time_exact = true
    else if (record.wallClock) stored.creation_local_naive = record.wallClock
  }
}

// ─── Store ──────────────────────────────────────────────────

export function backupFileName(fileName: string, now: Date): string {
  const ext = path.extname(fileName)
  const stem = ext ? fileName.slice(0, -ext.length) : fileName
  return `${stem}.backup-${now.toISOString().replace(/[:.]/g, '-')}${ext}`
}

/**
 * One JSON document per collection mapping item keys to their records, plus
 * the `_settings` entry.
 */
export class CollectionStore {
  private _records: Map<string, StoredItemRecord>
  private _rawSettings: Record<string, unknown>
  private _settings: CollectionSettings

  private constructor(
    readonly filePath: string,
    records: Map<string, StoredItemRecord>,
    rawSettings: Record<string, unknown>,
  ) {
    this._records = records
    this._rawSettings = rawSettings
    this._settings = parseSettings(rawSettings)
  }

  /** A missing file opens as an empty collection. */
  static async open(folder: string, fileName = STORE_FILE_NAME): Promise<CollectionStore> {
    const filePath = path.join(folder, fileName)
    let text: string
    try {
      text = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return new CollectionStore(filePath, new Map(), {})
      }
      throw err
    }
    return CollectionStore.fromJSON(filePath, text)
  }

  static fromJSON(filePath: string, text: string): CollectionStore {
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (err) {
      throw new StoreFormatError(filePath, err instanceof Error ? err.message : 'invalid JSON')
    }
    if (!isPlainObject(parsed)) throw new StoreFormatError(filePath, 'top level is not an object')

    const records = new Map<string, StoredItemRecord>()
    let rawSettings: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(parsed)) {
      if (key === SETTINGS_KEY) {
        if (isPlainObject(value)) rawSettings = value
        continue
      }
      const record = parseItemRecord(key, value)
      if (record) records.set(key, record)
    }
    return new CollectionStore(filePath, records, rawSettings)
  }

  get settings(): CollectionSettings {
    return { ...this._settings }
  }

  updateSettings(changes: Partial<CollectionSettings>): void {
    this._rawSettings = { ...this._rawSettings, ...changes }
    this._settings = parseSettings(this._rawSettings)
  }

  keys(): string[] {
    return [...this._records.keys()]
  }

  has(key: string): boolean {
    return this._records.has(key)
  }

  get(key: string): StoredItemRecord | undefined {
    const record = this._records.get(key)
    return record ? structuredClone(record) : undefined
  }

  /** Change a record in place, creating it when missing. */
  update(key: string, change: (record: StoredItemRecord) => void): StoredItemRecord {
    const record = this._records.get(key) ?? {}
    change(record)
    this._records.set(key, record)
    return structuredClone(record)
  }

  set(key: string, record: StoredItemRecord): void {
    this._records.set(key, structuredClone(record))
  }

  delete(key: string): boolean {
    return this._records.delete(key)
  }

  /** Move a record to an unused key. */
  relocate(fromKey: string, toKey: string): void {
    if (this._records.has(toKey)) throw new Error(`Cannot relocate "${fromKey}": "${toKey}" already has a record`)
    const record = this._records.get(fromKey)
    if (!record) return
    this._records.delete(fromKey)
    this._records.set(toKey, record)
  }

  /** Copy of every record, for rolling back a group of changes. */
  snapshot(): Map<string, StoredItemRecord> {
    return structuredClone(this._records)
  }

  restore(snapshot: Map<string, StoredItemRecord>): void {
    this._records = structuredClone(snapshot)
  }

  toJSON(): Record<string, unknown> {
    const doc: Record<string, unknown> = {}
    for (const key of [...this._records.keys()].sort()) doc[key] = this._records.get(key)
    if (Object.keys(this._rawSettings).length > 0) doc[SETTINGS_KEY] = this._rawSettings
    return doc
  }

  /**
   * Write the collection file, then a timestamped backup copy beside it.
   * The primary file is replaced through a temporary file so a crash never
   * leaves it half written.
   */
  async save(now: Date = new Date()): Promise<void> {
    const folder = path.dirname(this.filePath)
    const fileName = path.basename(this.filePath)
    const text = `${JSON.stringify(this.toJSON(), null, 2)}\n`

    await mkdir(folder, { recursive: true })
    const tmpPath = `${this.filePath}.tmp`
    await writeFile(tmpPath, text, 'utf-8')
    await rename(tmpPath, this.filePath)

    if (!this._settings.backupOnSave) return
    await writeFile(path.join(folder, backupFileName(fileName, now)), text, 'utf-8')
    await this.pruneBackups(folder, fileName)
  }

  private async pruneBackups(folder: string, fileName: string): Promise<void> {
    const ext = path.extname(fileName)
    const prefix = `${ext ? fileName.slice(0, -ext.length) : fileName}.backup-`
    const backups = (await readdir(folder))
      .filter(name => name.startsWith(prefix) && name.endsWith(ext))
      .sort()
    const excess = backups.slice(0, Math.max(0, backups.length - this._settings.maxBackups))
    for (const name of excess) {
      await rm(path.join(folder, name), { force: true })
    }
  }
}
