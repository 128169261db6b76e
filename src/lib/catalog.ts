import { AnnotationPlayback, type PlaybackTransport } from './annotation-playback'
import { AnnotationEditSession, type SessionOutcome } from './annotation-session'
import { AnnotationTimeline } from './annotation-timeline'
import {
  applyTimestampRecord,
  CollectionStore,
  isCompleteTimestamp,
  timestampRecordFromStored,
} from './collection-store'
import type { CollectionSettings } from './config'
import {
  DuplicateFilenameResolver,
  findDuplicateNameGroups,
  fileRenamer,
  type DuplicateGroup,
  type DuplicateResolution,
  type MediaRenamer,
  type RenameDecider,
} from './duplicate-names'
import { InvalidTimestampError } from './errors'
import { createNominatimGeocoder, type ReverseGeocoder } from './geocoding'
import { Logger } from './logger'
import {
  folderEnumerator,
  itemKey,
  mediaItemForPath,
  nextVersionSuffix,
  parseItemKey,
  type MediaEnumerator,
  type MediaFolder,
} from './media-files'
import { orderCatalog } from './media-order'
import {
  createMetadataReader,
  fileStatReader,
  probe,
  type FileStatReader,
  type MetadataReader,
} from './metadata'
import { resolveTimestamp, type ResolverContext } from './timestamp-resolver'
import { inferTimezones } from './timezone-inference'
import { offsetToMinutes, wallClockToEpochInZone } from './timezone'
import type { LatLon, MediaItem, StoredItemRecord, TimestampRecord } from './types'
import { formatWallClock, parseWallClock, wallClockToEpoch } from './wall-clock'

const log = new Logger('catalog')

// ─── Types ──────────────────────────────────────────────────

export interface CatalogOptions {
  /** Defaults to the collection file inside the first folder. */
  store?: CollectionStore
  enumerator?: MediaEnumerator
  metadata?: MetadataReader
  stat?: FileStatReader
  renamer?: MediaRenamer
  /** Asked once per same-name group; declining keeps the rest queued. */
  decideRename?: RenameDecider
  /** Reverse-geocoding client. Takes precedence over `reverseGeocode`. */
  geocoder?: ReverseGeocoder
  /** Look up place names on Nominatim, bounded by the `geocodeTimeoutMs` setting. */
  reverseGeocode?: boolean
  transport?: PlaybackTransport
}

export interface CatalogEntry {
  item: MediaItem
  /** Resolved record, after timezone inference. */
  record: TimestampRecord
  manualEpoch?: number
}

export interface CatalogLoadReport {
  resolved: number
  reused: number
  duplicates: DuplicateResolution
  repairedTimelines: string[]
}

export interface ViewSettings {
  rotation?: number
  volume?: number
  skip?: boolean
}

const declineAll: RenameDecider = () => 'decline'

// ─── Catalog ────────────────────────────────────────────────

/**
 * A loaded collection: its items in capture order, the per-video annotation
 * timelines and edit sessions, and the store they persist to.
 *
 * The current item is tracked by key. Every action that leaves an item or
 * changes its timeline force-flushes that item's edit session first.
 */
export class MediaCatalog {
  private _entries: CatalogEntry[] = []
  private _currentKey: string | undefined
  private _pendingDuplicates: DuplicateGroup[] = []
  private _dirty = false
  private readonly timelines = new Map<string, AnnotationTimeline>()
  private readonly sessions = new Map<string, AnnotationEditSession>()

  private constructor(
    readonly store: CollectionStore,
    private readonly renamer: MediaRenamer,
    private readonly transport: PlaybackTransport | undefined,
  ) {}

  static async open(
    folders: MediaFolder[],
    options: CatalogOptions = {},
  ): Promise<{ catalog: MediaCatalog; report: CatalogLoadReport }> {
    const included = folders.filter(folder => folder.include)
    if (!options.store && included.length === 0) throw new Error('No folder included in the collection')

    const store = options.store ?? await CollectionStore.open(included[0].path)
    const catalog = new MediaCatalog(store, options.renamer ?? fileRenamer, options.transport)
    const report = await catalog.load(folders, options)
    return { catalog, report }
  }

  // ---- Loading ----

  private async load(folders: MediaFolder[], options: CatalogOptions): Promise<CatalogLoadReport> {
    const settings = this.store.settings
    const before = JSON.stringify(this.store.toJSON())
    const geocoder = options.geocoder
      ?? (options.reverseGeocode ? createNominatimGeocoder(settings.geocodeTimeoutMs) : undefined)
    const wantGps = settings.gpsTimeZone || geocoder !== undefined
    const enumerator = options.enumerator ?? folderEnumerator
    const ctx: ResolverContext = {
      metadata: options.metadata ?? createMetadataReader(),
      stat: options.stat ?? fileStatReader,
      naiveTimeZone: settings.naiveTimeZone,
      probeTimeoutMs: settings.probeTimeoutMs,
    }

    const items = this.withLogicalDuplicates(
      (await enumerator.listFiles(folders))
        .map(filePath => mediaItemForPath(filePath))
        .filter((item): item is MediaItem => item !== undefined),
    )

    // Two files answering to one bare name cannot trust the record stored under it
    const nameCounts = new Map<string, number>()
    for (const item of items) nameCounts.set(item.key, (nameCounts.get(item.key) ?? 0) + 1)
    const ambiguous = (item: MediaItem) => (nameCounts.get(item.key) ?? 0) > 1

    let reused = 0
    const resolved: Array<{ item: MediaItem; record: TimestampRecord; gps?: LatLon }> = []
    for (const item of items) {
      const stored = ambiguous(item) ? undefined : this.store.get(item.key)
      const cached = isCompleteTimestamp(stored) ? timestampRecordFromStored(stored) : undefined
      const record = cached ?? await resolveTimestamp(item, ctx)
      if (cached) reused++
      const gps = wantGps ? await this.locate(item, stored, settings, ctx) : undefined
      resolved.push({ item, record, gps })
    }

    const duplicates = await new DuplicateFilenameResolver(this.store, this.renamer)
      .resolve(findDuplicateNameGroups(resolved), options.decideRename ?? declineAll)
    this._pendingDuplicates = [...duplicates.pending, ...duplicates.failed.map(f => f.group)]
    const renamedTo = new Map<MediaItem, MediaItem>()
    for (const { renamed } of duplicates.applied) {
      for (const { from, to } of renamed) renamedTo.set(from, to)
    }

    const inferred = inferTimezones(
      resolved.map(({ item, record, gps }) => ({ key: (renamedTo.get(item) ?? item).key, record, gps })),
      { naiveTimeZone: settings.naiveTimeZone, gpsTimeZone: settings.gpsTimeZone },
    )

    const stillAmbiguous = this.queuedItems()
    this._entries = resolved.map(({ item }, i) => {
      const current = renamedTo.get(item) ?? item
      const record = inferred[i].record
      if (!stillAmbiguous.has(item)) {
        this.store.update(current.key, stored => applyTimestampRecord(stored, record))
      }
      return { item: current, record }
    })
    this._dirty = true

    const located = resolved.map(({ item, gps }) => ({
      key: (renamedTo.get(item) ?? item).key,
      gps,
      ambiguous: stillAmbiguous.has(item),
    }))
    await this.enrichLocations(located, geocoder)

    const repairedTimelines = this.loadTimelines()
    this.reorder()
    this._currentKey = this._entries[0]?.item.key
    if (JSON.stringify(this.store.toJSON()) !== before) await this.save()
    else this._dirty = false

    log.info(`Loaded ${this._entries.length} item(s); ${reused} from cache, ${duplicates.pending.length} rename group(s) queued`)
    return { resolved: items.length - reused, reused, duplicates, repairedTimelines }
  }

  /** Stored keys marked as duplicates of a present item become extra logical items of its file. */
  private withLogicalDuplicates(physical: MediaItem[]): MediaItem[] {
    const byKey = new Map(physical.map(item => [item.key, item]))
    const extra: MediaItem[] = []
    for (const key of this.store.keys()) {
      if (byKey.has(key)) continue
      const source = this.store.get(key)?.duplicate_of
      const original = source === undefined ? undefined : byKey.get(source)
      const { versionSuffix } = parseItemKey(key)
      if (!original || !versionSuffix) continue
      const item = mediaItemForPath(original.path, versionSuffix)
      if (item && item.key === key) extra.push(item)
    }
    return [...physical, ...extra]
  }

  private async locate(
    item: MediaItem,
    stored: StoredItemRecord | undefined,
    settings: CollectionSettings,
    ctx: ResolverContext,
  ): Promise<LatLon | undefined> {
    const known = stored?.location?.latitude_longitude
    if (known) return { lat: known[0], lon: known[1] }
    return probe(`GPS ${item.path}`, () => ctx.metadata.readGps(item.path, item.kind), settings.probeTimeoutMs)
  }

  private async enrichLocations(
    located: Array<{ key: string; gps?: LatLon; ambiguous: boolean }>,
    geocoder: ReverseGeocoder | undefined,
  ): Promise<void> {
    for (const { key, gps, ambiguous } of located) {
      if (!gps || ambiguous) continue
      const stored = this.store.get(key)
      this.store.update(key, record => {
        record.location = { ...record.location, latitude_longitude: [gps.lat, gps.lon] }
      })
      if (!geocoder || stored?.location?.automated_text) continue
      const text = await geocoder.describe(gps.lat, gps.lon)
      if (text) {
        this.store.update(key, record => {
          record.location = { ...record.location, automated_text: text }
        })
      }
    }
  }

  /** Videos still queued for a rename share one bare key and get no timeline until renamed. */
  private loadTimelines(): string[] {
    const queued = this.queuedItems()
    const repaired: string[] = []
    for (const { item } of this._entries) {
      if (item.kind !== 'video' || queued.has(item)) continue
      if (this.loadTimeline(item.key)) repaired.push(item.key)
    }
    return repaired
  }

  /** Attach the stored timeline of `key`; true when it had to be repaired. */
  private loadTimeline(key: string): boolean {
    const stored = this.store.get(key)?.annotations
    const timeline = AnnotationTimeline.fromStored(stored)
    const repaired = stored !== undefined && JSON.stringify(stored) !== JSON.stringify(timeline.toStored())
    if (repaired) {
      log.info(`Repaired annotations of ${key}`)
      this.persistTimeline(key, timeline)
    }
    this.attachTimeline(key, timeline)
    return repaired
  }

  private queuedItems(): Set<MediaItem> {
    return new Set(this._pendingDuplicates.flatMap(group => group.members.map(member => member.item)))
  }

  private attachTimeline(key: string, timeline: AnnotationTimeline): void {
    timeline.setCallbacks({ onSegmentsChanged: () => this.persistTimeline(key, timeline) })
    this.timelines.set(key, timeline)
  }

  private detachTimeline(key: string): void {
    this.timelines.get(key)?.setCallbacks(null)
    this.timelines.delete(key)
    this.sessions.delete(key)
  }

  private persistTimeline(key: string, timeline: AnnotationTimeline): void {
    this.store.update(key, record => { record.annotations = timeline.toStored() })
    this._dirty = true
  }

  // ---- Order & navigation ----

  private manualEpoch(entry: CatalogEntry): number | undefined {
    const manual = this.store.get(entry.item.key)?.creation_time_manual
    const parts = manual === undefined ? undefined : parseWallClock(manual)
    if (!parts) return undefined
    const offset = entry.record.tzOffset ?? entry.record.inferredOffset
    return offset !== undefined
      ? wallClockToEpoch(parts, offsetToMinutes(offset))
      : wallClockToEpochInZone(parts, this.store.settings.naiveTimeZone)
  }

  /** Recompute the order from current records; no record is re-resolved. */
  private reorder(): void {
    this._entries = orderCatalog(this._entries.map(entry => ({ ...entry, manualEpoch: this.manualEpoch(entry) })))
  }

  get entries(): CatalogEntry[] {
    return this._entries.map(entry => ({ ...entry }))
  }

  /** Navigation order; `hideSkipped` leaves out items flagged `skip`. */
  items(hideSkipped = false): MediaItem[] {
    return this._entries
      .map(entry => entry.item)
      .filter(item => !hideSkipped || this.store.get(item.key)?.skip !== true)
  }

  get current(): MediaItem | undefined {
    return this._entries.find(entry => entry.item.key === this._currentKey)?.item
  }

  get pendingDuplicates(): DuplicateGroup[] {
    return [...this._pendingDuplicates]
  }

  get dirty(): boolean {
    return this._dirty
  }

  async goTo(key: string): Promise<MediaItem> {
    const entry = this._entries.find(e => e.item.key === key)
    if (!entry) throw new Error(`Unknown item "${key}"`)
    await this.leaveCurrent()
    this._currentKey = key
    return entry.item
  }

  /** Wraps around at the end. */
  async next(hideSkipped = false): Promise<MediaItem | undefined> {
    return this.step(1, hideSkipped)
  }

  /** Wraps around at the start. */
  async previous(hideSkipped = false): Promise<MediaItem | undefined> {
    return this.step(-1, hideSkipped)
  }

  private async step(direction: 1 | -1, hideSkipped: boolean): Promise<MediaItem | undefined> {
    const items = this.items(hideSkipped)
    if (items.length === 0) return undefined
    const index = items.findIndex(item => item.key === this._currentKey)
    const nextIndex = index < 0
      ? (direction === 1 ? 0 : items.length - 1)
      : (index + direction + items.length) % items.length
    return this.goTo(items[nextIndex].key)
  }

  private async leaveCurrent(): Promise<void> {
    if (this._currentKey !== undefined) this.flushSession(this._currentKey)
    if (this._dirty) await this.save()
  }

  // ---- Timestamps ----

  /** The record that decides an item's place: the manual override if set. */
  effectiveRecord(key: string): TimestampRecord | undefined {
    const entry = this._entries.find(e => e.item.key === key)
    if (!entry) return undefined
    const manual = this.store.get(key)?.creation_time_manual
    const manualEpoch = this.manualEpoch(entry)
    if (manual === undefined || manualEpoch === undefined) return { ...entry.record }
    return { ...entry.record, utcEpoch: manualEpoch, wallClock: manual, source: 'manual' }
  }

  /**
   * Set or clear (empty input) a manual capture time. Invalid input throws
   * and leaves the stored value untouched.
   */
  setManualTimestamp(key: string, input: string): void {
    this.requireEntry(key)
    const trimmed = input.trim()
    if (trimmed === '') {
      this.store.update(key, record => { delete record.creation_time_manual })
    } else {
      const parts = parseWallClock(trimmed)
      if (!parts) throw new InvalidTimestampError(input)
      this.store.update(key, record => { record.creation_time_manual = formatWallClock(parts) })
    }
    this._dirty = true
    this.reorder()
  }

  // ---- Annotations ----

  timeline(key: string): AnnotationTimeline | undefined {
    return this.timelines.get(key)
  }

  /** The one edit session of a video, created on first use. */
  session(key: string): AnnotationEditSession | undefined {
    const existing = this.sessions.get(key)
    if (existing) return existing
    const timeline = this.timelines.get(key)
    if (!timeline) return undefined
    const session = new AnnotationEditSession(timeline, this.transport)
    this.sessions.set(key, session)
    return session
  }

  /** Binds the video's session to `transport` as well, so starting an edit pauses it. */
  playback(key: string, transport: PlaybackTransport, duration?: number): AnnotationPlayback | undefined {
    const timeline = this.timelines.get(key)
    const session = this.session(key)
    if (!timeline || !session) return undefined
    session.setTransport(transport)
    return new AnnotationPlayback(timeline, session, transport, duration)
  }

  flushSession(key: string): SessionOutcome {
    return this.sessions.get(key)?.flush() ?? 'none'
  }

  removeAnnotation(key: string, position: number): 'removed' | 'cleared' {
    const timeline = this.requireTimeline(key)
    this.flushSession(key)
    return timeline.removeActive(position)
  }

  toggleSkip(key: string, position: number): boolean {
    const timeline = this.requireTimeline(key)
    this.flushSession(key)
    return timeline.toggleSkipAt(position).skip
  }

  setImageText(key: string, text: string): void {
    if (this.requireEntry(key).item.kind !== 'image') throw new Error(`"${key}" is not an image`)
    this.store.update(key, record => { record.text = text })
    this._dirty = true
  }

  setViewSettings(key: string, settings: ViewSettings): void {
    this.requireEntry(key)
    this.store.update(key, record => {
      if (settings.rotation !== undefined) record.rotation = settings.rotation
      if (settings.volume !== undefined) record.volume = settings.volume
      if (settings.skip !== undefined) record.skip = settings.skip
    })
    this._dirty = true
  }

  // ---- Duplicates ----

  /** Make a second logical item of the same file under the lowest unused suffix. */
  duplicateItem(key: string): MediaItem {
    const entry = this.requireEntry(key)
    this.flushSession(key)
    const keys = [...this.store.keys(), ...this._entries.map(e => e.item.key)]
    const suffix = nextVersionSuffix(entry.item.fileName, keys)
    const item: MediaItem = { ...entry.item, key: itemKey(entry.item.fileName, suffix), versionSuffix: suffix }

    const copy = this.store.get(key) ?? {}
    this.store.set(item.key, { ...copy, duplicate_of: key })
    this._entries.push({ item, record: { ...entry.record } })
    if (item.kind === 'video') this.attachTimeline(item.key, AnnotationTimeline.fromStored(copy.annotations))
    this._dirty = true
    this.reorder()
    return item
  }

  /** Retry queued same-name groups. Returns what is still queued. */
  async resolvePendingDuplicates(decide: RenameDecider): Promise<DuplicateGroup[]> {
    const result = await new DuplicateFilenameResolver(this.store, this.renamer).resolve(this._pendingDuplicates, decide)
    for (const { renamed } of result.applied) {
      for (const { from, to } of renamed) {
        const entry = this._entries.find(e => e.item === from)
        if (!entry) continue
        entry.item = to
        this.store.update(to.key, stored => applyTimestampRecord(stored, entry.record))
        if (this._currentKey === from.key) this._currentKey = to.key
        this.detachTimeline(from.key)
        if (to.kind === 'video') this.loadTimeline(to.key)
      }
    }
    this._pendingDuplicates = [...result.pending, ...result.failed.map(f => f.group)]
    if (result.applied.length > 0) {
      this._dirty = true
      this.reorder()
    }
    return this.pendingDuplicates
  }

  // ---- Persistence ----

  async save(): Promise<void> {
    await this.store.save()
    this._dirty = false
  }

  private requireEntry(key: string): CatalogEntry {
    const entry = this._entries.find(e => e.item.key === key)
    if (!entry) throw new Error(`Unknown item "${key}"`)
    return entry
  }

  private requireTimeline(key: string): AnnotationTimeline {
    const timeline = this.timelines.get(key)
    if (!timeline) throw new Error(`"${key}" has no annotation timeline`)
    return timeline
  }
}
