export * from './lib/types'
export * from './lib/errors'
export { Logger, LogLevel, parseLogLevel, type LogSink } from './lib/logger'
export {
  defaultSettings,
  parseSettings,
  FAR_FUTURE_EPOCH,
  SKIPPED_SEGMENT_TEXT,
  STORE_FILE_NAME,
  type CollectionSettings,
} from './lib/config'
export { formatWallClock, parseWallClock, type WallClockParts } from './lib/wall-clock'
export { parseFilenameDate } from './lib/filename-date'
export {
  createMetadataReader,
  fileStatReader,
  type FileStatReader,
  type FileTimes,
  type MetadataReader,
  type VideoTags,
} from './lib/metadata'
export { resolveTimestamp, type ResolverContext } from './lib/timestamp-resolver'
export { inferTimezones, type InferenceEntry, type InferenceOptions } from './lib/timezone-inference'
export { orderCatalog, catalogOrderKey, compareOrderKeys, type OrderableEntry } from './lib/media-order'
export {
  folderEnumerator,
  listMediaFiles,
  type MediaEnumerator,
  type MediaFolder,
} from './lib/media-files'
export {
  AnnotationTimeline,
  dedupeSegments,
  type AnnotationSegment,
  type AnnotationTimelineCallbacks,
  type PlaybackResolution,
} from './lib/annotation-timeline'
export { AnnotationEditSession, type EditSessionState, type SessionOutcome } from './lib/annotation-session'
export { AnnotationPlayback, type AnnotationPlaybackCallbacks, type PlaybackTransport } from './lib/annotation-playback'
export { CollectionStore } from './lib/collection-store'
export {
  DuplicateFilenameResolver,
  findDuplicateNameGroups,
  fileRenamer,
  type DuplicateGroup,
  type DuplicateResolution,
  type MediaRenamer,
  type RenameDecider,
} from './lib/duplicate-names'
export { createNominatimGeocoder, type ReverseGeocoder } from './lib/geocoding'
export { MediaCatalog, type CatalogEntry, type CatalogLoadReport, type CatalogOptions, type ViewSettings } from './lib/catalog'
