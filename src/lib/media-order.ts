import { FAR_FUTURE_EPOCH } from './config'
import { compareVersionSuffixes } from './media-files'
import type { MediaItem, TimestampRecord } from './types'

export interface OrderableEntry {
  item: MediaItem
  record?: TimestampRecord
  /** Epoch of the manual override, when one is set. */
  manualEpoch?: number
}

export interface CatalogOrderKey {
  epoch: number
  versionSuffix?: string
}

/** Derived on every sort; never stored. */
export function catalogOrderKey(entry: OrderableEntry): CatalogOrderKey {
  const epoch = entry.manualEpoch ?? entry.record?.utcEpoch ?? FAR_FUTURE_EPOCH
  return {
    epoch: Number.isFinite(epoch) ? epoch : FAR_FUTURE_EPOCH,
    versionSuffix: entry.item.versionSuffix,
  }
}

export function compareOrderKeys(a: CatalogOrderKey, b: CatalogOrderKey): number {
  if (a.epoch !== b.epoch) return a.epoch - b.epoch
  return compareVersionSuffixes(a.versionSuffix, b.versionSuffix)
}

/**
 * Total order over the logical items of a collection. Items with equal
 * epochs and suffixes keep their input order.
 */
export function orderCatalog<T extends OrderableEntry>(entries: readonly T[]): T[] {
  return entries
    .map(entry => ({ entry, key: catalogOrderKey(entry) }))
    .sort((a, b) => compareOrderKeys(a.key, b.key))
    .map(({ entry }) => entry)
}
