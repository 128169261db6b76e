import { describe, it, expect } from 'vitest'
import { FAR_FUTURE_EPOCH } from '@/lib/config'
import { catalogOrderKey, compareOrderKeys, orderCatalog, type OrderableEntry } from '@/lib/media-order'
import type { TimestampRecord } from '@/lib/types'

function makeEntry(key: string, epoch?: number, versionSuffix?: string, manualEpoch?: number): OrderableEntry {
  const record: TimestampRecord | undefined = epoch === undefined
    ? undefined
    : { utcEpoch: epoch, wallClock: '', hasTimezone: false, source: 'filesystem' }
  return {
    item: { key, fileName: key, path: `/media/${key}`, kind: 'image', versionSuffix },
    record,
    manualEpoch,
  }
}

const keys = (entries: OrderableEntry[]) => entries.map(e => e.item.key)

describe('catalogOrderKey', () => {
  it('prefers the manual epoch', () => {
    expect(catalogOrderKey(makeEntry('a.jpg', 100, undefined, 50))).toEqual({ epoch: 50, versionSuffix: undefined })
  })

  it('uses the far-future sentinel without a record', () => {
    expect(catalogOrderKey(makeEntry('a.jpg')).epoch).toBe(FAR_FUTURE_EPOCH)
  })
})

describe('compareOrderKeys', () => {
  it('orders numeric suffixes numerically after the bare item', () => {
    expect(compareOrderKeys({ epoch: 1 }, { epoch: 1, versionSuffix: '1' })).toBeLessThan(0)
    expect(compareOrderKeys({ epoch: 1, versionSuffix: '10' }, { epoch: 1, versionSuffix: '9' })).toBeGreaterThan(0)
  })
})

describe('orderCatalog', () => {
  it('sorts by capture time', () => {
    const ordered = orderCatalog([makeEntry('c.jpg', 300), makeEntry('a.jpg', 100), makeEntry('b.jpg', 200)])
    expect(keys(ordered)).toEqual(['a.jpg', 'b.jpg', 'c.jpg'])
  })

  it('puts undated items last', () => {
    const ordered = orderCatalog([makeEntry('mystery.jpg'), makeEntry('a.jpg', 100)])
    expect(keys(ordered)).toEqual(['a.jpg', 'mystery.jpg'])
  })

  it('breaks epoch ties by version suffix', () => {
    const ordered = orderCatalog([
      makeEntry('beach.jpg##2', 100, '2'),
      makeEntry('beach.jpg##1', 100, '1'),
    ])
    expect(keys(ordered)).toEqual(['beach.jpg##1', 'beach.jpg##2'])
  })

  it('lets a manual time move an item', () => {
    const ordered = orderCatalog([makeEntry('a.jpg', 100), makeEntry('b.jpg', 200, undefined, 50)])
    expect(keys(ordered)).toEqual(['b.jpg', 'a.jpg'])
  })

  it('keeps input order for full ties', () => {
    const ordered = orderCatalog([makeEntry('x.jpg', 100), makeEntry('y.jpg', 100)])
    expect(keys(ordered)).toEqual(['x.jpg', 'y.jpg'])
  })
})
