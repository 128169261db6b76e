import { SKIPPED_SEGMENT_TEXT } from './config'
import type { StoredAnnotation } from './types'

export interface AnnotationSegment {
  /** Stable within one timeline; not persisted. */
  readonly id: number
  /** Seconds from the start of the video. */
  startTime: number
  text: string
  skip: boolean
}

export interface SegmentInput {
  startTime: number
  text: string
  skip?: boolean
}

/**
 * Callback interface for AnnotationTimeline to notify its owner of changes
 * without importing the catalog.
 */
export interface AnnotationTimelineCallbacks {
  onSegmentsChanged(segments: readonly AnnotationSegment[]): void
}

export type PlaybackResolution =
  | { kind: 'show'; segment: AnnotationSegment; text: string }
  /** Paused or scrubbed onto a skip segment. */
  | { kind: 'skipped'; segment: AnnotationSegment; text: string }
  /** Advancing onto a skip segment: jump to the next segment. */
  | { kind: 'seek'; segment: AnnotationSegment; to: number }
  /** Advancing onto a trailing skip segment: nothing left to show. */
  | { kind: 'stop'; segment: AnnotationSegment; at?: number }

export interface PlaybackContext {
  /** True while playback moves forward by itself. */
  advancing: boolean
  /** Media length in seconds, when known. */
  duration?: number
}

// ─── Normalisation ──────────────────────────────────────────

/** Clamp to ≥ 0 and round to the millisecond so equal times compare equal. */
export function normalizeStartTime(startTime: number): number {
  if (!Number.isFinite(startTime) || startTime <= 0) return 0
  return Math.round(startTime * 1000) / 1000
}

const hasText = (segment: { text: string }) => segment.text.trim() !== ''

function keepRank(segment: { text: string; skip: boolean }): number {
  return (hasText(segment) ? 2 : 0) + (segment.skip ? 1 : 0)
}

/**
 * Keep one segment per start time: non-empty text first, then `skip`, then
 * the first encountered. Output is sorted by start time; input order decides
 * which segment counts as encountered first.
 */
export function dedupeSegments<T extends { startTime: number; text: string; skip: boolean }>(segments: readonly T[]): T[] {
  const sorted = [...segments].sort((a, b) => a.startTime - b.startTime)
  const kept: T[] = []
  for (const segment of sorted) {
    const last = kept[kept.length - 1]
    if (last && last.startTime === segment.startTime) {
      if (keepRank(segment) > keepRank(last)) kept[kept.length - 1] = segment
    } else {
      kept.push(segment)
    }
  }
  return kept
}

// ─── Timeline ───────────────────────────────────────────────

/**
 * The annotations of one video, always sorted by start time, free of
 * duplicate start times, and holding a baseline segment at 0 so that every
 * playback position has an active segment.
 */
export class AnnotationTimeline {
  private _segments: AnnotationSegment[] = []
  private _nextId = 1
  private _callbacks: AnnotationTimelineCallbacks | null = null

  constructor(initial: readonly SegmentInput[] = []) {
    this._segments = this.normalize(initial.map(s => this.create(s.startTime, s.text, s.skip ?? false)))
  }

  static fromStored(annotations: readonly StoredAnnotation[] | undefined): AnnotationTimeline {
    return new AnnotationTimeline((annotations ?? []).map(a => ({ startTime: a.time, text: a.text, skip: a.skip })))
  }

  setCallbacks(callbacks: AnnotationTimelineCallbacks | null): void {
    this._callbacks = callbacks
  }

  // ---- Read-only accessors ----

  get segments(): AnnotationSegment[] {
    return this._segments.map(s => ({ ...s }))
  }

  get length(): number {
    return this._segments.length
  }

  getSegment(id: number): AnnotationSegment | undefined {
    const segment = this._segments.find(s => s.id === id)
    return segment ? { ...segment } : undefined
  }

  /** Exact start-time match. */
  segmentAt(startTime: number): AnnotationSegment | undefined {
    const time = normalizeStartTime(startTime)
    const segment = this._segments.find(s => s.startTime === time)
    return segment ? { ...segment } : undefined
  }

  /** The last segment starting at or before `position`. */
  activeSegment(position: number): AnnotationSegment {
    return { ...this._segments[this.activeIndex(position)] }
  }

  nextSegment(id: number): AnnotationSegment | undefined {
    const index = this._segments.findIndex(s => s.id === id)
    const next = index >= 0 ? this._segments[index + 1] : undefined
    return next ? { ...next } : undefined
  }

  /**
   * What playback should do at `position`. Pure: the same input always gives
   * the same answer.
   */
  resolvePlayback(position: number, context: PlaybackContext): PlaybackResolution {
    const index = this.activeIndex(position)
    const segment = { ...this._segments[index] }
    if (!segment.skip) return { kind: 'show', segment, text: segment.text }
    if (!context.advancing) return { kind: 'skipped', segment, text: SKIPPED_SEGMENT_TEXT }

    const next = this._segments[index + 1]
    if (next) return { kind: 'seek', segment, to: next.startTime }
    return { kind: 'stop', segment, at: context.duration }
  }

  toStored(): StoredAnnotation[] {
    return this._segments.map(s => (s.skip
      ? { time: s.startTime, text: s.text, skip: true }
      : { time: s.startTime, text: s.text }))
  }

  // ---- Mutation operations ----

  /** Add a segment and return whichever segment holds that start time afterwards. */
  insert(startTime: number, text: string, skip = false): AnnotationSegment {
    const segment = this.create(startTime, text, skip)
    this.apply(segments => [...segments, segment])
    return this.activeSegment(segment.startTime)
  }

  setText(id: number, text: string): void {
    this.update(id, segment => { segment.text = text })
  }

  setSkip(id: number, skip: boolean): void {
    this.update(id, segment => { segment.skip = skip })
  }

  /**
   * Move a segment in time. Returns the segment holding the new start time
   * afterwards, which is another one if the moved segment lost the dedup.
   */
  setStartTime(id: number, startTime: number): AnnotationSegment | undefined {
    const time = normalizeStartTime(startTime)
    if (!this.update(id, segment => { segment.startTime = time })) return undefined
    return this.segmentAt(time)
  }

  toggleSkipAt(position: number): AnnotationSegment {
    const active = this._segments[this.activeIndex(position)]
    this.setSkip(active.id, !active.skip)
    return this.activeSegment(position)
  }

  /**
   * Remove the segment active at `position`. The baseline is never removed;
   * its text is cleared instead.
   */
  removeActive(position: number): 'removed' | 'cleared' {
    const active = this._segments[this.activeIndex(position)]
    if (active.startTime === 0) {
      this.setText(active.id, '')
      return 'cleared'
    }
    this.apply(segments => segments.filter(s => s.id !== active.id))
    return 'removed'
  }

  // ---- Internals ----

  private create(startTime: number, text: string, skip: boolean): AnnotationSegment {
    return { id: this._nextId++, startTime: normalizeStartTime(startTime), text, skip }
  }

  private activeIndex(position: number): number {
    let found = 0
    for (let i = 0; i < this._segments.length; i++) {
      if (this._segments[i].startTime <= position) found = i
      else break
    }
    return found
  }

  private normalize(segments: AnnotationSegment[]): AnnotationSegment[] {
    const kept = dedupeSegments(segments)
    if (kept[0]?.startTime !== 0) kept.unshift(this.create(0, '', false))
    return kept
  }

  /** Every mutation goes through here, so callers never see an unsorted or duplicated list. */
  private apply(mutate: (segments: AnnotationSegment[]) => AnnotationSegment[]): void {
    this._segments = this.normalize(mutate(this._segments.map(s => ({ ...s }))))
    this._callbacks?.onSegmentsChanged(this.segments)
  }

  private update(id: number, change: (segment: AnnotationSegment) => void): boolean {
    if (!this._segments.some(s => s.id === id)) return false
    this.apply(segments => {
      const target = segments.find(s => s.id === id)
      if (target) change(target)
      return segments
    })
    return true
  }
}
