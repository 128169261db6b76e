import { describe, it, expect, vi } from 'vitest'
import { AnnotationTimeline, dedupeSegments, normalizeStartTime } from '@/lib/annotation-timeline'
import { SKIPPED_SEGMENT_TEXT } from '@/lib/config'

const summary = (timeline: AnnotationTimeline) =>
  timeline.segments.map(s => [s.startTime, s.text, s.skip])

describe('normalizeStartTime', () => {
  it('clamps negatives to zero', () => {
    expect(normalizeStartTime(-3)).toBe(0)
    expect(normalizeStartTime(Number.NaN)).toBe(0)
  })

  it('rounds to the millisecond', () => {
    expect(normalizeStartTime(1.23456)).toBe(1.235)
  })
})

describe('dedupeSegments', () => {
  it('prefers text, then skip, then the first one seen', () => {
    const kept = dedupeSegments([
      { startTime: 5, text: '', skip: true },
      { startTime: 5, text: 'label', skip: false },
      { startTime: 7, text: '', skip: false },
      { startTime: 7, text: '', skip: true },
      { startTime: 9, text: 'first', skip: false },
      { startTime: 9, text: 'second', skip: false },
    ])
    expect(kept).toEqual([
      { startTime: 5, text: 'label', skip: false },
      { startTime: 7, text: '', skip: true },
      { startTime: 9, text: 'first', skip: false },
    ])
  })

  it('is idempotent', () => {
    const once = dedupeSegments([
      { startTime: 3, text: 'b', skip: false },
      { startTime: 1, text: '', skip: false },
      { startTime: 3, text: '', skip: true },
    ])
    expect(dedupeSegments(once)).toEqual(once)
  })

  it('treats whitespace-only text as empty', () => {
    const kept = dedupeSegments([
      { startTime: 2, text: '   ', skip: false },
      { startTime: 2, text: '', skip: true },
    ])
    expect(kept).toEqual([{ startTime: 2, text: '', skip: true }])
  })
})

describe('AnnotationTimeline', () => {
  describe('invariants', () => {
    it('always holds a baseline at 0', () => {
      expect(summary(new AnnotationTimeline())).toEqual([[0, '', false]])
      expect(summary(new AnnotationTimeline([{ startTime: 4, text: 'late' }]))).toEqual([
        [0, '', false],
        [4, 'late', false],
      ])
    })

    it('sorts and dedups stored annotations on load', () => {
      const timeline = AnnotationTimeline.fromStored([
        { time: 12, text: 'b' },
        { time: 0, text: 'intro' },
        { time: 12, text: '' },
        { time: -1, text: '' },
      ])
      expect(summary(timeline)).toEqual([
        [0, 'intro', false],
        [12, 'b', false],
      ])
    })

    it('keeps them after every mutation', () => {
      const timeline = new AnnotationTimeline()
      timeline.insert(8, 'eight')
      timeline.insert(3, 'three')
      timeline.insert(8, '')
      expect(summary(timeline)).toEqual([
        [0, '', false],
        [3, 'three', false],
        [8, 'eight', false],
      ])
    })
  })

  describe('activeSegment', () => {
    const timeline = new AnnotationTimeline([
      { startTime: 0, text: 'a' },
      { startTime: 10, text: 'b' },
      { startTime: 20, text: 'c' },
    ])

    it('returns the last segment starting at or before the position', () => {
      expect(timeline.activeSegment(0).text).toBe('a')
      expect(timeline.activeSegment(9.999).text).toBe('a')
      expect(timeline.activeSegment(10).text).toBe('b')
      expect(timeline.activeSegment(500).text).toBe('c')
    })

    it('falls back to the baseline before 0', () => {
      expect(timeline.activeSegment(-5).text).toBe('a')
    })
  })

  describe('insert', () => {
    it('returns the surviving segment at that time', () => {
      const timeline = new AnnotationTimeline([{ startTime: 5, text: 'kept' }])
      expect(timeline.insert(5, '').text).toBe('kept')
      expect(timeline.insert(6, 'new').text).toBe('new')
    })

    it('replaces an empty baseline with a labelled one', () => {
      const timeline = new AnnotationTimeline()
      timeline.insert(0, 'opening')
      expect(summary(timeline)).toEqual([[0, 'opening', false]])
    })
  })

  describe('setStartTime', () => {
    it('moves a segment and re-sorts', () => {
      const timeline = new AnnotationTimeline([{ startTime: 5, text: 'x' }, { startTime: 10, text: 'y' }])
      const x = timeline.activeSegment(5)
      timeline.setStartTime(x.id, 15)
      expect(summary(timeline)).toEqual([
        [0, '', false],
        [10, 'y', false],
        [15, 'x', false],
      ])
    })

    it('returns the survivor when the moved segment loses the dedup', () => {
      const timeline = new AnnotationTimeline([{ startTime: 5, text: '' }, { startTime: 10, text: 'y' }])
      const empty = timeline.activeSegment(5)
      const survivor = timeline.setStartTime(empty.id, 10)
      expect(survivor?.text).toBe('y')
      expect(timeline.getSegment(empty.id)).toBeUndefined()
    })

    it('re-creates the baseline when the first segment moves away from 0', () => {
      const timeline = new AnnotationTimeline([{ startTime: 0, text: 'intro' }])
      timeline.setStartTime(timeline.activeSegment(0).id, 3)
      expect(summary(timeline)).toEqual([
        [0, '', false],
        [3, 'intro', false],
      ])
    })
  })

  describe('removeActive', () => {
    it('removes a non-baseline segment', () => {
      const timeline = new AnnotationTimeline([{ startTime: 4, text: 'gone' }])
      expect(timeline.removeActive(6)).toBe('removed')
      expect(summary(timeline)).toEqual([[0, '', false]])
    })

    it('clears the baseline text instead of removing it', () => {
      const timeline = new AnnotationTimeline([{ startTime: 0, text: 'intro' }])
      expect(timeline.removeActive(2)).toBe('cleared')
      expect(summary(timeline)).toEqual([[0, '', false]])
    })
  })

  describe('resolvePlayback', () => {
    const timeline = new AnnotationTimeline([
      { startTime: 0, text: 'start' },
      { startTime: 10, text: 'boring', skip: true },
      { startTime: 20, text: 'good part' },
    ])

    it('shows the active text for normal segments', () => {
      expect(timeline.resolvePlayback(5, { advancing: true })).toMatchObject({ kind: 'show', text: 'start' })
    })

    it('seeks past a skip segment while advancing', () => {
      expect(timeline.resolvePlayback(10, { advancing: true })).toMatchObject({ kind: 'seek', to: 20 })
    })

    it('shows the skip marker when positioned manually', () => {
      expect(timeline.resolvePlayback(12, { advancing: false })).toMatchObject({
        kind: 'skipped',
        text: SKIPPED_SEGMENT_TEXT,
      })
    })

    it('stops at a trailing skip segment', () => {
      const tail = new AnnotationTimeline([{ startTime: 30, text: '', skip: true }])
      expect(tail.resolvePlayback(31, { advancing: true, duration: 45 })).toMatchObject({ kind: 'stop', at: 45 })
    })
  })

  describe('toggleSkipAt', () => {
    it('flips the skip flag of the active segment', () => {
      const timeline = new AnnotationTimeline([{ startTime: 10, text: 'x' }])
      expect(timeline.toggleSkipAt(11).skip).toBe(true)
      expect(timeline.toggleSkipAt(11).skip).toBe(false)
    })
  })

  describe('toStored', () => {
    it('writes skip only when set', () => {
      const timeline = new AnnotationTimeline([{ startTime: 10, text: 'x', skip: true }])
      expect(timeline.toStored()).toEqual([
        { time: 0, text: '' },
        { time: 10, text: 'x', skip: true },
      ])
    })
  })

  describe('callbacks', () => {
    it('notifies on every mutation with a copy of the segments', () => {
      const timeline = new AnnotationTimeline()
      const onSegmentsChanged = vi.fn()
      timeline.setCallbacks({ onSegmentsChanged })

      timeline.insert(4, 'x')
      expect(onSegmentsChanged).toHaveBeenCalledOnce()
      const [segments] = onSegmentsChanged.mock.calls[0]
      expect(segments).toHaveLength(2)
    })

    it('does not notify for an unknown segment id', () => {
      const timeline = new AnnotationTimeline()
      const onSegmentsChanged = vi.fn()
      timeline.setCallbacks({ onSegmentsChanged })
      timeline.setText(999, 'nothing')
      expect(onSegmentsChanged).not.toHaveBeenCalled()
    })
  })
})
