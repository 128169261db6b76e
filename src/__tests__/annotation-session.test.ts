import { describe, it, expect, vi } from 'vitest'
import { AnnotationEditSession } from '@/lib/annotation-session'
import { AnnotationTimeline } from '@/lib/annotation-timeline'

function makeSession(initial: ConstructorParameters<typeof AnnotationTimeline>[0] = []) {
  const timeline = new AnnotationTimeline(initial)
  const transport = { pause: vi.fn() }
  const session = new AnnotationEditSession(timeline, transport)
  return { timeline, transport, session }
}

const summary = (timeline: AnnotationTimeline) =>
  timeline.segments.map(s => [s.startTime, s.text, s.skip])

describe('AnnotationEditSession', () => {
  describe('adding', () => {
    it('pauses playback and opens a pending annotation', () => {
      const { session, transport } = makeSession()
      session.beginAdd(12.5)
      expect(transport.pause).toHaveBeenCalledOnce()
      expect(session.state).toEqual({ kind: 'pending-new', startTime: 12.5, text: '' })
    })

    it('does not touch the timeline until commit', () => {
      const { session, timeline } = makeSession()
      session.beginAdd(12)
      session.setText('hello')
      expect(timeline.length).toBe(1)
      expect(session.commit()).toBe('committed')
      expect(summary(timeline)).toEqual([[0, '', false], [12, 'hello', false]])
      expect(session.isOpen).toBe(false)
    })

    it('discards an empty or whitespace-only annotation', () => {
      const { session, timeline } = makeSession()
      session.beginAdd(12)
      session.setText('   ')
      expect(session.commit()).toBe('discarded')
      expect(timeline.length).toBe(1)
    })

    it('flushes the previous pending annotation when a new one starts', () => {
      const { session, timeline } = makeSession()
      session.beginAdd(3)
      session.setText('first')
      expect(session.beginAdd(9)).toBe('committed')
      expect(summary(timeline)).toEqual([[0, '', false], [3, 'first', false]])
      expect(session.state).toEqual({ kind: 'pending-new', startTime: 9, text: '' })
    })

    it('ignores cursor movement while pending', () => {
      const { session } = makeSession()
      session.beginAdd(3)
      session.moveCursor(8)
      expect(session.state).toEqual({ kind: 'pending-new', startTime: 3, text: '' })
    })
  })

  describe('editing', () => {
    it('binds to the active segment and writes text live', () => {
      const { session, timeline } = makeSession([{ startTime: 10, text: 'old' }])
      const bound = session.beginEdit(14)
      expect(bound.startTime).toBe(10)

      session.setText('new')
      expect(timeline.activeSegment(10).text).toBe('new')
      expect(session.draftText).toBe('new')
    })

    it('retimes the bound segment as the cursor moves', () => {
      const { session, timeline } = makeSession([{ startTime: 10, text: 'moving' }])
      session.beginEdit(10)
      session.moveCursor(25)
      expect(summary(timeline)).toEqual([[0, '', false], [25, 'moving', false]])
      expect(session.boundSegment?.startTime).toBe(25)
    })

    it('follows the survivor when a move collides with a labelled segment', () => {
      const { session, timeline } = makeSession([
        { startTime: 10, text: '' },
        { startTime: 20, text: 'kept' },
      ])
      session.beginEdit(10)
      session.moveCursor(20)
      expect(summary(timeline)).toEqual([[0, '', false], [20, 'kept', false]])
      expect(session.boundSegment?.text).toBe('kept')
    })

    it('stays open when focus is lost', () => {
      const { session } = makeSession([{ startTime: 10, text: 'x' }])
      session.beginEdit(10)
      session.focusLost()
      expect(session.isOpen).toBe(true)
    })

    it('ends on finish and on flush', () => {
      const { session } = makeSession([{ startTime: 10, text: 'x' }])
      session.beginEdit(10)
      expect(session.finish()).toBe('finished')
      expect(session.finish()).toBe('none')

      session.beginEdit(10)
      expect(session.flush()).toBe('finished')
      expect(session.state).toEqual({ kind: 'idle' })
    })

    it('leaves an emptied segment in place', () => {
      const { session, timeline } = makeSession([{ startTime: 10, text: 'x' }])
      session.beginEdit(10)
      session.setText('')
      session.finish()
      expect(summary(timeline)).toEqual([[0, '', false], [10, '', false]])
    })
  })

  it('reports nothing to flush when idle', () => {
    const { session } = makeSession()
    expect(session.flush()).toBe('none')
    expect(session.draftText).toBeUndefined()
  })
})
