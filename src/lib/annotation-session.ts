import type { PlaybackTransport } from './annotation-playback'
import type { AnnotationSegment, AnnotationTimeline } from './annotation-timeline'
import { normalizeStartTime } from './annotation-timeline'

export type EditSessionState =
  | { kind: 'idle' }
  | { kind: 'pending-new'; startTime: number; text: string }
  | { kind: 'editing'; segmentId: number; startTime: number }

/** What closing a session did to the timeline. */
export type SessionOutcome = 'none' | 'committed' | 'discarded' | 'finished'

/**
 * Add/edit state machine for the annotations of one video.
 *
 * While a segment is bound, text and cursor changes are written to the
 * timeline immediately, so the session is the only writer of that segment.
 * Losing input focus does not end an edit; only `finish()` or a forced
 * `flush()` does.
 */
export class AnnotationEditSession {
  private _state: EditSessionState = { kind: 'idle' }

  constructor(
    private readonly timeline: AnnotationTimeline,
    private transport?: Pick<PlaybackTransport, 'pause'>,
  ) {}

  /** The player paused when an edit begins. */
  setTransport(transport: Pick<PlaybackTransport, 'pause'> | undefined): void {
    this.transport = transport
  }

  get state(): EditSessionState {
    return { ...this._state }
  }

  get isOpen(): boolean {
    return this._state.kind !== 'idle'
  }

  get boundSegment(): AnnotationSegment | undefined {
    return this._state.kind === 'editing' ? this.timeline.getSegment(this._state.segmentId) : undefined
  }

  /** Text the person is currently typing, if a session is open. */
  get draftText(): string | undefined {
    switch (this._state.kind) {
      case 'pending-new': return this._state.text
      case 'editing': return this.boundSegment?.text
      default: return undefined
    }
  }

  // ---- Opening ----

  /** Start a new annotation at `position`. Pauses playback. */
  beginAdd(position: number): SessionOutcome {
    const previous = this.flush()
    this.transport?.pause()
    this._state = { kind: 'pending-new', startTime: normalizeStartTime(position), text: '' }
    return previous
  }

  /** Bind to the segment active at `position`. Pauses playback. */
  beginEdit(position: number): AnnotationSegment {
    this.flush()
    this.transport?.pause()
    const segment = this.timeline.activeSegment(position)
    this._state = { kind: 'editing', segmentId: segment.id, startTime: segment.startTime }
    return segment
  }

  // ---- While open ----

  setText(text: string): void {
    switch (this._state.kind) {
      case 'pending-new':
        this._state = { ...this._state, text }
        return
      case 'editing':
        this.timeline.setText(this._state.segmentId, text)
        this.rebind()
        return
      default:
        return
    }
  }

  /** Cursor or scrub movement: retimes the bound segment. Ignored otherwise. */
  moveCursor(position: number): void {
    if (this._state.kind !== 'editing') return
    const time = normalizeStartTime(position)
    if (time === this._state.startTime) return
    const survivor = this.timeline.setStartTime(this._state.segmentId, time)
    this._state = { ...this._state, startTime: time }
    if (survivor) this._state = { ...this._state, segmentId: survivor.id }
    this.rebind()
  }

  /** Moving the cursor takes focus away from the text field; the session stays open. */
  focusLost(): void {}

  // ---- Closing ----

  /** Commit a pending annotation. For an open edit this is the same as `finish()`. */
  commit(): SessionOutcome {
    switch (this._state.kind) {
      case 'pending-new': {
        const { startTime, text } = this._state
        this._state = { kind: 'idle' }
        if (text.trim() === '') return 'discarded'
        this.timeline.insert(startTime, text)
        return 'committed'
      }
      case 'editing':
        return this.finish()
      default:
        return 'none'
    }
  }

  finish(): SessionOutcome {
    if (this._state.kind !== 'editing') return 'none'
    this._state = { kind: 'idle' }
    return 'finished'
  }

  /**
   * Close whatever is open before a destructive action: a pending annotation
   * is committed if it has text and discarded otherwise; an open edit is
   * already applied and just ends.
   */
  flush(): SessionOutcome {
    return this.commit()
  }

  /** A dedup pass may have dropped the bound segment; follow the survivor at its time. */
  private rebind(): void {
    if (this._state.kind !== 'editing') return
    if (this.timeline.getSegment(this._state.segmentId)) return
    const survivor = this.timeline.segmentAt(this._state.startTime)
    this._state = survivor
      ? { kind: 'editing', segmentId: survivor.id, startTime: survivor.startTime }
      : { kind: 'idle' }
  }
}
