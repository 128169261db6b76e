import type { AnnotationEditSession } from './annotation-session'
import type { AnnotationTimeline, PlaybackResolution } from './annotation-timeline'

/** Implemented by the player that owns the actual media transport. */
export interface PlaybackTransport {
  pause(): void
  seek(position: number): void
  /** Stop advancing at the end of the media. */
  stop(): void
}

export interface AnnotationPlaybackCallbacks {
  onDisplayText(text: string): void
}

/**
 * Feeds playback positions into one video's timeline and session.
 *
 * `tick` is the high-frequency stream while the player advances by itself;
 * `scrub` is a manual seek or a position report while paused. Repeating the
 * same input has no further side effects.
 */
export class AnnotationPlayback {
  private _lastInput: string | null = null
  private _lastResolution: PlaybackResolution | null = null
  private _displayText: string | null = null
  private _callbacks: AnnotationPlaybackCallbacks | null = null

  constructor(
    private readonly timeline: AnnotationTimeline,
    private readonly session: AnnotationEditSession,
    private readonly transport: PlaybackTransport,
    private duration?: number,
  ) {}

  setCallbacks(callbacks: AnnotationPlaybackCallbacks | null): void {
    this._callbacks = callbacks
  }

  setDuration(duration: number | undefined): void {
    this.duration = duration
    this._lastInput = null
  }

  get displayText(): string {
    return this._displayText ?? ''
  }

  /** Automatic advance. Ignored while an edit session is open. */
  tick(position: number): PlaybackResolution | null {
    if (this.session.isOpen) return null

    const input = `tick:${position}`
    if (input === this._lastInput && this._lastResolution) return this._lastResolution

    const resolution = this.timeline.resolvePlayback(position, { advancing: true, duration: this.duration })
    this.remember(input, resolution)

    switch (resolution.kind) {
      case 'seek':
        this.transport.seek(resolution.to)
        break
      case 'stop':
        this.transport.stop()
        break
      default:
        this.show(resolution.text)
    }
    return resolution
  }

  /** Manual position change. Retimes the bound segment when an edit is open. */
  scrub(position: number): PlaybackResolution {
    this.session.moveCursor(position)

    const input = `scrub:${position}`
    if (input === this._lastInput && this._lastResolution) return this._lastResolution

    const resolution = this.timeline.resolvePlayback(position, { advancing: false })
    this.remember(input, resolution)
    if (resolution.kind === 'show' || resolution.kind === 'skipped') this.show(resolution.text)
    return resolution
  }

  /** Call after the timeline or session changed outside a position update. */
  refresh(position: number): void {
    this._lastInput = null
    this.scrub(position)
  }

  private remember(input: string, resolution: PlaybackResolution): void {
    this._lastInput = input
    this._lastResolution = resolution
  }

  /** The open session's text always wins over the passive display path. */
  private show(text: string): void {
    const next = this.session.draftText ?? text
    if (next === this._displayText) return
    this._displayText = next
    this._callbacks?.onDisplayText(next)
  }
}
