import { execFile } from 'node:child_process'
import { stat } from 'node:fs/promises'
import { promisify } from 'node:util'
import { gps as readExifGps, parse as parseExif } from 'exifr'
import { Logger } from './logger'
import type { LatLon, MediaKind } from './types'

const log = new Logger('metadata')
const execFileAsync = promisify(execFile)

// ─── Collaborator contracts ─────────────────────────────────

/** Lower-cased container/stream tag name → raw value. */
export type VideoTags = Record<string, string>

export interface MetadataReader {
  /** Raw "original capture" value of an image, e.g. "2024:01:15 17:00:00". */
  readImageDate(filePath: string): Promise<string | undefined>
  readVideoTags(filePath: string): Promise<VideoTags>
  readGps(filePath: string, kind: MediaKind): Promise<LatLon | undefined>
}

export interface FileTimes {
  birthtimeMs: number
  mtimeMs: number
  ctimeMs: number
}

export interface FileStatReader {
  statTimes(filePath: string): Promise<FileTimes>
}

// ─── Bounded probing ────────────────────────────────────────

/**
 * Settle with the probe's value, or undefined once `ms` elapses or the
 * probe rejects. A probe never blocks or fails its caller.
 */
export async function probe<T>(label: string, work: () => Promise<T>, ms: number): Promise<T | undefined> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<undefined>(resolve => {
    timer = setTimeout(() => {
      log.debug(`${label} timed out after ${ms}ms`)
      resolve(undefined)
    }, ms)
  })
  try {
    return await Promise.race([work(), timeout])
  } catch (err) {
    log.debug(`${label} unavailable:`, err instanceof Error ? err.message : err)
    return undefined
  } finally {
    clearTimeout(timer)
  }
}

// ─── Default adapters ───────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const pad = (n: number) => String(n).padStart(2, '0')

/**
 * Parse an ISO 6709 location tag as written by phones into MP4/MOV,
 * e.g. "+37.7858-122.4064+012.000/".
 */
export function parseIso6709(value: string): LatLon | undefined {
  const m = value.match(/^([+-]\d+(?:\.\d+)?)([+-]\d+(?:\.\d+)?)/)
  if (!m) return undefined
  const lat = Number(m[1])
  const lon = Number(m[2])
  if (Math.abs(lat) > 90 || Math.abs(lon) > 180) return undefined
  return { lat, lon }
}

/** Merge ffprobe's `format.tags` and every `streams[].tags`; container tags win. */
export function collectFfprobeTags(output: unknown): VideoTags {
  const tags: VideoTags = {}
  const take = (source: unknown) => {
    if (!isRecord(source)) return
    for (const [name, value] of Object.entries(source)) {
      const key = name.toLowerCase()
      if (typeof value === 'string' && !(key in tags)) tags[key] = value
    }
  }
  if (!isRecord(output)) return tags
  if (isRecord(output.format)) take(output.format.tags)
  if (Array.isArray(output.streams)) {
    for (const stream of output.streams) {
      if (isRecord(stream)) take(stream.tags)
    }
  }
  return tags
}

/**
 * Reads images with exifr and videos with the `ffprobe` binary. A missing
 * ffprobe simply yields no video tags.
 */
export function createMetadataReader(ffprobePath = 'ffprobe'): MetadataReader {
  const readVideoTags = async (filePath: string): Promise<VideoTags> => {
    const { stdout } = await execFileAsync(
      ffprobePath,
      ['-v', 'quiet', '-print_format', 'json', '-show_format', '-show_streams', filePath],
      { maxBuffer: 8 * 1024 * 1024 },
    )
    return collectFfprobeTags(JSON.parse(stdout))
  }

  return {
    async readImageDate(filePath) {
      const data: unknown = await parseExif(filePath, { pick: ['DateTimeOriginal'], reviveValues: false })
      if (!isRecord(data)) return undefined
      const value = data.DateTimeOriginal
      if (typeof value === 'string') return value
      if (value instanceof Date && Number.isFinite(value.valueOf())) {
        // Revived dates carry the camera's wall-clock in local getters
        return `${value.getFullYear()}:${pad(value.getMonth() + 1)}:${pad(value.getDate())} ${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`
      }
      return undefined
    },

    readVideoTags,

    async readGps(filePath, kind) {
      if (kind === 'image') {
        const data: unknown = await readExifGps(filePath)
        if (!isRecord(data)) return undefined
        const { latitude, longitude } = data
        return typeof latitude === 'number' && typeof longitude === 'number'
          ? { lat: latitude, lon: longitude }
          : undefined
      }
      const tags = await readVideoTags(filePath)
      const location = tags['com.apple.quicktime.location.iso6709'] ?? tags.location
      return location ? parseIso6709(location) : undefined
    },
  }
}

export const fileStatReader: FileStatReader = {
  async statTimes(filePath) {
    const s = await stat(filePath)
    return { birthtimeMs: s.birthtimeMs, mtimeMs: s.mtimeMs, ctimeMs: s.ctimeMs }
  },
}
