import { readdir } from 'node:fs/promises'
import path from 'node:path'
import { SUPPORTED_IMAGE_EXTENSIONS, SUPPORTED_VIDEO_EXTENSIONS, VERSION_SEPARATOR } from './config'
import type { MediaItem, MediaKind } from './types'

// ─── Kinds & keys ───────────────────────────────────────────

export function mediaKindOf(fileName: string): MediaKind | undefined {
  const ext = path.extname(fileName).toLowerCase()
  if (SUPPORTED_IMAGE_EXTENSIONS.has(ext)) return 'image'
  if (SUPPORTED_VIDEO_EXTENSIONS.has(ext)) return 'video'
  return undefined
}

export function itemKey(fileName: string, versionSuffix?: string): string {
  return versionSuffix ? `${fileName}${VERSION_SEPARATOR}${versionSuffix}` : fileName
}

export function parseItemKey(key: string): { fileName: string; versionSuffix?: string } {
  const at = key.lastIndexOf(VERSION_SEPARATOR)
  if (at <= 0) return { fileName: key }
  const versionSuffix = key.slice(at + VERSION_SEPARATOR.length)
  return versionSuffix ? { fileName: key.slice(0, at), versionSuffix } : { fileName: key }
}

/**
 * Files renamed to resolve a name collision carry their suffix in the name,
 * `beach##2.jpg`, so the logical identity survives reloads.
 */
export function parsePhysicalName(name: string): { fileName: string; versionSuffix?: string } {
  const m = name.match(/^(.+)##([^.#]+)(\.[^.]+)?$/)
  if (!m) return { fileName: name }
  return { fileName: `${m[1]}${m[3] ?? ''}`, versionSuffix: m[2] }
}

export function suffixedPhysicalName(fileName: string, versionSuffix: string): string {
  const ext = path.extname(fileName)
  const stem = ext ? fileName.slice(0, -ext.length) : fileName
  return `${stem}${VERSION_SEPARATOR}${versionSuffix}${ext}`
}

/**
 * Build the logical item for a physical file. `versionSuffix` overrides the
 * suffix embedded in the name (used for logical duplicates of one file).
 */
export function mediaItemForPath(filePath: string, versionSuffix?: string): MediaItem | undefined {
  const parsed = parsePhysicalName(path.basename(filePath))
  const kind = mediaKindOf(parsed.fileName)
  if (!kind) return undefined
  const suffix = versionSuffix ?? parsed.versionSuffix
  return {
    key: itemKey(parsed.fileName, suffix),
    fileName: parsed.fileName,
    path: filePath,
    versionSuffix: suffix,
    kind,
  }
}

/** Order version suffixes: numeric counters numerically, then the rest by string. */
export function compareVersionSuffixes(a: string | undefined, b: string | undefined): number {
  if (a === b) return 0
  if (a === undefined) return -1
  if (b === undefined) return 1
  const na = /^\d+$/.test(a) ? Number(a) : NaN
  const nb = /^\d+$/.test(b) ? Number(b) : NaN
  if (!Number.isNaN(na) && !Number.isNaN(nb)) return na - nb
  if (!Number.isNaN(na)) return -1
  if (!Number.isNaN(nb)) return 1
  return a < b ? -1 : 1
}

/** Lowest positive counter not already used as a suffix of `fileName` among `keys`. */
export function nextVersionSuffix(fileName: string, keys: Iterable<string>): string {
  const used = new Set<string>()
  for (const key of keys) {
    const parsed = parseItemKey(key)
    if (parsed.fileName === fileName && parsed.versionSuffix) used.add(parsed.versionSuffix)
  }
  let counter = 1
  while (used.has(String(counter))) counter++
  return String(counter)
}

// ─── Enumeration ────────────────────────────────────────────

export interface MediaFolder {
  path: string
  include: boolean
}

/** Yields candidate media paths for the folders of a collection. */
export interface MediaEnumerator {
  listFiles(folders: MediaFolder[]): Promise<string[]>
}

/**
 * Supported media directly inside `folder`, sorted by name. Subfolders are
 * not entered.
 */
export async function listMediaFiles(folder: string): Promise<string[]> {
  const entries = await readdir(folder, { withFileTypes: true })
  return entries
    .filter(entry => entry.isFile() && mediaKindOf(parsePhysicalName(entry.name).fileName) !== undefined)
    .map(entry => entry.name)
    .sort()
    .map(name => path.join(folder, name))
}

export const folderEnumerator: MediaEnumerator = {
  async listFiles(folders) {
    const files: string[] = []
    for (const folder of folders) {
      if (!folder.include) continue
      files.push(...await listMediaFiles(folder.path))
    }
    return files
  },
}
