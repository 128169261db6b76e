import { access, rename } from 'node:fs/promises'
import path from 'node:path'
import type { CollectionStore } from './collection-store'
import { RenameGroupError } from './errors'
import { Logger } from './logger'
import { itemKey, mediaItemForPath, nextVersionSuffix, suffixedPhysicalName } from './media-files'
import type { MediaItem, TimestampRecord } from './types'

const log = new Logger('duplicate-names')

// ─── Types ──────────────────────────────────────────────────

/** Informational: whether a same-name group looks like copies of one capture. */
export type DuplicateGroupKind = 'likely-duplicate' | 'distinct-captures'

export interface DuplicateCandidate {
  item: MediaItem
  record?: TimestampRecord
}

export interface DuplicateGroup {
  fileName: string
  kind: DuplicateGroupKind
  members: DuplicateCandidate[]
}

export interface MediaRenamer {
  /** Must fail rather than overwrite an existing file. */
  rename(from: string, to: string): Promise<void>
}

export type RenameDecision = 'accept' | 'decline'
export type RenameDecider = (group: DuplicateGroup) => RenameDecision | Promise<RenameDecision>

export interface RenamedMember {
  from: MediaItem
  to: MediaItem
}

export interface DuplicateResolution {
  applied: Array<{ group: DuplicateGroup; renamed: RenamedMember[] }>
  /** Declined groups and everything queued after them, for a later run. */
  pending: DuplicateGroup[]
  failed: Array<{ group: DuplicateGroup; error: RenameGroupError }>
}

// ─── Detection ──────────────────────────────────────────────

/**
 * Group items whose files share a name but live at different paths. Items
 * that already carry a version suffix are settled and never grouped.
 */
export function findDuplicateNameGroups(candidates: readonly DuplicateCandidate[]): DuplicateGroup[] {
  const byName = new Map<string, DuplicateCandidate[]>()
  for (const candidate of candidates) {
    if (candidate.item.versionSuffix !== undefined) continue
    const list = byName.get(candidate.item.fileName) ?? []
    if (!list.some(other => other.item.path === candidate.item.path)) list.push(candidate)
    byName.set(candidate.item.fileName, list)
  }

  const groups: DuplicateGroup[] = []
  for (const [fileName, members] of byName) {
    if (members.length < 2) continue
    members.sort((a, b) => (a.item.path < b.item.path ? -1 : a.item.path > b.item.path ? 1 : 0))
    const first = members[0].record?.utcEpoch
    const same = first !== undefined && members.every(m => m.record?.source !== 'unresolved' && m.record?.utcEpoch === first)
    groups.push({ fileName, kind: same ? 'likely-duplicate' : 'distinct-captures', members })
  }
  return groups.sort((a, b) => (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0))
}

// ─── Resolution ─────────────────────────────────────────────

export const fileRenamer: MediaRenamer = {
  async rename(from, to) {
    const exists = await access(to).then(() => true, () => false)
    if (exists) throw new Error(`Refusing to overwrite ${to}`)
    await rename(from, to)
  },
}

/**
 * Gives every member of a same-name group its own version suffix. The file
 * is renamed to `<stem>##<n><ext>` and the record stored under the bare name
 * moves to the first member's new key. Per group, either all renames and the
 * record move happen or none do.
 */
export class DuplicateFilenameResolver {
  constructor(
    private readonly store: CollectionStore,
    private readonly renamer: MediaRenamer = fileRenamer,
  ) {}

  async resolve(groups: readonly DuplicateGroup[], decide: RenameDecider): Promise<DuplicateResolution> {
    const result: DuplicateResolution = { applied: [], pending: [], failed: [] }

    for (let i = 0; i < groups.length; i++) {
      const group = groups[i]
      if ((await decide(group)) === 'decline') {
        log.info(`Rename of "${group.fileName}" declined; ${groups.length - i} group(s) left queued`)
        result.pending = groups.slice(i)
        break
      }
      try {
        result.applied.push({ group, renamed: await this.applyGroup(group) })
      } catch (err) {
        if (!(err instanceof RenameGroupError)) throw err
        log.warn(err.message, err.cause)
        result.failed.push({ group, error: err })
      }
    }

    return result
  }

  async applyGroup(group: DuplicateGroup): Promise<RenamedMember[]> {
    const usedKeys = this.store.keys()
    const plan: RenamedMember[] = []
    for (const { item } of group.members) {
      const suffix = nextVersionSuffix(group.fileName, usedKeys)
      usedKeys.push(itemKey(group.fileName, suffix))
      const target = path.join(path.dirname(item.path), suffixedPhysicalName(group.fileName, suffix))
      const to = mediaItemForPath(target)
      if (!to) throw new RenameGroupError(group.fileName, new Error(`Unsupported file ${target}`))
      plan.push({ from: item, to })
    }

    const done: RenamedMember[] = []
    const snapshot = this.store.snapshot()
    try {
      for (const step of plan) {
        await this.renamer.rename(step.from.path, step.to.path)
        done.push(step)
      }
      if (this.store.has(group.fileName)) this.store.relocate(group.fileName, plan[0].to.key)
    } catch (err) {
      this.store.restore(snapshot)
      await this.rollback(done)
      throw new RenameGroupError(group.fileName, err)
    }

    log.info(`Renamed ${plan.length} "${group.fileName}" file(s) (${group.kind})`)
    return plan
  }

  private async rollback(done: RenamedMember[]): Promise<void> {
    for (const step of [...done].reverse()) {
      try {
        await this.renamer.rename(step.to.path, step.from.path)
      } catch (err) {
        log.error(`Could not restore ${step.from.path} from ${step.to.path}`, err)
      }
    }
  }
}
