import os from 'os'

import type { ManagedEntry } from '../manifest/types.js'
import { EntryStatus } from '../types.js'
import { FS, lstatOrUndefined, nodeFS } from './fs.js'
import { displayPath, resolveNonStrict } from './paths.js'

export interface StatusReport {
  status: EntryStatus
  detail: string
}

export interface StatusOptions {
  fs?: FS
  homeDir?: string
}

export async function isSourcePresent(entry: ManagedEntry, fsys: FS = nodeFS): Promise<boolean> {
  if (await fsys.pathExists(entry.source)) return true
  const st = await lstatOrUndefined(fsys, entry.source)
  return st?.isSymbolicLink() ?? false
}

/**
 * True when something (a file, a directory or any symlink, dangling or not)
 * sits at `p`.
 */
export async function occupies(p: string, fsys: FS = nodeFS): Promise<boolean> {
  return (await lstatOrUndefined(fsys, p)) !== undefined
}

/**
 * Classify the relationship between an entry's source and target from live
 * filesystem state. Never cached: call again after anything is applied.
 */
export async function classify(entry: ManagedEntry, opts: StatusOptions = {}): Promise<StatusReport> {
  const fsys = opts.fs ?? nodeFS
  const home = opts.homeDir ?? os.homedir()

  if (!await isSourcePresent(entry, fsys)) {
    return { status: 'missing-source', detail: 'source missing' }
  }

  const st = await lstatOrUndefined(fsys, entry.target)
  if (st?.isSymbolicLink()) {
    const targetResolved = await resolveNonStrict(entry.target, fsys)
    const sourceResolved = await resolveNonStrict(entry.source, fsys)
    const detail = `points to ${displayPath(targetResolved, home)}`
    if (targetResolved === sourceResolved) return { status: 'linked', detail }
    if (!await fsys.pathExists(entry.target)) return { status: 'broken-link', detail }
    return { status: 'linked-elsewhere', detail }
  }

  if (st) {
    if (st.isDirectory()) return { status: 'target-dir', detail: 'target is a directory' }
    return { status: 'exists', detail: 'target exists' }
  }

  return { status: 'absent', detail: 'target missing' }
}

const STATUS_LABELS: Record<EntryStatus, string> = {
  'linked': 'LINKED',
  'absent': 'ABSENT',
  'exists': 'EXISTS',
  'missing-source': 'MISSING',
  'linked-elsewhere': 'OTHER',
  'broken-link': 'BROKEN',
  'target-dir': 'DIR',
}

export function statusLabel(status: EntryStatus): string {
  return STATUS_LABELS[status]
}
