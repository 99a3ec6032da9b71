import os from 'os'
import path from 'path'

import type { ManagedEntry } from '../manifest/types.js'
import { ReplacePolicy, Step } from '../types.js'
import { uniqueBackupPath } from './backup.js'
import { FS, lstatOrUndefined, nodeFS } from './fs.js'
import { displayPath } from './paths.js'
import { classify, occupies, StatusReport } from './status.js'

export class TargetIsDirectoryError extends Error {
  readonly target: string
  constructor(target: string) {
    super(`Refusing to replace directory: ${target}`)
    this.name = 'TargetIsDirectoryError'
    this.target = target
  }
}

export interface PlanOptions {
  fs?: FS
  homeDir?: string
  /** Clock used for backup names. */
  now?: () => Date
}

interface PlanBase {
  entry: ManagedEntry
  report: StatusReport
}

export type EntryPlan =
  | (PlanBase & { kind: 'error'; message: string })
  | (PlanBase & { kind: 'skip'; message: string })
  | (PlanBase & { kind: 'link'; steps: Step[]; backupPath?: string })

export interface RemovePlan {
  steps: Step[]
  backupPath?: string
}

/**
 * Steps that clear `targetAbs` out of the way under `policy`. A real directory
 * is never removed, whatever the policy.
 */
export async function planRemoveTarget(targetAbs: string, policy: ReplacePolicy, opts: PlanOptions = {}): Promise<RemovePlan> {
  const fsys = opts.fs ?? nodeFS
  const st = await lstatOrUndefined(fsys, targetAbs)
  if (!st) return { steps: [] }
  if (st.isDirectory()) throw new TargetIsDirectoryError(targetAbs)

  switch (policy) {
    case 'safe':
      return { steps: [] }
    case 'backup': {
      const backupPath = await uniqueBackupPath(targetAbs, opts.now?.() ?? new Date(), fsys)
      return {
        backupPath,
        steps: [{
          kind: 'move',
          message: 'Move existing target aside to backup',
          paths: { from: targetAbs, to: backupPath },
          undo: {
            kind: 'move',
            message: 'Rollback: restore previous target from backup',
            paths: { from: backupPath, to: targetAbs },
          },
        }],
      }
    }
    case 'force':
      return {
        steps: [{
          kind: 'unlink',
          message: 'Remove existing target',
          paths: { target: targetAbs },
        }],
      }
    default: {
      const _exhaustive: never = policy
      throw new Error(`Unknown replace policy: ${String(_exhaustive)}`)
    }
  }
}

export async function planLinkSteps(entry: ManagedEntry, fsys: FS = nodeFS): Promise<Step[]> {
  const steps: Step[] = []
  const parent = path.dirname(entry.target)
  if (!await fsys.pathExists(parent)) {
    steps.push({ kind: 'mkdirp', message: 'Ensure target parent directory exists', paths: { dir: parent } })
  }
  steps.push({
    kind: 'symlink',
    message: 'Create symlink',
    paths: { source: entry.source, target: entry.target },
    undo: { kind: 'unlink', message: 'Rollback: remove created symlink', paths: { target: entry.target } },
  })
  return steps
}

/**
 * Decide what linking one entry takes, from its live status. Nothing is
 * touched here; the plan may read the filesystem only.
 */
export async function planEntry(entry: ManagedEntry, policy: ReplacePolicy, opts: PlanOptions = {}): Promise<EntryPlan> {
  const fsys = opts.fs ?? nodeFS
  const home = opts.homeDir ?? os.homedir()
  const report = await classify(entry, { fs: fsys, homeDir: home })

  switch (report.status) {
    case 'missing-source':
      return { kind: 'error', entry, report, message: `source missing: ${displayPath(entry.source, home)}` }
    case 'linked':
      return { kind: 'skip', entry, report, message: 'already linked' }
    case 'target-dir':
      return { kind: 'error', entry, report, message: `target is a directory: ${displayPath(entry.target, home)}` }
    case 'exists':
    case 'linked-elsewhere':
    case 'broken-link':
    case 'absent':
      break
    default: {
      const _exhaustive: never = report.status
      throw new Error(`Unknown entry status: ${String(_exhaustive)}`)
    }
  }

  const steps: Step[] = []
  let backupPath: string | undefined
  if (await occupies(entry.target, fsys)) {
    if (policy === 'safe') {
      return { kind: 'skip', entry, report, message: 'target exists (use --mode backup/force)' }
    }
    const removal = await planRemoveTarget(entry.target, policy, opts)
    steps.push(...removal.steps)
    backupPath = removal.backupPath
  }
  steps.push(...await planLinkSteps(entry, fsys))

  return { kind: 'link', entry, report, steps, ...(backupPath ? { backupPath } : {}) }
}
