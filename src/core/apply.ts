import os from 'os'

import { createDir, createSymlink, removeFile, renamePath } from './fs-ops.js'
import { errorMessage } from './fs.js'
import { describeStep, formatEntryLine, formatLine, linkTargetSummary } from './format-plan.js'
import { displayPath } from './paths.js'
import { EntryPlan, planRemoveTarget, PlanOptions } from './plan.js'
import { EntryOutcome, LinkResult, Logger, ReplacePolicy, Step } from '../types.js'

function defaultLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
  }
}

export interface ExecuteOptions {
  logger?: Logger
  dryRun?: boolean
}

export interface StepRun {
  ok: boolean
  steps: Step[]
  changes: LinkResult['changes']
  error?: string
}

function requirePath(step: Step, name: string): string {
  const p = step.paths[name]
  if (!p) throw new Error(`${step.kind} step missing ${name}`)
  return p
}

/**
 * Run steps in order, stopping at the first failure. Under dryRun every step
 * is marked skipped and nothing is touched.
 */
export async function executeSteps(steps: Step[], opts: ExecuteOptions = {}): Promise<StepRun> {
  const logger = opts.logger ?? defaultLogger()
  const run: StepRun = { ok: true, steps: [], changes: [] }

  for (const s of steps) {
    const step: Step = { ...s, status: 'planned' }
    if (opts.dryRun) {
      step.status = 'skipped'
      run.steps.push(step)
      continue
    }
    try {
      switch (s.kind) {
        case 'mkdirp': {
          await createDir(requirePath(s, 'dir'))
          break
        }
        case 'symlink': {
          const source = requirePath(s, 'source')
          const target = requirePath(s, 'target')
          await createSymlink(source, target)
          run.changes.push({ action: 'symlink', source, target })
          break
        }
        case 'unlink': {
          const target = requirePath(s, 'target')
          await removeFile(target)
          run.changes.push({ action: 'unlink', target })
          break
        }
        case 'move': {
          const from = requirePath(s, 'from')
          const to = requirePath(s, 'to')
          await renamePath(from, to)
          run.changes.push({ action: 'move', source: from, target: to })
          break
        }
        default: {
          const _exhaustive: never = s.kind
          throw new Error(`Unknown step kind: ${String(_exhaustive)}`)
        }
      }
      step.status = 'executed'
      run.steps.push(step)
    } catch (e) {
      step.status = 'failed'
      step.error = errorMessage(e)
      run.steps.push(step)
      run.ok = false
      run.error = step.error
      logger.error(`[dotlink] step failed: ${step.kind} ${step.error}`)
      break
    }
  }
  return run
}

export interface ApplyEntryOptions extends ExecuteOptions {
  homeDir?: string
}

/**
 * Carry out one entry's plan and render its action lines. Failures stay on
 * the outcome; nothing is thrown past this point.
 */
export async function applyEntryPlan(plan: EntryPlan, opts: ApplyEntryOptions = {}): Promise<{ outcome: EntryOutcome; changes: LinkResult['changes'] }> {
  const home = opts.homeDir ?? os.homedir()
  const { key } = plan.entry
  const status = plan.report.status

  if (plan.kind === 'error') {
    return {
      outcome: { key, status, action: 'error', lines: [formatEntryLine('ERROR', key, plan.message)], steps: [], error: plan.message },
      changes: [],
    }
  }
  if (plan.kind === 'skip') {
    return {
      outcome: { key, status, action: 'skipped', lines: [formatEntryLine('SKIP', key, plan.message)], steps: [] },
      changes: [],
    }
  }

  const backup = plan.backupPath ? { backupPath: plan.backupPath } : {}

  if (opts.dryRun) {
    const run = await executeSteps(plan.steps, opts)
    const lines = plan.steps.map(s => formatLine('DRYRUN', describeStep(s, home)))
    lines.push(formatEntryLine('DRYRUN', key, linkTargetSummary(plan.entry, home)))
    return { outcome: { key, status, action: 'planned', lines, steps: run.steps, ...backup }, changes: [] }
  }

  const run = await executeSteps(plan.steps, opts)
  const lines: string[] = []
  const moved = run.steps.some(s => s.kind === 'move' && s.status === 'executed')
  if (plan.backupPath && moved) {
    lines.push(formatEntryLine('BACKUP', key, displayPath(plan.backupPath, home)))
  }
  if (!run.ok) {
    const error = run.error ?? 'link failed'
    lines.push(formatEntryLine('ERROR', key, error))
    return { outcome: { key, status, action: 'error', lines, steps: run.steps, error, ...backup }, changes: run.changes }
  }
  lines.push(formatEntryLine('LINKED', key, linkTargetSummary(plan.entry, home)))
  return { outcome: { key, status, action: 'linked', lines, steps: run.steps, ...backup }, changes: run.changes }
}

export interface RemoveTargetOptions extends Omit<PlanOptions, 'fs'>, ExecuteOptions {}

export interface RemoveTargetResult {
  backupPath?: string
  lines: string[]
  steps: Step[]
}

/**
 * Clear an existing target per policy. Missing targets and the safe policy are
 * no-ops; a real directory throws TargetIsDirectoryError; a failed mutation
 * throws with the underlying message.
 */
export async function removeTarget(targetAbs: string, policy: ReplacePolicy, opts: RemoveTargetOptions = {}): Promise<RemoveTargetResult> {
  const home = opts.homeDir ?? os.homedir()
  const plan = await planRemoveTarget(targetAbs, policy, opts)
  const run = await executeSteps(plan.steps, opts)
  if (!run.ok) throw new Error(run.error ?? `Failed to remove ${targetAbs}`)
  const lines = opts.dryRun ? plan.steps.map(s => formatLine('DRYRUN', describeStep(s, home))) : []
  return { lines, steps: run.steps, ...(plan.backupPath ? { backupPath: plan.backupPath } : {}) }
}
