import os from 'os'

import type { ManagedEntry } from '../manifest/types.js'
import { CommonOptions, EntryOutcome, LinkResult, ReplacePolicy, Step } from '../types.js'
import { applyEntryPlan } from './apply.js'
import { tryAppendAudit } from './audit.js'
import { formatEntryLine, formatPlan } from './format-plan.js'
import { errorMessage } from './fs.js'
import { planEntry, PlanOptions } from './plan.js'

function nowIso() {
  return new Date().toISOString()
}

/** No `fs` here: plans are read from the same disk the steps then change. */
export interface LinkOptions extends CommonOptions, Omit<PlanOptions, 'fs'> {
  /**
   * Called once per entry, in order, as soon as the entry is done.
   */
  onOutcome?: (outcome: EntryOutcome) => void
}

/**
 * Link every entry under `policy`, in order. An entry that fails is recorded
 * and the batch moves on; `ok` is false iff any entry errored.
 */
export async function applyEntries(entries: readonly ManagedEntry[], policy: ReplacePolicy, opts: LinkOptions = {}): Promise<LinkResult> {
  const startedAt = nowIso()
  const startedMs = Date.now()
  const logger = opts.logger
  const homeDir = opts.homeDir ?? os.homedir()
  const dryRun = opts.dryRun ?? false

  let result: LinkResult = {
    ok: true,
    operation: 'link',
    policy,
    dryRun,
    startedAt,
    finishedAt: startedAt,
    durationMs: 0,
    entries: [],
    warnings: [],
    errors: [],
    changes: [],
    rollbackSteps: [],
  }
  const planned: Step[] = []

  for (const entry of entries) {
    let outcome: EntryOutcome
    try {
      const plan = await planEntry(entry, policy, { ...opts, homeDir })
      if (plan.kind === 'link') planned.push(...plan.steps)
      const applied = await applyEntryPlan(plan, { logger, dryRun, homeDir })
      outcome = applied.outcome
      result.changes.push(...applied.changes)
    } catch (e) {
      const error = errorMessage(e)
      outcome = { key: entry.key, action: 'error', lines: [formatEntryLine('ERROR', entry.key, error)], steps: [], error }
    }

    if (outcome.action === 'error') {
      result.ok = false
      result.errors.push(`${entry.key}: ${outcome.error ?? 'failed'}`)
    }
    result.entries.push(outcome)
    opts.onOutcome?.(outcome)
  }

  result.rollbackSteps = result.entries
    .flatMap(o => o.steps)
    .filter(s => s.status === 'executed')
    .flatMap(s => (s.undo ? [s.undo] : []))
    .reverse()

  if (opts.includePlanText) {
    result.planText = formatPlan(planned)
  }

  result.finishedAt = nowIso()
  result.durationMs = Date.now() - startedMs

  if (opts.auditLogPath && !dryRun) {
    result = await tryAppendAudit(result, opts.auditLogPath)
  }

  logger?.info(`[dotlink] link ${result.ok ? 'ok' : 'fail'} (${result.durationMs}ms)`)
  return result
}

export function resultLines(result: LinkResult): string[] {
  return result.entries.flatMap(o => o.lines)
}
