export type ReplacePolicy = 'safe' | 'backup' | 'force'

export const REPLACE_POLICIES: readonly ReplacePolicy[] = ['safe', 'backup', 'force']

export type EntryStatus =
  | 'missing-source'
  | 'linked'
  | 'broken-link'
  | 'linked-elsewhere'
  | 'exists'
  | 'target-dir'
  | 'absent'

/**
 * Fixed-width tokens that open every action line. Wrappers parse these, so the
 * spelling is part of the output contract.
 */
export type StatusToken =
  | 'LINKED'
  | 'SKIP'
  | 'ERROR'
  | 'DRYRUN'
  | 'BACKUP'
  | 'OK'
  | 'FAIL'
  | 'MISSING'
  | 'DRIFT'

export type StepKind = 'mkdirp' | 'symlink' | 'unlink' | 'move'

export interface Step {
  kind: StepKind
  message: string
  /**
   * Paths involved in the step, for observability and auditing.
   */
  paths: Record<string, string>
  status?: 'planned' | 'executed' | 'skipped' | 'failed'
  error?: string
  /**
   * Rollback hint for this step. Only meaningful once the step has executed.
   */
  undo?: Omit<Step, 'status' | 'error' | 'undo'>
}

/** `planned` is what a dry-run reports in place of `linked`. */
export type EntryAction = 'linked' | 'planned' | 'skipped' | 'error'

export interface EntryOutcome {
  key: string
  /**
   * Status observed before anything was applied. Absent when the entry could
   * not be inspected at all.
   */
  status?: EntryStatus
  action: EntryAction
  /**
   * Output lines for this entry, in the order they were produced.
   */
  lines: string[]
  steps: Step[]
  backupPath?: string
  error?: string
}

export interface LinkResult {
  ok: boolean
  operation: 'link'
  policy: ReplacePolicy
  dryRun: boolean
  startedAt: string
  finishedAt: string
  durationMs: number
  entries: EntryOutcome[]
  warnings: string[]
  errors: string[]
  /**
   * Summary of mutations that actually happened (empty under dry-run).
   */
  changes: Array<{ target?: string; source?: string; action: string }>
  /**
   * Rollback plan in reverse order of execution.
   */
  rollbackSteps: Step[]
  /**
   * Human-readable rendering of every planned step.
   */
  planText?: string
}

export interface Logger {
  info(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface CommonOptions {
  /**
   * When set, one JSON line per operation is appended to this file. Dry-runs
   * write nothing, the log included.
   */
  auditLogPath?: string
  logger?: Logger
  /**
   * If true, do not perform filesystem writes; only report what would happen.
   */
  dryRun?: boolean
  /**
   * If true, return plan text in LinkResult.planText.
   */
  includePlanText?: boolean
}
