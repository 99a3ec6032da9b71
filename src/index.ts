export type {
  CommonOptions,
  EntryAction,
  EntryOutcome,
  EntryStatus,
  LinkResult,
  Logger,
  ReplacePolicy,
  StatusToken,
  Step,
} from './types.js'
export { REPLACE_POLICIES } from './types.js'

export type { DependencyCheck, DependencyKind, LinkRecord, ManagedEntry, Registry } from './manifest/types.js'
export { ConfigError, UnknownEntryError, normalizeDependencyChecks, normalizeRegistry, resolveEntry, selectEntries } from './manifest/types.js'
export { loadDependencyChecks, loadManagedEntries } from './manifest/io.js'

export type { FS } from './core/fs.js'
export type { StatusReport } from './core/status.js'
export type { EntryPlan, PlanOptions } from './core/plan.js'
export type { LinkOptions } from './core/runner.js'
export { classify, statusLabel } from './core/status.js'
export { displayPath, resolveNonStrict } from './core/paths.js'
export { backupPathForTarget } from './core/backup.js'
export { planEntry, planRemoveTarget, TargetIsDirectoryError } from './core/plan.js'
export { removeTarget } from './core/apply.js'
export { applyEntries } from './core/runner.js'

export type { SchemaNode, ValidateSchemaOptions } from './validation/schema.js'
export type { DependencyGraph, GraphCheck } from './validation/graph.js'
export { validateSchema } from './validation/schema.js'
export { buildGraph, requiredByHints, validateGraph } from './validation/graph.js'
export { validateConfigFile, validateDepsConfig, validateLinksConfig } from './validation/files.js'

export { checkDependency, isReferenced } from './deps/check.js'
export { Reporter, EXIT_OK, EXIT_USAGE, EXIT_VERIFY_FAILED } from './verify/reporter.js'
export type { VerifyResult } from './verify/verify.js'

export { link, status, verify } from './api/index.js'
