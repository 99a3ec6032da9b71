import os from 'os'
import path from 'path'

/** Directory inside a dotfiles repository holding dotlink's declarations. */
export const CONFIG_DIR = '.dotlink'
export const LINKS_FILE = 'links.json'
export const DEPS_FILE = 'deps.json'

export interface LinkRecord {
  key: string
  description: string
  /**
   * Path relative to both the repository root and the home directory.
   * Defaults to `key`.
   */
  path?: string
}

export interface Registry {
  links: LinkRecord[]
}

/**
 * One managed file: `target` (under home) should be a symlink to `source`
 * (under the repository). Never mutated after loading.
 */
export interface ManagedEntry {
  readonly key: string
  readonly description: string
  readonly source: string
  readonly target: string
}

export type DependencyKind = 'command' | 'dir' | 'file'

export const DEPENDENCY_KINDS: readonly DependencyKind[] = ['command', 'dir', 'file']

export interface DependencyCheck {
  label: string
  kind: DependencyKind
  /** `$HOME` already substituted. */
  target: string
  /** Labels whose checks logically come before this one. */
  depends: string[]
  /** Advisory install hint, usually a URL. */
  install?: string
  /**
   * Regular expression that must match an uncommented line of `file` for the
   * check to apply; otherwise it is skipped.
   */
  pattern?: string
  /** Repository-relative file searched for `pattern`. Defaults to `.zshrc`. */
  file?: string
}

export const DEFAULT_PATTERN_FILE = '.zshrc'

export interface ResolveOptions {
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class UnknownEntryError extends Error {
  readonly keys: string[]
  constructor(keys: string[]) {
    super(`Unknown target(s): ${keys.join(', ')}. Use 'list' to see options.`)
    this.name = 'UnknownEntryError'
    this.keys = keys
  }
}

export function getConfigFilePath(repoRoot: string, file: string): string {
  return path.join(path.resolve(repoRoot), CONFIG_DIR, file)
}

export function resolveEntry(repoRoot: string, record: LinkRecord, opts: ResolveOptions = {}): ManagedEntry {
  const rel = record.path ?? record.key
  return {
    key: record.key,
    description: record.description,
    source: path.join(path.resolve(repoRoot), rel),
    target: path.join(opts.homeDir ?? os.homedir(), rel),
  }
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

function isDependencyKind(v: unknown): v is DependencyKind {
  return DEPENDENCY_KINDS.some(k => k === v)
}

/**
 * Shape check for loading. Full schema validation, with every violation
 * enumerated, lives in validation/ and runs under `verify`.
 */
export function normalizeRegistry(raw: unknown): Registry {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid registry: root must be an object')
  }
  const links = raw.links
  if (!Array.isArray(links)) {
    throw new ConfigError('Invalid registry: "links" must be an array')
  }

  const seen = new Set<string>()
  const out: LinkRecord[] = []
  links.forEach((item: unknown, i) => {
    if (!isRecord(item) || typeof item.key !== 'string' || !item.key) {
      throw new ConfigError(`Invalid registry: links[${i}] must have a string "key"`)
    }
    if (seen.has(item.key)) {
      throw new ConfigError(`Invalid registry: duplicate key '${item.key}'`)
    }
    seen.add(item.key)
    const rel = typeof item.path === 'string' && item.path ? item.path : undefined
    if (path.isAbsolute(rel ?? item.key)) {
      throw new ConfigError(`Invalid registry: links[${i}] must use a relative path`)
    }
    out.push({
      key: item.key,
      description: typeof item.description === 'string' ? item.description : '',
      ...(rel !== undefined ? { path: rel } : {}),
    })
  })
  return { links: out }
}

export function expandHome(value: string, homeDir: string): string {
  return value.split('$HOME').join(homeDir)
}

export function normalizeDependencyChecks(raw: unknown, opts: ResolveOptions = {}): DependencyCheck[] {
  if (!isRecord(raw)) {
    throw new ConfigError('Invalid dependency checks: root must be an object')
  }
  const checks = raw.checks
  if (!Array.isArray(checks)) {
    throw new ConfigError('Invalid dependency checks: "checks" must be an array')
  }
  const home = opts.homeDir ?? os.homedir()

  return checks.map((item: unknown, i): DependencyCheck => {
    if (!isRecord(item) || typeof item.label !== 'string' || typeof item.target !== 'string') {
      throw new ConfigError(`Invalid dependency checks: checks[${i}] must have string "label" and "target"`)
    }
    if (!isDependencyKind(item.kind)) {
      throw new ConfigError(`Invalid dependency checks: checks[${i}].kind must be one of ${DEPENDENCY_KINDS.join(', ')}`)
    }
    const depends = Array.isArray(item.depends)
      ? item.depends.filter((d: unknown): d is string => typeof d === 'string')
      : []
    return {
      label: item.label,
      kind: item.kind,
      target: expandHome(item.target, home),
      depends,
      ...(typeof item.install === 'string' ? { install: item.install } : {}),
      ...(typeof item.pattern === 'string' && item.pattern ? { pattern: item.pattern } : {}),
      ...(typeof item.file === 'string' && item.file ? { file: item.file } : {}),
    }
  })
}

/**
 * Pick entries by key, preserving first-appearance order and dropping
 * duplicates. Unknown keys are reported together.
 */
export function selectEntries(entries: readonly ManagedEntry[], keys: Iterable<string>, opts: { all?: boolean } = {}): ManagedEntry[] {
  if (opts.all) return [...entries]

  const lookup = new Map(entries.map(e => [e.key, e]))
  const chosen: ManagedEntry[] = []
  const unknown: string[] = []

  for (const raw of keys) {
    const entry = lookup.get(raw.trim())
    if (!entry) {
      unknown.push(raw)
      continue
    }
    if (!chosen.includes(entry)) chosen.push(entry)
  }

  if (unknown.length) throw new UnknownEntryError(unknown)
  return chosen
}
