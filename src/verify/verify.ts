import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { errorMessage } from '../core/fs.js'
import { classify, statusLabel } from '../core/status.js'
import { checkDependency, isReferenced, sortChecks } from '../deps/check.js'
import { loadDependencyChecks, loadManagedEntries } from '../manifest/io.js'
import { CONFIG_DIR, DEFAULT_PATTERN_FILE, DEPS_FILE, DependencyCheck, getConfigFilePath, LINKS_FILE, ManagedEntry } from '../manifest/types.js'
import { Logger } from '../types.js'
import { requiredByHints } from '../validation/graph.js'
import { checkHardcodedPaths, checkJsonFormatting, validateDepsConfig, validateLinksConfig } from '../validation/files.js'
import { Reporter } from './reporter.js'

export interface VerifyOptions {
  homeDir?: string
  env?: NodeJS.ProcessEnv
  reporter?: Reporter
  logger?: Logger
}

export interface VerifyResult {
  ok: number
  fail: number
  skipped: number
  exitCode: number
  lines: string[]
}

async function verifyLinks(entries: ManagedEntry[], reporter: Reporter, homeDir: string) {
  for (const entry of entries) {
    try {
      const { status, detail } = await classify(entry, { homeDir })
      reporter.record(status === 'linked', entry.key, `${entry.key} - ${statusLabel(status)}: ${detail}`)
    } catch (e) {
      reporter.failure('FAIL', `${entry.key} - ${errorMessage(e)}`)
    }
  }
}

async function verifyDependencies(repoRoot: string, checks: DependencyCheck[], reporter: Reporter, env: NodeJS.ProcessEnv) {
  const requiredBy = requiredByHints(checks)
  for (const check of sortChecks(checks)) {
    if (check.pattern) {
      const file = check.file ?? DEFAULT_PATTERN_FILE
      if (!await isReferenced(check.pattern, path.join(repoRoot, file))) {
        reporter.skip(`${check.label} - not referenced in ${file}`)
        continue
      }
    }
    const text = `${check.label} - ${check.kind}: ${check.target}`
    if (await checkDependency(check, env)) {
      reporter.pass(text)
      continue
    }
    const hints: string[] = []
    const dependents = requiredBy.get(check.label)
    if (dependents?.length) hints.push(`required by: ${dependents.join(', ')}`)
    if (check.install) hints.push(`install: ${check.install}`)
    reporter.failure('MISSING', hints.length ? `${text} (${hints.join(', ')})` : text)
  }
}

async function verifyConfigFiles(repoRoot: string, reporter: Reporter) {
  const validations: Array<[string, (root: string) => Promise<string[]>]> = [
    [LINKS_FILE, validateLinksConfig],
    [DEPS_FILE, validateDepsConfig],
  ]
  for (const [file, validate] of validations) {
    const display = `${CONFIG_DIR}/${file}`
    const errors = await validate(repoRoot)
    if (!errors.length) {
      reporter.pass(display)
      continue
    }
    for (const err of errors) reporter.failure('FAIL', `${display}: ${err}`)
  }
}

async function verifyFormatting(repoRoot: string, reporter: Reporter) {
  for (const file of [LINKS_FILE, DEPS_FILE]) {
    const display = `${CONFIG_DIR}/${file}`
    const abs = getConfigFilePath(repoRoot, file)
    if (!await fs.pathExists(abs)) continue
    let formatted: boolean
    try {
      formatted = await checkJsonFormatting(abs)
    } catch (e) {
      reporter.failure('FAIL', `${display} is not valid JSON: ${errorMessage(e)}`)
      continue
    }
    reporter.record(formatted, display, `${display} not formatted (expected 2-space indent and a trailing newline)`)
  }
}

async function verifyHardcodedPaths(entries: ManagedEntry[], reporter: Reporter) {
  let found = false
  for (const entry of entries) {
    const st = await fs.stat(entry.source).catch(() => undefined)
    if (!st?.isFile()) continue
    for (const [lineno, line] of await checkHardcodedPaths(entry.source)) {
      reporter.failure('FAIL', `${entry.key}:${lineno}: ${line}`)
      found = true
    }
  }
  if (!found) reporter.pass('No hardcoded paths found')
}

/**
 * Run every verification section against a dotfiles repository. Nothing is
 * modified; each problem becomes a reported line and counts toward `fail`.
 */
export async function verify(repoRoot: string, opts: VerifyOptions = {}): Promise<VerifyResult> {
  const root = path.resolve(repoRoot)
  const homeDir = opts.homeDir ?? os.homedir()
  const env = opts.env ?? process.env
  const reporter = opts.reporter ?? new Reporter()

  let entries: ManagedEntry[] = []
  reporter.section('Symlink health')
  try {
    entries = await loadManagedEntries(root, { homeDir })
    await verifyLinks(entries, reporter, homeDir)
  } catch (e) {
    reporter.failure('FAIL', `cannot load ${CONFIG_DIR}/${LINKS_FILE}: ${errorMessage(e)}`)
  }
  reporter.blank()

  reporter.section('Dependencies')
  try {
    await verifyDependencies(root, await loadDependencyChecks(root, { homeDir }), reporter, env)
  } catch (e) {
    reporter.failure('FAIL', `cannot load ${CONFIG_DIR}/${DEPS_FILE}: ${errorMessage(e)}`)
  }
  reporter.blank()

  reporter.section('Config validation')
  await verifyConfigFiles(root, reporter)
  reporter.blank()

  reporter.section('JSON formatting')
  await verifyFormatting(root, reporter)
  reporter.blank()

  reporter.section('Hardcoded home paths')
  await verifyHardcodedPaths(entries, reporter)
  reporter.blank()

  reporter.summary()
  opts.logger?.info(`[dotlink] verify ${reporter.fail ? 'fail' : 'ok'} (${reporter.ok} ok, ${reporter.fail} fail)`)

  return { ok: reporter.ok, fail: reporter.fail, skipped: reporter.skipped, exitCode: reporter.exitCode, lines: [...reporter.lines] }
}
