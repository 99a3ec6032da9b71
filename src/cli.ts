#!/usr/bin/env node
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'
import { confirm, isCancel } from '@clack/prompts'

import { status } from './api/status.js'
import { clearDefaultRepoRoot, getDefaultRepoRoot, setDefaultRepoRoot } from './cli/config.js'
import { applyEntries } from './core/runner.js'
import { loadManagedEntries } from './manifest/io.js'
import { ConfigError, selectEntries, UnknownEntryError } from './manifest/types.js'
import { Logger, REPLACE_POLICIES, ReplacePolicy } from './types.js'
import { colorizeLine, EXIT_OK, EXIT_USAGE, EXIT_VERIFY_FAILED, Reporter } from './verify/reporter.js'
import { verify } from './verify/verify.js'

type Argv = string[]

class CliExit extends Error {
  exitCode: number
  constructor(message: string, exitCode = EXIT_USAGE) {
    super(message)
    this.exitCode = exitCode
  }
}

function die(msg: string, code = EXIT_USAGE): never {
  throw new CliExit(msg, code)
}

export interface CliIO {
  stdout?: (text: string) => void
  stderr?: (text: string) => void
  /** Whether prompts may be shown (default: stdin and stdout are TTYs). */
  interactive?: boolean
  /** Colour status tokens (default: stdout is a TTY). */
  color?: boolean
  /** Home directory targets live under (default: os.homedir()). */
  homeDir?: string
}

function popFlagValue(args: Argv, names: string[]): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const a = args[i]
    if (a === undefined || !names.includes(a)) continue
    const v = args[i + 1]
    if (!v || v.startsWith('-')) die(`${a} requires a value`)
    args.splice(i, 2)
    return v
  }
  return undefined
}

function hasFlag(args: Argv, names: string[]): boolean {
  const idx = args.findIndex(a => names.includes(a))
  if (idx >= 0) {
    args.splice(idx, 1)
    return true
  }
  return false
}

function rejectUnknownFlags(args: Argv) {
  const unknown = args.filter(a => a.startsWith('-'))
  if (unknown.length) die(`Unknown arguments: ${unknown.join(' ')}`)
}

function stderrLogger(err: (text: string) => void): Logger {
  return {
    info: (msg) => err(msg + '\n'),
    warn: (msg) => err(`warning: ${msg}\n`),
    error: (msg) => err(`error: ${msg}\n`),
  }
}

function parsePolicy(raw: string | undefined): ReplacePolicy {
  if (raw === undefined) return 'safe'
  const policy = REPLACE_POLICIES.find(p => p === raw)
  if (!policy) die(`Invalid --mode: ${raw} (expected ${REPLACE_POLICIES.join('|')})`)
  return policy
}

async function resolveRepoRoot(args: Argv, homeDir: string): Promise<string> {
  const r = popFlagValue(args, ['--root'])
  if (r) return path.resolve(r)
  const d = await getDefaultRepoRoot({ homeDir })
  if (d) return d
  die('No repository root. Please run `dotlink root set <path>` or pass `--root <path>`.')
}

/**
 * Gate for policies that replace existing targets. Dry-runs and the safe
 * policy pass straight through; anything else needs --yes or a human.
 */
async function confirmPolicy(policy: ReplacePolicy, opts: { dryRun: boolean; yes: boolean; interactive: boolean }): Promise<boolean> {
  if (opts.dryRun || opts.yes || policy === 'safe') return true
  if (!opts.interactive) {
    die(`Mode '${policy}' modifies existing targets; pass --yes to run non-interactively.`)
  }
  const answer = await confirm({
    message: `Mode '${policy}' will modify existing targets. Continue?`,
    initialValue: false,
  })
  return !isCancel(answer) && answer
}

function printHelp(out: (text: string) => void): void {
  const msg = `
dotlink

Usage:
  dotlink root set <path>
  dotlink root show
  dotlink root clear

  dotlink list [--root <path>]
  dotlink status [--root <path>]
  dotlink link [keys...] [--all] [--mode safe|backup|force] [-y|--yes] [--dry-run] [--plan] [--json] [--audit-log <path>] [--root <path>] [--verbose]
  dotlink verify [--root <path>] [--verbose]
`
  out(msg.trimStart())
  out('\n')
}

export async function main(argv: string[] = process.argv.slice(2), io: CliIO = {}): Promise<number> {
  const out = io.stdout ?? ((text: string) => { process.stdout.write(text) })
  const err = io.stderr ?? ((text: string) => { process.stderr.write(text) })
  const color = io.color ?? process.stdout.isTTY === true
  const interactive = io.interactive ?? (process.stdin.isTTY === true && process.stdout.isTTY === true)
  const homeDir = io.homeDir ?? os.homedir()

  try {
    const args = [...argv]
    if (args.length === 0 || hasFlag(args, ['-h', '--help'])) {
      printHelp(out)
      return EXIT_OK
    }

    const cmd = args.shift()
    const logger = hasFlag(args, ['--verbose']) ? stderrLogger(err) : undefined

    if (cmd === 'root') {
      const sub = args.shift()
      if (sub === 'set') {
        const p = args.shift()
        if (!p) die('root set requires a path')
        const abs = await setDefaultRepoRoot(p, { homeDir })
        out(abs + '\n')
        return EXIT_OK
      }
      if (sub === 'show') {
        const p = await getDefaultRepoRoot({ homeDir })
        if (!p) die('No default repository root set. Run `dotlink root set <path>`.')
        out(p + '\n')
        return EXIT_OK
      }
      if (sub === 'clear') {
        await clearDefaultRepoRoot({ homeDir })
        return EXIT_OK
      }
      die('Unknown root subcommand. Expected: set|show|clear')
    }

    if (cmd === 'list' || cmd === 'status') {
      const root = await resolveRepoRoot(args, homeDir)
      rejectUnknownFlags(args)
      if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
      for (const report of await status(root, { homeDir })) out(report.line + '\n')
      return EXIT_OK
    }

    if (cmd === 'link') {
      const dryRun = hasFlag(args, ['--dry-run'])
      const includePlanText = hasFlag(args, ['--plan'])
      const json = hasFlag(args, ['--json'])
      const all = hasFlag(args, ['--all'])
      const yes = hasFlag(args, ['-y', '--yes'])
      const auditLogPath = popFlagValue(args, ['--audit-log'])
      const policy = parsePolicy(popFlagValue(args, ['--mode']))
      const root = await resolveRepoRoot(args, homeDir)
      rejectUnknownFlags(args)
      if (!args.length && !all) die('No targets specified. Use --all or pass target keys.')

      const entries = selectEntries(await loadManagedEntries(root, { homeDir }), args, { all })
      if (!await confirmPolicy(policy, { dryRun, yes, interactive })) {
        out('Aborted.\n')
        return EXIT_VERIFY_FAILED
      }

      const res = await applyEntries(entries, policy, {
        dryRun,
        includePlanText,
        logger,
        homeDir,
        ...(auditLogPath ? { auditLogPath } : {}),
        onOutcome: json ? undefined : (outcome) => {
          for (const line of outcome.lines) out(colorizeLine(line, color) + '\n')
        },
      })
      if (json) {
        out(JSON.stringify(res, null, 2) + '\n')
      } else if (res.planText) {
        out(`\nPlan:\n${res.planText}\n`)
      }
      for (const w of res.warnings) err(`warning: ${w}\n`)
      return res.ok ? EXIT_OK : EXIT_USAGE
    }

    if (cmd === 'verify') {
      const root = await resolveRepoRoot(args, homeDir)
      rejectUnknownFlags(args)
      if (args.length) die(`Unknown arguments: ${args.join(' ')}`)
      const reporter = new Reporter({ color, write: (line) => out(line + '\n') })
      const res = await verify(root, { reporter, logger, homeDir })
      return res.exitCode
    }

    die(`Unknown command: ${cmd}`)
  } catch (e) {
    if (e instanceof CliExit || e instanceof ConfigError || e instanceof UnknownEntryError) {
      const msg = e.message || 'Command failed'
      err(msg.endsWith('\n') ? msg : msg + '\n')
      return e instanceof CliExit ? e.exitCode : EXIT_USAGE
    }
    throw e
  }
}

// Only run when executed as a script, not when imported (e.g., tests).
const isEntry =
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))

if (isEntry) {
  main().then(
    (code) => process.exit(code),
    (e: unknown) => {
      const msg = e instanceof Error && e.stack ? e.stack : String(e)
      process.stderr.write(msg.endsWith('\n') ? msg : msg + '\n')
      process.exit(1)
    },
  )
}
