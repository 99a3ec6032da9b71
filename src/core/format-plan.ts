import os from 'os'

import type { ManagedEntry } from '../manifest/types.js'
import { StatusToken, Step } from '../types.js'
import { displayPath } from './paths.js'

const TOKEN_WIDTH = 7
const KEY_WIDTH = 22

/**
 * `<TOKEN> <text>` with the token left-justified to a fixed width.
 */
export function formatLine(token: StatusToken | string, text: string): string {
  return `${token.padEnd(TOKEN_WIDTH)} ${text}`
}

/**
 * `<TOKEN> <key> <text>`, the per-entry shape of the action line.
 */
export function formatEntryLine(token: StatusToken | string, key: string, text: string): string {
  return formatLine(token, `${key.padEnd(KEY_WIDTH)} ${text}`)
}

export function linkTargetSummary(entry: ManagedEntry, homeDir: string = os.homedir()): string {
  return `${displayPath(entry.source, homeDir)} -> ${displayPath(entry.target, homeDir)}`
}

/**
 * Shell-style description of what a step does, used for dry-run lines.
 */
export function describeStep(step: Step, homeDir: string = os.homedir()): string {
  const d = (p: string | undefined) => displayPath(p ?? '?', homeDir)
  switch (step.kind) {
    case 'mkdirp':
      return `mkdir -p ${d(step.paths.dir)}`
    case 'move':
      return `mv ${d(step.paths.from)} ${d(step.paths.to)}`
    case 'unlink':
      return `rm ${d(step.paths.target)}`
    case 'symlink':
      return `ln -s ${d(step.paths.source)} ${d(step.paths.target)}`
    default: {
      const _exhaustive: never = step.kind
      throw new Error(`Unknown step kind: ${String(_exhaustive)}`)
    }
  }
}

export function formatPlan(steps: Step[]): string {
  if (!steps.length) return 'No changes.'
  const lines: string[] = []
  for (const s of steps) {
    const paths = Object.entries(s.paths)
      .map(([k, v]) => `${k}=${v}`)
      .join(' ')
    lines.push(`- ${s.kind}: ${s.message}${paths ? ` (${paths})` : ''}`)
  }
  return lines.join('\n')
}
