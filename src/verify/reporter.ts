import chalk from 'chalk'

import { formatLine } from '../core/format-plan.js'
import { StatusToken } from '../types.js'

export type FailureToken = Extract<StatusToken, 'FAIL' | 'MISSING' | 'DRIFT'>

export const EXIT_OK = 0
export const EXIT_VERIFY_FAILED = 1
export const EXIT_USAGE = 2

export interface ReporterOptions {
  /** Colour status tokens. Never changes the plain text. */
  color?: boolean
  write?: (line: string) => void
}

function paint(token: StatusToken, text: string): string {
  switch (token) {
    case 'OK':
    case 'LINKED':
      return chalk.green(text)
    case 'FAIL':
    case 'ERROR':
    case 'DRIFT':
    case 'MISSING':
      return chalk.red(text)
    case 'SKIP':
    case 'BACKUP':
      return chalk.yellow(text)
    case 'DRYRUN':
      return chalk.cyan(text)
    default: {
      const _exhaustive: never = token
      return String(_exhaustive)
    }
  }
}

/**
 * Colour the leading status token of an already formatted action line.
 */
export function colorizeLine(line: string, color: boolean): string {
  if (!color) return line
  const m = /^([A-Z]+)(\s+)/.exec(line)
  const token = m?.[1]
  if (!m || !token || !isStatusToken(token)) return line
  return paint(token, token) + line.slice(token.length)
}

const TOKENS: readonly StatusToken[] = ['LINKED', 'SKIP', 'ERROR', 'DRYRUN', 'BACKUP', 'OK', 'FAIL', 'MISSING', 'DRIFT']

function isStatusToken(s: string): s is StatusToken {
  return TOKENS.some(t => t === s)
}

/**
 * Tallies pass/fail lines across verification sections and turns them into
 * a single exit code.
 */
export class Reporter {
  ok = 0
  fail = 0
  /** Checks that did not apply. Never affects the exit code. */
  skipped = 0
  readonly lines: string[] = []
  private readonly color: boolean
  private readonly write: (line: string) => void

  constructor(opts: ReporterOptions = {}) {
    this.color = opts.color ?? false
    this.write = opts.write ?? (() => {})
  }

  private emit(line: string, rendered: string = line) {
    this.lines.push(line)
    this.write(rendered)
  }

  section(title: string) {
    this.emit(`── ${title}`, this.color ? chalk.bold(`── ${title}`) : undefined)
  }

  blank() {
    this.emit('')
  }

  pass(text: string) {
    this.ok += 1
    const line = formatLine('OK', text)
    this.emit(line, colorizeLine(line, this.color))
  }

  failure(token: FailureToken, text: string) {
    this.fail += 1
    const line = formatLine(token, text)
    this.emit(line, colorizeLine(line, this.color))
  }

  skip(text: string) {
    this.skipped += 1
    const line = formatLine('SKIP', text)
    this.emit(line, colorizeLine(line, this.color))
  }

  record(passed: boolean, okText: string, failText: string, token: FailureToken = 'FAIL') {
    if (passed) this.pass(okText)
    else this.failure(token, failText)
  }

  summary() {
    const skipped = this.skipped ? `, ${this.skipped} skipped` : ''
    const line = `Summary: ${this.ok} ok, ${this.fail} fail${skipped}`
    this.emit(line, this.color ? chalk.bold(line) : undefined)
  }

  get exitCode(): number {
    return this.fail > 0 ? EXIT_VERIFY_FAILED : EXIT_OK
  }
}
