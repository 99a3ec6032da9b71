import fs from 'fs-extra'
import path from 'path'

import type { DependencyCheck } from '../manifest/types.js'
import { isErrnoCode } from '../core/fs.js'

async function statOrUndefined(p: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.stat(p)
  } catch (e) {
    if (isErrnoCode(e, 'ENOENT') || isErrnoCode(e, 'ENOTDIR') || isErrnoCode(e, 'EACCES')) return undefined
    throw e
  }
}

async function isExecutableFile(p: string): Promise<boolean> {
  const st = await statOrUndefined(p)
  if (!st?.isFile()) return false
  try {
    await fs.access(p, fs.constants.X_OK)
    return true
  } catch (e) {
    if (isErrnoCode(e, 'EACCES')) return false
    throw e
  }
}

/**
 * Locate `command` the way a shell would: a name with a separator is taken as
 * a path, anything else is looked up in each PATH directory in turn.
 */
export async function findExecutable(command: string, env: NodeJS.ProcessEnv = process.env): Promise<string | undefined> {
  if (!command) return undefined
  if (command.includes('/') || command.includes(path.sep)) {
    return await isExecutableFile(command) ? path.resolve(command) : undefined
  }
  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue
    const candidate = path.join(dir, command)
    if (await isExecutableFile(candidate)) return candidate
  }
  return undefined
}

export async function checkDependency(check: DependencyCheck, env: NodeJS.ProcessEnv = process.env): Promise<boolean> {
  switch (check.kind) {
    case 'command':
      return (await findExecutable(check.target, env)) !== undefined
    case 'dir':
      return (await statOrUndefined(check.target))?.isDirectory() ?? false
    case 'file':
      return (await statOrUndefined(check.target))?.isFile() ?? false
    default: {
      const _exhaustive: never = check.kind
      throw new Error(`Unknown check kind: ${String(_exhaustive)}`)
    }
  }
}

/**
 * True when a line of `file` that is not a `#` comment matches `pattern`. An
 * invalid pattern or a missing file matches nothing.
 */
export async function isReferenced(pattern: string, file: string): Promise<boolean> {
  let regex: RegExp
  try {
    regex = new RegExp(pattern)
  } catch (e) {
    if (e instanceof SyntaxError) return false
    throw e
  }
  let raw: string
  try {
    raw = await fs.readFile(file, 'utf8')
  } catch (e) {
    if (isErrnoCode(e, 'ENOENT') || isErrnoCode(e, 'ENOTDIR')) return false
    throw e
  }
  return raw.split('\n').some(line => !line.trimStart().startsWith('#') && regex.test(line))
}

/** Case-insensitive label order, the order checks are reported in. */
export function sortChecks<T extends { label: string }>(checks: readonly T[]): T[] {
  return [...checks].sort((a, b) => {
    const x = a.label.toLowerCase()
    const y = b.label.toLowerCase()
    return x < y ? -1 : x > y ? 1 : 0
  })
}
