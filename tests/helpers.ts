import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'

import type { ManagedEntry } from '../src/manifest/types.js'

export interface Sandbox {
  base: string
  repo: string
  home: string
}

/**
 * A throwaway repo/ and home/ side by side. The base is realpath'd so macOS'
 * /private/var indirection does not leak into comparisons.
 */
export async function makeSandbox(): Promise<Sandbox> {
  const base = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'dotlink-test-')))
  const repo = path.join(base, 'repo')
  const home = path.join(base, 'home')
  await fs.ensureDir(repo)
  await fs.ensureDir(home)
  return { base, repo, home }
}

export function entryFor(sb: Sandbox, key: string): ManagedEntry {
  return {
    key,
    description: `${key} config`,
    source: path.join(sb.repo, key),
    target: path.join(sb.home, key),
  }
}

export async function writeSource(sb: Sandbox, key: string, content = `# ${key}\n`): Promise<void> {
  await fs.outputFile(path.join(sb.repo, key), content)
}

/**
 * Every path under `dir` with what sits there: file content, link text or
 * `dir`. Two equal snapshots mean nothing was touched.
 */
export async function snapshot(dir: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {}
  async function walk(p: string) {
    const st = await fs.lstat(p)
    const rel = path.relative(dir, p) || '.'
    if (st.isSymbolicLink()) {
      out[rel] = `link:${await fs.readlink(p)}`
    } else if (st.isDirectory()) {
      out[rel] = 'dir'
      for (const name of (await fs.readdir(p)).sort()) await walk(path.join(p, name))
    } else {
      out[rel] = `file:${await fs.readFile(p, 'utf8')}`
    }
  }
  await walk(dir)
  return out
}

export async function writeJson(file: string, data: unknown): Promise<void> {
  await fs.outputFile(file, JSON.stringify(data, null, 2) + '\n')
}
