import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import type { FS, StatLike } from '../src/core/fs.js'
import { displayPath, resolveNonStrict } from '../src/core/paths.js'
import { classify, statusLabel } from '../src/core/status.js'
import { entryFor, makeSandbox, Sandbox, writeSource } from './helpers.js'

function enoent(p: string) {
  return Object.assign(new Error(`ENOENT: no such file or directory, '${p}'`), { code: 'ENOENT' })
}

function fakeStat(kind: 'file' | 'dir' | 'link'): StatLike {
  return {
    isSymbolicLink: () => kind === 'link',
    isDirectory: () => kind === 'dir',
    isFile: () => kind === 'file',
  }
}

/** Flat in-memory tree: regular files and directories only. */
function memoryFS(tree: Record<string, 'file' | 'dir'>): FS {
  return {
    pathExists: async (p) => p in tree,
    lstat: async (p) => {
      const kind = tree[p]
      if (!kind) throw enoent(p)
      return fakeStat(kind)
    },
    readlink: async (p) => { throw enoent(p) },
    realpath: async (p) => {
      if (!(p in tree)) throw enoent(p)
      return p
    },
  }
}

describe('classify', () => {
  let sb: Sandbox

  beforeEach(async () => {
    sb = await makeSandbox()
  })

  afterEach(async () => {
    await fs.remove(sb.base)
  })

  it('reports a missing source before looking at the target', async () => {
    const e = entryFor(sb, '.zshrc')
    await fs.outputFile(e.target, 'local\n')
    expect(await classify(e, { homeDir: sb.home })).toEqual({ status: 'missing-source', detail: 'source missing' })
  })

  it('treats a dangling symlink as a present source', async () => {
    const e = entryFor(sb, '.zshrc')
    await fs.symlink(path.join(sb.repo, 'nowhere'), e.source)
    expect(await classify(e, { homeDir: sb.home })).toEqual({ status: 'absent', detail: 'target missing' })
  })

  it('reports linked when the target resolves to the source', async () => {
    const e = entryFor(sb, '.zshrc')
    await writeSource(sb, '.zshrc')
    await fs.symlink(path.relative(sb.home, e.source), e.target)
    expect(await classify(e, { homeDir: sb.home })).toEqual({
      status: 'linked',
      detail: `points to ${e.source}`,
    })
  })

  it('reports linked-elsewhere with the resolved destination', async () => {
    const e = entryFor(sb, '.zshrc')
    await writeSource(sb, '.zshrc')
    await fs.outputFile(path.join(sb.home, 'other'), 'x\n')
    await fs.symlink(path.join(sb.home, 'other'), e.target)
    expect(await classify(e, { homeDir: sb.home })).toEqual({
      status: 'linked-elsewhere',
      detail: 'points to ~/other',
    })
  })

  it('reports broken-link for a dangling target link', async () => {
    const e = entryFor(sb, '.zshrc')
    await writeSource(sb, '.zshrc')
    await fs.symlink(path.join(sb.home, 'gone'), e.target)
    expect(await classify(e, { homeDir: sb.home })).toEqual({
      status: 'broken-link',
      detail: 'points to ~/gone',
    })
  })

  it('distinguishes a real directory from a regular file', async () => {
    const dirEntry = entryFor(sb, 'nvim')
    await fs.ensureDir(dirEntry.source)
    await fs.ensureDir(dirEntry.target)
    expect(await classify(dirEntry, { homeDir: sb.home })).toEqual({ status: 'target-dir', detail: 'target is a directory' })

    const fileEntry = entryFor(sb, '.gitconfig')
    await writeSource(sb, '.gitconfig')
    await fs.outputFile(fileEntry.target, '[user]\n')
    expect(await classify(fileEntry, { homeDir: sb.home })).toEqual({ status: 'exists', detail: 'target exists' })
  })

  it('runs against an injected filesystem', async () => {
    const fsys = memoryFS({ '/r/a': 'file', '/h/a': 'file', '/r/b': 'file' })
    const exists = { key: 'a', description: 'a', source: '/r/a', target: '/h/a' }
    const absent = { key: 'b', description: 'b', source: '/r/b', target: '/h/b' }
    expect((await classify(exists, { fs: fsys, homeDir: '/h' })).status).toBe('exists')
    expect((await classify(absent, { fs: fsys, homeDir: '/h' })).status).toBe('absent')
  })
})

describe('statusLabel', () => {
  it('maps every status to its column label', () => {
    expect(statusLabel('linked')).toBe('LINKED')
    expect(statusLabel('missing-source')).toBe('MISSING')
    expect(statusLabel('linked-elsewhere')).toBe('OTHER')
    expect(statusLabel('broken-link')).toBe('BROKEN')
    expect(statusLabel('target-dir')).toBe('DIR')
  })
})

describe('displayPath', () => {
  it('abbreviates paths under home', () => {
    expect(displayPath('/home/u', '/home/u')).toBe('~')
    expect(displayPath('/home/u/.config/nvim', '/home/u')).toBe('~/.config/nvim')
    expect(displayPath('/home/u/..foo', '/home/u')).toBe('~/..foo')
  })

  it('leaves other paths alone', () => {
    expect(displayPath('/home/user2/x', '/home/u')).toBe('/home/user2/x')
    expect(displayPath('/etc/hosts', '/home/u')).toBe('/etc/hosts')
    expect(displayPath('/home', '/home/u')).toBe('/home')
  })
})

describe('resolveNonStrict', () => {
  let sb: Sandbox

  beforeEach(async () => {
    sb = await makeSandbox()
  })

  afterEach(async () => {
    await fs.remove(sb.base)
  })

  it('follows a dangling link to its missing destination', async () => {
    const link = path.join(sb.home, 'link')
    await fs.symlink('missing/deeper', link)
    expect(await resolveNonStrict(link)).toBe(path.join(sb.home, 'missing', 'deeper'))
  })

  it('resolves through a linked parent directory', async () => {
    await fs.ensureDir(path.join(sb.repo, 'real'))
    await fs.symlink(path.join(sb.repo, 'real'), path.join(sb.home, 'alias'))
    expect(await resolveNonStrict(path.join(sb.home, 'alias', 'nope'))).toBe(path.join(sb.repo, 'real', 'nope'))
  })

  it('terminates on a symlink loop', async () => {
    const a = path.join(sb.home, 'a')
    const b = path.join(sb.home, 'b')
    await fs.symlink(b, a)
    await fs.symlink(a, b)
    expect([a, b]).toContain(await resolveNonStrict(a))
  })
})
