import os from 'os'
import path from 'path'

import { FS, isErrnoCode, lstatOrUndefined, nodeFS } from './fs.js'

const MAX_LINK_HOPS = 40

/**
 * Render an absolute path relative to the home directory (`~/...`) when it
 * lives under it; otherwise return it unchanged.
 */
export function displayPath(p: string, homeDir: string = os.homedir()): string {
  const rel = path.relative(homeDir, p)
  if (rel === '') return '~'
  if (rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return p
  return `~/${rel}`
}

/**
 * Canonical path of `p` with every symlink resolved as far as the filesystem
 * allows. Unlike realpath, a dangling link or missing tail is not an error:
 * the unresolved remainder is appended to the deepest resolvable prefix.
 */
export async function resolveNonStrict(p: string, fsys: FS = nodeFS): Promise<string> {
  return resolveWithHops(fsys, path.resolve(p), 0)
}

async function resolveWithHops(fsys: FS, abs: string, hops: number): Promise<string> {
  try {
    return await fsys.realpath(abs)
  } catch (e) {
    if (!isErrnoCode(e, 'ENOENT') && !isErrnoCode(e, 'ENOTDIR') && !isErrnoCode(e, 'ELOOP')) throw e
  }

  const parent = path.dirname(abs)
  if (parent === abs || hops > MAX_LINK_HOPS) return abs

  const realParent = await resolveWithHops(fsys, parent, hops)
  const st = await lstatOrUndefined(fsys, path.join(realParent, path.basename(abs)))
  if (st?.isSymbolicLink()) {
    const link = await fsys.readlink(path.join(realParent, path.basename(abs)))
    return resolveWithHops(fsys, path.resolve(realParent, link), hops + 1)
  }
  return path.join(realParent, path.basename(abs))
}
