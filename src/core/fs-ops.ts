import fs from 'fs-extra'
import path from 'path'

export async function createDir(p: string) {
  await fs.ensureDir(p)
}

/**
 * Create a symlink at target pointing to source, relative to the target's
 * directory. There is no copy fallback: if symlink fails, it throws.
 */
export async function createSymlink(sourceAbs: string, targetAbs: string) {
  const rel = path.relative(path.dirname(targetAbs), sourceAbs) || '.'
  const st = await fs.lstat(sourceAbs).catch(() => undefined)
  await fs.symlink(rel, targetAbs, st?.isDirectory() ? 'dir' : 'file')
}

/**
 * Remove a file or symlink. Directories are refused.
 */
export async function removeFile(p: string) {
  const st = await fs.lstat(p)
  if (st.isDirectory()) {
    throw new Error(`Refusing to remove directory: ${p}`)
  }
  await fs.unlink(p)
}

export async function renamePath(from: string, to: string) {
  await fs.rename(from, to)
}
