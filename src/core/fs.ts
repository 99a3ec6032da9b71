import fs from 'fs-extra'

export type StatLike = Pick<fs.Stats, 'isSymbolicLink' | 'isDirectory' | 'isFile'>

/**
 * Read-only filesystem queries used by classification. Kept behind an interface
 * so status logic can run against an in-memory tree.
 */
export interface FS {
  /** Follows symlinks; a dangling link does not exist. */
  pathExists(p: string): Promise<boolean>
  lstat(p: string): Promise<StatLike>
  readlink(p: string): Promise<string>
  realpath(p: string): Promise<string>
}

export const nodeFS: FS = {
  pathExists: (p) => fs.pathExists(p),
  lstat: (p) => fs.lstat(p),
  readlink: (p) => fs.readlink(p),
  realpath: (p) => fs.realpath(p),
}

/**
 * lstat that reports a missing path as undefined instead of throwing.
 */
export async function lstatOrUndefined(fsys: FS, p: string): Promise<StatLike | undefined> {
  try {
    return await fsys.lstat(p)
  } catch (e) {
    if (isErrnoCode(e, 'ENOENT') || isErrnoCode(e, 'ENOTDIR')) return undefined
    throw e
  }
}

export function isErrnoCode(e: unknown, code: string): boolean {
  return e instanceof Error && 'code' in e && e.code === code
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
