import path from 'path'

import { FS, lstatOrUndefined, nodeFS } from './fs.js'

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

/** Local time as `YYYYMMDD-HHMMSS`. */
export function backupTimestamp(now: Date): string {
  const date = `${pad(now.getFullYear(), 4)}${pad(now.getMonth() + 1)}${pad(now.getDate())}`
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return `${date}-${time}`
}

/**
 * Sibling path the target is moved to before replacement:
 * `<name>.bak.<YYYYMMDD-HHMMSS>`.
 */
export function backupPathForTarget(targetAbs: string, now: Date = new Date()): string {
  return path.join(path.dirname(targetAbs), `${path.basename(targetAbs)}.bak.${backupTimestamp(now)}`)
}

/**
 * Like backupPathForTarget, but appends `.1`, `.2`, ... when a backup from the
 * same second already occupies the name. Backups are never overwritten.
 */
export async function uniqueBackupPath(targetAbs: string, now: Date = new Date(), fsys: FS = nodeFS): Promise<string> {
  const base = backupPathForTarget(targetAbs, now)
  let candidate = base
  for (let n = 1; await lstatOrUndefined(fsys, candidate); n++) {
    candidate = `${base}.${n}`
  }
  return candidate
}
