import os from 'os'

import { formatEntryLine, linkTargetSummary } from '../core/format-plan.js'
import { FS } from '../core/fs.js'
import { classify, statusLabel, StatusReport } from '../core/status.js'
import { loadManagedEntries } from '../manifest/io.js'
import { ManagedEntry } from '../manifest/types.js'

export interface EntryStatusReport extends StatusReport {
  entry: ManagedEntry
  line: string
}

export function formatStatusLine(entry: ManagedEntry, report: StatusReport, homeDir: string = os.homedir()): string {
  const detail = report.detail ? ` (${report.detail})` : ''
  return formatEntryLine(statusLabel(report.status), entry.key, `${linkTargetSummary(entry, homeDir)}${detail}`)
}

export async function status(repoRoot: string, opts: { homeDir?: string; fs?: FS } = {}): Promise<EntryStatusReport[]> {
  const homeDir = opts.homeDir ?? os.homedir()
  const entries = await loadManagedEntries(repoRoot, { homeDir })
  const out: EntryStatusReport[] = []
  for (const entry of entries) {
    const report = await classify(entry, { homeDir, fs: opts.fs })
    out.push({ ...report, entry, line: formatStatusLine(entry, report, homeDir) })
  }
  return out
}
