import fs from 'fs-extra'
import path from 'path'

import { errorMessage } from './fs.js'
import { LinkResult } from '../types.js'

export async function appendAudit(logPath: string, result: LinkResult) {
  await fs.ensureDir(path.dirname(logPath))
  const line = JSON.stringify(result) + '\n'
  await fs.appendFile(logPath, line, 'utf8')
}

/**
 * Append the result to the audit log. A write failure becomes a warning on
 * the result; it never fails the operation.
 */
export async function tryAppendAudit(result: LinkResult, logPath: string): Promise<LinkResult> {
  try {
    await appendAudit(path.resolve(logPath), result)
  } catch (e) {
    result.warnings.push(`Failed to write audit log: ${errorMessage(e)}`)
  }
  return result
}
