import os from 'os'

import { applyEntries, LinkOptions } from '../core/runner.js'
import { loadManagedEntries } from '../manifest/io.js'
import { selectEntries } from '../manifest/types.js'
import { LinkResult, ReplacePolicy } from '../types.js'

export interface LinkRequest extends LinkOptions {
  /** Registry keys to link, in the order given. Ignored when `all` is set. */
  keys?: string[]
  all?: boolean
  policy?: ReplacePolicy
}

/**
 * Link the selected entries of a dotfiles repository into the home directory.
 * Throws UnknownEntryError before touching anything if a key is not declared.
 */
export async function link(repoRoot: string, req: LinkRequest = {}): Promise<LinkResult> {
  const homeDir = req.homeDir ?? os.homedir()
  const entries = await loadManagedEntries(repoRoot, { homeDir })
  const selected = selectEntries(entries, req.keys ?? [], { all: req.all })
  return applyEntries(selected, req.policy ?? 'safe', { ...req, homeDir })
}
