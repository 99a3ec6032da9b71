import fs from 'fs-extra'

import {
  ConfigError,
  DEPS_FILE,
  DependencyCheck,
  getConfigFilePath,
  LINKS_FILE,
  ManagedEntry,
  normalizeDependencyChecks,
  normalizeRegistry,
  resolveEntry,
  ResolveOptions,
} from './types.js'

async function readConfigJson(file: string): Promise<unknown> {
  if (!await fs.pathExists(file)) {
    throw new ConfigError(`Not found: ${file}`)
  }
  const json: unknown = await fs.readJson(file)
  return json
}

/**
 * Load `.dotlink/links.json` and resolve every record against the repository
 * root and the home directory, in declaration order.
 */
export async function loadManagedEntries(repoRoot: string, opts: ResolveOptions = {}): Promise<ManagedEntry[]> {
  const registry = normalizeRegistry(await readConfigJson(getConfigFilePath(repoRoot, LINKS_FILE)))
  return registry.links.map(record => resolveEntry(repoRoot, record, opts))
}

export async function loadDependencyChecks(repoRoot: string, opts: ResolveOptions = {}): Promise<DependencyCheck[]> {
  return normalizeDependencyChecks(await readConfigJson(getConfigFilePath(repoRoot, DEPS_FILE)), opts)
}
