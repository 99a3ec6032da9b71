import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { errorMessage } from '../core/fs.js'
import { CONFIG_DIR, ConfigError, getConfigFilePath, isRecord, LINKS_FILE } from '../manifest/types.js'

/**
 * Per-user settings, stored outside any repository under the XDG config
 * directory.
 */
export interface DotlinkConfig {
  /** Absolute path of the repository used when `--root` is not given. */
  repoRoot?: string
}

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  homeDir?: string
}

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'dotlink', 'config.json')
}

function parseConfig(raw: unknown, file: string): DotlinkConfig {
  if (!isRecord(raw)) throw new ConfigError(`Invalid config ${file}: expected a JSON object`)
  const { repoRoot } = raw
  if (repoRoot === undefined) return {}
  if (typeof repoRoot !== 'string' || !path.isAbsolute(repoRoot)) {
    throw new ConfigError(`Invalid config ${file}: "repoRoot" must be an absolute path`)
  }
  return { repoRoot }
}

/**
 * Missing file reads as an empty config; a file that is not valid JSON or has
 * the wrong shape is a ConfigError.
 */
export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<DotlinkConfig> {
  const file = getGlobalConfigPath(opts)
  if (!await fs.pathExists(file)) return {}
  let raw: unknown
  try {
    raw = await fs.readJson(file)
  } catch (e) {
    throw new ConfigError(`Invalid config ${file}: ${errorMessage(e)}`)
  }
  return parseConfig(raw, file)
}

/**
 * Remember `repoRoot` as the default. Only a directory that already declares
 * `.dotlink/links.json` is accepted.
 */
export async function setDefaultRepoRoot(repoRoot: string, opts: ConfigEnv = {}): Promise<string> {
  const abs = path.resolve(repoRoot)
  if (!await fs.pathExists(getConfigFilePath(abs, LINKS_FILE))) {
    throw new ConfigError(`Not a dotlink repository: ${abs} (no ${CONFIG_DIR}/${LINKS_FILE})`)
  }
  await fs.outputJson(getGlobalConfigPath(opts), { repoRoot: abs }, { spaces: 2 })
  return abs
}

export async function getDefaultRepoRoot(opts: ConfigEnv = {}): Promise<string | undefined> {
  return (await readGlobalConfig(opts)).repoRoot
}

export async function clearDefaultRepoRoot(opts: ConfigEnv = {}): Promise<void> {
  await fs.remove(getGlobalConfigPath(opts))
}
