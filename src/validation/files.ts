import fs from 'fs-extra'
import path from 'path'
import { fileURLToPath } from 'url'

import { errorMessage } from '../core/fs.js'
import { DEPS_FILE, getConfigFilePath, isRecord, LINKS_FILE } from '../manifest/types.js'
import { GraphCheck, validateGraph } from './graph.js'
import { parseSchema, SchemaNode, validateSchema, ValidateSchemaOptions } from './schema.js'

/** Schemas ship beside src/ and dist/, two levels above this module. */
export function bundledSchemaPath(name: string): string {
  return fileURLToPath(new URL(`../../schemas/${name}`, import.meta.url))
}

async function readJsonFile(file: string): Promise<unknown> {
  const json: unknown = await fs.readJson(file)
  return json
}

export async function validateConfigFile(jsonPath: string, schemaPath: string, arrayKey: string, opts: ValidateSchemaOptions = {}): Promise<string[]> {
  let data: unknown
  try {
    data = await readJsonFile(jsonPath)
  } catch (e) {
    return [`cannot load ${path.basename(jsonPath)}: ${errorMessage(e)}`]
  }

  let schema: SchemaNode
  try {
    schema = parseSchema(await readJsonFile(schemaPath))
  } catch (e) {
    return [`cannot load schema: ${errorMessage(e)}`]
  }

  return validateSchema(data, schema, arrayKey, opts)
}

export async function validateLinksConfig(repoRoot: string): Promise<string[]> {
  return validateConfigFile(getConfigFilePath(repoRoot, LINKS_FILE), bundledSchemaPath('links.schema.json'), 'links', {
    arrayValidator: (items, errors) => {
      const seen = new Set<string>()
      items.forEach((item, i) => {
        if (!isRecord(item) || typeof item.key !== 'string') return
        if (seen.has(item.key)) errors.push(`links[${i}].key: duplicate key '${item.key}'`)
        seen.add(item.key)
      })
    },
  })
}

/**
 * Schema conformance of deps.json, then label integrity and cycle detection
 * over every element that is well-formed enough to be a graph node.
 */
export async function validateDepsConfig(repoRoot: string): Promise<string[]> {
  return validateConfigFile(getConfigFilePath(repoRoot, DEPS_FILE), bundledSchemaPath('deps.schema.json'), 'checks', {
    arrayValidator: (items, errors) => {
      const checks: GraphCheck[] = []
      items.forEach((item, index) => {
        if (!isRecord(item) || typeof item.label !== 'string') return
        const depends = Array.isArray(item.depends)
          ? item.depends.filter((d: unknown): d is string => typeof d === 'string')
          : []
        checks.push({ label: item.label, depends, index })
      })
      errors.push(...validateGraph(checks))
    },
  })
}

/**
 * True iff the file is byte-identical to its own 2-space JSON rendering with
 * a trailing newline.
 */
export async function checkJsonFormatting(file: string): Promise<boolean> {
  const raw = await fs.readFile(file, 'utf8')
  const data: unknown = JSON.parse(raw)
  return raw === JSON.stringify(data, null, 2) + '\n'
}

const HOME_PATH_RE = /\/(Users|home)\/[^\s/]+/

/**
 * Lines that spell out a concrete home directory instead of `$HOME`/`~`.
 */
export async function checkHardcodedPaths(file: string): Promise<Array<[number, string]>> {
  const raw = await fs.readFile(file, 'utf8')
  const violations: Array<[number, string]> = []
  raw.split('\n').forEach((line, i) => {
    if (HOME_PATH_RE.test(line)) violations.push([i + 1, line.trimEnd()])
  })
  return violations
}
