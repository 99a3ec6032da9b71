import { isRecord } from '../manifest/types.js'

export type JsonType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null'

const JSON_TYPES: readonly JsonType[] = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null']

/**
 * The subset of JSON Schema the config files use: one object at the root,
 * one array of flat objects under a known key.
 */
export interface SchemaNode {
  type?: JsonType
  enum?: readonly unknown[]
  required?: readonly string[]
  properties?: Record<string, SchemaNode>
  additionalProperties?: boolean
  items?: SchemaNode
}

export interface ValidateSchemaOptions {
  /**
   * Fields whose value is intentionally polymorphic (e.g. a typed default's
   * `value`). Their declared type is not enforced; enums still are.
   */
  skipTypeCheckFields?: Iterable<string>
  /** Extra per-element checks, run after the schema checks of that element. */
  itemValidator?: (index: number, item: Record<string, unknown>, errors: string[]) => void
  /** Checks over the whole array, run once after every element. */
  arrayValidator?: (items: unknown[], errors: string[]) => void
}

function isJsonType(v: unknown): v is JsonType {
  return JSON_TYPES.some(t => t === v)
}

function isStringArray(v: unknown): v is string[] {
  return Array.isArray(v) && v.every(x => typeof x === 'string')
}

/**
 * Build a SchemaNode from parsed JSON, keeping only the keywords understood
 * here. Throws when the document is not an object.
 */
export function parseSchema(raw: unknown): SchemaNode {
  if (!isRecord(raw)) throw new Error('schema must be an object')
  const node: SchemaNode = {}
  if (isJsonType(raw.type)) node.type = raw.type
  if (Array.isArray(raw.enum)) node.enum = raw.enum
  if (isStringArray(raw.required)) node.required = raw.required
  if (typeof raw.additionalProperties === 'boolean') node.additionalProperties = raw.additionalProperties
  if (isRecord(raw.items)) node.items = parseSchema(raw.items)
  if (isRecord(raw.properties)) {
    const properties: Record<string, SchemaNode> = {}
    for (const [name, prop] of Object.entries(raw.properties)) {
      if (isRecord(prop)) properties[name] = parseSchema(prop)
    }
    node.properties = properties
  }
  return node
}

export function matchesType(value: unknown, type: JsonType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string'
    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
    case 'boolean':
      return typeof value === 'boolean'
    case 'array':
      return Array.isArray(value)
    case 'object':
      return isRecord(value)
    case 'null':
      return value === null
    default: {
      const _exhaustive: never = type
      throw new Error(`Unknown JSON type: ${String(_exhaustive)}`)
    }
  }
}

function withArticle(type: JsonType): string {
  return /^[aeiou]/.test(type) ? `an ${type}` : `a ${type}`
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value)
}

function formatEnum(values: readonly unknown[]): string {
  return `[${values.map(v => JSON.stringify(v)).join(', ')}]`
}

/**
 * Check `data` against `schema`, where `schema.properties[arrayKey]` describes
 * an array of flat objects. Every violation is collected: per element, in
 * declared-field order.
 */
export function validateSchema(data: unknown, schema: SchemaNode, arrayKey: string, opts: ValidateSchemaOptions = {}): string[] {
  const errors: string[] = []
  const skip = new Set(opts.skipTypeCheckFields ?? [])

  if (!isRecord(data)) return ['root must be an object']

  for (const key of schema.required ?? []) {
    if (!(key in data)) errors.push(`missing required key: ${key}`)
  }

  const allowedKeys = new Set(Object.keys(schema.properties ?? {}))
  if (schema.additionalProperties === false) {
    for (const key of Object.keys(data)) {
      if (!allowedKeys.has(key)) errors.push(`unexpected key: ${key}`)
    }
  }

  const items = data[arrayKey]
  if (items === undefined) return errors
  if (!Array.isArray(items)) {
    errors.push(`'${arrayKey}' must be an array`)
    return errors
  }

  const itemSchema = schema.properties?.[arrayKey]?.items ?? {}
  const fields = Object.entries(itemSchema.properties ?? {})
  const allowedFields = new Set(fields.map(([name]) => name))

  items.forEach((item: unknown, i) => {
    const at = `${arrayKey}[${i}]`
    if (!isRecord(item)) {
      errors.push(`${at}: must be an object`)
      return
    }
    for (const field of itemSchema.required ?? []) {
      if (!(field in item)) errors.push(`${at}: missing required field: ${field}`)
    }
    if (itemSchema.additionalProperties === false) {
      for (const key of Object.keys(item)) {
        if (!allowedFields.has(key)) errors.push(`${at}: unexpected field: ${key}`)
      }
    }
    for (const [field, prop] of fields) {
      if (!(field in item)) continue
      const val = item[field]
      if (!skip.has(field) && prop.type) {
        if (!matchesType(val, prop.type)) {
          errors.push(`${at}.${field}: must be ${withArticle(prop.type)}`)
        } else if (prop.type === 'array' && Array.isArray(val) && prop.items?.type) {
          const itemType = prop.items.type
          for (const el of val) {
            if (!matchesType(el, itemType)) errors.push(`${at}.${field}: items must be ${itemType}s`)
          }
        }
      }
      if (prop.enum && prop.enum.length && !prop.enum.includes(val)) {
        errors.push(`${at}.${field}: must be one of ${formatEnum(prop.enum)}, got '${formatValue(val)}'`)
      }
    }
    opts.itemValidator?.(i, item, errors)
  })

  opts.arrayValidator?.(items, errors)
  return errors
}
