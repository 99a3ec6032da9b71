import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { requiredByHints, validateGraph } from '../src/validation/graph.js'
import { parseSchema, SchemaNode, validateSchema } from '../src/validation/schema.js'
import {
  checkHardcodedPaths,
  checkJsonFormatting,
  validateDepsConfig,
  validateLinksConfig,
} from '../src/validation/files.js'
import { makeSandbox, Sandbox, writeJson } from './helpers.js'

const schema: SchemaNode = {
  type: 'object',
  required: ['checks'],
  additionalProperties: false,
  properties: {
    checks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'type'],
        additionalProperties: false,
        properties: {
          name: { type: 'string' },
          type: { type: 'string', enum: ['string', 'int'] },
          value: { type: 'string' },
          tags: { type: 'array', items: { type: 'string' } },
          count: { type: 'integer' },
        },
      },
    },
  },
}

describe('validateSchema', () => {
  it('rejects a non-object root outright', () => {
    expect(validateSchema([], schema, 'checks')).toEqual(['root must be an object'])
    expect(validateSchema('x', schema, 'checks')).toEqual(['root must be an object'])
  })

  it('reports a missing or malformed array', () => {
    expect(validateSchema({}, schema, 'checks')).toEqual(['missing required key: checks'])
    expect(validateSchema({ checks: {} }, schema, 'checks')).toEqual(["'checks' must be an array"])
  })

  it('accepts a conforming document', () => {
    expect(validateSchema({ checks: [{ name: 'a', type: 'int', tags: ['x'], count: 2 }] }, schema, 'checks')).toEqual([])
  })

  it('collects every violation in element and field order', () => {
    const data = {
      checks: [
        { name: 1, type: 'float', extra: true, tags: ['a', 2, null] },
        'nope',
      ],
      other: 1,
    }
    expect(validateSchema(data, schema, 'checks')).toEqual([
      'unexpected key: other',
      'checks[0]: unexpected field: extra',
      'checks[0].name: must be a string',
      `checks[0].type: must be one of ["string", "int"], got 'float'`,
      'checks[0].tags: items must be strings',
      'checks[0].tags: items must be strings',
      'checks[1]: must be an object',
    ])
  })

  it('lists every missing required field', () => {
    expect(validateSchema({ checks: [{}] }, schema, 'checks')).toEqual([
      'checks[0]: missing required field: name',
      'checks[0]: missing required field: type',
    ])
  })

  it('uses the right article', () => {
    expect(validateSchema({ checks: [{ name: 'a', type: 'int', count: 1.5 }] }, schema, 'checks')).toEqual([
      'checks[0].count: must be an integer',
    ])
  })

  it('skips type checks for polymorphic fields but still enforces enums', () => {
    const data = { checks: [{ name: 'a', type: 'int', value: 3 }] }
    expect(validateSchema(data, schema, 'checks')).toEqual(['checks[0].value: must be a string'])
    expect(validateSchema(data, schema, 'checks', { skipTypeCheckFields: ['value'] })).toEqual([])
    expect(validateSchema({ checks: [{ name: 'a', type: 3 }] }, schema, 'checks', { skipTypeCheckFields: ['type'] })).toEqual([
      `checks[0].type: must be one of ["string", "int"], got '3'`,
    ])
  })

  it('runs item and array hooks after the schema checks', () => {
    const seen: number[] = []
    const errors = validateSchema({ checks: [{ name: 'a', type: 'int' }, { name: 'b', type: 'int' }] }, schema, 'checks', {
      itemValidator: (i, item, errs) => {
        seen.push(i)
        if (item.name === 'b') errs.push(`checks[${i}]: b is reserved`)
      },
      arrayValidator: (items, errs) => errs.push(`${items.length} items`),
    })
    expect(seen).toEqual([0, 1])
    expect(errors).toEqual(['checks[1]: b is reserved', '2 items'])
  })
})

describe('parseSchema', () => {
  it('keeps understood keywords and drops the rest', () => {
    expect(parseSchema({ type: 'object', title: 't', required: ['a'], properties: { a: { type: 'string', description: 'x' } } })).toEqual({
      type: 'object',
      required: ['a'],
      properties: { a: { type: 'string' } },
    })
  })

  it('throws on a non-object document', () => {
    expect(() => parseSchema([])).toThrow('schema must be an object')
  })
})

describe('validateGraph', () => {
  it('accepts a chain', () => {
    expect(validateGraph([
      { label: 'c', depends: ['b'] },
      { label: 'b', depends: ['a'] },
      { label: 'a' },
    ])).toEqual([])
  })

  it('detects a two-node cycle', () => {
    expect(validateGraph([
      { label: 'a', depends: ['b'] },
      { label: 'b', depends: ['a'] },
    ])).toEqual(['dependency cycle detected among: a, b'])
  })

  it('detects a self-loop', () => {
    expect(validateGraph([{ label: 'x', depends: ['x'] }])).toEqual(['dependency cycle detected among: x'])
  })

  it('includes nodes downstream of a cycle', () => {
    expect(validateGraph([
      { label: 'a', depends: ['b'] },
      { label: 'b', depends: ['a'] },
      { label: 'c', depends: ['a'] },
    ])).toEqual(['dependency cycle detected among: a, b, c'])
  })

  it('sorts cycle members', () => {
    expect(validateGraph([
      { label: 'z', depends: ['y'] },
      { label: 'y', depends: ['z'] },
      { label: 'w' },
    ])).toEqual(['dependency cycle detected among: y, z'])
  })

  it('reports unknown dependencies without treating them as edges', () => {
    expect(validateGraph([{ label: 'a', depends: ['missing'] }])).toEqual([
      "checks[0].depends: unknown label 'missing'",
    ])
  })

  it('reports duplicate labels at the later position', () => {
    expect(validateGraph([{ label: 'a' }, { label: 'a' }])).toEqual(["checks[1].label: duplicate label 'a'"])
  })

  it('reports at the caller-supplied index', () => {
    expect(validateGraph([{ label: 'a', depends: ['q'], index: 4 }])).toEqual(["checks[4].depends: unknown label 'q'"])
  })
})

describe('requiredByHints', () => {
  it('maps each label to its sorted dependents', () => {
    const hints = requiredByHints([
      { label: 'zsh', depends: ['git'] },
      { label: 'omz', depends: ['zsh', 'git'] },
      { label: 'git' },
    ])
    expect(Object.fromEntries(hints)).toEqual({ git: ['omz', 'zsh'], zsh: ['omz'] })
  })
})

describe('config files', () => {
  let sb: Sandbox

  beforeEach(async () => {
    sb = await makeSandbox()
  })

  afterEach(async () => {
    await fs.remove(sb.base)
  })

  it('validates deps.json against the bundled schema and the graph', async () => {
    await writeJson(path.join(sb.repo, '.dotlink', 'deps.json'), {
      checks: [
        { label: 'git', kind: 'command', target: 'git' },
        { label: 'zsh', kind: 'command', target: 'zsh', depends: ['omz'] },
        { label: 'fzf', kind: 'shell', target: 'fzf' },
        { label: 'nvim', kind: 'command', target: 'nvim', depends: ['brew'] },
        { label: 'omz', kind: 'dir', target: '$HOME/.oh-my-zsh', depends: ['zsh'] },
      ],
    })
    expect(await validateDepsConfig(sb.repo)).toEqual([
      `checks[2].kind: must be one of ["command", "dir", "file"], got 'shell'`,
      "checks[3].depends: unknown label 'brew'",
      'dependency cycle detected among: omz, zsh',
    ])
  })

  it('validates links.json against the bundled schema', async () => {
    await writeJson(path.join(sb.repo, '.dotlink', 'links.json'), {
      links: [
        { key: 'b', target: 'x' },
        { key: 'a', description: 'x' },
        { key: 'a', description: 'y' },
      ],
    })
    expect(await validateLinksConfig(sb.repo)).toEqual([
      'links[0]: missing required field: description',
      'links[0]: unexpected field: target',
      "links[2].key: duplicate key 'a'",
    ])
  })

  it('reports an unreadable config file as one error', async () => {
    const errors = await validateLinksConfig(sb.repo)
    expect(errors).toHaveLength(1)
    expect(errors[0]).toMatch(/^cannot load links\.json: ENOENT/)
  })

  it('checks canonical JSON formatting', async () => {
    const file = path.join(sb.base, 'x.json')
    await writeJson(file, { a: [1, 2] })
    expect(await checkJsonFormatting(file)).toBe(true)

    await fs.writeFile(file, '{"a":[1,2]}\n')
    expect(await checkJsonFormatting(file)).toBe(false)

    await fs.writeFile(file, JSON.stringify({ a: [1, 2] }, null, 2))
    expect(await checkJsonFormatting(file)).toBe(false)
  })

  it('finds hardcoded home directories', async () => {
    const file = path.join(sb.base, '.zshrc')
    await fs.writeFile(file, [
      'export PATH=/home/alice/bin:$PATH',
      'alias ll="ls -l"',
      '  source /Users/bob/.zshrc.local  ',
      'export X=$HOME/bin',
      '',
    ].join('\n'))
    expect(await checkHardcodedPaths(file)).toEqual([
      [1, 'export PATH=/home/alice/bin:$PATH'],
      [3, '  source /Users/bob/.zshrc.local'],
    ])
  })
})
