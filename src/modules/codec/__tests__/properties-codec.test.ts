/**
 * Unit tests for properties-codec.ts
 *
 * Tests:
 *  - Comment and blank line handling
 *  - Key/value splitting and trimming
 *  - List detection and segment trimming
 *  - Malformed line reporting
 *  - Duplicate key warnings
 *  - Canonical serialization (ordering, list joining, idempotence)
 */

import { describe, it, expect } from 'vitest'
import { ParseError } from '../../../core/errors.js'
import {
  parseProperties,
  serializeProperties,
  propertiesCodec,
} from '../properties-codec.js'
import { getCodec } from '../codec-registry.js'
import {
  compareKeys,
  listValue,
  singleValue,
  type PropertyValue,
  type SettingsTable,
} from '../types.js'

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function tableOf(entries: Array<[string, PropertyValue]>): SettingsTable {
  return new Map(entries)
}

function parseError(text: string): ParseError {
  try {
    parseProperties(text)
  } catch (err) {
    if (err instanceof ParseError) return err
    throw err
  }
  throw new Error('expected parseProperties to throw')
}

// ---------------------------------------------------------------------------
// parseProperties
// ---------------------------------------------------------------------------

describe('parseProperties - comments and blank lines', () => {
  it('skips comment and blank lines', () => {
    const { table, warnings } = parseProperties('# comment\n\nHttpPort = 8081\n')
    expect(Object.fromEntries(table)).toEqual({ HttpPort: singleValue('8081') })
    expect(warnings).toEqual([])
  })

  it('treats lines starting with ! as comments', () => {
    const { table } = parseProperties('! legacy comment\nname = propkit\n')
    expect([...table.keys()]).toEqual(['name'])
  })

  it('accepts indented comments and whitespace-only lines', () => {
    const { table } = parseProperties('   # indented\n \t \nk = v')
    expect(table.get('k')).toEqual(singleValue('v'))
    expect(table.size).toBe(1)
  })

  it('returns an empty table for empty input', () => {
    expect(parseProperties('').table.size).toBe(0)
  })
})

describe('parseProperties - entries', () => {
  it('splits on the first = only', () => {
    const { table } = parseProperties('query = a=b=c\n')
    expect(table.get('query')).toEqual(singleValue('a=b=c'))
  })

  it('trims keys and values but keeps internal whitespace', () => {
    const { table } = parseProperties('  Greeting Text   =   hello   world  \n')
    expect(table.get('Greeting Text')).toEqual(singleValue('hello   world'))
  })

  it('accepts lines without spaces around =', () => {
    const { table } = parseProperties('HttpPort=8081')
    expect(table.get('HttpPort')).toEqual(singleValue('8081'))
  })

  it('parses an empty value as an empty single value', () => {
    const { table } = parseProperties('Empty =\n')
    expect(table.get('Empty')).toEqual(singleValue(''))
  })

  it('handles CRLF line endings', () => {
    const { table } = parseProperties('a = 1\r\nb = x,y\r\n')
    expect(table.get('a')).toEqual(singleValue('1'))
    expect(table.get('b')).toEqual(listValue(['x', 'y']))
  })

  it('keeps entries in file order', () => {
    const { table } = parseProperties('zeta = 1\nalpha = 2\nmid = 3\n')
    expect([...table.keys()]).toEqual(['zeta', 'alpha', 'mid'])
  })
})

describe('parseProperties - list values', () => {
  it('parses comma-separated values as a list', () => {
    const { table } = parseProperties('LogLevel = Debug,Info,Warn\n')
    expect(table.get('LogLevel')).toEqual(listValue(['Debug', 'Info', 'Warn']))
  })

  it('trims each list segment', () => {
    const { table } = parseProperties('hosts =  a , b ,c  \n')
    expect(table.get('hosts')).toEqual(listValue(['a', 'b', 'c']))
  })

  it('keeps empty segments', () => {
    const { table } = parseProperties('k = a,,b,\n')
    expect(table.get('k')).toEqual(listValue(['a', '', 'b', '']))
  })

  it('reads a single value with a comma back as a list', () => {
    const { table } = parseProperties(
      'MongoServer = mongodb://10.11.1.5,10.11.1.6/?replicaSet=mytest\n'
    )
    expect(table.get('MongoServer')).toEqual(
      listValue(['mongodb://10.11.1.5', '10.11.1.6/?replicaSet=mytest'])
    )
  })
})

describe('parseProperties - malformed lines', () => {
  it('throws ParseError for a line without =', () => {
    const err = parseError('NoEqualsHere\n')
    expect(err.code).toBe('PARSE_ERROR')
    expect(err.issues).toEqual([
      { line: 1, text: 'NoEqualsHere', reason: 'missing "=" separator' },
    ])
  })

  it('throws ParseError for an empty key', () => {
    const err = parseError('a = 1\n = orphan\n')
    expect(err.issues).toEqual([{ line: 2, text: ' = orphan', reason: 'empty key' }])
  })

  it('collects every malformed line before failing', () => {
    const err = parseError('first\nok = 1\n# fine\nsecond\r\n=x\n')
    expect(err.issues.map((issue) => issue.line)).toEqual([1, 4, 5])
    expect(err.issues[1]?.text).toBe('second')
    expect(err.message).toBe(
      'Malformed settings text (3 lines):\n' +
        '  • line 1: missing "=" separator\n' +
        '  • line 4: missing "=" separator\n' +
        '  • line 5: empty key'
    )
  })
})

describe('parseProperties - duplicate keys', () => {
  it('keeps the later value and reports a warning', () => {
    const { table, warnings } = parseProperties('k = 1\nother = x\nk = 2\n')
    expect(table.get('k')).toEqual(singleValue('2'))
    expect(warnings).toEqual([{ kind: 'duplicate-key', key: 'k', line: 3, previousLine: 1 }])
  })

  it('reports each repeat against the occurrence before it', () => {
    const { warnings } = parseProperties('k = 1\nk = 2\nk = 3\n')
    expect(warnings.map((w) => [w.line, w.previousLine])).toEqual([
      [2, 1],
      [3, 2],
    ])
  })
})

// ---------------------------------------------------------------------------
// serializeProperties
// ---------------------------------------------------------------------------

describe('serializeProperties', () => {
  it('serializes an empty table to an empty string', () => {
    expect(serializeProperties(new Map())).toBe('')
  })

  it('writes one sorted line per key with lists comma-joined', () => {
    const table = tableOf([
      ['MongoServer', singleValue('mongodb://10.11.1.5,10.11.1.6,10.11.1.7/?replicaSet=mytest')],
      ['LogLevel', listValue(['Debug', 'Info', 'Warn'])],
      ['HttpPort', singleValue('8081')],
    ])
    expect(serializeProperties(table)).toBe(
      'HttpPort = 8081\n' +
        'LogLevel = Debug,Info,Warn\n' +
        'MongoServer = mongodb://10.11.1.5,10.11.1.6,10.11.1.7/?replicaSet=mytest\n'
    )
  })

  it('sorts by code unit, not locale', () => {
    const table = tableOf([
      ['b', singleValue('2')],
      ['B', singleValue('1')],
      ['a', singleValue('3')],
    ])
    expect(serializeProperties(table)).toBe('B = 1\na = 3\nb = 2\n')
  })

  it('is independent of insertion order', () => {
    const forward = tableOf([
      ['x', singleValue('1')],
      ['y', listValue(['a', 'b'])],
    ])
    const backward = tableOf([
      ['y', listValue(['a', 'b'])],
      ['x', singleValue('1')],
    ])
    expect(serializeProperties(forward)).toBe(serializeProperties(backward))
  })

  it('writes an empty single value with nothing after the separator', () => {
    expect(serializeProperties(tableOf([['k', singleValue('')]]))).toBe('k = \n')
  })
})

// ---------------------------------------------------------------------------
// Round trips
// ---------------------------------------------------------------------------

describe('properties round trip', () => {
  const table = tableOf([
    ['HttpPort', singleValue('8081')],
    ['LogLevel', listValue(['Debug', 'Info', 'Warn'])],
    ['Path', singleValue('/var/lib/app data')],
    ['Query', singleValue('a=b')],
  ])

  it('parse(serialize(T)) reproduces T', () => {
    const { table: reloaded } = parseProperties(serializeProperties(table))
    expect(Object.fromEntries(reloaded)).toEqual(Object.fromEntries(table))
  })

  it('serialization is idempotent', () => {
    const once = serializeProperties(table)
    const twice = serializeProperties(parseProperties(once).table)
    expect(twice).toBe(once)
  })

  it('a one-element list reloads as a single value', () => {
    const text = serializeProperties(tableOf([['k', listValue(['only'])]]))
    expect(text).toBe('k = only\n')
    expect(parseProperties(text).table.get('k')).toEqual(singleValue('only'))
  })
})

// ---------------------------------------------------------------------------
// Codec object and registry
// ---------------------------------------------------------------------------

describe('propertiesCodec', () => {
  it('exposes the properties file type', () => {
    expect(propertiesCodec.fileType).toBe('properties')
  })

  it('is returned by getCodec for the properties file type', () => {
    expect(getCodec('properties')).toBe(propertiesCodec)
  })
})

describe('compareKeys', () => {
  it('orders keys by code unit', () => {
    expect(['b', 'a', 'B', 'a1'].sort(compareKeys)).toEqual(['B', 'a', 'a1', 'b'])
  })

  it('returns 0 for equal keys', () => {
    expect(compareKeys('k', 'k')).toBe(0)
  })
})
