/**
 * Properties codec — reads and writes line-oriented `key = value` text.
 *
 * Format:
 *   - one entry per line, split on the first `=`; key and value are trimmed
 *   - lines starting with `#` or `!` (after optional whitespace) are comments
 *   - blank lines are ignored
 *   - a value containing `,` is a list; each segment is trimmed
 *
 * There is no escape syntax. A single value that contains a comma reloads as
 * a list, and a one-element list reloads as a single value.
 */

import { ParseError, type ParseIssue } from '../../core/errors.js'
import type { SettingsCodec } from './codec.js'
import {
  compareKeys,
  listValue,
  singleValue,
  type ParseResult,
  type ParseWarning,
  type PropertyValue,
  type ReadonlySettingsTable,
  type SettingsTable,
} from './types.js'

export const KEY_VALUE_SEPARATOR = '='
export const LIST_SEPARATOR = ','
export const COMMENT_PREFIXES = ['#', '!'] as const

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function isCommentOrBlank(trimmed: string): boolean {
  if (trimmed === '') return true
  return COMMENT_PREFIXES.some((prefix) => trimmed.startsWith(prefix))
}

function parseValue(raw: string): PropertyValue {
  if (!raw.includes(LIST_SEPARATOR)) return singleValue(raw)
  return listValue(raw.split(LIST_SEPARATOR).map((segment) => segment.trim()))
}

/**
 * Parse properties text into a table.
 *
 * Every line is examined before failing, so the thrown ParseError lists all
 * malformed lines at once.
 *
 * @throws {ParseError} when any non-comment line lacks `=` or has an empty key
 */
export function parseProperties(text: string): ParseResult {
  const table: SettingsTable = new Map()
  const warnings: ParseWarning[] = []
  const issues: ParseIssue[] = []
  const seenAt = new Map<string, number>()

  const lines = text.split('\n')
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine
    const trimmed = line.trim()
    if (isCommentOrBlank(trimmed)) return

    const separatorAt = trimmed.indexOf(KEY_VALUE_SEPARATOR)
    if (separatorAt === -1) {
      issues.push({ line: lineNumber, text: line, reason: `missing "${KEY_VALUE_SEPARATOR}" separator` })
      return
    }

    const key = trimmed.slice(0, separatorAt).trim()
    if (key === '') {
      issues.push({ line: lineNumber, text: line, reason: 'empty key' })
      return
    }

    const previousLine = seenAt.get(key)
    if (previousLine !== undefined) {
      warnings.push({ kind: 'duplicate-key', key, line: lineNumber, previousLine })
    }
    seenAt.set(key, lineNumber)
    table.set(key, parseValue(trimmed.slice(separatorAt + 1).trim()))
  })

  if (issues.length > 0) {
    throw new ParseError(issues)
  }

  return { table, warnings }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function formatValue(value: PropertyValue): string {
  switch (value.kind) {
    case 'single':
      return value.value
    case 'list':
      return value.values.join(LIST_SEPARATOR)
  }
}

/**
 * Serialize a table to properties text, one `key = value` line per entry,
 * sorted by key. An empty table yields an empty string.
 */
export function serializeProperties(table: ReadonlySettingsTable): string {
  return [...table.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([key, value]) => `${key} ${KEY_VALUE_SEPARATOR} ${formatValue(value)}\n`)
    .join('')
}

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

export const propertiesCodec: SettingsCodec = {
  fileType: 'properties',
  parse: parseProperties,
  serialize: serializeProperties,
}
