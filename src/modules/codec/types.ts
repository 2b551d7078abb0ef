/**
 * Shared types for settings codecs.
 */

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** A property holding one string */
export interface SingleValue {
  readonly kind: 'single'
  readonly value: string
}

/** A property holding an ordered list of strings */
export interface ListValue {
  readonly kind: 'list'
  readonly values: readonly string[]
}

/** Value stored under a property key */
export type PropertyValue = SingleValue | ListValue

export function singleValue(value: string): SingleValue {
  return { kind: 'single', value }
}

export function listValue(values: readonly string[]): ListValue {
  return { kind: 'list', values: [...values] }
}

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

/** Key → value mapping owned by a settings store */
export type SettingsTable = Map<string, PropertyValue>

/** Read-only view accepted by serializers */
export type ReadonlySettingsTable = ReadonlyMap<string, PropertyValue>

/** Key order shared by every codec and by stores: code units, not locale */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

// ---------------------------------------------------------------------------
// Parse results
// ---------------------------------------------------------------------------

/** Emitted when a key appears more than once; the later line wins */
export interface DuplicateKeyWarning {
  kind: 'duplicate-key'
  key: string
  /** 1-based line of the occurrence that was kept */
  line: number
  /** 1-based line of the occurrence that was overwritten */
  previousLine: number
}

export type ParseWarning = DuplicateKeyWarning

export interface ParseResult {
  table: SettingsTable
  warnings: ParseWarning[]
}

// ---------------------------------------------------------------------------
// File types
// ---------------------------------------------------------------------------

/** Supported on-disk formats */
export const FILE_TYPES = ['properties'] as const
export type FileType = (typeof FILE_TYPES)[number]
