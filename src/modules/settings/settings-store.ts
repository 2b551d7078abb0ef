/**
 * SettingsStore — the in-memory settings table bound to one codec.
 *
 * Reads and writes are synchronous. A load parses into a fresh table and
 * swaps it in only on success, so a failed load never leaves a partial table.
 */

import { readFileSync, renameSync, rmSync, writeFileSync } from 'fs'
import { basename, dirname, join } from 'path'
import { SettingsIoError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { SettingsCodec } from '../codec/codec.js'
import {
  compareKeys,
  listValue,
  singleValue,
  type ParseWarning,
  type SettingsTable,
} from '../codec/types.js'
import type { Settings } from './settings.js'
import { assertValidKey, assertValidValue, assertValidValues } from './validation.js'

const logger = createLogger('settings')

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SettingsStoreOptions {
  codec: SettingsCodec
  /**
   * Write to a sibling temporary file and rename it over the target, so an
   * interrupted write leaves the previous file in place.
   */
  atomicWrites?: boolean
}

// ---------------------------------------------------------------------------
// SettingsStore
// ---------------------------------------------------------------------------

export class SettingsStore implements Settings {
  private _table: SettingsTable = new Map()
  private readonly _codec: SettingsCodec
  private readonly _atomicWrites: boolean

  constructor(options: SettingsStoreOptions) {
    this._codec = options.codec
    this._atomicWrites = options.atomicWrites ?? false
  }

  get fileType(): SettingsCodec['fileType'] {
    return this._codec.fileType
  }

  get size(): number {
    return this._table.size
  }

  property(key: string): string | undefined {
    const value = this._table.get(key)
    return value?.kind === 'single' ? value.value : undefined
  }

  propertySlice(key: string): string[] | undefined {
    const value = this._table.get(key)
    return value?.kind === 'list' ? [...value.values] : undefined
  }

  setProperty(key: string, value: string): void {
    assertValidKey(key)
    assertValidValue(key, value)
    this._table.set(key, singleValue(value))
  }

  setPropertySlice(key: string, values: readonly string[]): void {
    assertValidKey(key)
    assertValidValues(key, values)
    this._table.set(key, listValue(values))
  }

  removeProperty(key: string): boolean {
    return this._table.delete(key)
  }

  propertyNames(): string[] {
    return [...this._table.keys()].sort(compareKeys)
  }

  load(text: string): ParseWarning[] {
    const { table, warnings } = this._codec.parse(text)
    this._table = table
    for (const warning of warnings) {
      logger.debug(warning, 'Duplicate settings key; later value kept')
    }
    return warnings
  }

  store(): string {
    return this._codec.serialize(this._table)
  }

  loadFromFile(filePath: string): ParseWarning[] {
    let text: string
    try {
      text = readFileSync(filePath, 'utf-8')
    } catch (err) {
      throw new SettingsIoError(filePath, 'read', err)
    }
    const warnings = this.load(text)
    logger.debug({ filePath, entries: this._table.size }, 'Settings loaded')
    return warnings
  }

  storeToFile(filePath: string): void {
    const text = this.store()
    try {
      if (this._atomicWrites) {
        this._writeAtomically(filePath, text)
      } else {
        writeFileSync(filePath, text, 'utf-8')
      }
    } catch (err) {
      throw new SettingsIoError(filePath, 'write', err)
    }
    logger.debug({ filePath, entries: this._table.size, atomic: this._atomicWrites }, 'Settings stored')
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _writeAtomically(filePath: string, text: string): void {
    const tmpPath = join(dirname(filePath), `.${basename(filePath)}.${String(process.pid)}.tmp`)
    try {
      writeFileSync(tmpPath, text, 'utf-8')
      renameSync(tmpPath, filePath)
    } catch (err) {
      rmSync(tmpPath, { force: true })
      throw err
    }
  }
}
