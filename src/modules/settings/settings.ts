/**
 * Settings interface — public contract for a settings store.
 *
 * All callers should depend on this interface, not the concrete store.
 * Create an instance via `builder().fileTypeProperties().build()`.
 */

import type { ParseWarning } from '../codec/types.js'

/**
 * An in-memory table of properties bound to one file format.
 *
 * Each key holds either a single string or an ordered list of strings; the
 * accessor used decides which kind is returned.
 */
export interface Settings {
  /**
   * Return the single value stored under `key`.
   * @returns undefined if the key is absent or holds a list
   */
  property(key: string): string | undefined

  /**
   * Return a copy of the list stored under `key`.
   * @returns undefined if the key is absent or holds a single value
   */
  propertySlice(key: string): string[] | undefined

  /**
   * Insert or overwrite a single value.
   * @throws {InvalidKeyError} if the key is empty or contains `=` or a line break
   * @throws {InvalidValueError} if the value contains a line break
   */
  setProperty(key: string, value: string): void

  /**
   * Insert or overwrite a list value.
   * @throws {InvalidKeyError} if the key is empty or contains `=` or a line break
   * @throws {InvalidValueError} if any element contains a line break
   */
  setPropertySlice(key: string, values: readonly string[]): void

  /** Delete `key`; returns whether it existed. */
  removeProperty(key: string): boolean

  /** All keys, in serialization order. */
  propertyNames(): string[]

  /** Number of stored properties. */
  readonly size: number

  /**
   * Replace the table with the contents of `text`.
   * The table is left untouched if parsing fails.
   * @throws {ParseError}
   */
  load(text: string): ParseWarning[]

  /** Serialize the table in the bound format. */
  store(): string

  /**
   * Replace the table with the contents of a file.
   * The table is left untouched on any failure.
   * @throws {SettingsIoError} if the file cannot be read
   * @throws {ParseError} if the file contains malformed lines
   */
  loadFromFile(filePath: string): ParseWarning[]

  /**
   * Write the table to a file, creating or truncating it.
   * @throws {SettingsIoError} if the file cannot be written
   */
  storeToFile(filePath: string): void
}
