/**
 * SettingsCodec interface — the contract every on-disk format implements.
 *
 * A codec is stateless: `parse` turns text into a fresh table and `serialize`
 * turns a table into text. Stores depend on this interface only, so a new
 * format is a new codec plus a case in `getCodec()`.
 */

import type { FileType, ParseResult, ReadonlySettingsTable } from './types.js'

export interface SettingsCodec {
  readonly fileType: FileType

  /**
   * Parse settings text into a new table.
   * @throws {ParseError} listing every malformed line
   */
  parse(text: string): ParseResult

  /** Render a table in the codec's canonical, key-sorted form */
  serialize(table: ReadonlySettingsTable): string
}
